/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * This is the single place where we wire together every dependency of a
 * run. Think of it as a **phone book**: each token (name badge) is mapped
 * to a concrete implementation so that when a pipeline says "I need the
 * TableWriter", the container looks up the token and hands back the right
 * object.
 *
 * How tsyringe works:
 *   - `reflect-metadata` must be imported first — it enables the decorators
 *     (@inject, @injectable) to store constructor metadata at runtime.
 *   - `useValue` registers a pre-built singleton (config, logger).
 *   - `useClass` constructs the class on resolve, injecting its own
 *     dependencies automatically.
 *
 * Why centralise here?
 *   No pipeline ever does `new ParquetTableWriter(...)` by hand. Swapping the
 *   sink for another format means changing ONE line here; tests skip the
 *   container and pass in-memory stand-ins through the constructors.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { LogPipeline } from '@application/pipelines/LogPipeline';
import { SongPipeline } from '@application/pipelines/SongPipeline';
import { WarehouseService } from '@application/services/WarehouseService';
import { LogEventAdapter } from '@infrastructure/adapters/LogEventAdapter';
import { SongRecordAdapter } from '@infrastructure/adapters/SongRecordAdapter';
import { JsonRecordReader } from '@infrastructure/storage/JsonRecordReader';
import { ParquetTableWriter } from '@infrastructure/storage/ParquetTableWriter';

container.register(TOKENS.Config, { useValue: config });
container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.RecordReader, { useClass: JsonRecordReader });
container.register(TOKENS.TableWriter, { useClass: ParquetTableWriter });
container.register(TOKENS.SongRecordAdapter, { useClass: SongRecordAdapter });
container.register(TOKENS.LogEventAdapter, { useClass: LogEventAdapter });
container.register(TOKENS.SongPipeline, { useClass: SongPipeline });
container.register(TOKENS.LogPipeline, { useClass: LogPipeline });
container.register(TOKENS.WarehouseService, { useClass: WarehouseService });

export { container };
