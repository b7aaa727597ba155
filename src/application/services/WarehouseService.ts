/**
 * Warehouse Service — Facade over the Two Pipelines
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * The Facade Pattern hides complex machinery behind a simple interface —
 * like a car's ignition button that starts the engine, fuel pump, and
 * electronics all at once. Here, calling `run()` hides:
 *   - Resolving input/output locations from configuration
 *   - Running the Song Pipeline to completion (songs, artists)
 *   - Handing its SongCatalog to the Log Pipeline (users, time, songplays)
 *
 * The order is fixed: songplays need the finished song and artist
 * dimensions. Nothing else is shared between the pipelines, and nothing is
 * kept between runs — every table is overwritten, so a failed run is simply
 * run again.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { WarehouseRunResult } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { LogPipeline } from '../pipelines/LogPipeline';
import { SongPipeline } from '../pipelines/SongPipeline';

@injectable()
export class WarehouseService {
  constructor(
    @inject(TOKENS.SongPipeline) private readonly songPipeline: SongPipeline,
    @inject(TOKENS.LogPipeline) private readonly logPipeline: LogPipeline,
    @inject(TOKENS.Config) private readonly settings: Pick<AppConfig, 'input' | 'output'>,
    @inject(TOKENS.Logger) private readonly log: Logger,
  ) {}

  async run(): Promise<WarehouseRunResult> {
    const startTime = Date.now();
    const { input, output } = this.settings;
    this.log.info({ inputDir: input.rootDir, outputDir: output.rootDir }, 'Warehouse run started');

    const songs = await this.songPipeline.run({
      inputDir: input.rootDir,
      pattern: input.songPattern,
      outputDir: output.rootDir,
    });

    const logs = await this.logPipeline.run(
      { inputDir: input.rootDir, pattern: input.logPattern, outputDir: output.rootDir },
      songs.catalog,
    );

    const result: WarehouseRunResult = {
      songs: songs.result,
      logs,
      durationMs: Date.now() - startTime,
    };
    this.log.info({ durationMs: result.durationMs }, 'Warehouse run complete');
    return result;
  }
}
