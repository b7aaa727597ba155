/**
 * Log Pipeline — usage log → users + time + songplays
 * Layer: Application
 *
 * 1. Read every log file and keep only NextSong events. The filter runs on
 *    raw JSON because other page types may lack a user or timestamp.
 * 2. Normalize the plays; a missing userId or ts aborts the pipeline before
 *    any table is written.
 * 3. Derive users, time and songplays. Songplays are joined against the
 *    SongCatalog from the Song Pipeline; unmatched plays keep null keys and
 *    are logged at debug level, with one summary warning per run.
 * 4. Overwrite the three tables.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { LogEvent } from '@domain/entities/LogEvent';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { IRecordReader } from '@domain/interfaces/IRecordReader';
import type { ITableWriter } from '@domain/interfaces/ITableWriter';
import { TABLE_LAYOUT } from '@shared/constants';
import type { LogPipelineResult } from '@shared/types';
import path from 'path';
import { inject, injectable } from 'tsyringe';

import {
  deriveSongplays,
  deriveTime,
  deriveUsers,
  filterSongPlays,
  type ScannedEvent,
} from '../transforms/logTransforms';
import type { SongCatalog } from '../transforms/SongCatalog';
import { collectRecords } from './collectRecords';
import type { PipelinePaths } from './types';

@injectable()
export class LogPipeline {
  constructor(
    @inject(TOKENS.RecordReader) private readonly reader: IRecordReader,
    @inject(TOKENS.TableWriter) private readonly writer: ITableWriter,
    @inject(TOKENS.LogEventAdapter) private readonly adapter: IDataSourceAdapter<LogEvent>,
    @inject(TOKENS.Config) private readonly settings: Pick<AppConfig, 'etl'>,
    @inject(TOKENS.Logger) private readonly log: Logger,
  ) {}

  async run(paths: PipelinePaths, catalog: SongCatalog): Promise<LogPipelineResult> {
    const startTime = Date.now();
    this.log.info(
      { inputDir: paths.inputDir, pattern: paths.pattern, catalogSize: catalog.size },
      'Log pipeline started',
    );

    const raw = await collectRecords(
      this.reader.read(paths.inputDir, paths.pattern),
      this.log,
      this.settings.etl.progressInterval,
    );
    const plays = filterSongPlays(raw);
    const scanned: ScannedEvent[] = plays.map((r) => ({
      event: this.adapter.normalize(r),
      partition: r.partition,
    }));
    const events = scanned.map((s) => s.event);

    const users = deriveUsers(events);
    const time = deriveTime(events);
    const songplays = deriveSongplays(scanned, catalog);

    for (const miss of songplays.misses) {
      this.log.debug({ code: miss.code }, miss.message);
    }
    if (songplays.misses.length > 0) {
      this.log.warn(
        { unresolved: songplays.misses.length, songplays: songplays.rows.length },
        'Songplays without a catalog match were written with null song_id/artist_id',
      );
    }

    await this.writer.write(
      { name: 'users', rows: users },
      path.join(paths.outputDir, TABLE_LAYOUT.users.path),
      { partitionBy: TABLE_LAYOUT.users.partitionBy, mode: 'overwrite' },
    );
    await this.writer.write(
      { name: 'time', rows: time },
      path.join(paths.outputDir, TABLE_LAYOUT.time.path),
      { partitionBy: TABLE_LAYOUT.time.partitionBy, mode: 'overwrite' },
    );
    await this.writer.write(
      { name: 'songplays', rows: songplays.rows },
      path.join(paths.outputDir, TABLE_LAYOUT.songplays.path),
      { partitionBy: TABLE_LAYOUT.songplays.partitionBy, mode: 'overwrite' },
    );

    const result: LogPipelineResult = {
      users: users.length,
      time: time.length,
      songplays: songplays.rows.length,
      recordsRead: raw.length,
      unresolvedSongplays: songplays.misses.length,
      durationMs: Date.now() - startTime,
    };
    this.log.info(result, 'Log pipeline complete');
    return result;
  }
}
