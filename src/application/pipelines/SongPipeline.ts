/**
 * Song Pipeline — song metadata → songs + artists
 * Layer: Application
 *
 * Read every song file, normalize each record (a missing song_id or
 * artist_id aborts here, before anything is written), derive the two
 * dimensions, and overwrite both tables. The finished dimensions are also
 * turned into a SongCatalog, which is the only thing the Log Pipeline gets
 * from this run.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { SongRecord } from '@domain/entities/SongRecord';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { IRecordReader } from '@domain/interfaces/IRecordReader';
import type { ITableWriter } from '@domain/interfaces/ITableWriter';
import { TABLE_LAYOUT } from '@shared/constants';
import type { SongPipelineResult } from '@shared/types';
import path from 'path';
import { inject, injectable } from 'tsyringe';

import { SongCatalog } from '../transforms/SongCatalog';
import { deriveArtists, deriveSongs } from '../transforms/songTransforms';
import { collectRecords } from './collectRecords';
import type { PipelinePaths } from './types';

export interface SongPipelineOutput {
  result: SongPipelineResult;
  catalog: SongCatalog;
}

@injectable()
export class SongPipeline {
  constructor(
    @inject(TOKENS.RecordReader) private readonly reader: IRecordReader,
    @inject(TOKENS.TableWriter) private readonly writer: ITableWriter,
    @inject(TOKENS.SongRecordAdapter) private readonly adapter: IDataSourceAdapter<SongRecord>,
    @inject(TOKENS.Config) private readonly settings: Pick<AppConfig, 'etl'>,
    @inject(TOKENS.Logger) private readonly log: Logger,
  ) {}

  async run(paths: PipelinePaths): Promise<SongPipelineOutput> {
    const startTime = Date.now();
    this.log.info({ inputDir: paths.inputDir, pattern: paths.pattern }, 'Song pipeline started');

    const raw = await collectRecords(
      this.reader.read(paths.inputDir, paths.pattern),
      this.log,
      this.settings.etl.progressInterval,
    );
    const records = raw.map((r) => this.adapter.normalize(r));

    const songs = deriveSongs(records);
    const artists = deriveArtists(records);

    await this.writer.write(
      { name: 'songs', rows: songs },
      path.join(paths.outputDir, TABLE_LAYOUT.songs.path),
      { partitionBy: TABLE_LAYOUT.songs.partitionBy, mode: 'overwrite' },
    );
    await this.writer.write(
      { name: 'artists', rows: artists },
      path.join(paths.outputDir, TABLE_LAYOUT.artists.path),
      { partitionBy: TABLE_LAYOUT.artists.partitionBy, mode: 'overwrite' },
    );

    const result: SongPipelineResult = {
      songs: songs.length,
      artists: artists.length,
      recordsRead: records.length,
      durationMs: Date.now() - startTime,
    };
    this.log.info(result, 'Song pipeline complete');

    return { result, catalog: new SongCatalog(songs, artists) };
  }
}
