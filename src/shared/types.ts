/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * I keep the table plumbing here so no single layer owns it. TableRowMap
 * ties each warehouse table name to its row shape; Table<N> is the
 * in-memory tabular structure every pipeline hands to the writer, and the
 * writer looks up the matching Parquet schema by the same name.
 * SourceRecord is what the reader yields: the raw JSON value plus where it
 * came from. The *Result shapes are what the pipelines and the
 * WarehouseService return (counts, join misses, duration).
 */
import type { ArtistRow } from '@domain/entities/Artist';
import type { SongRow } from '@domain/entities/Song';
import type { SongplayRow } from '@domain/entities/Songplay';
import type { TimeRow } from '@domain/entities/TimeSlot';
import type { UserRow } from '@domain/entities/User';

export interface TableRowMap {
  songs: SongRow;
  artists: ArtistRow;
  users: UserRow;
  time: TimeRow;
  songplays: SongplayRow;
}

export type TableName = keyof TableRowMap;

export interface Table<N extends TableName> {
  name: N;
  rows: TableRowMap[N][];
}

/** Column of table N that the writer may partition on. */
export type ColumnOf<N extends TableName> = keyof TableRowMap[N] & string;

/**
 * overwrite: replace whatever is at the destination.
 * errorifexists: refuse to touch an existing destination.
 */
export type WriteMode = 'overwrite' | 'errorifexists';

export interface WriteOptions<N extends TableName> {
  partitionBy: readonly ColumnOf<N>[];
  mode: WriteMode;
}

export interface WriteResult {
  destination: string;
  rowCount: number;
  fileCount: number;
}

/**
 * One raw JSON value read from a source file. `partition` is the file's
 * position in sorted enumeration order; `offset` the value's position in
 * the file. Together they give every record a stable scan order.
 */
export interface SourceRecord {
  value: unknown;
  partition: number;
  offset: number;
  file: string;
}

export interface SongPipelineResult {
  songs: number;
  artists: number;
  recordsRead: number;
  durationMs: number;
}

export interface LogPipelineResult {
  users: number;
  time: number;
  songplays: number;
  recordsRead: number;
  /** NextSong events whose track could not be matched to the song catalog. */
  unresolvedSongplays: number;
  durationMs: number;
}

export interface WarehouseRunResult {
  songs: SongPipelineResult;
  logs: LogPipelineResult;
  durationMs: number;
}
