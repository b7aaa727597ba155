/**
 * Parquet column definitions for the five warehouse tables.
 *
 * Column specs follow the @dsnp/parquetjs schema format. Nullable columns
 * are OPTIONAL; natural keys and derived calendar fields are REQUIRED.
 * Partition columns are listed too — the writer strips whichever ones a
 * write partitions on, because their values live in the directory path.
 */
import type { TableName, TableRowMap } from '@shared/types';

export type ParquetColumnType = 'UTF8' | 'INT32' | 'INT64' | 'DOUBLE' | 'TIMESTAMP_MILLIS';

export interface ColumnSpec {
  type: ParquetColumnType;
  optional?: boolean;
}

export type TableColumns<N extends TableName> = { [C in keyof TableRowMap[N]]: ColumnSpec };

const text = { type: 'UTF8', optional: true } as const;
const key = { type: 'UTF8' } as const;
const double = { type: 'DOUBLE', optional: true } as const;
const int = { type: 'INT32' } as const;

export const TABLE_COLUMNS: { [N in TableName]: TableColumns<N> } = {
  songs: {
    song_id: key,
    title: text,
    artist_id: key,
    year: { type: 'INT32', optional: true },
    duration: double,
  },
  artists: {
    artist_id: key,
    name: text,
    location: text,
    latitude: double,
    longitude: double,
  },
  users: {
    user_id: key,
    first_name: text,
    last_name: text,
    gender: text,
    level: text,
  },
  time: {
    start_time: { type: 'TIMESTAMP_MILLIS' },
    hour: int,
    day: int,
    week: int,
    month: int,
    year: int,
  },
  songplays: {
    songplay_id: { type: 'INT64' },
    start_time: { type: 'TIMESTAMP_MILLIS' },
    user_id: key,
    level: text,
    song_id: text,
    artist_id: text,
    session_id: { type: 'INT64', optional: true },
    location: text,
    user_agent: text,
    year: int,
    month: int,
  },
};

/** A fresh, mutable copy of a table's column specs. */
export function columnsOf(table: TableName): Record<string, ColumnSpec> {
  const columns: Record<string, ColumnSpec> = TABLE_COLUMNS[table];
  return { ...columns };
}
