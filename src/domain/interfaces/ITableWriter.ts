import type { Table, TableName, WriteOptions, WriteResult } from '@shared/types';

/**
 * Table Writer Interface — The Sink Contract
 * Layer: Domain
 *
 * Persists one derived table as a partitioned columnar file set at
 * `destination`. With mode 'overwrite' the previous contents of the
 * destination are fully replaced; no partial-write recovery is attempted.
 * Implementations throw SinkError on any failure.
 */
export interface ITableWriter {
  write<N extends TableName>(
    table: Table<N>,
    destination: string,
    options: WriteOptions<N>,
  ): Promise<WriteResult>;
}
