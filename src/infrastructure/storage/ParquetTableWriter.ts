/**
 * Parquet Table Writer — Partitioned Columnar Sink
 * Layer: Infrastructure (storage)
 * Pattern: implements ITableWriter
 *
 * I turn one in-memory Table into a Hive-style directory of Parquet files:
 *
 *   songplays.parquet/
 *     year=2018/month=11/part-00000.parquet
 *     _SUCCESS
 *
 * Steps: (1) honour the write mode — overwrite removes the destination,
 * errorifexists refuses to touch it; (2) group rows by their partition
 * values in order of first appearance; (3) write each group to its own
 * directory with the partition columns stripped from the file schema;
 * (4) drop an empty _SUCCESS marker once every file is closed.
 *
 * Rows are buffered by @dsnp/parquetjs and flushed one row group at a time
 * (PARQUET_ROW_GROUP_SIZE), so a large partition never has to be encoded in
 * one go. There is no partial-write recovery: any failure becomes a
 * SinkError and the destination is left as-is for the next overwrite.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { AppConfig } from '@core/config';
import type { ITableWriter } from '@domain/interfaces/ITableWriter';
import { HIVE_DEFAULT_PARTITION, SUCCESS_MARKER } from '@shared/constants';
import { SinkError } from '@shared/errors/AppError';
import type {
  ColumnOf,
  Table,
  TableName,
  TableRowMap,
  WriteMode,
  WriteOptions,
  WriteResult,
} from '@shared/types';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { access, mkdir, rm, writeFile } from 'fs/promises';
import path from 'path';
import { inject, injectable } from 'tsyringe';

import { type ColumnSpec, columnsOf } from './parquetSchemas';

const PART_FILE = 'part-00000.parquet';

interface PartitionGroup<N extends TableName> {
  segments: string[];
  rows: TableRowMap[N][];
}

@injectable()
export class ParquetTableWriter implements ITableWriter {
  constructor(
    @inject(TOKENS.Config) private readonly settings: Pick<AppConfig, 'etl'>,
    @inject(TOKENS.Logger) private readonly log: Logger,
  ) {}

  async write<N extends TableName>(
    table: Table<N>,
    destination: string,
    options: WriteOptions<N>,
  ): Promise<WriteResult> {
    const target = path.resolve(destination);

    try {
      await this.prepareDestination(target, options.mode);

      const columns = columnsOf(table.name);
      for (const column of options.partitionBy) delete columns[column];
      const schema = new ParquetSchema(columns);

      const groups = groupByPartition(table.rows, options.partitionBy);
      for (const group of groups) {
        const dir = path.join(target, ...group.segments);
        await mkdir(dir, { recursive: true });
        await this.writePartFile(path.join(dir, PART_FILE), schema, columns, group.rows);
      }

      await mkdir(target, { recursive: true });
      await writeFile(path.join(target, SUCCESS_MARKER), '');

      this.log.info(
        { table: table.name, destination: target, rows: table.rows.length, files: groups.length },
        'Table written',
      );
      return { destination: target, rowCount: table.rows.length, fileCount: groups.length };
    } catch (err) {
      if (err instanceof SinkError) throw err;
      throw new SinkError(table.name, target, err);
    }
  }

  private async prepareDestination(target: string, mode: WriteMode): Promise<void> {
    const exists = await access(target).then(
      () => true,
      () => false,
    );
    if (!exists) return;

    if (mode === 'errorifexists') {
      throw new Error('destination already exists');
    }
    await rm(target, { recursive: true, force: true });
  }

  private async writePartFile<N extends TableName>(
    file: string,
    schema: ParquetSchema,
    columns: Record<string, ColumnSpec>,
    rows: TableRowMap[N][],
  ): Promise<void> {
    const writer = await ParquetWriter.openFile(schema, file);
    writer.setRowGroupSize(this.settings.etl.rowGroupSize);
    try {
      for (const row of rows) {
        const record: Record<string, unknown> = {};
        for (const [column, spec] of Object.entries(columns)) {
          const value: unknown = Reflect.get(row, column);
          // parquetjs treats an absent key as null; required columns then fail loudly.
          if (value === null || value === undefined) continue;
          record[column] = spec.type === 'INT64' && typeof value === 'number' ? BigInt(value) : value;
        }
        await writer.appendRow(record);
      }
    } finally {
      await writer.close();
    }
    this.log.debug({ file, rows: rows.length }, 'Parquet part written');
  }
}

/** Group rows by their partition-column values, in order of first appearance. */
function groupByPartition<N extends TableName>(
  rows: readonly TableRowMap[N][],
  partitionBy: readonly ColumnOf<N>[],
): PartitionGroup<N>[] {
  const groups = new Map<string, PartitionGroup<N>>();
  for (const row of rows) {
    const segments = partitionBy.map((column) => `${column}=${partitionValue(row[column])}`);
    const key = segments.join('/');
    const group = groups.get(key);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(key, { segments, rows: [row] });
    }
  }
  return [...groups.values()];
}

function partitionValue(value: unknown): string {
  if (value === null || value === undefined || value === '') return HIVE_DEFAULT_PARTITION;
  if (value instanceof Date) return encodeURIComponent(value.toISOString());
  return encodeURIComponent(String(value));
}
