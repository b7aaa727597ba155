import type { SourceRecord } from '@shared/types';

/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * The Adapter Pattern is like a travel power adapter — it converts one plug
 * shape (raw JSON straight off disk) into another (a typed domain record) so
 * the transformation code never has to poke at `unknown`.
 *
 * The generic `TRecord` parameter lets each adapter declare what it produces:
 *   - SongRecordAdapter implements IDataSourceAdapter<SongRecord>
 *   - LogEventAdapter implements IDataSourceAdapter<LogEvent>
 *
 * `normalize()` throws a StructuralError when the raw value lacks a field
 * the warehouse is keyed on; the source location is included in the message
 * so the bad file can be found.
 */
export interface IDataSourceAdapter<TRecord> {
  normalize(raw: SourceRecord): TRecord;
}
