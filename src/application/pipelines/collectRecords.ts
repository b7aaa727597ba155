import type { Logger } from '@core/logger';
import type { SourceRecord } from '@shared/types';

/**
 * Drain a lazily-read source into memory. Deduplication needs the whole
 * input, so pipelines materialize before deriving anything. Logs a progress
 * line every `progressInterval` records.
 */
export async function collectRecords(
  source: AsyncIterable<SourceRecord>,
  log: Logger,
  progressInterval: number,
): Promise<SourceRecord[]> {
  const records: SourceRecord[] = [];
  for await (const record of source) {
    records.push(record);
    if (records.length % progressInterval === 0) {
      log.info({ read: records.length }, 'Read progress');
    }
  }
  return records;
}
