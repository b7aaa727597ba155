import type { SourceRecord } from '@shared/types';

/**
 * Record Reader Interface — "read every JSON record matching a pattern"
 * Layer: Domain
 *
 * `pattern` is relative to `rootDir` and uses `/`-separated segments where
 * `*` matches any run of characters within a single segment, so
 * `song_data/A/B/TRAAB*.json` never descends past three directories.
 * Records come back lazily, files in sorted path order and values in file
 * order, so two reads of the same input yield the same sequence.
 *
 * A pattern that matches no file at all is a StructuralError, not an
 * empty read: the pipelines overwrite their tables with whatever comes back.
 */
export interface IRecordReader {
  read(rootDir: string, pattern: string): AsyncIterable<SourceRecord>;
}
