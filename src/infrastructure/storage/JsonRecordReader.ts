/**
 * JSON Record Reader — Files → SourceRecord Stream
 * Layer: Infrastructure (storage)
 * Pattern: implements IRecordReader
 *
 * I expand the pattern to a sorted file list, then stream each file through
 * stream-json so no file is ever held in memory as one string. The parser
 * runs with `jsonStreaming` on, which accepts both shapes the datasets use:
 * one pretty-printed object per file (songs) and one object per line
 * (logs). Pipeline: FileReadStream → stream-json parser → StreamValues →
 * SourceRecord { value, partition, offset, file }.
 *
 * Each file is one partition, numbered by its position in the sorted list.
 * A file that fails to parse surfaces as a StructuralError naming it; the
 * reader does not skip bad files. Neither does it accept an empty match: a
 * mistyped root would otherwise empty every table on the next overwrite.
 */
import type { IRecordReader } from '@domain/interfaces/IRecordReader';
import { StructuralError } from '@shared/errors/AppError';
import type { SourceRecord } from '@shared/types';
import { createReadStream } from 'fs';
import { parser } from 'stream-json';
import { streamValues } from 'stream-json/streamers/StreamValues';
import { injectable } from 'tsyringe';

import { expandPattern } from './filePattern';

@injectable()
export class JsonRecordReader implements IRecordReader {
  async *read(rootDir: string, pattern: string): AsyncGenerator<SourceRecord> {
    const files = await expandPattern(rootDir, pattern);
    if (files.length === 0) {
      throw new StructuralError(`No input files match "${pattern}"`, rootDir);
    }

    for (let partition = 0; partition < files.length; partition++) {
      yield* this.readFile(files[partition], partition);
    }
  }

  private async *readFile(file: string, partition: number): AsyncGenerator<SourceRecord> {
    const source = createReadStream(file, { encoding: 'utf-8', highWaterMark: 64 * 1024 });
    const jsonParser = parser({ jsonStreaming: true });
    const values = streamValues();

    // .pipe() does not forward errors; route them to the stream we iterate.
    source.on('error', (err) => values.destroy(err));
    jsonParser.on('error', (err) => values.destroy(err));

    try {
      for await (const item of source.pipe(jsonParser).pipe(values)) {
        const { key, value }: { key: number; value: unknown } = item;
        yield { value, partition, offset: key, file };
      }
    } catch (err) {
      throw new StructuralError(
        `Unreadable JSON source: ${err instanceof Error ? err.message : String(err)}`,
        file,
      );
    } finally {
      source.destroy();
      jsonParser.destroy();
      values.destroy();
    }
  }
}
