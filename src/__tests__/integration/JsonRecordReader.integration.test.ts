/**
 * Integration Tests — JsonRecordReader + expandPattern
 *
 * Real files in a temp directory: pattern depth and wildcard matching,
 * sorted enumeration, one partition per file, both single-object and
 * JSON-lines files, and StructuralError on malformed JSON.
 */
import { expandPattern } from '@infrastructure/storage/filePattern';
import { JsonRecordReader } from '@infrastructure/storage/JsonRecordReader';
import { StructuralError } from '@shared/errors/AppError';
import type { SourceRecord } from '@shared/types';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';

import { putFile } from '../helpers/tempFiles';

async function readAll(reader: JsonRecordReader, root: string, pattern: string): Promise<SourceRecord[]> {
  const records: SourceRecord[] = [];
  for await (const record of reader.read(root, pattern)) records.push(record);
  return records;
}

describe('JsonRecordReader (integration)', () => {
  let root: string;
  let reader: JsonRecordReader;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'warehouse-reader-'));
    reader = new JsonRecordReader();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('expandPattern()', () => {
    it('should match files at exactly the pattern depth, sorted', async () => {
      await putFile(root, 'song_data/B/A/A/TRB.json', '{}');
      await putFile(root, 'song_data/A/B/C/TRA.json', '{}');
      await putFile(root, 'song_data/A/B/TRTOO_SHALLOW.json', '{}');
      await putFile(root, 'song_data/A/B/C/D/TRTOO_DEEP.json', '{}');
      await putFile(root, 'song_data/A/B/C/notes.txt', 'x');

      const files = await expandPattern(root, 'song_data/*/*/*/*.json');

      expect(files).toEqual([
        path.join(root, 'song_data/A/B/C/TRA.json'),
        path.join(root, 'song_data/B/A/A/TRB.json'),
      ]);
    });

    it('should treat regex characters in a segment literally', async () => {
      await putFile(root, 'logs/a+b.json', '{}');
      await putFile(root, 'logs/aab.json', '{}');

      const files = await expandPattern(root, 'logs/a+b.json');

      expect(files).toEqual([path.join(root, 'logs/a+b.json')]);
    });

    it('should return nothing when the root does not exist', async () => {
      expect(await expandPattern(path.join(root, 'missing'), '*/*.json')).toEqual([]);
    });
  });

  describe('read()', () => {
    it('should yield a pretty-printed single object per song file', async () => {
      await putFile(root, 'song_data/A/A/A/one.json', '{\n  "song_id": "SO1",\n  "year": 2001\n}\n');

      const records = await readAll(reader, root, 'song_data/*/*/*/*.json');

      expect(records).toEqual([
        {
          value: { song_id: 'SO1', year: 2001 },
          partition: 0,
          offset: 0,
          file: path.join(root, 'song_data/A/A/A/one.json'),
        },
      ]);
    });

    it('should yield every line of a JSON-lines log file in order', async () => {
      await putFile(root, 'log_data/2018/11/day1.json', '{"page":"Home"}\n{"page":"NextSong"}\n');

      const records = await readAll(reader, root, 'log_data/*/*/*.json');

      expect(records.map((r) => r.value)).toEqual([{ page: 'Home' }, { page: 'NextSong' }]);
      expect(records.map((r) => r.offset)).toEqual([0, 1]);
    });

    it('should release a file when the caller stops early', async () => {
      await putFile(root, 'log_data/2018/11/a.json', '{"n":1}\n{"n":2}\n{"n":3}\n');

      const seen: unknown[] = [];
      for await (const record of reader.read(root, 'log_data/*/*/*.json')) {
        seen.push(record.value);
        break;
      }

      expect(seen).toEqual([{ n: 1 }]);
      expect(await readAll(reader, root, 'log_data/*/*/*.json')).toHaveLength(3);
    });

    it('should number partitions by sorted file order', async () => {
      await putFile(root, 'log_data/2018/11/b.json', '{"n":3}\n');
      await putFile(root, 'log_data/2018/11/a.json', '{"n":1}\n{"n":2}\n');

      const records = await readAll(reader, root, 'log_data/*/*/*.json');

      expect(records.map((r) => [r.value, r.partition])).toEqual([
        [{ n: 1 }, 0],
        [{ n: 2 }, 0],
        [{ n: 3 }, 1],
      ]);
    });

    it('should throw StructuralError naming root and pattern when no files match', async () => {
      await putFile(root, 'song_data/A/A/TRTOO_SHALLOW.json', '{}');

      await expect(readAll(reader, root, 'song_data/*/*/*/*.json')).rejects.toThrow(
        `No input files match "song_data/*/*/*/*.json" (${root})`,
      );
    });

    it('should throw StructuralError when the root does not exist', async () => {
      await expect(readAll(reader, path.join(root, 'typo'), 'log_data/*/*/*.json')).rejects.toThrow(
        StructuralError,
      );
    });

    it('should throw StructuralError naming a malformed file', async () => {
      const broken = path.join(root, 'log_data/2018/11/broken.json');
      await putFile(root, 'log_data/2018/11/broken.json', '{"page": "NextSong", ');

      await expect(readAll(reader, root, 'log_data/*/*/*.json')).rejects.toThrow(StructuralError);
      await expect(readAll(reader, root, 'log_data/*/*/*.json')).rejects.toThrow(`(${broken})`);
    });
  });
});
