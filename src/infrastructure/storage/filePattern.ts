/**
 * Fixed-depth file pattern expansion.
 *
 * A pattern is a `/`-separated list of segments relative to a root
 * directory; `*` inside a segment matches any run of characters except
 * `/`. Every segment but the last must match a directory, the last must
 * match a regular file. The result is sorted so enumeration order (and
 * therefore partition numbering) does not depend on the filesystem.
 */
import { readdir } from 'fs/promises';
import path from 'path';

export async function expandPattern(rootDir: string, pattern: string): Promise<string[]> {
  const segments = pattern.split('/').filter((s) => s.length > 0 && s !== '.');
  if (segments.length === 0) return [];

  let frontier = [path.resolve(rootDir)];

  for (let depth = 0; depth < segments.length; depth++) {
    const matcher = segmentMatcher(segments[depth]);
    const wantFiles = depth === segments.length - 1;
    const next: string[] = [];

    for (const dir of frontier) {
      const entries = await readdir(dir, { withFileTypes: true }).catch((err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT' || err.code === 'ENOTDIR') return [];
        throw err;
      });
      for (const entry of entries) {
        const isMatchType = wantFiles ? entry.isFile() : entry.isDirectory();
        if (isMatchType && matcher.test(entry.name)) next.push(path.join(dir, entry.name));
      }
    }

    frontier = next;
  }

  return frontier.sort();
}

function segmentMatcher(segment: string): RegExp {
  const source = segment
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('[^/]*');
  return new RegExp(`^${source}$`);
}
