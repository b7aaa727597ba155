/**
 * Deduplication Helpers
 * Layer: Application (transforms)
 *
 * Both helpers keep exactly one row per key and never merge rows: the
 * survivor is returned as-is, so every output row equals some input row.
 *
 *   firstByKey       — first occurrence in the order given (scan order).
 *   firstBySortedKey — stable-sort by key first, then first occurrence. Rows
 *                      sharing a key keep their relative scan order.
 */
export function firstByKey<T, K>(rows: readonly T[], keyOf: (row: T) => K): T[] {
  const seen = new Set<K>();
  const result: T[] = [];
  for (const row of rows) {
    const key = keyOf(row);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(row);
  }
  return result;
}

export function firstBySortedKey<T>(rows: readonly T[], keyOf: (row: T) => string): T[] {
  // Array.prototype.sort is stable since ES2019.
  const sorted = [...rows].sort((a, b) => compareCodeUnits(keyOf(a), keyOf(b)));
  return firstByKey(sorted, keyOf);
}

/** Plain code-unit comparison; locale-independent so sort order is reproducible. */
function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
