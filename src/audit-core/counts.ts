// src/audit-core/counts.ts
// Count maps keyed by source-supplied strings (user ids, node ids, action types).

/**
 * An empty map with no prototype, so keys such as `constructor` or
 * `__proto__` are ordinary entries.
 */
export function countMap<V = number>(): Record<string, V> {
  return Object.create(null);
}

export function ownEntry<V>(map: Record<string, V>, key: string): V | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

export function bump(counts: Record<string, number>, key: string, by = 1): void {
  counts[key] = (ownEntry(counts, key) ?? 0) + by;
}

export function copyCounts(counts: Record<string, number>): Record<string, number> {
  const out = countMap();
  for (const [key, count] of Object.entries(counts)) out[key] = count;
  return out;
}

export function addCounts(a: Record<string, number>, b: Record<string, number>): Record<string, number> {
  const out = copyCounts(a);
  for (const [key, count] of Object.entries(b)) bump(out, key, count);
  return out;
}
