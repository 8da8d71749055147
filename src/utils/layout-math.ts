// src/utils/layout-math.ts
// Small deterministic helpers shared by line assembly and classification.

export function clamp01(n: number): number {
  if (!Number.isFinite(n) || n <= 0) return 0;
  if (n >= 1) return 1;
  return n;
}

export function median(values: number[]): number {
  const sorted = values.filter(n => Number.isFinite(n)).sort((a, b) => a - b);
  if (!sorted.length) return 0;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Sort by a numeric key, keeping input order for ties.
 */
export function stableSortBy<T>(items: readonly T[], key: (item: T) => number): T[] {
  return items
    .map((value, index) => ({ value, index, k: key(value) }))
    .sort((a, b) => (a.k - b.k) || (a.index - b.index))
    .map(entry => entry.value);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
