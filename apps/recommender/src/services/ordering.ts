// ═══════════════════════════════════════════════════════════════
// Scentify — Result Ordering Helpers
// apps/recommender/src/services/ordering.ts
// ═══════════════════════════════════════════════════════════════

/**
 * Code-unit order, independent of the host locale. Every text
 * tie-break (names and identifiers) goes through this.
 */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Higher popularity first; unseen items count as 0. */
export function byPopularity(
  popularity: ReadonlyMap<string, number>,
  a: string,
  b: string
): number {
  return (popularity.get(b) ?? 0) - (popularity.get(a) ?? 0);
}
