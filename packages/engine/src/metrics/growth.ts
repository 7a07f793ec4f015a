/**
 * Growth rate from a to b relative to |a|.
 *
 * When a is 0 the rate is undefined: null in safe mode, otherwise an
 * infinity carrying the sign of b (b >= 0 gives +Infinity).
 */
export function growthRate(a: number, b: number, safe = true): number | null {
  if (a === 0) {
    if (safe) return null;
    return b >= 0 ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
  }
  return (b - a) / Math.abs(a);
}
