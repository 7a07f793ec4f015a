/**
 * "min" competition ranking, highest value first.
 *
 * Tied values share the smallest 1-based position of their group and the
 * positions they occupy are not reused: [10, 10, 5] ranks as [1, 1, 3].
 */
export function minRanks(values: readonly number[]): number[] {
  const order = values
    .map((value, index) => ({ value, index }))
    .sort((a, b) => b.value - a.value);

  const ranks = new Array<number>(values.length);
  let previous: number | undefined;
  let rank = 0;
  order.forEach(({ value, index }, position) => {
    if (previous === undefined || value !== previous) {
      rank = position + 1;
      previous = value;
    }
    ranks[index] = rank;
  });
  return ranks;
}

/** Attach ranks to rows by one numeric field */
export function withMinRanks<T extends { flow: number }>(
  rows: readonly T[],
): (T & { rank: number })[] {
  const ranks = minRanks(rows.map((r) => r.flow));
  return rows.map((row, i) => ({ ...row, rank: ranks[i] ?? 0 }));
}
