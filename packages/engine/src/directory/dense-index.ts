/**
 * Dense place index.
 *
 * Maps an ordered set of place ids onto [0, N). Indices are computed per
 * request and never cached: place data can change between requests, and a
 * caller-supplied id list defines its own order.
 */

import type { DenseIndex } from "@odflow/types";

/**
 * Build an index preserving the given order.
 * A repeated id keeps its first position so the mapping stays a bijection.
 */
export function buildDenseIndex(ids: Iterable<number>): DenseIndex {
  const ordered: number[] = [];
  const indexOf = new Map<number, number>();
  for (const id of ids) {
    if (indexOf.has(id)) continue;
    indexOf.set(id, ordered.length);
    ordered.push(id);
  }
  return { ids: ordered, indexOf };
}

/** Build the full-directory index: distinct ids, ascending */
export function buildAscendingIndex(ids: Iterable<number>): DenseIndex {
  return buildDenseIndex([...new Set(ids)].sort((a, b) => a - b));
}
