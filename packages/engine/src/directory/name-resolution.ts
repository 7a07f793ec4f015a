/**
 * Place name resolution - exact match first, then substring match.
 */

import type { NameResolution, PlaceCandidate } from "@odflow/types";
import { OdflowError } from "../errors.js";

/** Maximum number of candidates returned by a lookup */
export const MAX_NAME_CANDIDATES = 10;

/**
 * Lookups a place directory must answer. The server backs this with SQL;
 * both lookups return places in ascending id order.
 */
export interface PlaceNameSource {
  /** Case-sensitive exact match on name */
  findByExactName(name: string): PlaceCandidate | undefined;
  /** Places whose name contains the fragment, optionally excluding one id */
  searchByName(fragment: string, limit: number, excludeId?: number): PlaceCandidate[];
}

export function resolvePlaceName(
  query: string,
  source: PlaceNameSource,
): NameResolution {
  const q = query.trim();
  if (!q) {
    throw new OdflowError("EmptyQuery", "missing name");
  }

  const exact = source.findByExactName(q);
  if (exact) {
    return {
      matchedId: exact.id,
      matchedName: exact.name,
      candidates: source.searchByName(q, MAX_NAME_CANDIDATES, exact.id),
    };
  }

  const similar = source.searchByName(q, MAX_NAME_CANDIDATES);
  const [best] = similar;
  if (!best) {
    return { matchedId: null, matchedName: null, candidates: [] };
  }
  return { matchedId: best.id, matchedName: best.name, candidates: similar };
}
