/**
 * Place reference data - the nodes of the OD network.
 *
 * Places are loaded once at ingestion time and never mutated by the
 * query engine.
 */

/** A city-level place node */
export interface Place {
  /** Stable integer identifier (geo_id in storage) */
  id: number;
  /** City name, e.g. "杭州" */
  name: string;
  /** Province the city belongs to; null or empty when unknown */
  province: string | null;
}

/** A lightweight place reference returned as a lookup candidate */
export interface PlaceCandidate {
  id: number;
  name: string;
}

/** Outcome of resolving a free-text place name */
export interface NameResolution {
  matchedId: number | null;
  matchedName: string | null;
  candidates: PlaceCandidate[];
}

/**
 * Dense index over an ordered set of place ids.
 *
 * `ids[i]` is the place at index i and `indexOf.get(id)` inverts it.
 */
export interface DenseIndex {
  ids: number[];
  indexOf: ReadonlyMap<number, number>;
}
