/**
 * Flow records and relation edges - the time series the engine aggregates.
 */

/** A single time-stamped OD flow observation */
export interface FlowRecord {
  /** ISO-8601 timestamp as stored */
  time: string;
  /** Record type tag, e.g. "state" */
  type: string | null;
  originId: number;
  destinationId: number;
  /** Flow intensity; null when the source had no value */
  flow: number | null;
}

/** A directed cost edge between two places */
export interface RelationEdge {
  originId: number;
  destinationId: number;
  cost: number | null;
}

/**
 * How missing flow values are written into dense results.
 *
 * - zero: missing values become 0
 * - null: missing values become explicit null
 * - skip: missing values leave the pre-filled cell untouched
 */
export type FlowPolicy = "zero" | "null" | "skip";

/** Half-open time window [start, end) with an optional type tag filter */
export interface FlowScanFilter {
  start: string;
  end: string;
  type?: string;
  /** Restrict to records whose origin AND destination are both listed */
  ids?: readonly number[];
}
