/**
 * Aggregation and corridor analysis result rows.
 */

/** Whether a group is keyed by province or by city */
export type GroupDimension = "province" | "city";

/** Which end of each flow record the group key comes from */
export type Direction = "send" | "receive";

/**
 * Temporal granularity.
 *
 * - daily: rank within each distinct timestamp
 * - total: one ranking over the whole window
 */
export type DateMode = "daily" | "total";

/** Group key used when a place or its province cannot be resolved */
export const UNKNOWN_GROUP = "Unknown";

/** Summed flow for one group (and one timestamp in daily mode) */
export interface AggregatedFlowRow {
  groupKey: string;
  /** Timestamp in daily mode, null in total mode */
  date: string | null;
  flow: number;
  /** 1-based "min" competition rank, 1 = highest flow */
  rank: number;
}

/** Summed flow along one ordered (send, arrive) pair */
export interface CorridorRow {
  sendKey: string;
  arriveKey: string;
  flow: number;
  rank: number;
}

export type CorridorType = "intra_province" | "inter_province";

/** City-pair corridor tagged with whether it crosses a province border */
export interface CityCorridorRow extends CorridorRow {
  corridorType: CorridorType;
}

/** City corridors split into independently ranked lists */
export interface CityCorridorTables {
  intraProvince: CityCorridorRow[];
  interProvince: CityCorridorRow[];
}
