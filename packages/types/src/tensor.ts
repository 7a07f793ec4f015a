/**
 * Dense results materialized from sparse flow scans.
 */

/** Dense [T, N, N] OD tensor */
export interface OdTensor {
  T: number;
  N: number;
  times: string[];
  ids: number[];
  tensor: (number | null)[][][];
}

/** Dense time series for a single ordered OD pair */
export interface PairSeries {
  T: number;
  times: string[];
  originId: number;
  destinationId: number;
  series: (number | null)[];
}

/** Dense N x N relations (cost) matrix */
export interface RelationsMatrix {
  N: number;
  ids: number[];
  matrix: (number | null)[][];
}
