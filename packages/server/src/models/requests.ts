import type {
  DateMode,
  Direction,
  FlowPolicy,
  ForecastMethod,
  NestedValues,
} from "@odflow/engine";

export interface GeoIdQuery {
  /** Place name, matched exactly first and then as a substring */
  name: string;
}

export interface RelationsMatrixQuery {
  /** "nan" (empty cell as null) or a finite float literal */
  fill: string;
}

export interface OdQuery {
  /** Window start, inclusive (ISO-8601) */
  start: string;
  /** Window end, exclusive (ISO-8601) */
  end: string;
  /** Comma-separated place ids; defines the tensor's axis order */
  geoIds?: string;
  type?: string;
  flowPolicy: FlowPolicy;
}

export interface PairQuery {
  start: string;
  end: string;
  originId: number;
  destinationId: number;
  /** Defaults to the configured pair type */
  type?: string;
  flowPolicy: FlowPolicy;
}

export interface NoiseQuery {
  /** Relative noise amplitude; defaults to the configured ratio */
  noiseRatio?: number;
  /** Makes the noise reproducible */
  seed?: number;
}

export type PredictQuery = OdQuery & NoiseQuery;
export type PredictPairQuery = PairQuery & NoiseQuery;

export interface ForecastHistoryInput {
  T?: number;
  N: number;
  ids: number[];
  tensor: (number | null)[][][];
}

export interface ForecastRequest {
  history: ForecastHistoryInput;
  horizon: number;
  method: ForecastMethod;
  window?: number;
}

export interface GrowthRequest {
  a: number;
  b: number;
  /** Return null instead of an infinity when a is 0 (default true) */
  safe: boolean;
}

export interface MetricsRequest {
  yTrue: NestedValues;
  yPred: NestedValues;
}

interface AnalysisWindow {
  start: string;
  end: string;
  type?: string;
  /** Free-text label of the analysed period, echoed back */
  periodType?: string;
}

export interface FlowAnalysisRequest extends AnalysisWindow {
  dateMode: DateMode;
  direction: Direction;
}

export interface ProvinceCorridorRequest extends AnalysisWindow {
  topk: number;
}

export interface CityCorridorRequest extends AnalysisWindow {
  topkIntra: number;
  topkInter: number;
}
