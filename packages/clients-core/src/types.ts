/**
 * API request/response types for the odflow server.
 *
 * These mirror the server's models; domain shapes come from @odflow/types.
 */

import type {
  CorridorType,
  DateMode,
  Direction,
  FlowPolicy,
  NameResolution,
  OdTensor,
  PairSeries,
  RelationsMatrix,
} from "@odflow/types";

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  store: { places: number; relations: number; flows: number };
}

// ---------------------------------------------------------------------------
// Places & relations
// ---------------------------------------------------------------------------

export type GeoIdResponse = NameResolution;
export type RelationsMatrixResponse = RelationsMatrix;

// ---------------------------------------------------------------------------
// OD tensors
// ---------------------------------------------------------------------------

export interface OdQueryParams {
  start: string;
  end: string;
  /** Axis order of the tensor; all places ascending when omitted */
  geoIds?: number[];
  type?: string;
  flowPolicy?: FlowPolicy;
}

export interface PairQueryParams {
  start: string;
  end: string;
  originId: number;
  destinationId: number;
  type?: string;
  flowPolicy?: FlowPolicy;
}

export interface NoiseParams {
  noiseRatio?: number;
  seed?: number;
}

export type OdTensorResponse = OdTensor;
export type PairSeriesResponse = PairSeries;

export interface SimulatedFields {
  simulated: true;
  method: "noise-injection";
  noiseRatio: number;
}

export type PredictTensorResponse = OdTensor & SimulatedFields;
export type PredictPairResponse = PairSeries & SimulatedFields;

// ---------------------------------------------------------------------------
// Forecast & metrics
// ---------------------------------------------------------------------------

export type ForecastMethod = "naive" | "moving_average";

export interface ForecastRequest {
  history: { T?: number; N: number; ids: number[]; tensor: (number | null)[][][] };
  horizon: number;
  method: ForecastMethod;
  window?: number;
}

export interface ForecastResponse {
  T: number;
  N: number;
  ids: number[];
  tensor: (number | null)[][][];
  simulated: true;
  method: ForecastMethod;
}

/** Growth as sent over the wire: infinities travel as strings */
export type WireGrowthValue = number | null | "Infinity" | "-Infinity";

export interface GrowthRequest {
  a: number;
  b: number;
  safe?: boolean;
}

export type NestedValues = number | null | readonly NestedValues[];

export interface MetricsRequest {
  yTrue: NestedValues;
  yPred: NestedValues;
}

export interface MetricsResponse {
  rmse: number;
  mae: number;
  mape: number | null;
}

// ---------------------------------------------------------------------------
// Flow analysis
// ---------------------------------------------------------------------------

interface AnalysisWindow {
  start: string;
  end: string;
  type?: string;
  periodType?: string;
}

export interface FlowAnalysisRequest extends AnalysisWindow {
  dateMode?: DateMode;
  direction?: Direction | "arrive";
}

export interface ProvinceCorridorRequest extends AnalysisWindow {
  topk?: number;
}

export interface CityCorridorRequest extends AnalysisWindow {
  topkIntra?: number;
  topkInter?: number;
}

interface FlowAnalysisEnvelope<Row> {
  periodType: string | null;
  dateMode: DateMode;
  direction: Direction;
  totalRecords: number;
  data: Row[];
}

export type ProvinceFlowResponse = FlowAnalysisEnvelope<{
  province: string;
  date: string | null;
  flow: number;
  rank: number;
}>;

export type CityFlowResponse = FlowAnalysisEnvelope<{
  city: string;
  date: string | null;
  flow: number;
  rank: number;
}>;

export interface ProvinceCorridorResponse {
  periodType: string | null;
  topk: number;
  totalRecords: number;
  data: { sendProvince: string; arriveProvince: string; flow: number; rank: number }[];
}

export interface CityCorridorApiRow {
  sendCity: string;
  arriveCity: string;
  flow: number;
  rank: number;
  corridorType: CorridorType;
}

export interface CityCorridorResponse {
  periodType: string | null;
  topkIntra: number;
  topkInter: number;
  totalRecords: number;
  intraProvince: CityCorridorApiRow[];
  interProvince: CityCorridorApiRow[];
}
