import type {
  CorridorType,
  DateMode,
  Direction,
  ForecastMethod,
  NameResolution,
  OdTensor,
  PairSeries,
  RelationsMatrix,
} from "@odflow/engine";
import type { StoreCounts } from "../db/flow-store.js";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  store: StoreCounts;
}

export type GeoIdResponse = NameResolution;
export type RelationsMatrixResponse = RelationsMatrix;
export type OdTensorResponse = OdTensor;
export type PairSeriesResponse = PairSeries;

/** Marks payloads produced by the noise-injection stand-in */
export interface SimulatedFields {
  simulated: true;
  method: "noise-injection";
  noiseRatio: number;
}

export type PredictTensorResponse = OdTensor & SimulatedFields;
export type PredictPairResponse = PairSeries & SimulatedFields;

export interface ForecastResponse {
  T: number;
  N: number;
  ids: number[];
  tensor: (number | null)[][][];
  simulated: true;
  method: ForecastMethod;
}

export type GrowthValue = number | null | "Infinity" | "-Infinity";

export interface GrowthResponse {
  growth: GrowthValue;
}

export interface MetricsResponse {
  rmse: number;
  mae: number;
  mape: number | null;
}

interface FlowAnalysisEnvelope<Row> {
  periodType: string | null;
  dateMode: DateMode;
  direction: Direction;
  /** Number of scanned flow records behind the ranking */
  totalRecords: number;
  data: Row[];
}

export interface ProvinceFlowRow {
  province: string;
  date: string | null;
  flow: number;
  rank: number;
}

export interface CityFlowRow {
  city: string;
  date: string | null;
  flow: number;
  rank: number;
}

export type ProvinceFlowResponse = FlowAnalysisEnvelope<ProvinceFlowRow>;
export type CityFlowResponse = FlowAnalysisEnvelope<CityFlowRow>;

export interface ProvinceCorridorApiRow {
  sendProvince: string;
  arriveProvince: string;
  flow: number;
  rank: number;
}

export interface ProvinceCorridorResponse {
  periodType: string | null;
  topk: number;
  totalRecords: number;
  data: ProvinceCorridorApiRow[];
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
