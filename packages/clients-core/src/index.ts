// Base
export { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";
export { ApiError, toApiError } from "./apiError.js";

// Domain clients
export { OdflowClient } from "./odflowClient.js";
export { HealthClient } from "./healthClient.js";
export { GeoClient } from "./geoClient.js";
export { RelationsClient } from "./relationsClient.js";
export { OdClient } from "./odClient.js";
export { PredictClient } from "./predictClient.js";
export { AnalysisClient } from "./analysisClient.js";
export { MetricsClient, decodeGrowth } from "./metricsClient.js";

// Types
export type {
  // Health
  HealthResponse,
  // Places & relations
  GeoIdResponse,
  RelationsMatrixResponse,
  // OD
  OdQueryParams,
  PairQueryParams,
  NoiseParams,
  OdTensorResponse,
  PairSeriesResponse,
  SimulatedFields,
  PredictTensorResponse,
  PredictPairResponse,
  // Forecast & metrics
  ForecastMethod,
  ForecastRequest,
  ForecastResponse,
  WireGrowthValue,
  GrowthRequest,
  NestedValues,
  MetricsRequest,
  MetricsResponse,
  // Analysis
  FlowAnalysisRequest,
  ProvinceCorridorRequest,
  CityCorridorRequest,
  ProvinceFlowResponse,
  CityFlowResponse,
  ProvinceCorridorResponse,
  CityCorridorApiRow,
  CityCorridorResponse,
} from "./types.js";
export type { FailureKind, ErrorBody } from "@odflow/types";
