import type { ServerConfig } from "../config.js";
import type { FlowStoreProvider } from "../db/flow-store.js";
import { FlowAnalysisService } from "./flow-analysis.service.js";
import { ForecastService } from "./forecast.service.js";
import { GeoService } from "./geo.service.js";
import { HealthService } from "./health.service.js";
import { OdQueryService } from "./od-query.service.js";
import { PredictService } from "./predict.service.js";
import { RelationsService } from "./relations.service.js";

export interface Services {
  health: HealthService;
  geo: GeoService;
  relations: RelationsService;
  od: OdQueryService;
  predict: PredictService;
  analysis: FlowAnalysisService;
  forecast: ForecastService;
}

export type ServiceOptions = Pick<ServerConfig, "defaultPairType" | "predictNoiseRatio">;

export function createServices(stores: FlowStoreProvider, options: ServiceOptions): Services {
  const od = new OdQueryService(stores, options.defaultPairType);
  return {
    health: new HealthService(stores),
    geo: new GeoService(stores),
    relations: new RelationsService(stores),
    od,
    predict: new PredictService(od, options.predictNoiseRatio),
    analysis: new FlowAnalysisService(stores),
    forecast: new ForecastService(),
  };
}
