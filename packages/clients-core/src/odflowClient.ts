import type { ClientConfig } from "./baseClient.js";
import { AnalysisClient } from "./analysisClient.js";
import { GeoClient } from "./geoClient.js";
import { HealthClient } from "./healthClient.js";
import { MetricsClient } from "./metricsClient.js";
import { OdClient } from "./odClient.js";
import { PredictClient } from "./predictClient.js";
import { RelationsClient } from "./relationsClient.js";

/** One entry point for every resource of the API */
export class OdflowClient {
  readonly health: HealthClient;
  readonly geo: GeoClient;
  readonly relations: RelationsClient;
  readonly od: OdClient;
  readonly predict: PredictClient;
  readonly analysis: AnalysisClient;
  readonly metrics: MetricsClient;

  constructor(config: ClientConfig) {
    this.health = new HealthClient(config);
    this.geo = new GeoClient(config);
    this.relations = new RelationsClient(config);
    this.od = new OdClient(config);
    this.predict = new PredictClient(config);
    this.analysis = new AnalysisClient(config);
    this.metrics = new MetricsClient(config);
  }
}
