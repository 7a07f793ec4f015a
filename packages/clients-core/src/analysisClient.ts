import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  CityCorridorRequest,
  CityCorridorResponse,
  CityFlowResponse,
  FlowAnalysisRequest,
  ProvinceCorridorRequest,
  ProvinceCorridorResponse,
  ProvinceFlowResponse,
} from "./types.js";

export class AnalysisClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/analyze", config);
  }

  public async provinceFlow(request: FlowAnalysisRequest): Promise<ProvinceFlowResponse> {
    return this.client.post<ProvinceFlowResponse>({ path: "province-flow", body: request });
  }

  public async cityFlow(request: FlowAnalysisRequest): Promise<CityFlowResponse> {
    return this.client.post<CityFlowResponse>({ path: "city-flow", body: request });
  }

  public async provinceCorridor(
    request: ProvinceCorridorRequest,
  ): Promise<ProvinceCorridorResponse> {
    return this.client.post<ProvinceCorridorResponse>({ path: "province-corridor", body: request });
  }

  public async cityCorridor(request: CityCorridorRequest): Promise<CityCorridorResponse> {
    return this.client.post<CityCorridorResponse>({ path: "city-corridor", body: request });
  }
}
