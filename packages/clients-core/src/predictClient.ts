import { BaseClient, type ClientConfig } from "./baseClient.js";
import { toTensorQuery } from "./query.js";
import type {
  NoiseParams,
  OdQueryParams,
  PairQueryParams,
  PredictPairResponse,
  PredictTensorResponse,
} from "./types.js";

/** Simulated predictions (noise-injected replay of observed flows) */
export class PredictClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/predict", config);
  }

  public async predictTensor(params: OdQueryParams & NoiseParams): Promise<PredictTensorResponse> {
    return this.client.get<PredictTensorResponse>({ query: toTensorQuery(params) });
  }

  public async predictPair(params: PairQueryParams & NoiseParams): Promise<PredictPairResponse> {
    return this.client.get<PredictPairResponse>({ path: "pair", query: { ...params } });
  }
}
