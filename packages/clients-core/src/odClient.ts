import { BaseClient, type ClientConfig } from "./baseClient.js";
import { toTensorQuery } from "./query.js";
import type {
  OdQueryParams,
  OdTensorResponse,
  PairQueryParams,
  PairSeriesResponse,
} from "./types.js";

export class OdClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/od", config);
  }

  /** Dense [T, N, N] tensor for the window [start, end) */
  public async getTensor(params: OdQueryParams): Promise<OdTensorResponse> {
    return this.client.get<OdTensorResponse>({ query: toTensorQuery(params) });
  }

  public async getPair(params: PairQueryParams): Promise<PairSeriesResponse> {
    return this.client.get<PairSeriesResponse>({ path: "pair", query: { ...params } });
  }
}
