import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { RelationsMatrixResponse } from "./types.js";

export class RelationsClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/relations", config);
  }

  /** Dense cost matrix; `fill` is "nan" or a float literal */
  public async getMatrix(fill = "nan"): Promise<RelationsMatrixResponse> {
    return this.client.get<RelationsMatrixResponse>({ path: "matrix", query: { fill } });
  }
}
