import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { GeoIdResponse } from "./types.js";

export class GeoClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/geo-id", config);
  }

  /** Resolve a place name to its id */
  public async resolveName(name: string): Promise<GeoIdResponse> {
    return this.client.get<GeoIdResponse>({ query: { name } });
  }
}
