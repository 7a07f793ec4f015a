import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  ForecastRequest,
  ForecastResponse,
  GrowthRequest,
  MetricsRequest,
  MetricsResponse,
  WireGrowthValue,
} from "./types.js";

/** Turn the wire encoding of a growth rate back into a number */
export function decodeGrowth(value: WireGrowthValue): number | null {
  if (value === "Infinity") return Number.POSITIVE_INFINITY;
  if (value === "-Infinity") return Number.NEGATIVE_INFINITY;
  return value;
}

export class MetricsClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api", config);
  }

  /** Naive / moving-average extrapolation (simulated) */
  public async forecast(request: ForecastRequest): Promise<ForecastResponse> {
    return this.client.post<ForecastResponse>({ path: "forecast", body: request });
  }

  /** Growth rate from a to b; infinite results decode to ±Infinity */
  public async growth(request: GrowthRequest): Promise<number | null> {
    const response = await this.client.post<{ growth: WireGrowthValue }>({
      path: "growth",
      body: request,
    });
    return decodeGrowth(response.growth);
  }

  public async metrics(request: MetricsRequest): Promise<MetricsResponse> {
    return this.client.post<MetricsResponse>({ path: "metrics", body: request });
  }
}
