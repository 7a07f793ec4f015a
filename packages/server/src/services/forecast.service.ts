import { computeMetrics, forecastTensor, growthRate, type ErrorMetrics } from "@odflow/engine";
import type { ForecastRequest, GrowthRequest, MetricsRequest } from "../models/requests.js";
import type { ForecastResponse, GrowthResponse, GrowthValue } from "../models/responses.js";

/** JSON has no infinity, so infinite growth travels as a string */
export function encodeGrowth(value: number | null): GrowthValue {
  if (value === Number.POSITIVE_INFINITY) return "Infinity";
  if (value === Number.NEGATIVE_INFINITY) return "-Infinity";
  return value;
}

/** Store-free numeric endpoints: forecast mock, growth and error metrics */
export class ForecastService {
  forecast(request: ForecastRequest): ForecastResponse {
    const { N, ids, tensor } = request.history;
    const result = forecastTensor(
      { N, ids, tensor },
      { horizon: request.horizon, method: request.method, window: request.window },
    );
    console.log(
      `[forecast] ${request.method} horizon=${request.horizon} from T=${tensor.length} N=${N}`,
    );
    return { ...result, simulated: true, method: request.method };
  }

  growth(request: GrowthRequest): GrowthResponse {
    return { growth: encodeGrowth(growthRate(request.a, request.b, request.safe)) };
  }

  metrics(request: MetricsRequest): ErrorMetrics {
    return computeMetrics(request.yTrue, request.yPred);
  }
}
