import { Body, Controller, Post, Route, Tags } from "@tsoa/runtime";
import type { ForecastRequest, GrowthRequest, MetricsRequest } from "../models/requests.js";
import type { ForecastResponse, GrowthResponse, MetricsResponse } from "../models/responses.js";
import type { Services } from "../services/index.js";

@Route("api")
@Tags("Metrics")
export class MetricsController extends Controller {
  constructor(private readonly services: Services) {
    super();
  }

  /** Extrapolate a history tensor (naive or moving average; simulated) */
  @Post("forecast")
  public async forecast(@Body() body: ForecastRequest): Promise<ForecastResponse> {
    return this.services.forecast.forecast(body);
  }

  /** Growth rate from a to b; infinite values are returned as strings */
  @Post("growth")
  public async growth(@Body() body: GrowthRequest): Promise<GrowthResponse> {
    return this.services.forecast.growth(body);
  }

  /** RMSE, MAE and MAPE between two equally sized collections */
  @Post("metrics")
  public async metrics(@Body() body: MetricsRequest): Promise<MetricsResponse> {
    return this.services.forecast.metrics(body);
  }
}
