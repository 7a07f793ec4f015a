import { Controller, Get, Query, Route, Tags } from "@tsoa/runtime";
import type { FlowPolicy } from "@odflow/engine";
import type { PredictPairResponse, PredictTensorResponse } from "../models/responses.js";
import type { Services } from "../services/index.js";

/**
 * Simulated predictions: the observed window replayed with noise. Payloads
 * carry `simulated: true`.
 */
@Route("api/predict")
@Tags("Predict")
export class PredictController extends Controller {
  constructor(private readonly services: Services) {
    super();
  }

  @Get()
  public async predictTensor(
    @Query() start: string,
    @Query() end: string,
    @Query() geoIds?: string,
    @Query() type?: string,
    @Query() flowPolicy: FlowPolicy = "zero",
    @Query() noiseRatio?: number,
    @Query() seed?: number,
  ): Promise<PredictTensorResponse> {
    return this.services.predict.tensor({
      start,
      end,
      geoIds,
      type,
      flowPolicy,
      noiseRatio,
      seed,
    });
  }

  @Get("pair")
  public async predictPair(
    @Query() start: string,
    @Query() end: string,
    @Query() originId: number,
    @Query() destinationId: number,
    @Query() type?: string,
    @Query() flowPolicy: FlowPolicy = "zero",
    @Query() noiseRatio?: number,
    @Query() seed?: number,
  ): Promise<PredictPairResponse> {
    return this.services.predict.pair({
      start,
      end,
      originId,
      destinationId,
      type,
      flowPolicy,
      noiseRatio,
      seed,
    });
  }
}
