import { Controller, Get, Query, Route, Tags } from "@tsoa/runtime";
import type { FlowPolicy } from "@odflow/engine";
import type { OdTensorResponse, PairSeriesResponse } from "../models/responses.js";
import type { Services } from "../services/index.js";

@Route("api/od")
@Tags("OD")
export class OdController extends Controller {
  constructor(private readonly services: Services) {
    super();
  }

  /**
   * Dense [T, N, N] flow tensor for the window [start, end).
   * @param geoIds Comma-separated place ids; all places ascending when omitted
   */
  @Get()
  public async getTensor(
    @Query() start: string,
    @Query() end: string,
    @Query() geoIds?: string,
    @Query() type?: string,
    @Query() flowPolicy: FlowPolicy = "zero",
  ): Promise<OdTensorResponse> {
    return this.services.od.tensor({ start, end, geoIds, type, flowPolicy });
  }

  /** Dense flow series of one ordered pair */
  @Get("pair")
  public async getPair(
    @Query() start: string,
    @Query() end: string,
    @Query() originId: number,
    @Query() destinationId: number,
    @Query() type?: string,
    @Query() flowPolicy: FlowPolicy = "zero",
  ): Promise<PairSeriesResponse> {
    return this.services.od.pair({ start, end, originId, destinationId, type, flowPolicy });
  }
}
