import { Controller, Get, Query, Route, Tags } from "@tsoa/runtime";
import type { GeoIdResponse } from "../models/responses.js";
import type { Services } from "../services/index.js";

@Route("api/geo-id")
@Tags("Places")
export class GeoController extends Controller {
  constructor(private readonly services: Services) {
    super();
  }

  /** Resolve a place name to its id (exact match first, then substring) */
  @Get()
  public async resolveName(@Query() name: string): Promise<GeoIdResponse> {
    return this.services.geo.resolveName(name);
  }
}
