import { Controller, Get, Query, Route, Tags } from "@tsoa/runtime";
import type { RelationsMatrixResponse } from "../models/responses.js";
import type { Services } from "../services/index.js";

@Route("api/relations")
@Tags("Relations")
export class RelationsController extends Controller {
  constructor(private readonly services: Services) {
    super();
  }

  /**
   * Dense cost matrix over all places.
   * @param fill "nan" or a float used for pairs without an edge
   */
  @Get("matrix")
  public async getMatrix(@Query() fill = "nan"): Promise<RelationsMatrixResponse> {
    return this.services.relations.matrix(fill);
  }
}
