import { Controller, Get, Route, Tags } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import type { Services } from "../services/index.js";

@Route("health")
@Tags("Health")
export class HealthController extends Controller {
  constructor(private readonly services: Services) {
    super();
  }

  /** Health check with row counts of the bound tables */
  @Get()
  public async getHealth(): Promise<HealthResponse> {
    return this.services.health.status();
  }
}
