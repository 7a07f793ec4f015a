import type { FlowStoreProvider } from "../db/flow-store.js";
import type { HealthResponse } from "../models/responses.js";

export class HealthService {
  constructor(private readonly stores: FlowStoreProvider) {}

  status(): HealthResponse {
    const store = this.stores.withStore((s) => s.counts());
    return { status: "ok", uptime: process.uptime(), store };
  }
}
