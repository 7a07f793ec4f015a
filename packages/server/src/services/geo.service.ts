import { resolvePlaceName, type NameResolution } from "@odflow/engine";
import type { FlowStoreProvider } from "../db/flow-store.js";

export class GeoService {
  constructor(private readonly stores: FlowStoreProvider) {}

  /** Resolve a place name to its id, with up to ten similar candidates */
  resolveName(name: string): NameResolution {
    return this.stores.withStore((store) => resolvePlaceName(name, store));
  }
}
