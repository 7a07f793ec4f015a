import {
  buildAscendingIndex,
  buildRelationsMatrix,
  parseFillValue,
  type RelationsMatrix,
} from "@odflow/engine";
import type { FlowStoreProvider } from "../db/flow-store.js";

export class RelationsService {
  constructor(private readonly stores: FlowStoreProvider) {}

  /** Dense N×N cost matrix over every place, ascending by id */
  matrix(fill: string): RelationsMatrix {
    const fillValue = parseFillValue(fill);
    return this.stores.withStore((store) => {
      const index = buildAscendingIndex(store.listPlaceIds());
      const result = buildRelationsMatrix(store.scanRelations(), index, fillValue);
      console.log(`[relations] matrix N=${result.N} fill=${fill}`);
      return result;
    });
  }
}
