/**
 * OD tensor and pair-series queries.
 *
 * Validates the window and id filter before touching the store, then
 * scans once and densifies the result.
 */

import {
  buildAscendingIndex,
  buildDenseIndex,
  buildOdTensor,
  buildPairSeries,
  parseIdFilter,
  validateTimeRange,
  type OdTensor,
  type PairSeries,
  type TensorBuildOptions,
} from "@odflow/engine";
import type { FlowStoreProvider } from "../db/flow-store.js";
import type { OdQuery, PairQuery } from "../models/requests.js";

/** Applied to present flow values while densifying */
export type FlowTransform = (flow: number) => number;

export class OdQueryService {
  constructor(
    private readonly stores: FlowStoreProvider,
    private readonly defaultPairType: string,
  ) {}

  tensor(query: OdQuery, transform?: FlowTransform): OdTensor {
    validateTimeRange(query.start, query.end);
    const ids = query.geoIds === undefined ? undefined : parseIdFilter(query.geoIds);
    const options: TensorBuildOptions = { flowPolicy: query.flowPolicy, transform };

    return this.stores.withStore((store) => {
      const started = performance.now();
      const index = ids ? buildDenseIndex(ids) : buildAscendingIndex(store.listPlaceIds());
      const records = store.scan({ start: query.start, end: query.end, type: query.type, ids });
      const result = buildOdTensor(records, index, options);
      console.log(
        `[od] tensor T=${result.T} N=${result.N} records=${records.length} (${(performance.now() - started).toFixed(1)}ms)`,
      );
      return result;
    });
  }

  pair(query: PairQuery, transform?: FlowTransform): PairSeries {
    validateTimeRange(query.start, query.end);
    const type = query.type ?? this.defaultPairType;

    return this.stores.withStore((store) => {
      const started = performance.now();
      const records = store.scanPair(
        query.start,
        query.end,
        query.originId,
        query.destinationId,
        type,
      );
      const result = buildPairSeries(records, query.originId, query.destinationId, {
        flowPolicy: query.flowPolicy,
        transform,
      });
      console.log(
        `[od] pair ${query.originId}->${query.destinationId} T=${result.T} (${(performance.now() - started).toFixed(1)}ms)`,
      );
      return result;
    });
  }
}
