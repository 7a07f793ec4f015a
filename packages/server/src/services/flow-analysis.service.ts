/**
 * Province/city flow rankings and corridor tables over a time window.
 */

import {
  aggregateFlows,
  buildPlaceLookup,
  cityCorridors,
  provinceCorridors,
  validateTimeRange,
  type FlowRecord,
  type GroupDimension,
  type PlaceLookup,
} from "@odflow/engine";
import type { FlowStoreProvider } from "../db/flow-store.js";
import type {
  CityCorridorRequest,
  FlowAnalysisRequest,
  ProvinceCorridorRequest,
} from "../models/requests.js";
import type {
  CityCorridorResponse,
  CityFlowResponse,
  ProvinceCorridorResponse,
  ProvinceFlowResponse,
} from "../models/responses.js";

interface AnalysisWindow {
  start: string;
  end: string;
  type?: string;
}

export class FlowAnalysisService {
  constructor(private readonly stores: FlowStoreProvider) {}

  provinceFlow(request: FlowAnalysisRequest): ProvinceFlowResponse {
    const { rows, totalRecords } = this.rank("province", request);
    return {
      periodType: request.periodType ?? null,
      dateMode: request.dateMode,
      direction: request.direction,
      totalRecords,
      data: rows.map((r) => ({ province: r.groupKey, date: r.date, flow: r.flow, rank: r.rank })),
    };
  }

  cityFlow(request: FlowAnalysisRequest): CityFlowResponse {
    const { rows, totalRecords } = this.rank("city", request);
    return {
      periodType: request.periodType ?? null,
      dateMode: request.dateMode,
      direction: request.direction,
      totalRecords,
      data: rows.map((r) => ({ city: r.groupKey, date: r.date, flow: r.flow, rank: r.rank })),
    };
  }

  provinceCorridor(request: ProvinceCorridorRequest): ProvinceCorridorResponse {
    const { records, lookup } = this.load(request, "province-corridor");
    const rows = provinceCorridors(records, lookup, request.topk);
    return {
      periodType: request.periodType ?? null,
      topk: request.topk,
      totalRecords: records.length,
      data: rows.map((r) => ({
        sendProvince: r.sendKey,
        arriveProvince: r.arriveKey,
        flow: r.flow,
        rank: r.rank,
      })),
    };
  }

  cityCorridor(request: CityCorridorRequest): CityCorridorResponse {
    const { records, lookup } = this.load(request, "city-corridor");
    const tables = cityCorridors(records, lookup, {
      topkIntra: request.topkIntra,
      topkInter: request.topkInter,
    });
    const toApi = (rows: typeof tables.intraProvince) =>
      rows.map((r) => ({
        sendCity: r.sendKey,
        arriveCity: r.arriveKey,
        flow: r.flow,
        rank: r.rank,
        corridorType: r.corridorType,
      }));
    return {
      periodType: request.periodType ?? null,
      topkIntra: request.topkIntra,
      topkInter: request.topkInter,
      totalRecords: records.length,
      intraProvince: toApi(tables.intraProvince),
      interProvince: toApi(tables.interProvince),
    };
  }

  private rank(dimension: GroupDimension, request: FlowAnalysisRequest) {
    const { records, lookup } = this.load(request, `${dimension}-flow`);
    const rows = aggregateFlows(records, lookup, {
      dimension,
      direction: request.direction,
      dateMode: request.dateMode,
    });
    return { rows, totalRecords: records.length };
  }

  /** Validate the window, then scan it and load the place directory */
  private load(
    window: AnalysisWindow,
    label: string,
  ): { records: FlowRecord[]; lookup: PlaceLookup } {
    validateTimeRange(window.start, window.end);
    return this.stores.withStore((store) => {
      const started = performance.now();
      const records = store.scan({ start: window.start, end: window.end, type: window.type });
      const lookup = buildPlaceLookup(store.listPlaces());
      console.log(
        `[analysis] ${label} records=${records.length} places=${lookup.size} (${(performance.now() - started).toFixed(1)}ms)`,
      );
      return { records, lookup };
    });
  }
}
