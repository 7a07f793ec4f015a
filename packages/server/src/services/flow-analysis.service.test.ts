import { describe, it, expect, beforeEach } from "vitest";
import { FlowAnalysisService } from "./flow-analysis.service.js";
import { CountingProvider } from "../testing/counting-provider.js";
import {
  createMemoryStore,
  SAMPLE_FLOWS,
  SAMPLE_PLACES,
  T1,
  T2,
  T3,
} from "../testing/memory-store.js";

const END = "2022-01-14T00:00:00Z";

let stores: CountingProvider;
let service: FlowAnalysisService;

beforeEach(() => {
  const { provider } = createMemoryStore({ places: SAMPLE_PLACES, flows: SAMPLE_FLOWS });
  stores = new CountingProvider(provider);
  service = new FlowAnalysisService(stores);
});

describe("FlowAnalysisService", () => {
  it("ranks received flow per province over the window", () => {
    expect(
      service.provinceFlow({
        start: T1,
        end: END,
        dateMode: "total",
        direction: "receive",
        periodType: "test-window",
      }),
    ).toEqual({
      periodType: "test-window",
      dateMode: "total",
      direction: "receive",
      totalRecords: 6,
      data: [
        { province: "Xizang", date: null, flow: 21, rank: 1 },
        { province: "Qinghai", date: null, flow: 5, rank: 2 },
        { province: "Unknown", date: null, flow: 0, rank: 3 },
      ],
    });
  });

  it("ranks sent flow per city for each day", () => {
    const result = service.cityFlow({ start: T1, end: END, dateMode: "daily", direction: "send" });
    expect(result.periodType).toBeNull();
    expect(result.data).toEqual([
      { city: "Lhasa", date: T1, flow: 15, rank: 1 },
      { city: "Lhasa", date: T2, flow: 4, rank: 1 },
      { city: "Unknown", date: T3, flow: 2, rank: 1 },
      { city: "Xining", date: T1, flow: 5, rank: 2 },
      { city: "Shigatse", date: T2, flow: 0, rank: 2 },
    ]);
  });

  it("builds province corridors with shared ranks for ties", () => {
    const result = service.provinceCorridor({ start: T1, end: END, topk: 10 });
    expect(result.data).toEqual([
      { sendProvince: "Xizang", arriveProvince: "Xizang", flow: 14, rank: 1 },
      { sendProvince: "Qinghai", arriveProvince: "Xizang", flow: 5, rank: 2 },
      { sendProvince: "Xizang", arriveProvince: "Qinghai", flow: 5, rank: 2 },
      { sendProvince: "Unknown", arriveProvince: "Xizang", flow: 2, rank: 4 },
      { sendProvince: "Xizang", arriveProvince: "Unknown", flow: 0, rank: 5 },
    ]);
    expect(service.provinceCorridor({ start: T1, end: END, topk: 1 }).data).toHaveLength(1);
  });

  it("splits city corridors by province", () => {
    expect(
      service.cityCorridor({ start: T1, end: END, topkIntra: 10, topkInter: 30 }),
    ).toEqual({
      periodType: null,
      topkIntra: 10,
      topkInter: 30,
      totalRecords: 6,
      intraProvince: [
        { sendCity: "Lhasa", arriveCity: "Shigatse", flow: 14, rank: 1, corridorType: "intra_province" },
      ],
      interProvince: [
        { sendCity: "Lhasa", arriveCity: "Xining", flow: 5, rank: 1, corridorType: "inter_province" },
        { sendCity: "Xining", arriveCity: "Lhasa", flow: 5, rank: 1, corridorType: "inter_province" },
      ],
    });
  });

  it("returns empty, well-formed results for an empty window", () => {
    expect(
      service.cityCorridor({ start: "2020-01-01", end: "2020-01-02", topkIntra: 10, topkInter: 30 }),
    ).toMatchObject({ totalRecords: 0, intraProvince: [], interProvince: [] });
    expect(
      service.provinceFlow({ start: "2020-01-01", end: "2020-01-02", dateMode: "daily", direction: "send" }).data,
    ).toEqual([]);
  });

  it("validates the window before scanning", () => {
    expect(() =>
      service.provinceCorridor({ start: T2, end: T1, topk: 10 }),
    ).toThrow(`end (${T1}) is before start (${T2})`);
    expect(stores.acquisitions).toBe(0);
  });
});
