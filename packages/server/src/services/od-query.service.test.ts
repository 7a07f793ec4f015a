import { describe, it, expect, beforeEach } from "vitest";
import { OdQueryService } from "./od-query.service.js";
import { PredictService } from "./predict.service.js";
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
let service: OdQueryService;

beforeEach(() => {
  const { provider } = createMemoryStore({ places: SAMPLE_PLACES, flows: SAMPLE_FLOWS });
  stores = new CountingProvider(provider);
  service = new OdQueryService(stores, "state");
});

describe("OdQueryService.tensor", () => {
  it("builds the full-directory tensor ascending by id", () => {
    const result = service.tensor({ start: T1, end: END, flowPolicy: "zero" });
    expect(result.ids).toEqual([1, 2, 3, 4]);
    expect(result.times).toEqual([T1, T2, T3]);
    expect(result.tensor).toEqual([
      [
        [0, 10, 5, 0],
        [0, 0, 0, 0],
        [5, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      [
        [0, 4, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      [
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
    ]);
    expect(result.T).toBe(3);
    expect(result.N).toBe(4);
  });

  it("follows the caller's id order and restricts both ends to it", () => {
    const result = service.tensor({ start: T1, end: END, geoIds: "2, 1", flowPolicy: "null" });
    expect(result).toEqual({
      T: 2,
      N: 2,
      times: [T1, T2],
      ids: [2, 1],
      tensor: [
        [
          [null, null],
          [10, null],
        ],
        [
          [null, null],
          [4, null],
        ],
      ],
    });
  });

  it("filters by type", () => {
    const result = service.tensor({ start: T1, end: END, type: "event", flowPolicy: "zero" });
    expect(result.times).toEqual([T1]);
    expect(result.tensor[0]?.[2]).toEqual([5, 0, 0, 0]);
  });

  it("returns an empty tensor for a window without records", () => {
    expect(
      service.tensor({ start: "2021-01-01", end: "2021-02-01", flowPolicy: "zero" }),
    ).toEqual({ T: 0, N: 4, times: [], ids: [1, 2, 3, 4], tensor: [] });
  });

  it("rejects a bad window or id filter before touching the store", () => {
    expect(() => service.tensor({ start: "yesterday", end: END, flowPolicy: "zero" })).toThrow(
      'invalid start time: "yesterday"',
    );
    expect(() => service.tensor({ start: END, end: T1, flowPolicy: "zero" })).toThrow(
      expect.objectContaining({ kind: "InvalidTimeRange" }),
    );
    expect(() =>
      service.tensor({ start: T1, end: END, geoIds: "1,x", flowPolicy: "zero" }),
    ).toThrow(expect.objectContaining({ kind: "InvalidIdFilter", status: 400 }));
    expect(stores.acquisitions).toBe(0);
  });
});

describe("OdQueryService.pair", () => {
  it("uses the default pair type", () => {
    expect(
      service.pair({ start: T1, end: END, originId: 1, destinationId: 2, flowPolicy: "zero" }),
    ).toEqual({ T: 2, times: [T1, T2], originId: 1, destinationId: 2, series: [10, 4] });
  });

  it("returns an empty series when the type has no records for the pair", () => {
    const result = service.pair({
      start: T1,
      end: END,
      originId: 1,
      destinationId: 2,
      type: "event",
      flowPolicy: "zero",
    });
    expect(result).toEqual({ T: 0, times: [], originId: 1, destinationId: 2, series: [] });
  });

  it("applies the flow policy to missing values", () => {
    const base = { start: T1, end: END, originId: 2, destinationId: 4 };
    expect(service.pair({ ...base, flowPolicy: "zero" }).series).toEqual([0]);
    expect(service.pair({ ...base, flowPolicy: "null" }).series).toEqual([null]);
    expect(service.pair({ ...base, flowPolicy: "skip" }).series).toEqual([null]);
  });
});

describe("PredictService", () => {
  it("replays the window unchanged with a zero noise ratio", () => {
    const predict = new PredictService(service, 0.03);
    const observed = service.tensor({ start: T1, end: END, flowPolicy: "zero" });
    const simulated = predict.tensor({ start: T1, end: END, flowPolicy: "zero", noiseRatio: 0 });
    expect(simulated).toEqual({
      ...observed,
      simulated: true,
      method: "noise-injection",
      noiseRatio: 0,
    });
  });

  it("is reproducible with a seed and stays within the ratio", () => {
    const predict = new PredictService(service, 0.03);
    const query = { start: T1, end: END, originId: 1, destinationId: 2, flowPolicy: "zero" as const, seed: 9 };
    const first = predict.pair(query);
    const second = predict.pair(query);
    expect(first.series).toEqual(second.series);
    expect(first.noiseRatio).toBe(0.03);
    const [a, b] = first.series;
    expect(a).toBeGreaterThanOrEqual(9.7);
    expect(a).toBeLessThanOrEqual(10.3);
    expect(b).toBeGreaterThanOrEqual(3.88);
    expect(b).toBeLessThanOrEqual(4.12);
  });
});
