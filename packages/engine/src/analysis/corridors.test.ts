import { describe, it, expect } from "vitest";
import { provinceCorridors, cityCorridors } from "./corridors.js";
import { LOOKUP, PLACES, RECORDS } from "./fixtures.js";
import { buildPlaceLookup, knownProvinceOf } from "./place-lookup.js";

describe("provinceCorridors", () => {
  it("ranks ordered province pairs over the whole window", () => {
    expect(provinceCorridors(RECORDS, LOOKUP)).toEqual([
      { sendKey: "浙江", arriveKey: "浙江", flow: 14, rank: 1 },
      { sendKey: "江苏", arriveKey: "浙江", flow: 5, rank: 2 },
      { sendKey: "浙江", arriveKey: "江苏", flow: 5, rank: 2 },
      { sendKey: "浙江", arriveKey: "Unknown", flow: 3, rank: 4 },
      { sendKey: "Unknown", arriveKey: "浙江", flow: 2, rank: 5 },
    ]);
  });

  it("truncates to topk", () => {
    const rows = provinceCorridors(RECORDS, LOOKUP, 2);
    expect(rows.map((r) => `${r.sendKey}->${r.arriveKey}`)).toEqual([
      "浙江->浙江",
      "江苏->浙江",
    ]);
  });

  it("returns an empty list for no records", () => {
    expect(provinceCorridors([], LOOKUP)).toEqual([]);
  });
});

describe("cityCorridors", () => {
  it("splits and ranks intra- and inter-province corridors separately", () => {
    expect(cityCorridors(RECORDS, LOOKUP)).toEqual({
      intraProvince: [
        { sendKey: "杭州", arriveKey: "宁波", flow: 14, rank: 1, corridorType: "intra_province" },
      ],
      interProvince: [
        { sendKey: "南京", arriveKey: "杭州", flow: 5, rank: 1, corridorType: "inter_province" },
        { sendKey: "杭州", arriveKey: "南京", flow: 5, rank: 1, corridorType: "inter_province" },
        { sendKey: "南京", arriveKey: "宁波", flow: 0, rank: 3, corridorType: "inter_province" },
      ],
    });
  });

  it("applies separate topk limits", () => {
    const result = cityCorridors(RECORDS, LOOKUP, { topkIntra: 0, topkInter: 2 });
    expect(result.intraProvince).toEqual([]);
    expect(result.interProvince.map((r) => r.sendKey)).toEqual(["南京", "杭州"]);
  });

  it("excludes pairs with an unknown province from both lists", () => {
    const { intraProvince, interProvince } = cityCorridors(RECORDS, LOOKUP);
    const all = [...intraProvince, ...interProvince];
    expect(all.some((r) => r.sendKey === "Unknown" || r.arriveKey === "Unknown")).toBe(false);
    expect(all.some((r) => r.arriveKey === "Mystery")).toBe(false);
  });

  it("keeps the lists disjoint and covering every pair with known provinces", () => {
    const { intraProvince, interProvince } = cityCorridors(RECORDS, LOOKUP, {
      topkIntra: 100,
      topkInter: 100,
    });
    const intraKeys = new Set(intraProvince.map((r) => `${r.sendKey}->${r.arriveKey}`));
    const interKeys = new Set(interProvince.map((r) => `${r.sendKey}->${r.arriveKey}`));
    for (const key of intraKeys) expect(interKeys.has(key)).toBe(false);

    const expected = new Set(
      RECORDS.filter(
        (r) =>
          knownProvinceOf(LOOKUP, r.originId) !== null &&
          knownProvinceOf(LOOKUP, r.destinationId) !== null,
      ).map((r) => {
        const name = (id: number) => PLACES.find((p) => p.id === id)?.name;
        return `${name(r.originId)}->${name(r.destinationId)}`;
      }),
    );
    expect(new Set([...intraKeys, ...interKeys])).toEqual(expected);
  });

  it("treats an empty province string as unknown", () => {
    const lookup = buildPlaceLookup([
      { id: 1, name: "A", province: "" },
      { id: 2, name: "B", province: "" },
    ]);
    const result = cityCorridors(
      [{ time: "2022-01-11T00:00:00Z", type: null, originId: 1, destinationId: 2, flow: 1 }],
      lookup,
    );
    expect(result).toEqual({ intraProvince: [], interProvince: [] });
  });
});
