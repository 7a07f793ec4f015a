import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      dbPath: "./data/geo_points.db",
      tables: { places: "places", relations: "relations", flows: "dyna" },
      predictNoiseRatio: 0.03,
      defaultPairType: "state",
    });
  });

  it("reads overrides and treats empty values as unset", () => {
    const config = loadConfig({
      PORT: "8080",
      OD_DB_PATH: "/tmp/od.db",
      OD_TABLE_FLOWS: "flows_2024",
      OD_PREDICT_NOISE_RATIO: "0.1",
      OD_DEFAULT_PAIR_TYPE: "",
    });
    expect(config.port).toBe(8080);
    expect(config.dbPath).toBe("/tmp/od.db");
    expect(config.tables.flows).toBe("flows_2024");
    expect(config.predictNoiseRatio).toBe(0.1);
    expect(config.defaultPairType).toBe("state");
  });

  it("rejects table names that are not identifiers", () => {
    expect(() => loadConfig({ OD_TABLE_PLACES: "places; DROP TABLE dyna" })).toThrow(
      "Invalid configuration: OD_TABLE_PLACES: must be a plain SQL identifier",
    );
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/^Invalid configuration: PORT:/);
  });
});
