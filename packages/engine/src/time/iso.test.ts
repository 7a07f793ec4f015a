import { describe, it, expect } from "vitest";
import { tryParseIsoTimestamp, parseIsoTimestamp, validateTimeRange } from "./iso.js";
import { OdflowError } from "../errors.js";

const JAN_11 = Date.UTC(2022, 0, 11);

describe("tryParseIsoTimestamp", () => {
  it("parses a trailing Z as UTC", () => {
    expect(tryParseIsoTimestamp("2022-01-11T00:00:00Z")).toBe(JAN_11);
  });

  it("interprets timezone-naive timestamps as UTC", () => {
    expect(tryParseIsoTimestamp("2022-01-11T00:00:00")).toBe(JAN_11);
    expect(tryParseIsoTimestamp("2022-01-11 00:00:00")).toBe(JAN_11);
  });

  it("applies numeric offsets", () => {
    expect(tryParseIsoTimestamp("2022-01-11T08:00:00+08:00")).toBe(JAN_11);
    expect(tryParseIsoTimestamp("2022-01-10T19:00:00-0500")).toBe(JAN_11);
  });

  it("accepts a bare date and fractional seconds", () => {
    expect(tryParseIsoTimestamp("2022-01-11")).toBe(JAN_11);
    expect(tryParseIsoTimestamp("2022-01-11T00:00:00.250Z")).toBe(JAN_11 + 250);
  });

  it("rejects malformed or impossible timestamps", () => {
    expect(tryParseIsoTimestamp("")).toBeNull();
    expect(tryParseIsoTimestamp("yesterday")).toBeNull();
    expect(tryParseIsoTimestamp("2022-13-01T00:00:00Z")).toBeNull();
    expect(tryParseIsoTimestamp("2022-02-30T00:00:00Z")).toBeNull();
    expect(tryParseIsoTimestamp("2022-01-11T24:00:00Z")).toBeNull();
    expect(tryParseIsoTimestamp("2022-01-11T00:00:00+25:00")).toBeNull();
  });
});

describe("parseIsoTimestamp", () => {
  it("throws InvalidTimeRange naming the bound", () => {
    try {
      parseIsoTimestamp("bogus", "start");
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof OdflowError)) throw err;
      expect(err.kind).toBe("InvalidTimeRange");
      expect(err.message).toBe('invalid start time: "bogus"');
    }
  });
});

describe("validateTimeRange", () => {
  it("keeps the original strings alongside parsed epochs", () => {
    const range = validateTimeRange("2022-01-11T00:00:00Z", "2022-01-12T00:00:00Z");
    expect(range).toEqual({
      start: "2022-01-11T00:00:00Z",
      end: "2022-01-12T00:00:00Z",
      startEpochMs: JAN_11,
      endEpochMs: JAN_11 + 86_400_000,
    });
  });

  it("allows an empty window where start equals end", () => {
    expect(() =>
      validateTimeRange("2022-01-11T00:00:00Z", "2022-01-11T00:00:00Z"),
    ).not.toThrow();
  });

  it("rejects an end before the start", () => {
    expect(() =>
      validateTimeRange("2022-01-12T00:00:00Z", "2022-01-11T00:00:00Z"),
    ).toThrowError(/before start/);
  });

  it("rejects an unparseable end", () => {
    expect(() => validateTimeRange("2022-01-11T00:00:00Z", "soon")).toThrowError(
      'invalid end time: "soon"',
    );
  });
});
