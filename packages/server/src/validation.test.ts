import { describe, it, expect } from "vitest";
import { ValidateError } from "@tsoa/runtime";
import { parseRequest } from "./validation.js";
import {
  cityCorridorRequestSchema,
  flowAnalysisRequestSchema,
  forecastRequestSchema,
  metricsRequestSchema,
  pairQuerySchema,
  predictQuerySchema,
} from "./models/schemas.js";

describe("parseRequest", () => {
  it("applies defaults and coerces query numbers", () => {
    expect(
      parseRequest(predictQuerySchema, { start: "2022-01-01", end: "2022-01-02", seed: "7" }, "query"),
    ).toEqual({ start: "2022-01-01", end: "2022-01-02", flowPolicy: "zero", seed: 7 });
  });

  it("maps arrive to receive and defaults the date mode", () => {
    expect(
      parseRequest(flowAnalysisRequestSchema, { start: "a", end: "b", direction: "arrive" }, "body"),
    ).toEqual({ start: "a", end: "b", dateMode: "daily", direction: "receive" });
  });

  it("raises a ValidateError keyed by location and path", () => {
    try {
      parseRequest(cityCorridorRequestSchema, { start: "a", end: "b", topkInter: 0 }, "body");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidateError);
      if (err instanceof ValidateError) {
        expect(Object.keys(err.fields)).toEqual(["body.topkInter"]);
      }
    }
  });

  it("treats a missing body as an empty object", () => {
    expect(() => parseRequest(metricsRequestSchema, undefined, "body")).toThrow(ValidateError);
  });

  it("accepts nested metric values with nulls", () => {
    expect(
      parseRequest(metricsRequestSchema, { yTrue: [[1, null], [2]], yPred: [[1, 2], [null]] }, "body"),
    ).toEqual({ yTrue: [[1, null], [2]], yPred: [[1, 2], [null]] });
  });

  it("checks that forecast ids match N", () => {
    try {
      parseRequest(
        forecastRequestSchema,
        { history: { N: 2, ids: [1], tensor: [] }, horizon: 1, method: "naive" },
        "body",
      );
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidateError);
      if (err instanceof ValidateError) {
        expect(err.fields["body.history.ids"]).toEqual({ message: "ids must have N entries" });
      }
    }
  });

  it("rejects an empty integer parameter instead of reading it as zero", () => {
    try {
      parseRequest(pairQuerySchema, { start: "a", end: "b", originId: "", destinationId: "2" }, "query");
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof ValidateError)) throw err;
      expect(Object.keys(err.fields)).toEqual(["query.originId"]);
    }
  });

  it("parses signed integer parameters", () => {
    expect(
      parseRequest(pairQuerySchema, { start: "a", end: "b", originId: " -3 ", destinationId: "+2" }, "query"),
    ).toEqual({ start: "a", end: "b", originId: -3, destinationId: 2, flowPolicy: "zero" });
  });

  it("bounds seeds to 32 bits", () => {
    const query = { start: "a", end: "b" };
    expect(parseRequest(predictQuerySchema, { ...query, seed: "4294967295" }, "query").seed).toBe(4294967295);
    expect(() => parseRequest(predictQuerySchema, { ...query, seed: "4294967296" }, "query")).toThrow(ValidateError);
    expect(() => parseRequest(predictQuerySchema, { ...query, seed: "-1" }, "query")).toThrow(ValidateError);
  });
});
