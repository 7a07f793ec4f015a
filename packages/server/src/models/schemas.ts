import { z } from "zod";
import {
  DEFAULT_INTER_TOPK,
  DEFAULT_INTRA_TOPK,
  DEFAULT_PROVINCE_TOPK,
  type NestedValues,
} from "@odflow/engine";
import type {
  CityCorridorRequest,
  FlowAnalysisRequest,
  ForecastRequest,
  GeoIdQuery,
  GrowthRequest,
  MetricsRequest,
  OdQuery,
  PairQuery,
  PredictPairQuery,
  PredictQuery,
  ProvinceCorridorRequest,
  RelationsMatrixQuery,
} from "./requests.js";

/** Schema whose parsed output is exactly T, whatever the raw input */
type RequestSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const timestamp = z.string().min(1);
const flowPolicy = z.enum(["zero", "null", "skip"]).default("zero");
const queryInt = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "Expected an integer")
  .transform(Number)
  .pipe(z.number().int().safe());

const noiseFields = {
  noiseRatio: z.coerce.number().min(0).optional(),
  // mulberry32 keeps 32 bits of state; wider seeds would alias
  seed: queryInt.pipe(z.number().min(0).max(4294967295)).optional(),
};

export const geoIdQuerySchema: RequestSchema<GeoIdQuery> = z.object({
  name: z.string().default(""),
});

export const relationsMatrixQuerySchema: RequestSchema<RelationsMatrixQuery> = z.object({
  fill: z.string().default("nan"),
});

const odQueryFields = {
  start: timestamp,
  end: timestamp,
  geoIds: z.string().optional(),
  type: z.string().min(1).optional(),
  flowPolicy,
};

const pairQueryFields = {
  start: timestamp,
  end: timestamp,
  originId: queryInt,
  destinationId: queryInt,
  type: z.string().min(1).optional(),
  flowPolicy,
};

export const odQuerySchema: RequestSchema<OdQuery> = z.object(odQueryFields);
export const pairQuerySchema: RequestSchema<PairQuery> = z.object(pairQueryFields);
export const predictQuerySchema: RequestSchema<PredictQuery> = z.object({
  ...odQueryFields,
  ...noiseFields,
});
export const predictPairQuerySchema: RequestSchema<PredictPairQuery> = z.object({
  ...pairQueryFields,
  ...noiseFields,
});

const finite = z.number().finite();

export const forecastRequestSchema: RequestSchema<ForecastRequest> = z.object({
  history: z
    .object({
      T: z.number().int().min(0).optional(),
      N: z.number().int().min(0),
      ids: z.array(z.number().int()),
      tensor: z.array(z.array(z.array(finite.nullable()))),
    })
    .refine((h) => h.ids.length === h.N, {
      message: "ids must have N entries",
      path: ["ids"],
    }),
  horizon: z.number().int().min(0),
  method: z.enum(["naive", "moving_average"]),
  window: z.number().int().positive().optional(),
});

export const growthRequestSchema: RequestSchema<GrowthRequest> = z.object({
  a: finite,
  b: finite,
  safe: z.boolean().default(true),
});

const nestedValues: z.ZodType<NestedValues> = z.lazy(() =>
  z.union([finite, z.null(), z.array(nestedValues)]),
);

export const metricsRequestSchema: RequestSchema<MetricsRequest> = z.object({
  yTrue: nestedValues,
  yPred: nestedValues,
});

const analysisWindow = {
  start: timestamp,
  end: timestamp,
  type: z.string().min(1).optional(),
  periodType: z.string().optional(),
};

export const flowAnalysisRequestSchema: RequestSchema<FlowAnalysisRequest> = z.object({
  ...analysisWindow,
  dateMode: z.enum(["daily", "total"]).default("daily"),
  direction: z
    .enum(["send", "receive", "arrive"])
    .default("send")
    .transform((d) => (d === "arrive" ? "receive" : d)),
});

const topk = z.number().int().positive();

export const provinceCorridorRequestSchema: RequestSchema<ProvinceCorridorRequest> = z.object({
  ...analysisWindow,
  topk: topk.default(DEFAULT_PROVINCE_TOPK),
});

export const cityCorridorRequestSchema: RequestSchema<CityCorridorRequest> = z.object({
  ...analysisWindow,
  topkIntra: topk.default(DEFAULT_INTRA_TOPK),
  topkInter: topk.default(DEFAULT_INTER_TOPK),
});
