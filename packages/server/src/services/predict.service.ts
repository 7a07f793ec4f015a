import { createNoiseTransform, type OdTensor, type PairSeries } from "@odflow/engine";
import type { PredictPairQuery, PredictQuery } from "../models/requests.js";
import type { SimulatedFields } from "../models/responses.js";
import type { OdQueryService } from "./od-query.service.js";

/**
 * Stand-in predictor: replays the observed window with multiplicative
 * noise. Every response is marked as simulated.
 */
export class PredictService {
  constructor(
    private readonly od: OdQueryService,
    private readonly defaultNoiseRatio: number,
  ) {}

  tensor(query: PredictQuery): OdTensor & SimulatedFields {
    const noiseRatio = query.noiseRatio ?? this.defaultNoiseRatio;
    const transform = createNoiseTransform({ noiseRatio, seed: query.seed });
    return { ...this.od.tensor(query, transform), ...simulated(noiseRatio) };
  }

  pair(query: PredictPairQuery): PairSeries & SimulatedFields {
    const noiseRatio = query.noiseRatio ?? this.defaultNoiseRatio;
    const transform = createNoiseTransform({ noiseRatio, seed: query.seed });
    return { ...this.od.pair(query, transform), ...simulated(noiseRatio) };
  }
}

function simulated(noiseRatio: number): SimulatedFields {
  return { simulated: true, method: "noise-injection", noiseRatio };
}
