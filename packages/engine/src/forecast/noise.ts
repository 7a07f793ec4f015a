/**
 * Noise-injected replay of historical flows.
 *
 * Each present flow value becomes max(0, flow + flow * ratio * u) with u
 * uniform in [-1, 1). Not a predictor: it only perturbs what was observed.
 */

export const DEFAULT_NOISE_RATIO = 0.03;

/** Mulberry32 seeded PRNG returning floats in [0, 1) */
export function mulberry32(seed: number): () => number {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface NoiseOptions {
  noiseRatio?: number;
  /** When set, the noise sequence is reproducible */
  seed?: number;
}

/** Build the flow transform applied to every present value */
export function createNoiseTransform(
  options: NoiseOptions = {},
): (flow: number) => number {
  const ratio = options.noiseRatio ?? DEFAULT_NOISE_RATIO;
  const random = options.seed === undefined ? Math.random : mulberry32(options.seed);
  return (flow) => Math.max(0, flow + flow * ratio * (random() * 2 - 1));
}
