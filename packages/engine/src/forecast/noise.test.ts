import { describe, it, expect } from "vitest";
import { createNoiseTransform, mulberry32 } from "./noise.js";

describe("mulberry32", () => {
  it("is deterministic per seed and stays in [0, 1)", () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    for (let i = 0; i < 100; i++) {
      const x = a();
      expect(b()).toBe(x);
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it("differs between seeds", () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });
});

describe("createNoiseTransform", () => {
  it("keeps values within the noise ratio", () => {
    const noisy = createNoiseTransform({ noiseRatio: 0.1, seed: 7 });
    for (let i = 0; i < 50; i++) {
      const v = noisy(100);
      expect(v).toBeGreaterThanOrEqual(90);
      expect(v).toBeLessThanOrEqual(110);
    }
  });

  it("is reproducible with a seed", () => {
    const a = createNoiseTransform({ seed: 3 });
    const b = createNoiseTransform({ seed: 3 });
    expect([a(10), a(20), a(30)]).toEqual([b(10), b(20), b(30)]);
  });

  it("is the identity with a zero ratio", () => {
    const clean = createNoiseTransform({ noiseRatio: 0, seed: 1 });
    expect(clean(12.5)).toBe(12.5);
  });

  it("never goes below zero", () => {
    const noisy = createNoiseTransform({ seed: 5 });
    expect(noisy(-5)).toBe(0);
    expect(noisy(0)).toBe(0);
  });
});
