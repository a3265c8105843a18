// Scam Honeypot - Utility Unit Tests

import { describe, it, expect } from "vitest";
import {
  fnv1a,
  createSeededRandom,
  gaussian,
  sampleIndex,
  softmax,
  sigmoid,
  gelu,
  layerNorm,
  cosineSimilarity,
  normalize,
  matVec,
  allFinite,
} from "./utils.js";

describe("fnv1a", () => {
  it("returns the offset basis for the empty string", () => {
    expect(fnv1a("")).toBe(0x811c9dc5);
  });

  it("matches the reference 32-bit FNV-1a value for 'a'", () => {
    expect(fnv1a("a")).toBe(0xe40c292c);
  });

  it("produces different buckets for different seeds", () => {
    expect(fnv1a("otp", 0xc3a5)).not.toBe(fnv1a("otp", 0xb7e1));
  });

  it("always returns an unsigned 32-bit integer", () => {
    const h = fnv1a("share the otp immediately");
    expect(Number.isInteger(h)).toBe(true);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(h).toBeLessThan(2 ** 32);
  });
});

describe("createSeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("stays in [0, 1)", () => {
    const r = createSeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = r();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("gaussian samples are finite", () => {
    const r = createSeededRandom(1);
    for (let i = 0; i < 100; i++) {
      expect(Number.isFinite(gaussian(r))).toBe(true);
    }
  });
});

describe("sampleIndex", () => {
  it("walks the cumulative distribution", () => {
    expect(sampleIndex([0.2, 0.5, 0.3], () => 0.1)).toBe(0);
    expect(sampleIndex([0.2, 0.5, 0.3], () => 0.6)).toBe(1);
    expect(sampleIndex([0.2, 0.5, 0.3], () => 0.95)).toBe(2);
  });

  it("returns the last index when rounding leaves a gap", () => {
    expect(sampleIndex([0.3, 0.3, 0.3], () => 0.99)).toBe(2);
  });
});

describe("vector math", () => {
  it("softmax sums to one and preserves order", () => {
    const p = softmax([1, 2, 3]);
    expect(p.reduce((s, v) => s + v, 0)).toBeCloseTo(1, 10);
    expect(p[2]).toBeGreaterThan(p[1]);
    expect(p[1]).toBeGreaterThan(p[0]);
  });

  it("softmax handles large logits", () => {
    const p = softmax([1000, 1000]);
    expect(p).toEqual([0.5, 0.5]);
  });

  it("sigmoid is 0.5 at zero and clips extremes", () => {
    expect(sigmoid(0)).toBe(0.5);
    expect(sigmoid(1e6)).toBe(sigmoid(15));
  });

  it("gelu is zero at zero and close to identity for large inputs", () => {
    expect(gelu(0)).toBe(0);
    expect(gelu(10)).toBeCloseTo(10, 5);
  });

  it("layerNorm centres and scales", () => {
    const out = layerNorm([1, 2, 3, 4]);
    const mean = out.reduce((s, v) => s + v, 0) / out.length;
    expect(mean).toBeCloseTo(0, 10);
  });

  it("cosineSimilarity is 0 for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1, 10);
  });

  it("normalize leaves zero vectors alone", () => {
    expect(normalize([0, 0, 0])).toEqual([0, 0, 0]);
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it("matVec applies rows and bias", () => {
    expect(matVec([[1, 2], [3, 4]], [1, 1], [10, 0])).toEqual([13, 7]);
  });

  it("allFinite detects NaN", () => {
    expect(allFinite([1, 2])).toBe(true);
    expect(allFinite([1, Number.NaN])).toBe(false);
  });
});
