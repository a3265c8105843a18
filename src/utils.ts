// Scam Honeypot - Shared utilities
//
// Deterministic helpers used across the ranking pipeline: string hashing,
// a seedable PRNG and the small amount of vector math the fixed networks need.

// ─── Hashing ────────────────────────────────────────────────────────────────────

export const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 16777619;

/**
 * 32-bit FNV-1a over UTF-16 code units. The seed replaces the offset basis so
 * one input can be hashed into independent buckets.
 */
export function fnv1a(input: string, seed: number = FNV_OFFSET_BASIS): number {
  let hash = seed >>> 0;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

// ─── Random ─────────────────────────────────────────────────────────────────────

export type RandomSource = () => number;

/** mulberry32: small, fast, and identical on every platform for a given seed. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Standard normal sample via Box-Muller. */
export function gaussian(random: RandomSource): number {
  const u1 = 1 - random(); // (0, 1]
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Index drawn from a probability vector. Falls back to the last index on rounding drift. */
export function sampleIndex(probabilities: readonly number[], random: RandomSource): number {
  const r = random();
  let acc = 0;
  for (let i = 0; i < probabilities.length; i++) {
    acc += probabilities[i];
    if (r < acc) return i;
  }
  return probabilities.length - 1;
}

// ─── Vector Math ────────────────────────────────────────────────────────────────

export type Vector = number[];
/** Row-major: matrix[row][col], applied as matrix · x */
export type Matrix = number[][];

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

export function matVec(matrix: Matrix, x: readonly number[], bias?: readonly number[]): Vector {
  const out = new Array<number>(matrix.length);
  for (let r = 0; r < matrix.length; r++) {
    out[r] = dot(matrix[r], x) + (bias ? bias[r] : 0);
  }
  return out;
}

export function l2Norm(x: readonly number[]): number {
  return Math.sqrt(dot(x, x));
}

/** Unit-length copy; vectors with (near) zero norm are returned unchanged. */
export function normalize(x: readonly number[]): Vector {
  const n = l2Norm(x);
  if (n < 1e-9) return [...x];
  return x.map((v) => v / n);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const na = l2Norm(a);
  const nb = l2Norm(b);
  if (na < 1e-9 || nb < 1e-9) return 0;
  return dot(a, b) / (na * nb);
}

export function softmax(logits: readonly number[]): Vector {
  const max = Math.max(...logits);
  const exps = logits.map((v) => Math.exp(v - max));
  const total = exps.reduce((s, v) => s + v, 0);
  return exps.map((v) => v / total);
}

export function sigmoid(x: number): number {
  const clipped = Math.max(-15, Math.min(15, x));
  return 1 / (1 + Math.exp(-clipped));
}

/** tanh approximation of GELU */
export function gelu(x: number): number {
  return 0.5 * x * (1 + Math.tanh(Math.sqrt(2 / Math.PI) * (x + 0.044715 * x ** 3)));
}

export function relu(x: number): number {
  return x > 0 ? x : 0;
}

export function layerNorm(x: readonly number[], eps = 1e-5): Vector {
  const mean = x.reduce((s, v) => s + v, 0) / x.length;
  const variance = x.reduce((s, v) => s + (v - mean) ** 2, 0) / x.length;
  const denom = Math.sqrt(variance + eps);
  return x.map((v) => (v - mean) / denom);
}

export function add(a: readonly number[], b: readonly number[]): Vector {
  return a.map((v, i) => v + b[i]);
}

export function allFinite(x: readonly number[]): boolean {
  return x.every((v) => Number.isFinite(v));
}
