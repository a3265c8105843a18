// Scam Honeypot - Fixed Network Weights
// Every matrix the ranking pipeline uses is drawn once from a seeded PRNG with
// He-style scaling. Nothing is trained or loaded; the same seed yields the same
// numbers on every platform.

import { createSeededRandom, gaussian, type Matrix, type RandomSource, type Vector } from "./utils.js";

// ─── Dimensions ─────────────────────────────────────────────────────────────────

export const WEIGHT_SEED = 42;

export const EMBED_DIM = 128;
export const HEAD_COUNT = 4;
export const HEAD_DIM = EMBED_DIM / HEAD_COUNT; // 32
export const FEED_FORWARD_DIM = EMBED_DIM * 2;
export const HIDDEN_DIM = 64;
export const INTENT_COUNT = 15;
export const HAND_FEATURE_COUNT = 10;
export const SCORER_INPUT_DIM = EMBED_DIM + EMBED_DIM + HIDDEN_DIM + INTENT_COUNT + HAND_FEATURE_COUNT; // 345

// ─── Weight Shapes ──────────────────────────────────────────────────────────────

export interface DenseLayer {
  w: Matrix;
  b: Vector;
}

export interface NetworkWeights {
  encoder: DenseLayer;
  attention: { query: Matrix; key: Matrix; value: Matrix; output: DenseLayer };
  feedForward: { expand: DenseLayer; contract: DenseLayer };
  recurrent: { update: DenseLayer; reset: DenseLayer; candidate: DenseLayer };
  intent: { hidden1: DenseLayer; hidden2: DenseLayer; output: DenseLayer };
  scorer: { hidden1: DenseLayer; hidden2: DenseLayer; output: DenseLayer };
}

function heMatrix(rows: number, cols: number, random: RandomSource): Matrix {
  const scale = Math.sqrt(2 / cols);
  const m: Matrix = [];
  for (let r = 0; r < rows; r++) {
    const row = new Array<number>(cols);
    for (let c = 0; c < cols; c++) row[c] = gaussian(random) * scale;
    m.push(row);
  }
  return m;
}

function dense(outDim: number, inDim: number, random: RandomSource): DenseLayer {
  return { w: heMatrix(outDim, inDim, random), b: new Array<number>(outDim).fill(0) };
}

/**
 * Draws the full weight set. Draw order is part of the contract: changing it
 * changes every ranking decision.
 */
export function generateWeights(seed: number = WEIGHT_SEED): NetworkWeights {
  const random = createSeededRandom(seed);
  const recurrentInput = HIDDEN_DIM + EMBED_DIM;
  const intentInput = EMBED_DIM + HIDDEN_DIM;

  return {
    encoder: dense(EMBED_DIM, EMBED_DIM, random),
    attention: {
      query: heMatrix(HEAD_DIM, HEAD_DIM, random),
      key: heMatrix(HEAD_DIM, HEAD_DIM, random),
      value: heMatrix(HEAD_DIM, HEAD_DIM, random),
      output: dense(EMBED_DIM, EMBED_DIM, random),
    },
    feedForward: {
      expand: dense(FEED_FORWARD_DIM, EMBED_DIM, random),
      contract: dense(EMBED_DIM, FEED_FORWARD_DIM, random),
    },
    recurrent: {
      update: dense(HIDDEN_DIM, recurrentInput, random),
      reset: dense(HIDDEN_DIM, recurrentInput, random),
      candidate: dense(HIDDEN_DIM, recurrentInput, random),
    },
    intent: {
      hidden1: dense(96, intentInput, random),
      hidden2: dense(48, 96, random),
      output: dense(INTENT_COUNT, 48, random),
    },
    scorer: {
      hidden1: dense(128, SCORER_INPUT_DIM, random),
      hidden2: dense(64, 128, random),
      output: dense(1, 64, random),
    },
  };
}

let shared: NetworkWeights | null = null;

/** Process-wide weights for the compiled-in seed, drawn on first use. */
export function defaultWeights(): NetworkWeights {
  if (!shared) shared = generateWeights(WEIGHT_SEED);
  return shared;
}
