// Scam Honeypot - Attention
// Treats the 128-d encoding as four 32-d positions and mixes them with
// scaled dot-product attention, then a position-wise feed-forward block.

import { HEAD_COUNT, HEAD_DIM, type NetworkWeights } from "./network-weights.js";
import { add, gelu, layerNorm, matVec, softmax, type Vector } from "./utils.js";

export class MultiHeadAttention {
  private readonly weights: NetworkWeights["attention"];

  constructor(weights: NetworkWeights["attention"]) {
    this.weights = weights;
  }

  forward(x: Vector): Vector {
    const { query, key, value, output } = this.weights;
    const heads: Vector[] = [];
    for (let h = 0; h < HEAD_COUNT; h++) heads.push(x.slice(h * HEAD_DIM, (h + 1) * HEAD_DIM));

    const q = heads.map((head) => matVec(query, head));
    const k = heads.map((head) => matVec(key, head));
    const v = heads.map((head) => matVec(value, head));

    // One softmax over all 16 head pairs
    const scale = Math.sqrt(HEAD_DIM);
    const scores: number[] = [];
    for (let i = 0; i < HEAD_COUNT; i++) {
      for (let j = 0; j < HEAD_COUNT; j++) {
        let s = 0;
        for (let d = 0; d < HEAD_DIM; d++) s += q[i][d] * k[j][d];
        scores.push(s / scale);
      }
    }
    const attn = softmax(scores);

    const context: number[] = [];
    for (let i = 0; i < HEAD_COUNT; i++) {
      for (let d = 0; d < HEAD_DIM; d++) {
        let s = 0;
        for (let j = 0; j < HEAD_COUNT; j++) s += attn[i * HEAD_COUNT + j] * v[j][d];
        context.push(s);
      }
    }

    return layerNorm(add(x, matVec(output.w, context, output.b)));
  }
}

export class FeedForward {
  private readonly weights: NetworkWeights["feedForward"];

  constructor(weights: NetworkWeights["feedForward"]) {
    this.weights = weights;
  }

  forward(x: Vector): Vector {
    const { expand, contract } = this.weights;
    const hidden = matVec(expand.w, x, expand.b).map(gelu);
    return layerNorm(add(x, matVec(contract.w, hidden, contract.b)));
  }
}

/** Attention followed by the feed-forward block. */
export class ContextualEncoder {
  private readonly attention: MultiHeadAttention;
  private readonly feedForward: FeedForward;

  constructor(weights: NetworkWeights) {
    this.attention = new MultiHeadAttention(weights.attention);
    this.feedForward = new FeedForward(weights.feedForward);
  }

  contextualize(encoded: Vector): Vector {
    return this.feedForward.forward(this.attention.forward(encoded));
  }
}
