// Scam Honeypot - Conversation State
// Gated recurrent update of the per-session 64-d hidden vector.

import { HIDDEN_DIM, type NetworkWeights } from "./network-weights.js";
import { matVec, sigmoid, type Vector } from "./utils.js";

export function initialHiddenState(): Vector {
  return new Array<number>(HIDDEN_DIM).fill(0);
}

export class ConversationState {
  private readonly weights: NetworkWeights["recurrent"];

  constructor(weights: NetworkWeights["recurrent"]) {
    this.weights = weights;
  }

  /**
   * z = σ(Wz[h, x]), r = σ(Wr[h, x]), h̃ = tanh(Wh[r⊙h, x]),
   * h' = (1 − z)⊙h + z⊙h̃
   */
  step(input: Vector, hidden: Vector): Vector {
    if (hidden.length !== HIDDEN_DIM) {
      throw new Error(`Hidden state must have ${HIDDEN_DIM} entries, got ${hidden.length}`);
    }
    const { update, reset, candidate } = this.weights;
    const combined = [...hidden, ...input];
    const z = matVec(update.w, combined, update.b).map(sigmoid);
    const r = matVec(reset.w, combined, reset.b).map(sigmoid);
    const gated = [...hidden.map((h, i) => r[i] * h), ...input];
    const proposal = matVec(candidate.w, gated, candidate.b).map(Math.tanh);
    return hidden.map((h, i) => (1 - z[i]) * h + z[i] * proposal[i]);
  }
}
