// Scam Honeypot - Intent Classifier
// Hybrid distribution over fifteen scam intents. Three signals are blended:
//   0.35 × fixed feed-forward head over [context, hidden]
//   0.30 × cosine similarity to keyword-derived prototypes (softmax at 0.25)
//   0.35 × normalised keyword-overlap counts

import type { IntentLexicon } from "./catalog.js";
import { INTENT_COUNT, type NetworkWeights } from "./network-weights.js";
import type { MessageEncoder } from "./text-encoder.js";
import { INTENT_NAMES, type IntentDistribution } from "./types.js";
import { cosineSimilarity, gelu, matVec, normalize, softmax, type Vector } from "./utils.js";

export const FEED_FORWARD_SHARE = 0.35;
export const PROTOTYPE_SHARE = 0.3;
export const KEYWORD_SHARE = 0.35;
const PROTOTYPE_TEMPERATURE = 0.25;

const NEUTRAL_INDEX = INTENT_NAMES.indexOf("neutral");

export class IntentClassifier {
  private readonly weights: NetworkWeights["intent"];
  private readonly keywords: string[][];
  private readonly prototypes: Vector[];

  constructor(weights: NetworkWeights["intent"], encoder: MessageEncoder, lexicon: IntentLexicon) {
    this.weights = weights;
    this.keywords = lexicon.keywords;
    this.prototypes = lexicon.keywords.map((kws) => {
      if (kws.length === 0) return new Array<number>(encoder.encode("").length).fill(0);
      const sum = kws.map((kw) => encoder.encode(kw)).reduce((acc, v) => acc.map((a, i) => a + v[i]));
      return normalize(sum.map((v) => v / kws.length));
    });
  }

  /** Probabilities indexed like INTENT_NAMES; sums to 1. */
  classify(context: Vector, hidden: Vector, rawText: string): number[] {
    const { hidden1, hidden2, output } = this.weights;
    const h1 = matVec(hidden1.w, [...context, ...hidden], hidden1.b).map(gelu);
    const h2 = matVec(hidden2.w, h1, hidden2.b).map(gelu);
    const fc = softmax(matVec(output.w, h2, output.b));

    const proto = softmax(this.prototypes.map((p) => cosineSimilarity(p, context) / PROTOTYPE_TEMPERATURE));
    const overlap = this.keywordOverlap(rawText);

    const blended = fc.map((v, i) => FEED_FORWARD_SHARE * v + PROTOTYPE_SHARE * proto[i] + KEYWORD_SHARE * overlap[i]);
    const total = blended.reduce((s, v) => s + v, 0);
    return blended.map((v) => v / total);
  }

  /** Keyword hits per intent as a distribution; all mass on neutral when nothing hits. */
  keywordOverlap(text: string): number[] {
    const scores = new Array<number>(INTENT_COUNT).fill(0);
    const lowered = text.toLowerCase();
    if (lowered.trim().length > 0) {
      this.keywords.forEach((kws, i) => {
        scores[i] = kws.filter((kw) => lowered.includes(kw)).length;
      });
    }
    const total = scores.reduce((s, v) => s + v, 0);
    if (total === 0) {
      scores[NEUTRAL_INDEX] = 1;
      return scores;
    }
    return scores.map((v) => v / total);
  }
}

function zeroDistribution(): IntentDistribution {
  return {
    urgency: 0,
    authority: 0,
    otp_request: 0,
    payment_request: 0,
    suspension: 0,
    prize_lure: 0,
    suspicious_url: 0,
    emotional: 0,
    legal_threat: 0,
    courier: 0,
    tech_support: 0,
    job_fraud: 0,
    investment: 0,
    identity_theft: 0,
    neutral: 0,
  };
}

export function toDistribution(probabilities: readonly number[]): IntentDistribution {
  const out = zeroDistribution();
  INTENT_NAMES.forEach((name, i) => {
    out[name] = probabilities[i] ?? 0;
  });
  return out;
}
