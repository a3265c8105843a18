// Scam Honeypot - Text Encoder
// Character-trigram and word-bigram feature hashing into a fixed 128-d vector.
// No vocabulary and no training: identical text always encodes identically.

import { EMBED_DIM, type DenseLayer } from "./network-weights.js";
import { fnv1a, matVec, normalize, relu, type Vector } from "./utils.js";

const HALF = EMBED_DIM / 2;

const CHAR_INDEX_SEED = 0xc3a5;
const CHAR_SIGN_SEED = 0xb7e1;
const WORD_INDEX_SEED = 0xa1b2;
const WORD_SIGN_SEED = 0xd4f5;

function addHashed(target: Vector, token: string, indexSeed: number, signSeed: number): void {
  const idx = fnv1a(token, indexSeed) % HALF;
  const sign = (fnv1a(token, signSeed) & 1) === 0 ? 1 : -1;
  target[idx] += sign;
}

/**
 * Raw hashed features: 64 buckets of character trigrams over the padded,
 * lower-cased text followed by 64 buckets of word unigrams and bigrams.
 * Each half is L2-normalised on its own.
 */
export function hashFeatures(text: string): Vector {
  const charVec = new Array<number>(HALF).fill(0);
  const wordVec = new Array<number>(HALF).fill(0);
  const lowered = text.toLowerCase().trim();

  const padded = ` ${lowered} `;
  for (let i = 0; i + 3 <= padded.length; i++) {
    addHashed(charVec, padded.slice(i, i + 3), CHAR_INDEX_SEED, CHAR_SIGN_SEED);
  }

  const words = lowered.split(/\s+/).filter((w) => w.length > 0);
  for (const w of words) addHashed(wordVec, w, WORD_INDEX_SEED, WORD_SIGN_SEED);
  for (let i = 0; i + 1 < words.length; i++) {
    addHashed(wordVec, `${words[i]}_${words[i + 1]}`, WORD_INDEX_SEED, WORD_SIGN_SEED);
  }

  return [...normalize(charVec), ...normalize(wordVec)];
}

export class MessageEncoder {
  private readonly projection: DenseLayer;

  constructor(projection: DenseLayer) {
    this.projection = projection;
  }

  /** Hashed features through a fixed ReLU projection. */
  encode(text: string): Vector {
    return matVec(this.projection.w, hashFeatures(text), this.projection.b).map(relu);
  }
}
