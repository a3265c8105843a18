// Scam Honeypot - Response Ranker
// encode → attend → recur → classify → score → sample.
//
// Each candidate reply is scored by a fixed 345→128→64→1 network over the
// message context, the reply's own encoding, the session hidden state, the
// intent distribution and ten hand-crafted features. A stage-aware bonus is
// added, then one reply is drawn from softmax(score / τ). Any failure or
// non-finite value drops to a uniform draw and leaves the hidden state alone.

import { ContextualEncoder } from "./attention.js";
import type { IntentLexicon } from "./catalog.js";
import type { EngagementConfig } from "./config.js";
import { ConversationState } from "./conversation-state.js";
import { IntentClassifier, toDistribution } from "./intent-classifier.js";
import { createConsoleLogger } from "./logger.js";
import { HAND_FEATURE_COUNT, defaultWeights, type NetworkWeights } from "./network-weights.js";
import { MessageEncoder } from "./text-encoder.js";
import {
  Stage,
  type CandidateResponse,
  type IntentDistribution,
  type Logger,
  type RankedChoice,
  type ResponseTag,
  type ResponseTheme,
  type TacticTag,
} from "./types.js";
import { allFinite, gelu, matVec, sampleIndex, sigmoid, softmax, type RandomSource, type Vector } from "./utils.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface RankingContext {
  messageText: string;
  stage: Stage;
  tactic: TacticTag | null;
  lastTheme: ResponseTheme | null;
  hiddenState: Vector;
}

export interface RankingOutcome {
  chosen: CandidateResponse;
  /** Every candidate, best first. Candidates outside the sampling window get probability 0. */
  ranking: RankedChoice[];
  hiddenState: Vector;
  intents: IntentDistribution | null;
  degraded: boolean;
  failureReason: string | null;
}

export interface MessageAnalysis {
  context: Vector;
  hiddenState: Vector;
  intents: number[];
}

export interface ResponseRankerDeps {
  lexicon: IntentLexicon;
  config: EngagementConfig;
  weights?: NetworkWeights;
  logger?: Logger;
}

// ─── Stage Bonus ────────────────────────────────────────────────────────────────

const FAVOURED_THEME: Record<Stage, ResponseTheme> = {
  [Stage.CONFUSED]: "confusion",
  [Stage.VERIFYING]: "confusion",
  [Stage.SUSPICIOUS]: "probing",
  [Stage.COOPERATIVE]: "probing",
  [Stage.EXTRACTING]: "extraction",
};

export function favouredTheme(stage: Stage): ResponseTheme {
  return FAVOURED_THEME[stage];
}

// ─── Hand-Crafted Features ──────────────────────────────────────────────────────

function wordsOf(lowered: string): string[] {
  return lowered.split(/[^a-z']+/).filter((w) => w.length > 0);
}

function lengthFitness(wordCount: number): number {
  if (wordCount >= 12 && wordCount <= 30) return 1;
  if (wordCount >= 8 && wordCount <= 35) return 0.7;
  return 0.3;
}

/**
 * [stage match, tactic match, recency, length fitness, question, probing,
 *  persona, stalling, compliance, hinglish]
 */
export function handFeatures(
  candidate: CandidateResponse,
  ctx: RankingContext,
  lexicon: IntentLexicon["handFeatures"],
): Vector {
  const lowered = candidate.text.toLowerCase();
  const words = wordsOf(lowered);
  const wordSet = new Set(words);
  const setHits = (list: readonly string[]) => list.filter((w) => wordSet.has(w)).length;
  const phraseHits = (list: readonly string[]) => list.filter((p) => lowered.includes(p)).length;

  const features = [
    candidate.stage === ctx.stage ? 1 : 0,
    ctx.tactic !== null && candidate.tactic === ctx.tactic ? 1 : 0,
    candidate.theme !== ctx.lastTheme ? 1 : 0,
    lengthFitness(words.length),
    candidate.text.includes("?") ? 1 : 0,
    Math.min(setHits(lexicon.probeWords) / 3, 1),
    Math.min(phraseHits(lexicon.personaWords) / 2, 1),
    Math.min(phraseHits(lexicon.stallTokens) / 2, 1),
    Math.min(setHits(lexicon.complianceWords) / 2, 1),
    Math.min(setHits(lexicon.hinglishWords) / 2, 1),
  ];
  if (features.length !== HAND_FEATURE_COUNT) {
    throw new Error(`Expected ${HAND_FEATURE_COUNT} hand features, got ${features.length}`);
  }
  return features;
}

// ─── Ranker ─────────────────────────────────────────────────────────────────────

export class ResponseRanker {
  private readonly encoder: MessageEncoder;
  private readonly contextual: ContextualEncoder;
  private readonly state: ConversationState;
  private readonly classifier: IntentClassifier;
  private readonly scorer: NetworkWeights["scorer"];
  private readonly lexicon: IntentLexicon;
  private readonly config: EngagementConfig;
  private readonly logger: Logger;

  constructor(deps: ResponseRankerDeps) {
    const weights = deps.weights ?? defaultWeights();
    this.encoder = new MessageEncoder(weights.encoder);
    this.contextual = new ContextualEncoder(weights);
    this.state = new ConversationState(weights.recurrent);
    this.classifier = new IntentClassifier(weights.intent, this.encoder, deps.lexicon);
    this.scorer = weights.scorer;
    this.lexicon = deps.lexicon;
    this.config = deps.config;
    this.logger = deps.logger ?? createConsoleLogger("ResponseRanker");
  }

  /** Encoding used for candidate replies; callers cache it per template. */
  embed(text: string): Vector {
    return this.encoder.encode(text);
  }

  /** Message context, next hidden state and intent probabilities. Throws on non-finite output. */
  analyze(messageText: string, hiddenState: Vector): MessageAnalysis {
    const context = this.contextual.contextualize(this.encoder.encode(messageText));
    const nextHidden = this.state.step(context, hiddenState);
    const intents = this.classifier.classify(context, nextHidden, messageText);
    if (!allFinite(context) || !allFinite(nextHidden) || !allFinite(intents)) {
      throw new Error("non-finite value in message analysis");
    }
    return { context, hiddenState: nextHidden, intents };
  }

  scoreCandidate(candidate: CandidateResponse, ctx: RankingContext, analysis: MessageAnalysis): number {
    const features = [
      ...analysis.context,
      ...candidate.embedding,
      ...analysis.hiddenState,
      ...analysis.intents,
      ...handFeatures(candidate, ctx, this.lexicon.handFeatures),
    ];
    const { hidden1, hidden2, output } = this.scorer;
    const h1 = matVec(hidden1.w, features, hidden1.b).map(gelu);
    const h2 = matVec(hidden2.w, h1, hidden2.b).map(gelu);
    const raw = matVec(output.w, h2, output.b)[0];

    let score = sigmoid(raw);
    if (candidate.theme === favouredTheme(ctx.stage)) score += this.config.stageBonus;
    if (candidate.tactic === "probe") score += this.config.probeBonus;
    return score;
  }

  /**
   * Ranks the pool and picks one reply. Candidates tagged `demotedTag` fall
   * behind every other candidate and are only sampled when nothing else is
   * left. An injected probe wins unless its own tag is demoted.
   */
  rank(
    ctx: RankingContext,
    candidates: readonly CandidateResponse[],
    random: RandomSource,
    demotedTag: ResponseTag | null = null,
  ): RankingOutcome {
    if (candidates.length === 0) throw new Error("Cannot rank an empty candidate pool");

    const isDemoted = (c: CandidateResponse) => demotedTag !== null && c.tactic === demotedTag;
    const preferred = candidates.filter((c) => !isDemoted(c));
    const window = preferred.length > 0 ? preferred : [...candidates];
    const probe = window.find((c) => c.tactic === "probe") ?? null;

    try {
      const analysis = this.analyze(ctx.messageText, ctx.hiddenState);
      const scored = candidates.map((c) => ({ candidate: c, score: this.scoreCandidate(c, ctx, analysis) }));
      if (!allFinite(scored.map((s) => s.score))) throw new Error("non-finite candidate score");

      const inWindow = new Set(window.map((c) => c.id));
      scored.sort((a, b) => {
        const wa = inWindow.has(a.candidate.id) ? 0 : 1;
        const wb = inWindow.has(b.candidate.id) ? 0 : 1;
        return wa - wb || b.score - a.score;
      });

      const windowScored = scored.filter((s) => inWindow.has(s.candidate.id));
      const probabilities = softmax(windowScored.map((s) => s.score / this.config.temperature));
      const drawn = windowScored[sampleIndex(probabilities, random)].candidate;
      const chosen = probe ?? drawn;

      const probabilityById = new Map(windowScored.map((s, i) => [s.candidate.id, probabilities[i]]));
      const ranking: RankedChoice[] = scored.map((s) => ({
        responseId: s.candidate.id,
        score: s.score,
        probability: probabilityById.get(s.candidate.id) ?? 0,
      }));

      return {
        chosen,
        ranking,
        hiddenState: analysis.hiddenState,
        intents: toDistribution(analysis.intents),
        degraded: false,
        failureReason: null,
      };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Ranking failed, falling back to uniform choice: ${reason}`);
      const uniform = 1 / window.length;
      const chosen = probe ?? window[Math.min(window.length - 1, Math.floor(random() * window.length))];
      return {
        chosen,
        ranking: window.map((c) => ({ responseId: c.id, score: 0, probability: uniform })),
        hiddenState: [...ctx.hiddenState],
        intents: null,
        degraded: true,
        failureReason: reason,
      };
    }
  }
}
