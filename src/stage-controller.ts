// Scam Honeypot - Stage Controller
// Drives one scammer turn end to end: risk scoring, the scam latch, stage
// progression, candidate pool assembly, probe injection, neural ranking and
// quality bookkeeping. Never throws; every turn yields a reply.

import { loadCatalog, type Catalog, type ReplyTemplate } from "./catalog.js";
import { normalizeEngagementConfig, type EngagementConfig, type EngagementOverrides, type StageGate } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import type { NetworkWeights } from "./network-weights.js";
import { QualityTracker, type BuiltProbe } from "./quality-tracker.js";
import { ResponseRanker, type RankingOutcome } from "./response-ranker.js";
import {
  RiskScorer,
  classifyScamType,
  confidencePercent,
  tacticForCategory,
  type RiskAssessment,
} from "./risk-scorer.js";
import {
  STAGE_KEYS,
  STAGE_ORDER,
  Stage,
  TACTIC_TAGS,
  type CandidateResponse,
  type Logger,
  type ResponseTag,
  type SessionState,
  type StageKey,
  type TacticTag,
  type TurnAnalysis,
  type TurnResult,
} from "./types.js";
import { type RandomSource } from "./utils.js";

// ─── Stage Transitions ──────────────────────────────────────────────────────────

export interface StageTransition {
  stage: Stage;
  /** True when the gates pointed below the current stage and the stage was held */
  regressionClamped: boolean;
}

/**
 * Highest stage whose gate is met, advanced at most one step from `current`
 * and never moved backwards.
 */
export function nextStage(current: Stage, score: number, turn: number, gates: readonly StageGate[]): StageTransition {
  let target = Stage.CONFUSED;
  for (const gate of gates) {
    if (score >= gate.minScore && turn >= gate.minTurn && gate.stage > target) target = gate.stage;
  }
  if (target < current) return { stage: current, regressionClamped: true };
  if (target === current) return { stage: current, regressionClamped: false };
  const idx = STAGE_ORDER.indexOf(current);
  return { stage: STAGE_ORDER[Math.min(idx + 1, STAGE_ORDER.length - 1)], regressionClamped: false };
}

// ─── Controller ─────────────────────────────────────────────────────────────────

export interface StageControllerDeps {
  catalog?: Catalog;
  config?: EngagementOverrides;
  /** Source for the ranking draw. Defaults to Math.random. */
  random?: RandomSource;
  clock?: () => number;
  logger?: Logger;
  weights?: NetworkWeights;
}

const FALLBACK_REPLY = "Sorry, I did not understand. Can you please say that again?";

function toCandidate(template: ReplyTemplate, stage: Stage | null, tactic: ResponseTag, embed: (t: string) => number[]): CandidateResponse {
  return {
    id: template.id,
    text: template.text,
    stage,
    tactic,
    theme: template.theme,
    embedding: embed(template.text),
  };
}

export class StageController {
  readonly config: EngagementConfig;
  private readonly scorer: RiskScorer;
  private readonly ranker: ResponseRanker;
  private readonly tracker: QualityTracker;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly stageCandidates: Record<StageKey, CandidateResponse[]>;
  private readonly tacticCandidates: Map<TacticTag, CandidateResponse[]>;

  constructor(deps: StageControllerDeps = {}) {
    const catalog = deps.catalog ?? loadCatalog();
    this.config = normalizeEngagementConfig(deps.config);
    this.logger = deps.logger ?? createConsoleLogger("StageController");
    this.random = deps.random ?? Math.random;
    this.clock = deps.clock ?? Date.now;

    this.scorer = new RiskScorer(catalog.layers, catalog.greetings, this.config.escalationBonus);
    this.ranker = new ResponseRanker({
      lexicon: catalog.intents,
      config: this.config,
      weights: deps.weights,
      logger: this.logger,
    });
    this.tracker = new QualityTracker(catalog.probes, this.config);

    const embed = (text: string) => this.ranker.embed(text);
    const stageList = (stage: Stage) =>
      catalog.stageTemplates[STAGE_KEYS[stage]].map((t) => toCandidate(t, stage, "general", embed));
    this.stageCandidates = {
      confused: stageList(Stage.CONFUSED),
      verifying: stageList(Stage.VERIFYING),
      suspicious: stageList(Stage.SUSPICIOUS),
      cooperative: stageList(Stage.COOPERATIVE),
      extracting: stageList(Stage.EXTRACTING),
    };
    this.tacticCandidates = new Map();
    for (const tag of TACTIC_TAGS) {
      const list = catalog.tacticTemplates[tag];
      if (list) this.tacticCandidates.set(tag, list.map((t) => toCandidate(t, null, tag, embed)));
    }
  }

  /**
   * Processes one scammer message against a session snapshot and returns the
   * reply with the updated snapshot. The input session is not mutated.
   */
  processTurn(session: SessionState, messageText: string): TurnResult {
    const now = this.clock();
    try {
      return this.runTurn(structuredClone(session), typeof messageText === "string" ? messageText : "", now);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Turn failed for session ${session.sessionId}: ${reason}`);
      const next = structuredClone(session);
      next.turnIndex += 1;
      next.lastActivityAt = now;
      next.qualityMetrics.turns += 1;
      return {
        reply: FALLBACK_REPLY,
        session: next,
        scamConfirmed: next.scamConfirmed,
        readyToReport: false,
        diagnostics: [`turn-failed: ${reason}`],
        analysis: {
          scoreDelta: 0,
          matches: [],
          escalationApplied: false,
          confidence: confidencePercent(next.cumulativeRiskScore),
          tactic: null,
          intents: null,
          ranking: [],
          probeInjected: false,
          chosenResponseId: "fallback",
        },
      };
    }
  }

  private runTurn(next: SessionState, text: string, now: number): TurnResult {
    const diagnostics: string[] = [];
    next.turnIndex += 1;
    next.lastActivityAt = now;

    const assessment = this.scorer.scoreMessage(text, { firstTurn: next.turnIndex === 1 });
    const tactic = this.applyAssessment(next, assessment);

    const transition = nextStage(next.stage, next.cumulativeRiskScore, next.turnIndex, this.config.stageGates);
    if (transition.regressionClamped) {
      diagnostics.push("stage-regression-clamped");
      this.logger.warn(`Stage regression clamped for session ${next.sessionId} at ${STAGE_KEYS[next.stage]}`);
    }
    next.stage = transition.stage;

    this.tracker.beginTurn(next);

    const neutral = text.trim().length === 0;
    let outcome: RankingOutcome;
    let probe: BuiltProbe | null = null;

    if (neutral) {
      diagnostics.push("neutral-turn");
      const pool = this.filteredPool(next, Stage.CONFUSED, null, diagnostics);
      const chosen = pool[Math.min(pool.length - 1, Math.floor(this.random() * pool.length))];
      outcome = {
        chosen,
        ranking: pool.map((c) => ({ responseId: c.id, score: 0, probability: 1 / pool.length })),
        hiddenState: next.hiddenState,
        intents: null,
        degraded: false,
        failureReason: null,
      };
    } else {
      const usableTactic = next.turnIndex >= this.config.tacticMinTurn ? tactic : null;
      const candidates = this.filteredPool(next, next.stage, usableTactic, diagnostics);

      const streak = next.tacticStreak;
      const demoted = streak.tag !== null && streak.count >= this.config.maxTacticStreak ? streak.tag : null;

      // A probe streak at the limit holds this turn's probe back.
      if (demoted === "probe") diagnostics.push("probe-deferred");
      else probe = this.tracker.buildProbe(next);
      if (probe) {
        candidates.push({
          id: `probe-t${next.turnIndex}`,
          text: probe.text,
          stage: null,
          tactic: "probe",
          theme: "probe",
          embedding: this.ranker.embed(probe.text),
        });
      }

      outcome = this.ranker.rank(
        { messageText: text, stage: next.stage, tactic, lastTheme: next.lastTheme, hiddenState: next.hiddenState },
        candidates,
        this.random,
        demoted,
      );
      if (outcome.degraded) diagnostics.push(`ranker-fallback: ${outcome.failureReason ?? "unknown"}`);
    }

    const chosen = outcome.chosen;
    next.hiddenState = outcome.hiddenState;
    if (chosen.tactic !== "probe" && !next.usedResponseIds.includes(chosen.id)) next.usedResponseIds.push(chosen.id);
    next.tacticStreak =
      next.tacticStreak.tag === chosen.tactic
        ? { tag: chosen.tactic, count: next.tacticStreak.count + 1 }
        : { tag: chosen.tactic, count: 1 };
    next.lastTheme = chosen.theme;
    this.tracker.recordReply(next, chosen, probe && chosen.tactic === "probe" ? probe.composition : null);

    const analysis: TurnAnalysis = {
      scoreDelta: assessment.scoreDelta,
      matches: assessment.matches,
      escalationApplied: assessment.escalationApplied,
      confidence: confidencePercent(next.cumulativeRiskScore),
      tactic,
      intents: outcome.intents,
      ranking: outcome.ranking,
      probeInjected: probe !== null,
      chosenResponseId: chosen.id,
    };

    this.logger.debug?.(
      `Session ${next.sessionId} turn ${next.turnIndex}: +${assessment.scoreDelta} → ${next.cumulativeRiskScore}, ` +
        `stage ${STAGE_KEYS[next.stage]}, reply ${chosen.id}`,
    );

    return {
      reply: chosen.text,
      session: next,
      scamConfirmed: next.scamConfirmed,
      readyToReport: this.tracker.isReady(next, now),
      diagnostics,
      analysis,
    };
  }

  /**
   * Folds earlier scammer messages into a session that has not had a turn
   * yet: scores them, records their categories and closes the latch when the
   * total warrants it. Turn count, stage and reply bookkeeping are untouched.
   */
  primeFromHistory(session: SessionState, messages: readonly string[]): { session: SessionState; assessments: RiskAssessment[] } {
    const next = structuredClone(session);
    const assessments = messages.map((text) => {
      const assessment = this.scorer.scoreMessage(text, { firstTurn: false });
      this.applyAssessment(next, assessment);
      return assessment;
    });
    return { session: next, assessments };
  }

  /** Adds a scored message to the session and returns the tactic it implies. */
  private applyAssessment(next: SessionState, assessment: RiskAssessment): TacticTag | null {
    next.cumulativeRiskScore += assessment.scoreDelta;
    for (const m of assessment.matches) {
      if (!next.triggeredCategories.includes(m.category)) next.triggeredCategories.push(m.category);
    }
    if (next.cumulativeRiskScore >= this.config.scamConfirmationThreshold) next.scamConfirmed = true;
    next.scamType = classifyScamType(next.triggeredCategories);

    const tactic = tacticForCategory(assessment.dominantCategory);
    if (tactic !== null && !next.observedTactics.includes(tactic)) next.observedTactics.push(tactic);
    return tactic;
  }

  /**
   * Stage set plus the tactic set, minus replies already used. When nothing
   * is left, only the stage's own ids are released and the pool is rebuilt.
   */
  private filteredPool(session: SessionState, stage: Stage, tactic: TacticTag | null, diagnostics: string[]): CandidateResponse[] {
    const stageSet = this.stageCandidates[STAGE_KEYS[stage]];
    const tacticSet = tactic !== null ? (this.tacticCandidates.get(tactic) ?? []) : [];
    const build = () => {
      const used = new Set(session.usedResponseIds);
      return [...stageSet, ...tacticSet].filter((c) => !used.has(c.id));
    };

    const pool = build();
    if (pool.length > 0) return pool;

    const stageIds = new Set(stageSet.map((c) => c.id));
    session.usedResponseIds = session.usedResponseIds.filter((id) => !stageIds.has(id));
    diagnostics.push(`pool-reset:${STAGE_KEYS[stage]}`);
    return build();
  }
}

// ─── Module-Level Entry Point ───────────────────────────────────────────────────

let shared: StageController | null = null;

/** `StageController#processTurn` on a process-wide controller with default settings. */
export function processTurn(session: SessionState, messageText: string): TurnResult {
  if (!shared) shared = new StageController();
  return shared.processTurn(session, messageText);
}
