// Scam Honeypot - Configuration
// Engagement tunables with defaults, plus environment-backed service settings.

import { z } from "zod";
import { Stage, QUALITY_COUNTERS, type QualityMetrics } from "./types.js";

// ─── Engagement Tunables ────────────────────────────────────────────────────────

export interface StageGate {
  /** Stage entered when the gate is met */
  stage: Stage;
  minScore: number;
  minTurn: number;
}

export interface EngagementConfig {
  /** Cumulative score at which the scam latch closes */
  scamConfirmationThreshold: number;
  /** Flat bonus when two or more distinct categories match in one message */
  escalationBonus: number;
  /** Gates for VERIFYING..EXTRACTING, ascending */
  stageGates: StageGate[];
  /** First turn on which tactic-specific templates join the pool */
  tacticMinTurn: number;
  /** Consecutive selections of one tag after which that tag is demoted */
  maxTacticStreak: number;
  temperature: number;
  stageBonus: number;
  probeBonus: number;
  qualityTargets: QualityMetrics;
  probesEnabled: boolean;
  probeMinTurn: number;
  minReportTurns: number;
  minEngagementSeconds: number;
}

export const DEFAULT_STAGE_GATES: readonly StageGate[] = [
  { stage: Stage.VERIFYING, minScore: 20, minTurn: 2 },
  { stage: Stage.SUSPICIOUS, minScore: 45, minTurn: 3 },
  { stage: Stage.COOPERATIVE, minScore: 70, minTurn: 5 },
  { stage: Stage.EXTRACTING, minScore: 100, minTurn: 7 },
];

export const DEFAULT_QUALITY_TARGETS: QualityMetrics = {
  turns: 8,
  questionsAsked: 5,
  investigativeProbes: 3,
  redFlagAcks: 4,
  elicitationAttempts: 4,
};

export const DEFAULT_ENGAGEMENT_CONFIG: EngagementConfig = {
  scamConfirmationThreshold: 50,
  escalationBonus: 10,
  stageGates: DEFAULT_STAGE_GATES.map((g) => ({ ...g })),
  tacticMinTurn: 2,
  maxTacticStreak: 1,
  temperature: 0.6,
  stageBonus: 0.15,
  probeBonus: 1,
  qualityTargets: { ...DEFAULT_QUALITY_TARGETS },
  probesEnabled: true,
  probeMinTurn: 3,
  minReportTurns: 8,
  minEngagementSeconds: 60,
};

export type EngagementOverrides = Partial<Omit<EngagementConfig, "qualityTargets" | "stageGates">> & {
  qualityTargets?: Partial<QualityMetrics>;
  stageGates?: StageGate[];
};

type NumericKey = {
  [K in keyof EngagementConfig]: EngagementConfig[K] extends number ? K : never;
}[keyof EngagementConfig];

const NUMERIC_KEYS: readonly NumericKey[] = [
  "scamConfirmationThreshold",
  "escalationBonus",
  "tacticMinTurn",
  "maxTacticStreak",
  "temperature",
  "stageBonus",
  "probeBonus",
  "probeMinTurn",
  "minReportTurns",
  "minEngagementSeconds",
];

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Merges overrides onto the defaults. Non-finite numbers are ignored, the
 * temperature and streak limit stay positive, and stage gates are sorted by
 * stage with scores and turns forced non-decreasing.
 */
export function normalizeEngagementConfig(partial?: EngagementOverrides): EngagementConfig {
  const out: EngagementConfig = {
    ...DEFAULT_ENGAGEMENT_CONFIG,
    stageGates: DEFAULT_STAGE_GATES.map((g) => ({ ...g })),
    qualityTargets: { ...DEFAULT_QUALITY_TARGETS },
  };
  if (!partial) return out;

  for (const key of NUMERIC_KEYS) {
    out[key] = finiteOr(partial[key], out[key]);
  }
  if (typeof partial.probesEnabled === "boolean") out.probesEnabled = partial.probesEnabled;

  if (partial.qualityTargets) {
    for (const key of QUALITY_COUNTERS) {
      out.qualityTargets[key] = finiteOr(partial.qualityTargets[key], out.qualityTargets[key]);
    }
  }

  if (partial.stageGates && partial.stageGates.length > 0) {
    const sorted = [...partial.stageGates].sort((a, b) => a.stage - b.stage);
    let prevScore = 0;
    let prevTurn = 0;
    out.stageGates = sorted.map((g) => {
      const minScore = Math.max(prevScore, finiteOr(g.minScore, prevScore));
      const minTurn = Math.max(prevTurn, finiteOr(g.minTurn, prevTurn));
      prevScore = minScore;
      prevTurn = minTurn;
      return { stage: g.stage, minScore, minTurn };
    });
  }

  out.temperature = out.temperature > 0 ? out.temperature : DEFAULT_ENGAGEMENT_CONFIG.temperature;
  out.maxTacticStreak = Math.max(1, Math.floor(out.maxTacticStreak));
  return out;
}

// ─── Service Settings (environment) ─────────────────────────────────────────────

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess((v) => (v === undefined || v === "" ? undefined : v), schema.optional());

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  API_KEY: z.string().min(1, "API_KEY is required"),
  CALLBACK_URL: z.preprocess((v) => (v === "" ? undefined : v), z.string().url().optional()),
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CALLBACK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  CALLBACK_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  SCAM_CONFIRMATION_THRESHOLD: optionalNumber(z.coerce.number().positive()),
  MIN_ENGAGEMENT_SECONDS: optionalNumber(z.coerce.number().min(0)),
  RANDOM_SEED: optionalNumber(z.coerce.number().int()),
});

export interface ServiceConfig {
  port: number;
  apiKey: string;
  callbackUrl: string | null;
  callbackTimeoutMs: number;
  callbackMaxAttempts: number;
  callbackBackoffMs: number;
  sessionTtlSeconds: number;
  randomSeed: number | null;
  engagement: EngagementConfig;
}

/** Reads service settings from an environment map (normally `process.env` after dotenv has loaded). */
export function loadServiceConfig(env: Record<string, string | undefined>): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    apiKey: e.API_KEY,
    callbackUrl: e.CALLBACK_URL ?? null,
    callbackTimeoutMs: e.CALLBACK_TIMEOUT_MS,
    callbackMaxAttempts: e.CALLBACK_MAX_ATTEMPTS,
    callbackBackoffMs: e.CALLBACK_BACKOFF_MS,
    sessionTtlSeconds: e.SESSION_TTL_SECONDS,
    randomSeed: e.RANDOM_SEED ?? null,
    engagement: normalizeEngagementConfig({
      scamConfirmationThreshold: e.SCAM_CONFIRMATION_THRESHOLD,
      minEngagementSeconds: e.MIN_ENGAGEMENT_SECONDS,
    }),
  };
}
