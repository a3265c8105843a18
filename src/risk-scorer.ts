// Scam Honeypot - Risk Scorer
// Deterministic, pattern-weighted scoring of scammer messages across twenty
// signal layers. No model calls: regex rules with integer weights only.

import type { SignalLayer } from "./catalog.js";
import type { ScamType, SignalCategory, SignalMatch, TacticTag } from "./types.js";

// ─── Result Types ───────────────────────────────────────────────────────────────

export interface RiskAssessment {
  scoreDelta: number;
  /** One entry per matched layer, in layer order */
  matches: SignalMatch[];
  escalationApplied: boolean;
  /** True when a first-turn pure greeting was scored as zero */
  greetingSuppressed: boolean;
  /** Highest-weight matched category (earliest layer wins ties), null when nothing matched */
  dominantCategory: SignalCategory | null;
}

export interface ScoreOptions {
  /** Whether this is the session's first scammer turn (enables greeting suppression) */
  firstTurn: boolean;
}

const EMPTY_ASSESSMENT: RiskAssessment = {
  scoreDelta: 0,
  matches: [],
  escalationApplied: false,
  greetingSuppressed: false,
  dominantCategory: null,
};

// ─── Scorer ─────────────────────────────────────────────────────────────────────

export class RiskScorer {
  private readonly layers: readonly SignalLayer[];
  private readonly greetings: readonly RegExp[];
  private readonly escalationBonus: number;

  constructor(layers: readonly SignalLayer[], greetings: readonly RegExp[], escalationBonus: number) {
    this.layers = layers;
    this.greetings = greetings;
    this.escalationBonus = escalationBonus;
  }

  /**
   * Scores one message. Each layer contributes only its single highest
   * matching weight; layers sum; a flat escalation bonus is added when two or
   * more distinct categories match.
   */
  scoreMessage(text: string, options: ScoreOptions): RiskAssessment {
    const trimmed = text.trim();
    if (trimmed.length === 0) return { ...EMPTY_ASSESSMENT, matches: [] };

    if (options.firstTurn && this.isPureGreeting(trimmed)) {
      return { ...EMPTY_ASSESSMENT, matches: [], greetingSuppressed: true };
    }

    const matches: SignalMatch[] = [];
    for (const layer of this.layers) {
      const best = this.bestRule(layer, trimmed);
      if (best) {
        matches.push({
          layerId: layer.id,
          category: layer.category,
          weight: best.weight,
          pattern: best.source,
        });
      }
    }

    const layerTotal = matches.reduce((sum, m) => sum + m.weight, 0);
    const distinct = new Set(matches.map((m) => m.category)).size;
    const escalationApplied = distinct >= 2;

    let dominant: SignalMatch | null = null;
    for (const m of matches) {
      if (!dominant || m.weight > dominant.weight) dominant = m;
    }

    return {
      scoreDelta: layerTotal + (escalationApplied ? this.escalationBonus : 0),
      matches,
      escalationApplied,
      greetingSuppressed: false,
      dominantCategory: dominant ? dominant.category : null,
    };
  }

  isPureGreeting(text: string): boolean {
    return this.greetings.some((g) => g.test(text));
  }

  private bestRule(layer: SignalLayer, text: string): { weight: number; source: string } | null {
    let best: { weight: number; source: string } | null = null;
    for (const rule of layer.rules) {
      if (rule.weight > (best?.weight ?? 0) && rule.regex.test(text)) {
        best = { weight: rule.weight, source: rule.source };
      }
    }
    return best;
  }
}

// ─── Session-Level Helpers ──────────────────────────────────────────────────────

/** Monotone in the cumulative score, 0 at zero, never above 99. */
export function confidencePercent(cumulativeScore: number): number {
  if (!(cumulativeScore > 0)) return 0;
  return Math.min(99, Math.floor((99 * cumulativeScore) / (cumulativeScore + 40)));
}

/**
 * Most specific scam label for the categories seen so far in a session.
 * Order matters: distinctive lures first, generic banking signals last.
 */
const SCAM_TYPE_PRIORITY: ReadonlyArray<[ScamType, readonly SignalCategory[]]> = [
  ["courier", ["courier_lure"]],
  ["investment", ["investment"]],
  ["tech_support", ["tech_support"]],
  ["job_fraud", ["job_loan_lure"]],
  ["upi_fraud", ["upi_handle"]],
  ["lottery", ["prize_lure"]],
  ["impersonation", ["authority", "digital_arrest", "legal_threat"]],
  ["phishing", ["otp_request", "phishing_link", "identity_document"]],
  ["bank_fraud", ["account_suspension", "payment_request", "bank_detail_request"]],
];

export function classifyScamType(categories: Iterable<SignalCategory>): ScamType {
  const seen = new Set(categories);
  for (const [label, triggers] of SCAM_TYPE_PRIORITY) {
    if (triggers.some((c) => seen.has(c))) return label;
  }
  return "unknown";
}

/** Reply family that answers a category. Categories without one get no tactic templates. */
export const CATEGORY_TACTICS: Readonly<Record<SignalCategory, TacticTag | null>> = {
  urgency: "stall",
  authority: "threat",
  otp_request: "otp",
  payment_request: "payment",
  account_suspension: "stall",
  legal_threat: "threat",
  phishing_link: "tech",
  courier_lure: "courier",
  job_loan_lure: "lure",
  digital_arrest: "threat",
  identity_document: "account",
  bank_detail_request: "account",
  prize_lure: "lure",
  emotional_pressure: "stall",
  tech_support: "tech",
  investment: "lure",
  upi_handle: "payment",
  contact_redirect: null,
  compound_script: null,
  regional_language: null,
};

export function tacticForCategory(category: SignalCategory | null): TacticTag | null {
  return category === null ? null : CATEGORY_TACTICS[category];
}
