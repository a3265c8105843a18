// Scam Honeypot - Quality Tracker
// Per-session engagement counters, compound probe construction and the
// readiness check that gates the final report.

import type { ProbeCatalog } from "./catalog.js";
import type { EngagementConfig } from "./config.js";
import { CATEGORY_TACTICS } from "./risk-scorer.js";
import {
  QUALITY_COUNTERS,
  Stage,
  type CandidateResponse,
  type IntelKind,
  type QualityCounter,
  type SessionState,
} from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

/** Which families a probe was assembled from. Used to credit counters once the probe is sent. */
export interface ProbeComposition {
  redFlagKey: string | null;
  investigative: boolean;
  elicitation: IntelKind | null;
}

export interface BuiltProbe {
  text: string;
  composition: ProbeComposition;
}

const GENERIC_RED_FLAG = "generic";
const CONTACT_RED_FLAG = "contact";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function lowerFirst(part: string): string {
  if (/^I\b/.test(part)) return part;
  return part.charAt(0).toLowerCase() + part.slice(1);
}

/**
 * Joins probe parts with connectors taken round-robin from `start`. A part
 * following a connector that ends in a comma continues the sentence, so its
 * first letter is lower-cased.
 */
export function joinParts(parts: readonly string[], connectors: readonly string[], start: number): { text: string; used: number } {
  let text = parts[0] ?? "";
  let used = 0;
  for (let i = 1; i < parts.length; i++) {
    const connector = connectors[(start + used) % connectors.length];
    used++;
    text += connector + (connector.trimEnd().endsWith(",") ? lowerFirst(parts[i]) : parts[i]);
  }
  return { text, used };
}

// ─── Tracker ────────────────────────────────────────────────────────────────────

export class QualityTracker {
  private readonly probes: ProbeCatalog;
  private readonly config: EngagementConfig;

  constructor(probes: ProbeCatalog, config: EngagementConfig) {
    this.probes = probes;
    this.config = config;
  }

  beginTurn(session: SessionState): void {
    session.qualityMetrics.turns += 1;
  }

  countersBelowTarget(session: SessionState): QualityCounter[] {
    const targets = this.config.qualityTargets;
    return QUALITY_COUNTERS.filter((key) => session.qualityMetrics[key] < targets[key]);
  }

  /**
   * Builds a probe for this turn: compound when two or more counters are
   * behind, a single part when one is. Null when probing is off, the session
   * is too young, or only the turn count is behind. Advances the session's
   * probe cursors.
   */
  buildProbe(session: SessionState): BuiltProbe | null {
    if (!this.config.probesEnabled) return null;
    if (session.turnIndex < this.config.probeMinTurn) return null;

    const below = new Set(this.countersBelowTarget(session));
    if (below.size === 0 || (below.size === 1 && below.has("turns"))) return null;

    const cursor = session.probeCursor;
    const parts: string[] = [];
    const composition: ProbeComposition = { redFlagKey: null, investigative: false, elicitation: null };

    if (below.has("redFlagAcks") && session.triggeredCategories.length > 0) {
      const key = this.pickRedFlagKey(session);
      const lines = this.probes.redFlags[key] ?? this.probes.redFlags[GENERIC_RED_FLAG] ?? [];
      if (lines.length > 0) {
        parts.push(lines[cursor.redFlag % lines.length]);
        composition.redFlagKey = key;
      }
      cursor.redFlag += 1;
    }

    if (below.has("investigativeProbes")) {
      parts.push(this.nextInvestigative(session));
      composition.investigative = true;
    }

    if (below.has("elicitationAttempts") && session.stage >= Stage.VERIFYING) {
      const open = this.probes.elicitation.filter((t) => session.intelligence[t.asks].length === 0);
      if (open.length > 0) {
        const template = open[cursor.elicitation % open.length];
        cursor.elicitation += 1;
        parts.push(template.text);
        composition.elicitation = template.asks;
      }
    }

    if (parts.length === 0) {
      parts.push(this.nextInvestigative(session));
      composition.investigative = true;
    }

    const joined = joinParts(parts, this.probes.connectors, cursor.connector);
    cursor.connector += joined.used;
    return { text: joined.text, composition };
  }

  /** Credits counters from the reply that was actually sent. */
  recordReply(session: SessionState, chosen: CandidateResponse, composition: ProbeComposition | null): void {
    const metrics = session.qualityMetrics;
    if (chosen.text.includes("?")) metrics.questionsAsked += 1;

    if (composition) {
      if (composition.redFlagKey !== null) {
        metrics.redFlagAcks += 1;
        if (!session.acknowledgedRedFlags.includes(composition.redFlagKey)) {
          session.acknowledgedRedFlags.push(composition.redFlagKey);
        }
      }
      if (composition.investigative) metrics.investigativeProbes += 1;
      if (composition.elicitation !== null) metrics.elicitationAttempts += 1;
      return;
    }

    if (chosen.theme === "probing") metrics.investigativeProbes += 1;
    else if (chosen.theme === "extraction") metrics.elicitationAttempts += 1;
  }

  /**
   * Every counter at target, the scam latch closed, enough turns and enough
   * wall-clock time since the session started.
   */
  isReady(session: SessionState, now: number): boolean {
    if (this.countersBelowTarget(session).length > 0) return false;
    if (!session.scamConfirmed) return false;
    if (session.turnIndex < this.config.minReportTurns) return false;
    return (now - session.createdAt) / 1000 >= this.config.minEngagementSeconds;
  }

  private nextInvestigative(session: SessionState): string {
    const list = this.probes.investigative;
    const text = list[session.probeCursor.investigative % list.length];
    session.probeCursor.investigative += 1;
    return text;
  }

  /** Red-flag keys for the categories seen so far; unacknowledged ones first. */
  private pickRedFlagKey(session: SessionState): string {
    const keys: string[] = [];
    for (const category of session.triggeredCategories) {
      let key: string = CATEGORY_TACTICS[category] ?? GENERIC_RED_FLAG;
      if (category === "contact_redirect") key = CONTACT_RED_FLAG;
      if (!(key in this.probes.redFlags)) key = GENERIC_RED_FLAG;
      if (!keys.includes(key)) keys.push(key);
    }
    const fresh = keys.filter((k) => !session.acknowledgedRedFlags.includes(k));
    const pool = fresh.length > 0 ? fresh : keys;
    return pool[session.probeCursor.redFlag % pool.length];
  }
}
