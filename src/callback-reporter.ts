// Scam Honeypot - Result Reporter
// Builds the end-of-engagement report for a session and delivers it to the
// configured callback endpoint with a per-attempt timeout and retries.

import { createConsoleLogger } from "./logger.js";
import { confidencePercent } from "./risk-scorer.js";
import {
  INTEL_KINDS,
  STAGE_KEYS,
  type ExtractedIntelligence,
  type Logger,
  type ScamType,
  type SessionState,
} from "./types.js";

// ─── Report ─────────────────────────────────────────────────────────────────────

export interface EngagementMetrics {
  totalMessagesExchanged: number;
  engagementDurationSeconds: number;
}

export interface FinalReport {
  sessionId: string;
  scamDetected: boolean;
  scamType: ScamType;
  /** 0..1 */
  confidenceLevel: number;
  totalMessagesExchanged: number;
  extractedIntelligence: ExtractedIntelligence;
  engagementMetrics: EngagementMetrics;
  agentNotes: string;
}

function engagementSeconds(session: SessionState, now: number): number {
  return Math.max(0, Math.floor((now - session.createdAt) / 1000));
}

/** One-line summary of the engagement, sections separated by " | ". */
export function buildAgentNotes(session: SessionState, now: number): string {
  const intel = INTEL_KINDS.filter((kind) => session.intelligence[kind].length > 0).map(
    (kind) => `${session.intelligence[kind].length} ${kind}`,
  );
  return [
    `Classification: ${session.scamType} (${session.scamConfirmed ? "confirmed" : "unconfirmed"})`,
    `Signals: ${session.triggeredCategories.join(", ") || "none"}`,
    `Messages: ${session.messageCount}`,
    `Duration: ${engagementSeconds(session, now)}s`,
    `Intel: ${intel.join(", ") || "none"}`,
    `Tactics: ${session.observedTactics.join(", ") || "none"}`,
    `Stage reached: ${STAGE_KEYS[session.stage]}`,
  ].join(" | ");
}

export function buildFinalReport(session: SessionState, now: number): FinalReport {
  return {
    sessionId: session.sessionId,
    scamDetected: session.scamConfirmed,
    scamType: session.scamType,
    confidenceLevel: confidencePercent(session.cumulativeRiskScore) / 100,
    totalMessagesExchanged: session.messageCount,
    extractedIntelligence: structuredClone(session.intelligence),
    engagementMetrics: {
      totalMessagesExchanged: session.messageCount,
      engagementDurationSeconds: engagementSeconds(session, now),
    },
    agentNotes: buildAgentNotes(session, now),
  };
}

// ─── Delivery ───────────────────────────────────────────────────────────────────

export class CallbackDeliveryError extends Error {
  readonly sessionId: string;
  readonly attempts: number;

  constructor(sessionId: string, attempts: number, reason: string) {
    super(`Report for session ${sessionId} not delivered after ${attempts} attempt(s): ${reason}`);
    this.name = "CallbackDeliveryError";
    this.sessionId = sessionId;
    this.attempts = attempts;
  }
}

export interface CallbackRequest {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

/** The part of `fetch` the reporter uses. */
export type FetchLike = (url: string, init: CallbackRequest) => Promise<{ ok: boolean; status: number }>;

export interface DeliveryResult {
  delivered: boolean;
  attempts: number;
  /** Last HTTP status seen, null when no response arrived */
  status: number | null;
  error: CallbackDeliveryError | null;
}

export interface CallbackReporterOptions {
  url: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  maxAttempts?: number;
  /** First retry delay; doubles on each further attempt */
  backoffMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class CallbackReporter {
  private readonly url: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: CallbackReporterOptions) {
    this.url = options.url;
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = options.backoffMs ?? 500;
    this.logger = options.logger ?? createConsoleLogger("CallbackReporter");
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Delivers the report. Failures are logged and reported in the result, never thrown. */
  async send(report: FinalReport): Promise<DeliveryResult> {
    const body = JSON.stringify(report);
    let status: number | null = null;
    let reason = "no attempt made";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.post(body);
        status = response.status;
        if (response.ok) {
          this.logger.info(`Report delivered for session ${report.sessionId} (HTTP ${status})`);
          return { delivered: true, attempts: attempt, status, error: null };
        }
        reason = `HTTP ${status}`;
        if (!isRetryableStatus(status)) {
          const error = new CallbackDeliveryError(report.sessionId, attempt, `rejected with ${reason}`);
          this.logger.error(error.message);
          return { delivered: false, attempts: attempt, status, error };
        }
      } catch (err) {
        reason = err instanceof Error ? err.message : String(err);
      }

      this.logger.warn(`Report attempt ${attempt}/${this.maxAttempts} for session ${report.sessionId} failed: ${reason}`);
      if (attempt < this.maxAttempts) await this.sleep(this.backoffMs * 2 ** (attempt - 1));
    }

    const error = new CallbackDeliveryError(report.sessionId, this.maxAttempts, reason);
    this.logger.error(error.message);
    return { delivered: false, attempts: this.maxAttempts, status, error };
  }

  private async post(body: string): Promise<{ ok: boolean; status: number }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchFn(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) throw new Error(`timed out after ${this.timeoutMs} ms`);
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
