// Scam Honeypot - Session Store
// In-memory session records keyed by session id, with idle eviction, per-id
// serialisation and the one-shot finalisation latch.

import { initialHiddenState } from "./conversation-state.js";
import { createConsoleLogger } from "./logger.js";
import { Stage, emptyIntelligence, type Logger, type SessionState } from "./types.js";
import { KeyedMutex } from "./utils/keyed-mutex.js";

/** Default-initialised state for a session seen for the first time. */
export function createSessionState(sessionId: string, now: number): SessionState {
  return {
    sessionId,
    cumulativeRiskScore: 0,
    scamConfirmed: false,
    scamType: "unknown",
    stage: Stage.CONFUSED,
    turnIndex: 0,
    createdAt: now,
    lastActivityAt: now,
    hiddenState: initialHiddenState(),
    usedResponseIds: [],
    tacticStreak: { tag: null, count: 0 },
    qualityMetrics: {
      turns: 0,
      questionsAsked: 0,
      investigativeProbes: 0,
      redFlagAcks: 0,
      elicitationAttempts: 0,
    },
    probeCursor: { investigative: 0, elicitation: 0, redFlag: 0, connector: 0 },
    acknowledgedRedFlags: [],
    triggeredCategories: [],
    observedTactics: [],
    lastTheme: null,
    intelligence: emptyIntelligence(),
    messageCount: 0,
    finalized: false,
  };
}

export interface SessionStoreOptions {
  ttlSeconds?: number;
  clock?: () => number;
  logger?: Logger;
}

const DEFAULT_TTL_SECONDS = 3600;
const SWEEP_INTERVAL_MS = 60_000;

export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly mutex = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private lastSweepAt: number;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_TTL_SECONDS) * 1000;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createConsoleLogger("SessionStore");
    this.lastSweepAt = this.clock();
  }

  get(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  getOrCreate(sessionId: string): SessionState {
    const now = this.clock();
    this.maybeSweep(now);
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const created = createSessionState(sessionId, now);
    this.sessions.set(sessionId, created);
    this.logger.info(`Session created: ${sessionId}`);
    return created;
  }

  /** Replaces the stored record, e.g. with the snapshot a turn returned. */
  save(state: SessionState): void {
    this.sessions.set(state.sessionId, state);
  }

  /**
   * Runs `fn` with the session while holding the session's lock. Concurrent
   * calls for one id queue; other ids are unaffected.
   */
  withSession<T>(sessionId: string, fn: (session: SessionState) => Promise<T> | T): Promise<T> {
    return this.mutex.run(sessionId, () => fn(this.getOrCreate(sessionId)));
  }

  /**
   * Sets the finalised flag if it is not already set. Returns true for
   * exactly one caller per session.
   */
  tryFinalize(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session || session.finalized) return false;
    session.finalized = true;
    return true;
  }

  /** Evicts sessions idle longer than the TTL. Returns how many were removed. */
  sweep(now: number = this.clock()): number {
    this.lastSweepAt = now;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastActivityAt > this.ttlMs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) this.logger.info(`Evicted ${removed} idle session(s)`);
    return removed;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  private maybeSweep(now: number): void {
    if (now - this.lastSweepAt >= SWEEP_INTERVAL_MS) this.sweep(now);
  }
}
