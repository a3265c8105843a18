// Scam Honeypot - Session Manager
// Per-request orchestration: session lookup under the session lock, history
// priming, entity extraction, the engagement turn and the one-shot report.

import { v4 as uuidv4 } from "uuid";
import { CallbackReporter, buildFinalReport, type DeliveryResult } from "./callback-reporter.js";
import { EntityExtractor, mergeIntelligence } from "./entity-extractor.js";
import { createConsoleLogger } from "./logger.js";
import { SessionStore } from "./session-store.js";
import { StageController } from "./stage-controller.js";
import type { ChatMessage, HoneypotRequest, Logger, SessionState, Stage } from "./types.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  store?: SessionStore;
  controller?: StageController;
  extractor?: EntityExtractor;
  /** Omit to disable reporting */
  reporter?: CallbackReporter | null;
  clock?: () => number;
  logger?: Logger;
}

export interface HandledMessage {
  sessionId: string;
  reply: string;
  scamDetected: boolean;
  stage: Stage;
  readyToReport: boolean;
  /** Delivery started by this message, null when none was started */
  report: Promise<DeliveryResult> | null;
}

function isScammer(message: ChatMessage): boolean {
  return message.sender.trim().toLowerCase() === "scammer";
}

function addKeywords(session: SessionState, keywords: readonly string[]): void {
  for (const keyword of keywords) {
    if (!session.intelligence.suspiciousKeywords.includes(keyword)) session.intelligence.suspiciousKeywords.push(keyword);
  }
}

export class SessionManager {
  private readonly store: SessionStore;
  private readonly controller: StageController;
  private readonly extractor: EntityExtractor;
  private readonly reporter: CallbackReporter | null;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(deps: SessionManagerDeps = {}) {
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.store = deps.store ?? new SessionStore({ clock: this.clock, logger: this.logger });
    this.controller = deps.controller ?? new StageController({ clock: this.clock, logger: this.logger });
    this.extractor = deps.extractor ?? new EntityExtractor();
    this.reporter = deps.reporter ?? null;
  }

  /** Fresh id for a conversation that did not bring its own. */
  createSessionId(): string {
    return uuidv4();
  }

  get sessionCount(): number {
    return this.store.size();
  }

  /**
   * Processes one inbound message. Only scammer messages run a turn; requests
   * for the same session run one at a time and the final report is started at
   * most once per session.
   */
  handleMessage(request: HoneypotRequest): Promise<HandledMessage> {
    return this.store.withSession(request.sessionId, (session) => this.handleLocked(session, request));
  }

  private handleLocked(stored: SessionState, request: HoneypotRequest): HandledMessage {
    if (!isScammer(request.message)) return this.recordOwnMessage(stored, request.message);

    let session = stored;
    if (session.turnIndex === 0 && request.conversationHistory.length > 0) {
      session = this.primeFromHistory(session, request.conversationHistory);
    } else {
      session = structuredClone(session);
    }

    const text = request.message.text;
    mergeIntelligence(session.intelligence, this.extractor.extract(text));

    const result = this.controller.processTurn(session, text);
    const next = result.session;
    addKeywords(next, this.extractor.keywordsFor(text, result.analysis.matches));
    next.messageCount += 2;
    this.store.save(next);

    let report: Promise<DeliveryResult> | null = null;
    if (result.readyToReport && this.reporter && this.store.tryFinalize(next.sessionId)) {
      report = this.sendReport(this.reporter, next);
    }

    return {
      sessionId: next.sessionId,
      reply: result.reply,
      scamDetected: result.scamConfirmed,
      stage: next.stage,
      readyToReport: result.readyToReport,
      report,
    };
  }

  /** Counts a message from our own side without scoring it or producing a reply. */
  private recordOwnMessage(stored: SessionState, message: ChatMessage): HandledMessage {
    const next = structuredClone(stored);
    next.messageCount += 1;
    this.store.save(next);
    this.logger.debug?.(`Session ${next.sessionId}: message from "${message.sender}" recorded without a turn`);
    return {
      sessionId: next.sessionId,
      reply: "",
      scamDetected: next.scamConfirmed,
      stage: next.stage,
      readyToReport: false,
      report: null,
    };
  }

  /** Scores and mines the scammer side of a history the caller sent with its first request. */
  private primeFromHistory(session: SessionState, history: readonly ChatMessage[]): SessionState {
    const texts = history.filter(isScammer).map((m) => m.text);
    const primed = this.controller.primeFromHistory(session, texts);
    const next = primed.session;
    texts.forEach((text, i) => {
      mergeIntelligence(next.intelligence, this.extractor.extract(text));
      addKeywords(next, this.extractor.keywordsFor(text, primed.assessments[i].matches));
    });
    next.messageCount = history.length;
    this.logger.info(
      `Session ${next.sessionId} primed from ${history.length} history message(s), score ${next.cumulativeRiskScore}`,
    );
    return next;
  }

  private sendReport(reporter: CallbackReporter, session: SessionState): Promise<DeliveryResult> {
    this.logger.info(`Session ${session.sessionId} ready to report, sending final result`);
    return reporter.send(buildFinalReport(session, this.clock())).catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Report for session ${session.sessionId} failed: ${reason}`);
      return { delivered: false, attempts: 0, status: null, error: null };
    });
  }
}
