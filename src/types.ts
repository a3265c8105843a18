// Scam Honeypot - Core Types
// Shared type definitions for the engagement engine, the session store and the transport layer.

// ─── Stage State Machine ────────────────────────────────────────────────────────

/**
 * Persona posture, strictly ordered. Numeric values carry the ordering so
 * stages compare with `<` and `>`.
 */
export enum Stage {
  CONFUSED = 0,
  VERIFYING = 1,
  SUSPICIOUS = 2,
  COOPERATIVE = 3,
  EXTRACTING = 4,
}

export const STAGE_ORDER: readonly Stage[] = [
  Stage.CONFUSED,
  Stage.VERIFYING,
  Stage.SUSPICIOUS,
  Stage.COOPERATIVE,
  Stage.EXTRACTING,
];

/** Lower-case key used by the template catalog for each stage. */
export type StageKey = "confused" | "verifying" | "suspicious" | "cooperative" | "extracting";

export const STAGE_KEYS: Record<Stage, StageKey> = {
  [Stage.CONFUSED]: "confused",
  [Stage.VERIFYING]: "verifying",
  [Stage.SUSPICIOUS]: "suspicious",
  [Stage.COOPERATIVE]: "cooperative",
  [Stage.EXTRACTING]: "extracting",
};

// ─── Signals ────────────────────────────────────────────────────────────────────

export const SIGNAL_CATEGORIES = [
  "urgency",
  "authority",
  "otp_request",
  "payment_request",
  "account_suspension",
  "legal_threat",
  "phishing_link",
  "courier_lure",
  "job_loan_lure",
  "digital_arrest",
  "identity_document",
  "bank_detail_request",
  "prize_lure",
  "emotional_pressure",
  "tech_support",
  "investment",
  "upi_handle",
  "contact_redirect",
  "compound_script",
  "regional_language",
] as const;

export type SignalCategory = (typeof SIGNAL_CATEGORIES)[number];

export type LayerKind = "core" | "auxiliary";

/** One matched signal layer for a single message. Only the layer's highest weight is reported. */
export interface SignalMatch {
  layerId: string;
  category: SignalCategory;
  weight: number;
  /** Source of the winning pattern rule */
  pattern: string;
}

export type ScamType =
  | "bank_fraud"
  | "upi_fraud"
  | "phishing"
  | "impersonation"
  | "investment"
  | "courier"
  | "lottery"
  | "tech_support"
  | "job_fraud"
  | "unknown";

// ─── Tactics and Themes ─────────────────────────────────────────────────────────

export const TACTIC_TAGS = ["otp", "account", "threat", "payment", "lure", "tech", "stall", "courier"] as const;

export type TacticTag = (typeof TACTIC_TAGS)[number];

/** Tag carried by stage templates and injected probes for streak bookkeeping. */
export type ResponseTag = TacticTag | "general" | "probe";

export const TEMPLATE_THEMES = ["confusion", "probing", "extraction", "stalling", "emotional"] as const;

/** Authored templates carry one of TEMPLATE_THEMES; synthesized probes carry "probe". */
export type ResponseTheme = (typeof TEMPLATE_THEMES)[number] | "probe";

export interface CandidateResponse {
  id: string;
  text: string;
  /** Stage set the template belongs to, null for tactic templates and probes */
  stage: Stage | null;
  tactic: ResponseTag;
  theme: ResponseTheme;
  embedding: number[];
}

export interface RankedChoice {
  responseId: string;
  score: number;
  probability: number;
}

// ─── Intents ────────────────────────────────────────────────────────────────────

export const INTENT_NAMES = [
  "urgency",
  "authority",
  "otp_request",
  "payment_request",
  "suspension",
  "prize_lure",
  "suspicious_url",
  "emotional",
  "legal_threat",
  "courier",
  "tech_support",
  "job_fraud",
  "investment",
  "identity_theft",
  "neutral",
] as const;

export type IntentName = (typeof INTENT_NAMES)[number];

export type IntentDistribution = Record<IntentName, number>;

// ─── Extracted Intelligence ─────────────────────────────────────────────────────

export interface ExtractedIntelligence {
  phoneNumbers: string[];
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  emailAddresses: string[];
  ifscCodes: string[];
  governmentIds: string[];
  caseIds: string[];
  suspiciousKeywords: string[];
}

export const INTEL_KINDS = [
  "phoneNumbers",
  "bankAccounts",
  "upiIds",
  "phishingLinks",
  "emailAddresses",
  "ifscCodes",
  "governmentIds",
  "caseIds",
  "suspiciousKeywords",
] as const satisfies readonly (keyof ExtractedIntelligence)[];

export type IntelKind = (typeof INTEL_KINDS)[number];

export function emptyIntelligence(): ExtractedIntelligence {
  return {
    phoneNumbers: [],
    bankAccounts: [],
    upiIds: [],
    phishingLinks: [],
    emailAddresses: [],
    ifscCodes: [],
    governmentIds: [],
    caseIds: [],
    suspiciousKeywords: [],
  };
}

// ─── Session State ──────────────────────────────────────────────────────────────

export interface QualityMetrics {
  turns: number;
  questionsAsked: number;
  investigativeProbes: number;
  redFlagAcks: number;
  elicitationAttempts: number;
}

export type QualityCounter = keyof QualityMetrics;

export const QUALITY_COUNTERS: readonly QualityCounter[] = [
  "turns",
  "questionsAsked",
  "investigativeProbes",
  "redFlagAcks",
  "elicitationAttempts",
];

export interface TacticStreak {
  tag: ResponseTag | null;
  count: number;
}

export interface ProbeCursor {
  investigative: number;
  elicitation: number;
  redFlag: number;
  connector: number;
}

export interface SessionState {
  sessionId: string;
  /** Never decreases */
  cumulativeRiskScore: number;
  /** One-way latch */
  scamConfirmed: boolean;
  scamType: ScamType;
  stage: Stage;
  /** Scammer turns processed so far */
  turnIndex: number;
  createdAt: number;
  lastActivityAt: number;
  /** Recurrent conversation state, always 64 wide */
  hiddenState: number[];
  usedResponseIds: string[];
  tacticStreak: TacticStreak;
  qualityMetrics: QualityMetrics;
  probeCursor: ProbeCursor;
  acknowledgedRedFlags: string[];
  triggeredCategories: SignalCategory[];
  observedTactics: TacticTag[];
  lastTheme: ResponseTheme | null;
  intelligence: ExtractedIntelligence;
  /** Messages exchanged in both directions */
  messageCount: number;
  finalized: boolean;
}

// ─── Turn Output ────────────────────────────────────────────────────────────────

export interface TurnAnalysis {
  scoreDelta: number;
  matches: SignalMatch[];
  escalationApplied: boolean;
  confidence: number;
  tactic: TacticTag | null;
  intents: IntentDistribution | null;
  ranking: RankedChoice[];
  probeInjected: boolean;
  chosenResponseId: string;
}

export interface TurnResult {
  reply: string;
  session: SessionState;
  scamConfirmed: boolean;
  readyToReport: boolean;
  /** Internal notes only, never sent to the caller */
  diagnostics: string[];
  analysis: TurnAnalysis;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
}

// ─── Wire Messages ──────────────────────────────────────────────────────────────

export interface ChatMessage {
  /** "scammer" for the counterpart, anything else is treated as our own side */
  sender: string;
  text: string;
  timestamp?: string | number;
}

export interface HoneypotRequest {
  sessionId: string;
  message: ChatMessage;
  conversationHistory: ChatMessage[];
}

export interface HoneypotResponse {
  status: "success";
  reply: string;
}

/** Messages sent by a WebSocket client */
export type ClientMessage =
  | { type: "scammer_message"; text: string; sessionId?: string }
  | { type: "ping" };

/** Messages sent by the server over WebSocket */
export type ServerMessage =
  | { type: "session_started"; sessionId: string }
  | { type: "agent_reply"; sessionId: string; reply: string; scamDetected: boolean; stage: StageKey }
  | { type: "pong" }
  | { type: "error"; message: string; recoverable: boolean };
