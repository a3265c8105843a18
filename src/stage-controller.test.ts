// Unit tests for StageController

import { describe, it, expect, vi } from "vitest";
import { loadCatalog } from "./catalog.js";
import { DEFAULT_STAGE_GATES } from "./config.js";
import { generateWeights } from "./network-weights.js";
import { createSessionState } from "./session-store.js";
import { StageController, nextStage, processTurn } from "./stage-controller.js";
import { Stage, type Logger, type SessionState, type TurnResult } from "./types.js";
import { createSeededRandom } from "./utils.js";

function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const catalog = loadCatalog();
const CONFUSED_IDS = catalog.stageTemplates.confused.map((t) => t.id);

const RBI_OTP = "This is RBI. Your account will be blocked. Share OTP immediately.";
const UPI_PHONE = "Pay to refund.desk@ybl and call 9876543210";

function createController(seed = 1, clock: () => number = () => 0, logger = createSilentLogger()): StageController {
  return new StageController({ catalog, random: createSeededRandom(seed), clock, logger });
}

// ─── nextStage ──────────────────────────────────────────────────────────────────

describe("nextStage()", () => {
  it("holds CONFUSED until the turn gate is met", () => {
    expect(nextStage(Stage.CONFUSED, 95, 1, DEFAULT_STAGE_GATES)).toEqual({
      stage: Stage.CONFUSED,
      regressionClamped: false,
    });
  });

  it("advances at most one stage per turn", () => {
    expect(nextStage(Stage.CONFUSED, 500, 9, DEFAULT_STAGE_GATES).stage).toBe(Stage.VERIFYING);
    expect(nextStage(Stage.VERIFYING, 45, 3, DEFAULT_STAGE_GATES).stage).toBe(Stage.SUSPICIOUS);
  });

  it("requires score and turn together", () => {
    expect(nextStage(Stage.VERIFYING, 44, 9, DEFAULT_STAGE_GATES).stage).toBe(Stage.VERIFYING);
    expect(nextStage(Stage.VERIFYING, 400, 2, DEFAULT_STAGE_GATES).stage).toBe(Stage.VERIFYING);
  });

  it("clamps an attempted regression", () => {
    expect(nextStage(Stage.COOPERATIVE, 10, 9, DEFAULT_STAGE_GATES)).toEqual({
      stage: Stage.COOPERATIVE,
      regressionClamped: true,
    });
  });

  it("stays in EXTRACTING", () => {
    expect(nextStage(Stage.EXTRACTING, 1000, 20, DEFAULT_STAGE_GATES).stage).toBe(Stage.EXTRACTING);
  });
});

// ─── processTurn ────────────────────────────────────────────────────────────────

describe("StageController.processTurn()", () => {
  it("scores an RBI/OTP opener, confirms the scam and stays CONFUSED", () => {
    const result = createController().processTurn(createSessionState("s-1", 0), RBI_OTP);

    expect(result.analysis.scoreDelta).toBe(95);
    expect(result.analysis.escalationApplied).toBe(true);
    expect(result.analysis.matches.map((m) => m.category)).toEqual(
      expect.arrayContaining(["authority", "otp_request", "account_suspension"]),
    );
    expect(result.analysis.tactic).toBe("otp");
    expect(result.analysis.confidence).toBe(69);
    expect(result.session.stage).toBe(Stage.CONFUSED);
    expect(result.scamConfirmed).toBe(true);
    expect(result.session.scamType).toBe("impersonation");
    expect(CONFUSED_IDS).toContain(result.analysis.chosenResponseId);
    expect(catalog.stageTemplates.confused.map((t) => t.text)).toContain(result.reply);
    expect(result.readyToReport).toBe(false);
  });

  it("reaches EXTRACTING and readiness over ten payment-app and phone turns", () => {
    let now = 0;
    const controller = createController(11, () => now);
    let session = createSessionState("s-2", 0);
    const results: TurnResult[] = [];

    for (let turn = 1; turn <= 10; turn++) {
      now = turn * 10_000;
      const result = controller.processTurn(session, UPI_PHONE);
      session = result.session;
      results.push(result);
    }

    expect(results.slice(0, 2).map((r) => r.scamConfirmed)).toEqual([false, true]);
    expect(results.map((r) => r.analysis.probeInjected)).toEqual([
      false, false, true, false, true, false, true, false, true, false,
    ]);
    expect(results[3].diagnostics).toContain("probe-deferred");
    expect(session.cumulativeRiskScore).toBe(400);
    expect(session.stage).toBe(Stage.EXTRACTING);
    expect(session.scamType).toBe("upi_fraud");
    expect(session.qualityMetrics.turns).toBe(10);
    expect(session.qualityMetrics.questionsAsked).toBeGreaterThanOrEqual(5);
    expect(session.qualityMetrics.investigativeProbes).toBeGreaterThanOrEqual(3);
    expect(session.qualityMetrics.redFlagAcks).toBeGreaterThanOrEqual(4);
    expect(session.qualityMetrics.elicitationAttempts).toBeGreaterThanOrEqual(4);
    expect(session.acknowledgedRedFlags.sort()).toEqual(["contact", "payment"]);
    expect(results[9].readyToReport).toBe(true);
  });

  it("injects probes from the third turn", () => {
    const controller = createController(5);
    let session = createSessionState("s-3", 0);
    const probed: boolean[] = [];
    for (let i = 0; i < 3; i++) {
      const result = controller.processTurn(session, UPI_PHONE);
      session = result.session;
      probed.push(result.analysis.probeInjected);
    }

    expect(probed).toEqual([false, false, true]);
    expect(session.usedResponseIds.some((id) => id.startsWith("probe-"))).toBe(false);
    expect(session.tacticStreak).toEqual({ tag: "probe", count: 1 });
  });

  it("resets only the stage's ids when its pool is exhausted", () => {
    const session = createSessionState("s-4", 0);
    session.usedResponseIds = [...CONFUSED_IDS, "tactic-otp-01"];

    const result = createController().processTurn(session, "I am fine thank you");

    expect(result.diagnostics).toContain("pool-reset:confused");
    expect(CONFUSED_IDS).toContain(result.analysis.chosenResponseId);
    expect(result.session.usedResponseIds).toEqual(["tactic-otp-01", result.analysis.chosenResponseId]);
  });

  it("treats empty input as a neutral turn", () => {
    const result = createController().processTurn(createSessionState("s-5", 0), "   ");

    expect(result.diagnostics).toContain("neutral-turn");
    expect(result.analysis.scoreDelta).toBe(0);
    expect(result.analysis.intents).toBeNull();
    expect(CONFUSED_IDS).toContain(result.analysis.chosenResponseId);
    expect(result.session.turnIndex).toBe(1);
    expect(result.session.qualityMetrics.turns).toBe(1);
    expect(result.session.hiddenState).toEqual(new Array(64).fill(0));
  });

  it("does not mutate the session it was given", () => {
    const session = createSessionState("s-6", 0);
    const before = structuredClone(session);
    createController().processTurn(session, RBI_OTP);

    expect(session).toEqual(before);
  });

  it("records a clamped regression without moving the stage", () => {
    const logger = createSilentLogger();
    const session: SessionState = { ...createSessionState("s-7", 0), stage: Stage.EXTRACTING };
    const result = createController(1, () => 0, logger).processTurn(session, "hello there");

    expect(result.session.stage).toBe(Stage.EXTRACTING);
    expect(result.diagnostics).toContain("stage-regression-clamped");
    expect(logger.warn).toHaveBeenCalled();
  });

  it("keeps the scam latch closed once confirmed", () => {
    const controller = createController();
    let session = controller.processTurn(createSessionState("s-8", 0), RBI_OTP).session;
    const result = controller.processTurn(session, "ok");
    session = result.session;

    expect(result.scamConfirmed).toBe(true);
    expect(session.cumulativeRiskScore).toBe(95);
  });

  it("records a degraded ranking and still replies", () => {
    const weights = generateWeights(42);
    weights.scorer.hidden2.b[0] = Number.NaN;
    const controller = new StageController({
      catalog,
      weights,
      random: createSeededRandom(2),
      clock: () => 0,
      logger: createSilentLogger(),
    });
    const result = controller.processTurn(createSessionState("s-9", 0), RBI_OTP);

    expect(result.diagnostics).toContain("ranker-fallback: non-finite candidate score");
    expect(result.reply.length).toBeGreaterThan(0);
    expect(result.session.hiddenState).toEqual(new Array(64).fill(0));
  });

  it("answers with a fallback reply when the turn itself fails", () => {
    const logger: Logger = {
      ...createSilentLogger(),
      debug: vi.fn(() => {
        throw new Error("log sink down");
      }),
    };
    const result = createController(1, () => 0, logger).processTurn(createSessionState("s-10", 0), RBI_OTP);

    expect(result.reply).toBe("Sorry, I did not understand. Can you please say that again?");
    expect(result.diagnostics).toEqual(["turn-failed: log sink down"]);
    expect(result.session.turnIndex).toBe(1);
    expect(logger.error).toHaveBeenCalled();
  });
});

describe("StageController.primeFromHistory()", () => {
  it("scores earlier messages without taking a turn", () => {
    const session = createSessionState("s-12", 0);
    const primed = createController().primeFromHistory(session, [RBI_OTP, "ok"]);

    expect(primed.assessments.map((a) => a.scoreDelta)).toEqual([95, 0]);
    expect(primed.session.cumulativeRiskScore).toBe(95);
    expect(primed.session.scamConfirmed).toBe(true);
    expect(primed.session.observedTactics).toEqual(["otp"]);
    expect(primed.session.turnIndex).toBe(0);
    expect(primed.session.stage).toBe(Stage.CONFUSED);
    expect(session.cumulativeRiskScore).toBe(0);
  });
});

describe("processTurn()", () => {
  it("runs on a shared default controller", () => {
    const result = processTurn(createSessionState("s-11", 0), RBI_OTP);

    expect(result.analysis.scoreDelta).toBe(95);
    expect(result.reply.length).toBeGreaterThan(0);
  });
});
