// Unit tests for ResponseRanker

import { describe, it, expect, vi } from "vitest";
import { loadCatalog } from "./catalog.js";
import { normalizeEngagementConfig } from "./config.js";
import { initialHiddenState } from "./conversation-state.js";
import { generateWeights } from "./network-weights.js";
import { ResponseRanker, favouredTheme, handFeatures, type RankingContext } from "./response-ranker.js";
import { Stage, type CandidateResponse, type Logger, type ResponseTag, type ResponseTheme } from "./types.js";
import { createSeededRandom } from "./utils.js";

function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const catalog = loadCatalog();
const config = normalizeEngagementConfig();
const ranker = new ResponseRanker({ lexicon: catalog.intents, config, logger: createSilentLogger() });

function candidate(id: string, text: string, tactic: ResponseTag, theme: ResponseTheme, stage: Stage | null = null): CandidateResponse {
  return { id, text, stage, tactic, theme, embedding: ranker.embed(text) };
}

function context(overrides: Partial<RankingContext> = {}): RankingContext {
  return {
    messageText: "This is RBI. Share OTP immediately.",
    stage: Stage.VERIFYING,
    tactic: "otp",
    lastTheme: null,
    hiddenState: initialHiddenState(),
    ...overrides,
  };
}

const POOL: CandidateResponse[] = [
  candidate("a", "Sorry, who is this? Which bank are you calling from?", "general", "confusion", Stage.VERIFYING),
  candidate("b", "Why does the bank need my OTP? The SMS says never share it.", "otp", "probing"),
  candidate("c", "Wait, the message disappeared. Can you send it again?", "otp", "stalling"),
  candidate("d", "What is your employee ID and branch?", "general", "probing", Stage.VERIFYING),
];

describe("handFeatures()", () => {
  it("computes the ten scalar features", () => {
    const c = candidate(
      "x",
      "Okay beta, wait, what is your employee ID and phone number?",
      "general",
      "probing",
      Stage.VERIFYING,
    );
    const features = handFeatures(c, context({ lastTheme: "probing" }), catalog.intents.handFeatures);

    expect(features).toEqual([1, 0, 0, 0.7, 1, 1, 0, 0.5, 0.5, 0.5]);
  });

  it("flags tactic matches and theme changes", () => {
    const c = candidate("y", "OTP?", "otp", "stalling");
    const features = handFeatures(c, context({ lastTheme: "probing" }), catalog.intents.handFeatures);

    expect(features.slice(0, 5)).toEqual([0, 1, 1, 0.3, 1]);
  });
});

describe("favouredTheme()", () => {
  it("moves from confusion through probing to extraction", () => {
    expect(favouredTheme(Stage.CONFUSED)).toBe("confusion");
    expect(favouredTheme(Stage.VERIFYING)).toBe("confusion");
    expect(favouredTheme(Stage.COOPERATIVE)).toBe("probing");
    expect(favouredTheme(Stage.EXTRACTING)).toBe("extraction");
  });
});

describe("ResponseRanker", () => {
  it("returns a probability for every candidate, summing to 1", () => {
    const outcome = ranker.rank(context(), POOL, createSeededRandom(1));

    expect(outcome.degraded).toBe(false);
    expect(outcome.ranking).toHaveLength(POOL.length);
    const total = outcome.ranking.reduce((s, r) => s + r.probability, 0);
    expect(total).toBeCloseTo(1, 10);
    for (let i = 1; i < outcome.ranking.length; i++) {
      expect(outcome.ranking[i - 1].score).toBeGreaterThanOrEqual(outcome.ranking[i].score);
    }
  });

  it("adds the stage bonus to themes favoured by the stage", () => {
    const ctx = context();
    const analysis = ranker.analyze(ctx.messageText, ctx.hiddenState);
    const confusion = candidate("p", "Same words here?", "general", "confusion");
    const probing = { ...confusion, id: "q", theme: "probing" as const };

    // lastTheme is null, so both candidates share every hand feature
    const diff = ranker.scoreCandidate(confusion, ctx, analysis) - ranker.scoreCandidate(probing, ctx, analysis);
    expect(diff).toBeCloseTo(0.15, 10);
  });

  it("is reproducible under a fixed seed", () => {
    const first = ranker.rank(context(), POOL, createSeededRandom(99));
    const second = ranker.rank(context(), POOL, createSeededRandom(99));

    expect(second.chosen.id).toBe(first.chosen.id);
    expect(second.ranking).toEqual(first.ranking);
    expect(second.hiddenState).toEqual(first.hiddenState);
    expect(second.intents).toEqual(first.intents);
  });

  it("advances the hidden state and reports intents", () => {
    const outcome = ranker.rank(context(), POOL, createSeededRandom(3));

    expect(outcome.hiddenState).toHaveLength(64);
    expect(outcome.hiddenState).not.toEqual(initialHiddenState());
    const intents = outcome.intents;
    expect(intents).not.toBeNull();
    const sum = Object.values(intents ?? {}).reduce((s, v) => s + v, 0);
    expect(sum).toBeCloseTo(1, 10);
  });

  it("never samples a demoted tag while another tag is available", () => {
    for (let seed = 0; seed < 25; seed++) {
      const outcome = ranker.rank(context(), POOL, createSeededRandom(seed), "otp");
      expect(outcome.chosen.tactic).toBe("general");
      const demoted = outcome.ranking.filter((r) => r.responseId === "b" || r.responseId === "c");
      expect(demoted.map((r) => r.probability)).toEqual([0, 0]);
      expect(outcome.ranking.slice(-2).map((r) => r.responseId).sort()).toEqual(["b", "c"]);
    }
  });

  it("samples a demoted tag when nothing else is left", () => {
    const onlyOtp = POOL.filter((c) => c.tactic === "otp");
    const outcome = ranker.rank(context(), onlyOtp, createSeededRandom(4), "otp");

    expect(outcome.chosen.tactic).toBe("otp");
  });

  it("picks an injected probe over every other candidate", () => {
    const probe = candidate("probe-t3", "What is your full name and employee ID?", "probe", "probe");
    for (let seed = 0; seed < 10; seed++) {
      expect(ranker.rank(context(), [...POOL, probe], createSeededRandom(seed), "otp").chosen.id).toBe("probe-t3");
    }
  });

  it("demotes a probe whose tag reached the streak limit", () => {
    const probe = candidate("probe-t4", "What is your full name and employee ID?", "probe", "probe");
    for (let seed = 0; seed < 10; seed++) {
      const outcome = ranker.rank(context(), [...POOL, probe], createSeededRandom(seed), "probe");
      expect(outcome.chosen.tactic).not.toBe("probe");
      expect(outcome.ranking[outcome.ranking.length - 1]).toEqual({ responseId: "probe-t4", score: expect.any(Number), probability: 0 });
    }
  });

  it("throws on an empty pool", () => {
    expect(() => ranker.rank(context(), [], createSeededRandom(1))).toThrow("Cannot rank an empty candidate pool");
  });

  describe("degradation", () => {
    function brokenRanker(logger: Logger): ResponseRanker {
      const weights = generateWeights(42);
      weights.scorer.output.b[0] = Number.NaN;
      return new ResponseRanker({ lexicon: catalog.intents, config, weights, logger });
    }

    it("falls back to a uniform draw when scores are not finite", () => {
      const logger = createSilentLogger();
      const hidden = initialHiddenState().map((_, i) => i / 100);
      const outcome = brokenRanker(logger).rank(context({ hiddenState: hidden }), POOL, createSeededRandom(5));

      expect(outcome.degraded).toBe(true);
      expect(outcome.failureReason).toBe("non-finite candidate score");
      expect(outcome.hiddenState).toEqual(hidden);
      expect(outcome.intents).toBeNull();
      expect(outcome.ranking.map((r) => r.probability)).toEqual([0.25, 0.25, 0.25, 0.25]);
      expect(POOL.map((c) => c.id)).toContain(outcome.chosen.id);
      expect(logger.warn).toHaveBeenCalledWith(
        "Ranking failed, falling back to uniform choice: non-finite candidate score",
      );
    });

    it("keeps the demotion window in the fallback", () => {
      const outcome = brokenRanker(createSilentLogger()).rank(context(), POOL, createSeededRandom(6), "general");

      expect(outcome.chosen.tactic).toBe("otp");
      expect(outcome.ranking.map((r) => r.responseId)).toEqual(["b", "c"]);
    });

    it("falls back when the hidden state has the wrong width", () => {
      const outcome = ranker.rank(context({ hiddenState: [0, 0, 0] }), POOL, createSeededRandom(7));

      expect(outcome.degraded).toBe(true);
      expect(outcome.hiddenState).toEqual([0, 0, 0]);
    });
  });
});
