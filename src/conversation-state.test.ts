// Unit tests for attention and the recurrent conversation state

import { describe, it, expect } from "vitest";
import { ContextualEncoder } from "./attention.js";
import { ConversationState, initialHiddenState } from "./conversation-state.js";
import { defaultWeights } from "./network-weights.js";
import { MessageEncoder } from "./text-encoder.js";

const weights = defaultWeights();
const encoder = new MessageEncoder(weights.encoder);
const contextual = new ContextualEncoder(weights);
const recurrent = new ConversationState(weights.recurrent);

describe("ContextualEncoder", () => {
  it("returns a layer-normalised 128-d vector", () => {
    const v = contextual.contextualize(encoder.encode("Your account will be blocked"));
    const mean = v.reduce((s, x) => s + x, 0) / v.length;
    expect(v).toHaveLength(128);
    expect(mean).toBeCloseTo(0, 6);
  });
});

describe("ConversationState", () => {
  it("starts from a zero 64-d state", () => {
    expect(initialHiddenState()).toEqual(new Array(64).fill(0));
  });

  it("keeps the state 64 wide and bounded by tanh", () => {
    let h = initialHiddenState();
    for (const text of ["hello", "share OTP", "pay now", "you will be arrested"]) {
      h = recurrent.step(contextual.contextualize(encoder.encode(text)), h);
      expect(h).toHaveLength(64);
      expect(h.every((x) => Math.abs(x) <= 1)).toBe(true);
    }
  });

  it("follows the same trajectory for the same messages", () => {
    const run = () =>
      ["hello", "share OTP"].reduce(
        (h, text) => recurrent.step(contextual.contextualize(encoder.encode(text)), h),
        initialHiddenState(),
      );
    expect(run()).toEqual(run());
  });

  it("rejects a state of the wrong width", () => {
    expect(() => recurrent.step(new Array(128).fill(0), [0, 0])).toThrow("Hidden state must have 64 entries, got 2");
  });
});
