// Unit tests for API key authentication

import { describe, it, expect } from "vitest";
import { apiKeyMatches, checkApiKey, upgradeApiKey } from "./auth.js";

describe("apiKeyMatches()", () => {
  it("accepts the exact key", () => {
    expect(apiKeyMatches("test-secret", "test-secret")).toBe(true);
  });

  it("rejects a different, shorter or missing key", () => {
    expect(apiKeyMatches("test-secret", "test-secreT")).toBe(false);
    expect(apiKeyMatches("test-secret", "test")).toBe(false);
    expect(apiKeyMatches("test-secret", "")).toBe(false);
    expect(apiKeyMatches("test-secret", undefined)).toBe(false);
  });
});

describe("checkApiKey()", () => {
  it("passes the right key", () => {
    expect(checkApiKey("test-secret", "test-secret")).toEqual({ ok: true });
  });

  it("explains a missing header", () => {
    expect(checkApiKey("test-secret", undefined)).toEqual({
      ok: false,
      message: "Missing API key. Provide the 'x-api-key' header.",
    });
  });

  it("rejects a wrong key", () => {
    expect(checkApiKey("test-secret", "nope")).toEqual({ ok: false, message: "Invalid API key." });
  });
});

describe("upgradeApiKey()", () => {
  it("reads the header first", () => {
    expect(upgradeApiKey({ url: "/live?apiKey=q", headers: { "x-api-key": "h" } })).toBe("h");
  });

  it("falls back to the query parameter", () => {
    expect(upgradeApiKey({ url: "/live?apiKey=test-secret", headers: {} })).toBe("test-secret");
    expect(upgradeApiKey({ url: "/live", headers: {} })).toBeNull();
  });
});
