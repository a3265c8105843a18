import { describe, it, expect, vi, afterEach } from "vitest";
import { APP_NAME, APP_VERSION, main } from "./index.js";
import { ConfigError } from "./config.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Scam Honeypot");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });
});

describe("main()", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses to start without an API key", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    await expect(main({ PORT: "0" })).rejects.toBeInstanceOf(ConfigError);
  });

  it("starts a server from the environment", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const server = await main({ PORT: "0", API_KEY: "test-secret", RANDOM_SEED: "7" });
    try {
      expect(server.httpServer.listening).toBe(true);
    } finally {
      await server.close();
    }
  });
});
