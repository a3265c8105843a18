import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./keyed-mutex.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("KeyedMutex", () => {
  it("runs work for one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];

    const a = mutex.run("k", async () => {
      log.push("a:start");
      await delay(10);
      log.push("a:end");
    });
    const b = mutex.run("k", () => {
      log.push("b");
    });
    await Promise.all([a, b]);

    expect(log).toEqual(["a:start", "a:end", "b"]);
  });

  it("does not hold one key behind another", async () => {
    const mutex = new KeyedMutex();
    const first = mutex.run("k1", () => delay(50).then(() => "k1"));

    expect(await mutex.run("k2", () => "k2")).toBe("k2");
    expect(mutex.activeKeys).toBe(1);
    expect(await first).toBe("k1");
    expect(mutex.activeKeys).toBe(0);
  });

  it("releases the key when the work throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run("k", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await mutex.run("k", () => 1)).toBe(1);
    expect(mutex.activeKeys).toBe(0);
  });
});
