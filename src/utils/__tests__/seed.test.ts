import { describe, it, expect } from "vitest";
import { deriveSeed, resolveSeed, SEED_LIMIT } from "../seed.js";

describe("deriveSeed", () => {
  it("is deterministic for the same pid and time", () => {
    expect(deriveSeed({ pid: 100, now: 1700000000000.5 })).toBe(
      deriveSeed({ pid: 100, now: 1700000000000.5 }),
    );
  });

  it("differs across pids and timestamps", () => {
    const a = deriveSeed({ pid: 100, now: 1700000000000 });
    const b = deriveSeed({ pid: 101, now: 1700000000000 });
    const c = deriveSeed({ pid: 100, now: 1700000000001 });
    expect(new Set([a, b, c]).size).toBe(3);
  });

  it("stays within the unsigned 32-bit range", () => {
    for (let pid = 1; pid <= 200; pid++) {
      const seed = deriveSeed({ pid, now: pid * 7.25 });
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThan(SEED_LIMIT);
    }
  });

  it("falls back to the current process and clock", () => {
    const seed = deriveSeed();
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThan(SEED_LIMIT);
  });
});

describe("resolveSeed", () => {
  it("passes explicit seeds and absence through", () => {
    expect(resolveSeed(7)).toBe(7);
    expect(resolveSeed(undefined)).toBeUndefined();
  });

  it("derives a seed for auto", () => {
    expect(resolveSeed("auto", { pid: 1, now: 2 })).toBe(deriveSeed({ pid: 1, now: 2 }));
  });
});
