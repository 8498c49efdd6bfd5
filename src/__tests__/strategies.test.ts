import { describe, it, expect } from "vitest";
import { getStrategy, type SelectionContext } from "../pool/strategies.js";
import { createSeededRandom } from "../utils/jitter.js";
import { makeRecord } from "./helpers.js";

function ctx(overrides: Partial<SelectionContext> = {}): SelectionContext {
  return { cursor: 0, random: () => 0, dailyLimit: 10, ...overrides };
}

describe("round_robin", () => {
  const strategy = getStrategy("round_robin");
  const pool = [makeRecord("a"), makeRecord("b"), makeRecord("c")];

  it("visits each credential exactly once per N consecutive cursors, in stable order", () => {
    const picks = [0, 1, 2, 3, 4, 5].map((cursor) => strategy.select(pool, ctx({ cursor }))?.token);
    expect(picks).toEqual(["a", "b", "c", "a", "b", "c"]);
  });

  it("uses the shared cursor", () => {
    expect(strategy.usesCursor).toBe(true);
  });

  it("returns null for an empty snapshot", () => {
    expect(strategy.select([], ctx())).toBeNull();
  });
});

describe("least_used", () => {
  const strategy = getStrategy("least_used");

  it("picks the credential with the lowest usage", () => {
    const pool = [makeRecord("a", { dailyUsed: 4 }), makeRecord("b", { dailyUsed: 1 }), makeRecord("c", { dailyUsed: 3 })];
    expect(strategy.select(pool, ctx())?.token).toBe("b");
  });

  it("breaks ties by oldest use, never-used first", () => {
    const pool = [
      makeRecord("a", { dailyUsed: 2, lastUsedAt: 2_000 }),
      makeRecord("b", { dailyUsed: 2, lastUsedAt: 1_000 }),
      makeRecord("c", { dailyUsed: 2, lastUsedAt: null }),
    ];
    expect(strategy.select(pool, ctx())?.token).toBe("c");
    expect(strategy.select(pool.slice(0, 2), ctx())?.token).toBe("b");
  });
});

describe("least_recent", () => {
  it("picks the credential used longest ago", () => {
    const pool = [
      makeRecord("a", { lastUsedAt: 3_000 }),
      makeRecord("b", { lastUsedAt: 1_000 }),
      makeRecord("c", { lastUsedAt: 2_000 }),
    ];
    expect(getStrategy("least_recent").select(pool, ctx())?.token).toBe("b");
  });
});

describe("weighted", () => {
  const strategy = getStrategy("weighted");
  // weights 1/1, 1/2, 1/4 → total 1.75
  const pool = [makeRecord("a", { dailyUsed: 0 }), makeRecord("b", { dailyUsed: 1 }), makeRecord("c", { dailyUsed: 3 })];

  it("maps the random draw onto cumulative weights", () => {
    expect(strategy.select(pool, ctx({ random: () => 0 }))?.token).toBe("a");
    // 0.6 * 1.75 = 1.05 → past a (1.0), inside b
    expect(strategy.select(pool, ctx({ random: () => 0.6 }))?.token).toBe("b");
    // 0.9 * 1.75 = 1.575 → past b (1.5), inside c
    expect(strategy.select(pool, ctx({ random: () => 0.9 }))?.token).toBe("c");
  });

  it("is deterministic for the same seed", () => {
    const run = () => {
      const random = createSeededRandom(42);
      return Array.from({ length: 20 }, () => strategy.select(pool, ctx({ random }))?.token);
    };
    expect(run()).toEqual(run());
  });

  it("favours lightly used credentials", () => {
    const random = createSeededRandom(3);
    const counts: Record<string, number> = { a: 0, b: 0, c: 0 };
    for (let i = 0; i < 2_000; i++) {
      const token = strategy.select(pool, ctx({ random }))?.token;
      if (token) counts[token] = (counts[token] ?? 0) + 1;
    }
    expect(counts.a).toBeGreaterThan(counts.b ?? 0);
    expect(counts.b).toBeGreaterThan(counts.c ?? 0);
  });
});

describe("hybrid", () => {
  const strategy = getStrategy("hybrid");

  it("prefers the lightly used credential even when it was used more recently", () => {
    const heavy = makeRecord("A", { dailyUsed: 9, lastUsedAt: 1_000 });
    const light = makeRecord("B", { dailyUsed: 1, lastUsedAt: 5_000 });
    expect(strategy.select([heavy, light], ctx({ dailyLimit: 10 }))?.token).toBe("B");
  });

  it("falls back to least-recent over everyone when all are above the threshold", () => {
    const pool = [makeRecord("a", { dailyUsed: 9, lastUsedAt: 2_000 }), makeRecord("b", { dailyUsed: 8, lastUsedAt: 1_000 })];
    expect(strategy.select(pool, ctx({ dailyLimit: 10 }))?.token).toBe("b");
  });
});
