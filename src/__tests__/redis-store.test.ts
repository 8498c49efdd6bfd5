import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "path";
import RedisMock from "ioredis-mock";
import { StoreUnavailableError, UnknownCredentialError } from "../pool/errors.js";
import { FileCredentialStore } from "../pool/file-store.js";
import { RedisCredentialStore, type RedisCommands } from "../pool/redis-store.js";
import { rollingWindowEpoch } from "../pool/quota-epoch.js";
import { credentialId, type CredentialStore } from "../pool/store.js";
import type { CredentialMutation } from "../pool/types.js";
import { makeTempDir, removeDir } from "./helpers.js";

const EPOCH = "2026-10-19";

describe("RedisCredentialStore", () => {
  let redis: RedisCommands;
  let store: RedisCredentialStore;

  beforeEach(async () => {
    const mock = new RedisMock();
    await mock.flushall();
    redis = mock;
    store = new RedisCredentialStore(redis, "test:");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers tokens with fresh state", async () => {
    const records = await store.load(["tok-a", "tok-b"], EPOCH);
    expect(records.map((r) => r.token)).toEqual(["tok-a", "tok-b"]);
    expect(records[0]).toMatchObject({
      id: credentialId("tok-a"),
      dailyUsed: 0,
      health: "available",
      failureStreak: 0,
      verified: false,
    });
  });

  it("keeps usage counters per epoch under the configured prefix", async () => {
    await store.load(["tok-a"], EPOCH);
    await store.applyDelta("tok-a", { type: "charge", epoch: EPOCH, limit: 10, at: 1 });
    expect(await redis.hget(`test:usage:${EPOCH}`, credentialId("tok-a"))).toBe("1");

    const [nextDay] = await store.list("2026-10-20");
    expect(nextDay?.dailyUsed).toBe(0);
    const [today] = await store.list(EPOCH);
    expect(today?.dailyUsed).toBe(1);
  });

  it("keeps usage counters for at least two epochs", async () => {
    const week = 168 * 3600 * 1000;
    const weekly = new RedisCredentialStore(redis, "test:", rollingWindowEpoch(168).durationMs);
    await weekly.load(["tok-a"], "w1");
    const expire = vi.spyOn(redis, "expire");

    await weekly.applyDelta("tok-a", { type: "charge", epoch: "w1", limit: 1, at: 1 });
    expect(expire).toHaveBeenCalledWith("test:usage:w1", (2 * week) / 1000);

    await store.load(["tok-a"], EPOCH);
    await store.applyDelta("tok-a", { type: "charge", epoch: EPOCH, limit: 1, at: 1 });
    expect(expire).toHaveBeenLastCalledWith(`test:usage:${EPOCH}`, 3 * 24 * 3600);
  });

  it("refuses charges past the limit and compensates the counter", async () => {
    await store.load(["tok-a"], EPOCH);
    const results = await Promise.all(
      [1, 2, 3].map((at) => store.applyDelta("tok-a", { type: "charge", epoch: EPOCH, limit: 2, at })),
    );
    expect(results.map((r) => r.changed).sort()).toEqual([false, true, true]);
    expect(await redis.hget(`test:usage:${EPOCH}`, credentialId("tok-a"))).toBe("2");
  });

  it("sets one-way flags only once", async () => {
    await store.load(["tok-a"], EPOCH);
    expect((await store.applyDelta("tok-a", { type: "verify" })).changed).toBe(true);
    expect((await store.applyDelta("tok-a", { type: "verify" })).changed).toBe(false);
    expect((await store.applyDelta("tok-a", { type: "disable", reason: "r1" })).changed).toBe(true);
    const second = await store.applyDelta("tok-a", { type: "disable", reason: "r2" });
    expect(second.changed).toBe(false);
    expect(second.record.disabledReason).toBe("r1");
  });

  it("reset clears disablement", async () => {
    await store.load(["tok-a"], EPOCH);
    await store.applyDelta("tok-a", { type: "disable", reason: "CredentialBanned" });
    const { record } = await store.applyDelta("tok-a", { type: "reset" });
    expect(record).toMatchObject({ health: "available", disabledReason: null, failureStreak: 0 });
  });

  it("hands out consecutive cursor values", async () => {
    await store.load(["tok-a"], EPOCH);
    expect(await store.nextCursor()).toBe(0);
    expect(await store.nextCursor()).toBe(1);
  });

  it("rejects unknown tokens", async () => {
    await store.load(["tok-a"], EPOCH);
    await expect(store.applyDelta("tok-z", { type: "verify" })).rejects.toBeInstanceOf(UnknownCredentialError);
  });

  it("surfaces command failures as store unavailable", async () => {
    await store.load(["tok-a"], EPOCH);
    vi.spyOn(redis, "hgetall").mockRejectedValue(new Error("connection lost"));
    await expect(store.list(EPOCH)).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

describe("store parity", () => {
  const sequence: CredentialMutation[] = [
    { type: "touch", at: 1_000 },
    { type: "charge", epoch: EPOCH, limit: 2, at: 2_000 },
    { type: "cool", until: 5_000 },
    { type: "verify" },
    { type: "enable_nsfw" },
    { type: "disable", reason: "CredentialBanned" },
    { type: "cool", until: 9_000 },
  ];

  async function run(store: CredentialStore) {
    await store.load(["tok-a"], EPOCH);
    for (const mutation of sequence) await store.applyDelta("tok-a", mutation);
    return store.list(EPOCH);
  }

  it("yields identical records from both backends", async () => {
    const dir = await makeTempDir();
    try {
      const redis = new RedisMock();
      await redis.flushall();
      const fromRedis = await run(new RedisCredentialStore(redis, "parity:"));
      const fromFile = await run(new FileCredentialStore(join(dir, "pool.json")));

      expect(fromRedis).toEqual(fromFile);
      expect(fromFile[0]).toMatchObject({
        dailyUsed: 1,
        verified: true,
        nsfwEnabled: true,
        health: "disabled",
        coolingUntil: null,
        lastUsedAt: 2_000,
        failureStreak: 1,
        disabledReason: "CredentialBanned",
      });
    } finally {
      await removeDir(dir);
    }
  });
});
