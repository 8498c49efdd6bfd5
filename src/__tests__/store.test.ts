import { describe, it, expect } from "vitest";
import { applyMutation, credentialId, effectiveHealth, tokenPreview } from "../pool/store.js";
import { makeRecord } from "./helpers.js";

describe("credentialId", () => {
  it("is a stable 12-char hex prefix of the token hash", () => {
    const id = credentialId("test-token-a");
    expect(id).toMatch(/^[0-9a-f]{12}$/);
    expect(credentialId("test-token-a")).toBe(id);
    expect(credentialId("test-token-b")).not.toBe(id);
  });
});

describe("tokenPreview", () => {
  it("masks short tokens entirely", () => {
    expect(tokenPreview("short")).toBe("***");
  });

  it("keeps only the head and tail of long tokens", () => {
    expect(tokenPreview("abcdefghijklmnopqrst")).toBe("abcdef...qrst");
  });
});

describe("effectiveHealth", () => {
  it("reads an expired cooldown as available", () => {
    const record = makeRecord("t", { health: "cooling", coolingUntil: 1_000 });
    expect(effectiveHealth(record, 999)).toBe("cooling");
    expect(effectiveHealth(record, 1_000)).toBe("cooling");
    expect(effectiveHealth(record, 1_001)).toBe("available");
  });

  it("never revives a disabled credential", () => {
    expect(effectiveHealth(makeRecord("t", { health: "disabled" }), Number.MAX_SAFE_INTEGER)).toBe("disabled");
  });
});

describe("applyMutation", () => {
  it("charges up to the limit and then refuses", () => {
    const full = makeRecord("t", { dailyUsed: 3 });
    const result = applyMutation(full, { type: "charge", epoch: "2026-10-19", limit: 3, at: 5 });
    expect(result.changed).toBe(false);
    expect(result.record.dailyUsed).toBe(3);
  });

  it("charging resets the failure streak and stamps last use", () => {
    const record = makeRecord("t", { failureStreak: 4 });
    const { record: next, changed } = applyMutation(record, { type: "charge", epoch: "2026-10-19", limit: 10, at: 42 });
    expect(changed).toBe(true);
    expect(next).toMatchObject({ dailyUsed: 1, failureStreak: 0, lastUsedAt: 42 });
  });

  it("charging in a new epoch starts the counter over", () => {
    const record = makeRecord("t", { dailyUsed: 10 });
    const { record: next } = applyMutation(record, { type: "charge", epoch: "2026-10-20", limit: 10, at: 1 });
    expect(next.quotaEpoch).toBe("2026-10-20");
    expect(next.dailyUsed).toBe(1);
  });

  it("rollover is a no-op within the same epoch", () => {
    const record = makeRecord("t", { dailyUsed: 2 });
    expect(applyMutation(record, { type: "rollover", epoch: "2026-10-19" }).changed).toBe(false);
    expect(applyMutation(record, { type: "rollover", epoch: "2026-10-20" }).record.dailyUsed).toBe(0);
  });

  it("one-way flags report no change when already set", () => {
    const verified = makeRecord("t", { verified: true, nsfwEnabled: true });
    expect(applyMutation(verified, { type: "verify" }).changed).toBe(false);
    expect(applyMutation(verified, { type: "enable_nsfw" }).changed).toBe(false);
  });

  it("a late cooldown never overrides disablement", () => {
    const disabled = applyMutation(makeRecord("t"), { type: "disable", reason: "CredentialBanned" }).record;
    const result = applyMutation(disabled, { type: "cool", until: 99 });
    expect(result.changed).toBe(false);
    expect(result.record.health).toBe("disabled");
    expect(result.record.disabledReason).toBe("CredentialBanned");
  });

  it("cooling increments the streak", () => {
    const { record } = applyMutation(makeRecord("t", { failureStreak: 1 }), { type: "cool", until: 500 });
    expect(record).toMatchObject({ health: "cooling", coolingUntil: 500, failureStreak: 2 });
  });

  it("reset returns a disabled credential to service without touching usage", () => {
    const disabled = makeRecord("t", { health: "disabled", disabledReason: "x", failureStreak: 3, dailyUsed: 4 });
    const { record } = applyMutation(disabled, { type: "reset" });
    expect(record).toMatchObject({ health: "available", disabledReason: null, failureStreak: 0, dailyUsed: 4 });
  });

  it("does not modify the input record", () => {
    const record = makeRecord("t");
    applyMutation(record, { type: "touch", at: 7 });
    expect(record.lastUsedAt).toBeNull();
  });
});
