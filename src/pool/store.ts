/**
 * CredentialStore: the persistence contract behind the pool.
 *
 * Two backends implement it: FileCredentialStore (one JSON document, single
 * process) and RedisCredentialStore (shared by several gateway instances).
 * Both must yield identical records for the same sequence of mutations.
 */

import { createHash } from "crypto";
import type {
  ApplyResult,
  CredentialMutation,
  CredentialRecord,
} from "./types.js";

export interface CredentialStore {
  readonly kind: "file" | "redis";

  /**
   * Register the configured tokens (stable order) and return their records.
   * Tokens not seen before start fresh; tokens no longer configured are ignored.
   */
  load(tokens: readonly string[], epoch: string): Promise<CredentialRecord[]>;

  /** Current records in pool order, usage counters as of `epoch`. */
  list(epoch: string): Promise<CredentialRecord[]>;

  /** Records that are neither disabled nor cooling at `now`. */
  listHealthy(epoch: string, now: number): Promise<CredentialRecord[]>;

  /** Atomically apply one mutation to one credential and persist it. */
  applyDelta(token: string, mutation: CredentialMutation): Promise<ApplyResult>;

  /** Return the round-robin cursor and advance it by one. */
  nextCursor(): Promise<number>;

  close(): Promise<void>;
}

export function credentialId(token: string): string {
  return createHash("sha256").update(token).digest("hex").slice(0, 12);
}

export function tokenPreview(token: string): string {
  return token.length <= 12 ? "***" : `${token.slice(0, 6)}...${token.slice(-4)}`;
}

export function freshRecord(token: string, epoch: string): CredentialRecord {
  return {
    token,
    id: credentialId(token),
    dailyUsed: 0,
    quotaEpoch: epoch,
    verified: false,
    nsfwEnabled: false,
    health: "available",
    coolingUntil: null,
    lastUsedAt: null,
    failureStreak: 0,
    disabledReason: null,
  };
}

/** Effective health at `now`: a cooldown reads as available strictly after it ends. */
export function effectiveHealth(record: CredentialRecord, now: number): CredentialRecord["health"] {
  if (record.health === "cooling" && (record.coolingUntil === null || record.coolingUntil < now)) {
    return "available";
  }
  return record.health;
}

export function isHealthy(record: CredentialRecord, now: number): boolean {
  return effectiveHealth(record, now) === "available";
}

/**
 * Pure transition used by the file backend (and mirrored command-by-command
 * by the Redis backend). Returns a new record; the input is not modified.
 */
export function applyMutation(record: CredentialRecord, mutation: CredentialMutation): ApplyResult {
  const next: CredentialRecord = { ...record };

  switch (mutation.type) {
    case "rollover":
      if (next.quotaEpoch === mutation.epoch) return { record, changed: false };
      next.quotaEpoch = mutation.epoch;
      next.dailyUsed = 0;
      break;

    case "touch":
      next.lastUsedAt = mutation.at;
      break;

    case "charge":
      if (next.quotaEpoch !== mutation.epoch) {
        next.quotaEpoch = mutation.epoch;
        next.dailyUsed = 0;
      }
      if (next.dailyUsed >= mutation.limit) return { record, changed: false };
      next.dailyUsed += 1;
      next.lastUsedAt = mutation.at;
      next.failureStreak = 0;
      break;

    case "cool":
      // Disablement wins over a late transient failure
      if (next.health === "disabled") return { record, changed: false };
      next.health = "cooling";
      next.coolingUntil = mutation.until;
      next.failureStreak += 1;
      break;

    case "disable":
      if (next.health === "disabled") return { record, changed: false };
      next.health = "disabled";
      next.coolingUntil = null;
      next.disabledReason = mutation.reason;
      break;

    case "verify":
      if (next.verified) return { record, changed: false };
      next.verified = true;
      break;

    case "enable_nsfw":
      if (next.nsfwEnabled) return { record, changed: false };
      next.nsfwEnabled = true;
      break;

    case "reset":
      next.health = "available";
      next.coolingUntil = null;
      next.failureStreak = 0;
      next.disabledReason = null;
      break;

    case "reset_usage":
      next.quotaEpoch = mutation.epoch;
      next.dailyUsed = 0;
      break;
  }

  return { record: next, changed: true };
}
