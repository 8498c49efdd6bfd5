/**
 * CredentialPool: owns the credential store and the rotation strategy.
 *
 * acquire() picks a usable credential without charging it; usage is charged
 * only by recordSuccess(). Failures move a credential to cooling (transient,
 * exponential backoff) or disabled (permanent). Every durable change goes
 * through the store, which serializes per-credential mutations.
 *
 * In-flight acquisitions are reserved in-process so that concurrent jobs in
 * this process cannot overcommit a credential's remaining quota. Across
 * processes, the store's capped charge keeps dailyUsed within the limit.
 */

import type { RotationStrategyName } from "../config.js";
import { jitter } from "../utils/jitter.js";
import { log } from "../utils/logger.js";
import { Mutex } from "../utils/mutex.js";
import { classifyFailure, type UpstreamFailureKind } from "./errors.js";
import type { QuotaEpochPolicy } from "./quota-epoch.js";
import { effectiveHealth, tokenPreview, type CredentialStore } from "./store.js";
import { getStrategy, type RotationStrategy } from "./strategies.js";
import type {
  AcquiredCredential,
  ApplyResult,
  CredentialRecord,
  CredentialSummary,
  PoolSummary,
} from "./types.js";

// Reservations older than this are assumed leaked and auto-released
const DEFAULT_RESERVATION_TTL_MS = 5 * 60 * 1000;

export interface CredentialPoolOptions {
  store: CredentialStore;
  strategy: RotationStrategyName;
  dailyLimit: number;
  epochPolicy: QuotaEpochPolicy;
  cooldownBaseMs: number;
  cooldownMaxMs: number;
  /** Consecutive transient failures before a credential is disabled; 0 = never. */
  disableAfterFailures: number;
  /** Age after which an unreleased reservation is dropped. Defaults to five minutes. */
  reservationTtlMs?: number;
  /** Supplies the configured tokens on init() and reload(). */
  tokenSource: () => Promise<string[]>;
  random?: () => number;
  now?: () => number;
}

export class CredentialPool {
  private readonly store: CredentialStore;
  private readonly strategy: RotationStrategy;
  private readonly dailyLimit: number;
  private readonly epochPolicy: QuotaEpochPolicy;
  private readonly cooldownBaseMs: number;
  private readonly cooldownMaxMs: number;
  private readonly disableAfterFailures: number;
  private readonly reservationTtlMs: number;
  private readonly tokenSource: () => Promise<string[]>;
  private readonly random: () => number;
  private readonly now: () => number;
  private reservations: Map<string, number[]> = new Map(); // token → reservation timestamps
  private readonly failureLock = new Mutex();

  constructor(options: CredentialPoolOptions) {
    this.store = options.store;
    this.strategy = getStrategy(options.strategy);
    this.dailyLimit = options.dailyLimit;
    this.epochPolicy = options.epochPolicy;
    this.cooldownBaseMs = options.cooldownBaseMs;
    this.cooldownMaxMs = options.cooldownMaxMs;
    this.disableAfterFailures = options.disableAfterFailures;
    this.reservationTtlMs = options.reservationTtlMs ?? DEFAULT_RESERVATION_TTL_MS;
    this.tokenSource = options.tokenSource;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /** Load the pool from the backing store. Throws StoreUnavailableError when unreachable. */
  async init(): Promise<number> {
    const tokens = await this.tokenSource();
    const records = await this.store.load(tokens, this.currentEpoch());
    log.info("[Pool] Credential pool ready", {
      credentials: records.length,
      backend: this.store.kind,
      strategy: this.strategy.name,
      dailyLimit: this.dailyLimit,
      epoch: this.epochPolicy.name,
    });
    return records.length;
  }

  // ── Core operations ─────────────────────────────────────────────

  /**
   * Acquire the best available credential for a request.
   * Returns null if none is available (all disabled, cooling, exhausted or excluded).
   */
  async acquire(exclude?: ReadonlySet<string>): Promise<AcquiredCredential | null> {
    const epoch = this.currentEpoch();
    const cursor = this.strategy.usesCursor ? await this.store.nextCursor() : 0;
    const records = await this.listCurrent(epoch);

    // list() is the last await: from here to the reservation nothing can interleave
    const now = this.now();
    this.releaseStale(now);
    const candidates = records.filter(
      (r) =>
        effectiveHealth(r, now) === "available" &&
        !exclude?.has(r.token) &&
        r.dailyUsed + this.reservedCount(r.token) < this.dailyLimit,
    );

    const selected = this.strategy.select(candidates, {
      cursor,
      random: this.random,
      dailyLimit: this.dailyLimit,
    });
    if (!selected) {
      log.warn("[Pool] No credential available", {
        total: records.length,
        excluded: exclude?.size ?? 0,
      });
      return null;
    }
    this.reserve(selected.token, now);

    try {
      await this.store.applyDelta(selected.token, { type: "touch", at: now });
    } catch (err) {
      this.release(selected.token);
      throw err;
    }

    log.debug("[Pool] Acquired credential", {
      credential: selected.id,
      used: selected.dailyUsed,
      strategy: this.strategy.name,
    });
    return {
      id: selected.id,
      token: selected.token,
      verified: selected.verified,
      nsfwEnabled: selected.nsfwEnabled,
    };
  }

  /**
   * Charge one unit of quota after a confirmed generation.
   * Returns false if the credential's quota was already full (nothing charged).
   */
  async recordSuccess(token: string): Promise<boolean> {
    // The reservation stands until the charge is visible to acquire()
    let result: ApplyResult;
    try {
      result = await this.store.applyDelta(token, {
        type: "charge",
        epoch: this.currentEpoch(),
        limit: this.dailyLimit,
        at: this.now(),
      });
    } finally {
      this.release(token);
    }
    const { record, changed } = result;
    if (!changed) {
      log.warn("[Pool] Quota already full, success not charged", { credential: record.id });
      return false;
    }
    log.debug("[Pool] Charged credential", {
      credential: record.id,
      used: record.dailyUsed,
      limit: this.dailyLimit,
    });
    return true;
  }

  /**
   * Apply the health consequence of a failed attempt.
   * Request-scoped failures (timeouts) only drop the reservation.
   */
  async recordFailure(token: string, kind: UpstreamFailureKind, detail = ""): Promise<void> {
    this.release(token);
    const failureClass = classifyFailure(kind);
    if (failureClass === "request") return;

    if (failureClass === "permanent") {
      const { record, changed } = await this.store.applyDelta(token, {
        type: "disable",
        reason: detail ? `${kind}: ${detail}` : kind,
      });
      if (changed) log.warn("[Pool] Credential disabled", { credential: record.id, kind, detail });
      return;
    }

    await this.failureLock.run(() => this.recordTransientFailure(token, kind, detail));
  }

  /** Drop an in-flight reservation without any state change. */
  release(token: string): void {
    const stamps = this.reservations.get(token);
    if (!stamps) return;
    stamps.shift();
    if (stamps.length === 0) this.reservations.delete(token);
  }

  async markVerified(token: string): Promise<void> {
    const { record, changed } = await this.store.applyDelta(token, { type: "verify" });
    if (changed) log.info("[Pool] Credential activated", { credential: record.id });
  }

  async markNsfwEnabled(token: string): Promise<void> {
    const { record, changed } = await this.store.applyDelta(token, { type: "enable_nsfw" });
    if (changed) log.info("[Pool] Credential capability enabled", { credential: record.id });
  }

  // ── Query ───────────────────────────────────────────────────────

  async snapshot(): Promise<CredentialSummary[]> {
    const epoch = this.currentEpoch();
    const now = this.now();
    const records = await this.store.list(epoch);
    return records.map((r) => this.toSummary(r, epoch, now));
  }

  async getSummary(): Promise<PoolSummary> {
    const summaries = await this.snapshot();
    const count = (health: CredentialSummary["health"]) =>
      summaries.filter((s) => s.health === health).length;
    return {
      total: summaries.length,
      available: count("available"),
      cooling: count("cooling"),
      disabled: count("disabled"),
      exhausted: summaries.filter((s) => s.health === "available" && s.remaining === 0).length,
      strategy: this.strategy.name,
      dailyLimit: this.dailyLimit,
      quotaEpoch: this.currentEpoch(),
    };
  }

  // ── Operator actions ────────────────────────────────────────────

  /** Re-read the token source. Known credentials keep their state. */
  async reload(): Promise<number> {
    const tokens = await this.tokenSource();
    const records = await this.store.load(tokens, this.currentEpoch());
    log.info("[Pool] Reloaded credentials", { credentials: records.length });
    return records.length;
  }

  async resetDailyUsage(): Promise<void> {
    const epoch = this.currentEpoch();
    for (const record of await this.store.list(epoch)) {
      await this.store.applyDelta(record.token, { type: "reset_usage", epoch });
    }
    log.info("[Pool] Daily usage reset", { epoch });
  }

  /** Return a cooling or disabled credential to service. False if the id is unknown. */
  async resetCredential(id: string): Promise<boolean> {
    const records = await this.store.list(this.currentEpoch());
    const record = records.find((r) => r.id === id);
    if (!record) return false;
    await this.store.applyDelta(record.token, { type: "reset" });
    log.info("[Pool] Credential reset by operator", { credential: id });
    return true;
  }

  async destroy(): Promise<void> {
    this.reservations.clear();
    await this.store.close();
  }

  // ── Internal ────────────────────────────────────────────────────

  private currentEpoch(): string {
    return this.epochPolicy.current(this.now());
  }

  private async rollover(records: CredentialRecord[], epoch: string): Promise<void> {
    for (const record of records) {
      if (record.quotaEpoch !== epoch) await this.store.applyDelta(record.token, { type: "rollover", epoch });
    }
  }

  /** Current-epoch records; stale ones are rolled over and the list re-read. */
  private async listCurrent(epoch: string): Promise<CredentialRecord[]> {
    const records = await this.store.list(epoch);
    if (records.every((r) => r.quotaEpoch === epoch)) return records;
    await this.rollover(records, epoch);
    return this.store.list(epoch);
  }

  private async findRecord(token: string): Promise<CredentialRecord | undefined> {
    const records = await this.store.list(this.currentEpoch());
    return records.find((r) => r.token === token);
  }

  /**
   * Cool the credential, then disable it if the streak the store counted
   * reached the threshold. Serialized so the cooldown length matches the streak.
   */
  private async recordTransientFailure(token: string, kind: UpstreamFailureKind, detail: string): Promise<void> {
    const current = await this.findRecord(token);
    const delayMs = this.cooldownFor(current?.failureStreak ?? 0);
    const cooled = await this.store.applyDelta(token, {
      type: "cool",
      until: this.now() + delayMs,
    });
    if (!cooled.changed) return;

    const streak = cooled.record.failureStreak;
    if (this.disableAfterFailures > 0 && streak >= this.disableAfterFailures) {
      const { record, changed } = await this.store.applyDelta(token, {
        type: "disable",
        reason: `${streak} consecutive transient failures (last: ${kind})`,
      });
      if (changed) {
        log.warn("[Pool] Credential disabled after repeated failures", {
          credential: record.id,
          failures: streak,
        });
      }
      return;
    }

    log.warn("[Pool] Credential cooling", {
      credential: cooled.record.id,
      kind,
      detail,
      seconds: Math.round(delayMs / 1000),
    });
  }

  /** min(base * 2^streak, max), ±10 % jitter. */
  private cooldownFor(streak: number): number {
    const raw = Math.min(this.cooldownBaseMs * Math.pow(2, streak), this.cooldownMaxMs);
    return Math.round(Math.min(jitter(raw, 0.1, this.random), this.cooldownMaxMs));
  }

  private reservedCount(token: string): number {
    return this.reservations.get(token)?.length ?? 0;
  }

  private reserve(token: string, now: number): void {
    const stamps = this.reservations.get(token) ?? [];
    stamps.push(now);
    this.reservations.set(token, stamps);
  }

  private releaseStale(now: number): void {
    for (const [token, stamps] of this.reservations) {
      const fresh = stamps.filter((t) => now - t <= this.reservationTtlMs);
      if (fresh.length === stamps.length) continue;
      log.warn("[Pool] Auto-releasing stale reservations", { released: stamps.length - fresh.length });
      if (fresh.length === 0) this.reservations.delete(token);
      else this.reservations.set(token, fresh);
    }
  }

  private toSummary(record: CredentialRecord, epoch: string, now: number): CredentialSummary {
    const dailyUsed = record.quotaEpoch === epoch ? record.dailyUsed : 0;
    const health = effectiveHealth(record, now);
    return {
      id: record.id,
      tokenPreview: tokenPreview(record.token),
      dailyUsed,
      dailyLimit: this.dailyLimit,
      remaining: Math.max(0, this.dailyLimit - dailyUsed),
      quotaEpoch: epoch,
      health,
      coolingUntil:
        health === "cooling" && record.coolingUntil !== null
          ? new Date(record.coolingUntil).toISOString()
          : null,
      verified: record.verified,
      nsfwEnabled: record.nsfwEnabled,
      lastUsedAt: record.lastUsedAt !== null ? new Date(record.lastUsedAt).toISOString() : null,
      failureStreak: record.failureStreak,
      disabledReason: record.disabledReason,
    };
  }
}
