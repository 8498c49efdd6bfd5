/**
 * RedisCredentialStore: pool state shared by several gateway instances.
 *
 * Redis layout (prefix defaults to "imagine:"):
 *   <prefix>cred:<id>        Hash   health, coolingUntil, lastUsedAt, failureStreak,
 *                                   verified, nsfwEnabled, disabled, disabledReason
 *   <prefix>usage:<epoch>    Hash   <id> → successful generations in that epoch
 *   <prefix>cursor           String round-robin cursor (INCR)
 *
 * No in-process locks: every mutation maps onto Redis atomic primitives.
 * Charging is HINCRBY with a compensating decrement past the limit, one-way
 * flags are HSETNX, and disablement lives in its own field so a concurrent
 * cooldown write can never undo it. Usage counters are keyed by epoch, so
 * the quota rollover is simply a new key; old keys expire on their own.
 */

import { Redis } from "ioredis";
import { errorMessage, log } from "../utils/logger.js";
import { StoreUnavailableError, UnknownCredentialError } from "./errors.js";
import { credentialId, isHealthy, type CredentialStore } from "./store.js";
import type { ApplyResult, CredentialMutation, CredentialRecord } from "./types.js";

/** The commands the store issues; satisfied by an ioredis client. */
export interface RedisCommands {
  ping(): Promise<string>;
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, values: Record<string, string>): Promise<number>;
  hsetnx(key: string, field: string, value: string): Promise<number>;
  hincrby(key: string, field: string, increment: number): Promise<number>;
  hdel(key: string, ...fields: string[]): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  incr(key: string): Promise<number>;
  quit(): Promise<string>;
}

/** Floor for the usage counter TTL (seconds). */
const MIN_USAGE_TTL_SECONDS = 3 * 24 * 3600;

function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export class RedisCredentialStore implements CredentialStore {
  readonly kind = "redis" as const;
  private readonly redis: RedisCommands;
  private readonly prefix: string;
  private readonly usageTtlSeconds: number;
  private tokens: string[] = [];
  private tokenIds = new Map<string, string>();
  /** Epoch of the last listing; used when reading back after epoch-less mutations. */
  private lastEpoch = "";

  /**
   * @param epochDurationMs length of one quota epoch; usage counters live for
   *   at least two of them after their last charge.
   */
  constructor(redis: RedisCommands, prefix = "imagine:", epochDurationMs = 0) {
    this.redis = redis;
    this.prefix = prefix;
    this.usageTtlSeconds = Math.max(MIN_USAGE_TTL_SECONDS, Math.ceil((2 * epochDurationMs) / 1000));
  }

  async load(tokens: readonly string[], epoch: string): Promise<CredentialRecord[]> {
    this.tokens = [...new Set(tokens)];
    this.tokenIds = new Map(this.tokens.map((t) => [t, credentialId(t)]));

    await this.exec("load", async () => {
      await this.redis.ping();
      await Promise.all(
        this.tokens.map(async (token) => {
          const key = this.credKey(token);
          await this.redis.hsetnx(key, "health", "available");
          await this.redis.hsetnx(key, "failureStreak", "0");
        }),
      );
    });

    log.info("[RedisStore] Loaded pool state", {
      prefix: this.prefix,
      credentials: this.tokens.length,
    });
    return this.list(epoch);
  }

  async list(epoch: string): Promise<CredentialRecord[]> {
    this.lastEpoch = epoch;
    return this.exec("list", async () => {
      const [usage, ...hashes] = await Promise.all([
        this.redis.hgetall(this.usageKey(epoch)),
        ...this.tokens.map((t) => this.redis.hgetall(this.credKey(t))),
      ]);
      return this.tokens.map((token, i) =>
        this.toRecord(token, hashes[i] ?? {}, usage[this.idOf(token)], epoch),
      );
    });
  }

  async listHealthy(epoch: string, now: number): Promise<CredentialRecord[]> {
    return (await this.list(epoch)).filter((r) => isHealthy(r, now));
  }

  async applyDelta(token: string, mutation: CredentialMutation): Promise<ApplyResult> {
    const id = this.tokenIds.get(token);
    if (!id) throw new UnknownCredentialError(credentialId(token));
    const key = this.credKey(token);

    return this.exec(mutation.type, async () => {
      let changed = true;
      let epoch = this.lastEpoch;

      switch (mutation.type) {
        case "rollover":
          // Counters are keyed by epoch; a new epoch starts at zero by itself
          changed = false;
          epoch = mutation.epoch;
          break;

        case "touch":
          await this.redis.hset(key, { lastUsedAt: String(mutation.at) });
          break;

        case "charge": {
          epoch = mutation.epoch;
          const usageKey = this.usageKey(mutation.epoch);
          const used = await this.redis.hincrby(usageKey, id, 1);
          if (used > mutation.limit) {
            await this.redis.hincrby(usageKey, id, -1);
            changed = false;
            break;
          }
          await this.redis.expire(usageKey, this.usageTtlSeconds);
          await this.redis.hset(key, {
            lastUsedAt: String(mutation.at),
            failureStreak: "0",
          });
          break;
        }

        case "cool": {
          const disabled = await this.redis.hget(key, "disabled");
          if (disabled === "1") {
            changed = false;
            break;
          }
          await this.redis.hincrby(key, "failureStreak", 1);
          await this.redis.hset(key, {
            health: "cooling",
            coolingUntil: String(mutation.until),
          });
          break;
        }

        case "disable":
          changed = (await this.redis.hsetnx(key, "disabled", "1")) === 1;
          if (changed) {
            await this.redis.hset(key, { disabledReason: mutation.reason, coolingUntil: "" });
          }
          break;

        case "verify":
          changed = (await this.redis.hsetnx(key, "verified", "1")) === 1;
          break;

        case "enable_nsfw":
          changed = (await this.redis.hsetnx(key, "nsfwEnabled", "1")) === 1;
          break;

        case "reset":
          await this.redis.hdel(key, "disabled", "disabledReason", "coolingUntil");
          await this.redis.hset(key, { health: "available", failureStreak: "0" });
          break;

        case "reset_usage":
          epoch = mutation.epoch;
          await this.redis.hdel(this.usageKey(mutation.epoch), id);
          break;
      }

      return { record: await this.readOne(token, epoch), changed };
    });
  }

  async nextCursor(): Promise<number> {
    return this.exec("cursor", async () => (await this.redis.incr(this.key("cursor"))) - 1);
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (err) {
      log.warn("[RedisStore] Error while closing connection", { error: errorMessage(err) });
    }
  }

  // ── Internal ────────────────────────────────────────────────────

  private key(suffix: string): string {
    return `${this.prefix}${suffix}`;
  }

  private idOf(token: string): string {
    return this.tokenIds.get(token) ?? credentialId(token);
  }

  private credKey(token: string): string {
    return this.key(`cred:${this.idOf(token)}`);
  }

  private usageKey(epoch: string): string {
    return this.key(`usage:${epoch}`);
  }

  private async readOne(token: string, epoch: string): Promise<CredentialRecord> {
    const [hash, used] = await Promise.all([
      this.redis.hgetall(this.credKey(token)),
      this.redis.hget(this.usageKey(epoch), this.idOf(token)),
    ]);
    return this.toRecord(token, hash, used ?? undefined, epoch);
  }

  private toRecord(
    token: string,
    hash: Record<string, string>,
    used: string | undefined,
    epoch: string,
  ): CredentialRecord {
    const disabled = hash.disabled === "1";
    const cooling = hash.health === "cooling";
    return {
      token,
      id: this.idOf(token),
      dailyUsed: parseNumber(used) ?? 0,
      quotaEpoch: epoch,
      verified: hash.verified === "1",
      nsfwEnabled: hash.nsfwEnabled === "1",
      health: disabled ? "disabled" : cooling ? "cooling" : "available",
      coolingUntil: disabled ? null : parseNumber(hash.coolingUntil),
      lastUsedAt: parseNumber(hash.lastUsedAt),
      failureStreak: parseNumber(hash.failureStreak) ?? 0,
      disabledReason: disabled ? (hash.disabledReason ?? null) : null,
    };
  }

  private async exec<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof UnknownCredentialError) throw err;
      throw new StoreUnavailableError(`Redis ${op} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/**
 * Open a Redis connection that fails fast while the server is unreachable
 * instead of queueing commands.
 */
export async function connectRedis(url: string): Promise<Redis> {
  const redis = new Redis(url, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 200, 5000),
  });
  redis.on("error", (err: Error) => {
    log.warn("[RedisStore] Connection error", { error: err.message });
  });
  try {
    await redis.connect();
  } catch (err) {
    redis.disconnect();
    throw new StoreUnavailableError(`Cannot connect to Redis at ${url}: ${errorMessage(err)}`, { cause: err });
  }
  return redis;
}
