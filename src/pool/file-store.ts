/**
 * FileCredentialStore: pool state in a single JSON document.
 *
 * Every mutation is a read-modify-write of the whole document under a
 * process-local mutex: the change is applied to a copy, written to a temp
 * file, fdatasync'ed and renamed over the document, and only then swapped
 * into memory. A crash therefore leaves either the old or the new document.
 *
 * Single-process ownership only; use the Redis store for shared pools.
 */

import { open, readFile, rename, mkdir } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { Mutex } from "../utils/mutex.js";
import { errorMessage, log } from "../utils/logger.js";
import { StoreUnavailableError, UnknownCredentialError } from "./errors.js";
import {
  applyMutation,
  credentialId,
  freshRecord,
  isHealthy,
  type CredentialStore,
} from "./store.js";
import type { ApplyResult, CredentialMutation, CredentialRecord } from "./types.js";

const StoredCredentialSchema = z.object({
  dailyUsed: z.number().int().min(0).default(0),
  quotaEpoch: z.string().default(""),
  verified: z.boolean().default(false),
  nsfwEnabled: z.boolean().default(false),
  health: z.enum(["available", "cooling", "disabled"]).default("available"),
  coolingUntil: z.number().nullable().default(null),
  lastUsedAt: z.number().nullable().default(null),
  failureStreak: z.number().int().min(0).default(0),
  disabledReason: z.string().nullable().default(null),
});

const PoolDocumentSchema = z.object({
  version: z.literal(1).default(1),
  cursor: z.number().int().min(0).default(0),
  credentials: z.record(StoredCredentialSchema).default({}),
});

type StoredCredential = z.infer<typeof StoredCredentialSchema>;
type PoolDocument = z.infer<typeof PoolDocumentSchema>;

function toStored(record: CredentialRecord): StoredCredential {
  return {
    dailyUsed: record.dailyUsed,
    quotaEpoch: record.quotaEpoch,
    verified: record.verified,
    nsfwEnabled: record.nsfwEnabled,
    health: record.health,
    coolingUntil: record.coolingUntil,
    lastUsedAt: record.lastUsedAt,
    failureStreak: record.failureStreak,
    disabledReason: record.disabledReason,
  };
}

function fromStored(token: string, stored: StoredCredential): CredentialRecord {
  return { token, id: credentialId(token), ...stored };
}

export class FileCredentialStore implements CredentialStore {
  readonly kind = "file" as const;
  private readonly filePath: string;
  private readonly mutex = new Mutex();
  private doc: PoolDocument = { version: 1, cursor: 0, credentials: {} };
  private tokens: string[] = [];

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(tokens: readonly string[], epoch: string): Promise<CredentialRecord[]> {
    return this.mutex.run(async () => {
      const doc = await this.readDocument();
      let added = 0;
      for (const token of tokens) {
        if (!doc.credentials[token]) {
          doc.credentials[token] = toStored(freshRecord(token, epoch));
          added++;
        }
      }
      if (added > 0) await this.writeDocument(doc);
      this.doc = doc;
      this.tokens = [...new Set(tokens)];
      log.info("[FileStore] Loaded pool state", {
        file: this.filePath,
        credentials: this.tokens.length,
        added,
      });
      return this.snapshot();
    });
  }

  async list(_epoch: string): Promise<CredentialRecord[]> {
    return this.snapshot();
  }

  async listHealthy(epoch: string, now: number): Promise<CredentialRecord[]> {
    return (await this.list(epoch)).filter((r) => isHealthy(r, now));
  }

  async applyDelta(token: string, mutation: CredentialMutation): Promise<ApplyResult> {
    return this.mutex.run(async () => {
      const stored = this.doc.credentials[token];
      if (!stored || !this.tokens.includes(token)) {
        throw new UnknownCredentialError(credentialId(token));
      }
      const result = applyMutation(fromStored(token, stored), mutation);
      if (!result.changed) return result;

      const next: PoolDocument = {
        ...this.doc,
        credentials: { ...this.doc.credentials, [token]: toStored(result.record) },
      };
      await this.writeDocument(next);
      this.doc = next;
      return result;
    });
  }

  async nextCursor(): Promise<number> {
    return this.mutex.run(async () => {
      const cursor = this.doc.cursor;
      const next: PoolDocument = { ...this.doc, cursor: cursor + 1 };
      await this.writeDocument(next);
      this.doc = next;
      return cursor;
    });
  }

  async close(): Promise<void> {
    // Drain pending writes
    await this.mutex.run(async () => undefined);
  }

  // ── Internal ────────────────────────────────────────────────────

  private snapshot(): CredentialRecord[] {
    const records: CredentialRecord[] = [];
    for (const token of this.tokens) {
      const stored = this.doc.credentials[token];
      if (stored) records.push(fromStored(token, stored));
    }
    return records;
  }

  private async readDocument(): Promise<PoolDocument> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return PoolDocumentSchema.parse({});
      }
      throw new StoreUnavailableError(`Cannot read ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
    try {
      return PoolDocumentSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new StoreUnavailableError(`Corrupt pool state in ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async writeDocument(doc: PoolDocument): Promise<void> {
    const tmpFile = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const handle = await open(tmpFile, "w");
      try {
        await handle.writeFile(JSON.stringify(doc, null, 2), "utf-8");
        await handle.datasync();
      } finally {
        await handle.close();
      }
      await rename(tmpFile, this.filePath);
    } catch (err) {
      throw new StoreUnavailableError(`Cannot write ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
