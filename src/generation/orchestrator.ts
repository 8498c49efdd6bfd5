/**
 * GenerationOrchestrator: runs one image job end to end.
 *
 *   pending → acquiring → generating → succeeded
 *                 ↑            │
 *                 └── retry ───┤ (credential failure, attempts left)
 *                              └→ failed (PoolExhausted | GenerationFailed | Timeout | StoreUnavailable)
 *
 * Every attempt counts against max_attempts, and a credential tried once is
 * not offered again within the same job. Quota is charged exactly once, after
 * the session returned all finals. The deadline is a hard stop: no retry, no
 * credential penalty.
 */

import { randomUUID } from "crypto";
import type { CredentialPool } from "../pool/credential-pool.js";
import { StoreUnavailableError, UnknownCredentialError, UpstreamError } from "../pool/errors.js";
import type { AcquiredCredential } from "../pool/types.js";
import type { FinalImage, GenerationRequest, SessionHooks, SessionProgress } from "../upstream/types.js";
import { errorMessage, log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { ArtifactCache } from "./artifact-cache.js";

export type JobState = "pending" | "acquiring" | "generating" | "succeeded" | "failed";

export type JobFailure = "PoolExhausted" | "GenerationFailed" | "Timeout" | "StoreUnavailable";

export interface GenerationJobRequest {
  prompt: string;
  variants: number;
  aspectRatio: string;
  enableNsfw?: boolean;
  /** Overrides the configured generation timeout for this job. */
  timeoutMs?: number;
  onProgress?: (progress: SessionProgress) => void;
}

export interface GeneratedArtifact {
  /** `<jobId>-<variantIndex>` */
  id: string;
  locator: string;
  bytes: Buffer;
}

export type GenerationResult =
  | { ok: true; jobId: string; attempts: number; artifacts: GeneratedArtifact[] }
  | { ok: false; jobId: string; attempts: number; failure: JobFailure; message: string };

/** The slice of SessionClient the orchestrator drives. */
export interface SessionRunner {
  run(
    credential: AcquiredCredential,
    request: GenerationRequest,
    signal: AbortSignal,
    hooks?: SessionHooks,
  ): Promise<FinalImage[]>;
}

export interface OrchestratorOptions {
  pool: CredentialPool;
  session: SessionRunner;
  cache: ArtifactCache;
  maxAttempts: number;
  timeoutMs: number;
  storeRetries: number;
  storeRetryDelayMs?: number;
  enableNsfw: boolean;
}

interface GenerationJob {
  id: string;
  request: GenerationJobRequest;
  state: JobState;
  attempts: number;
  tried: Set<string>;
  lastError: string | null;
}

export class GenerationOrchestrator {
  private active = 0;

  constructor(private readonly opts: OrchestratorOptions) {}

  /** Jobs currently acquiring or generating. */
  get activeJobs(): number {
    return this.active;
  }

  async generate(request: GenerationJobRequest): Promise<GenerationResult> {
    const job: GenerationJob = {
      id: randomUUID(),
      request,
      state: "pending",
      attempts: 0,
      tried: new Set(),
      lastError: null,
    };
    const controller = new AbortController();
    const timeoutMs = request.timeoutMs ?? this.opts.timeoutMs;
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    this.active++;
    log.info("[Job] Started", {
      job: job.id,
      variants: request.variants,
      aspectRatio: request.aspectRatio,
      timeoutMs,
    });
    try {
      return await this.runJob(job, controller.signal);
    } finally {
      clearTimeout(timer);
      this.active--;
    }
  }

  private async runJob(job: GenerationJob, signal: AbortSignal): Promise<GenerationResult> {
    let removedDuringAcquire = 0;
    while (job.attempts < this.opts.maxAttempts) {
      this.transition(job, "acquiring");
      let credential: AcquiredCredential | null;
      try {
        credential = await this.store(() => this.opts.pool.acquire(job.tried));
      } catch (err) {
        // A reload dropped the picked credential; pick again from the new list
        if (err instanceof UnknownCredentialError && ++removedDuringAcquire <= this.opts.maxAttempts) {
          log.warn("[Job] Credential removed while acquiring", { job: job.id, error: err.message });
          continue;
        }
        return this.fail(job, storeFailure(err), errorMessage(err));
      }
      if (!credential) {
        const reason = job.lastError ? `; last error: ${job.lastError}` : "";
        return this.fail(job, "PoolExhausted", `No credential available${reason}`);
      }
      if (signal.aborted) {
        this.opts.pool.release(credential.token);
        return this.fail(job, "Timeout", "Generation deadline reached");
      }

      job.attempts++;
      job.tried.add(credential.token);
      this.transition(job, "generating", { credential: credential.id, attempt: job.attempts });

      let finals: FinalImage[];
      try {
        finals = await this.opts.session.run(credential, this.sessionRequest(job), signal, this.hooks(job, credential));
      } catch (err) {
        const upstream =
          err instanceof UpstreamError
            ? err
            : new UpstreamError("TransportError", errorMessage(err), { cause: err });
        try {
          await this.store(() => this.opts.pool.recordFailure(credential.token, upstream.kind, upstream.message));
        } catch (storeErr) {
          if (!(storeErr instanceof UnknownCredentialError)) {
            return this.fail(job, storeFailure(storeErr), errorMessage(storeErr));
          }
          log.warn("[Job] Credential removed during attempt, failure not recorded", {
            job: job.id,
            credential: credential.id,
          });
        }
        if (upstream.kind === "GenerationTimeout") {
          return this.fail(job, "Timeout", upstream.message);
        }
        job.lastError = `${upstream.kind}: ${upstream.message}`;
        log.warn("[Job] Attempt failed", {
          job: job.id,
          credential: credential.id,
          attempt: job.attempts,
          kind: upstream.kind,
          failureClass: upstream.failureClass,
          error: upstream.message,
        });
        continue;
      }

      return this.succeed(job, credential, finals);
    }

    return this.fail(
      job,
      "GenerationFailed",
      `Gave up after ${job.attempts} attempt(s)${job.lastError ? `; last error: ${job.lastError}` : ""}`,
    );
  }

  private async succeed(
    job: GenerationJob,
    credential: AcquiredCredential,
    finals: FinalImage[],
  ): Promise<GenerationResult> {
    try {
      await this.store(() => this.opts.pool.recordSuccess(credential.token));
    } catch (err) {
      // The images exist upstream already; hand them out and leave the unit uncharged
      log.error("[Job] Could not charge credential", {
        job: job.id,
        credential: credential.id,
        error: errorMessage(err),
      });
    }

    const artifacts: GeneratedArtifact[] = [];
    try {
      for (const [index, image] of finals.entries()) {
        const locator = await this.opts.cache.store(job.id, index, image.bytes);
        artifacts.push({ id: `${job.id}-${index}`, locator, bytes: image.bytes });
      }
    } catch (err) {
      return this.fail(job, "GenerationFailed", `Could not store artifacts: ${errorMessage(err)}`);
    }

    this.transition(job, "succeeded", { credential: credential.id, artifacts: artifacts.length });
    return { ok: true, jobId: job.id, attempts: job.attempts, artifacts };
  }

  private fail(job: GenerationJob, failure: JobFailure, message: string): GenerationResult {
    this.transition(job, "failed", { failure, message });
    return { ok: false, jobId: job.id, attempts: job.attempts, failure, message };
  }

  private transition(job: GenerationJob, state: JobState, extra: Record<string, unknown> = {}): void {
    job.state = state;
    const entry = { job: job.id, state, ...extra };
    if (state === "failed") log.warn("[Job] Failed", entry);
    else if (state === "succeeded") log.info("[Job] Succeeded", entry);
    else log.debug("[Job] State", entry);
  }

  private sessionRequest(job: GenerationJob): GenerationRequest {
    return {
      prompt: job.request.prompt,
      variants: job.request.variants,
      aspectRatio: job.request.aspectRatio,
      enableNsfw: job.request.enableNsfw ?? this.opts.enableNsfw,
    };
  }

  private hooks(job: GenerationJob, credential: AcquiredCredential): SessionHooks {
    const pool = this.opts.pool;
    return {
      onVerified: () => this.persistFlag(() => pool.markVerified(credential.token), credential, "verified"),
      onCapabilityEnabled: () =>
        this.persistFlag(() => pool.markNsfwEnabled(credential.token), credential, "nsfwEnabled"),
      onProgress: job.request.onProgress,
      onState: (state) => log.debug("[Job] Session state", { job: job.id, state }),
    };
  }

  /** A flag that failed to persist is re-established on the credential's next attempt. */
  private async persistFlag(fn: () => Promise<void>, credential: AcquiredCredential, flag: string): Promise<void> {
    try {
      await this.store(fn);
    } catch (err) {
      log.error("[Job] Could not persist credential flag", {
        credential: credential.id,
        flag,
        error: errorMessage(err),
      });
    }
  }

  private store<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxRetries: this.opts.storeRetries,
      baseDelayMs: this.opts.storeRetryDelayMs ?? 200,
      tag: "Store",
    });
  }
}

function storeFailure(err: unknown): JobFailure {
  return err instanceof StoreUnavailableError ? "StoreUnavailable" : "GenerationFailed";
}
