/**
 * ImageTracker: folds upstream socket events into per-image progress and
 * decides when the await phase is over.
 *
 * An image moves preview → medium → final and never back. The phase ends
 * when the requested number of finals has arrived (success), or with:
 *   - GenerationBlocked     a medium arrived but no final followed within the grace period
 *   - GenerationIncomplete  finals stopped arriving before the requested count
 *   - CredentialInvalid / CredentialBanned  explicit upstream account errors
 *   - TransportError        the socket closed with nothing usable
 */

import { z } from "zod";
import { UpstreamError } from "../pool/errors.js";
import { errorMessage, log } from "../utils/logger.js";
import type { ImageStage, SessionProgress } from "./types.js";

const IMAGE_URL_PATTERN = /\/images\/([a-f0-9-]+)\.(png|jpg)/;

const UpstreamEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("image"),
    url: z.string().default(""),
    blob: z.string().default(""),
  }),
  z.object({
    type: z.literal("error"),
    err_code: z.string().default(""),
    err_msg: z.string().default(""),
  }),
]);

export interface StageThresholds {
  finalMinBytes: number;
  mediumMinBytes: number;
}

export interface TrackerTimings {
  blockedGraceMs: number;
  idleSettleMs: number;
}

export interface TrackedImage {
  imageId: string;
  url: string;
  stage: ImageStage;
  /** base64 payload as received; empty when the event carried only a URL. */
  blob: string;
}

export function extractImageId(url: string): string | null {
  return IMAGE_URL_PATTERN.exec(url)?.[1] ?? null;
}

/**
 * A final is the full-size JPEG. A JPEG event without a payload is also
 * final; its bytes are downloaded from the URL afterwards.
 */
export function classifyStage(url: string, blobSize: number, thresholds: StageThresholds): ImageStage {
  const path = url.split("?")[0] ?? url;
  if (path.endsWith(".jpg") && (blobSize === 0 || blobSize > thresholds.finalMinBytes)) return "final";
  if (blobSize > thresholds.mediumMinBytes) return "medium";
  return "preview";
}

type Outcome = { ok: true } | { ok: false; error: UpstreamError };

export class ImageTracker {
  private readonly images = new Map<string, TrackedImage>();
  private readonly finals: TrackedImage[] = [];
  private sawMedium = false;
  private lastUpstreamError: string | null = null;
  private outcome: Outcome | null = null;
  private waiters: Array<(outcome: Outcome) => void> = [];
  private blockedTimer: ReturnType<typeof setTimeout> | null = null;
  private settleTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly expected: number,
    private readonly thresholds: StageThresholds,
    private readonly timings: TrackerTimings,
    private readonly onProgress?: (progress: SessionProgress) => void,
  ) {}

  get completed(): number {
    return this.finals.length;
  }

  handleMessage(raw: string): void {
    if (this.outcome) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      log.debug("[Upstream] Ignoring non-JSON frame", { length: raw.length });
      return;
    }
    const event = UpstreamEventSchema.safeParse(parsed);
    if (!event.success) return;

    if (event.data.type === "error") {
      this.handleUpstreamError(event.data.err_code, event.data.err_msg);
      return;
    }
    this.handleImage(event.data.url, event.data.blob);
  }

  handleClose(code: number, reason: string): void {
    if (this.outcome) return;
    const detail = `socket closed (${code}${reason ? `: ${reason}` : ""})`;
    if (this.finals.length > 0) {
      this.finish({
        ok: false,
        error: new UpstreamError(
          "GenerationIncomplete",
          `Received ${this.finals.length}/${this.expected} final images before ${detail}`,
        ),
      });
    } else if (this.sawMedium) {
      this.finish({ ok: false, error: new UpstreamError("GenerationBlocked", `Generation blocked, ${detail}`) });
    } else {
      const upstream = this.lastUpstreamError ? ` after upstream error ${this.lastUpstreamError}` : "";
      this.finish({ ok: false, error: new UpstreamError("TransportError", `No final image, ${detail}${upstream}`) });
    }
  }

  /** Abort the phase from outside (deadline or cancellation). */
  fail(error: UpstreamError): void {
    this.finish({ ok: false, error });
  }

  /** Resolve with the finals in arrival order, or reject with the terminal error. */
  wait(): Promise<TrackedImage[]> {
    return new Promise((resolve, reject) => {
      const deliver = (outcome: Outcome) => {
        if (outcome.ok) resolve(this.finals.slice(0, this.expected));
        else reject(outcome.error);
      };
      if (this.outcome) deliver(this.outcome);
      else this.waiters.push(deliver);
    });
  }

  dispose(): void {
    this.clearTimers();
  }

  // ── Internal ────────────────────────────────────────────────────

  private handleImage(url: string, blob: string): void {
    if (!url) return;
    const imageId = extractImageId(url);
    if (!imageId) return;

    const existing = this.images.get(imageId);
    if (existing?.stage === "final") return;

    const stage = classifyStage(url, blob.length, this.thresholds);
    const image: TrackedImage = { imageId, url, stage, blob };
    this.images.set(imageId, image);

    if (stage === "final") {
      this.finals.push(image);
    } else if (stage === "medium" && !this.sawMedium) {
      this.sawMedium = true;
      this.blockedTimer = setTimeout(() => this.checkBlocked(), this.timings.blockedGraceMs);
    }

    log.debug("[Upstream] Image update", {
      image: imageId.slice(0, 8),
      stage,
      size: blob.length,
      completed: this.finals.length,
      expected: this.expected,
    });
    this.emitProgress({
      imageId,
      stage,
      blobSize: blob.length,
      completed: this.finals.length,
      total: this.expected,
    });

    if (this.finals.length >= this.expected) {
      this.finish({ ok: true });
      return;
    }
    if (this.finals.length > 0) this.armSettleTimer();
  }

  private handleUpstreamError(code: string, message: string): void {
    log.warn("[Upstream] Error event", { code, message });
    if (code === "unauthorized") {
      this.finish({ ok: false, error: new UpstreamError("CredentialInvalid", `Upstream rejected session: ${message || code}`) });
    } else if (code === "rate_limit_exceeded") {
      this.finish({ ok: false, error: new UpstreamError("CredentialBanned", `Upstream rate limit: ${message || code}`) });
    } else {
      this.lastUpstreamError = code || message || "unknown";
    }
  }

  private checkBlocked(): void {
    this.blockedTimer = null;
    if (this.finals.length > 0) return;
    this.finish({
      ok: false,
      error: new UpstreamError(
        "GenerationBlocked",
        `No final image within ${this.timings.blockedGraceMs}ms of the first medium preview`,
      ),
    });
  }

  private armSettleTimer(): void {
    if (this.settleTimer) clearTimeout(this.settleTimer);
    this.settleTimer = setTimeout(() => {
      this.settleTimer = null;
      this.finish({
        ok: false,
        error: new UpstreamError(
          "GenerationIncomplete",
          `Received ${this.finals.length}/${this.expected} final images before the session went idle`,
        ),
      });
    }, this.timings.idleSettleMs);
  }

  private emitProgress(progress: SessionProgress): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(progress);
    } catch (err) {
      log.warn("[Upstream] Progress callback failed", { error: errorMessage(err) });
    }
  }

  private finish(outcome: Outcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    this.clearTimers();
    const waiters = this.waiters;
    this.waiters = [];
    for (const deliver of waiters) deliver(outcome);
  }

  private clearTimers(): void {
    if (this.blockedTimer) clearTimeout(this.blockedTimer);
    if (this.settleTimer) clearTimeout(this.settleTimer);
    this.blockedTimer = null;
    this.settleTimer = null;
  }
}
