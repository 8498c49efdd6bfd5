/**
 * SessionClient: drives one generation attempt for one credential.
 *
 *   connect → activate? → enable_capability? → submit → await → fetch → done
 *
 * activate runs only for unverified credentials, enable_capability only when
 * the request wants the adult-content mode and the credential has not had it
 * switched on. Any unexpected error escaping a state is reported as that
 * state's failure kind; once the deadline signal fires everything is a
 * GenerationTimeout. The socket is always closed on exit.
 */

import { randomUUID } from "crypto";
import { UpstreamError, type UpstreamFailureKind } from "../pool/errors.js";
import type { AcquiredCredential } from "../pool/types.js";
import { errorMessage, log } from "../utils/logger.js";
import { sessionCookie } from "./imagine-http.js";
import { ImageTracker, type TrackedImage } from "./image-tracker.js";
import type {
  FinalImage,
  GenerationRequest,
  ImagineSocket,
  SessionHooks,
  SessionState,
  SocketConnector,
  UpstreamHttp,
} from "./types.js";

const STATE_FAILURE: Record<Exclude<SessionState, "done">, UpstreamFailureKind> = {
  connect: "TransportError",
  activate: "ActivationFailed",
  enable_capability: "CapabilityToggleFailed",
  submit: "TransportError",
  await: "TransportError",
  fetch: "ArtifactFetchFailed",
};

export interface SessionClientOptions {
  connector: SocketConnector;
  http: UpstreamHttp;
  wsUrl: string;
  origin: string;
  userAgent: string;
  activationUrl: string;
  capabilityUrl: string;
  capabilityBody: string;
  /** Out-of-band challenge cookie; activation is skipped while it is unset. */
  cfClearance: string | null;
  birthDate: string;
  finalMinBytes: number;
  mediumMinBytes: number;
  blockedGraceMs: number;
  idleSettleMs: number;
}

interface AttemptContext {
  credential: AcquiredCredential;
  request: GenerationRequest;
  signal: AbortSignal;
  hooks: SessionHooks;
  socket: ImagineSocket | null;
  tracker: ImageTracker | null;
  tracked: TrackedImage[];
  finals: FinalImage[];
}

export class SessionClient {
  constructor(private readonly opts: SessionClientOptions) {}

  async run(
    credential: AcquiredCredential,
    request: GenerationRequest,
    signal: AbortSignal,
    hooks: SessionHooks = {},
  ): Promise<FinalImage[]> {
    const ctx: AttemptContext = {
      credential,
      request,
      signal,
      hooks,
      socket: null,
      tracker: null,
      tracked: [],
      finals: [],
    };
    let state: SessionState = "connect";
    try {
      while (state !== "done") {
        if (signal.aborted) throw timeoutError(state);
        hooks.onState?.(state);
        state = await this.step(state, ctx);
      }
      return ctx.finals;
    } catch (err) {
      throw classify(state, err, signal);
    } finally {
      ctx.tracker?.dispose();
      ctx.socket?.close();
    }
  }

  private async step(state: SessionState, ctx: AttemptContext): Promise<SessionState> {
    switch (state) {
      case "connect":
        await this.connect(ctx);
        return this.afterConnect(ctx);
      case "activate":
        await this.activate(ctx);
        return this.afterActivate(ctx);
      case "enable_capability":
        await this.enableCapability(ctx);
        return "submit";
      case "submit":
        this.submit(ctx);
        return "await";
      case "await":
        ctx.tracked = await this.awaitFinals(ctx);
        return "fetch";
      case "fetch":
        ctx.finals = await this.fetchFinals(ctx);
        return "done";
      case "done":
        return "done";
    }
  }

  private afterConnect(ctx: AttemptContext): SessionState {
    if (!ctx.credential.verified) return "activate";
    return this.afterActivate(ctx);
  }

  private afterActivate(ctx: AttemptContext): SessionState {
    if (ctx.request.enableNsfw && !ctx.credential.nsfwEnabled) return "enable_capability";
    return "submit";
  }

  // ── States ──────────────────────────────────────────────────────

  private async connect(ctx: AttemptContext): Promise<void> {
    const { opts } = this;
    const socket = await opts.connector.connect(
      opts.wsUrl,
      {
        Cookie: sessionCookie(ctx.credential.token),
        Origin: opts.origin,
        "User-Agent": opts.userAgent,
        "Accept-Language": "en-US,en;q=0.9",
        "Cache-Control": "no-cache",
        Pragma: "no-cache",
      },
      ctx.signal,
    );
    ctx.socket = socket;

    // Attach before submit so no early frame is missed
    const tracker = new ImageTracker(
      ctx.request.variants,
      { finalMinBytes: opts.finalMinBytes, mediumMinBytes: opts.mediumMinBytes },
      { blockedGraceMs: opts.blockedGraceMs, idleSettleMs: opts.idleSettleMs },
      ctx.hooks.onProgress,
    );
    ctx.tracker = tracker;
    socket.onMessage((data) => tracker.handleMessage(data));
    socket.onClose((code, reason) => tracker.handleClose(code, reason));
  }

  private async activate(ctx: AttemptContext): Promise<void> {
    const { opts } = this;
    if (!opts.cfClearance) {
      log.warn("[Upstream] cf_clearance not configured, skipping activation", {
        credential: ctx.credential.id,
      });
      return;
    }
    const res = await opts.http.request({
      method: "POST",
      url: opts.activationUrl,
      headers: this.httpHeaders(ctx.credential.token, true),
      body: JSON.stringify({ birthDate: opts.birthDate }),
      signal: ctx.signal,
    });
    if (res.status < 200 || res.status >= 300) {
      throw new UpstreamError(
        "ActivationFailed",
        `Activation returned HTTP ${res.status}: ${res.body.toString("utf-8").slice(0, 200)}`,
      );
    }
    await ctx.hooks.onVerified?.();
  }

  private async enableCapability(ctx: AttemptContext): Promise<void> {
    const { opts } = this;
    const res = await opts.http.request({
      method: "POST",
      url: opts.capabilityUrl,
      headers: this.httpHeaders(ctx.credential.token, Boolean(opts.cfClearance)),
      body: opts.capabilityBody,
      signal: ctx.signal,
    });
    if (res.status === 401 || res.status === 403) {
      throw new UpstreamError("CredentialInvalid", `Capability toggle rejected with HTTP ${res.status}`);
    }
    if (res.status < 200 || res.status >= 300) {
      throw new UpstreamError("CapabilityToggleFailed", `Capability toggle returned HTTP ${res.status}`);
    }
    await ctx.hooks.onCapabilityEnabled?.();
  }

  private submit(ctx: AttemptContext): void {
    if (!ctx.socket) throw new UpstreamError("TransportError", "Submit without an open session");
    const { request } = ctx;
    ctx.socket.send(
      JSON.stringify({
        type: "conversation.item.create",
        timestamp: Date.now(),
        item: {
          type: "message",
          content: [
            {
              requestId: randomUUID(),
              text: request.prompt,
              type: "input_text",
              properties: {
                section_count: 0,
                is_kids_mode: false,
                enable_nsfw: request.enableNsfw,
                skip_upsampler: false,
                is_initial: false,
                aspect_ratio: request.aspectRatio,
              },
            },
          ],
        },
      }),
    );
    log.debug("[Upstream] Submitted generation", {
      credential: ctx.credential.id,
      variants: request.variants,
      aspectRatio: request.aspectRatio,
    });
  }

  private async awaitFinals(ctx: AttemptContext): Promise<TrackedImage[]> {
    const tracker = ctx.tracker;
    if (!tracker) throw new UpstreamError("TransportError", "Await without an open session");
    const onAbort = () => tracker.fail(timeoutError("await"));
    ctx.signal.addEventListener("abort", onAbort, { once: true });
    try {
      return await tracker.wait();
    } finally {
      ctx.signal.removeEventListener("abort", onAbort);
    }
  }

  private async fetchFinals(ctx: AttemptContext): Promise<FinalImage[]> {
    // Everything needed has arrived; drop the session before downloading
    ctx.socket?.close();
    const finals: FinalImage[] = [];
    for (const image of ctx.tracked) {
      const bytes = image.blob
        ? Buffer.from(image.blob, "base64")
        : await this.download(image.url, ctx);
      if (bytes.length === 0) {
        throw new UpstreamError("ArtifactFetchFailed", `Empty image payload for ${image.imageId}`);
      }
      finals.push({ imageId: image.imageId, url: image.url, bytes });
    }
    return finals;
  }

  private async download(url: string, ctx: AttemptContext): Promise<Buffer> {
    const res = await this.opts.http.request({
      method: "GET",
      url: new URL(url, this.opts.origin).toString(),
      headers: this.httpHeaders(ctx.credential.token, false),
      signal: ctx.signal,
    });
    if (res.status < 200 || res.status >= 300) {
      throw new UpstreamError("ArtifactFetchFailed", `Image download returned HTTP ${res.status}`);
    }
    return res.body;
  }

  private httpHeaders(token: string, withClearance: boolean): Record<string, string> {
    return {
      "User-Agent": this.opts.userAgent,
      Origin: this.opts.origin,
      Referer: `${this.opts.origin}/`,
      Accept: "*/*",
      Cookie: sessionCookie(token, withClearance ? this.opts.cfClearance : null),
      "Content-Type": "application/json",
    };
  }
}

function timeoutError(state: SessionState): UpstreamError {
  return new UpstreamError("GenerationTimeout", `Generation deadline reached during ${state}`);
}

function classify(state: SessionState, err: unknown, signal: AbortSignal): UpstreamError {
  if (signal.aborted) {
    return err instanceof UpstreamError && err.kind === "GenerationTimeout"
      ? err
      : timeoutError(state);
  }
  if (err instanceof UpstreamError) return err;
  const kind = state === "done" ? "TransportError" : STATE_FAILURE[state];
  return new UpstreamError(kind, `${state} failed: ${errorMessage(err)}`, { cause: err });
}
