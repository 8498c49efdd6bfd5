/**
 * Shared fixtures: credential records, a temp-dir file pool and in-process
 * fakes for the upstream socket, the HTTP transport and the session runner.
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CredentialPool, type CredentialPoolOptions } from "../pool/credential-pool.js";
import { ArtifactCache } from "../generation/artifact-cache.js";
import {
  GenerationOrchestrator,
  type OrchestratorOptions,
  type SessionRunner,
} from "../generation/orchestrator.js";
import { UpstreamError, type UpstreamFailureKind } from "../pool/errors.js";
import { FileCredentialStore } from "../pool/file-store.js";
import { rollingWindowEpoch } from "../pool/quota-epoch.js";
import { freshRecord } from "../pool/store.js";
import type { AcquiredCredential, CredentialRecord } from "../pool/types.js";
import type {
  FinalImage,
  GenerationRequest,
  HttpRequest,
  HttpResponse,
  ImagineSocket,
  SessionHooks,
  SocketConnector,
  UpstreamHttp,
} from "../upstream/types.js";
import { createSeededRandom } from "../utils/jitter.js";

export const START = Date.UTC(2026, 9, 19, 12, 0, 0);

export function makeRecord(token: string, overrides: Partial<CredentialRecord> = {}): CredentialRecord {
  return { ...freshRecord(token, "2026-10-19"), ...overrides };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "imagine-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export class TestClock {
  constructor(public now: number = START) {}
  advance(ms: number): void {
    this.now += ms;
  }
}

export interface FilePoolFixture {
  pool: CredentialPool;
  store: FileCredentialStore;
  clock: TestClock;
  file: string;
}

export async function makeFilePool(
  dir: string,
  tokens: string[],
  overrides: Partial<CredentialPoolOptions> = {},
  clock: TestClock = new TestClock(),
): Promise<FilePoolFixture> {
  const file = join(dir, "pool-state.json");
  const store = new FileCredentialStore(file);
  const pool = new CredentialPool({
    store,
    strategy: "round_robin",
    dailyLimit: 10,
    epochPolicy: rollingWindowEpoch(24),
    cooldownBaseMs: 30_000,
    cooldownMaxMs: 1_800_000,
    disableAfterFailures: 10,
    tokenSource: async () => tokens,
    random: createSeededRandom(7),
    now: () => clock.now,
    ...overrides,
  });
  await pool.init();
  return { pool, store, clock, file };
}

// ── Upstream events ─────────────────────────────────────────────

const JPEG_MAGIC = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);

/** base64 of a JPEG-looking payload; 120 000 bytes encode to 160 000 chars. */
export function jpegBlob(bytes = 120_000): string {
  return Buffer.concat([JPEG_MAGIC, Buffer.alloc(bytes - JPEG_MAGIC.length, 1)]).toString("base64");
}

export function imageUrl(id: string, ext: "jpg" | "png"): string {
  return `https://assets.example.test/users/u-1/generated/${id}/images/${id}.${ext}`;
}

export function finalEvent(id: string): { type: "image"; url: string; blob: string } {
  return { type: "image", url: imageUrl(id, "jpg"), blob: jpegBlob() };
}

export function mediumEvent(id: string): { type: "image"; url: string; blob: string } {
  return { type: "image", url: imageUrl(id, "png"), blob: "B".repeat(40_000) };
}

export function previewEvent(id: string): { type: "image"; url: string; blob: string } {
  return { type: "image", url: imageUrl(id, "png"), blob: "C".repeat(1_000) };
}

// ── Fake transports ─────────────────────────────────────────────

export class FakeSocket implements ImagineSocket {
  readonly sent: string[] = [];
  closed = false;
  onSend: ((message: string) => void) | null = null;
  private messageHandlers: Array<(data: string) => void> = [];
  private closeHandlers: Array<(code: number, reason: string) => void> = [];

  send(message: string): void {
    this.sent.push(message);
    this.onSend?.(message);
  }

  onMessage(handler: (data: string) => void): void {
    this.messageHandlers.push(handler);
  }

  onClose(handler: (code: number, reason: string) => void): void {
    this.closeHandlers.push(handler);
  }

  close(): void {
    this.closed = true;
  }

  /** Deliver a frame as the server would. */
  emit(event: unknown): void {
    const raw = typeof event === "string" ? event : JSON.stringify(event);
    for (const handler of this.messageHandlers) handler(raw);
  }

  serverClose(code = 1000, reason = ""): void {
    for (const handler of this.closeHandlers) handler(code, reason);
  }
}

/** What the fake upstream does for a given session token. */
export type UpstreamScript =
  | { reject: UpstreamError }
  | { onSubmit: (socket: FakeSocket) => void };

export class FakeConnector implements SocketConnector {
  readonly connects: Array<{ url: string; token: string }> = [];
  readonly sockets: FakeSocket[] = [];

  constructor(private readonly script: (token: string) => UpstreamScript) {}

  async connect(url: string, headers: Record<string, string>): Promise<ImagineSocket> {
    const token = /sso=([^;]+)/.exec(headers.Cookie ?? "")?.[1] ?? "";
    this.connects.push({ url, token });
    const behaviour = this.script(token);
    if ("reject" in behaviour) throw behaviour.reject;
    const socket = new FakeSocket();
    socket.onSend = () => behaviour.onSubmit(socket);
    this.sockets.push(socket);
    return socket;
  }
}

export class FakeHttp implements UpstreamHttp {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly respond: (req: HttpRequest) => HttpResponse = () => ({ status: 200, body: Buffer.from("{}") })) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);
    return this.respond(req);
  }
}

/** Emit `count` finals for distinct images. */
export function emitFinals(socket: FakeSocket, count: number, prefix = "0a1b2c3d"): void {
  for (let i = 0; i < count; i++) socket.emit(finalEvent(`${prefix}-000${i}`));
}

/** Await a promise expected to reject with an UpstreamError and return its kind. */
export async function rejectionKind(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof UpstreamError) return err.kind;
    throw err;
  }
  throw new Error("expected the promise to reject");
}

// ── Session stand-in for orchestrator and route tests ───────────

export type SessionBehaviour = (signal: AbortSignal, hooks: SessionHooks) => Promise<FinalImage[]>;

export class FakeSession implements SessionRunner {
  readonly calls: Array<{ token: string; request: GenerationRequest }> = [];

  constructor(private readonly behaviour: (token: string) => SessionBehaviour) {}

  async run(
    credential: AcquiredCredential,
    request: GenerationRequest,
    signal: AbortSignal,
    hooks: SessionHooks = {},
  ): Promise<FinalImage[]> {
    this.calls.push({ token: credential.token, request });
    return this.behaviour(credential.token)(signal, hooks);
  }
}

export function makeFinals(count: number): FinalImage[] {
  return Array.from({ length: count }, (_, i) => ({
    imageId: `0a1b2c3d-000${i}`,
    url: imageUrl(`0a1b2c3d-000${i}`, "jpg"),
    bytes: Buffer.concat([JPEG_MAGIC, Buffer.from(`image-${i}`)]),
  }));
}

export const succeedWith =
  (count: number): SessionBehaviour =>
  async () =>
    makeFinals(count);

export const failWith =
  (kind: UpstreamFailureKind, message = "boom"): SessionBehaviour =>
  async () => {
    throw new UpstreamError(kind, message);
  };

/** Hangs until the deadline fires, then fails the way the session client does. */
export const hangUntilDeadline: SessionBehaviour = (signal) =>
  new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new UpstreamError("GenerationTimeout", "deadline reached")), {
      once: true,
    });
  });

export function makeOrchestrator(
  pool: CredentialPool,
  session: SessionRunner,
  cacheDir: string,
  overrides: Partial<OrchestratorOptions> = {},
): GenerationOrchestrator {
  return new GenerationOrchestrator({
    pool,
    session,
    cache: new ArtifactCache(cacheDir),
    maxAttempts: 3,
    timeoutMs: 5_000,
    storeRetries: 1,
    storeRetryDelayMs: 1,
    enableNsfw: true,
    ...overrides,
  });
}
