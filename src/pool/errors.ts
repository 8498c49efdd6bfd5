/**
 * Failure taxonomy shared by the pool, the upstream session client and the orchestrator.
 */

/** Raised by a session attempt; classified by the pool into a health change. */
export type UpstreamFailureKind =
  | "CredentialInvalid"
  | "CredentialBanned"
  | "ActivationFailed"
  | "CapabilityToggleFailed"
  | "GenerationBlocked"
  | "GenerationIncomplete"
  | "ArtifactFetchFailed"
  | "TransportError"
  | "GenerationTimeout";

export type FailureClass = "permanent" | "transient" | "request";

const FAILURE_CLASS: Record<UpstreamFailureKind, FailureClass> = {
  CredentialInvalid: "permanent",
  CredentialBanned: "permanent",
  ActivationFailed: "transient",
  CapabilityToggleFailed: "transient",
  GenerationBlocked: "transient",
  GenerationIncomplete: "transient",
  ArtifactFetchFailed: "transient",
  TransportError: "transient",
  GenerationTimeout: "request",
};

export function classifyFailure(kind: UpstreamFailureKind): FailureClass {
  return FAILURE_CLASS[kind];
}

export class UpstreamError extends Error {
  readonly kind: UpstreamFailureKind;

  constructor(kind: UpstreamFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamError";
    this.kind = kind;
  }

  get failureClass(): FailureClass {
    return classifyFailure(this.kind);
  }
}

/** Backing store (file or Redis) could not be read or written. */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export class UnknownCredentialError extends Error {
  constructor(ref: string) {
    super(`Unknown credential: ${ref}`);
    this.name = "UnknownCredentialError";
  }
}
