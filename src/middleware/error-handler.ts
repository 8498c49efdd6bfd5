import type { Context } from "hono";
import type { JobFailure } from "../generation/orchestrator.js";
import { StoreUnavailableError } from "../pool/errors.js";
import type { OpenAIErrorBody } from "../types/openai.js";
import { log } from "../utils/logger.js";

export type ApiStatus = 400 | 401 | 404 | 429 | 500 | 502 | 503 | 504;

/** An error that renders as an OpenAI-shaped body with a fixed status. */
export class ApiError extends Error {
  constructor(
    readonly status: ApiStatus,
    message: string,
    readonly code: string,
    readonly type: string = status < 500 ? "invalid_request_error" : "server_error",
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function makeOpenAIError(
  message: string,
  type: string,
  code: string | null,
): OpenAIErrorBody {
  return {
    error: {
      message,
      type,
      param: null,
      code,
    },
  };
}

const FAILURE_STATUS: Record<JobFailure, { status: ApiStatus; code: string }> = {
  PoolExhausted: { status: 503, code: "no_available_credentials" },
  StoreUnavailable: { status: 503, code: "store_unavailable" },
  GenerationFailed: { status: 502, code: "generation_failed" },
  Timeout: { status: 504, code: "generation_timeout" },
};

/** Map a terminal job failure onto the HTTP error the caller sees. */
export function failureToApiError(failure: JobFailure, message: string): ApiError {
  const { status, code } = FAILURE_STATUS[failure];
  return new ApiError(status, message, code);
}

/** Hono onError handler: every uncaught error leaves as an OpenAI-format body. */
export function errorHandler(err: Error, c: Context): Response {
  if (err instanceof ApiError) {
    if (err.status >= 500) log.warn("[ErrorHandler] Request failed", { status: err.status, code: err.code, error: err.message });
    return c.json(makeOpenAIError(err.message, err.type, err.code), err.status);
  }
  if (err instanceof StoreUnavailableError) {
    log.error("[ErrorHandler] Store unavailable", { error: err.message });
    return c.json(makeOpenAIError(err.message, "server_error", "store_unavailable"), 503);
  }

  log.error("[ErrorHandler] Unhandled error", { error: err.message, stack: err.stack });
  return c.json(makeOpenAIError(err.message || "Internal server error", "server_error", "internal_error"), 500);
}
