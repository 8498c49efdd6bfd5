import { StoreUnavailableError } from "../pool/errors.js";
import { log } from "./logger.js";

/** Retry a function while the credential store is unavailable, with exponential backoff. */
export async function withRetry<T>(
  fn: () => Promise<T>,
  {
    maxRetries = 2,
    baseDelayMs = 200,
    tag = "Store",
  }: { maxRetries?: number; baseDelayMs?: number; tag?: string } = {},
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (!(err instanceof StoreUnavailableError) || attempt === maxRetries) throw err;
      const delay = baseDelayMs * Math.pow(2, attempt);
      log.warn(`[${tag}] Retrying after store error (attempt ${attempt + 1}/${maxRetries}, delay ${delay}ms)`, {
        error: err.message,
      });
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastError;
}
