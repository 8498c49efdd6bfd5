import { timingSafeEqual } from "crypto";
import type { MiddlewareHandler } from "hono";
import { ApiError } from "./error-handler.js";

function sameKey(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/** Bearer-key guard. A null key leaves the routes open. */
export function requireApiKey(apiKey: string | null): MiddlewareHandler {
  return async (c, next) => {
    if (!apiKey) {
      await next();
      return;
    }
    const header = c.req.header("Authorization");
    if (!header) throw new ApiError(401, "Missing Authorization header", "invalid_api_key");
    if (!header.startsWith("Bearer ")) {
      throw new ApiError(401, "Invalid Authorization format", "invalid_api_key");
    }
    if (!sameKey(header.slice(7), apiKey)) throw new ApiError(401, "Invalid API key", "invalid_api_key");
    await next();
  };
}
