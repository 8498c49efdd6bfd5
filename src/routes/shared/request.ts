import type { Context } from "hono";
import { ApiError } from "../../middleware/error-handler.js";

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new ApiError(400, "Request body must be valid JSON", "invalid_request");
  }
}
