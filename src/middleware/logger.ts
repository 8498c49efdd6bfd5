import type { Context, Next } from "hono";
import { log } from "../utils/logger.js";

export async function logger(c: Context, next: Next): Promise<void> {
  const start = Date.now();
  const method = c.req.method;
  const path = c.req.path;
  const rid = c.get("requestId") ?? "-";

  log.debug(`→ ${method} ${path}`, { rid, method, path });

  await next();

  const ms = Date.now() - start;
  const status = c.res.status;
  const entry = { rid, method, path, status, ms };
  if (status >= 500) log.warn(`← ${method} ${path} ${status} ${ms}ms`, entry);
  else log.info(`← ${method} ${path} ${status} ${ms}ms`, entry);
}
