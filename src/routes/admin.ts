/**
 * Operator API routes.
 *
 * GET    /admin/status                   pool summary + per-credential state
 * POST   /admin/credentials/reload       re-read the token file
 * POST   /admin/credentials/reset-usage  zero every credential's usage in the current epoch
 * POST   /admin/credentials/:id/reset    return a cooling or disabled credential to service
 * GET    /admin/images?limit=N           list cached images, newest first
 * DELETE /admin/images                   delete every cached image
 */

import { Hono } from "hono";
import type { ArtifactCache } from "../generation/artifact-cache.js";
import type { CredentialPool } from "../pool/credential-pool.js";
import { ApiError } from "../middleware/error-handler.js";

export function createAdminRoutes(
  pool: CredentialPool,
  cache: ArtifactCache,
  baseUrl: string,
  activeJobs: () => number = () => 0,
): Hono {
  const app = new Hono();

  app.get("/admin/status", async (c) => {
    const [summary, credentials] = await Promise.all([pool.getSummary(), pool.snapshot()]);
    return c.json({ pool: summary, activeJobs: activeJobs(), credentials });
  });

  app.post("/admin/credentials/reload", async (c) => {
    const count = await pool.reload();
    return c.json({ success: true, credentials: count });
  });

  app.post("/admin/credentials/reset-usage", async (c) => {
    await pool.resetDailyUsage();
    return c.json({ success: true });
  });

  app.post("/admin/credentials/:id/reset", async (c) => {
    const id = c.req.param("id");
    if (!(await pool.resetCredential(id))) {
      throw new ApiError(404, `Credential '${id}' not found`, "not_found");
    }
    return c.json({ success: true, id });
  });

  app.get("/admin/images", async (c) => {
    const raw = c.req.query("limit");
    const limit = raw ? parseInt(raw, 10) : 50;
    if (!Number.isFinite(limit) || limit < 1) throw new ApiError(400, "limit must be a positive integer", "invalid_request");
    const images = await cache.list(limit);
    return c.json({
      count: images.length,
      images: images.map((img) => ({ ...img, url: baseUrl + img.locator })),
    });
  });

  app.delete("/admin/images", async (c) => {
    const removed = await cache.clear();
    return c.json({ success: true, removed });
  });

  return app;
}
