import { Hono } from "hono";
import { html } from "hono/html";
import type { ArtifactCache } from "../generation/artifact-cache.js";
import { contentTypeFor, nameFromLocator } from "../generation/artifact-cache.js";
import type { CredentialPool } from "../pool/credential-pool.js";
import { makeOpenAIError } from "../middleware/error-handler.js";

const GALLERY_LIMIT = 200;

export function createWebRoutes(pool: CredentialPool, cache: ArtifactCache): Hono {
  const app = new Hono();

  app.get("/health", async (c) => {
    const summary = await pool.getSummary();
    return c.json({
      status: summary.available > 0 ? "ok" : "degraded",
      pool: summary,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/images/:name", async (c) => {
    const name = nameFromLocator(c.req.param("name"));
    const bytes = name ? await cache.retrieve(name) : null;
    if (!name || !bytes) {
      return c.json(makeOpenAIError("Image not found", "invalid_request_error", "not_found"), 404);
    }
    return c.body(new Uint8Array(bytes), 200, {
      "Content-Type": contentTypeFor(name),
      "Cache-Control": "public, max-age=31536000, immutable",
    });
  });

  app.get("/gallery", async (c) => {
    const images = await cache.list(GALLERY_LIMIT);
    return c.html(html`<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Imagine Gateway Gallery</title>
<style>
  body { font-family: system-ui, sans-serif; margin: 1.5rem; background: #111; color: #eee; }
  .grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(220px, 1fr)); gap: 12px; }
  .grid a img { width: 100%; border-radius: 6px; display: block; }
  .meta { font-size: 12px; color: #999; margin-top: 4px; }
</style>
</head>
<body>
<h1>Gallery</h1>
<p>${images.length} image(s)</p>
<div class="grid">
${images.map(
  (img) => html`<div><a href="${img.locator}" target="_blank"><img src="${img.locator}" loading="lazy" alt="${img.name}"></a><div class="meta">${img.createdAt}</div></div>`,
)}
</div>
</body>
</html>`);
  });

  return app;
}
