import { Hono } from "hono";
import type { AppConfig } from "./config.js";
import { getBaseUrl } from "./config.js";
import type { ArtifactCache } from "./generation/artifact-cache.js";
import type { GenerationOrchestrator } from "./generation/orchestrator.js";
import { requireApiKey } from "./middleware/api-key.js";
import { errorHandler } from "./middleware/error-handler.js";
import { logger } from "./middleware/logger.js";
import { requestId } from "./middleware/request-id.js";
import type { CredentialPool } from "./pool/credential-pool.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createChatRoutes } from "./routes/chat.js";
import { createImageRoutes, type GenerationRouteSettings } from "./routes/images.js";
import { createModelRoutes } from "./routes/models.js";
import { createWebRoutes } from "./routes/web.js";

export interface AppDeps {
  config: AppConfig;
  pool: CredentialPool;
  orchestrator: Pick<GenerationOrchestrator, "generate" | "activeJobs">;
  cache: ArtifactCache;
}

export function createApp({ config, pool, orchestrator, cache }: AppDeps): Hono {
  const app = new Hono();
  const baseUrl = getBaseUrl(config);
  const settings: GenerationRouteSettings = {
    baseUrl,
    defaultVariants: config.generation.default_variants,
    maxVariants: config.generation.max_variants,
    defaultAspectRatio: config.generation.default_aspect_ratio,
  };

  // Global middleware
  app.use("*", requestId);
  app.use("*", logger);
  app.onError(errorHandler);

  const guard = requireApiKey(config.server.api_key);
  app.use("/v1/*", guard);
  app.use("/admin/*", guard);

  // Mount routes
  app.route("/", createImageRoutes(orchestrator, settings));
  app.route("/", createChatRoutes(orchestrator, settings));
  app.route("/", createModelRoutes());
  app.route("/", createAdminRoutes(pool, cache, baseUrl, () => orchestrator.activeJobs));
  app.route("/", createWebRoutes(pool, cache));

  return app;
}
