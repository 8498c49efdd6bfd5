import { serve } from "@hono/node-server";
import { resolve } from "path";
import { createApp } from "./app.js";
import { getBaseUrl, loadConfig, type AppConfig } from "./config.js";
import { ArtifactCache } from "./generation/artifact-cache.js";
import { GenerationOrchestrator } from "./generation/orchestrator.js";
import { CredentialPool } from "./pool/credential-pool.js";
import { StoreUnavailableError } from "./pool/errors.js";
import { FileCredentialStore } from "./pool/file-store.js";
import { createEpochPolicy, type QuotaEpochPolicy } from "./pool/quota-epoch.js";
import { connectRedis, RedisCredentialStore } from "./pool/redis-store.js";
import type { CredentialStore } from "./pool/store.js";
import { readTokenFile } from "./pool/token-file.js";
import { getProxyUrl, initProxy } from "./tls/curl-binary.js";
import { CurlHttp } from "./upstream/imagine-http.js";
import { WsConnector } from "./upstream/imagine-socket.js";
import { SessionClient } from "./upstream/session-client.js";
import { createSeededRandom } from "./utils/jitter.js";
import { errorMessage, log } from "./utils/logger.js";

const RESERVATION_MARGIN_MS = 60_000;

async function createStore(config: AppConfig, epochPolicy: QuotaEpochPolicy): Promise<CredentialStore> {
  if (config.pool.backend === "redis") {
    const redis = await connectRedis(config.redis.url);
    return new RedisCredentialStore(redis, config.redis.key_prefix, epochPolicy.durationMs);
  }
  return new FileCredentialStore(resolve(process.cwd(), config.pool.state_file));
}

function createSessionClient(config: AppConfig): SessionClient {
  const up = config.upstream;
  return new SessionClient({
    connector: new WsConnector(getProxyUrl(), up.heartbeat_seconds * 1000),
    http: new CurlHttp(),
    wsUrl: up.ws_url,
    origin: up.origin,
    userAgent: up.user_agent,
    activationUrl: up.activation_url,
    capabilityUrl: up.capability_url,
    capabilityBody: up.capability_body,
    cfClearance: up.cf_clearance,
    birthDate: up.birth_date,
    finalMinBytes: up.final_min_bytes,
    mediumMinBytes: up.medium_min_bytes,
    blockedGraceMs: up.blocked_grace_seconds * 1000,
    idleSettleMs: up.idle_settle_seconds * 1000,
  });
}

async function main() {
  // Load configuration
  log.info("[Init] Loading configuration...");
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    log.error("[Init] Failed to load configuration", { error: errorMessage(err) });
    log.error("[Init] Make sure config/default.yaml exists and is valid YAML.");
    process.exit(1);
  }

  initProxy();

  // Credential pool (fatal if the store is unreachable)
  const tokenFile = resolve(process.cwd(), config.pool.token_file);
  let pool: CredentialPool;
  try {
    const epochPolicy = createEpochPolicy(config.quota);
    const store = await createStore(config, epochPolicy);
    pool = new CredentialPool({
      store,
      strategy: config.pool.rotation_strategy,
      dailyLimit: config.pool.daily_limit,
      epochPolicy,
      cooldownBaseMs: config.pool.cooldown_base_seconds * 1000,
      cooldownMaxMs: config.pool.cooldown_max_seconds * 1000,
      disableAfterFailures: config.pool.disable_after_failures,
      // A reservation must outlive the longest job holding it
      reservationTtlMs: config.generation.timeout_seconds * 1000 + RESERVATION_MARGIN_MS,
      tokenSource: () => readTokenFile(tokenFile),
      random: config.pool.seed !== null ? createSeededRandom(config.pool.seed) : undefined,
    });
    await pool.init();
  } catch (err) {
    if (err instanceof StoreUnavailableError) {
      log.error("[Init] Credential store unavailable", { backend: config.pool.backend, error: err.message });
      process.exit(1);
    }
    throw err;
  }

  const cache = new ArtifactCache(resolve(process.cwd(), config.cache.images_dir));
  const orchestrator = new GenerationOrchestrator({
    pool,
    session: createSessionClient(config),
    cache,
    maxAttempts: config.generation.max_attempts,
    timeoutMs: config.generation.timeout_seconds * 1000,
    storeRetries: config.pool.store_retries,
    enableNsfw: config.generation.enable_nsfw,
  });

  const app = createApp({ config, pool, orchestrator, cache });

  // Start server
  const port = config.server.port;
  const host = config.server.host;
  const summary = await pool.getSummary();
  log.info("[Init] Imagine gateway listening", {
    url: `http://${host}:${port}`,
    publicUrl: getBaseUrl(config),
    credentials: summary.total,
    available: summary.available,
    backend: config.pool.backend,
    strategy: summary.strategy,
    auth: config.server.api_key ? "api_key" : "open",
  });
  if (summary.total === 0) {
    log.warn("[Init] No credentials loaded; add session tokens to the token file", { file: tokenFile });
  }

  const server = serve({
    fetch: app.fetch,
    hostname: host,
    port,
  });

  // Graceful shutdown: stop accepting, drain, then close the store
  let shutdownCalled = false;
  const DRAIN_TIMEOUT_MS = 5_000;
  const shutdown = () => {
    if (shutdownCalled) return;
    shutdownCalled = true;
    log.info("[Shutdown] Stopping new connections...");

    const forceExit = setTimeout(() => {
      log.error("[Shutdown] Timeout after 10s, forcing exit");
      process.exit(1);
    }, 10_000);
    forceExit.unref();

    let cleanupDone = false;
    const cleanup = async () => {
      if (cleanupDone) return;
      cleanupDone = true;
      try {
        await pool.destroy();
      } catch (err) {
        log.error("[Shutdown] Error during cleanup", { error: errorMessage(err) });
      }
      clearTimeout(forceExit);
      process.exit(0);
    };

    server.close(() => {
      log.info("[Shutdown] Server closed, cleaning up resources...");
      void cleanup();
    });

    setTimeout(() => {
      log.info("[Shutdown] Drain timeout reached, cleaning up...", { activeJobs: orchestrator.activeJobs });
      void cleanup();
    }, DRAIN_TIMEOUT_MS).unref();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  log.error("Fatal error", { error: errorMessage(err) });
  process.kill(process.pid, "SIGTERM");
  setTimeout(() => process.exit(1), 2000).unref();
});
