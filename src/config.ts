import { readFileSync } from "fs";
import { resolve } from "path";
import yaml from "js-yaml";
import { z } from "zod";

export const ROTATION_STRATEGIES = [
  "round_robin",
  "least_used",
  "least_recent",
  "weighted",
  "hybrid",
] as const;

const ConfigSchema = z.object({
  server: z.object({
    host: z.string().default("0.0.0.0"),
    port: z.number().int().default(9563),
    api_key: z.string().nullable().default(null),
    base_url: z.string().nullable().default(null),
  }),
  upstream: z.object({
    ws_url: z.string().default("wss://grok.com/ws/imagine/listen"),
    origin: z.string().default("https://grok.com"),
    activation_url: z.string().default("https://grok.com/rest/auth/set-birth-date"),
    capability_url: z.string().default("https://grok.com/rest/user-settings"),
    capability_body: z.string().default('{"preferences":{"safe_search":false}}'),
    user_agent: z.string().default(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36",
    ),
    cf_clearance: z.string().nullable().default(null),
    birth_date: z.string().default("2001-01-01T16:00:00.000Z"),
    final_min_bytes: z.number().int().positive().default(100_000),
    medium_min_bytes: z.number().int().positive().default(30_000),
    blocked_grace_seconds: z.number().positive().default(15),
    idle_settle_seconds: z.number().positive().default(10),
    heartbeat_seconds: z.number().positive().default(20),
  }),
  generation: z.object({
    timeout_seconds: z.number().positive().default(120),
    default_variants: z.number().int().min(1).default(4),
    max_variants: z.number().int().min(1).default(4),
    default_aspect_ratio: z.string().default("2:3"),
    max_attempts: z.number().int().min(1).default(5),
    enable_nsfw: z.boolean().default(true),
  }),
  pool: z.object({
    backend: z.enum(["file", "redis"]).default("file"),
    token_file: z.string().default("key.txt"),
    state_file: z.string().default("data/pool-state.json"),
    daily_limit: z.number().int().positive().default(10),
    rotation_strategy: z.enum(ROTATION_STRATEGIES).default("hybrid"),
    seed: z.number().int().nullable().default(null),
    cooldown_base_seconds: z.number().positive().default(30),
    cooldown_max_seconds: z.number().positive().default(1800),
    disable_after_failures: z.number().int().min(0).default(10),
    store_retries: z.number().int().min(0).default(2),
  }),
  quota: z.object({
    epoch: z.enum(["calendar_day", "rolling_window"]).default("calendar_day"),
    timezone: z.string().default("UTC"),
    window_hours: z.number().positive().default(24),
  }),
  redis: z.object({
    url: z.string().default("redis://localhost:6379/0"),
    key_prefix: z.string().default("imagine:"),
  }),
  tls: z.object({
    curl_binary: z.string().default("auto"),
    impersonate_profile: z.string().default("chrome133a"),
    proxy_url: z.string().nullable().default(null),
  }),
  cache: z.object({
    images_dir: z.string().default("data/images"),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type RotationStrategyName = AppConfig["pool"]["rotation_strategy"];

function loadYaml(filePath: string): unknown {
  const content = readFileSync(filePath, "utf-8");
  return yaml.load(content);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Return the named section of the raw document, creating it when absent. */
function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const existing = raw[name];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  raw[name] = created;
  return created;
}

function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const env = process.env;
  if (env.PORT) section(raw, "server").port = parseInt(env.PORT, 10);
  if (env.API_KEY) section(raw, "server").api_key = env.API_KEY;
  if (env.BASE_URL) section(raw, "server").base_url = env.BASE_URL;
  if (env.CF_CLEARANCE) section(raw, "upstream").cf_clearance = env.CF_CLEARANCE;
  if (env.IMAGINE_BACKEND) section(raw, "pool").backend = env.IMAGINE_BACKEND;
  if (env.ROTATION_STRATEGY) section(raw, "pool").rotation_strategy = env.ROTATION_STRATEGY;
  if (env.DAILY_LIMIT) section(raw, "pool").daily_limit = parseInt(env.DAILY_LIMIT, 10);
  if (env.REDIS_URL) section(raw, "redis").url = env.REDIS_URL;
  const proxy = env.PROXY_URL ?? env.HTTPS_PROXY ?? env.HTTP_PROXY;
  if (proxy) section(raw, "tls").proxy_url = proxy;
  return raw;
}

/** Parse and validate a raw config document; missing sections take their defaults. */
export function parseConfig(raw: unknown): AppConfig {
  const doc = isRecord(raw) ? raw : {};
  for (const name of Object.keys(ConfigSchema.shape)) section(doc, name);
  return ConfigSchema.parse(doc);
}

let _config: AppConfig | null = null;

export function loadConfig(configDir?: string): AppConfig {
  if (_config) return _config;
  const dir = configDir ?? resolve(process.cwd(), "config");
  const loaded = loadYaml(resolve(dir, "default.yaml"));
  const raw = isRecord(loaded) ? loaded : {};
  applyEnvOverrides(raw);
  _config = parseConfig(raw);
  return _config;
}

export function getConfig(): AppConfig {
  if (!_config) throw new Error("Config not loaded. Call loadConfig() first.");
  return _config;
}

/** Public origin for image URLs. */
export function getBaseUrl(config: AppConfig = getConfig()): string {
  if (config.server.base_url) return config.server.base_url.replace(/\/+$/, "");
  const host = config.server.host === "0.0.0.0" || config.server.host === "::"
    ? "127.0.0.1"
    : config.server.host;
  return `http://${host}:${config.server.port}`;
}

/** Reset the cached config (for testing). */
export function resetConfig(): void {
  _config = null;
}
