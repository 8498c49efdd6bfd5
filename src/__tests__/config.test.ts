import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";
import { getBaseUrl, getConfig, loadConfig, parseConfig, resetConfig } from "../config.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.server.port).toBe(9563);
    expect(config.pool).toMatchObject({
      backend: "file",
      daily_limit: 10,
      rotation_strategy: "hybrid",
      cooldown_base_seconds: 30,
      cooldown_max_seconds: 1800,
    });
    expect(config.quota).toEqual({ epoch: "calendar_day", timezone: "UTC", window_hours: 24 });
    expect(config.generation.max_attempts).toBe(5);
  });

  it("rejects an unknown rotation strategy", () => {
    expect(() => parseConfig({ pool: { rotation_strategy: "fastest" } })).toThrow();
  });

  it("rejects a non-positive daily limit", () => {
    expect(() => parseConfig({ pool: { daily_limit: 0 } })).toThrow();
  });
});

describe("getBaseUrl", () => {
  it("prefers the configured public origin without a trailing slash", () => {
    expect(getBaseUrl(parseConfig({ server: { base_url: "https://img.example.test/" } }))).toBe(
      "https://img.example.test",
    );
  });

  it("falls back to loopback for a wildcard bind address", () => {
    expect(getBaseUrl(parseConfig({ server: { host: "0.0.0.0", port: 8080 } }))).toBe("http://127.0.0.1:8080");
    expect(getBaseUrl(parseConfig({ server: { host: "10.0.0.5", port: 8080 } }))).toBe("http://10.0.0.5:8080");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    resetConfig();
    vi.stubEnv("PROXY_URL", "");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    resetConfig();
    await removeDir(dir);
  });

  it("reads the YAML file and applies environment overrides", async () => {
    await writeFile(
      join(dir, "default.yaml"),
      "pool:\n  daily_limit: 20\n  rotation_strategy: round_robin\nquota:\n  epoch: rolling_window\n  window_hours: 6\n",
      "utf-8",
    );
    vi.stubEnv("DAILY_LIMIT", "25");
    vi.stubEnv("API_KEY", "test-secret");

    const config = loadConfig(dir);
    expect(config.pool.daily_limit).toBe(25);
    expect(config.pool.rotation_strategy).toBe("round_robin");
    expect(config.server.api_key).toBe("test-secret");
    expect(config.quota).toMatchObject({ epoch: "rolling_window", window_hours: 6 });
    expect(getConfig()).toBe(config);
  });

  it("fails when the file is missing", () => {
    expect(() => loadConfig(dir)).toThrow();
  });
});
