/**
 * Resolves the curl binary, its browser-impersonation args and the outbound proxy.
 *
 * curl-impersonate is preferred: the activation endpoint sits behind a
 * challenge that checks the TLS fingerprint against the cf_clearance cookie.
 * System curl still works where the challenge is lenient.
 */

import { existsSync } from "fs";
import { execFileSync } from "child_process";
import { resolve } from "path";
import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";

const IS_WIN = process.platform === "win32";
const BINARY_NAME = IS_WIN ? "curl-impersonate.exe" : "curl-impersonate";

let _resolved: string | null = null;
let _isImpersonate = false;
let _tlsArgs: string[] | null = null;
let _proxyUrl: string | null = null;

/**
 * Resolve the curl binary path. Result is cached after first call.
 */
export function resolveCurlBinary(): string {
  if (_resolved) return _resolved;

  const setting = getConfig().tls.curl_binary;
  if (setting !== "auto") {
    _resolved = setting;
    _isImpersonate = setting.includes("curl-impersonate");
    log.info("[TLS] Using configured curl binary", { binary: setting });
    return _resolved;
  }

  const binPath = resolve(process.cwd(), "bin", BINARY_NAME);
  if (existsSync(binPath)) {
    _resolved = binPath;
    _isImpersonate = true;
    log.info("[TLS] Using curl-impersonate", { binary: binPath });
    return _resolved;
  }

  _resolved = "curl";
  _isImpersonate = false;
  log.warn("[TLS] curl-impersonate not found, falling back to system curl", { looked: binPath });
  return _resolved;
}

/** ["--impersonate", profile] when the binary supports it, otherwise nothing. */
function detectImpersonateArgs(binary: string): string[] {
  const profile = getConfig().tls.impersonate_profile;
  try {
    const helpOutput = execFileSync(binary, ["--help", "all"], {
      encoding: "utf-8",
      timeout: 5000,
    });
    if (helpOutput.includes("--impersonate")) {
      log.info("[TLS] Impersonating browser profile", { profile });
      return ["--impersonate", profile];
    }
  } catch (err) {
    log.warn("[TLS] Could not probe curl capabilities", {
      binary,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return [];
}

/** TLS impersonation args to prepend to curl commands; empty for system curl. */
export function getImpersonateArgs(): string[] {
  const binary = resolveCurlBinary();
  if (!_isImpersonate) return [];
  if (!_tlsArgs) _tlsArgs = detectImpersonateArgs(binary);
  return [..._tlsArgs];
}

/**
 * Initialize the outbound proxy. Called once at startup from index.ts.
 * Accepts http://, https://, socks4:// and socks5:// URLs.
 */
export function initProxy(): void {
  _proxyUrl = getConfig().tls.proxy_url;
  if (_proxyUrl) log.info("[Proxy] Using configured proxy", { proxy: _proxyUrl });
  else log.info("[Proxy] No proxy configured, direct connection");
}

export function getProxyArgs(): string[] {
  return _proxyUrl ? ["-x", _proxyUrl] : [];
}

/** The configured proxy URL (or null). Used by the WebSocket connector. */
export function getProxyUrl(): string | null {
  return _proxyUrl;
}

/** Reset cached state (for testing). */
export function resetCurlBinaryCache(): void {
  _resolved = null;
  _isImpersonate = false;
  _tlsArgs = null;
  _proxyUrl = null;
}
