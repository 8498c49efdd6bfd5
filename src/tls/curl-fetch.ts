/**
 * Request helper routed through curl(-impersonate) with the browser TLS profile.
 *
 * Used for the short upstream HTTP exchanges (activation, capability toggle,
 * artifact download). Bodies come back as raw bytes so images survive intact.
 */

import { execFile } from "child_process";
import { resolveCurlBinary, getImpersonateArgs, getProxyArgs } from "./curl-binary.js";

export interface CurlRequest {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

export interface CurlFetchResponse {
  status: number;
  body: Buffer;
  ok: boolean;
}

const STATUS_SEPARATOR = "\n__CURL_HTTP_STATUS__";
const MAX_BUFFER = 32 * 1024 * 1024;

export function buildCurlArgs(req: CurlRequest): string[] {
  const args = [
    ...getImpersonateArgs(),
    ...getProxyArgs(),
    "-s", "-S",
    "--compressed",
    "--max-time", String(req.timeoutSeconds ?? 30),
    "-X", req.method,
  ];
  for (const [key, value] of Object.entries(req.headers)) {
    args.push("-H", `${key}: ${value}`);
  }
  args.push("-H", "Expect:");
  if (req.body !== undefined) args.push("--data-raw", req.body);
  args.push("-w", STATUS_SEPARATOR + "%{http_code}", req.url);
  return args;
}

/** Split curl's stdout into body and the trailing status written by `-w`. */
export function parseCurlOutput(stdout: Buffer): CurlFetchResponse {
  const sepIdx = stdout.lastIndexOf(STATUS_SEPARATOR);
  if (sepIdx === -1) {
    throw new Error("curl: missing status separator in output");
  }
  const body = stdout.subarray(0, sepIdx);
  const status = parseInt(stdout.subarray(sepIdx + STATUS_SEPARATOR.length).toString("utf-8"), 10);
  return { status, body, ok: status >= 200 && status < 300 };
}

export function curlFetch(req: CurlRequest): Promise<CurlFetchResponse> {
  return new Promise((resolve, reject) => {
    execFile(
      resolveCurlBinary(),
      buildCurlArgs(req),
      { encoding: "buffer", maxBuffer: MAX_BUFFER, signal: req.signal },
      (err, stdout, stderr) => {
        if (err) {
          reject(new Error(`curl failed: ${err.message} ${stderr.toString("utf-8")}`, { cause: err }));
          return;
        }
        try {
          resolve(parseCurlOutput(stdout));
        } catch (parseErr) {
          reject(parseErr);
        }
      },
    );
  });
}
