/**
 * WebSocket connector for the upstream imagine service, with optional
 * HTTP(S) or SOCKS proxy and a ping heartbeat.
 */

import type { Agent } from "http";
import WebSocket from "ws";
import { HttpsProxyAgent } from "https-proxy-agent";
import { SocksProxyAgent } from "socks-proxy-agent";
import { UpstreamError } from "../pool/errors.js";
import { log } from "../utils/logger.js";
import type { ImagineSocket, SocketConnector } from "./types.js";

export function createProxyAgent(proxyUrl: string | null): Agent | undefined {
  if (!proxyUrl) return undefined;
  if (proxyUrl.startsWith("socks")) return new SocksProxyAgent(proxyUrl);
  return new HttpsProxyAgent(proxyUrl);
}

class WsImagineSocket implements ImagineSocket {
  private closeHandlers: Array<(code: number, reason: string) => void> = [];
  private closed = false;
  private heartbeat: ReturnType<typeof setInterval>;

  constructor(private readonly ws: WebSocket, heartbeatMs: number) {
    this.heartbeat = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) ws.ping();
    }, heartbeatMs);
    ws.on("close", (code: number, reason: Buffer) => this.emitClose(code, reason.toString("utf-8")));
    ws.on("error", (err: Error) => this.emitClose(1006, err.message));
  }

  send(message: string): void {
    this.ws.send(message);
  }

  onMessage(handler: (data: string) => void): void {
    this.ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return;
      handler(data.toString());
    });
  }

  onClose(handler: (code: number, reason: string) => void): void {
    this.closeHandlers.push(handler);
  }

  close(): void {
    clearInterval(this.heartbeat);
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
    }
  }

  private emitClose(code: number, reason: string): void {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.heartbeat);
    for (const handler of this.closeHandlers) handler(code, reason);
  }
}

export class WsConnector implements SocketConnector {
  constructor(
    private readonly proxyUrl: string | null,
    private readonly heartbeatMs: number,
  ) {}

  connect(url: string, headers: Record<string, string>, signal: AbortSignal): Promise<ImagineSocket> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, {
        headers,
        agent: createProxyAgent(this.proxyUrl),
        handshakeTimeout: 30_000,
      });

      const onAbort = () => {
        ws.terminate();
        reject(new UpstreamError("GenerationTimeout", "Deadline reached while connecting"));
      };
      signal.addEventListener("abort", onAbort, { once: true });

      const settle = () => {
        signal.removeEventListener("abort", onAbort);
        ws.removeAllListeners("open");
        ws.removeAllListeners("unexpected-response");
      };

      ws.once("open", () => {
        settle();
        ws.removeAllListeners("error");
        log.debug("[Upstream] WebSocket connected", { url });
        resolve(new WsImagineSocket(ws, this.heartbeatMs));
      });

      ws.once("unexpected-response", (_req, res) => {
        settle();
        const status = res.statusCode ?? 0;
        ws.terminate();
        if (status === 401 || status === 403) {
          reject(new UpstreamError("CredentialInvalid", `Session rejected with HTTP ${status}`));
        } else {
          reject(new UpstreamError("TransportError", `Unexpected handshake response HTTP ${status}`));
        }
      });

      ws.once("error", (err: Error) => {
        settle();
        reject(new UpstreamError("TransportError", `WebSocket error: ${err.message}`, { cause: err }));
      });
    });
  }
}
