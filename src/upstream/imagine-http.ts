import { curlFetch } from "../tls/curl-fetch.js";
import type { HttpRequest, HttpResponse, UpstreamHttp } from "./types.js";

/** UpstreamHttp over curl-impersonate. */
export class CurlHttp implements UpstreamHttp {
  constructor(private readonly timeoutSeconds = 30) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    const res = await curlFetch({ ...req, timeoutSeconds: this.timeoutSeconds });
    return { status: res.status, body: res.body };
  }
}

export function sessionCookie(token: string, cfClearance?: string | null): string {
  const parts = [`sso=${token}`, `sso-rw=${token}`];
  if (cfClearance) parts.push(`cf_clearance=${cfClearance}`);
  return parts.join("; ");
}
