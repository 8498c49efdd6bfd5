/**
 * Seams between the session state machine and the network. Production uses
 * the ws connector and curl; tests substitute in-process fakes.
 */

export interface ImagineSocket {
  send(message: string): void;
  onMessage(handler: (data: string) => void): void;
  /** Called once when the socket closes or errors. */
  onClose(handler: (code: number, reason: string) => void): void;
  close(): void;
}

export interface SocketConnector {
  /**
   * Open an authenticated session. Rejects with UpstreamError:
   * CredentialInvalid on an authentication rejection, TransportError otherwise.
   */
  connect(url: string, headers: Record<string, string>, signal: AbortSignal): Promise<ImagineSocket>;
}

export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: Buffer;
}

export interface UpstreamHttp {
  request(req: HttpRequest): Promise<HttpResponse>;
}

export type ImageStage = "preview" | "medium" | "final";

export interface SessionProgress {
  imageId: string;
  stage: ImageStage;
  blobSize: number;
  completed: number;
  total: number;
}

/** Named protocol states; each one owns the failure kind it raises. */
export type SessionState =
  | "connect"
  | "activate"
  | "enable_capability"
  | "submit"
  | "await"
  | "fetch"
  | "done";

/** Callbacks a session attempt fires; flag hooks persist before the attempt continues. */
export interface SessionHooks {
  onVerified?: () => Promise<void>;
  onCapabilityEnabled?: () => Promise<void>;
  onProgress?: (progress: SessionProgress) => void;
  onState?: (state: SessionState) => void;
}

export interface GenerationRequest {
  prompt: string;
  variants: number;
  aspectRatio: string;
  enableNsfw: boolean;
}

export interface FinalImage {
  imageId: string;
  url: string;
  bytes: Buffer;
}
