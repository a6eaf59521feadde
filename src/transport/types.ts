import type { Readable } from "node:stream";
import type { PathToken } from "../path/token.ts";

/**
 * HTTP methods spoken to the server
 */
export type DavMethod = "PROPFIND" | "GET" | "PUT" | "MKCOL" | "DELETE";

export interface TransportRequest {
  method: DavMethod;
  path: PathToken;
  headers?: Record<string, string>;
  /** Small bodies as bytes; file contents as a stream */
  body?: Uint8Array | Readable;
}

export interface TransportResponse {
  status: number;
  /** Response body, read lazily. Callers must consume it. */
  body: Readable;
}

/**
 * One request, one response. No authentication, no retries, no
 * interpretation of the status code.
 *
 * Implementations throw TransportError when no response was received.
 */
export interface TransportClient {
  /** Base URL hrefs in responses are resolved against */
  readonly baseUrl: string;

  request(request: TransportRequest): Promise<TransportResponse>;
}
