/**
 * Plain-HTTP transport on the global fetch
 *
 * Bodies are streamed both ways. The timeout is an idle timeout: it is
 * restarted whenever a chunk of the request or response body moves, so a
 * large transfer is only aborted when it stalls.
 */

import { Readable } from "node:stream";
import { TransportError } from "../errors/index.ts";
import { toRemoteUrlPath } from "../path/token.ts";
import { baseUrlOf, type ConnectionConfig } from "../types/config.ts";
import type { DavMethod, TransportClient, TransportRequest, TransportResponse } from "./types.ts";

/**
 * Optional hook for tracing each request/response pair
 */
export type RequestTracer = (line: string) => void;

/**
 * Abort signal that fires after `timeoutMs` without activity
 */
class IdleTimeout {
  private readonly controller = new AbortController();
  private readonly timeoutMs: number;
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(timeoutMs: number) {
    this.timeoutMs = timeoutMs;
    this.touch();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  touch(): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.controller.abort(new DOMException(`No activity for ${this.timeoutMs}ms`, "TimeoutError"));
    }, this.timeoutMs);
    this.timer.unref();
  }

  clear(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof DOMException && error.name === "TimeoutError";
}

export class HttpTransport implements TransportClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly trace?: RequestTracer;

  constructor(config: ConnectionConfig, trace?: RequestTracer) {
    this.baseUrl = baseUrlOf(config);
    this.timeoutMs = config.timeoutMs;
    this.trace = trace;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const url = `${this.baseUrl}${toRemoteUrlPath(request.path)}`;
    const idle = new IdleTimeout(this.timeoutMs);

    const isStreamBody = request.body instanceof Readable;
    const body = request.body instanceof Readable
      ? this.relay(request.body, request.method, url, idle)
      : request.body;

    let response: Response;
    try {
      response = await fetch(url, {
        method: request.method,
        headers: request.headers,
        body,
        // Required by fetch for streamed request bodies
        duplex: isStreamBody ? "half" : undefined,
        signal: idle.signal,
      });
    } catch (error) {
      idle.clear();
      throw this.failure(request.method, url, error);
    }

    this.trace?.(`${request.method} ${url} -> ${response.status}`);

    if (response.body === null) {
      idle.clear();
      return { status: response.status, body: Readable.from([]) };
    }
    idle.touch();
    const source = Readable.fromWeb(response.body);
    const responseBody = Readable.from(this.relay(source, request.method, url, idle));
    // Also covers a body destroyed before it was read
    responseBody.once("close", () => {
      idle.clear();
      source.destroy();
    });
    return { status: response.status, body: responseBody };
  }

  /**
   * Pass chunks through, restarting the idle timer for each one and turning
   * failures into TransportError
   */
  private async *relay(
    source: AsyncIterable<Uint8Array>,
    method: DavMethod,
    url: string,
    idle: IdleTimeout,
  ): AsyncGenerator<Uint8Array> {
    try {
      for await (const chunk of source) {
        idle.touch();
        yield chunk;
      }
    } catch (error) {
      throw this.failure(method, url, error);
    } finally {
      idle.clear();
    }
  }

  private failure(method: DavMethod, url: string, error: unknown): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const message = isTimeout(error)
      ? `${method} timed out after ${this.timeoutMs}ms`
      : `${method} failed: ${error instanceof Error ? error.message : String(error)}`;
    return new TransportError(message, { url, cause: error });
  }
}
