/**
 * In-memory WebDAV server for tests
 *
 * Implements TransportClient over a Map-backed tree so listing, transfer and
 * removal logic can be exercised without a network. Status codes follow
 * RFC 4918: MKCOL answers 405 for an existing resource and 409 for a missing
 * parent, PROPFIND answers 207 with a multistatus body.
 */

import { ancestors, join, parent, type PathToken, segment, toDisplayString, toRemoteUrlPath, tokenize } from "../path/token.ts";
import { bodyOf, readBody } from "./body.ts";
import type { TransportClient, TransportRequest, TransportResponse } from "./types.ts";

type MemoryNode = { kind: "directory" } | { kind: "file"; data: Uint8Array };

export interface RecordedRequest {
  method: TransportRequest["method"];
  path: string;
}

export interface MemoryDavServerOptions {
  /** Write hrefs as absolute URLs instead of absolute paths */
  absoluteHrefs?: boolean;
  /** Return a status instead of handling the request */
  intercept?: (request: RecordedRequest) => number | undefined;
}

const encoder = new TextEncoder();

function key(path: PathToken): string {
  return toDisplayString(path);
}

function reply(status: number, data?: Uint8Array): TransportResponse {
  return { status, body: bodyOf(data) };
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export class MemoryDavServer implements TransportClient {
  readonly baseUrl = "http://dav.test:8080";
  readonly requests: RecordedRequest[] = [];
  private readonly nodes = new Map<string, MemoryNode>([["/", { kind: "directory" }]]);
  private readonly options: MemoryDavServerOptions;

  constructor(options: MemoryDavServerOptions = {}) {
    this.options = options;
  }

  // ===== Fixture helpers =====

  addDirectory(rawPath: string): this {
    for (const path of ancestors(tokenize(rawPath))) {
      if (!this.nodes.has(key(path))) {
        this.nodes.set(key(path), { kind: "directory" });
      }
    }
    return this;
  }

  addFile(rawPath: string, content: string | Uint8Array): this {
    const token = tokenize(rawPath);
    this.addDirectory(key(parent(token)));
    const data = typeof content === "string" ? encoder.encode(content) : content;
    this.nodes.set(key(token), { kind: "file", data });
    return this;
  }

  has(rawPath: string): boolean {
    return this.nodes.has(key(tokenize(rawPath)));
  }

  readText(rawPath: string): string | undefined {
    const node = this.nodes.get(key(tokenize(rawPath)));
    return node?.kind === "file" ? new TextDecoder().decode(node.data) : undefined;
  }

  /** Every path on the server except the root, sorted */
  paths(): string[] {
    return [...this.nodes.keys()].filter((path) => path !== "/").sort();
  }

  /** Requests of one method, as display paths */
  requestsOf(method: TransportRequest["method"]): string[] {
    return this.requests.filter((r) => r.method === method).map((r) => r.path);
  }

  // ===== TransportClient =====

  async request(request: TransportRequest): Promise<TransportResponse> {
    const recorded: RecordedRequest = { method: request.method, path: key(request.path) };
    this.requests.push(recorded);
    const body = await this.readRequestBody(request);

    const intercepted = this.options.intercept?.(recorded);
    if (intercepted !== undefined) {
      return reply(intercepted);
    }

    switch (request.method) {
      case "PROPFIND":
        return this.propfind(request.path);
      case "GET":
        return this.get(request.path);
      case "PUT":
        return this.put(request.path, body);
      case "MKCOL":
        return this.mkcol(request.path);
      case "DELETE":
        return this.delete(request.path);
    }
  }

  private async readRequestBody(request: TransportRequest): Promise<Uint8Array> {
    if (request.body === undefined) return new Uint8Array();
    if (request.body instanceof Uint8Array) return request.body;
    return await readBody(request.body);
  }

  private parentExists(path: PathToken): boolean {
    return this.nodes.get(key(parent(path)))?.kind === "directory";
  }

  private href(path: PathToken, isDirectory: boolean): string {
    const urlPath = toRemoteUrlPath(path);
    const withSlash = isDirectory && !urlPath.endsWith("/") ? `${urlPath}/` : urlPath;
    return this.options.absoluteHrefs ? `${this.baseUrl}${withSlash}` : withSlash;
  }

  private responseXml(path: PathToken, node: MemoryNode): string {
    const isDirectory = node.kind === "directory";
    const props = isDirectory
      ? "<D:resourcetype><D:collection/></D:resourcetype>"
      : `<D:resourcetype/><D:getcontentlength>${node.data.length}</D:getcontentlength>`;
    return [
      "<D:response>",
      `<D:href>${escapeXml(this.href(path, isDirectory))}</D:href>`,
      `<D:propstat><D:prop>${props}</D:prop><D:status>HTTP/1.1 200 OK</D:status></D:propstat>`,
      "</D:response>",
    ].join("");
  }

  private propfind(path: PathToken): TransportResponse {
    const node = this.nodes.get(key(path));
    if (!node) {
      return reply(404);
    }

    const responses = [this.responseXml(path, node)];
    if (node.kind === "directory") {
      const prefix = path.segments.length === 0 ? "/" : `${key(path)}/`;
      // Reverse order so callers cannot rely on the server sorting
      const children = [...this.nodes.entries()]
        .filter(([p]) => p !== "/" && p.startsWith(prefix) && !p.slice(prefix.length).includes("/"))
        .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0));
      for (const [childPath, child] of children) {
        const name = childPath.slice(prefix.length);
        responses.push(this.responseXml(join(path, segment(name)), child));
      }
    }

    const xml = `<?xml version="1.0" encoding="utf-8"?><D:multistatus xmlns:D="DAV:">${responses.join("")}</D:multistatus>`;
    return reply(207, encoder.encode(xml));
  }

  private get(path: PathToken): TransportResponse {
    const node = this.nodes.get(key(path));
    if (!node) return reply(404);
    if (node.kind === "directory") return reply(405);
    return reply(200, node.data);
  }

  private put(path: PathToken, body: Uint8Array): TransportResponse {
    if (!this.parentExists(path)) return reply(409);
    const existing = this.nodes.get(key(path));
    if (existing?.kind === "directory") return reply(405);
    this.nodes.set(key(path), { kind: "file", data: body });
    return reply(existing ? 204 : 201);
  }

  private mkcol(path: PathToken): TransportResponse {
    if (this.nodes.has(key(path))) return reply(405);
    if (!this.parentExists(path)) return reply(409);
    this.nodes.set(key(path), { kind: "directory" });
    return reply(201);
  }

  private delete(path: PathToken): TransportResponse {
    const target = key(path);
    const isRootPath = path.segments.length === 0;
    if (isRootPath) return reply(403);
    if (!this.nodes.has(target)) return reply(404);
    for (const p of [...this.nodes.keys()]) {
      if (p === target || p.startsWith(`${target}/`)) {
        this.nodes.delete(p);
      }
    }
    return reply(204);
  }
}
