/**
 * Remote directory listing over PROPFIND
 */

import { XMLParser } from "fast-xml-parser";
import { InvalidPathError, NotADirectoryError, NotFoundError, TransportError } from "../errors/index.ts";
import { basename, equals, fromHref, parent, type PathToken, toDisplayString } from "../path/token.ts";
import { readBody } from "../transport/body.ts";
import type { TransportClient } from "../transport/types.ts";
import { statusError } from "./status.ts";

export type EntryKind = "file" | "directory";

/**
 * One child returned by a listing. `size` is only set for files.
 */
export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
  size?: number;
}

/**
 * Result of probing a remote path with a single listing query
 */
export type RemoteStat =
  | { kind: "directory"; entries: DirectoryEntry[] }
  | { kind: "file"; size?: number };

/**
 * One `<response>` element of a multistatus body
 */
export interface MultistatusResource {
  path: PathToken;
  isCollection: boolean;
  size?: number;
}

const PROPFIND_BODY = new TextEncoder().encode(
  `<?xml version="1.0" encoding="utf-8"?>
<D:propfind xmlns:D="DAV:">
  <D:prop>
    <D:resourcetype/>
    <D:getcontentlength/>
  </D:prop>
</D:propfind>`,
);

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => name === "response" || name === "propstat",
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined ? [] : [value];
}

function parseLength(value: unknown): number | undefined {
  const isText = typeof value === "string" || typeof value === "number";
  if (!isText) return undefined;
  const length = Number(String(value).trim());
  const isValidLength = Number.isSafeInteger(length) && length >= 0;
  return isValidLength ? length : undefined;
}

/**
 * Called for a `<response>` whose href does not map to a safe path on the
 * same server. The entry is left out of the result.
 */
export type UnusableHrefHandler = (href: string, error: InvalidPathError) => void;

/**
 * Parse a PROPFIND multistatus body into resources.
 *
 * A resource is a collection if any of its `prop` elements carries
 * `resourcetype/collection`. Responses with an unusable href are skipped.
 *
 * @throws TransportError on a body without a multistatus root
 */
export function parseMultistatus(
  xml: string,
  baseUrl: string,
  onUnusableHref?: UnusableHrefHandler,
): MultistatusResource[] {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    throw new TransportError("PROPFIND response is not valid XML", { cause: error });
  }

  const multistatus = isRecord(document) ? document.multistatus : undefined;
  if (!isRecord(multistatus)) {
    throw new TransportError("PROPFIND response has no multistatus element");
  }

  const resources: MultistatusResource[] = [];
  for (const response of asArray(multistatus.response)) {
    if (!isRecord(response) || typeof response.href !== "string") continue;

    const href = response.href.trim();
    let path: PathToken;
    try {
      path = fromHref(href, baseUrl);
    } catch (error) {
      if (error instanceof InvalidPathError) {
        onUnusableHref?.(href, error);
        continue;
      }
      throw error;
    }

    let isCollection = false;
    let size: number | undefined;
    for (const propstat of asArray(response.propstat)) {
      if (!isRecord(propstat) || !isRecord(propstat.prop)) continue;
      const { resourcetype, getcontentlength } = propstat.prop;
      const hasCollection = isRecord(resourcetype) && "collection" in resourcetype;
      if (hasCollection) {
        isCollection = true;
      }
      size = size ?? parseLength(getcontentlength);
    }

    resources.push({ path, isCollection, size: isCollection ? undefined : size });
  }
  return resources;
}

function byName(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export interface RemoteDirectoryListerOptions {
  /** Told about each listing entry left out for an unusable href */
  onUnusableHref?: UnusableHrefHandler;
}

export class RemoteDirectoryLister {
  constructor(
    private readonly transport: TransportClient,
    private readonly options: RemoteDirectoryListerOptions = {},
  ) {}

  /**
   * List the children of a remote directory with one depth-1 PROPFIND.
   *
   * Entries are sorted by name, whatever order the server used.
   *
   * @throws NotFoundError if nothing exists at the path
   * @throws NotADirectoryError if the path is a file (carries its size)
   * @throws PermissionError on 401/403
   * @throws TransportError on network failure or any other status
   */
  async list(path: PathToken): Promise<DirectoryEntry[]> {
    const response = await this.transport.request({
      method: "PROPFIND",
      path,
      headers: { Depth: "1", "Content-Type": 'application/xml; charset="utf-8"' },
      body: PROPFIND_BODY,
    });

    const isMultistatus = response.status === 207;
    if (!isMultistatus) {
      response.body.destroy();
      throw statusError("PROPFIND", path, response.status, this.transport);
    }

    const xml = new TextDecoder().decode(await readBody(response.body));
    const resources = parseMultistatus(xml, this.transport.baseUrl, this.options.onUnusableHref);

    const self = resources.find((resource) => equals(resource.path, path));
    if (!self) {
      throw new NotFoundError(toDisplayString(path));
    }
    if (!self.isCollection) {
      throw new NotADirectoryError(toDisplayString(path), self.size);
    }

    const entries = new Map<string, DirectoryEntry>();
    for (const resource of resources) {
      const name = basename(resource.path);
      const isChild = name !== undefined && equals(parent(resource.path), path);
      if (!isChild) continue;
      entries.set(
        name,
        resource.isCollection
          ? { name, kind: "directory" }
          : { name, kind: "file", size: resource.size },
      );
    }
    return [...entries.values()].sort(byName);
  }

  /**
   * Probe a path with one listing query: a directory with its entries, or a file.
   */
  async stat(path: PathToken): Promise<RemoteStat> {
    try {
      const entries = await this.list(path);
      return { kind: "directory", entries };
    } catch (error) {
      if (error instanceof NotADirectoryError) {
        return { kind: "file", size: error.size };
      }
      throw error;
    }
  }
}
