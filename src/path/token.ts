/**
 * Normalized, traversal-safe path representation
 *
 * A PathToken is an immutable sequence of non-empty segments. No segment is
 * `.` or `..` and none contains a separator, so joining tokens can never
 * climb out of the path it is joined onto. The empty sequence is the root.
 */

import { InvalidPathError } from "../errors/index.ts";

export interface PathToken {
  readonly segments: readonly string[];
}

function freezeToken(segments: readonly string[]): PathToken {
  return Object.freeze({ segments: Object.freeze([...segments]) });
}

export const ROOT: PathToken = freezeToken([]);

/**
 * Validate a single segment, throwing InvalidPathError for anything that
 * could change the meaning of a joined path.
 */
function validateSegment(name: string, rawPath: string): void {
  const isEmpty = name.length === 0;
  if (isEmpty) {
    throw new InvalidPathError(rawPath, "empty path segment");
  }

  const isTraversal = name === "." || name === "..";
  if (isTraversal) {
    throw new InvalidPathError(rawPath, "contains parent-directory traversal");
  }

  const hasSeparator = name.includes("/") || name.includes("\\");
  if (hasSeparator) {
    throw new InvalidPathError(rawPath, "segment contains a path separator");
  }

  const hasNullByte = name.includes("\0");
  if (hasNullByte) {
    throw new InvalidPathError(rawPath, "contains null byte");
  }
}

/**
 * Parse a user-supplied path (`/a/b`, `a/b/`, `/`) into a token.
 *
 * Repeated slashes and `.` segments are dropped. Paths without a leading
 * slash are taken from the root.
 *
 * @throws InvalidPathError on `..`, backslashes, null bytes, or a path
 * that normalizes to nothing without naming the root
 */
export function tokenize(rawPath: string): PathToken {
  const isEmpty = rawPath.length === 0;
  if (isEmpty) {
    throw new InvalidPathError(rawPath, "path is empty");
  }

  const hasNullByte = rawPath.includes("\0");
  if (hasNullByte) {
    throw new InvalidPathError(rawPath, "contains null byte");
  }

  const hasBackslash = rawPath.includes("\\");
  if (hasBackslash) {
    throw new InvalidPathError(rawPath, "mixed path separators");
  }

  const segments = rawPath.split("/").filter((part) => part !== "" && part !== ".");
  for (const part of segments) {
    validateSegment(part, rawPath);
  }

  const namesRoot = segments.length === 0;
  if (namesRoot && !rawPath.startsWith("/")) {
    throw new InvalidPathError(rawPath, "path is empty after normalization");
  }

  return freezeToken(segments);
}

/**
 * Token of a single directory-entry name.
 */
export function segment(name: string): PathToken {
  validateSegment(name, name);
  return freezeToken([name]);
}

export function join(base: PathToken, child: PathToken): PathToken {
  return freezeToken([...base.segments, ...child.segments]);
}

/**
 * Parent of a token; the root is its own parent.
 */
export function parent(token: PathToken): PathToken {
  return freezeToken(token.segments.slice(0, -1));
}

/**
 * Last segment, or undefined for the root.
 */
export function basename(token: PathToken): string | undefined {
  return token.segments[token.segments.length - 1];
}

export function isRoot(token: PathToken): boolean {
  return token.segments.length === 0;
}

export function equals(a: PathToken, b: PathToken): boolean {
  const sameLength = a.segments.length === b.segments.length;
  return sameLength && a.segments.every((part, i) => part === b.segments[i]);
}

/**
 * Whether `descendant` lies strictly below `ancestor`.
 */
export function isStrictAncestor(ancestor: PathToken, descendant: PathToken): boolean {
  const isDeeper = descendant.segments.length > ancestor.segments.length;
  return isDeeper && ancestor.segments.every((part, i) => part === descendant.segments[i]);
}

/**
 * Every non-root prefix of the token, shallowest first, ending with the token itself.
 */
export function ancestors(token: PathToken): PathToken[] {
  return token.segments.map((_, i) => freezeToken(token.segments.slice(0, i + 1)));
}

/**
 * `/a/b`, or `/` for the root.
 */
export function toDisplayString(token: PathToken): string {
  return `/${token.segments.join("/")}`;
}

/**
 * `a/b` for tokens relative to a local root, or `.` for the root itself.
 */
export function toRelativeDisplayString(token: PathToken): string {
  return isRoot(token) ? "." : token.segments.join("/");
}

/**
 * Percent-encoded URL path for the token.
 */
export function toRemoteUrlPath(token: PathToken): string {
  return `/${token.segments.map(encodeURIComponent).join("/")}`;
}

/**
 * Parse an href from a server response into a token.
 *
 * Accepts absolute URLs and absolute paths; relative hrefs are resolved
 * against `baseUrl`. Each segment is percent-decoded and validated.
 *
 * @throws InvalidPathError if the href is not a URL, points to another
 * origin, or decodes to an unsafe segment
 */
export function fromHref(href: string, baseUrl: string): PathToken {
  let url: URL;
  try {
    url = new URL(href, baseUrl);
  } catch {
    throw new InvalidPathError(href, "not a valid href");
  }

  const isForeignOrigin = url.origin !== new URL(baseUrl).origin;
  if (isForeignOrigin) {
    throw new InvalidPathError(href, "href points to another server");
  }

  const segments: string[] = [];
  for (const part of url.pathname.split("/")) {
    if (part === "") continue;
    let decoded: string;
    try {
      decoded = decodeURIComponent(part);
    } catch {
      throw new InvalidPathError(href, "malformed percent-encoding");
    }
    validateSegment(decoded, href);
    segments.push(decoded);
  }
  return freezeToken(segments);
}
