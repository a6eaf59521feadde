import { type DavError, NotFoundError, PermissionError, TransportError } from "../errors/index.ts";
import { type PathToken, toDisplayString, toRemoteUrlPath } from "../path/token.ts";
import type { DavMethod, TransportClient } from "../transport/types.ts";

/**
 * Map a status no caller handled specially onto an error kind.
 */
export function statusError(
  method: DavMethod,
  path: PathToken,
  status: number,
  transport: TransportClient,
): DavError {
  const displayPath = toDisplayString(path);
  switch (status) {
    case 404:
      return new NotFoundError(displayPath);
    case 401:
    case 403:
      return new PermissionError(displayPath);
    default:
      return new TransportError(`${method} returned HTTP ${status}`, {
        status,
        url: `${transport.baseUrl}${toRemoteUrlPath(path)}`,
      });
  }
}
