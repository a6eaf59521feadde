import {
  type DavError,
  FileSystemError,
  NotADirectoryError,
  NotFoundError,
  PermissionError,
  toDavError,
} from "../errors/index.ts";
import type { AppContext } from "../context/index.ts";

/**
 * Classify an error thrown by a local file system call.
 *
 * @param operation Verb phrase for the fallback message, e.g. "read directory"
 * @param path Local path the operation was applied to
 */
export function mapLocalError(
  error: unknown,
  operation: string,
  path: string,
  ctx: AppContext,
): DavError {
  const { errors } = ctx.runtime;
  if (errors.isNotFound(error)) return new NotFoundError(path);
  if (errors.isPermissionDenied(error)) return new PermissionError(path);
  if (errors.isNotADirectory(error)) return new NotADirectoryError(path);
  return toDavError(error, (cause) => new FileSystemError(operation, path, cause));
}
