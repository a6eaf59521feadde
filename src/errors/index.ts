/**
 * Unified error handling for plaindav
 *
 * Exit codes:
 * - 0: Success
 * - 1: Operation failed (path, remote, transport or local I/O error)
 * - 2: Argument error
 */

/**
 * Base class for all plaindav errors
 */
export abstract class DavError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Path contains traversal segments, mixed separators or is otherwise malformed
 */
export class InvalidPathError extends DavError {
  readonly exitCode = 1;
  readonly rawPath: string;

  constructor(rawPath: string, reason: string) {
    super(`Invalid path "${rawPath}": ${reason}`);
    this.rawPath = rawPath;
  }
}

/**
 * Source or target does not exist
 */
export class NotFoundError extends DavError {
  readonly exitCode = 1;
  readonly path: string;

  constructor(path: string) {
    super(`No such file or directory: ${path}`);
    this.path = path;
  }
}

/**
 * Path exists but is a file where a directory was expected
 */
export class NotADirectoryError extends DavError {
  readonly exitCode = 1;
  readonly path: string;
  /** Size of the file found at the path, when the server reported one */
  readonly size?: number;

  constructor(path: string, size?: number) {
    super(`Not a directory: ${path}`);
    this.path = path;
    this.size = size;
  }
}

/**
 * Directory removal requested without recursion
 */
export class NotEmptyOrDirectoryError extends DavError {
  readonly exitCode = 1;
  readonly path: string;

  constructor(path: string) {
    super(`Is a directory (use -r to remove recursively): ${path}`);
    this.path = path;
  }
}

/**
 * Immediate parent of a path to create does not exist
 */
export class ParentNotFoundError extends DavError {
  readonly exitCode = 1;
  readonly path: string;

  constructor(path: string) {
    super(`Parent directory does not exist: ${path}`);
    this.path = path;
  }
}

/**
 * Directory to create already exists (only raised without --parents)
 */
export class AlreadyExistsError extends DavError {
  readonly exitCode = 1;
  readonly path: string;

  constructor(path: string) {
    super(`File exists: ${path}`);
    this.path = path;
  }
}

/**
 * Local or remote access denied
 */
export class PermissionError extends DavError {
  readonly exitCode = 1;
  readonly path: string;

  constructor(path: string) {
    super(`Permission denied: ${path}`);
    this.path = path;
  }
}

/**
 * Connection refused, timeout, unreadable response or unexpected HTTP status
 */
export class TransportError extends DavError {
  readonly exitCode = 1;
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, options: { status?: number; url?: string; cause?: unknown } = {}) {
    super(options.url ? `${message} (${options.url})` : message);
    this.status = options.status;
    this.url = options.url;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Local file system operation error
 */
export class FileSystemError extends DavError {
  readonly exitCode = 1;
  readonly path: string;

  constructor(operation: string, path: string, cause?: Error) {
    const message = cause
      ? `Failed to ${operation} "${path}": ${cause.message}`
      : `Failed to ${operation} "${path}"`;
    super(message);
    this.path = path;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Command argument error
 */
export class ArgumentError extends DavError {
  readonly exitCode = 2;
  readonly argument?: string;

  constructor(message: string, argument?: string) {
    super(message);
    this.argument = argument;
  }
}

/**
 * A planned action failed; names the action and its cause
 */
export class ActionFailedError extends DavError {
  readonly exitCode: number;
  readonly action: string;
  readonly completedCount: number;

  constructor(action: string, cause: DavError, completedCount: number) {
    super(`${action} failed: ${cause.message}`);
    this.action = action;
    this.cause = cause;
    this.exitCode = cause.exitCode;
    this.completedCount = completedCount;
  }
}

/**
 * Wrap anything thrown into a DavError, keeping DavErrors as they are
 */
export function toDavError(error: unknown, fallback: (cause: Error) => DavError): DavError {
  if (error instanceof DavError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return fallback(cause);
}
