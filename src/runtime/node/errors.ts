/**
 * Node.js errors implementation
 */

import type { RuntimeErrors } from "../types.ts";

/**
 * Check if an error is a Node.js system error with a specific code
 */
function isNodeError(error: unknown, code: string): boolean {
  const isErrorWithCode = error instanceof Error && "code" in error;
  if (isErrorWithCode) {
    return error.code === code;
  }
  return false;
}

export const nodeErrors: RuntimeErrors = {
  isNotFound(error: unknown): boolean {
    return isNodeError(error, "ENOENT");
  },

  isAlreadyExists(error: unknown): boolean {
    return isNodeError(error, "EEXIST");
  },

  isPermissionDenied(error: unknown): boolean {
    return isNodeError(error, "EACCES") || isNodeError(error, "EPERM");
  },

  isNotADirectory(error: unknown): boolean {
    return isNodeError(error, "ENOTDIR");
  },
};
