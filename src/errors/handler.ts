/**
 * Unified error handler for plaindav
 *
 * This module provides consistent error handling across all commands.
 */

import { type AppContext, getGlobalContext } from "../context/index.ts";
import { colorize, DIM, RED } from "../utils/ansi.ts";
import { DavError } from "./index.ts";

/**
 * Options for error handling
 */
export interface ErrorHandlerOptions {
  /** Whether to print verbose error details */
  verbose?: boolean;
}

/**
 * Handle an error and return appropriate exit code
 *
 * @param error The error to handle
 * @param options Handler options
 * @returns Exit code (0 for success, non-zero for errors)
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): number {
  const { verbose = false } = options;

  if (error instanceof DavError) {
    return handleDavError(error, { verbose });
  }

  // Errors are reported even in quiet mode
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(colorize(RED, `Error: ${errorMessage}`));

  if (verbose && error instanceof Error && error.stack) {
    console.error(colorize(DIM, `\nStack trace:\n${error.stack}`));
  }

  return 1;
}

/**
 * Handle a DavError with appropriate output
 */
function handleDavError(error: DavError, options: { verbose: boolean }): number {
  const { verbose } = options;

  console.error(colorize(RED, `Error: ${error.message}`));

  if (verbose && error.stack) {
    console.error(colorize(DIM, `\nStack trace:\n${error.stack}`));
  }

  return error.exitCode;
}

/**
 * Wrap a command function with error handling
 *
 * This is a higher-order function that wraps any async command function
 * with consistent error handling and process exit.
 *
 * @param fn The command function to wrap
 * @param options Handler options
 * @param ctx Application context
 */
export function withErrorHandler<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
  options: ErrorHandlerOptions = {},
  ctx: AppContext = getGlobalContext(),
): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const exitCode = handleError(error, options);
      const shouldExit = exitCode !== 0;
      if (shouldExit) {
        ctx.runtime.control.exit(exitCode);
      }
    }
  };
}
