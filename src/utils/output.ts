import { colorize, CYAN, DIM, GREEN, YELLOW } from "./ansi.ts";

/**
 * Output options for controlling verbosity level.
 */
export interface OutputOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Print a command result line to stdout (listings, transferred files).
 * Results are printed even in quiet mode; only chatter is suppressed.
 */
export function printResult(line: string): void {
  console.log(line);
}

/**
 * Log a verbose message to stderr when verbose mode is enabled.
 */
export function verboseLog(message: string, options: OutputOptions): void {
  const shouldLog = options.verbose && !options.quiet;
  if (shouldLog) {
    console.error(colorize(CYAN, `[verbose] ${message}`));
  }
}

/**
 * Log a success message to stderr with green color.
 */
export function successLog(message: string, options: OutputOptions): void {
  const shouldLog = !options.quiet;
  if (shouldLog) {
    console.error(colorize(GREEN, message));
  }
}

/**
 * Log a warning message to stderr with yellow color.
 * Always outputs regardless of quiet mode.
 */
export function warnLog(message: string): void {
  console.warn(colorize(YELLOW, message));
}

/**
 * Log a dry-run message to stderr with dim color.
 * Always outputs regardless of quiet mode.
 */
export function logDryRun(message: string): void {
  console.error(colorize(DIM, `[dry-run] ${message}`));
}
