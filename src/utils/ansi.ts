export const RED = "\x1b[31m";
export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const CYAN = "\x1b[36m";
export const DIM = "\x1b[2m";
export const RESET = "\x1b[0m";

let colorEnabled: boolean | null = null;

/**
 * Color is on when FORCE_COLOR is set, off when NO_COLOR is set,
 * otherwise follows whether stderr is a terminal.
 */
function detectColorSupport(): boolean {
  const forceColor = process.env.FORCE_COLOR !== undefined;
  if (forceColor) return true;

  const noColor = process.env.NO_COLOR !== undefined;
  if (noColor) return false;

  return process.stderr.isTTY ?? false;
}

export function isColorEnabled(): boolean {
  if (colorEnabled === null) {
    colorEnabled = detectColorSupport();
  }
  return colorEnabled;
}

/** Reset cached color detection (for testing). */
export function resetColorDetection(): void {
  colorEnabled = null;
}

/** Wrap message with ANSI color codes when color is enabled. */
export function colorize(color: string, message: string): string {
  const shouldColorize = isColorEnabled();
  if (!shouldColorize) return message;
  return `${color}${message}${RESET}`;
}
