/**
 * Node.js process control implementation
 */

import type { RuntimeControl } from "../types.ts";

export const nodeControl: RuntimeControl = {
  exit(code: number): never {
    process.exit(code);
  },

  cwd(): string {
    return process.cwd();
  },

  get args(): readonly string[] {
    // Skip first two arguments (node and script path)
    return process.argv.slice(2);
  },
};
