/**
 * Runtime initialization
 *
 * plaindav runs on Node.js only; the implementation module is loaded lazily
 * so tests can install a mock runtime without touching it.
 */

import type { Runtime } from "./types.ts";

// Re-export types
export type * from "./types.ts";

// Runtime instance cache
let runtimeInstance: Runtime | null = null;

/**
 * Get the runtime implementation
 */
export async function getRuntime(): Promise<Runtime> {
  if (runtimeInstance) {
    return runtimeInstance;
  }

  const { nodeRuntime } = await import("./node/index.ts");
  runtimeInstance = nodeRuntime;
  return runtimeInstance;
}

/**
 * Initialize the runtime (call at application startup)
 */
export async function initRuntime(): Promise<Runtime> {
  return await getRuntime();
}
