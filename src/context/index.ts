/**
 * Application Context
 *
 * This module provides dependency injection for the plaindav CLI.
 * Instead of importing a runtime singleton directly, functions accept an
 * AppContext parameter with a default value.
 *
 * Connection settings are not part of the context: host, port and timeout
 * travel as an explicit ConnectionConfig value into each transport.
 */

import type { Runtime } from "../runtime/types.ts";

/**
 * Application context containing all dependencies
 */
export interface AppContext {
  /** Runtime abstraction for local file system and process control */
  readonly runtime: Runtime;
}

// Global context instance
let globalContext: AppContext | null = null;

/**
 * Set the global application context
 *
 * Call this at application startup after initializing the runtime.
 */
export function setGlobalContext(ctx: AppContext): void {
  globalContext = ctx;
}

/**
 * Get the global application context
 *
 * @throws Error if context has not been initialized
 */
export function getGlobalContext(): AppContext {
  if (!globalContext) {
    throw new Error("AppContext not initialized. Call setGlobalContext() at application startup.");
  }
  return globalContext;
}

/**
 * Create an AppContext from a runtime instance
 */
export function createAppContext(runtime: Runtime): AppContext {
  return { runtime };
}
