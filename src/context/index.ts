/**
 * Application Context
 *
 * This module provides dependency injection for the decopy CLI.
 * Instead of importing a global runtime singleton directly,
 * functions accept an AppContext parameter with a default value.
 */

import type { Runtime } from "../runtime/types.ts";
import type { DecopyConfig } from "../types/config.ts";

/**
 * Application context containing all dependencies
 */
export interface AppContext {
  /** Runtime abstraction for file system, terminal and process access */
  readonly runtime: Runtime;
  /** Configuration from .decopy.toml (optional) */
  config?: DecopyConfig;
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
export function createAppContext(runtime: Runtime, config?: DecopyConfig): AppContext {
  return { runtime, config };
}

