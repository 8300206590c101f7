/**
 * Runtime initialization
 *
 * Node.js is the only supported runtime; this module keeps the lookup
 * behind an async boundary so the implementation is loaded on demand.
 */

import type { Runtime } from "./types.ts";

export type * from "./types.ts";

let runtimeInstance: Runtime | null = null;

/**
 * Get the runtime implementation, loading it on first use
 */
export async function getRuntime(): Promise<Runtime> {
  if (runtimeInstance) {
    return runtimeInstance;
  }

  const hasNode = typeof process !== "undefined" && process.versions?.node !== undefined;
  if (!hasNode) {
    throw new Error("Unsupported runtime: decopy requires Node.js 20+");
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
