/**
 * Node.js signal handling implementation
 */

import type { RuntimeSignals, Signal } from "../types.ts";

export const nodeSignals: RuntimeSignals = {
  addListener(signal: Signal, handler: () => void): void {
    process.on(signal, handler);
  },

  removeListener(signal: Signal, handler: () => void): void {
    process.off(signal, handler);
  },
};
