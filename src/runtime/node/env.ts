/**
 * Node.js environment implementation
 */

import type { RuntimeControl, RuntimeEnv } from "../types.ts";

export const nodeEnv: RuntimeEnv = {
  get(key: string): string | undefined {
    return process.env[key];
  },
};

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
