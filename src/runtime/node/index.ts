/**
 * Node.js runtime implementation
 */

import type { Runtime } from "../types.ts";
import { nodeControl, nodeEnv } from "./env.ts";
import { nodeErrors } from "./errors.ts";
import { nodeFS } from "./fs.ts";
import { nodeIO } from "./io.ts";
import { nodeSignals } from "./signals.ts";

export const nodeRuntime: Runtime = {
  fs: nodeFS,
  env: nodeEnv,
  control: nodeControl,
  io: nodeIO,
  errors: nodeErrors,
  signals: nodeSignals,
};
