/**
 * Version information shown by `decopy --version`
 */
export const VERSION = "0.1.0";

export const BUILD_INFO = {
  version: VERSION,
  platform: process.platform,
  arch: process.arch,
  runtime: `node ${process.versions.node}`,
} as const;
