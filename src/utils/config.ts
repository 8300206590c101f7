import { join } from "node:path";
import { parse } from "smol-toml";
import { ConfigurationError } from "../errors/index.ts";
import { type DecopyConfig, parseDecopyConfig } from "../types/config.ts";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { warnLog } from "./output.ts";

export const DECOPY_TOML = ".decopy.toml";

export const DEFAULT_CHANNEL_CAPACITY = 16;
const MAX_CHANNEL_CAPACITY = 1024;
export const DEFAULT_CHUNK_SIZE = 64 * 1024;
export const DEFAULT_PREVIEW_LIMIT = 5;

/**
 * Load .decopy.toml from `dir`, if present.
 *
 * @throws ConfigurationError when the file is not valid TOML or fails validation
 */
export async function loadDecopyConfig(
  dir: string,
  ctx: AppContext = getGlobalContext(),
): Promise<DecopyConfig | undefined> {
  const configPath = join(dir, DECOPY_TOML);
  const configExists = await ctx.runtime.fs.exists(configPath);
  if (!configExists) return undefined;

  const content = await ctx.runtime.fs.readTextFile(configPath);

  let data: unknown;
  try {
    data = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid TOML: ${message}`, configPath);
  }

  try {
    return parseDecopyConfig(data, configPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(message);
  }
}

/**
 * Resolve the progress channel capacity from environment variable, config, or default.
 *
 * Priority order:
 * 1. Environment variable `DECOPY_CHANNEL_CAPACITY` (highest priority)
 * 2. Config file setting `copy.channel_capacity`
 * 3. Default value (16)
 *
 * If the environment variable is set but invalid (not an integer between 1-1024),
 * a warning is logged and the default value is used (not the config value).
 */
export function resolveChannelCapacity(
  config: DecopyConfig | undefined,
  ctx: AppContext = getGlobalContext(),
): number {
  const envValue = ctx.runtime.env.get("DECOPY_CHANNEL_CAPACITY");
  if (envValue !== undefined) {
    const parsed = Number(envValue);
    const isValidEnvValue = Number.isInteger(parsed) && parsed >= 1 &&
      parsed <= MAX_CHANNEL_CAPACITY;
    if (isValidEnvValue) {
      return parsed;
    }
    warnLog(
      `Warning: Invalid DECOPY_CHANNEL_CAPACITY value '${envValue}'. ` +
        `Must be an integer between 1 and ${MAX_CHANNEL_CAPACITY}. Using default: ${DEFAULT_CHANNEL_CAPACITY}`,
    );
    return DEFAULT_CHANNEL_CAPACITY;
  }

  return config?.copy?.channel_capacity ?? DEFAULT_CHANNEL_CAPACITY;
}

/**
 * Bytes read per chunk while streaming files.
 */
export function resolveChunkSize(config: DecopyConfig | undefined): number {
  return config?.copy?.chunk_size ?? DEFAULT_CHUNK_SIZE;
}

/**
 * Number of source entries shown in the pre-copy listing.
 */
export function resolvePreviewLimit(config: DecopyConfig | undefined): number {
  return config?.ui?.preview_limit ?? DEFAULT_PREVIEW_LIMIT;
}
