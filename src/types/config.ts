import { z } from "zod";

/**
 * Zod schema for DecopyConfig validation.
 *
 * Defines the structure and constraints for .decopy.toml files.
 */
export const DecopyConfigSchema = z.object({
  copy: z.object({
    /**
     * Progress messages buffered between the copy worker and the display.
     * Can be overridden by DECOPY_CHANNEL_CAPACITY environment variable.
     * @minimum 1
     * @maximum 1024
     * @default 16
     */
    channel_capacity: z.number().int().min(1).max(1024).optional(),
    /** Bytes read per chunk while streaming a file (default 64 KiB) */
    chunk_size: z.number().int().min(4096).max(64 * 1024 * 1024).optional(),
  }).strict().optional(),
  ui: z.object({
    color: z.enum(["auto", "always", "never"]).optional(),
    /** Source entries listed before "... +N more ..." */
    preview_limit: z.number().int().min(0).max(100).optional(),
    /** Ask for confirmation before copying (false behaves like --yes) */
    confirm: z.boolean().optional(),
  }).strict().optional(),
}).strict();

export type DecopyConfig = z.infer<typeof DecopyConfigSchema>;

/**
 * Validate and parse a DecopyConfig from unknown data
 * @param data Unknown data to validate
 * @param filePath Path to the config file (for error messages)
 * @throws Error if validation fails
 */
export function parseDecopyConfig(data: unknown, filePath: string): DecopyConfig {
  const result = DecopyConfigSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid configuration in ${filePath}:\n${errors}`);
  }
  return result.data;
}
