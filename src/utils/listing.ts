import { type AppContext, getGlobalContext } from "../context/index.ts";
import { DIM, colorize } from "./ansi.ts";
import { assertReadableDirectory } from "./copy/size.ts";
import { SourceUnreadableError } from "../errors/index.ts";

/**
 * Names of the top-level entries of `dir`, sorted.
 *
 * @throws SourceUnreadableError when the directory cannot be listed
 */
export async function listSourceEntries(
  dir: string,
  ctx: AppContext = getGlobalContext(),
): Promise<string[]> {
  await assertReadableDirectory(dir, ctx);
  const names: string[] = [];
  try {
    for await (const entry of ctx.runtime.fs.readDir(dir)) {
      names.push(entry.name);
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SourceUnreadableError(dir, reason, error);
  }
  return names.sort();
}

/**
 * Indented preview lines: the first `limit` entries, then "... +N more ...".
 */
export function formatPreview(entries: readonly string[], limit: number): string[] {
  const shown = entries.slice(0, limit);
  const lines = shown.map((name) => `  ${colorize(DIM, name)}`);
  const hiddenCount = entries.length - shown.length;
  if (hiddenCount > 0) {
    lines.push(`  ... +${hiddenCount} more ...`);
  }
  return lines;
}
