import { join } from "node:path";
import { SourceUnreadableError } from "../../errors/index.ts";
import { type AppContext, getGlobalContext } from "../../context/index.ts";

/**
 * Short human reason for a file system error on the source tree.
 */
function describeSourceError(error: unknown, ctx: AppContext): string {
  const { errors } = ctx.runtime;
  if (errors.isNotFound(error)) return "no such file or directory";
  if (errors.isPermissionDenied(error)) return "permission denied";
  return error instanceof Error ? error.message : String(error);
}

async function sumTree(dir: string, ctx: AppContext): Promise<number> {
  const { fs } = ctx.runtime;
  let total = 0;
  for await (const entry of fs.readDir(dir)) {
    const entryPath = join(dir, entry.name);
    if (entry.isDirectory) {
      total += await sumTree(entryPath, ctx);
    } else if (entry.isFile) {
      const info = await fs.lstat(entryPath);
      total += info.size;
    }
  }
  return total;
}

/**
 * Ensure `path` is a readable directory.
 *
 * @throws SourceUnreadableError when it is missing, not a directory, or unreadable
 */
export async function assertReadableDirectory(
  path: string,
  ctx: AppContext = getGlobalContext(),
): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await ctx.runtime.fs.stat(path)).isDirectory;
  } catch (error) {
    throw new SourceUnreadableError(path, describeSourceError(error, ctx), error);
  }
  if (!isDirectory) {
    throw new SourceUnreadableError(path, "not a directory");
  }
}

/**
 * Total size in bytes of the regular files under `path`.
 * Symbolic links are counted as zero and not followed.
 *
 * @throws SourceUnreadableError when the tree cannot be listed or sized
 */
export async function measureDirectorySize(
  path: string,
  ctx: AppContext = getGlobalContext(),
): Promise<number> {
  await assertReadableDirectory(path, ctx);
  try {
    return await sumTree(path, ctx);
  } catch (error) {
    throw new SourceUnreadableError(path, describeSourceError(error, ctx), error);
  }
}
