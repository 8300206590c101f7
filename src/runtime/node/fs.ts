/**
 * Node.js file system implementation
 */

import * as fs from "node:fs/promises";
import type * as nodeFs from "node:fs";
import type { DirEntry, FileInfo, MkdirOptions, RuntimeFS } from "../types.ts";

function toFileInfo(stat: nodeFs.Stats): FileInfo {
  return {
    isFile: stat.isFile(),
    isDirectory: stat.isDirectory(),
    isSymlink: stat.isSymbolicLink(),
    size: stat.size,
  };
}

export const nodeFS: RuntimeFS = {
  async readTextFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, "utf-8");
  },

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    await fs.mkdir(dirPath, { recursive: options?.recursive });
  },

  async stat(filePath: string): Promise<FileInfo> {
    const stat = await fs.stat(filePath);
    return toFileInfo(stat);
  },

  async lstat(filePath: string): Promise<FileInfo> {
    const stat = await fs.lstat(filePath);
    return toFileInfo(stat);
  },

  async *readDir(dirPath: string): AsyncIterable<DirEntry> {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    for (const entry of entries) {
      yield {
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
        isSymlink: entry.isSymbolicLink(),
      };
    }
  },

  async readLink(linkPath: string): Promise<string> {
    return await fs.readlink(linkPath);
  },

  async symlink(target: string, linkPath: string): Promise<void> {
    await fs.symlink(target, linkPath);
  },

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { recursive: true, force: true });
  },

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  },
};
