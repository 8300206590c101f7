import { Buffer } from "node:buffer";
import { open } from "node:fs/promises";
import { join } from "node:path";
import type { CopyStrategy, DirectoryCopyOptions, TransitDecision } from "../types.ts";
import { CopyAbortedError } from "../types.ts";
import { type AppContext, getGlobalContext } from "../../../context/index.ts";
import { DEFAULT_CHUNK_SIZE } from "../../config.ts";

export interface StandardStrategyOptions {
  /** Bytes read per chunk */
  chunkSize?: number;
}

/**
 * Running state of one directory copy
 */
class Transfer {
  bytesCopied = 0;

  constructor(
    private readonly onBytes: (bytesCopied: number) => TransitDecision | void,
    private readonly signal: AbortSignal | undefined,
  ) {}

  checkpoint(): void {
    if (this.signal?.aborted) {
      throw new CopyAbortedError(this.bytesCopied);
    }
  }

  advance(bytes: number): void {
    this.bytesCopied += bytes;
    const decision = this.onBytes(this.bytesCopied);
    if (decision === "abort") {
      throw new CopyAbortedError(this.bytesCopied);
    }
  }
}

/**
 * Standard copy strategy: walks the tree and streams each file in chunks,
 * reporting after every chunk. Works on all platforms.
 */
export class StandardStrategy implements CopyStrategy {
  readonly name = "standard" as const;
  private readonly chunkSize: number;

  constructor(
    options: StandardStrategyOptions = {},
    private readonly ctx: AppContext = getGlobalContext(),
  ) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  async copyDirectoryContents(
    src: string,
    dest: string,
    options: DirectoryCopyOptions,
  ): Promise<number> {
    const transfer = new Transfer(options.onBytes, options.signal);
    transfer.checkpoint();
    await this.ctx.runtime.fs.mkdir(dest, { recursive: true });
    await this.copyTree(src, dest, transfer);
    return transfer.bytesCopied;
  }

  private async copyTree(srcDir: string, destDir: string, transfer: Transfer): Promise<void> {
    const { fs } = this.ctx.runtime;

    for await (const entry of fs.readDir(srcDir)) {
      transfer.checkpoint();
      const from = join(srcDir, entry.name);
      const to = join(destDir, entry.name);

      if (entry.isSymlink) {
        await this.copyLink(from, to);
      } else if (entry.isDirectory) {
        await fs.mkdir(to, { recursive: true });
        await this.copyTree(from, to, transfer);
      } else if (entry.isFile) {
        await this.copyFile(from, to, transfer);
      }
      // Sockets, FIFOs and devices are not copied
    }
  }

  private async copyLink(from: string, to: string): Promise<void> {
    const { fs } = this.ctx.runtime;
    const target = await fs.readLink(from);
    const isOccupied = await fs.lstat(to).then(() => true, () => false);
    if (isOccupied) {
      await fs.remove(to);
    }
    await fs.symlink(target, to);
  }

  private async copyFile(from: string, to: string, transfer: Transfer): Promise<void> {
    const source = await open(from, "r");
    try {
      const { mode } = await source.stat();
      // Mode applies when the file is created; existing files keep theirs
      const target = await open(to, "w", mode & 0o777);
      try {
        const buffer = Buffer.allocUnsafe(this.chunkSize);
        while (true) {
          transfer.checkpoint();
          const { bytesRead } = await source.read(buffer, 0, buffer.length, null);
          if (bytesRead === 0) break;

          let offset = 0;
          while (offset < bytesRead) {
            const { bytesWritten } = await target.write(buffer, offset, bytesRead - offset);
            offset += bytesWritten;
          }
          transfer.advance(bytesRead);
        }
      } finally {
        await target.close();
      }
    } finally {
      await source.close();
    }
  }
}
