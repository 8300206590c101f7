/**
 * Node.js I/O implementation
 */

import { Buffer } from "node:buffer";
import { writeSync } from "node:fs";
import { isatty } from "node:tty";
import type { OutputStream, RuntimeIO, StdinStream } from "../types.ts";

const stdinStream: StdinStream = {
  async read(buffer: Uint8Array): Promise<number | null> {
    return new Promise((resolve, reject) => {
      const stdin = process.stdin;

      // Try to read immediately first (for data already in buffer)
      const immediateChunk: unknown = stdin.read(buffer.length);
      if (immediateChunk !== null) {
        const bytes = Buffer.isBuffer(immediateChunk)
          ? immediateChunk
          : Buffer.from(String(immediateChunk));
        const len = Math.min(bytes.length, buffer.length);
        bytes.copy(Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength), 0, 0, len);
        resolve(len);
        return;
      }

      // No data available immediately, wait for it
      const wasPaused = stdin.isPaused();
      if (wasPaused) {
        stdin.resume();
      }

      const onData = (chunk: Buffer | string) => {
        cleanup();
        const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        const len = Math.min(bytes.length, buffer.length);
        bytes.copy(Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength), 0, 0, len);
        resolve(len);
      };

      const onEnd = () => {
        cleanup();
        resolve(null);
      };

      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };

      const cleanup = () => {
        stdin.removeListener("data", onData);
        stdin.removeListener("end", onEnd);
        stdin.removeListener("error", onError);
        if (wasPaused) {
          stdin.pause();
        }
      };

      stdin.once("data", onData);
      stdin.once("end", onEnd);
      stdin.once("error", onError);
    });
  },

  isTerminal(): boolean {
    return process.stdin.isTTY ?? false;
  },
};

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Output stream over a file descriptor. Writes go straight to the
 * descriptor, so a failed write (EPIPE once the reader is gone) throws
 * from `writeSync` instead of surfacing later as a stream event.
 */
export function createOutputStream(fd: number): OutputStream {
  return {
    writeSync(data: Uint8Array): number {
      let offset = 0;
      while (offset < data.length) {
        try {
          offset += writeSync(fd, data, offset, data.length - offset);
        } catch (error) {
          // Non-blocking pipe is full: wait for the reader
          if (hasErrorCode(error, "EAGAIN")) continue;
          throw error;
        }
      }
      return data.length;
    },

    isTerminal(): boolean {
      return isatty(fd);
    },
  };
}

export const nodeIO: RuntimeIO = {
  stdin: stdinStream,
  stdout: createOutputStream(process.stdout.fd),
};
