import type { DestinationCopyError } from "../../errors/index.ts";

/**
 * Answer from a progress callback: keep copying the current destination, or stop it.
 */
export type TransitDecision = "continue" | "abort";

/**
 * Progress of the destination currently being written.
 * Restarts at zero for every destination.
 */
export interface CopyProgress {
  destination: string;
  bytesCopied: number;
  /** min(100, floor(bytesCopied / totalBytes * 100)) */
  percentage: number;
}

export type ProgressCallback = (progress: CopyProgress) => TransitDecision | void;

export type CompleteCallback = (report: CopyReport) => void;

/**
 * Result of one destination, in queue order.
 */
export type DestinationOutcome =
  | { destination: string; status: "copied"; bytesCopied: number }
  | { destination: string; status: "failed"; error: DestinationCopyError }
  | { destination: string; status: "aborted"; bytesCopied: number }
  | { destination: string; status: "skipped" };

export interface CopyReport {
  source: string;
  totalBytes: number;
  outcomes: DestinationOutcome[];
}

/**
 * Options handed to a strategy for one destination.
 */
export interface DirectoryCopyOptions {
  /**
   * Called after every chunk with the bytes copied so far into this destination.
   * Returning "abort" stops the copy with a CopyAbortedError.
   */
  onBytes(bytesCopied: number): TransitDecision | void;
  /** Checked between chunks; an aborted signal stops the copy */
  signal?: AbortSignal;
}

/**
 * Copy strategy interface
 */
export interface CopyStrategy {
  readonly name: string;

  /**
   * Copy the contents of `src` (not the directory itself) into `dest`,
   * creating `dest` when missing and overwriting existing files.
   * @returns Bytes copied into `dest`
   */
  copyDirectoryContents(src: string, dest: string, options: DirectoryCopyOptions): Promise<number>;
}

/**
 * Raised by a strategy when the copy was stopped by the progress callback
 * or the cancellation signal.
 */
export class CopyAbortedError extends Error {
  readonly bytesCopied: number;

  constructor(bytesCopied: number) {
    super("Copy aborted");
    this.name = "CopyAbortedError";
    this.bytesCopied = bytesCopied;
  }
}
