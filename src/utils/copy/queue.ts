import { basename, isAbsolute, relative, resolve } from "node:path";
import { ArgumentError, DecopyError, DestinationCopyError, ErrorSeverity } from "../../errors/index.ts";
import { type AppContext, getGlobalContext } from "../../context/index.ts";
import { percentageOf } from "../format.ts";
import { measureDirectorySize } from "./size.ts";
import { StandardStrategy } from "./strategies/index.ts";
import {
  type CompleteCallback,
  CopyAbortedError,
  type CopyReport,
  type CopyStrategy,
  type DestinationOutcome,
  type ProgressCallback,
} from "./types.ts";

export interface StartCopyOptions {
  /** Copy primitive; defaults to StandardStrategy */
  strategy?: CopyStrategy;
  /** Cancellation: checked between destinations and between chunks */
  signal?: AbortSignal;
  /** Called as soon as a destination fails */
  onDestinationFailed?: (error: DestinationCopyError) => void;
}

/**
 * `child` is `parent` or lies beneath it.
 */
function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

function describeDestinationError(error: unknown, ctx: AppContext): string {
  const { errors } = ctx.runtime;
  if (errors.isPermissionDenied(error)) return "permission denied";
  if (errors.isNoSpace(error)) return "no space left on device";
  if (errors.isNotFound(error)) return "path not found";
  if (errors.isNotDirectory(error)) return "not a directory";
  return error instanceof Error ? error.message : String(error);
}

/**
 * One source directory and the ordered destinations it is copied into.
 * Immutable: build a new queue with `withDestinations` to change targets.
 */
export class CopyQueue {
  readonly source: string;
  readonly destinations: readonly string[];

  constructor(source: string, destinations: readonly string[]) {
    this.source = source;
    this.destinations = Object.freeze([...destinations]);
    Object.freeze(this);
  }

  /**
   * Build a queue from command-line paths, resolved against `cwd`.
   *
   * @throws ArgumentError for a missing source, no destinations, a destination
   * equal to or inside the source, or a repeated destination
   */
  static fromPaths(source: string | undefined, destinations: readonly string[], cwd: string): CopyQueue {
    const hasSource = source !== undefined && source.trim().length > 0;
    if (!hasSource) {
      throw new ArgumentError("Missing source directory", "source");
    }
    const hasDestinations = destinations.length > 0;
    if (!hasDestinations) {
      throw new ArgumentError("At least one destination directory is required", "destinations");
    }

    const resolvedSource = resolve(cwd, source);
    const seen = new Set<string>();
    const resolvedDestinations = destinations.map((dest) => {
      const resolvedDest = resolve(cwd, dest);
      if (isWithin(resolvedSource, resolvedDest)) {
        throw new ArgumentError(
          `Destination "${dest}" is inside the source directory`,
          "destinations",
        );
      }
      if (seen.has(resolvedDest)) {
        throw new ArgumentError(`Destination "${dest}" is listed more than once`, "destinations");
      }
      seen.add(resolvedDest);
      return resolvedDest;
    });

    return new CopyQueue(resolvedSource, resolvedDestinations);
  }

  /**
   * Last path segment of the source, or the whole path for a root.
   */
  get sourceName(): string {
    return basename(this.source) || this.source;
  }

  withDestinations(destinations: readonly string[]): CopyQueue {
    return new CopyQueue(this.source, destinations);
  }

  /**
   * Copy the source contents into every destination, in order.
   *
   * The source is sized once up front; if that fails the returned promise
   * rejects with SourceUnreadableError and no destination is touched.
   * A failing destination is recorded and the next one is attempted.
   * `onComplete` runs exactly once, after the last destination.
   */
  async startCopy(
    onProgress: ProgressCallback,
    onComplete: CompleteCallback,
    options: StartCopyOptions = {},
    ctx: AppContext = getGlobalContext(),
  ): Promise<CopyReport> {
    const { signal, onDestinationFailed } = options;
    const strategy = options.strategy ?? new StandardStrategy({}, ctx);

    const totalBytes = await measureDirectorySize(this.source, ctx);
    const outcomes: DestinationOutcome[] = [];

    for (const destination of this.destinations) {
      if (signal?.aborted) {
        outcomes.push({ destination, status: "skipped" });
        continue;
      }

      const report = (bytesCopied: number) =>
        onProgress({ destination, bytesCopied, percentage: percentageOf(bytesCopied, totalBytes) });

      try {
        const bytesCopied = await strategy.copyDirectoryContents(this.source, destination, {
          onBytes: report,
          signal,
        });
        // Final tick so every finished destination reports its total
        report(bytesCopied);
        outcomes.push({ destination, status: "copied", bytesCopied });
      } catch (error) {
        if (error instanceof CopyAbortedError) {
          outcomes.push({ destination, status: "aborted", bytesCopied: error.bytesCopied });
          continue;
        }
        // Fatal errors raised by callbacks (e.g. the terminal went away) end the run
        const isFatal = error instanceof DecopyError && error.severity === ErrorSeverity.Fatal;
        if (isFatal) {
          throw error;
        }
        const failure = new DestinationCopyError(
          destination,
          describeDestinationError(error, ctx),
          error,
        );
        outcomes.push({ destination, status: "failed", error: failure });
        onDestinationFailed?.(failure);
      }
    }

    const result: CopyReport = { source: this.source, totalBytes, outcomes };
    onComplete(result);
    return result;
  }
}

/**
 * Destinations that were copied completely.
 */
export function succeededDestinations(report: CopyReport): string[] {
  return report.outcomes
    .filter((outcome) => outcome.status === "copied")
    .map((outcome) => outcome.destination);
}

/**
 * Destinations that failed with an error.
 */
export function failedOutcomes(
  report: CopyReport,
): Extract<DestinationOutcome, { status: "failed" }>[] {
  return report.outcomes.filter(
    (outcome): outcome is Extract<DestinationOutcome, { status: "failed" }> =>
      outcome.status === "failed",
  );
}

export function isCompleteSuccess(report: CopyReport): boolean {
  return report.outcomes.every((outcome) => outcome.status === "copied");
}
