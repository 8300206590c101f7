/**
 * Unified error handler for decopy
 *
 * This module provides consistent error handling for the CLI entry point.
 */

import { type AppContext, getGlobalContext } from "../context/index.ts";
import { DIM, RED, YELLOW, colorize } from "../utils/ansi.ts";
import { DecopyError, ErrorSeverity, UserCancelledError } from "./index.ts";

/**
 * Options for error handling
 */
export interface ErrorHandlerOptions {
  /** Whether to print verbose error details */
  verbose?: boolean;
}

/**
 * Handle an error and return appropriate exit code
 *
 * Errors and warnings are always printed; quiet mode does not reach here.
 *
 * @returns Exit code (0 for success, non-zero for errors)
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): number {
  const { verbose = false } = options;

  if (error instanceof DecopyError) {
    return handleDecopyError(error, verbose);
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(colorize(RED, `Error: ${errorMessage}`));

  if (verbose && error instanceof Error && error.stack) {
    console.error(colorize(DIM, `\nStack trace:\n${error.stack}`));
  }

  return 1;
}

function handleDecopyError(error: DecopyError, verbose: boolean): number {
  // UserCancelledError - single line, no stack
  if (error instanceof UserCancelledError) {
    console.error(error.message);
    return error.exitCode;
  }

  const isWarning = error.severity === ErrorSeverity.Warning;
  const prefix = isWarning ? "Warning" : "Error";
  const color = isWarning ? YELLOW : RED;
  console.error(colorize(color, `${prefix}: ${error.message}`));

  if (verbose && error.stack) {
    console.error(colorize(DIM, `\nStack trace:\n${error.stack}`));
  }

  return error.exitCode;
}

/**
 * Wrap a command function with error handling
 *
 * Any error escaping the command is printed once and mapped to its exit code.
 */
export function withErrorHandler<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
  options: ErrorHandlerOptions = {},
  ctx: AppContext = getGlobalContext(),
): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const exitCode = handleError(error, options);
      const shouldExit = exitCode !== 0;
      if (shouldExit) {
        ctx.runtime.control.exit(exitCode);
      }
    }
  };
}
