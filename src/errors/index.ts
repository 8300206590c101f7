/**
 * Unified error handling for decopy
 *
 * Error severity levels:
 * - Fatal: Unrecoverable errors that should stop execution
 * - Warning: Non-critical errors that are recorded and reported later
 * - Info: Informational messages (not truly errors)
 *
 * Exit codes:
 * - 0: Success, or the user declined the copy
 * - 1: General or configuration error
 * - 2: Argument error
 * - 3: Source directory unreadable
 * - 4: One or more destinations failed
 * - 5: Terminal output failed
 * - 130: Cancelled by signal (Ctrl+C)
 */

export enum ErrorSeverity {
  Fatal = "fatal",
  Warning = "warning",
  Info = "info",
}

/**
 * Base class for all decopy errors
 */
export abstract class DecopyError extends Error {
  abstract readonly severity: ErrorSeverity;
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * User cancelled the operation (Ctrl+C during a copy)
 */
export class UserCancelledError extends DecopyError {
  readonly severity = ErrorSeverity.Info;
  readonly exitCode = 130;

  constructor(message = "Operation cancelled") {
    super(message);
  }
}

/**
 * Command argument error
 */
export class ArgumentError extends DecopyError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 2;
  readonly argument?: string;

  constructor(message: string, argument?: string) {
    super(message);
    this.argument = argument;
  }
}

/**
 * The source directory cannot be listed or sized.
 * Raised before any destination is touched.
 */
export class SourceUnreadableError extends DecopyError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 3;
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Cannot read source directory "${path}": ${reason}`);
    this.path = path;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Copying into one destination failed; the remaining destinations still run
 */
export class DestinationCopyError extends DecopyError {
  readonly severity = ErrorSeverity.Warning;
  readonly exitCode = 4;
  readonly destination: string;
  readonly reason: string;

  constructor(destination: string, reason: string, cause?: unknown) {
    super(`Failed to copy to "${destination}": ${reason}`);
    this.destination = destination;
    this.reason = reason;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * The terminal output sink rejected a write
 */
export class RenderIOError extends DecopyError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 5;

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot write to terminal: ${detail}`);
    this.cause = cause;
  }
}

/**
 * Configuration file error (parsing, validation, etc.)
 */
export class ConfigurationError extends DecopyError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 1;
  readonly configPath?: string;

  constructor(message: string, configPath?: string) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.configPath = configPath;
  }
}
