import { DIM, MAGENTA, RED, YELLOW, colorize } from "./ansi.ts";

/**
 * Output options for controlling verbosity level.
 */
export interface OutputOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * The "[decopy]" prefix put in front of every log line.
 */
export function tag(): string {
  return `[${colorize(MAGENTA, "decopy")}]`;
}

/**
 * Log a message to stderr unless quiet mode is enabled.
 * stdout carries the box display, so logs stay on stderr.
 */
export function log(message: string, options: OutputOptions): void {
  const shouldLog = !options.quiet;
  if (shouldLog) {
    console.error(`${tag()} ${message}`);
  }
}

/**
 * Log a verbose message to stderr when verbose mode is enabled.
 */
export function verboseLog(message: string, options: OutputOptions): void {
  const shouldLog = options.verbose && !options.quiet;
  if (shouldLog) {
    console.error(colorize(DIM, `[verbose] ${message}`));
  }
}

/**
 * Log an error message to stderr with red color.
 * Always outputs regardless of quiet mode, as errors should never be suppressed.
 */
export function errorLog(message: string, _options?: OutputOptions): void {
  console.error(`${tag()} ${colorize(RED, message)}`);
}

/**
 * Log a warning message to stderr with yellow color.
 * Always outputs regardless of quiet mode, as warnings should not be suppressed.
 */
export function warnLog(message: string, _options?: OutputOptions): void {
  console.warn(`${tag()} ${colorize(YELLOW, message)}`);
}
