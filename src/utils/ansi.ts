export const RED = "\x1b[31m";
export const GREEN = "\x1b[32m";
export const YELLOW = "\x1b[33m";
export const MAGENTA = "\x1b[35m";
export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";
export const RESET = "\x1b[0m";

// CSI (incl. SGR colours), OSC terminated by BEL or ST, C1 CSI, and two-byte escapes
const ANSI_PATTERN =
  /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)|\x9b[0-?]*[ -/]*[@-~]|\x1b[@-Z\\-_]/g;

export type ColorMode = "auto" | "always" | "never";

let _colorEnabled: boolean | null = null;
let _colorMode: ColorMode = "auto";

function detectColorSupport(): boolean {
  if (_colorMode !== "auto") return _colorMode === "always";

  const forceColor = process.env.FORCE_COLOR !== undefined;
  if (forceColor) return true;

  const noColor = process.env.NO_COLOR !== undefined;
  if (noColor) return false;

  return process.stdout?.isTTY ?? false;
}

export function isColorEnabled(): boolean {
  if (_colorEnabled === null) {
    _colorEnabled = detectColorSupport();
  }
  return _colorEnabled;
}

/** Pin color output on or off instead of detecting it ("auto"). */
export function setColorMode(mode: ColorMode): void {
  _colorMode = mode;
  _colorEnabled = null;
}

/** Reset cached color detection and mode (for testing). */
export function resetColorDetection(): void {
  _colorMode = "auto";
  _colorEnabled = null;
}

/** Wrap message with ANSI color codes when color is enabled. */
export function colorize(color: string, message: string): string {
  const shouldColorize = isColorEnabled();
  if (!shouldColorize) return message;
  return `${color}${message}${RESET}`;
}

/** Remove terminal escape sequences from a string. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/** Number of code points, so astral characters count once. */
export function charCount(text: string): number {
  return Array.from(text).length;
}

/** Characters a terminal displays for `text`, ignoring escape sequences. */
export function visibleLength(text: string): number {
  return charCount(stripAnsi(text));
}
