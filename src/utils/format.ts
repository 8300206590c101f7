import { charCount } from "./ansi.ts";

const BYTE_UNITS = ["b", "kb", "mb", "gb", "tb"] as const;

/**
 * Format a byte count with binary (1024) units, truncating rather than
 * rounding: 1536 bytes is "1kb".
 */
export function formatBytes(bytes: number): string {
  const isValid = Number.isFinite(bytes) && bytes >= 0;
  if (!isValid) {
    throw new RangeError(`Byte count must be a non-negative number, got ${bytes}`);
  }

  const whole = Math.floor(bytes);
  for (let exponent = BYTE_UNITS.length - 1; exponent > 0; exponent--) {
    const unitSize = 1024 ** exponent;
    if (whole >= unitSize) {
      return `${Math.floor(whole / unitSize)}${BYTE_UNITS[exponent]}`;
    }
  }
  return `${whole}b`;
}

/**
 * Keep the first `maxChars` code points of `text`.
 */
export function truncate(text: string, maxChars: number): string {
  if (charCount(text) <= maxChars) return text;
  return Array.from(text).slice(0, Math.max(0, maxChars)).join("");
}

/**
 * Shorten `text` from the left so it fits in `maxChars`, marking the cut with "…".
 * Used for paths, whose tail is the informative part.
 */
export function truncateStart(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) return text;
  if (maxChars <= 0) return "";
  return "…" + chars.slice(chars.length - (maxChars - 1)).join("");
}

/**
 * Integer percentage of `done` over `total`, capped at 100.
 * An empty total counts as complete.
 */
export function percentageOf(done: number, total: number): number {
  if (total <= 0) return 100;
  return Math.min(100, Math.floor((done / total) * 100));
}
