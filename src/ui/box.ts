/**
 * Box-drawing layout for the deployment copy display.
 *
 * Every box has the same interior width. The queue box is split in two
 * columns: the source name on the left, destinations on the right, joined
 * by an arrow on one row.
 *
 * ```
 * ╭────────────┬──────────────────────────────────────╮
 * │            │  /mnt/a                              │
 * │  test-dir ──> /mnt/b                              │
 * │            │  /mnt/c                              │
 * ╰────────────┴──────────────────────────────────────╯
 * ```
 */

import { charCount, visibleLength } from "../utils/ansi.ts";
import { truncate, truncateStart } from "../utils/format.ts";

/** Interior width of every box, in visible columns */
export const BOX_WIDTH = 51;

/** Source names longer than this are cut in the queue box */
export const SOURCE_NAME_LIMIT = 15;

export const GLYPHS = {
  vertical: "│",
  horizontal: "─",
  splitLeft: "├",
  splitRight: "┤",
  splitAbove: "┬",
  splitBelow: "┴",
  topLeft: "╭",
  topRight: "╮",
  bottomLeft: "╰",
  bottomRight: "╯",
  arrow: "──>",
} as const;

/**
 * Interior column at which a border is joined by a T-junction
 */
export interface BorderSplit {
  column: number;
  glyph: string;
}

function rule(left: string, right: string, split?: BorderSplit): string {
  const interior = Array.from(GLYPHS.horizontal.repeat(BOX_WIDTH));
  const hasSplit = split !== undefined && split.column >= 0 && split.column < BOX_WIDTH;
  if (hasSplit) {
    interior[split.column] = split.glyph;
  }
  return `${left}${interior.join("")}${right}`;
}

/**
 * `╭───╮`, with `┬` at `splitColumn` when given.
 */
export function topBorder(splitColumn?: number): string {
  const split = splitColumn === undefined
    ? undefined
    : { column: splitColumn, glyph: GLYPHS.splitAbove };
  return rule(GLYPHS.topLeft, GLYPHS.topRight, split);
}

/**
 * `╰───╯`, with `┴` at `splitColumn` when given.
 */
export function bottomBorder(splitColumn?: number): string {
  const split = splitColumn === undefined
    ? undefined
    : { column: splitColumn, glyph: GLYPHS.splitBelow };
  return rule(GLYPHS.bottomLeft, GLYPHS.bottomRight, split);
}

export function dividerLine(): string {
  return rule(GLYPHS.splitLeft, GLYPHS.splitRight);
}

/**
 * One interior row. Padding is computed on the visible width so styled
 * text lines up; text wider than the box is written unpadded.
 */
export function contentLine(text: string): string {
  const padding = Math.max(0, BOX_WIDTH - visibleLength(text) - 1);
  return `${GLYPHS.vertical} ${text}${" ".repeat(padding)}${GLYPHS.vertical}`;
}

/**
 * Interior column of the queue box split: the source name (at most 15
 * characters) plus its margins.
 */
export function columnSplit(sourceName: string): number {
  return Math.min(charCount(sourceName), SOURCE_NAME_LIMIT) + 4;
}

/**
 * Row whose destination the source arrow points at:
 * none for an empty queue, 1 for one or two destinations, else the middle.
 */
export function arrowRow(count: number): number | undefined {
  if (count <= 0) return undefined;
  if (count <= 2) return 1;
  return Math.floor(count / 2);
}

export interface QueueRowStyle {
  /** Styles the (already truncated) source name */
  source?: (name: string) => string;
  /** Styles each destination path */
  destination?: (path: string) => string;
}

/**
 * Text of each queue box row, before `contentLine` wraps it.
 *
 * The arrow row reads ` name ──> dest`; every other row puts `│` under the
 * split column. A single-destination queue points at its only row.
 * Destinations are shortened from the left to stay inside the box.
 */
export function queueRowTexts(
  sourceName: string,
  destinations: readonly string[],
  style: QueueRowStyle = {},
): string[] {
  const split = columnSplit(sourceName);
  const styleSource = style.source ?? ((name: string) => name);
  const styleDestination = style.destination ?? ((path: string) => path);
  const name = styleSource(truncate(sourceName, SOURCE_NAME_LIMIT));

  const row = arrowRow(destinations.length);
  if (row === undefined) {
    return [` ${name}`];
  }
  const arrowIndex = Math.min(row, destinations.length - 1);
  // Both row shapes put the path at split + 2
  const pathRoom = BOX_WIDTH - 1 - (split + 2);

  return destinations.map((destination, index) => {
    const path = styleDestination(truncateStart(destination, pathRoom));
    if (index === arrowIndex) {
      return ` ${name} ${GLYPHS.arrow} ${path}`;
    }
    return `${GLYPHS.vertical.padStart(split)}  ${path}`;
  });
}

/**
 * The complete queue box: borders joined at the split column.
 */
export function queueBox(
  sourceName: string,
  destinations: readonly string[],
  style: QueueRowStyle = {},
): string[] {
  const split = columnSplit(sourceName);
  return [
    topBorder(split),
    ...queueRowTexts(sourceName, destinations, style).map(contentLine),
    bottomBorder(split),
  ];
}
