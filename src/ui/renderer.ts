/**
 * Terminal renderer for the box display.
 *
 * Owns the output sink. Lines are either permanent, or part of the "live"
 * region at the bottom of the output, which is cleared and redrawn in place
 * on every update. Sinks that are not terminals get no cursor movement:
 * only the final state of the live region is written when it is committed.
 */

import { RenderIOError } from "../errors/index.ts";
import type { OutputStream } from "../runtime/types.ts";

/**
 * ANSI cursor and line control sequences
 */
export class AnsiControl {
  static readonly CLEAR_LINE = "\x1b[2K";
  static readonly CURSOR_UP = (n: number) => `\x1b[${n}A`;
  static readonly CURSOR_COLUMN_0 = "\x1b[0G";
  static readonly HIDE_CURSOR = "\x1b[?25l";
  static readonly SHOW_CURSOR = "\x1b[?25h";

  /** Move to the first of the last `lineCount` lines and blank them. */
  static clearLastRender(lineCount: number): string {
    if (lineCount === 0) return "";

    const moves = AnsiControl.CURSOR_COLUMN_0 + AnsiControl.CURSOR_UP(lineCount);
    const clears = Array(lineCount).fill(AnsiControl.CLEAR_LINE + "\n").join("");
    return moves + clears + AnsiControl.CURSOR_UP(lineCount) + AnsiControl.CURSOR_COLUMN_0;
  }
}

export interface RendererOptions {
  /** Redraw the live region in place; defaults to whether the sink is a terminal */
  interactive?: boolean;
}

export class Renderer {
  private readonly sink: OutputStream;
  private readonly interactive: boolean;
  private readonly encoder = new TextEncoder();

  private liveLines: string[] = [];
  private liveLineCount = 0;
  private liveOpen = false;

  constructor(sink: OutputStream, options: RendererOptions = {}) {
    this.sink = sink;
    this.interactive = options.interactive ?? sink.isTerminal();
  }

  isInteractive(): boolean {
    return this.interactive;
  }

  /** Whether a live region is drawn and not yet committed */
  hasLiveRegion(): boolean {
    return this.liveOpen;
  }

  /**
   * Write permanent lines. An open live region is committed first.
   */
  writeLines(lines: readonly string[]): void {
    if (this.liveOpen) {
      this.commitLive();
    }
    this.write(lines.map((line) => `${line}\n`).join(""));
  }

  /**
   * Replace the live region with `lines`.
   */
  updateLive(lines: readonly string[]): void {
    this.liveLines = [...lines];

    if (!this.interactive) {
      this.liveOpen = true;
      return;
    }

    let output = "";
    if (!this.liveOpen) {
      output += AnsiControl.HIDE_CURSOR;
      this.liveOpen = true;
    }
    output += AnsiControl.clearLastRender(this.liveLineCount);
    output += lines.map((line) => `${line}\n`).join("");
    this.write(output);
    this.liveLineCount = lines.length;
  }

  /**
   * Make the live region permanent. Non-interactive sinks receive its
   * final lines here.
   */
  commitLive(): void {
    if (!this.liveOpen) return;
    this.liveOpen = false;

    const output = this.interactive
      ? AnsiControl.SHOW_CURSOR
      : this.liveLines.map((line) => `${line}\n`).join("");
    this.liveLines = [];
    this.liveLineCount = 0;
    this.write(output);
  }

  private write(text: string): void {
    if (text.length === 0) return;
    try {
      this.sink.writeSync(this.encoder.encode(text));
    } catch (error) {
      throw new RenderIOError(error);
    }
  }
}
