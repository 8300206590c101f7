/**
 * Deployment copy user interface
 *
 * A small state machine over three screens. The caller moves it forward
 * (pre-copy → copying → completed) and asks it to render the current one:
 *
 * ```
 * ╭───────────────────────────────────────────────────╮
 * │ Deployment Copy                                   │
 * ├───────────────────────────────────────────────────┤
 * │ Copying... (20%) [10mb copied] --> /mnt/b         │
 * ╰───────────────────────────────────────────────────╯
 * ```
 */

import type { CopyQueue } from "../utils/copy/queue.ts";
import { isCompleteSuccess, succeededDestinations } from "../utils/copy/queue.ts";
import type { CopyMessage } from "../utils/copy/channel.ts";
import type { CopyReport, DestinationOutcome } from "../utils/copy/types.ts";
import { BOLD, DIM, GREEN, MAGENTA, RED, YELLOW, charCount, colorize, visibleLength } from "../utils/ansi.ts";
import { formatBytes, truncate, truncateStart } from "../utils/format.ts";
import { tag } from "../utils/output.ts";
import { RenderIOError } from "../errors/index.ts";
import { BOX_WIDTH, bottomBorder, contentLine, dividerLine, queueBox, topBorder } from "./box.ts";
import type { Renderer } from "./renderer.ts";

export const TITLE = "Deployment Copy";

/** Widest text a content line holds without overflowing */
const TEXT_WIDTH = BOX_WIDTH - 1;

export type UIState =
  | { kind: "pre-copy"; queue: CopyQueue }
  | { kind: "copying"; progress: AsyncIterable<CopyMessage> }
  | { kind: "completed"; queue: CopyQueue; report: CopyReport };

const STAGE: Record<UIState["kind"], number> = {
  "pre-copy": 0,
  copying: 1,
  completed: 2,
};

type ProgressMessage = Extract<CopyMessage, { type: "progress" }>;

function keyHint(key: string): string {
  return colorize(BOLD + DIM, key);
}

/**
 * `text` + `path`, with the path shortened from the left to fit one content line.
 */
function fitPath(prefix: string, path: string, suffix = ""): string {
  const room = Math.max(1, TEXT_WIDTH - visibleLength(prefix) - visibleLength(suffix));
  return `${prefix}${truncateStart(path, room)}${suffix}`;
}

/** Room a failure reason keeps beside a long destination */
const MIN_REASON_WIDTH = 18;

/**
 * `✗ destination: reason` on one content line. The destination keeps its
 * tail; the reason gives way first.
 */
function failureText(destination: string, reason: string): string {
  const prefix = `${colorize(RED, "✗")} `;
  const room = TEXT_WIDTH - visibleLength(prefix) - ": ".length;
  const path = truncateStart(destination, Math.min(charCount(destination), room - MIN_REASON_WIDTH));
  const reasonRoom = room - charCount(path);
  const shortReason =
    charCount(reason) <= reasonRoom ? reason : `${truncate(reason, reasonRoom - 1)}…`;
  return `${prefix}${path}: ${shortReason}`;
}

function outcomeText(outcome: DestinationOutcome): string {
  switch (outcome.status) {
    case "copied":
      return fitPath(`${colorize(GREEN, "✓")} `, outcome.destination);
    case "failed":
      return failureText(outcome.destination, outcome.error.reason);
    case "aborted":
      return fitPath(
        `${colorize(YELLOW, "-")} `,
        outcome.destination,
        ` (aborted at ${formatBytes(outcome.bytesCopied)})`,
      );
    case "skipped":
      return fitPath(`${colorize(DIM, "-")} `, outcome.destination, " (skipped)");
  }
}

export class UserInterface {
  private state: UIState | null = null;
  private headerDrawn = false;

  constructor(private readonly renderer: Renderer) {}

  get current(): UIState | null {
    return this.state;
  }

  withPreCopy(queue: CopyQueue): this {
    return this.transition({ kind: "pre-copy", queue });
  }

  withCopying(progress: AsyncIterable<CopyMessage>): this {
    return this.transition({ kind: "copying", progress });
  }

  withCompleted(queue: CopyQueue, report: CopyReport): this {
    return this.transition({ kind: "completed", queue, report });
  }

  /**
   * Render the current state. For "copying" this consumes the progress
   * stream and resolves once it closes; a failing stream closes the box
   * and rethrows.
   */
  async render(): Promise<void> {
    const state = this.state;
    if (state === null) return;

    switch (state.kind) {
      case "pre-copy":
        this.renderPreCopy(state.queue);
        return;
      case "copying":
        await this.renderCopying(state.progress);
        return;
      case "completed":
        this.renderCompleted(state.report);
        return;
      default: {
        const unreachable: never = state;
        throw new Error(`Unknown UI state: ${String(unreachable)}`);
      }
    }
  }

  /**
   * Close any box that is still being redrawn, leaving it complete on screen.
   */
  abandon(): void {
    if (this.renderer.hasLiveRegion()) {
      this.renderer.commitLive();
    }
  }

  private transition(next: UIState): this {
    const isForward = this.state === null || STAGE[next.kind] > STAGE[this.state.kind];
    if (!isForward) {
      throw new Error(`Cannot move from "${this.state?.kind}" to "${next.kind}"`);
    }
    this.state = next;
    return this;
  }

  private header(): string[] {
    return [topBorder(), contentLine(colorize(MAGENTA, TITLE)), dividerLine()];
  }

  private ensureHeader(): void {
    if (this.headerDrawn) return;
    this.renderer.writeLines(this.header());
    this.headerDrawn = true;
  }

  private renderPreCopy(queue: CopyQueue): void {
    this.renderer.writeLines([
      ...this.header(),
      contentLine("Do you want to copy to these directories?"),
      contentLine(`Press ${keyHint("[Y]")} or ${keyHint("[N]")} on your keyboard`),
      bottomBorder(),
      ...queueBox(queue.sourceName, queue.destinations, {
        source: (name) => colorize(MAGENTA, name),
        destination: (path) => colorize(DIM, path),
      }),
    ]);
  }

  private async renderCopying(progress: AsyncIterable<CopyMessage>): Promise<void> {
    let latest: ProgressMessage | undefined;
    const failures: string[] = [];

    try {
      for await (const message of progress) {
        if (message.type === "progress") {
          latest = message;
        } else if (message.type === "failed") {
          failures.push(failureText(message.destination, message.error.reason));
        }

        this.ensureHeader();
        this.renderer.updateLive([
          contentLine(this.progressText(latest)),
          ...failures.map(contentLine),
          bottomBorder(),
        ]);
      }
    } catch (error) {
      // The sink itself failed: nothing more can be drawn
      if (!(error instanceof RenderIOError)) {
        this.abandon();
      }
      throw error;
    }
  }

  private progressText(latest: ProgressMessage | undefined): string {
    if (latest === undefined) return "Copying...";
    const prefix =
      `Copying... (${latest.percentage}%) [${formatBytes(latest.bytesCopied)} copied] --> `;
    return fitPath(prefix, latest.destination);
  }

  private renderCompleted(report: CopyReport): void {
    const succeeded = succeededDestinations(report).length;
    const total = report.outcomes.length;
    const complete = isCompleteSuccess(report);

    const headline = complete
      ? `Finished copying (100%) [${formatBytes(report.totalBytes)} copied]`
      : `Finished with errors (${succeeded}/${total} copied)`;

    this.ensureHeader();
    this.renderer.updateLive([
      contentLine(headline),
      ...report.outcomes.map((outcome) => contentLine(outcomeText(outcome))),
      bottomBorder(),
    ]);
    this.renderer.commitLive();

    this.renderer.writeLines([`${tag()} ${completionMessage(report)}`]);
  }
}

/**
 * One-line summary written after the final box.
 */
export function completionMessage(report: CopyReport): string {
  const failed = report.outcomes.filter((o) => o.status === "failed").length;
  const interrupted = report.outcomes.some((o) => o.status === "aborted" || o.status === "skipped");
  const total = report.outcomes.length;

  if (failed > 0) {
    const noun = total === 1 ? "destination" : "destinations";
    return colorize(RED, `${failed} of ${total} ${noun} failed`);
  }
  if (interrupted) {
    return colorize(YELLOW, "Copy cancelled");
  }
  return colorize(GREEN, "Files finished copying");
}

