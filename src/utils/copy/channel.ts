import type { DestinationCopyError } from "../../errors/index.ts";
import type { CopyReport } from "./types.ts";

/**
 * Messages sent from the copy worker to the display.
 */
export type CopyMessage =
  | { type: "progress"; destination: string; percentage: number; bytesCopied: number }
  | { type: "failed"; destination: string; error: DestinationCopyError }
  | { type: "done"; report: CopyReport };

interface PendingReceive {
  resolve(result: IteratorResult<CopyMessage>): void;
  reject(error: unknown): void;
}

/**
 * Single-producer, single-consumer stream of copy messages.
 *
 * Progress is coalesced to the latest value: a progress message for the same
 * destination as the newest buffered one replaces it, and once `capacity`
 * messages are buffered the oldest progress message is dropped. "failed" and
 * "done" messages are always delivered. Closing ends iteration; failing makes
 * the pending and every later receive reject.
 */
export class ProgressChannel implements AsyncIterable<CopyMessage> {
  readonly capacity: number;
  private readonly buffer: CopyMessage[] = [];
  private pending: PendingReceive | null = null;
  private closed = false;
  private failure: { error: unknown } | null = null;
  private droppedCount = 0;

  constructor(capacity = 16) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("capacity must be a positive integer");
    }
    this.capacity = capacity;
  }

  /** Progress messages discarded by coalescing so far */
  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(message: CopyMessage): void {
    if (this.closed) {
      throw new Error("Cannot send on a closed channel");
    }

    if (this.pending) {
      const receiver = this.pending;
      this.pending = null;
      receiver.resolve({ value: message, done: false });
      return;
    }

    if (message.type === "progress") {
      const newest = this.buffer[this.buffer.length - 1];
      const replacesNewest = newest?.type === "progress" &&
        newest.destination === message.destination;
      if (replacesNewest) {
        this.buffer[this.buffer.length - 1] = message;
        this.droppedCount++;
        return;
      }
      if (this.buffer.length >= this.capacity) {
        this.dropOldestProgress();
      }
    }

    this.buffer.push(message);
  }

  /** No more messages; the consumer finishes after draining the buffer. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settlePending();
  }

  /** End the stream with an error the consumer will receive after the buffer drains. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    this.settlePending();
  }

  receive(): Promise<IteratorResult<CopyMessage>> {
    if (this.pending) {
      return Promise.reject(new Error("ProgressChannel supports a single consumer"));
    }

    const next = this.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve({ value: next, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<CopyMessage> {
    return {
      next: () => this.receive(),
    };
  }

  private dropOldestProgress(): void {
    const index = this.buffer.findIndex((message) => message.type === "progress");
    if (index !== -1) {
      this.buffer.splice(index, 1);
      this.droppedCount++;
    }
  }

  private settlePending(): void {
    if (!this.pending) return;
    const receiver = this.pending;
    this.pending = null;
    if (this.failure) {
      receiver.reject(this.failure.error);
    } else {
      receiver.resolve({ value: undefined, done: true });
    }
  }
}
