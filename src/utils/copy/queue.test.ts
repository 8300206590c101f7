import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createAppContext, type AppContext } from "../../context/index.ts";
import { nodeRuntime } from "../../runtime/node/index.ts";
import {
  ArgumentError,
  DestinationCopyError,
  RenderIOError,
  SourceUnreadableError,
} from "../../errors/index.ts";
import { CopyQueue, failedOutcomes, isCompleteSuccess, succeededDestinations } from "./queue.ts";
import type { CopyProgress, CopyReport, CopyStrategy } from "./types.ts";

describe("CopyQueue.fromPaths", () => {
  it("resolves paths against the working directory", () => {
    const queue = CopyQueue.fromPaths("src", ["../out", "/srv/web"], "/work/app");
    expect(queue.source).toBe("/work/app/src");
    expect(queue.destinations).toEqual(["/work/out", "/srv/web"]);
  });

  it("requires a source", () => {
    expect(() => CopyQueue.fromPaths(undefined, ["/out"], "/work")).toThrow(ArgumentError);
    expect(() => CopyQueue.fromPaths("  ", ["/out"], "/work")).toThrow("Missing source directory");
  });

  it("requires at least one destination", () => {
    expect(() => CopyQueue.fromPaths("src", [], "/work")).toThrow(
      "At least one destination directory is required",
    );
  });

  it("rejects the source itself as a destination", () => {
    expect(() => CopyQueue.fromPaths("src", ["./src"], "/work")).toThrow(
      'Destination "./src" is inside the source directory',
    );
  });

  it("rejects destinations inside the source", () => {
    expect(() => CopyQueue.fromPaths("src", ["src/out"], "/work")).toThrow(ArgumentError);
  });

  it("allows siblings that share a name prefix", () => {
    const queue = CopyQueue.fromPaths("src", ["src-copy"], "/work");
    expect(queue.destinations).toEqual(["/work/src-copy"]);
  });

  it("rejects repeated destinations", () => {
    expect(() => CopyQueue.fromPaths("src", ["out", "./out/"], "/work")).toThrow(
      'Destination "./out/" is listed more than once',
    );
  });
});

describe("CopyQueue", () => {
  it("is immutable", () => {
    const queue = new CopyQueue("/src", ["/a"]);
    expect(Object.isFrozen(queue)).toBe(true);
    expect(Object.isFrozen(queue.destinations)).toBe(true);
  });

  it("builds a new queue for new destinations", () => {
    const queue = new CopyQueue("/src", ["/a"]);
    const next = queue.withDestinations(["/b", "/c"]);
    expect(next).not.toBe(queue);
    expect(next.source).toBe("/src");
    expect(next.destinations).toEqual(["/b", "/c"]);
    expect(queue.destinations).toEqual(["/a"]);
  });

  it("names the source by its last segment", () => {
    expect(new CopyQueue("/work/test-dir", []).sourceName).toBe("test-dir");
    expect(new CopyQueue("/", []).sourceName).toBe("/");
  });
});

describe("CopyQueue.startCopy", () => {
  let root: string;
  let source: string;
  let ctx: AppContext;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "decopy-queue-"));
    source = join(root, "site");
    await mkdir(join(source, "nested"), { recursive: true });
    await writeFile(join(source, "index.html"), "hello");
    await writeFile(join(source, "nested", "app.js"), "abc");
    ctx = createAppContext(nodeRuntime);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("copies the source contents into every destination", async () => {
    const first = join(root, "out-1");
    const second = join(root, "out-2");
    const queue = new CopyQueue(source, [first, second]);
    const onComplete = vi.fn();

    const report = await queue.startCopy(() => "continue", onComplete, {}, ctx);

    for (const destination of [first, second]) {
      expect(await readFile(join(destination, "index.html"), "utf-8")).toBe("hello");
      expect(await readFile(join(destination, "nested", "app.js"), "utf-8")).toBe("abc");
    }
    expect(report).toEqual({
      source,
      totalBytes: 8,
      outcomes: [
        { destination: first, status: "copied", bytesCopied: 8 },
        { destination: second, status: "copied", bytesCopied: 8 },
      ],
    });
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onComplete).toHaveBeenCalledWith(report);
    expect(isCompleteSuccess(report)).toBe(true);
    expect(succeededDestinations(report)).toEqual([first, second]);
  });

  it("reports monotonic progress that restarts per destination", async () => {
    const first = join(root, "out-1");
    const second = join(root, "out-2");
    const seen: CopyProgress[] = [];

    await new CopyQueue(source, [first, second]).startCopy(
      (progress) => {
        seen.push(progress);
      },
      () => {},
      {},
      ctx,
    );

    for (const destination of [first, second]) {
      const bytes = seen.filter((p) => p.destination === destination).map((p) => p.bytesCopied);
      expect(bytes).toEqual([...bytes].sort((a, b) => a - b));
      expect(bytes[bytes.length - 1]).toBe(8);
    }
    expect(seen[seen.length - 1]).toEqual({ destination: second, bytesCopied: 8, percentage: 100 });
    const firstOfSecond = seen.findIndex((p) => p.destination === second);
    expect(seen.slice(0, firstOfSecond).every((p) => p.destination === first)).toBe(true);
  });

  it("overwrites existing files", async () => {
    const destination = join(root, "out");
    await mkdir(destination);
    await writeFile(join(destination, "index.html"), "stale content");

    await new CopyQueue(source, [destination]).startCopy(() => {}, () => {}, {}, ctx);

    expect(await readFile(join(destination, "index.html"), "utf-8")).toBe("hello");
  });

  it("records a failing destination and continues with the next", async () => {
    const blocker = join(root, "blocker");
    await writeFile(blocker, "not a directory");
    const good = join(root, "good");
    const onDestinationFailed = vi.fn();

    const report = await new CopyQueue(source, [blocker, good]).startCopy(
      () => {},
      () => {},
      { onDestinationFailed },
      ctx,
    );

    const failures = failedOutcomes(report);
    expect(failures).toHaveLength(1);
    expect(failures[0].destination).toBe(blocker);
    expect(failures[0].error).toBeInstanceOf(DestinationCopyError);
    expect(failures[0].error.reason).toBe("not a directory");
    expect(onDestinationFailed).toHaveBeenCalledWith(failures[0].error);
    expect(report.outcomes[1]).toEqual({ destination: good, status: "copied", bytesCopied: 8 });
    expect(isCompleteSuccess(report)).toBe(false);
  });

  it("rejects before touching destinations when the source is unreadable", async () => {
    const destination = join(root, "out");
    const onProgress = vi.fn();
    const onComplete = vi.fn();
    const queue = new CopyQueue(join(root, "missing"), [destination]);

    await expect(queue.startCopy(onProgress, onComplete, {}, ctx)).rejects.toThrow(
      SourceUnreadableError,
    );
    expect(onProgress).not.toHaveBeenCalled();
    expect(onComplete).not.toHaveBeenCalled();
    await expect(readFile(join(destination, "index.html"))).rejects.toThrow();
  });

  it("stops a destination when the callback answers abort", async () => {
    const first = join(root, "out-1");
    const second = join(root, "out-2");

    const report = await new CopyQueue(source, [first, second]).startCopy(
      (progress) => (progress.destination === first ? "abort" : "continue"),
      () => {},
      {},
      ctx,
    );

    expect(report.outcomes[0].status).toBe("aborted");
    expect(report.outcomes[1]).toEqual({ destination: second, status: "copied", bytesCopied: 8 });
  });

  it("skips the remaining destinations once the signal is aborted", async () => {
    const first = join(root, "out-1");
    const second = join(root, "out-2");
    const controller = new AbortController();
    const onComplete = vi.fn();

    const report = await new CopyQueue(source, [first, second]).startCopy(
      () => controller.abort(),
      onComplete,
      { signal: controller.signal },
      ctx,
    );

    expect(report.outcomes[0]).toMatchObject({ destination: first, status: "aborted" });
    expect(report.outcomes[1]).toEqual({ destination: second, status: "skipped" });
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("skips everything when cancelled before starting", async () => {
    const controller = new AbortController();
    controller.abort();
    const destination = join(root, "out");

    const report = await new CopyQueue(source, [destination]).startCopy(
      () => {},
      () => {},
      { signal: controller.signal },
      ctx,
    );

    expect(report.outcomes).toEqual([{ destination, status: "skipped" }]);
  });

  it("ends the run on a fatal error from the progress callback", async () => {
    const onComplete = vi.fn();
    const queue = new CopyQueue(source, [join(root, "out-1"), join(root, "out-2")]);

    await expect(
      queue.startCopy(
        () => {
          throw new RenderIOError(new Error("output stream is closed"));
        },
        onComplete,
        {},
        ctx,
      ),
    ).rejects.toThrow(RenderIOError);
    expect(onComplete).not.toHaveBeenCalled();
  });

  it("uses the given strategy", async () => {
    const calls: Array<[string, string]> = [];
    const strategy: CopyStrategy = {
      name: "recording",
      copyDirectoryContents: (src, dest, options) => {
        calls.push([src, dest]);
        options.onBytes(4);
        return Promise.resolve(4);
      },
    };
    const seen: CopyProgress[] = [];
    let completed: CopyReport | undefined;

    await new CopyQueue(source, ["/srv/a"]).startCopy(
      (progress) => {
        seen.push(progress);
      },
      (report) => {
        completed = report;
      },
      { strategy },
      ctx,
    );

    expect(calls).toEqual([[source, "/srv/a"]]);
    expect(seen).toEqual([
      { destination: "/srv/a", bytesCopied: 4, percentage: 50 },
      { destination: "/srv/a", bytesCopied: 4, percentage: 50 },
    ]);
    expect(completed?.outcomes).toEqual([{ destination: "/srv/a", status: "copied", bytesCopied: 4 }]);
  });

  it("reports 100% for an empty source", async () => {
    const empty = join(root, "empty");
    await mkdir(empty);
    const destination = join(root, "out");
    const seen: CopyProgress[] = [];

    const report = await new CopyQueue(empty, [destination]).startCopy(
      (progress) => {
        seen.push(progress);
      },
      () => {},
      {},
      ctx,
    );

    expect(report.totalBytes).toBe(0);
    expect(seen).toEqual([{ destination, bytesCopied: 0, percentage: 100 }]);
  });
});
