import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createCapturedStream } from "../context/testing.ts";
import { DestinationCopyError } from "../errors/index.ts";
import { resetColorDetection, setColorMode } from "../utils/ansi.ts";
import type { CopyMessage } from "../utils/copy/channel.ts";
import { CopyQueue } from "../utils/copy/queue.ts";
import type { CopyReport } from "../utils/copy/types.ts";
import { bottomBorder, contentLine, dividerLine, topBorder } from "./box.ts";
import { Renderer } from "./renderer.ts";
import { completionMessage, UserInterface } from "./interface.ts";

const HEADER = [topBorder(), contentLine("Deployment Copy"), dividerLine()];

function output(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

async function* stream(messages: CopyMessage[], failure?: Error): AsyncIterable<CopyMessage> {
  yield* messages;
  if (failure) throw failure;
}

const QUEUE = new CopyQueue("/work/test-dir", ["/mnt/a", "/mnt/b", "/mnt/c"]);

const MIXED_REPORT: CopyReport = {
  source: "/work/test-dir",
  totalBytes: 2048,
  outcomes: [
    { destination: "/mnt/a", status: "copied", bytesCopied: 2048 },
    {
      destination: "/mnt/b",
      status: "failed",
      error: new DestinationCopyError("/mnt/b", "permission denied"),
    },
    { destination: "/mnt/c", status: "skipped" },
  ],
};

const SUCCESS_REPORT: CopyReport = {
  source: "/work/test-dir",
  totalBytes: 2048,
  outcomes: QUEUE.destinations.map((destination) => ({
    destination,
    status: "copied" as const,
    bytesCopied: 2048,
  })),
};

describe("UserInterface", () => {
  beforeEach(() => {
    setColorMode("never");
  });

  afterEach(() => {
    resetColorDetection();
  });

  describe("transitions", () => {
    it("moves forward through the three states", () => {
      const ui = new UserInterface(new Renderer(createCapturedStream()));
      expect(ui.current).toBeNull();

      ui.withPreCopy(QUEUE);
      expect(ui.current?.kind).toBe("pre-copy");
      ui.withCopying(stream([]));
      expect(ui.current?.kind).toBe("copying");
      ui.withCompleted(QUEUE, SUCCESS_REPORT);
      expect(ui.current?.kind).toBe("completed");
    });

    it("rejects going back", () => {
      const ui = new UserInterface(new Renderer(createCapturedStream()));
      ui.withPreCopy(QUEUE).withCompleted(QUEUE, SUCCESS_REPORT);

      expect(() => ui.withCopying(stream([]))).toThrow('Cannot move from "completed" to "copying"');
    });

    it("rejects repeating a state", () => {
      const ui = new UserInterface(new Renderer(createCapturedStream()));
      ui.withPreCopy(QUEUE);

      expect(() => ui.withPreCopy(QUEUE)).toThrow('Cannot move from "pre-copy" to "pre-copy"');
    });

    it("renders nothing before the first state", async () => {
      const sink = createCapturedStream();
      await new UserInterface(new Renderer(sink)).render();
      expect(sink.text()).toBe("");
    });
  });

  describe("pre-copy", () => {
    it("draws the question and the queue box", async () => {
      const sink = createCapturedStream();
      await new UserInterface(new Renderer(sink)).withPreCopy(QUEUE).render();

      expect(sink.text()).toBe(
        output([
          ...HEADER,
          contentLine("Do you want to copy to these directories?"),
          contentLine("Press [Y] or [N] on your keyboard"),
          bottomBorder(),
          topBorder(12),
          contentLine("           │  /mnt/a"),
          contentLine(" test-dir ──> /mnt/b"),
          contentLine("           │  /mnt/c"),
          bottomBorder(12),
        ]),
      );
    });

    it("styles the key hints and queue when color is on", async () => {
      setColorMode("always");
      const sink = createCapturedStream();
      await new UserInterface(new Renderer(sink)).withPreCopy(QUEUE).render();

      expect(sink.text()).toContain("Press \x1b[1m\x1b[2m[Y]\x1b[0m or \x1b[1m\x1b[2m[N]\x1b[0m on your keyboard");
      expect(sink.text()).toContain(" \x1b[35mtest-dir\x1b[0m ──> \x1b[2m/mnt/b\x1b[0m");
    });
  });

  describe("copying", () => {
    it("redraws the progress line on a terminal", async () => {
      const sink = createCapturedStream(true);
      const ui = new UserInterface(new Renderer(sink));

      await ui
        .withPreCopy(QUEUE)
        .withCopying(
          stream([
            { type: "progress", destination: "/mnt/a", percentage: 50, bytesCopied: 1024 },
            { type: "progress", destination: "/mnt/a", percentage: 100, bytesCopied: 2048 },
          ]),
        )
        .render();

      const text = sink.text();
      expect(text).toContain(contentLine("Copying... (50%) [1kb copied] --> /mnt/a"));
      expect(text).toContain(contentLine("Copying... (100%) [2kb copied] --> /mnt/a"));
      expect(text.split(contentLine("Deployment Copy"))).toHaveLength(2);
    });

    it("shortens long destinations from the left", async () => {
      const sink = createCapturedStream(true);
      const ui = new UserInterface(new Renderer(sink));

      await ui
        .withCopying(
          stream([
            {
              type: "progress",
              destination: "/srv/deployments/release-2024/web",
              percentage: 7,
              bytesCopied: 1024 * 1024,
            },
          ]),
        )
        .render();

      expect(sink.text()).toContain(
        contentLine("Copying... (7%) [1mb copied] --> …release-2024/web"),
      );
    });

    it("lists failures under the progress line", async () => {
      const sink = createCapturedStream();
      const ui = new UserInterface(new Renderer(sink));

      await ui
        .withCopying(
          stream([
            { type: "progress", destination: "/mnt/a", percentage: 100, bytesCopied: 2048 },
            {
              type: "failed",
              destination: "/mnt/b",
              error: new DestinationCopyError("/mnt/b", "permission denied"),
            },
          ]),
        )
        .render();
      ui.abandon();

      expect(sink.text()).toBe(
        output([
          ...HEADER,
          contentLine("Copying... (100%) [2kb copied] --> /mnt/a"),
          contentLine("✗ /mnt/b: permission denied"),
          bottomBorder(),
        ]),
      );
    });

    it("closes the box and rethrows when the stream fails", async () => {
      const sink = createCapturedStream();
      const ui = new UserInterface(new Renderer(sink));

      const rendering = ui
        .withCopying(
          stream(
            [{ type: "progress", destination: "/mnt/a", percentage: 10, bytesCopied: 204 }],
            new Error("source vanished"),
          ),
        )
        .render();

      await expect(rendering).rejects.toThrow("source vanished");
      expect(sink.text()).toBe(
        output([...HEADER, contentLine("Copying... (10%) [204b copied] --> /mnt/a"), bottomBorder()]),
      );
    });
  });

  describe("completed", () => {
    it("replaces the progress line with the summary", async () => {
      const sink = createCapturedStream();
      const ui = new UserInterface(new Renderer(sink));

      await ui
        .withPreCopy(QUEUE)
        .withCopying(
          stream([{ type: "progress", destination: "/mnt/c", percentage: 100, bytesCopied: 2048 }]),
        )
        .render();
      await ui.withCompleted(QUEUE, SUCCESS_REPORT).render();

      expect(sink.text()).toBe(
        output([
          ...HEADER,
          contentLine("Finished copying (100%) [2kb copied]"),
          contentLine("✓ /mnt/a"),
          contentLine("✓ /mnt/b"),
          contentLine("✓ /mnt/c"),
          bottomBorder(),
          "[decopy] Files finished copying",
        ]),
      );
    });

    it("marks failed and skipped destinations", async () => {
      const sink = createCapturedStream();
      const ui = new UserInterface(new Renderer(sink));

      await ui.withCompleted(QUEUE, MIXED_REPORT).render();

      expect(sink.text()).toBe(
        output([
          ...HEADER,
          contentLine("Finished with errors (1/3 copied)"),
          contentLine("✓ /mnt/a"),
          contentLine("✗ /mnt/b: permission denied"),
          contentLine("- /mnt/c (skipped)"),
          bottomBorder(),
          "[decopy] 1 of 3 destinations failed",
        ]),
      );
    });

    it("keeps the destination when the failure reason is longer than the box", async () => {
      const sink = createCapturedStream();
      const reason = "EISDIR: illegal operation on a directory, open '/srv/releases/bad/index.html'";
      const report: CopyReport = {
        source: "/work/test-dir",
        totalBytes: 10,
        outcomes: [
          {
            destination: "/srv/releases/bad",
            status: "failed",
            error: new DestinationCopyError("/srv/releases/bad", reason),
          },
        ],
      };

      await new UserInterface(new Renderer(sink)).withCompleted(QUEUE, report).render();

      const row = "✗ /srv/releases/bad: EISDIR: illegal operation on…";
      expect(Array.from(row)).toHaveLength(50);
      expect(sink.text()).toContain(`${contentLine(row)}\n`);
    });

    it("shortens a long failed destination from the left", async () => {
      const sink = createCapturedStream();
      const destination = "/srv/releases/2024/website/production/current";
      const report: CopyReport = {
        source: "/work/test-dir",
        totalBytes: 10,
        outcomes: [
          {
            destination,
            status: "failed",
            error: new DestinationCopyError(destination, "permission denied"),
          },
        ],
      };

      await new UserInterface(new Renderer(sink)).withCompleted(QUEUE, report).render();

      expect(sink.text()).toContain(
        `${contentLine("✗ …/website/production/current: permission denied")}\n`,
      );
    });

    it("shows where an aborted destination stopped", async () => {
      const sink = createCapturedStream();
      const report: CopyReport = {
        source: "/work/test-dir",
        totalBytes: 4096,
        outcomes: [{ destination: "/mnt/a", status: "aborted", bytesCopied: 1536 }],
      };

      await new UserInterface(new Renderer(sink)).withCompleted(QUEUE, report).render();

      expect(sink.text()).toContain(contentLine("- /mnt/a (aborted at 1kb)"));
      expect(sink.text()).toContain("[decopy] Copy cancelled\n");
    });
  });
});

describe("completionMessage", () => {
  beforeEach(() => {
    setColorMode("never");
  });

  afterEach(() => {
    resetColorDetection();
  });

  it("uses the singular for one destination", () => {
    const report: CopyReport = {
      source: "/src",
      totalBytes: 1,
      outcomes: [
        { destination: "/a", status: "failed", error: new DestinationCopyError("/a", "path not found") },
      ],
    };
    expect(completionMessage(report)).toBe("1 of 1 destination failed");
  });

  it("reports success", () => {
    expect(completionMessage(SUCCESS_REPORT)).toBe("Files finished copying");
  });
});
