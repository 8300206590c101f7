import { type AppContext, getGlobalContext } from "../../context/index.ts";
import type { ProgressChannel } from "./channel.ts";
import type { CopyQueue, StartCopyOptions } from "./queue.ts";
import type { CopyReport } from "./types.ts";

/**
 * Run the queue and publish its progress on `channel`.
 *
 * The channel is closed after the "done" message, or failed with the fatal
 * error (e.g. an unreadable source), which is also rethrown.
 */
export async function runCopyWorker(
  queue: CopyQueue,
  channel: ProgressChannel,
  options: Pick<StartCopyOptions, "strategy" | "signal"> = {},
  ctx: AppContext = getGlobalContext(),
): Promise<CopyReport> {
  try {
    const report = await queue.startCopy(
      (progress) => {
        channel.send({ type: "progress", ...progress });
        return options.signal?.aborted ? "abort" : "continue";
      },
      (result) => channel.send({ type: "done", report: result }),
      {
        ...options,
        onDestinationFailed: (error) =>
          channel.send({ type: "failed", destination: error.destination, error }),
      },
      ctx,
    );
    channel.close();
    return report;
  } catch (error) {
    channel.fail(error);
    throw error;
  }
}
