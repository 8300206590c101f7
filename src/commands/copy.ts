import { loadDecopyConfig, resolveChannelCapacity, resolveChunkSize, resolvePreviewLimit } from "../utils/config.ts";
import { setColorMode } from "../utils/ansi.ts";
import { confirm } from "../utils/prompt.ts";
import { formatPreview, listSourceEntries } from "../utils/listing.ts";
import { log, type OutputOptions, verboseLog } from "../utils/output.ts";
import { CopyQueue, failedOutcomes } from "../utils/copy/queue.ts";
import { ProgressChannel } from "../utils/copy/channel.ts";
import { runCopyWorker } from "../utils/copy/worker.ts";
import { StandardStrategy } from "../utils/copy/strategies/index.ts";
import { Renderer } from "../ui/renderer.ts";
import { UserInterface } from "../ui/interface.ts";
import { UserCancelledError } from "../errors/index.ts";
import type { Signal } from "../runtime/types.ts";
import { type AppContext, getGlobalContext } from "../context/index.ts";

export interface CopyOptions extends OutputOptions {
  /** Skip the confirmation prompt */
  yes?: boolean;
}

const CANCEL_SIGNALS: readonly Signal[] = ["SIGINT", "SIGTERM"];

/**
 * Copy command - copies the contents of `source` into every destination
 *
 * Draws the queue summary, lists the first source entries, asks for
 * confirmation and then copies while redrawing the progress box.
 * Exits with 4 when any destination failed; a signal during the copy ends
 * it with UserCancelledError.
 */
export async function copyCommand(
  source: string | undefined,
  destinations: readonly string[],
  options: CopyOptions = {},
  ctx: AppContext = getGlobalContext(),
): Promise<void> {
  const { yes = false, verbose = false, quiet = false } = options;
  const outputOpts: OutputOptions = { verbose, quiet };
  const cwd = ctx.runtime.control.cwd();

  const config = await loadDecopyConfig(cwd, ctx);
  ctx.config = config;
  const colorMode = config?.ui?.color;
  if (colorMode !== undefined) {
    setColorMode(colorMode);
  }

  const queue = CopyQueue.fromPaths(source, destinations, cwd);
  verboseLog(`Source: ${queue.source}`, outputOpts);
  for (const destination of queue.destinations) {
    verboseLog(`Destination: ${destination}`, outputOpts);
  }

  const ui = new UserInterface(new Renderer(ctx.runtime.io.stdout));
  await ui.withPreCopy(queue).render();

  const entries = await listSourceEntries(queue.source, ctx);
  const noun = entries.length === 1 ? "entry" : "entries";
  log(`${queue.sourceName} contains ${entries.length} ${noun}`, outputOpts);
  if (!quiet) {
    for (const line of formatPreview(entries, resolvePreviewLimit(config))) {
      console.error(line);
    }
  }

  const skipConfirm = yes || config?.ui?.confirm === false;
  if (!skipConfirm) {
    const accepted = await confirm("Copy to these directories? (Y/n)", ctx);
    if (!accepted) {
      log("Nothing copied.", outputOpts);
      return;
    }
  }

  const controller = new AbortController();
  const onSignal = () => controller.abort();
  for (const signal of CANCEL_SIGNALS) {
    ctx.runtime.signals.addListener(signal, onSignal);
  }

  const channel = new ProgressChannel(resolveChannelCapacity(config, ctx));
  const strategy = new StandardStrategy({ chunkSize: resolveChunkSize(config) }, ctx);
  verboseLog(`Channel capacity: ${channel.capacity}`, outputOpts);

  try {
    ui.withCopying(channel);
    const display = ui.render().catch((error: unknown) => {
      // Nothing can be shown any more: stop copying too
      controller.abort();
      throw error;
    });
    const [report] = await Promise.all([
      runCopyWorker(queue, channel, { strategy, signal: controller.signal }, ctx),
      display,
    ]);
    verboseLog(`Progress updates coalesced: ${channel.dropped}`, outputOpts);

    await ui.withCompleted(queue, report).render();

    if (controller.signal.aborted) {
      throw new UserCancelledError("Copy cancelled");
    }
    const hasFailures = failedOutcomes(report).length > 0;
    if (hasFailures) {
      ctx.runtime.control.exit(4);
    }
  } finally {
    for (const signal of CANCEL_SIGNALS) {
      ctx.runtime.signals.removeListener(signal, onSignal);
    }
  }
}
