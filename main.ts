#!/usr/bin/env node
import minimist from "minimist";
import { copyCommand } from "./src/commands/copy.ts";
import { createAppContext, setGlobalContext } from "./src/context/index.ts";
import { withErrorHandler } from "./src/errors/handler.ts";
import { initRuntime } from "./src/runtime/index.ts";
import { errorLog } from "./src/utils/output.ts";
import { BUILD_INFO } from "./src/version.ts";

const HELP_TEXT = `decopy - deployment copy

Copies the contents of a source directory into one or more destination
directories, showing progress as it goes.

Usage:
  decopy <source> <destination...>  Copy source contents into each destination

Options:
  -y, --yes      Copy without asking for confirmation
  --verbose      Show detailed output
  --quiet        Only show the copy box, warnings and errors
  -h, --help     Show this help message
  -v, --version  Show version information

Configuration (.decopy.toml in the current directory):
  [copy]
  channel_capacity = 16   Progress updates buffered for the display
  chunk_size = 65536      Bytes read per chunk
  [ui]
  color = "auto"          auto | always | never
  preview_limit = 5       Source entries listed before copying
  confirm = true          false behaves like --yes

Environment:
  DECOPY_CHANNEL_CAPACITY  Overrides copy.channel_capacity

Examples:
  decopy ./build /srv/web-1 /srv/web-2
  decopy dist ../staging --yes
`;

interface CliArgs {
  help: boolean;
  version: boolean;
  yes: boolean;
  verbose: boolean;
  quiet: boolean;
}

async function main(): Promise<void> {
  const runtime = await initRuntime();
  const ctx = createAppContext(runtime);
  setGlobalContext(ctx);

  const args = minimist<CliArgs>([...runtime.control.args], {
    boolean: ["help", "version", "yes", "verbose", "quiet"],
    string: ["_"],
    alias: { h: "help", v: "version", y: "yes" },
  });

  if (args.version) {
    console.log(`decopy ${BUILD_INFO.version}`);
    console.log(`Platform: ${BUILD_INFO.platform}-${BUILD_INFO.arch} (${BUILD_INFO.runtime})`);
    return;
  }

  const showHelp = args.help || args._.length === 0;
  if (showHelp) {
    console.log(HELP_TEXT);
    return;
  }

  const [source, ...destinations] = args._.map(String);
  const outputOpts = { verbose: args.verbose, quiet: args.quiet };

  await withErrorHandler(copyCommand, { verbose: args.verbose }, ctx)(
    source,
    destinations,
    { ...outputOpts, yes: args.yes },
    ctx,
  );
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  errorLog(`Error: ${message}`);
  process.exit(1);
});
