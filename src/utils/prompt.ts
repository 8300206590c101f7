/**
 * Interactive prompt utilities
 */

import { type AppContext, getGlobalContext } from "../context/index.ts";

/**
 * Read a single line of input from the user
 */
async function readLine(ctx: AppContext): Promise<string> {
  const buf = new Uint8Array(1024);
  const n = await ctx.runtime.io.stdin.read(buf);
  const isInputReceived = n !== null;
  if (isInputReceived) {
    return new TextDecoder().decode(buf.subarray(0, n)).trim();
  }
  return "";
}

/**
 * Display a Y/n confirmation prompt
 * @param message Confirmation message
 * @returns true if user selects Yes, false otherwise
 */
export async function confirm(
  message: string,
  ctx: AppContext = getGlobalContext(),
): Promise<boolean> {
  const isInteractive = ctx.runtime.io.stdin.isTerminal();

  // In non-interactive environments (CI, scripts), automatically return false
  if (!isInteractive) {
    console.error(
      "Cannot prompt for confirmation in non-interactive mode. Use --yes to skip.",
    );
    return false;
  }

  while (true) {
    console.error(`${message}`);
    const input = await readLine(ctx);

    const isYes = input === "Y" || input === "y" || input === "";
    if (isYes) {
      return true;
    }

    const isNo = input === "N" || input === "n";
    if (isNo) {
      return false;
    }

    console.error("Invalid input. Please enter Y/y/n/N.");
  }
}
