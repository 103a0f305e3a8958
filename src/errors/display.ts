import { consola } from "consola";
import { EvlogError } from "evlog";
import type { CommandLogger } from "../lib/logger/index.ts";
import { getOutputMode } from "../lib/logger/index.ts";

/**
 * Record a failed command in its wide event and print the diagnostic.
 *
 * The diagnostic itself is always a single line. `why` and `fix` hints are
 * printed as follow-up debug lines, so they only show with -v or --debug.
 */
export function handleCommandError(error: unknown, cmdLog: CommandLogger): void {
  cmdLog.error(error instanceof Error ? error : String(error));
  cmdLog.emit();

  // In JSON mode, cmdLog.emit() already produced structured error output.
  if (getOutputMode() === "json") {
    return;
  }

  consola.error(diagnosticLine(error));

  if (error instanceof EvlogError) {
    if (error.why) consola.debug(`Why: ${error.why}`);
    if (error.fix) consola.debug(`Fix: ${error.fix}`);
  }
}

export function diagnosticLine(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.replace(/\s*\n\s*/g, " ").trim();
}
