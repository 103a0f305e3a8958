import { resolveGlobalOptions, type GlobalArgs, type GlobalOptions } from "../config.ts";
import {
  createCommandLogger,
  initXenopsLogger,
  outputModeFor,
  type CommandLogger,
} from "../lib/logger/index.ts";
import { exitCodeFor, handleCommandError } from "../errors/index.ts";

export interface CommandSetup {
  options: GlobalOptions;
  cmdLog: CommandLogger;
}

export function setupCommand(command: string, args: GlobalArgs): CommandSetup {
  const options = resolveGlobalOptions(args);
  initXenopsLogger(outputModeFor(options));
  const cmdLog = createCommandLogger(command);
  cmdLog.set({ socketPath: options.socketPath });
  return { options, cmdLog };
}

export function failCommand(error: unknown, cmdLog: CommandLogger): void {
  handleCommandError(error, cmdLog);
  process.exitCode = exitCodeFor(error);
}
