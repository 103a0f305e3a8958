import { consola } from "consola";
import { createRequestLogger, initLogger } from "evlog";
import type { RequestLogger } from "evlog";

export type OutputMode = "normal" | "verbose" | "debug" | "json" | "silent";

let currentMode: OutputMode = "normal";

/**
 * Initialize both consola and evlog for the given output mode.
 * Call once per CLI invocation, before the command talks to xenopsd.
 *
 * consola = human-facing CLI output
 * evlog   = machine-readable wide events (--json, --debug)
 */
export function initXenopsLogger(mode: OutputMode): void {
  currentMode = mode;

  switch (mode) {
    case "normal":
      consola.level = 3;
      initLogger({ enabled: false, env: { service: "xenops-cli" } });
      break;

    case "verbose":
      // -v: debug-level consola lines, no wide event
      consola.level = 4;
      initLogger({ enabled: false, env: { service: "xenops-cli" } });
      break;

    case "debug":
      consola.level = 5;
      consola.options.formatOptions = {
        ...consola.options.formatOptions,
        date: true,
      };
      initLogger({ enabled: true, pretty: true, stringify: false, env: { service: "xenops-cli" } });
      break;

    case "json":
      consola.level = -999;
      initLogger({ enabled: true, pretty: false, stringify: true, env: { service: "xenops-cli" } });
      break;

    case "silent":
      consola.level = -999;
      initLogger({ enabled: false, env: { service: "xenops-cli" } });
      break;
  }
}

export function getOutputMode(): OutputMode {
  return currentMode;
}

export function outputModeFor(options: { json: boolean; debug: boolean; verbose: boolean }): OutputMode {
  if (options.json) return "json";
  if (options.debug) return "debug";
  if (options.verbose) return "verbose";
  return "normal";
}

export interface CommandLogger {
  /** Add structured context to the wide event */
  set: RequestLogger["set"];
  /** Record an error in the wide event */
  error: RequestLogger["error"];
  /** Emit the wide event (only produces output in json/debug modes) */
  emit: () => void;
}

export function createCommandLogger(command: string): CommandLogger {
  const reqLog = createRequestLogger({ path: command });

  return {
    set: reqLog.set.bind(reqLog),
    error: reqLog.error.bind(reqLog),
    emit: () => {
      if (currentMode === "json" || currentMode === "debug") {
        reqLog.emit();
      }
    },
  };
}
