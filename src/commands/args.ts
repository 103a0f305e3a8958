import { DEFAULT_SOCKET_PATH } from "../config.ts";

/** Options accepted by every subcommand. */
export const globalArgs = {
  socket: {
    type: "string",
    valueHint: "path",
    description: `Path to the xenopsd Unix domain socket (default: ${DEFAULT_SOCKET_PATH})`,
  },
  debug: {
    type: "boolean",
    default: false,
    description: "Give only debug output",
  },
  verbose: {
    type: "boolean",
    alias: "v",
    default: false,
    description: "Give verbose output",
  },
  json: {
    type: "boolean",
    default: false,
    description: "Output structured JSON (one event per command)",
  },
} as const;

export function vmArg(verb: string) {
  return {
    type: "positional",
    required: false,
    valueHint: "VM",
    description: `The name or UUID of the VM to be ${verb}`,
  } as const;
}

export const timeoutArgs = {
  timeout: {
    type: "string",
    valueHint: "seconds",
    description: "Time to wait for the VM to shut itself down cleanly before it is powered off",
  },
} as const;
