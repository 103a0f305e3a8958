import { defineCommand, showUsage, type CommandDef, type SubCommandsDef } from "citty";
import { clearInheritedGlobalArgs, inheritGlobalArgs } from "./config.ts";
import { globalArgs } from "./commands/args.ts";

export const subCommands = {
  list: () => import("./commands/list.ts").then((m) => m.default),
  ls: () => import("./commands/list.ts").then((m) => m.default),
  add: () => import("./commands/add.ts").then((m) => m.default),
  remove: () => import("./commands/remove.ts").then((m) => m.default),
  rm: () => import("./commands/remove.ts").then((m) => m.default),
  start: () => import("./commands/start.ts").then((m) => m.default),
  shutdown: () => import("./commands/shutdown.ts").then((m) => m.default),
  reboot: () => import("./commands/reboot.ts").then((m) => m.default),
  suspend: () => import("./commands/suspend.ts").then((m) => m.default),
} satisfies SubCommandsDef;

const VALUE_OPTIONS = new Set(
  Object.entries(globalArgs)
    .filter(([, def]) => def.type === "string")
    .map(([name]) => `--${name}`),
);

export function defineXenopsCli(version: string): CommandDef<typeof globalArgs> {
  return defineCommand({
    meta: {
      name: "xenops-cli",
      version,
      description: "Interact with the xenopsd VM management service",
    },
    args: globalArgs,
    subCommands,
    setup({ args }) {
      // citty hands the subcommand only the arguments after its name.
      inheritGlobalArgs(args);
    },
    async run({ args, cmd }) {
      // Runs after any subcommand as well; only act on a bare invocation.
      if (args._.length > 0) return;
      await showUsage(cmd);
    },
    cleanup() {
      clearInheritedGlobalArgs();
    },
  });
}

/**
 * Join global options that take a value with that value ("--socket P" becomes
 * "--socket=P"), so the value is never mistaken for the subcommand name.
 */
export function normalizeRawArgs(rawArgs: readonly string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    const value = rawArgs[i + 1];
    if (VALUE_OPTIONS.has(arg) && value !== undefined && !value.startsWith("-")) {
      result.push(`${arg}=${value}`);
      i++;
    } else {
      result.push(arg);
    }
  }
  return result;
}

/**
 * Return the subcommand name when it is not one we know. Mirrors citty's
 * rule that the first argument not starting with "-" names the subcommand.
 */
export function findUnknownCommand(rawArgs: readonly string[]): string | undefined {
  const name = normalizeRawArgs(rawArgs).find((arg) => !arg.startsWith("-"));
  if (name === undefined || Object.hasOwn(subCommands, name)) return undefined;
  return name;
}
