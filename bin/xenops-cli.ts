#!/usr/bin/env tsx

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { runMain } from "citty";
import { consola } from "consola";
import { defineXenopsCli, findUnknownCommand, normalizeRawArgs } from "../src/cli.ts";
import { EXIT_USAGE, diagnosticLine, unknownCommandError } from "../src/errors/index.ts";

function findPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const pkgPath = join(dir, "package.json");
    if (existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

const main = defineXenopsCli(findPackageVersion());
const rawArgs = normalizeRawArgs(process.argv.slice(2));

const unknown = findUnknownCommand(rawArgs);
if (unknown !== undefined && !rawArgs.includes("--help") && !rawArgs.includes("-h")) {
  consola.error(diagnosticLine(unknownCommandError(unknown)));
  process.exit(EXIT_USAGE);
}

await runMain(main, { rawArgs });
