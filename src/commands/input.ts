import { existsSync, statSync } from "node:fs";
import { parseTimeoutSeconds } from "../lib/utils.ts";
import { directoryGivenError, fileNotFoundError } from "../errors/index.ts";

/** Absent stays absent; present must be a valid timeout. */
export function parseTimeoutArg(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseTimeoutSeconds(value);
}

/**
 * Check that an optional path names an existing file (or block device).
 * Absent is passed through for the dispatcher to judge.
 */
export function parseExistingFileArg(argument: string, value: string | undefined): string | undefined {
  if (value === undefined || value === "") return undefined;
  if (!existsSync(value)) throw fileNotFoundError(argument, value);
  if (statSync(value).isDirectory()) throw directoryGivenError(argument, value);
  return value;
}
