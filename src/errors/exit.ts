import { ValidationError } from "./validation.ts";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Argument errors exit with 2; everything the daemon or transport reports exits with 1. */
export function exitCodeFor(error: unknown): number {
  return error instanceof ValidationError ? EXIT_USAGE : EXIT_FAILURE;
}
