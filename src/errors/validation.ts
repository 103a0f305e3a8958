import type { ErrorOptions } from "evlog";
import type { ValidationErrorCode } from "./codes.ts";
import { XenopsError } from "./base.ts";

export class ValidationError extends XenopsError {
  readonly argument?: string;

  constructor(code: ValidationErrorCode, options: ErrorOptions & { argument?: string }) {
    super(code, options);
    this.name = "ValidationError";
    this.argument = options.argument;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.argument !== undefined && { argument: this.argument }) };
  }
}

export const missingArgumentError = (argument: string, command: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_MISSING_ARGUMENT", {
    argument,
    message: `Missing required argument ${argument}`,
    fix: `Run 'xenops-cli ${command} --help' for usage.`,
  });

export const invalidTimeoutError = (value: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_TIMEOUT", {
    argument: "timeout",
    message: `Invalid --timeout: "${value}". Expected a non-negative number of seconds (e.g. 30, 2.5, 1m30s).`,
  });

export const fileNotFoundError = (argument: string, path: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_FILE_NOT_FOUND", {
    argument,
    message: `${argument}: no such file "${path}"`,
  });

export const directoryGivenError = (argument: string, path: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_NOT_A_FILE", {
    argument,
    message: `${argument}: "${path}" is a directory, not a file`,
  });

export const unknownCommandError = (command: string): ValidationError =>
  new ValidationError("ERR_VALIDATION_UNKNOWN_COMMAND", {
    message: `Unknown command "${command}"`,
    fix: "Run 'xenops-cli --help' to see available commands.",
  });
