import { EvlogError, type ErrorOptions } from "evlog";
import type { XenopsErrorCode } from "./codes.ts";

export class XenopsError extends EvlogError {
  readonly code: XenopsErrorCode;

  constructor(code: XenopsErrorCode, options: ErrorOptions) {
    super(options);
    this.name = "XenopsError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code };
  }
}
