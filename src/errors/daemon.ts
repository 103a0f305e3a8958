import type { ErrorOptions } from "evlog";
import type { DaemonErrorCode } from "./codes.ts";
import { XenopsError } from "./base.ts";

export class DaemonError extends XenopsError {
  readonly socketPath?: string;
  readonly httpStatus?: number;

  constructor(
    code: DaemonErrorCode,
    options: ErrorOptions & { socketPath?: string; httpStatus?: number },
  ) {
    super(code, options);
    this.name = "DaemonError";
    this.socketPath = options.socketPath;
    this.httpStatus = options.httpStatus;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.socketPath !== undefined && { socketPath: this.socketPath }),
      ...(this.httpStatus !== undefined && { httpStatus: this.httpStatus }),
    };
  }
}

export const daemonUnreachableError = (socketPath: string, reason: string): DaemonError =>
  new DaemonError("ERR_DAEMON_UNREACHABLE", {
    socketPath,
    message: `Cannot reach xenopsd at ${socketPath}`,
    why: reason,
    fix: "Check that xenopsd is running, or pass its socket with --socket <path>.",
  });

export const connectTimeoutError = (socketPath: string, timeoutMs: number): DaemonError =>
  daemonUnreachableError(socketPath, `Connection not established after ${timeoutMs}ms`);

export const daemonProtocolError = (method: string, path: string, detail: string): DaemonError =>
  new DaemonError("ERR_DAEMON_PROTOCOL", {
    message: `Unexpected response to ${method} ${path}: ${detail}`,
  });

export const daemonInternalError = (
  method: string,
  path: string,
  httpStatus: number,
  body: string,
): DaemonError =>
  new DaemonError("ERR_DAEMON_INTERNAL", {
    httpStatus,
    message: `${method} ${path} failed (${httpStatus}): ${body}`,
  });
