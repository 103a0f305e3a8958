// Package entry point — re-exports public API.

// Building blocks
export { createXenops } from "./context.ts";
export type { XenopsContext, XenopsOptions } from "./context.ts";
export type { XenopsHooks, RpcCall } from "./hooks.ts";
export type { XenopsLogger } from "./xenops-logger.ts";
export { createDefaultLogger, createSilentLogger } from "./xenops-logger.ts";

export { DEFAULT_SOCKET_PATH, resolveGlobalOptions } from "./config.ts";
export type { GlobalOptions, GlobalArgs } from "./config.ts";

export {
  XenopsdClient,
  xenopsdRequest,
  decodeDaemonError,
  DEFAULT_CONNECT_TIMEOUT_MS,
} from "./services/xenopsd.ts";
export type { XenopsClient, XenopsdClientOptions, XenopsdResponse } from "./services/xenopsd.ts";
export { CommandDispatcher } from "./services/dispatcher.ts";
export type {
  AddResult,
  RemoveResult,
  StartOptions,
  ShutdownOptions,
  SuspendOptions,
} from "./services/dispatcher.ts";

export { POWER_STATES, isPowerState } from "./lib/vm.ts";
export type {
  PowerState,
  VmSummary,
  TransitionAction,
  TransitionRequest,
  TransitionResult,
} from "./lib/vm.ts";
export { parseVmReference, formatVmReference, matchVmReference } from "./lib/vm-ref.ts";
export type { VmReference } from "./lib/vm-ref.ts";
export { parseTimeoutSeconds, table, toError } from "./lib/utils.ts";
export { renderVmTable, describeTransition } from "./lib/render.ts";

export {
  XenopsError,
  ValidationError,
  VmError,
  PowerStateConflictError,
  DaemonError,
  missingArgumentError,
  invalidTimeoutError,
  fileNotFoundError,
  directoryGivenError,
  unknownCommandError,
  vmNotFoundError,
  ambiguousReferenceError,
  ambiguousVmReferenceError,
  powerStateConflictError,
  resourceConstraintError,
  invalidMetadataError,
  daemonUnreachableError,
  connectTimeoutError,
  daemonProtocolError,
  daemonInternalError,
  handleCommandError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_USAGE,
} from "./errors/index.ts";
export type {
  XenopsErrorCode,
  ValidationErrorCode,
  VmErrorCode,
  DaemonErrorCode,
} from "./errors/index.ts";

export {
  initXenopsLogger,
  createCommandLogger,
  getOutputMode,
  outputModeFor,
} from "./lib/logger/index.ts";
export type { OutputMode, CommandLogger } from "./lib/logger/index.ts";

export { defineXenopsCli, findUnknownCommand, normalizeRawArgs, subCommands } from "./cli.ts";
