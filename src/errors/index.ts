export type {
  XenopsErrorCode,
  ValidationErrorCode,
  VmErrorCode,
  DaemonErrorCode,
} from "./codes.ts";

export { XenopsError } from "./base.ts";

export { ValidationError } from "./validation.ts";
export {
  missingArgumentError,
  invalidTimeoutError,
  fileNotFoundError,
  directoryGivenError,
  unknownCommandError,
} from "./validation.ts";

export { VmError, PowerStateConflictError } from "./vm.ts";
export {
  vmNotFoundError,
  ambiguousReferenceError,
  ambiguousVmReferenceError,
  powerStateConflictError,
  resourceConstraintError,
  invalidMetadataError,
} from "./vm.ts";

export { DaemonError } from "./daemon.ts";
export {
  daemonUnreachableError,
  connectTimeoutError,
  daemonProtocolError,
  daemonInternalError,
} from "./daemon.ts";

export { handleCommandError, diagnosticLine } from "./display.ts";
export { exitCodeFor, EXIT_SUCCESS, EXIT_FAILURE, EXIT_USAGE } from "./exit.ts";
