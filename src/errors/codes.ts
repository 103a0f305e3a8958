export type ValidationErrorCode =
  | "ERR_VALIDATION_MISSING_ARGUMENT"
  | "ERR_VALIDATION_TIMEOUT"
  | "ERR_VALIDATION_FILE_NOT_FOUND"
  | "ERR_VALIDATION_NOT_A_FILE"
  | "ERR_VALIDATION_UNKNOWN_COMMAND";

export type VmErrorCode =
  | "ERR_VM_NOT_FOUND"
  | "ERR_VM_AMBIGUOUS_REFERENCE"
  | "ERR_VM_POWER_STATE_CONFLICT"
  | "ERR_VM_RESOURCE_CONSTRAINT"
  | "ERR_VM_INVALID_METADATA";

export type DaemonErrorCode =
  | "ERR_DAEMON_UNREACHABLE"
  | "ERR_DAEMON_PROTOCOL"
  | "ERR_DAEMON_INTERNAL";

export type XenopsErrorCode = ValidationErrorCode | VmErrorCode | DaemonErrorCode;
