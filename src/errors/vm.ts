import type { ErrorOptions } from "evlog";
import type { VmErrorCode } from "./codes.ts";
import { XenopsError } from "./base.ts";

export class VmError extends XenopsError {
  readonly vm?: string;

  constructor(code: VmErrorCode, options: ErrorOptions & { vm?: string }) {
    super(code, options);
    this.name = "VmError";
    this.vm = options.vm;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.vm !== undefined && { vm: this.vm }) };
  }
}

export class PowerStateConflictError extends VmError {
  readonly currentState?: string;

  constructor(options: ErrorOptions & { vm?: string; currentState?: string }) {
    super("ERR_VM_POWER_STATE_CONFLICT", options);
    this.name = "PowerStateConflictError";
    this.currentState = options.currentState;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.currentState !== undefined && { currentState: this.currentState }),
    };
  }
}

export const vmNotFoundError = (vm: string, reason?: string): VmError =>
  new VmError("ERR_VM_NOT_FOUND", {
    vm,
    message: reason ?? `VM not found: ${vm}`,
    fix: "Run 'xenops-cli list' to see registered VMs.",
  });

export const ambiguousReferenceError = (vm: string, reason: string): VmError =>
  new VmError("ERR_VM_AMBIGUOUS_REFERENCE", {
    vm,
    message: reason,
    fix: "Use the VM's UUID instead of its name.",
  });

export const ambiguousVmReferenceError = (vm: string, candidates: readonly string[]): VmError =>
  ambiguousReferenceError(
    vm,
    `VM reference "${vm}" matches ${candidates.length} VMs: ${candidates.join(", ")}`,
  );

export const powerStateConflictError = (
  vm: string,
  reason: string,
  currentState?: string,
): PowerStateConflictError => new PowerStateConflictError({ vm, message: reason, currentState });

export const resourceConstraintError = (vm: string, reason: string, resource?: string): VmError =>
  new VmError("ERR_VM_RESOURCE_CONSTRAINT", {
    vm,
    message: reason,
    ...(resource !== undefined && { why: `Insufficient ${resource} on the host.` }),
  });

export const invalidMetadataError = (reason: string): VmError =>
  new VmError("ERR_VM_INVALID_METADATA", {
    message: reason,
  });
