import type { TransitionAction, TransitionResult, VmSummary } from "./vm.ts";
import { table } from "./utils.ts";

const DONE: Record<TransitionAction, string> = {
  start: "Started",
  shutdown: "Shut down",
  reboot: "Rebooted",
  suspend: "Suspended",
};

/** One row per VM, in the order xenopsd returned them. */
export function renderVmTable(vms: readonly VmSummary[]): string {
  return table<VmSummary>({
    rows: vms,
    columns: {
      UUID: { value: (vm) => vm.id },
      NAME: { value: (vm) => vm.name },
      STATE: { value: (vm) => vm.powerState },
    },
  });
}

export function describeTransition(result: TransitionResult): string {
  const state = result.powerState ? ` (${result.powerState})` : "";
  return `${DONE[result.action]} VM ${result.vmId}${state}`;
}
