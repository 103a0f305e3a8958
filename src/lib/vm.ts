export const POWER_STATES = ["Halted", "Running", "Paused", "Suspended"] as const;

/** Power state as reported by xenopsd. Only ever decoded, never driven locally. */
export type PowerState = (typeof POWER_STATES)[number];

export interface VmSummary {
  id: string;
  name: string;
  powerState: PowerState;
}

export type TransitionAction = "start" | "shutdown" | "reboot" | "suspend";

export interface TransitionRequest {
  vmId: string;
  action: TransitionAction;
  /** Seconds to wait for a clean shutdown before the daemon forces power-off. */
  timeout?: number;
  paused?: boolean;
  blockDevice?: string;
}

export interface TransitionResult {
  vmId: string;
  action: TransitionAction;
  powerState?: PowerState;
}

export function isPowerState(value: unknown): value is PowerState {
  return typeof value === "string" && POWER_STATES.some((state) => state === value);
}
