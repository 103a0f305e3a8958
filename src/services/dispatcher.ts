import { readFile } from "node:fs/promises";
import type { XenopsContext } from "../context.ts";
import type { XenopsClient } from "./xenopsd.ts";
import type { TransitionAction, TransitionRequest, TransitionResult, VmSummary } from "../lib/vm.ts";
import { formatVmReference, matchVmReference, type VmReference } from "../lib/vm-ref.ts";
import { directoryGivenError, fileNotFoundError, missingArgumentError } from "../errors/index.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AddResult {
  vmId: string;
  path: string;
}

export interface RemoveResult {
  vmId: string;
}

export interface StartOptions {
  /** Leave the VM in Paused instead of waiting for Running. */
  paused?: boolean;
}

export interface ShutdownOptions {
  /** Seconds to wait for a clean shutdown before xenopsd powers the VM off. */
  timeout?: number;
}

export interface SuspendOptions {
  /** Block device for the suspend image; xenopsd picks its own when absent. */
  blockDevice?: string;
}

// ---------------------------------------------------------------------------
// CommandDispatcher
// ---------------------------------------------------------------------------

/**
 * Turns parsed subcommand input into calls on a {@link XenopsClient}.
 *
 * Every power transition is exactly one request for exactly one resolved VM.
 * Graceful-then-forced fallback, waiting for Running, and power-state
 * legality all belong to xenopsd; nothing here retries or pre-checks state.
 */
export class CommandDispatcher {
  readonly client: XenopsClient;
  readonly hooks: XenopsContext["hooks"];
  readonly logger: XenopsContext["logger"];

  constructor(ctx: XenopsContext) {
    this.client = ctx.client;
    this.hooks = ctx.hooks;
    this.logger = ctx.logger;
  }

  async add(path: string | undefined): Promise<AddResult> {
    if (!path) throw missingArgumentError("FILE", "add");

    let metadata: string;
    try {
      metadata = await readFile(path, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === "ENOENT") throw fileNotFoundError("FILE", path);
      if (code === "EISDIR") throw directoryGivenError("FILE", path);
      throw error;
    }

    this.logger.debug(`Registering VM metadata from ${path} (${metadata.length} bytes)`);
    const vmId = await this.client.register(metadata);
    return { vmId, path };
  }

  list(): Promise<VmSummary[]> {
    return this.client.enumerate();
  }

  async remove(ref: VmReference | undefined): Promise<RemoveResult> {
    if (!ref) throw missingArgumentError("VM", "remove");
    const vmId = await this.resolve(ref);
    await this.client.unregister(vmId);
    return { vmId };
  }

  start(ref: VmReference | undefined, options: StartOptions = {}): Promise<TransitionResult> {
    return this.transition("start", ref, { paused: options.paused ?? false });
  }

  shutdown(ref: VmReference | undefined, options: ShutdownOptions = {}): Promise<TransitionResult> {
    return this.transition("shutdown", ref, { timeout: options.timeout });
  }

  reboot(ref: VmReference | undefined, options: ShutdownOptions = {}): Promise<TransitionResult> {
    return this.transition("reboot", ref, { timeout: options.timeout });
  }

  suspend(ref: VmReference | undefined, options: SuspendOptions = {}): Promise<TransitionResult> {
    return this.transition("suspend", ref, { blockDevice: options.blockDevice });
  }

  /**
   * Resolve a reference to the canonical VM id. Ids pass through untouched;
   * names cost one enumerate call and must match exactly one VM.
   */
  async resolve(ref: VmReference): Promise<string> {
    if (ref.kind === "id") return ref.id;

    const vms = await this.client.enumerate();
    const vm = matchVmReference(vms, ref.name);
    this.logger.debug(`Resolved "${formatVmReference(ref)}" to ${vm.id}`);
    return vm.id;
  }

  private async transition(
    action: TransitionAction,
    ref: VmReference | undefined,
    params: Omit<TransitionRequest, "vmId" | "action">,
  ): Promise<TransitionResult> {
    if (!ref) throw missingArgumentError("VM", action);

    const vmId = await this.resolve(ref);
    const request: TransitionRequest = { vmId, action };
    if (params.paused !== undefined) request.paused = params.paused;
    if (params.timeout !== undefined) request.timeout = params.timeout;
    if (params.blockDevice !== undefined) request.blockDevice = params.blockDevice;

    await this.hooks.callHook("vm:beforeTransition", request);
    return this.client.requestPowerTransition(request);
  }
}
