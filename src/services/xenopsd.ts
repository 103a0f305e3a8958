import { request } from "node:http";
import type { Hookable } from "hookable";
import type { XenopsHooks } from "../hooks.ts";
import {
  isPowerState,
  type PowerState,
  type TransitionRequest,
  type TransitionResult,
  type VmSummary,
} from "../lib/vm.ts";
import { toError } from "../lib/utils.ts";
import {
  ambiguousReferenceError,
  DaemonError,
  XenopsError,
  connectTimeoutError,
  daemonInternalError,
  daemonProtocolError,
  daemonUnreachableError,
  invalidMetadataError,
  powerStateConflictError,
  resourceConstraintError,
  vmNotFoundError,
} from "../errors/index.ts";

export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;

/** One operation per xenopsd capability. */
export interface XenopsClient {
  register(metadata: string): Promise<string>;
  enumerate(): Promise<VmSummary[]>;
  unregister(vmId: string): Promise<void>;
  requestPowerTransition(request: TransitionRequest): Promise<TransitionResult>;
}

// ---------------------------------------------------------------------------
// Low-level transport
// ---------------------------------------------------------------------------

export interface XenopsdResponse {
  statusCode: number;
  body: string;
}

/**
 * Send one HTTP request to xenopsd over its Unix socket.
 *
 * Only the connection attempt is bounded by `connectTimeoutMs`; once
 * connected the call waits for the daemon's reply. Every transport failure
 * rejects with ERR_DAEMON_UNREACHABLE.
 */
export function xenopsdRequest(
  socketPath: string,
  method: string,
  path: string,
  body?: unknown,
  connectTimeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS,
): Promise<XenopsdResponse> {
  return new Promise((resolve, reject) => {
    const data = body === undefined ? undefined : JSON.stringify(body);
    let connectTimer: NodeJS.Timeout | undefined;

    const req = request(
      {
        socketPath,
        method,
        path,
        agent: false,
        headers: {
          Accept: "application/json",
          ...(data
            ? { "Content-Type": "application/json", "Content-Length": String(Buffer.byteLength(data)) }
            : {}),
        },
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", (error) => reject(daemonUnreachableError(socketPath, error.message)));
        res.on("end", () => {
          resolve({
            statusCode: res.statusCode || 0,
            body: Buffer.concat(chunks).toString(),
          });
        });
      },
    );

    req.on("socket", (socket) => {
      if (!socket.connecting) return;
      connectTimer = setTimeout(() => {
        req.destroy(connectTimeoutError(socketPath, connectTimeoutMs));
      }, connectTimeoutMs);
      socket.once("connect", () => clearTimeout(connectTimer));
    });

    req.on("error", (error) => {
      clearTimeout(connectTimer);
      reject(error instanceof DaemonError ? error : daemonUnreachableError(socketPath, error.message));
    });

    if (data) req.write(data);
    req.end();
  });
}

// ---------------------------------------------------------------------------
// Response decoding
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Map a xenopsd error reply to a typed error. The daemon's message is kept
 * verbatim; unknown error shapes fall back to ERR_DAEMON_INTERNAL.
 */
export function decodeDaemonError(
  method: string,
  path: string,
  res: XenopsdResponse,
  vm: string | undefined,
): XenopsError {
  let parsed: unknown;
  try {
    parsed = JSON.parse(res.body);
  } catch {
    return daemonInternalError(method, path, res.statusCode, res.body);
  }

  const detail = isRecord(parsed) ? parsed.error : undefined;
  if (!isRecord(detail) || typeof detail.kind !== "string" || typeof detail.message !== "string") {
    return daemonInternalError(method, path, res.statusCode, res.body);
  }

  const target = vm ?? path;
  switch (detail.kind) {
    case "not_found":
      return vmNotFoundError(target, detail.message);
    case "ambiguous_reference":
      return ambiguousReferenceError(target, detail.message);
    case "bad_power_state":
      return powerStateConflictError(target, detail.message, optionalString(detail.current));
    case "resource_constraint":
      return resourceConstraintError(target, detail.message, optionalString(detail.resource));
    case "invalid_metadata":
      return invalidMetadataError(detail.message);
    default:
      return daemonInternalError(method, path, res.statusCode, detail.message);
  }
}

function decodeVmSummaries(value: unknown): VmSummary[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const vms: VmSummary[] = [];
  for (const entry of value) {
    if (
      !isRecord(entry) ||
      typeof entry.id !== "string" ||
      typeof entry.name !== "string" ||
      !isPowerState(entry.power_state)
    ) {
      return undefined;
    }
    vms.push({ id: entry.id, name: entry.name, powerState: entry.power_state });
  }
  return vms;
}

// ---------------------------------------------------------------------------
// XenopsdClient
// ---------------------------------------------------------------------------

export interface XenopsdClientOptions {
  connectTimeoutMs?: number;
  hooks?: Hookable<XenopsHooks>;
}

export class XenopsdClient implements XenopsClient {
  constructor(
    readonly socketPath: string,
    private readonly options: XenopsdClientOptions = {},
  ) {}

  async register(metadata: string): Promise<string> {
    const body = await this.call("POST", "/vm", undefined, { metadata });
    if (!isRecord(body) || typeof body.id !== "string") {
      throw daemonProtocolError("POST", "/vm", "expected a VM id");
    }
    return body.id;
  }

  async enumerate(): Promise<VmSummary[]> {
    const body = await this.call("GET", "/vm");
    const vms = decodeVmSummaries(body);
    if (!vms) {
      throw daemonProtocolError("GET", "/vm", "expected a list of VM summaries");
    }
    return vms;
  }

  async unregister(vmId: string): Promise<void> {
    await this.call("DELETE", `/vm/${encodeURIComponent(vmId)}`, vmId);
  }

  async requestPowerTransition(transition: TransitionRequest): Promise<TransitionResult> {
    const path = `/vm/${encodeURIComponent(transition.vmId)}/${transition.action}`;
    const body = await this.call("POST", path, transition.vmId, {
      ...(transition.paused !== undefined && { paused: transition.paused }),
      ...(transition.timeout !== undefined && { timeout: transition.timeout }),
      ...(transition.blockDevice !== undefined && { block_device: transition.blockDevice }),
    });

    let powerState: PowerState | undefined;
    if (isRecord(body) && body.power_state !== undefined) {
      if (!isPowerState(body.power_state)) {
        throw daemonProtocolError("POST", path, `unknown power state ${JSON.stringify(body.power_state)}`);
      }
      powerState = body.power_state;
    }

    return { vmId: transition.vmId, action: transition.action, ...(powerState && { powerState }) };
  }

  private async call(method: string, path: string, vm?: string, body?: unknown): Promise<unknown> {
    const hooks = this.options.hooks;
    const call = { method, path, ...(body !== undefined && { body }) };
    await hooks?.callHook("rpc:request", call);

    const startedAt = Date.now();
    let res: XenopsdResponse;
    try {
      res = await xenopsdRequest(this.socketPath, method, path, body, this.options.connectTimeoutMs);
    } catch (error) {
      await hooks?.callHook("rpc:error", { ...call, error: toError(error) });
      throw error;
    }
    await hooks?.callHook("rpc:response", {
      ...call,
      statusCode: res.statusCode,
      durationMs: Date.now() - startedAt,
    });

    if (res.statusCode >= 400) {
      throw decodeDaemonError(method, path, res, vm);
    }
    if (res.statusCode === 204 || !res.body) {
      return undefined;
    }

    try {
      return JSON.parse(res.body);
    } catch {
      throw daemonProtocolError(method, path, "response is not valid JSON");
    }
  }
}
