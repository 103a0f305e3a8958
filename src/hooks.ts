import type { TransitionRequest } from "./lib/vm.ts";

export interface RpcCall {
  method: string;
  path: string;
  body?: unknown;
}

export interface XenopsHooks {
  // Control channel traffic
  "rpc:request": (call: RpcCall) => void | Promise<void>;
  "rpc:response": (params: RpcCall & { statusCode: number; durationMs: number }) => void | Promise<void>;
  "rpc:error": (params: RpcCall & { error: Error }) => void | Promise<void>;

  // Power transitions, fired once per request the dispatcher issues
  "vm:beforeTransition": (request: TransitionRequest) => void | Promise<void>;
}
