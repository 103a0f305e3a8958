import { createHooks, type Hookable } from "hookable";
import { DEFAULT_SOCKET_PATH } from "./config.ts";
import type { XenopsHooks } from "./hooks.ts";
import { createDefaultLogger, type XenopsLogger } from "./xenops-logger.ts";
import { CommandDispatcher } from "./services/dispatcher.ts";
import { XenopsdClient, type XenopsClient } from "./services/xenopsd.ts";

export interface XenopsOptions {
  socketPath?: string;
  /** Upper bound on establishing the socket connection, not on the call itself. */
  connectTimeoutMs?: number;
  /** Replaces the socket client, e.g. with an in-memory daemon. */
  client?: XenopsClient;
  logger?: XenopsLogger;
}

export interface XenopsContext {
  readonly socketPath: string;
  readonly client: XenopsClient;
  readonly hooks: Hookable<XenopsHooks>;
  readonly logger: XenopsLogger;
}

export function createXenops(options?: XenopsOptions): CommandDispatcher {
  const socketPath = options?.socketPath ?? DEFAULT_SOCKET_PATH;
  const logger = options?.logger ?? createDefaultLogger();
  const hooks = createHooks<XenopsHooks>();
  const client =
    options?.client ??
    new XenopsdClient(socketPath, { connectTimeoutMs: options?.connectTimeoutMs, hooks });

  traceRpc(hooks, logger.withTag("rpc"));

  const ctx: XenopsContext = { socketPath, client, hooks, logger };
  return new CommandDispatcher(ctx);
}

function traceRpc(hooks: Hookable<XenopsHooks>, log: XenopsLogger): void {
  hooks.hook("rpc:request", ({ method, path, body }) => {
    log.debug(`→ ${method} ${path}${body === undefined ? "" : ` ${JSON.stringify(body)}`}`);
  });
  hooks.hook("rpc:response", ({ method, path, statusCode, durationMs }) => {
    log.debug(`← ${method} ${path} ${statusCode} (${durationMs}ms)`);
  });
  hooks.hook("rpc:error", ({ method, path, error }) => {
    log.debug(`✗ ${method} ${path}: ${error.message}`);
  });
  hooks.hook("vm:beforeTransition", (request) => {
    log.debug(`Requesting ${request.action} of ${request.vmId}`);
  });
}
