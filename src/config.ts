/** Default xenopsd JSON control socket. */
export const DEFAULT_SOCKET_PATH = "/var/xapi/xenopsd.json";

/** Options shared by every subcommand. Built once per invocation, never mutated. */
export interface GlobalOptions {
  readonly debug: boolean;
  readonly verbose: boolean;
  readonly json: boolean;
  readonly socketPath: string;
}

export interface GlobalArgs {
  debug?: boolean;
  verbose?: boolean;
  json?: boolean;
  socket?: string;
}

// Options given before the subcommand name, recorded by the root command.
let inherited: GlobalArgs = {};

export function inheritGlobalArgs(args: GlobalArgs): void {
  inherited = { debug: args.debug, verbose: args.verbose, json: args.json, socket: args.socket };
}

export function clearInheritedGlobalArgs(): void {
  inherited = {};
}

/** Merge a subcommand's own options over those given before its name. */
export function resolveGlobalOptions(args: GlobalArgs): GlobalOptions {
  return Object.freeze({
    debug: args.debug === true || inherited.debug === true,
    verbose: args.verbose === true || inherited.verbose === true,
    json: args.json === true || inherited.json === true,
    socketPath: args.socket || inherited.socket || DEFAULT_SOCKET_PATH,
  });
}
