import { consola, type ConsolaInstance } from "consola";

/** Trace output for the dispatcher and its RPC hooks. */
export interface XenopsLogger {
  debug: (...args: unknown[]) => void;
  withTag: (tag: string) => XenopsLogger;
}

export function createDefaultLogger(): XenopsLogger {
  return wrapConsola(consola);
}

function wrapConsola(instance: ConsolaInstance): XenopsLogger {
  return {
    debug: instance.debug.bind(instance),
    withTag: (tag: string) => wrapConsola(instance.withTag(tag)),
  };
}

export function createSilentLogger(): XenopsLogger {
  const silent: XenopsLogger = {
    debug: () => {},
    withTag: () => silent,
  };
  return silent;
}
