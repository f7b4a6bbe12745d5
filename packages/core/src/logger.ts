/**
 * @module logger
 * Minimal logging contract used by every core component.
 *
 * The default implementation prints `[scope] message` lines to the console.
 * The HTTP server passes Fastify's request logger children instead, which
 * satisfy the same interface.
 */

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines. Default: `MENDGRAPH_DEBUG` is set. */
  verbose?: boolean;
}

export function createConsoleLogger(scope: string, options?: ConsoleLoggerOptions): Logger {
  const verbose = options?.verbose ?? Boolean(process.env.MENDGRAPH_DEBUG);
  const prefix = `[${scope}]`;
  return {
    debug: (msg) => { if (verbose) console.debug(`${prefix} ${msg}`); },
    info: (msg) => console.log(`${prefix} ${msg}`),
    warn: (msg) => console.warn(`${prefix} ${msg}`),
    error: (msg) => console.error(`${prefix} ${msg}`),
  };
}

/** Discards everything; handy in tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
