import type { FastifyBaseLogger } from 'fastify';
import type { Logger } from 'mendgraph-core';

/** Adapt a pino logger (Fastify's `app.log` or a child) to the core Logger. */
export function coreLogger(log: FastifyBaseLogger): Logger {
  return {
    debug: (msg) => log.debug(msg),
    info: (msg) => log.info(msg),
    warn: (msg) => log.warn(msg),
    error: (msg) => log.error(msg),
  };
}
