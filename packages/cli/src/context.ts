/**
 * @module context
 * What every command needs: an API client for the `--url` option and the
 * output streams.
 */

import type { Command } from 'commander';
import { ApiClient, ApiError, DEFAULT_API_URL } from './api-client.js';
import { RED, RESET } from './format.js';

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface CliContext {
  client(): ApiClient;
  out: Output;
  /** Report a failure and mark the process as failed. */
  fail(err: unknown): void;
}

export interface ContextOptions {
  fetchImpl?: typeof fetch;
  out?: Output;
  env?: Record<string, string | undefined>;
}

export function createContext(program: Command, options: ContextOptions = {}): CliContext {
  const out = options.out ?? { log: (line) => console.log(line), error: (line) => console.error(line) };
  const env = options.env ?? process.env;

  return {
    out,
    client() {
      const opts = program.opts<{ url?: string }>();
      return new ApiClient(opts.url ?? env['MENDGRAPH_URL'] ?? DEFAULT_API_URL, options.fetchImpl);
    },
    fail(err) {
      if (err instanceof ApiError && err.code) {
        out.error(`${RED}${err.code}: ${err.message}${RESET}`);
      } else {
        out.error(`${RED}${err instanceof Error ? err.message : String(err)}${RESET}`);
      }
      process.exitCode = 1;
    },
  };
}
