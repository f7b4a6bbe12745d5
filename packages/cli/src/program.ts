/**
 * @module mendgraph-cli
 * Command line client for the mendgraph API.
 *
 * Registers all sub-commands on a Commander program; `index.ts` parses
 * process.argv with it.
 */

import { Command } from 'commander';
import { createContext, type ContextOptions } from './context.js';
import { registerServe } from './commands/serve.js';
import { registerRuns } from './commands/runs.js';
import { registerApprovals } from './commands/approvals.js';
import { registerGraph } from './commands/graph.js';

export function createProgram(options: ContextOptions = {}): Command {
  const program = new Command();

  program
    .name('mendgraph')
    .description('Graph-augmented, approval-gated remediation')
    .version('0.1.0')
    .option('-u, --url <url>', 'API base URL (default: $MENDGRAPH_URL or http://127.0.0.1:9190)');

  const ctx = createContext(program, options);

  // Register sub-commands
  registerServe(program, ctx);
  registerRuns(program, ctx);
  registerApprovals(program, ctx);
  registerGraph(program, ctx);

  return program;
}

export { ApiClient, ApiError, DEFAULT_API_URL } from './api-client.js';
export type { CliContext, ContextOptions, Output } from './context.js';
