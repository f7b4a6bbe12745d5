/**
 * @module commands/serve
 * `mendgraph serve` - Run the HTTP API in the foreground.
 */

import type { Command } from 'commander';
import type { CliContext } from '../context.js';

export function registerServe(program: Command, ctx: CliContext): void {
  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-c, --config <path>', 'mendgraph.yaml path')
    .option('--host <host>', 'bind address (default: server.host)')
    .option('-p, --port <port>', 'port (default: server.port)', (v) => parseInt(v, 10))
    .action(async (opts: { config?: string; host?: string; port?: number }) => {
      try {
        // Lazy import keeps --help free of the server's dependencies
        const { startServer } = await import('mendgraph-server');
        const app = await startServer({ configPath: opts.config, host: opts.host, port: opts.port });

        const shutdown = (signal: string): void => {
          app.log.info(`${signal} received, shutting down`);
          app.close().then(
            () => { process.exitCode = 0; },
            (err: unknown) => ctx.fail(err),
          );
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      } catch (err) {
        ctx.fail(err);
      }
    });
}
