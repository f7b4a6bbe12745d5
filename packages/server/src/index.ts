/**
 * mendgraph HTTP API
 *
 * Supports two modes:
 * 1. Standalone: `startServer()` loads mendgraph.yaml, builds the services and listens
 * 2. Embedded: `createServer(options)` returns a Fastify instance around given services
 */

import path from 'node:path';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import {
  APPROVALS_CHANNEL,
  RUNS_CHANNEL,
  createServices,
  loadConfig,
  type MendgraphConfig,
  type Services,
} from 'mendgraph-core';
import { initAppState, getAppState, type AppState } from './app-state.js';
import { errorHandler } from './http-errors.js';
import { coreLogger } from './logging.js';
import { SseStreams } from './sse.js';
import { approvalRoutes } from './routes/approvals.js';
import { workflowRoutes } from './routes/workflows.js';
import { runRoutes } from './routes/runs.js';
import { graphRoutes } from './routes/graph.js';

// =====================================================================
// Factory Options
// =====================================================================

export interface ServerOptions {
  /** Prebuilt services. Default: built from `config`. */
  services?: Services;
  config?: MendgraphConfig;
  /** Relative config paths resolve against this. Default: cwd. */
  baseDir?: string;
  /** Default: `config.server.keepAlive` */
  keepAliveMs?: number;
  /** Fastify logger setting. Default: `{ level: 'info' }` */
  logger?: boolean | { level: string };
}

// =====================================================================
// Factory: createServer
// =====================================================================

export async function createServer(options: ServerOptions = {}): Promise<{ app: FastifyInstance; appState: AppState }> {
  const app = Fastify({ logger: options.logger ?? { level: 'info' } });

  const services = options.services ?? await createServices({
    config: options.config,
    baseDir: options.baseDir,
    loggerFor: (scope) => coreLogger(app.log.child({ scope })),
  });
  const streams = new SseStreams(options.keepAliveMs ?? services.config.server.keepAlive);

  const appState = initAppState({ services, streams, startedAt: Date.now() });

  app.setErrorHandler(errorHandler);
  await app.register(cors, { origin: true });

  await app.register(approvalRoutes, { prefix: '/api' });
  await app.register(graphRoutes, { prefix: '/api' });
  await app.register(workflowRoutes, { prefix: '/api/workflows' });
  await app.register(runRoutes, { prefix: '/api/runs' });

  // Every run and approval event, for dashboards watching the whole queue
  app.get('/api/events', async (_request, reply) => {
    const { bus } = getAppState().services;
    streams.open(reply, (handler) => {
      const unsubscribers = [RUNS_CHANNEL, APPROVALS_CHANNEL].map((channel) => bus.subscribe(channel, handler));
      return () => {
        for (const unsub of unsubscribers) unsub();
      };
    });
  });

  app.get('/api/health', async () => {
    const state = getAppState();
    const pending = state.services.queue.stats().pending;
    return {
      success: true,
      status: 'ok',
      service: 'mendgraph',
      uptimeMs: Date.now() - state.startedAt,
      pendingApprovals: pending,
      activeRuns: state.services.engine.list().filter((r) => r.status === 'running').length,
      graph: state.services.graph.stats(),
    };
  });

  app.addHook('preClose', async () => {
    streams.closeAll();
  });
  app.addHook('onClose', async () => {
    await services.close();
  });

  return { app, appState };
}

// =====================================================================
// Standalone entrypoint
// =====================================================================

export interface StartServerOptions {
  configPath?: string;
  /** Overrides `server.host`. */
  host?: string;
  /** Overrides `server.port`. */
  port?: number;
}

/** Load configuration, start listening and return the running app. */
export async function startServer(options: StartServerOptions = {}): Promise<FastifyInstance> {
  const config = await loadConfig(options.configPath);
  const baseDir = options.configPath ? path.dirname(path.resolve(options.configPath)) : process.cwd();
  const { app } = await createServer({ config, baseDir });

  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;
  await app.listen({ host, port });
  app.log.info(`mendgraph API listening on http://${host}:${port}`);
  return app;
}

export { getAppState } from './app-state.js';
export { SseStreams, formatSseEvent } from './sse.js';
