/**
 * Workflow run API.
 *
 * - POST /             start a run for a scope (202, runs in the background)
 * - GET  /             every run, newest first
 * - GET  /:id          one run
 * - POST /:id/cancel   cancel a run that has not started executing
 */

import { type FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError, summarizeRun } from 'mendgraph-core';
import { getAppState } from '../app-state.js';
import { parseInput } from '../validation.js';

const StartSchema = z.object({
  scope: z.string().min(1),
});

export const runRoutes: FastifyPluginAsync = async (app) => {

  // ─── POST / ─────────────────────────────────────────────────────────

  app.post('/', async (request, reply) => {
    const { scope } = parseInput(StartSchema, request.body, 'run request');
    const run = getAppState().services.engine.start(scope);
    return reply.status(202).send({ success: true, run });
  });

  // ─── GET / ──────────────────────────────────────────────────────────

  app.get('/', async () => {
    const runs = getAppState().services.engine.list()
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .map((run) => ({ ...run, summary: summarizeRun(run) }));
    return { success: true, count: runs.length, runs };
  });

  // ─── GET /:id ───────────────────────────────────────────────────────

  app.get<{ Params: { id: string } }>('/:id', async (request) => {
    const run = getAppState().services.engine.get(request.params.id);
    if (!run) throw new NotFoundError('run', request.params.id);
    return { success: true, run: { ...run, summary: summarizeRun(run) } };
  });

  // ─── POST /:id/cancel ───────────────────────────────────────────────

  app.post<{ Params: { id: string } }>('/:id/cancel', async (request) => {
    const cancelled = await getAppState().services.engine.cancel(request.params.id);
    return { success: true, runId: request.params.id, cancelled };
  });
};
