/**
 * Per-workflow approval API and event stream.
 *
 * - POST /:id/approve-all, /:id/reject-all   batch decisions
 * - GET  /:id/status                         aggregate approval status
 * - GET  /:id/events                         Server-Sent Events
 *
 * The event stream opens with a `connected` event carrying the pending
 * count, then relays every queue and run event of the workflow. A comment
 * line is written every `keepAliveMs` so proxies keep the connection open.
 */

import { type FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Decision } from 'mendgraph-core';
import { getAppState } from '../app-state.js';
import { parseInput } from '../validation.js';

const BatchSchema = z.object({
  actor: z.string().min(1),
  feedback: z.string().optional(),
});

export const workflowRoutes: FastifyPluginAsync = async (app) => {
  const batch = (decision: Decision) => async (request: { params: { id: string }; body: unknown }) => {
    const { actor, feedback } = parseInput(BatchSchema, request.body, 'batch decision');
    const decided = await getAppState().services.queue.decideBatch(request.params.id, decision, actor, feedback);
    return {
      success: true,
      workflowId: request.params.id,
      decision,
      proposalIds: decided.map((r) => r.proposal.id),
    };
  };

  app.post<{ Params: { id: string } }>('/:id/approve-all', batch('approved'));
  app.post<{ Params: { id: string } }>('/:id/reject-all', batch('rejected'));

  app.get<{ Params: { id: string } }>('/:id/status', async (request) => {
    return { success: true, status: getAppState().services.queue.status(request.params.id) };
  });

  // ─── GET /:id/events (SSE) ──────────────────────────────────────────

  app.get<{ Params: { id: string } }>('/:id/events', async (request, reply) => {
    const { services, streams } = getAppState();
    streams.open(reply, (handler) => services.queue.subscribe(request.params.id, handler));
  });
};
