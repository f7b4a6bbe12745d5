/**
 * Approval queue REST API.
 *
 * - POST /proposals/submit         enqueue proposals for a workflow
 * - GET  /approvals                every record, newest first, by status and priority
 * - GET  /approvals/pending        records awaiting review, review order
 * - GET  /approvals/stats          queue statistics
 * - POST /approvals/check-expired  expire records past their review window
 * - GET  /approvals/:id            one record
 * - GET  /approvals/:id/audit      its audit trail
 * - POST /approvals/:id/decide     approve, reject or ask for more info
 */

import { type FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ApprovalStatusSchema, NotFoundError, PrioritySchema, parseProposal } from 'mendgraph-core';
import type { ApprovalRecord } from 'mendgraph-core';
import { getAppState } from '../app-state.js';
import { parseInput } from '../validation.js';

const SubmitSchema = z.object({
  workflowId: z.string().min(1),
  proposals: z.array(z.record(z.unknown())).min(1),
});

export const DecisionSchema = z.enum(['approved', 'rejected', 'needs_more_info']);

const DecideSchema = z.object({
  decision: DecisionSchema,
  actor: z.string().min(1),
  feedback: z.string().optional(),
});

const PendingQuerySchema = z.object({
  scope: z.string().optional(),
});

const ListQuerySchema = z.object({
  status: ApprovalStatusSchema.optional(),
  priority: PrioritySchema.optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function requireRecord(id: string): ApprovalRecord {
  const record = getAppState().services.queue.get(id);
  if (!record) throw new NotFoundError('proposal', id);
  return record;
}

export const approvalRoutes: FastifyPluginAsync = async (app) => {

  // ─── POST /proposals/submit ─────────────────────────────────────────

  app.post('/proposals/submit', async (request, reply) => {
    const { workflowId, proposals } = parseInput(SubmitSchema, request.body, 'submission');
    const parsed = proposals.map((p) => parseProposal({ ...p, workflowId }));
    const records = getAppState().services.queue.submit(workflowId, parsed);
    return reply.status(201).send({
      success: true,
      workflowId,
      proposalIds: records.map((r) => r.proposal.id),
    });
  });

  // ─── GET /approvals ─────────────────────────────────────────────────

  app.get('/approvals', async (request) => {
    const filters = parseInput(ListQuerySchema, request.query, 'query');
    const records = getAppState().services.queue.list(filters);
    return { success: true, count: records.length, filters, records };
  });

  // ─── GET /approvals/pending ─────────────────────────────────────────

  app.get('/approvals/pending', async (request) => {
    const { scope } = parseInput(PendingQuerySchema, request.query, 'query');
    const records = getAppState().services.queue.listPending({ scope });
    return { success: true, count: records.length, records };
  });

  // ─── GET /approvals/stats ───────────────────────────────────────────

  app.get('/approvals/stats', async () => {
    return { success: true, stats: getAppState().services.queue.stats() };
  });

  // ─── POST /approvals/check-expired ──────────────────────────────────

  app.post('/approvals/check-expired', async () => {
    const expired = await getAppState().services.queue.expireStale();
    return { success: true, expired: expired.map((r) => r.proposal.id) };
  });

  // ─── GET /approvals/:id ─────────────────────────────────────────────

  app.get<{ Params: { id: string } }>('/approvals/:id', async (request) => {
    return { success: true, record: requireRecord(request.params.id) };
  });

  app.get<{ Params: { id: string } }>('/approvals/:id/audit', async (request) => {
    const audit = getAppState().services.queue.auditTrail(request.params.id);
    return { success: true, proposalId: request.params.id, audit };
  });

  // ─── POST /approvals/:id/decide ─────────────────────────────────────

  app.post<{ Params: { id: string } }>('/approvals/:id/decide', async (request) => {
    const { decision, actor, feedback } = parseInput(DecideSchema, request.body, 'decision');
    const record = await getAppState().services.queue.decide(request.params.id, decision, actor, feedback);
    return { success: true, record };
  });
};
