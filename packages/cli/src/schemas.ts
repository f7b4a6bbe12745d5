/**
 * @module schemas
 * Shapes of the API responses the CLI prints. Only the fields it reads are
 * listed; everything else passes through untouched.
 */

import { z } from 'zod';

const CommandSchema = z.object({ command: z.array(z.string()), description: z.string().default('') });

export const ApprovalRecordSchema = z.object({
  proposal: z.object({
    id: z.string(),
    workflowId: z.string(),
    entityId: z.string(),
    rootCause: z.string(),
    patternId: z.string(),
    riskLevel: z.enum(['LOW', 'MEDIUM', 'HIGH']),
    confidence: z.number(),
    proposedAction: CommandSchema,
    rollbackAction: CommandSchema,
  }).passthrough(),
  status: z.string(),
  priority: z.string(),
  decidedBy: z.string().nullable(),
  feedback: z.string().nullable(),
  expiresAt: z.string(),
}).passthrough();

export type ApprovalRecordView = z.infer<typeof ApprovalRecordSchema>;

export const AuditEntrySchema = z.object({
  from: z.string(),
  to: z.string(),
  actor: z.string(),
  timestamp: z.string(),
  feedback: z.string().nullable(),
});

export const RunSchema = z.object({
  id: z.string(),
  scope: z.string(),
  state: z.string(),
  status: z.enum(['running', 'done']),
  result: z.string().nullable(),
  rounds: z.number(),
  proposals: z.array(z.string()),
  entities: z.array(z.object({ entityId: z.string(), outcome: z.string(), patterns: z.array(z.string()) })),
  error: z.string().nullable(),
  summary: z.string().optional(),
}).passthrough();

export type RunView = z.infer<typeof RunSchema>;

export const GraphNodeSchema = z.object({
  id: z.string(),
  type: z.string(),
  label: z.string(),
  attributes: z.record(z.string()),
});

// ---- Response envelopes ----

export const PendingResponse = z.object({ count: z.number(), records: z.array(ApprovalRecordSchema) });
export const RecordResponse = z.object({ record: ApprovalRecordSchema });
export const AuditResponse = z.object({ audit: z.array(AuditEntrySchema) });
export const BatchResponse = z.object({ workflowId: z.string(), decision: z.string(), proposalIds: z.array(z.string()) });
export const RunResponse = z.object({ run: RunSchema });
export const RunListResponse = z.object({ count: z.number(), runs: z.array(RunSchema) });
export const CancelResponse = z.object({ runId: z.string(), cancelled: z.boolean() });
export const NodesResponse = z.object({ count: z.number(), nodes: z.array(GraphNodeSchema) });
export const TraverseResponse = z.object({ start: z.string(), path: z.array(z.string()), nodes: z.array(GraphNodeSchema) });
