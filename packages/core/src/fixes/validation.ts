/**
 * @module fixes/validation
 * Zod schema for fix proposals, shared by the generator, the approval queue
 * and the HTTP submit route.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { FixProposal } from '../types.js';
import { UNKNOWN_PATTERN } from '../types.js';
import { ValidationError } from '../errors.js';

export const StructuredCommandSchema = z.object({
  command: z.array(z.string().min(1, 'argument must not be empty')).min(1, 'command must not be empty'),
  description: z.string().default(''),
});

export const RiskLevelSchema = z.enum(['LOW', 'MEDIUM', 'HIGH']);
export const PrioritySchema = z.enum(['critical', 'high', 'medium', 'low']);
export const ApprovalStatusSchema = z.enum([
  'proposed', 'pending_review', 'approved', 'rejected', 'needs_more_info',
  'executing', 'completed', 'failed', 'expired',
]);

export const FixProposalSchema = z.object({
  id: z.string().min(1).default(() => `prop-${randomUUID()}`),
  workflowId: z.string().default(''),
  entityId: z.string().min(1),
  rootCause: z.string().default(''),
  proposedAction: StructuredCommandSchema,
  riskLevel: RiskLevelSchema,
  confidence: z.number().min(0).max(1),
  rationale: z.string().default(''),
  rollbackAction: StructuredCommandSchema,
  patternId: z.string().min(1).default(UNKNOWN_PATTERN),
  priority: PrioritySchema.default('medium'),
  source: z.enum(['generated', 'fallback']).default('generated'),
  status: ApprovalStatusSchema.default('proposed'),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/**
 * Parse untrusted input into a proposal, filling defaults.
 * @throws {ValidationError}
 */
export function parseProposal(input: unknown): FixProposal {
  const result = FixProposalSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid fix proposal: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Check a proposal: non-empty action and rollback commands, known risk
 * level, confidence within [0, 1].
 * @throws {ValidationError}
 */
export function validateProposal(proposal: FixProposal): void {
  parseProposal(proposal);
}
