/**
 * @module approval/types
 * Approval records, audit entries and the proposal state machine.
 */

import type { ApprovalStatus, FixProposal, Priority, RiskLevel } from '../types.js';

export type Decision = 'approved' | 'rejected' | 'needs_more_info';

export const DECISIONS: readonly Decision[] = ['approved', 'rejected', 'needs_more_info'];

export function isDecision(value: string): value is Decision {
  return DECISIONS.some((d) => d === value);
}

export interface AuditEntry {
  from: ApprovalStatus;
  to: ApprovalStatus;
  actor: string;
  /** ISO-8601 */
  timestamp: string;
  feedback: string | null;
}

export interface ApprovalRecord {
  proposal: FixProposal;
  status: ApprovalStatus;
  priority: Priority;
  decidedBy: string | null;
  decidedAt: string | null;
  feedback: string | null;
  createdAt: string;
  expiresAt: string;
  audit: AuditEntry[];
}

export interface WorkflowApprovalStatus {
  workflowId: string;
  /** Every live record (needs_more_info and expired ignored) is approved or beyond. */
  allApproved: boolean;
  anyRejected: boolean;
  pendingCount: number;
  total: number;
  counts: Record<ApprovalStatus, number>;
}

export interface ApprovalStats {
  total: number;
  pending: number;
  byStatus: Record<ApprovalStatus, number>;
  byPriority: Record<Priority, number>;
  byRisk: Record<RiskLevel, number>;
  /** Mean time from submission to decision, null before the first decision. */
  averageDecisionMs: number | null;
}

export interface ListPendingOptions {
  /** Entity id, entity namespace prefix (`ns` matches `ns/...`) or workflow id. */
  scope?: string;
}

export interface ListRecordsOptions {
  status?: ApprovalStatus;
  priority?: Priority;
  /** Default: 100 */
  limit?: number;
}

// =====================================================================
// State machine
// =====================================================================

export const TERMINAL_STATUSES: ReadonlySet<ApprovalStatus> = new Set<ApprovalStatus>([
  'rejected', 'needs_more_info', 'completed', 'failed', 'expired',
]);

/** Statuses counted as an approval by `allApproved`. */
export const APPROVED_OR_BEYOND: ReadonlySet<ApprovalStatus> = new Set<ApprovalStatus>([
  'approved', 'executing', 'completed', 'failed',
]);

const TRANSITIONS: Record<ApprovalStatus, readonly ApprovalStatus[]> = {
  proposed: ['pending_review'],
  pending_review: ['approved', 'rejected', 'needs_more_info', 'expired'],
  approved: ['executing', 'expired'],
  executing: ['completed', 'failed'],
  rejected: [],
  needs_more_info: [],
  completed: [],
  failed: [],
  expired: [],
};

/**
 * Whether `from → to` is allowed. `approved → rejected` is only legal for
 * a cancellation.
 */
export function canTransition(from: ApprovalStatus, to: ApprovalStatus, cancellation = false): boolean {
  if (cancellation && from === 'approved' && to === 'rejected') return true;
  return TRANSITIONS[from].includes(to);
}

export function emptyStatusCounts(): Record<ApprovalStatus, number> {
  return {
    proposed: 0,
    pending_review: 0,
    approved: 0,
    rejected: 0,
    needs_more_info: 0,
    executing: 0,
    completed: 0,
    failed: 0,
    expired: 0,
  };
}
