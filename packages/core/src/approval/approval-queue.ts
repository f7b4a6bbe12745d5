/**
 * @module approval/approval-queue
 * ApprovalQueue - owns the lifecycle of submitted proposals.
 *
 * All mutations of an existing record run under that record's key in a
 * KeyedLock, so N concurrent decisions on one proposal yield exactly one
 * winner. Every mutation is appended to the record's audit trail and
 * broadcast on the workflow's bus channel (`workflow:<id>`) and on the
 * global `approvals` channel.
 */

import type { ApprovalStatus, FixProposal, Priority, RiskLevel } from '../types.js';
import { RISK_ORDER } from '../types.js';
import { InvalidTransitionError, NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { KeyedLock } from '../keyed-lock.js';
import type { BusHandler, BusMessage } from '../sse-bus.js';
import { EventBus } from '../sse-bus.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { parseProposal } from '../fixes/validation.js';
import type { ApprovalStore } from './approval-store.js';
import { MemoryApprovalStore } from './approval-store.js';
import type {
  ApprovalRecord,
  ApprovalStats,
  AuditEntry,
  Decision,
  ListPendingOptions,
  ListRecordsOptions,
  WorkflowApprovalStatus,
} from './types.js';
import { APPROVED_OR_BEYOND, canTransition, emptyStatusCounts } from './types.js';

export const APPROVALS_CHANNEL = 'approvals';
export const SYSTEM_ACTOR = 'system';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_TTL: Record<Priority, number> = {
  critical: 24 * HOUR_MS,
  high: 24 * HOUR_MS,
  medium: 7 * DAY_MS,
  low: 7 * DAY_MS,
};

export function workflowChannel(workflowId: string): string {
  return `workflow:${workflowId}`;
}

/** Highest risk first; within a risk level, least confident first. */
export function compareForReview(a: ApprovalRecord, b: ApprovalRecord): number {
  return (
    RISK_ORDER[b.proposal.riskLevel] - RISK_ORDER[a.proposal.riskLevel] ||
    a.proposal.confidence - b.proposal.confidence ||
    a.createdAt.localeCompare(b.createdAt) ||
    a.proposal.id.localeCompare(b.proposal.id)
  );
}

export interface ApprovalQueueOptions {
  store?: ApprovalStore;
  bus?: EventBus;
  /** Review window per priority, ms. */
  ttl?: Partial<Record<Priority, number>>;
  logger?: Logger;
  now?: () => number;
}

export class ApprovalQueue {
  readonly bus: EventBus;
  private readonly store: ApprovalStore;
  private readonly locks = new KeyedLock();
  private readonly ttl: Record<Priority, number>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ApprovalQueueOptions = {}) {
    this.store = options.store ?? new MemoryApprovalStore();
    this.bus = options.bus ?? new EventBus(options.logger);
    this.ttl = { ...DEFAULT_TTL, ...options.ttl };
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  // =====================================================================
  // Submission & decisions
  // =====================================================================

  /**
   * Validate and enqueue proposals for review. Nothing is stored when any
   * proposal is invalid. The `submitted` event is delivered before return.
   * @returns records in review order
   * @throws {ValidationError}
   */
  submit(workflowId: string, proposals: readonly FixProposal[]): ApprovalRecord[] {
    if (!workflowId) throw new ValidationError('workflowId is required');
    if (proposals.length === 0) throw new ValidationError('At least one proposal is required');

    const validated = proposals.map((p) => parseProposal({ ...p, workflowId }));
    const ids = new Set<string>();
    for (const p of validated) {
      if (ids.has(p.id) || this.store.get(p.id)) {
        throw new ValidationError(`Duplicate proposal id: ${p.id}`, [`id: ${p.id}`]);
      }
      ids.add(p.id);
    }

    const nowMs = this.now();
    const createdAt = new Date(nowMs).toISOString();
    const records = validated.map((p): ApprovalRecord => {
      const entry: AuditEntry = { from: 'proposed', to: 'pending_review', actor: SYSTEM_ACTOR, timestamp: createdAt, feedback: null };
      return {
        proposal: { ...p, status: 'pending_review' },
        status: 'pending_review',
        priority: p.priority,
        decidedBy: null,
        decidedAt: null,
        feedback: null,
        createdAt,
        expiresAt: new Date(nowMs + this.ttl[p.priority]).toISOString(),
        audit: [entry],
      };
    });

    this.store.insert(records);
    const sorted = [...records].sort(compareForReview);
    this.logger.info(`Workflow ${workflowId}: ${records.length} proposal(s) awaiting review`);
    this.publish(workflowId, 'submitted', {
      workflowId,
      proposalIds: sorted.map((r) => r.proposal.id),
      pendingCount: this.pendingCount(workflowId),
    });
    return sorted;
  }

  /**
   * Record a reviewer decision on a `pending_review` proposal.
   * @throws {NotFoundError} unknown id
   * @throws {InvalidTransitionError} not pending review (including expired)
   */
  async decide(proposalId: string, decision: Decision, actor: string, feedback?: string): Promise<ApprovalRecord> {
    return this.locks.withLock(proposalId, () => {
      const record = this.require(proposalId);
      const updated = this.applyDecision(record, decision, actor, feedback);
      this.publish(updated.proposal.workflowId, 'decided', {
        proposalId,
        decision,
        actor,
        status: updated.status,
        pendingCount: this.pendingCount(updated.proposal.workflowId),
      });
      return updated;
    });
  }

  /**
   * Decide every `pending_review` record of a workflow in one step, holding
   * the locks of all its records.
   * @returns the records that were decided
   */
  async decideBatch(workflowId: string, decision: Decision, actor: string, feedback?: string): Promise<ApprovalRecord[]> {
    const keys = this.store.listByWorkflow(workflowId).map((r) => r.proposal.id);
    if (keys.length === 0) throw new NotFoundError('workflow', workflowId);

    return this.locks.withLocks(keys, () => {
      const decided: ApprovalRecord[] = [];
      for (const record of this.store.listByWorkflow(workflowId).sort(compareForReview)) {
        if (record.status !== 'pending_review' || this.isPastExpiry(record)) continue;
        decided.push(this.applyDecision(record, decision, actor, feedback));
      }
      const event = decision === 'approved' ? 'batch_approved' : decision === 'rejected' ? 'batch_rejected' : 'batch_needs_more_info';
      this.publish(workflowId, event, {
        workflowId,
        proposalIds: decided.map((r) => r.proposal.id),
        actor,
        pendingCount: this.pendingCount(workflowId),
      });
      return decided;
    });
  }

  // =====================================================================
  // Execution lifecycle
  // =====================================================================

  async markExecuting(proposalId: string, actor = SYSTEM_ACTOR): Promise<ApprovalRecord> {
    return this.locks.withLock(proposalId, () => {
      const updated = this.transition(this.require(proposalId), 'executing', actor, null);
      this.publish(updated.proposal.workflowId, 'executing', { proposalId });
      return updated;
    });
  }

  async completeExecution(proposalId: string, success: boolean, detail?: string, actor = SYSTEM_ACTOR): Promise<ApprovalRecord> {
    return this.locks.withLock(proposalId, () => {
      const updated = this.transition(this.require(proposalId), success ? 'completed' : 'failed', actor, detail ?? null);
      this.publish(updated.proposal.workflowId, 'execution_finished', { proposalId, status: updated.status });
      return updated;
    });
  }

  // =====================================================================
  // Expiry & cancellation
  // =====================================================================

  /** Expire every `pending_review` or `approved` record of a workflow. */
  async expireWorkflow(workflowId: string, reason = 'approval timeout'): Promise<ApprovalRecord[]> {
    return this.bulkTransition(workflowId, 'expired', reason, false);
  }

  /** Reject every `pending_review` or `approved` record of a workflow. */
  async cancelWorkflow(workflowId: string, actor = SYSTEM_ACTOR, feedback = 'cancelled'): Promise<ApprovalRecord[]> {
    return this.bulkTransition(workflowId, 'rejected', feedback, true, actor);
  }

  /** Expire every open record whose review window has passed. */
  async expireStale(nowMs: number = this.now()): Promise<ApprovalRecord[]> {
    const stale = this.store
      .listByStatus(['pending_review', 'approved'])
      .filter((r) => Date.parse(r.expiresAt) <= nowMs);

    const expired: ApprovalRecord[] = [];
    for (const candidate of stale) {
      const id = candidate.proposal.id;
      const updated = await this.locks.withLock(id, () => {
        const record = this.store.get(id);
        if (!record || (record.status !== 'pending_review' && record.status !== 'approved')) return undefined;
        return this.transition(record, 'expired', SYSTEM_ACTOR, 'review window elapsed');
      });
      if (updated) {
        expired.push(updated);
        this.publish(updated.proposal.workflowId, 'expired', { proposalIds: [id], pendingCount: this.pendingCount(updated.proposal.workflowId) });
      }
    }
    if (expired.length > 0) this.logger.info(`Expired ${expired.length} stale proposal(s)`);
    return expired;
  }

  /** Run `expireStale` periodically. @returns a stop function */
  startExpirySweep(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.expireStale().catch((err: unknown) => {
        this.logger.error(`Expiry sweep failed: ${errorMessage(err)}`);
      });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  // =====================================================================
  // Queries
  // =====================================================================

  get(proposalId: string): ApprovalRecord | undefined {
    return this.store.get(proposalId);
  }

  /** Pending records in review order, optionally narrowed to a scope. */
  listPending(options: ListPendingOptions = {}): ApprovalRecord[] {
    const { scope } = options;
    return this.store
      .listByStatus(['pending_review'])
      .filter((r) =>
        !scope ||
        r.proposal.entityId === scope ||
        r.proposal.entityId.startsWith(`${scope}/`) ||
        r.proposal.workflowId === scope,
      )
      .sort(compareForReview);
  }

  listByWorkflow(workflowId: string): ApprovalRecord[] {
    return this.store.listByWorkflow(workflowId).sort(compareForReview);
  }

  /** Records in any state, newest first, optionally narrowed by status and priority. */
  list(options: ListRecordsOptions = {}): ApprovalRecord[] {
    const { status, priority, limit = 100 } = options;
    const records = status ? this.store.listByStatus([status]) : this.store.all();
    return records
      .filter((r) => !priority || r.priority === priority)
      .reverse()
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt))
      .slice(0, Math.max(0, limit));
  }

  /** @throws {NotFoundError} */
  auditTrail(proposalId: string): AuditEntry[] {
    return this.require(proposalId).audit;
  }

  status(workflowId: string): WorkflowApprovalStatus {
    const records = this.store.listByWorkflow(workflowId);
    const counts = emptyStatusCounts();
    for (const r of records) counts[r.status]++;

    const live = records.filter((r) => r.status !== 'needs_more_info' && r.status !== 'expired');
    return {
      workflowId,
      allApproved: live.length > 0 && live.every((r) => APPROVED_OR_BEYOND.has(r.status)),
      anyRejected: counts.rejected > 0,
      pendingCount: counts.pending_review,
      total: records.length,
      counts,
    };
  }

  stats(): ApprovalStats {
    const records = this.store.all();
    const byStatus = emptyStatusCounts();
    const byPriority: Record<Priority, number> = { critical: 0, high: 0, medium: 0, low: 0 };
    const byRisk: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 0, HIGH: 0 };
    let decisionMs = 0;
    let decisions = 0;

    for (const r of records) {
      byStatus[r.status]++;
      byPriority[r.priority]++;
      byRisk[r.proposal.riskLevel]++;
      if (r.decidedAt) {
        decisionMs += Date.parse(r.decidedAt) - Date.parse(r.createdAt);
        decisions++;
      }
    }

    return {
      total: records.length,
      pending: byStatus.pending_review,
      byStatus,
      byPriority,
      byRisk,
      averageDecisionMs: decisions > 0 ? Math.round(decisionMs / decisions) : null,
    };
  }

  /**
   * Subscribe to a workflow's events. A `connected` event carrying the
   * current pending count is delivered immediately; earlier events are not
   * replayed.
   */
  subscribe(workflowId: string, handler: BusHandler): () => void {
    handler({ event: 'connected', data: { workflowId, pendingCount: this.pendingCount(workflowId) } });
    return this.bus.subscribe(workflowChannel(workflowId), handler);
  }

  close(): void {
    this.store.close();
  }

  // =====================================================================
  // Internals
  // =====================================================================

  private require(proposalId: string): ApprovalRecord {
    const record = this.store.get(proposalId);
    if (!record) throw new NotFoundError('proposal', proposalId);
    return record;
  }

  private pendingCount(workflowId: string): number {
    return this.store.listByWorkflow(workflowId).filter((r) => r.status === 'pending_review').length;
  }

  private isPastExpiry(record: ApprovalRecord): boolean {
    return Date.parse(record.expiresAt) <= this.now();
  }

  /** Caller holds the record's lock. */
  private applyDecision(record: ApprovalRecord, decision: Decision, actor: string, feedback?: string): ApprovalRecord {
    if (!actor) throw new ValidationError('actor is required');
    if (record.status === 'pending_review' && this.isPastExpiry(record)) {
      const expired = this.transition(record, 'expired', SYSTEM_ACTOR, 'review window elapsed');
      this.publish(expired.proposal.workflowId, 'expired', { proposalIds: [expired.proposal.id], pendingCount: this.pendingCount(expired.proposal.workflowId) });
      throw new InvalidTransitionError(record.proposal.id, 'expired', decision);
    }
    const decidedAt = new Date(this.now()).toISOString();
    return this.transition(record, decision, actor, feedback ?? null, { decidedBy: actor, decidedAt });
  }

  /** Caller holds the record's lock. */
  private transition(
    record: ApprovalRecord,
    to: ApprovalStatus,
    actor: string,
    feedback: string | null,
    decision?: { decidedBy: string; decidedAt: string },
    cancellation = false,
  ): ApprovalRecord {
    if (!canTransition(record.status, to, cancellation)) {
      throw new InvalidTransitionError(record.proposal.id, record.status, to);
    }

    const entry: AuditEntry = { from: record.status, to, actor, timestamp: new Date(this.now()).toISOString(), feedback };
    const updated: ApprovalRecord = {
      ...record,
      proposal: { ...record.proposal, status: to },
      status: to,
      decidedBy: decision?.decidedBy ?? record.decidedBy,
      decidedAt: decision?.decidedAt ?? record.decidedAt,
      feedback: feedback ?? record.feedback,
      audit: [...record.audit, entry],
    };
    this.store.update(updated, entry);
    return updated;
  }

  private async bulkTransition(
    workflowId: string,
    to: 'expired' | 'rejected',
    feedback: string,
    cancellation: boolean,
    actor = SYSTEM_ACTOR,
  ): Promise<ApprovalRecord[]> {
    const keys = this.store.listByWorkflow(workflowId).map((r) => r.proposal.id);
    if (keys.length === 0) return [];

    return this.locks.withLocks(keys, () => {
      const changed: ApprovalRecord[] = [];
      for (const record of this.store.listByWorkflow(workflowId)) {
        if (record.status !== 'pending_review' && record.status !== 'approved') continue;
        changed.push(this.transition(record, to, actor, feedback, undefined, cancellation));
      }
      if (changed.length > 0) {
        this.publish(workflowId, cancellation ? 'cancelled' : 'expired', {
          workflowId,
          proposalIds: changed.map((r) => r.proposal.id),
          pendingCount: this.pendingCount(workflowId),
        });
      }
      return changed;
    });
  }

  private publish(workflowId: string, event: string, data: Record<string, unknown>): void {
    const message: BusMessage = { event, data };
    this.bus.emit(workflowChannel(workflowId), message);
    this.bus.emit(APPROVALS_CHANNEL, message);
  }
}
