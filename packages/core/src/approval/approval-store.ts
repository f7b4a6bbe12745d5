/**
 * @module approval/approval-store
 * ApprovalStore interface and the in-memory implementation.
 *
 * Stores are synchronous; the queue serialises mutations per proposal.
 * Returned records are copies, so callers cannot mutate stored state.
 */

import type { ApprovalStatus } from '../types.js';
import type { ApprovalRecord, AuditEntry } from './types.js';

export interface ApprovalStore {
  /** Insert new records atomically (all or none). */
  insert(records: ApprovalRecord[]): void;
  /** Persist a record's new state together with the audit entry that produced it. */
  update(record: ApprovalRecord, entry: AuditEntry): void;
  get(proposalId: string): ApprovalRecord | undefined;
  listByWorkflow(workflowId: string): ApprovalRecord[];
  listByStatus(statuses: readonly ApprovalStatus[]): ApprovalRecord[];
  all(): ApprovalRecord[];
  close(): void;
}

function copy(record: ApprovalRecord): ApprovalRecord {
  return structuredClone(record);
}

export class MemoryApprovalStore implements ApprovalStore {
  private readonly records = new Map<string, ApprovalRecord>();

  insert(records: ApprovalRecord[]): void {
    for (const record of records) {
      if (this.records.has(record.proposal.id)) {
        throw new Error(`Duplicate proposal id: ${record.proposal.id}`);
      }
    }
    for (const record of records) {
      this.records.set(record.proposal.id, copy(record));
    }
  }

  update(record: ApprovalRecord): void {
    if (!this.records.has(record.proposal.id)) {
      throw new Error(`Unknown proposal id: ${record.proposal.id}`);
    }
    this.records.set(record.proposal.id, copy(record));
  }

  get(proposalId: string): ApprovalRecord | undefined {
    const record = this.records.get(proposalId);
    return record ? copy(record) : undefined;
  }

  listByWorkflow(workflowId: string): ApprovalRecord[] {
    return [...this.records.values()].filter((r) => r.proposal.workflowId === workflowId).map(copy);
  }

  listByStatus(statuses: readonly ApprovalStatus[]): ApprovalRecord[] {
    return [...this.records.values()].filter((r) => statuses.includes(r.status)).map(copy);
  }

  all(): ApprovalRecord[] {
    return [...this.records.values()].map(copy);
  }

  close(): void {
    this.records.clear();
  }
}
