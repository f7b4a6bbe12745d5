/**
 * @module approval/sqlite-approval-store
 * SQLiteApprovalStore - approval records and their audit trail in SQLite.
 */

import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import type { ApprovalStatus } from '../types.js';
import type { ApprovalRecord, AuditEntry } from './types.js';
import type { ApprovalStore } from './approval-store.js';
import { applyMigrations } from './migrations.js';
import { ApprovalStatusSchema, FixProposalSchema, PrioritySchema } from '../fixes/validation.js';

interface RecordRow {
  id: string;
  workflow_id: string;
  entity_id: string;
  status: string;
  priority: string;
  risk_level: string;
  confidence: number;
  proposal: string;
  decided_by: string | null;
  decided_at: string | null;
  feedback: string | null;
  created_at: string;
  expires_at: string;
}

interface TransitionRow {
  proposal_id: string;
  from_status: string;
  to_status: string;
  actor: string;
  feedback: string | null;
  timestamp: string;
}

export class SQLiteApprovalStore implements ApprovalStore {
  private db: Database.Database;

  /** @param dbPath file path, or `:memory:` */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.pragma('foreign_keys = ON');

    applyMigrations(this.db);
  }

  insert(records: ApprovalRecord[]): void {
    const insertRecord = this.db.prepare(`
      INSERT INTO approval_records (id, workflow_id, entity_id, status, priority, risk_level, confidence, proposal, decided_by, decided_at, feedback, created_at, expires_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction(() => {
      for (const r of records) {
        insertRecord.run(
          r.proposal.id, r.proposal.workflowId, r.proposal.entityId, r.status, r.priority,
          r.proposal.riskLevel, r.proposal.confidence, JSON.stringify(r.proposal),
          r.decidedBy, r.decidedAt, r.feedback, r.createdAt, r.expiresAt,
        );
        for (const entry of r.audit) {
          this.insertTransition(r.proposal.id, entry);
        }
      }
    });

    transaction();
  }

  update(record: ApprovalRecord, entry: AuditEntry): void {
    const updateRecord = this.db.prepare(`
      UPDATE approval_records
      SET status = ?, proposal = ?, decided_by = ?, decided_at = ?, feedback = ?
      WHERE id = ?
    `);

    const transaction = this.db.transaction(() => {
      const result = updateRecord.run(
        record.status, JSON.stringify(record.proposal), record.decidedBy,
        record.decidedAt, record.feedback, record.proposal.id,
      );
      if (result.changes === 0) {
        throw new Error(`Unknown proposal id: ${record.proposal.id}`);
      }
      this.insertTransition(record.proposal.id, entry);
    });

    transaction();
  }

  get(proposalId: string): ApprovalRecord | undefined {
    const row = this.db
      .prepare<[string], RecordRow>('SELECT * FROM approval_records WHERE id = ?')
      .get(proposalId);
    return row ? this.toRecord(row) : undefined;
  }

  listByWorkflow(workflowId: string): ApprovalRecord[] {
    return this.db
      .prepare<[string], RecordRow>('SELECT * FROM approval_records WHERE workflow_id = ? ORDER BY created_at ASC, id ASC')
      .all(workflowId)
      .map((row) => this.toRecord(row));
  }

  listByStatus(statuses: readonly ApprovalStatus[]): ApprovalRecord[] {
    if (statuses.length === 0) return [];
    const placeholders = statuses.map(() => '?').join(', ');
    return this.db
      .prepare<string[], RecordRow>(`SELECT * FROM approval_records WHERE status IN (${placeholders}) ORDER BY created_at ASC, id ASC`)
      .all(...statuses)
      .map((row) => this.toRecord(row));
  }

  all(): ApprovalRecord[] {
    return this.db
      .prepare<[], RecordRow>('SELECT * FROM approval_records ORDER BY created_at ASC, id ASC')
      .all()
      .map((row) => this.toRecord(row));
  }

  close(): void {
    this.db.close();
  }

  // =====================================================================
  // Row mapping
  // =====================================================================

  private insertTransition(proposalId: string, entry: AuditEntry): void {
    this.db.prepare(`
      INSERT INTO state_transitions (proposal_id, from_status, to_status, actor, feedback, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(proposalId, entry.from, entry.to, entry.actor, entry.feedback, entry.timestamp);
  }

  private toRecord(row: RecordRow): ApprovalRecord {
    const transitions = this.db
      .prepare<[string], TransitionRow>('SELECT * FROM state_transitions WHERE proposal_id = ? ORDER BY id ASC')
      .all(row.id);

    const status = ApprovalStatusSchema.parse(row.status);
    return {
      proposal: { ...FixProposalSchema.parse(JSON.parse(row.proposal)), status },
      status,
      priority: PrioritySchema.parse(row.priority),
      decidedBy: row.decided_by,
      decidedAt: row.decided_at,
      feedback: row.feedback,
      createdAt: row.created_at,
      expiresAt: row.expires_at,
      audit: transitions.map((t): AuditEntry => ({
        from: ApprovalStatusSchema.parse(t.from_status),
        to: ApprovalStatusSchema.parse(t.to_status),
        actor: t.actor,
        timestamp: t.timestamp,
        feedback: t.feedback,
      })),
    };
  }
}
