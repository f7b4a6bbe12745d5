/**
 * @module approval/migrations
 * SQLite schema migrations using user_version pragma for version tracking.
 */

import type Database from 'better-sqlite3';

interface Migration {
  version: number;
  description: string;
  up: string[];
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create approval_records and state_transitions tables',
    up: [
      `CREATE TABLE IF NOT EXISTS approval_records (
        id           TEXT PRIMARY KEY,
        workflow_id  TEXT NOT NULL,
        entity_id    TEXT NOT NULL,
        status       TEXT NOT NULL CHECK (status IN (
          'proposed', 'pending_review', 'approved', 'rejected', 'needs_more_info',
          'executing', 'completed', 'failed', 'expired'
        )),
        priority     TEXT NOT NULL CHECK (priority IN ('critical', 'high', 'medium', 'low')),
        risk_level   TEXT NOT NULL CHECK (risk_level IN ('LOW', 'MEDIUM', 'HIGH')),
        confidence   REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
        proposal     TEXT NOT NULL,
        decided_by   TEXT,
        decided_at   TEXT,
        feedback     TEXT,
        created_at   TEXT NOT NULL,
        expires_at   TEXT NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS state_transitions (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        proposal_id  TEXT NOT NULL REFERENCES approval_records(id) ON DELETE CASCADE,
        from_status  TEXT NOT NULL,
        to_status    TEXT NOT NULL,
        actor        TEXT NOT NULL,
        feedback     TEXT,
        timestamp    TEXT NOT NULL
      )`,
      'CREATE INDEX IF NOT EXISTS idx_approvals_workflow ON approval_records(workflow_id)',
      'CREATE INDEX IF NOT EXISTS idx_approvals_status ON approval_records(status, expires_at)',
      'CREATE INDEX IF NOT EXISTS idx_transitions_proposal ON state_transitions(proposal_id, id)',
    ],
  },
];

/**
 * Apply pending migrations to the database.
 * Uses the SQLite `user_version` pragma to track the current schema version.
 */
export function applyMigrations(db: Database.Database): void {
  const version = db.pragma('user_version', { simple: true });
  const currentVersion = typeof version === 'number' ? version : 0;

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      const migrate = db.transaction(() => {
        for (const sql of migration.up) {
          db.exec(sql);
        }
        db.pragma(`user_version = ${migration.version}`);
      });
      migrate();
    }
  }
}

export const LATEST_SCHEMA_VERSION = MIGRATIONS.length;
