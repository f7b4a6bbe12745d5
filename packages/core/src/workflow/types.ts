/**
 * @module workflow/types
 * Run records produced by the workflow engine.
 */

import type { ApprovalStatus, PatternId } from '../types.js';

export type WorkflowState =
  | 'identify'
  | 'diagnose'
  | 'query_knowledge'
  | 'generate_fixes'
  | 'await_approval'
  | 'execute'
  | 'validate'
  | 'learn'
  | 'done';

export type RunResult =
  | 'completed'
  | 'partial_failure'
  | 'failed'
  | 'rejected'
  | 'timeout'
  | 'cancelled'
  | 'no_action'
  | 'error';

export type EntityOutcome = 'proposed' | 'manual_investigation' | 'collect_failed' | 'no_valid_proposal';

export interface EntityReport {
  entityId: string;
  patterns: PatternId[];
  outcome: EntityOutcome;
  /** Diagnose round that produced this report. */
  round: number;
}

export type RollbackOutcome = 'not_needed' | 'succeeded' | 'failed';

export interface ProposalOutcome {
  proposalId: string;
  entityId: string;
  patternId: PatternId;
  status: ApprovalStatus;
  executed: boolean;
  /** Health after execution; null when not validated. */
  healthy: boolean | null;
  rollback: RollbackOutcome;
  detail: string;
}

export interface WorkflowRun {
  id: string;
  scope: string;
  startedAt: string;
  finishedAt: string | null;
  state: WorkflowState;
  status: 'running' | 'done';
  result: RunResult | null;
  /** Every submitted proposal id, across rounds. */
  proposals: string[];
  outcomes: Record<string, ProposalOutcome>;
  entities: EntityReport[];
  rounds: number;
  error: string | null;
}
