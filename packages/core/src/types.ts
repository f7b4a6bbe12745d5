/**
 * @module types
 * Domain records shared across the remediation subsystems.
 */

// ==================== Classification ====================

/** Identifier of a registered causal pattern, e.g. `resource_exhaustion`. */
export type PatternId = string;

/** Pattern id used when no registered predicate matches. */
export const UNKNOWN_PATTERN: PatternId = 'unknown';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

/** Review urgency; drives the approval TTL. */
export type Priority = 'critical' | 'high' | 'medium' | 'low';

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'UNKNOWN';

export const RISK_ORDER: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

/** Map a finding severity onto a review priority. */
export function priorityFromSeverity(severity: string): Priority {
  switch (severity.toUpperCase()) {
    case 'CRITICAL': return 'critical';
    case 'HIGH': return 'high';
    case 'MEDIUM': return 'medium';
    default: return 'low';
  }
}

// ==================== Findings & Diagnostics ====================

/** Structured issue record produced by an external diagnostic tool. */
export interface Finding {
  id: string;
  entityId: string;
  description: string;
  severity: Severity;
  /** ISO-8601 timestamp. */
  detectedAt: string;
  toolName: string;
  /** Set by the caller when the tool already knows the pattern. */
  patternId?: PatternId;
}

/** Immutable evidence collected for one entity during the diagnose step. */
export interface DiagnosticBundle {
  readonly entityId: string;
  readonly rawSignals: readonly string[];
  /** Facts about the entity (namespace, workload, memory_limit, ...). */
  readonly attributes: Readonly<Record<string, string>>;
  readonly collectedAt: string;
}

export const MAX_SIGNALS = 200;
export const MAX_SIGNAL_LENGTH = 2000;

/** Build a frozen bundle, bounding the number and length of signals. */
export function createDiagnosticBundle(
  entityId: string,
  signals: string[],
  attributes: Record<string, string> = {},
  collectedAt: string = new Date().toISOString(),
): DiagnosticBundle {
  const rawSignals = signals
    .filter(s => s.trim().length > 0)
    .slice(-MAX_SIGNALS)
    .map(s => (s.length > MAX_SIGNAL_LENGTH ? s.slice(0, MAX_SIGNAL_LENGTH) : s));

  return Object.freeze({
    entityId,
    rawSignals: Object.freeze(rawSignals),
    attributes: Object.freeze({ ...attributes }),
    collectedAt,
  });
}

// ==================== Proposals ====================

/** A command expressed as an argv vector plus a human description. */
export interface StructuredCommand {
  command: string[];
  description: string;
}

export type ApprovalStatus =
  | 'proposed'
  | 'pending_review'
  | 'approved'
  | 'rejected'
  | 'needs_more_info'
  | 'executing'
  | 'completed'
  | 'failed'
  | 'expired';

export type ProposalSource = 'generated' | 'fallback';

/** A concrete candidate remediation with risk and confidence metadata. */
export interface FixProposal {
  id: string;
  workflowId: string;
  entityId: string;
  rootCause: string;
  proposedAction: StructuredCommand;
  riskLevel: RiskLevel;
  /** 0.0 – 1.0 */
  confidence: number;
  rationale: string;
  rollbackAction: StructuredCommand;
  patternId: PatternId;
  priority: Priority;
  source: ProposalSource;
  status: ApprovalStatus;
}

/** Format a structured command for logs and summaries. */
export function formatCommand(cmd: StructuredCommand): string {
  return cmd.command.map(arg => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
}
