/**
 * @module errors
 * Structured error types, error code registry, and typed subclasses for the
 * remediation workflow.
 *
 * Every error carries a machine-readable code so API clients and the
 * workflow engine can decide recovery without parsing free-text messages.
 */

import type { ApprovalStatus } from './types.js';

// =====================================================================
// Error Code Union & Enums
// =====================================================================

export type RemediationErrorCode =
  | 'VALIDATION_FAILED'
  | 'INVALID_TRANSITION'
  | 'NOT_FOUND'
  | 'BACKEND_UNAVAILABLE'
  | 'EXECUTION_FAILED'
  | 'APPROVAL_TIMEOUT'
  | 'PERSISTENCE_FAILED'
  | 'CONFIG_INVALID';

/** Broad classification of error origin. */
export type ErrorCategory = 'input' | 'state' | 'collaborator' | 'storage';

/** Impact severity guiding recovery strategy. */
export type ErrorSeverity = 'fatal' | 'recoverable' | 'warning';

export interface StructuredError {
  code: RemediationErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
  timestamp: number;
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  defaultSeverity: ErrorSeverity;
  httpStatus: number;
  suggestedActions: string[];
}

export const ERROR_METADATA: ReadonlyMap<RemediationErrorCode, ErrorMetadataEntry> = new Map<RemediationErrorCode, ErrorMetadataEntry>([
  ['VALIDATION_FAILED', {
    category: 'input',
    defaultSeverity: 'recoverable',
    httpStatus: 400,
    suggestedActions: ['Provide a non-empty rollback command', 'Keep confidence within 0.0-1.0', 'Use risk level LOW, MEDIUM or HIGH'],
  }],
  ['INVALID_TRANSITION', {
    category: 'state',
    defaultSeverity: 'recoverable',
    httpStatus: 409,
    suggestedActions: ['Refresh the proposal state', 'Only pending_review proposals can be decided'],
  }],
  ['NOT_FOUND', {
    category: 'input',
    defaultSeverity: 'recoverable',
    httpStatus: 404,
    suggestedActions: ['Check the identifier'],
  }],
  ['BACKEND_UNAVAILABLE', {
    category: 'collaborator',
    defaultSeverity: 'warning',
    httpStatus: 503,
    suggestedActions: ['Check the generator endpoint and API key', 'Fallback rules are used meanwhile'],
  }],
  ['EXECUTION_FAILED', {
    category: 'collaborator',
    defaultSeverity: 'recoverable',
    httpStatus: 502,
    suggestedActions: ['Inspect the command output', 'Verify the rollback completed', 'Check target system credentials'],
  }],
  ['APPROVAL_TIMEOUT', {
    category: 'state',
    defaultSeverity: 'warning',
    httpStatus: 408,
    suggestedActions: ['Start a new run once reviewers are available', 'Increase workflow.approvalTimeout'],
  }],
  ['PERSISTENCE_FAILED', {
    category: 'storage',
    defaultSeverity: 'warning',
    httpStatus: 500,
    suggestedActions: ['Check the graph snapshot path is writable', 'Inspect the snapshot file for corruption'],
  }],
  ['CONFIG_INVALID', {
    category: 'input',
    defaultSeverity: 'fatal',
    httpStatus: 500,
    suggestedActions: ['Fix mendgraph.yaml', 'Run with --config pointing at a valid file'],
  }],
]);

/** Create a complete StructuredError from an error code. */
export function createStructuredError(
  code: RemediationErrorCode,
  message: string,
  details: Record<string, unknown> = {},
  severityOverride?: ErrorSeverity,
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  return {
    code,
    category: metadata?.category ?? 'state',
    severity: severityOverride ?? metadata?.defaultSeverity ?? 'fatal',
    message,
    details,
    suggestedActions: metadata ? [...metadata.suggestedActions] : [],
    timestamp: Date.now(),
  };
}

/** HTTP status associated with an error code. */
export function httpStatusFor(code: RemediationErrorCode): number {
  return ERROR_METADATA.get(code)?.httpStatus ?? 500;
}

// =====================================================================
// Error Classes
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 * Use `toJSON()` for serialization into API responses.
 */
export class RemediationError extends Error {
  public readonly structuredError: StructuredError;

  constructor(
    code: RemediationErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    severityOverride?: ErrorSeverity,
  ) {
    super(message);
    this.name = 'RemediationError';
    this.structuredError = createStructuredError(code, message, details, severityOverride);
  }

  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): RemediationErrorCode {
    return this.structuredError.code;
  }

  get category(): ErrorCategory {
    return this.structuredError.category;
  }

  get severity(): ErrorSeverity {
    return this.structuredError.severity;
  }
}

/** Malformed proposal or request payload. */
export class ValidationError extends RemediationError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('VALIDATION_FAILED', message, { issues });
    this.name = 'ValidationError';
  }
}

/** A decision or lifecycle step attempted from the wrong state. */
export class InvalidTransitionError extends RemediationError {
  constructor(
    public readonly proposalId: string,
    public readonly from: ApprovalStatus,
    public readonly to: ApprovalStatus,
  ) {
    super('INVALID_TRANSITION', `Invalid transition for ${proposalId}: ${from} → ${to}`, { proposalId, from, to });
    this.name = 'InvalidTransitionError';
  }
}

export class NotFoundError extends RemediationError {
  constructor(kind: string, id: string) {
    super('NOT_FOUND', `${kind} not found: ${id}`, { kind, id });
    this.name = 'NotFoundError';
  }
}

/** Generative backend timed out, errored, or returned unusable output. */
export class BackendUnavailableError extends RemediationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('BACKEND_UNAVAILABLE', message, details);
    this.name = 'BackendUnavailableError';
  }
}

export class ExecutionFailureError extends RemediationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('EXECUTION_FAILED', message, details);
    this.name = 'ExecutionFailureError';
  }
}

export class ApprovalTimeoutError extends RemediationError {
  constructor(workflowId: string, timeoutMs: number) {
    super('APPROVAL_TIMEOUT', `No decision for workflow ${workflowId} within ${timeoutMs}ms`, { workflowId, timeoutMs });
    this.name = 'ApprovalTimeoutError';
  }
}

export class PersistenceError extends RemediationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('PERSISTENCE_FAILED', message, details);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends RemediationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIG_INVALID', message, details);
    this.name = 'ConfigError';
  }
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
