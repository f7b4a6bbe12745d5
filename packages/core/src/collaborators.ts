/**
 * @module collaborators
 * Boundaries to the outside world. The engine and generator depend only on
 * these interfaces; concrete adapters live under `integrations/` and
 * `learning/`.
 */

import type { DiagnosticBundle, Finding, FixProposal, StructuredCommand } from './types.js';

// ==================== Diagnostics ====================

export interface HealthCheckResult {
  healthy: boolean;
  detail: string;
}

/** Produces findings for a scope and evidence for individual entities. */
export interface DiagnosticSource {
  identify(scope: string): Promise<Finding[]>;
  collect(entityId: string): Promise<DiagnosticBundle>;
  checkHealth(entityId: string): Promise<HealthCheckResult>;
}

// ==================== Text generation ====================

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface TextGenerator {
  generate(prompt: string, temperature: number, options?: GenerateOptions): Promise<string>;
}

// ==================== Similarity ====================

export interface SimilarityDocument {
  id: string;
  text: string;
  metadata: Record<string, string>;
}

export interface SimilarityHit extends SimilarityDocument {
  /** Higher is more similar; 0 – 1. */
  score: number;
}

export interface SimilaritySearch {
  search(query: string, topK: number): Promise<SimilarityHit[]>;
}

export interface SimilarityIndex extends SimilaritySearch {
  /** Insert or replace a document by id. */
  add(doc: SimilarityDocument): Promise<void>;
}

// ==================== Execution ====================

export interface ExecutionResult {
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  dryRun: boolean;
}

export interface RemediationExecutor {
  execute(command: StructuredCommand, proposal: FixProposal): Promise<ExecutionResult>;
}
