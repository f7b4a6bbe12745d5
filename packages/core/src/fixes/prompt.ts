/**
 * @module fixes/prompt
 * Prompt text for the generative backend.
 */

import type { DiagnosticBundle, PatternId } from '../types.js';
import type { SimilarityHit } from '../collaborators.js';

export interface PriorFix {
  fixId: string;
  command: string;
  description: string;
  successCount: number;
  attemptCount: number;
}

export interface FixContext {
  priorFixes: PriorFix[];
  similarCases: SimilarityHit[];
}

const SIGNAL_TAIL = 20;

export function buildFixPrompt(patternId: PatternId, bundle: DiagnosticBundle, context: FixContext): string {
  const lines: string[] = [
    'You propose one remediation for an operational incident.',
    `Entity: ${bundle.entityId}`,
    `Detected pattern: ${patternId}`,
  ];

  const attrs = Object.entries(bundle.attributes);
  if (attrs.length > 0) {
    lines.push('Attributes:');
    for (const [key, value] of attrs) lines.push(`  ${key}: ${value}`);
  }

  lines.push('Recent signals:');
  for (const signal of bundle.rawSignals.slice(-SIGNAL_TAIL)) lines.push(`  ${signal}`);

  if (context.priorFixes.length > 0) {
    lines.push('Fixes applied before for this pattern:');
    for (const fix of context.priorFixes) {
      lines.push(`  ${fix.command} (${fix.successCount}/${fix.attemptCount} successful)`);
    }
  }

  if (context.similarCases.length > 0) {
    lines.push('Similar past cases:');
    for (const hit of context.similarCases) lines.push(`  - ${hit.text}`);
  }

  lines.push(
    'Reply with JSON only:',
    '{"rootCause": string, "action": {"command": string[], "description": string},',
    ' "rollback": {"command": string[], "description": string},',
    ' "riskLevel": "LOW" | "MEDIUM" | "HIGH", "rationale": string}',
    'The rollback command must undo the action.',
  );
  return lines.join('\n');
}
