/**
 * @module fixes/fallback-rules
 * Deterministic remediation table used when no generative backend is
 * configured or its answer is unusable. Entries are conservative: confidence
 * never exceeds 0.75 and anything beyond a resource bump needs MEDIUM or
 * HIGH risk review.
 */

import type { DiagnosticBundle, PatternId, RiskLevel, StructuredCommand } from '../types.js';

/** Values substituted into fallback commands. */
export interface FixTarget {
  namespace: string;
  workloadKind: string;
  workload: string;
  memoryLimit: string;
  recommendedMemory: string;
}

export interface FallbackRule {
  riskLevel: RiskLevel;
  confidence: number;
  rootCause: string;
  rationale: string;
  action(target: FixTarget): StructuredCommand;
  rollback(target: FixTarget): StructuredCommand;
}

export const DEFAULT_MEMORY_LIMIT = '256Mi';
const FALLBACK_RECOMMENDED_MEMORY = '512Mi';

/** Double a Kubernetes memory quantity (`256Mi` → `512Mi`); unknown units give `512Mi`. */
export function doubleMemory(limit: string): string {
  const match = limit.trim().match(/^(\d+(?:\.\d+)?)(Ki|Mi|Gi|K|M|G)$/);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined) return FALLBACK_RECOMMENDED_MEMORY;
  const doubled = parseFloat(amount) * 2;
  return `${Number.isInteger(doubled) ? doubled : doubled.toFixed(2)}${unit}`;
}

/**
 * Resolve placeholders from bundle attributes, falling back to the entity
 * id: `namespace/name` splits into both, a bare name lands in `default`.
 */
export function resolveTarget(entityId: string, bundle?: DiagnosticBundle): FixTarget {
  const attrs = bundle?.attributes ?? {};
  const slash = entityId.indexOf('/');
  const idNamespace = slash > 0 ? entityId.slice(0, slash) : undefined;
  const idName = slash >= 0 ? entityId.slice(slash + 1) : entityId;

  const memoryLimit = attrs['memory_limit'] || DEFAULT_MEMORY_LIMIT;
  return {
    namespace: attrs['namespace'] || idNamespace || 'default',
    workloadKind: attrs['workload_kind'] || 'deployment',
    workload: attrs['workload'] || idName,
    memoryLimit,
    recommendedMemory: doubleMemory(memoryLimit),
  };
}

const ref = (t: FixTarget): string => `${t.workloadKind}/${t.workload}`;

const rolloutRestart = (t: FixTarget): StructuredCommand => ({
  command: ['kubectl', 'rollout', 'restart', ref(t), '-n', t.namespace],
  description: `Restart ${ref(t)} in ${t.namespace}`,
});

const rolloutUndo = (t: FixTarget): StructuredCommand => ({
  command: ['kubectl', 'rollout', 'undo', ref(t), '-n', t.namespace],
  description: `Roll ${ref(t)} in ${t.namespace} back to its previous revision`,
});

export const FALLBACK_RULES: ReadonlyMap<PatternId, FallbackRule> = new Map<PatternId, FallbackRule>([
  ['resource_exhaustion', {
    riskLevel: 'LOW',
    confidence: 0.75,
    rootCause: 'Container exceeded its memory limit and was killed',
    rationale: 'Doubling the memory limit addresses OOM kills; the previous limit is restored on rollback.',
    action: (t) => ({
      command: ['kubectl', 'set', 'resources', ref(t), '-n', t.namespace, `--limits=memory=${t.recommendedMemory}`],
      description: `Raise memory limit of ${ref(t)} from ${t.memoryLimit} to ${t.recommendedMemory}`,
    }),
    rollback: (t) => ({
      command: ['kubectl', 'set', 'resources', ref(t), '-n', t.namespace, `--limits=memory=${t.memoryLimit}`],
      description: `Restore memory limit of ${ref(t)} to ${t.memoryLimit}`,
    }),
  }],
  ['dependency_unavailable', {
    riskLevel: 'MEDIUM',
    confidence: 0.5,
    rootCause: 'An upstream dependency was unreachable',
    rationale: 'A restart re-resolves and reconnects to dependencies once they are back.',
    action: rolloutRestart,
    rollback: rolloutUndo,
  }],
  ['port_conflict', {
    riskLevel: 'MEDIUM',
    confidence: 0.5,
    rootCause: 'The listening port was already in use',
    rationale: 'A restart releases ports held by stale processes in the pod.',
    action: rolloutRestart,
    rollback: rolloutUndo,
  }],
  ['fatal_crash', {
    riskLevel: 'HIGH',
    confidence: 0.4,
    rootCause: 'The process crashes repeatedly on start',
    rationale: 'Reverting to the previous revision removes a likely faulty release.',
    action: rolloutUndo,
    rollback: rolloutUndo,
  }],
  ['missing_resource', {
    riskLevel: 'HIGH',
    confidence: 0.35,
    rootCause: 'A referenced image, config, secret or volume is missing',
    rationale: 'Reverting to the previous revision restores references that existed.',
    action: rolloutUndo,
    rollback: rolloutUndo,
  }],
  ['permission_denied', {
    riskLevel: 'HIGH',
    confidence: 0.3,
    rootCause: 'The workload lacks permissions for an operation',
    rationale: 'A restart remounts refreshed credentials; RBAC changes still need manual review.',
    action: rolloutRestart,
    rollback: rolloutUndo,
  }],
]);

export const DEFAULT_FALLBACK_RULE: FallbackRule = {
  riskLevel: 'MEDIUM',
  confidence: 0.3,
  rootCause: 'Unclassified failure',
  rationale: 'No specific remediation is known; a restart is the least invasive action.',
  action: rolloutRestart,
  rollback: rolloutUndo,
};

export function fallbackRuleFor(patternId: PatternId): FallbackRule {
  return FALLBACK_RULES.get(patternId) ?? DEFAULT_FALLBACK_RULE;
}
