import { describe, it, expect } from 'vitest';
import {
  DEFAULT_FALLBACK_RULE,
  FALLBACK_RULES,
  doubleMemory,
  fallbackRuleFor,
  resolveTarget,
} from '../../../src/fixes/fallback-rules.js';
import { BUILT_IN_PATTERNS } from '../../../src/patterns/built-in-patterns.js';
import { createDiagnosticBundle } from '../../../src/types.js';
import { parseProposal } from '../../../src/fixes/validation.js';

describe('doubleMemory', () => {
  it('doubles known units', () => {
    expect(doubleMemory('256Mi')).toBe('512Mi');
    expect(doubleMemory('1Gi')).toBe('2Gi');
    expect(doubleMemory('0.75Gi')).toBe('1.50Gi');
    expect(doubleMemory('300M')).toBe('600M');
  });

  it('falls back to 512Mi for unknown quantities', () => {
    expect(doubleMemory('lots')).toBe('512Mi');
    expect(doubleMemory('268435456')).toBe('512Mi');
  });
});

describe('resolveTarget', () => {
  it('splits namespace/name entity ids', () => {
    expect(resolveTarget('prod/api')).toEqual({
      namespace: 'prod',
      workloadKind: 'deployment',
      workload: 'api',
      memoryLimit: '256Mi',
      recommendedMemory: '512Mi',
    });
  });

  it('puts bare names in the default namespace', () => {
    expect(resolveTarget('api-1')).toMatchObject({ namespace: 'default', workload: 'api-1' });
  });

  it('prefers bundle attributes', () => {
    const bundle = createDiagnosticBundle('prod/api-7d9f-x2', [], {
      namespace: 'prod',
      workload: 'api',
      workload_kind: 'statefulset',
      memory_limit: '1Gi',
    });
    expect(resolveTarget('prod/api-7d9f-x2', bundle)).toEqual({
      namespace: 'prod',
      workloadKind: 'statefulset',
      workload: 'api',
      memoryLimit: '1Gi',
      recommendedMemory: '2Gi',
    });
  });
});

describe('fallback rules', () => {
  it('covers every built-in pattern with a valid, reversible proposal', () => {
    const target = resolveTarget('prod/api');
    for (const pattern of BUILT_IN_PATTERNS) {
      const rule = fallbackRuleFor(pattern.id);
      expect(FALLBACK_RULES.has(pattern.id)).toBe(true);
      expect(rule.confidence).toBeGreaterThan(0);
      expect(rule.confidence).toBeLessThanOrEqual(0.75);

      const proposal = parseProposal({
        entityId: 'prod/api',
        proposedAction: rule.action(target),
        rollbackAction: rule.rollback(target),
        riskLevel: rule.riskLevel,
        confidence: rule.confidence,
      });
      expect(proposal.rollbackAction.command.length).toBeGreaterThan(0);
    }
  });

  it('uses a MEDIUM restart for unknown patterns', () => {
    expect(fallbackRuleFor('something_else')).toBe(DEFAULT_FALLBACK_RULE);
    expect(DEFAULT_FALLBACK_RULE.riskLevel).toBe('MEDIUM');
    expect(DEFAULT_FALLBACK_RULE.action(resolveTarget('prod/api')).command).toEqual([
      'kubectl', 'rollout', 'restart', 'deployment/api', '-n', 'prod',
    ]);
  });

  it('raises the memory limit and restores it on rollback', () => {
    const rule = fallbackRuleFor('resource_exhaustion');
    const target = resolveTarget('api-1');
    expect(rule.riskLevel).toBe('LOW');
    expect(rule.action(target).command).toEqual([
      'kubectl', 'set', 'resources', 'deployment/api-1', '-n', 'default', '--limits=memory=512Mi',
    ]);
    expect(rule.rollback(target).command).toEqual([
      'kubectl', 'set', 'resources', 'deployment/api-1', '-n', 'default', '--limits=memory=256Mi',
    ]);
  });

  it('marks reverting releases as HIGH risk', () => {
    expect(fallbackRuleFor('fatal_crash').riskLevel).toBe('HIGH');
    expect(fallbackRuleFor('missing_resource').riskLevel).toBe('HIGH');
  });
});
