import type { FixProposal } from '../../src/types.js';

/** A valid LOW-risk proposal; override any field. */
export function makeProposal(overrides: Partial<FixProposal> = {}): FixProposal {
  return {
    id: 'p-1',
    workflowId: 'wf-1',
    entityId: 'prod/api',
    rootCause: 'Memory limit too low',
    proposedAction: { command: ['kubectl', 'set', 'resources', 'deployment/api', '--limits=memory=512Mi'], description: 'Raise memory' },
    riskLevel: 'LOW',
    confidence: 0.75,
    rationale: 'OOM kills',
    rollbackAction: { command: ['kubectl', 'set', 'resources', 'deployment/api', '--limits=memory=256Mi'], description: 'Restore memory' },
    patternId: 'resource_exhaustion',
    priority: 'medium',
    source: 'fallback',
    status: 'proposed',
    ...overrides,
  };
}
