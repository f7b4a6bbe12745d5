import type {
  DiagnosticSource,
  ExecutionResult,
  HealthCheckResult,
  RemediationExecutor,
} from '../../src/collaborators.js';
import type { DiagnosticBundle, Finding, FixProposal, StructuredCommand } from '../../src/types.js';
import { createDiagnosticBundle } from '../../src/types.js';
import type { NoticeSink, RunNotice } from '../../src/notifier.js';

export function finding(entityId: string, description: string, severity: Finding['severity'] = 'MEDIUM'): Finding {
  return {
    id: `test:${entityId}:${description}`,
    entityId,
    description,
    severity,
    detectedAt: '2026-01-01T00:00:00.000Z',
    toolName: 'test-tool',
  };
}

/**
 * DiagnosticSource over fixed findings and per-entity signals. A scope
 * covers an entity equal to it or below it (`prod` covers `prod/api`);
 * `*` covers everything.
 */
export class FakeSource implements DiagnosticSource {
  readonly collected: string[] = [];
  readonly unhealthy = new Set<string>();

  constructor(
    public findings: Finding[],
    public signals: Record<string, string[]>,
  ) {}

  async identify(scope: string): Promise<Finding[]> {
    return this.findings.filter((f) => scope === '*' || f.entityId === scope || f.entityId.startsWith(`${scope}/`));
  }

  async collect(entityId: string): Promise<DiagnosticBundle> {
    this.collected.push(entityId);
    const signals = this.signals[entityId];
    if (!signals) throw new Error(`no such entity: ${entityId}`);
    return createDiagnosticBundle(entityId, signals);
  }

  async checkHealth(entityId: string): Promise<HealthCheckResult> {
    return this.unhealthy.has(entityId)
      ? { healthy: false, detail: 'still crashing' }
      : { healthy: true, detail: 'ok' };
  }
}

/** Executor that records argv and fails commands containing `failOn`. */
export class FakeExecutor implements RemediationExecutor {
  readonly commands: string[][] = [];

  constructor(private readonly failOn?: string) {}

  async execute(command: StructuredCommand, _proposal: FixProposal): Promise<ExecutionResult> {
    this.commands.push([...command.command]);
    const failed = this.failOn !== undefined && command.command.includes(this.failOn);
    return {
      success: !failed,
      exitCode: failed ? 1 : 0,
      stdout: '',
      stderr: failed ? 'boom' : '',
      durationMs: 1,
      dryRun: false,
    };
  }
}

export class RecordingSink implements NoticeSink {
  readonly notices: RunNotice[] = [];

  constructor(readonly name = 'recording', private readonly failWith?: string) {}

  async deliver(notice: RunNotice): Promise<void> {
    if (this.failWith) throw new Error(this.failWith);
    this.notices.push(notice);
  }
}
