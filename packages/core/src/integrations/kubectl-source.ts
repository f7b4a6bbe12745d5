/**
 * @module integrations/kubectl-source
 * DiagnosticSource backed by kubectl.
 *
 * - identify(namespace): pods whose containers are waiting or were last
 *   terminated for a failure reason, or that were evicted
 * - collect(namespace/pod): status, owning workload, memory limit, recent
 *   logs and events
 * - checkHealth(namespace/pod): `rollout status` of the owning workload,
 *   or the pod's readiness when it has no owner
 */

import { z } from 'zod';
import type { DiagnosticSource, HealthCheckResult } from '../collaborators.js';
import type { DiagnosticBundle, Finding, Severity } from '../types.js';
import { createDiagnosticBundle } from '../types.js';
import { ValidationError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CommandRunner } from './command-runner.js';
import { spawnCommand } from './command-runner.js';

// =====================================================================
// kubectl JSON subsets
// =====================================================================

const ContainerStateSchema = z.object({
  waiting: z.object({ reason: z.string().optional(), message: z.string().optional() }).optional(),
  terminated: z.object({
    reason: z.string().optional(),
    message: z.string().optional(),
    exitCode: z.number().optional(),
  }).optional(),
}).default({});

const ContainerStatusSchema = z.object({
  name: z.string(),
  ready: z.boolean().default(false),
  restartCount: z.number().default(0),
  state: ContainerStateSchema,
  lastState: ContainerStateSchema,
});

const PodSchema = z.object({
  metadata: z.object({
    name: z.string(),
    namespace: z.string().default('default'),
    ownerReferences: z.array(z.object({ kind: z.string(), name: z.string() })).default([]),
  }),
  spec: z.object({
    containers: z.array(z.object({
      name: z.string(),
      resources: z.object({
        limits: z.record(z.string()).optional(),
      }).default({}),
    })).default([]),
  }).default({}),
  status: z.object({
    phase: z.string().optional(),
    reason: z.string().optional(),
    message: z.string().optional(),
    containerStatuses: z.array(ContainerStatusSchema).default([]),
  }).default({}),
});

type Pod = z.infer<typeof PodSchema>;

const PodListSchema = z.object({ items: z.array(PodSchema) });

const EventListSchema = z.object({
  items: z.array(z.object({
    type: z.string().optional(),
    reason: z.string().optional(),
    message: z.string().optional(),
  })),
});

// =====================================================================
// Classification helpers
// =====================================================================

const WAITING_FAILURES = new Set(['CrashLoopBackOff', 'ImagePullBackOff', 'ErrImagePull', 'CreateContainerConfigError', 'RunContainerError']);
const TERMINATED_FAILURES = new Set(['OOMKilled', 'Error', 'ContainerCannotRun']);

const SEVERITY_BY_REASON: Record<string, Severity> = {
  OOMKilled: 'HIGH',
  CrashLoopBackOff: 'HIGH',
  Evicted: 'MEDIUM',
  ImagePullBackOff: 'MEDIUM',
  ErrImagePull: 'MEDIUM',
  CreateContainerConfigError: 'MEDIUM',
};

interface PodProblem {
  container: string;
  reason: string;
  message: string;
  restarts: number;
}

export function podProblems(pod: Pod): PodProblem[] {
  const problems: PodProblem[] = [];
  if (pod.status.reason === 'Evicted') {
    problems.push({ container: '', reason: 'Evicted', message: pod.status.message ?? '', restarts: 0 });
  }
  for (const cs of pod.status.containerStatuses) {
    const waiting = cs.state.waiting;
    const terminated = cs.lastState.terminated ?? cs.state.terminated;
    if (waiting?.reason && WAITING_FAILURES.has(waiting.reason)) {
      problems.push({ container: cs.name, reason: waiting.reason, message: waiting.message ?? '', restarts: cs.restartCount });
    }
    if (terminated?.reason && TERMINATED_FAILURES.has(terminated.reason)) {
      problems.push({
        container: cs.name,
        reason: terminated.reason,
        message: terminated.message ?? `exit code ${terminated.exitCode ?? 'unknown'}`,
        restarts: cs.restartCount,
      });
    }
  }
  return problems;
}

/** Owning workload, resolving a ReplicaSet `name-<hash>` to its Deployment. */
export function owningWorkload(pod: Pod): { kind: string; name: string } | undefined {
  const owner = pod.metadata.ownerReferences[0];
  if (!owner) return undefined;
  if (owner.kind === 'ReplicaSet') {
    const cut = owner.name.lastIndexOf('-');
    return { kind: 'deployment', name: cut > 0 ? owner.name.slice(0, cut) : owner.name };
  }
  return { kind: owner.kind.toLowerCase(), name: owner.name };
}

function splitEntity(entityId: string): { namespace: string; pod: string } {
  const slash = entityId.indexOf('/');
  if (slash <= 0 || slash === entityId.length - 1) {
    throw new ValidationError(`Entity must be "namespace/pod": ${entityId}`);
  }
  return { namespace: entityId.slice(0, slash), pod: entityId.slice(slash + 1) };
}

// =====================================================================
// KubectlDiagnosticSource
// =====================================================================

export interface KubectlDiagnosticSourceOptions {
  /** Default: `kubectl` */
  kubectl?: string;
  runner?: CommandRunner;
  /** Log lines collected per pod. Default: 100 */
  logTail?: number;
  /** Per-command timeout. Default: 30000 */
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export class KubectlDiagnosticSource implements DiagnosticSource {
  private readonly kubectl: string;
  private readonly runner: CommandRunner;
  private readonly logTail: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  /** entity → owning workload, remembered from collect() for health checks */
  private readonly owners = new Map<string, { kind: string; name: string }>();

  constructor(options: KubectlDiagnosticSourceOptions = {}) {
    this.kubectl = options.kubectl ?? 'kubectl';
    this.runner = options.runner ?? spawnCommand;
    this.logTail = options.logTail ?? 100;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Findings for failing pods in a namespace (`*` for all namespaces). */
  async identify(scope: string): Promise<Finding[]> {
    const nsArgs = scope === '*' ? ['--all-namespaces'] : ['-n', scope];
    const list = PodListSchema.parse(await this.json(['get', 'pods', ...nsArgs, '-o', 'json']));
    const detectedAt = this.now().toISOString();

    const findings: Finding[] = [];
    for (const pod of list.items) {
      const entityId = `${pod.metadata.namespace}/${pod.metadata.name}`;
      for (const problem of podProblems(pod)) {
        const where = problem.container ? `${problem.container}: ` : '';
        findings.push({
          id: `kubectl:${entityId}:${problem.container}:${problem.reason}:${problem.restarts}`,
          entityId,
          description: `${where}${problem.reason}${problem.message ? ` - ${problem.message}` : ''}`,
          severity: SEVERITY_BY_REASON[problem.reason] ?? 'LOW',
          detectedAt,
          toolName: 'kubectl',
        });
      }
    }
    this.logger.info(`${findings.length} finding(s) in ${scope}`);
    return findings;
  }

  async collect(entityId: string): Promise<DiagnosticBundle> {
    const { namespace, pod: podName } = splitEntity(entityId);
    const pod = PodSchema.parse(await this.json(['get', 'pod', podName, '-n', namespace, '-o', 'json']));

    const attributes: Record<string, string> = { namespace, pod: podName };
    if (pod.status.phase) attributes['phase'] = pod.status.phase;
    const memory = pod.spec.containers.find((c) => c.resources.limits?.['memory'])?.resources.limits?.['memory'];
    if (memory) attributes['memory_limit'] = memory;
    const owner = owningWorkload(pod);
    if (owner) {
      attributes['workload_kind'] = owner.kind;
      attributes['workload'] = owner.name;
      this.owners.set(entityId, owner);
    }

    const signals: string[] = [];
    for (const problem of podProblems(pod)) {
      signals.push(`${problem.container || 'pod'}: ${problem.reason} ${problem.message}`.trim());
    }
    for (const cs of pod.status.containerStatuses) {
      const exitCode = cs.lastState.terminated?.exitCode;
      if (exitCode !== undefined) {
        attributes['exit_code'] = String(exitCode);
        signals.push(`${cs.name}: last exit code ${exitCode}`);
      }
      attributes['restart_count'] = String(cs.restartCount);
    }

    signals.push(...await this.optionalLines(['logs', podName, '-n', namespace, `--tail=${this.logTail}`, '--all-containers']));
    const events = await this.optionalJson(['get', 'events', '-n', namespace, '--field-selector', `involvedObject.name=${podName}`, '-o', 'json']);
    const parsedEvents = EventListSchema.safeParse(events);
    if (parsedEvents.success) {
      for (const ev of parsedEvents.data.items) {
        signals.push(`event ${ev.type ?? ''} ${ev.reason ?? ''}: ${ev.message ?? ''}`.replace(/\s+/g, ' ').trim());
      }
    }

    return createDiagnosticBundle(entityId, signals, attributes, this.now().toISOString());
  }

  async checkHealth(entityId: string): Promise<HealthCheckResult> {
    const { namespace, pod } = splitEntity(entityId);
    const owner = this.owners.get(entityId);

    if (owner) {
      const ref = `${owner.kind}/${owner.name}`;
      const out = await this.runner([this.kubectl, 'rollout', 'status', ref, '-n', namespace, '--timeout=60s'], { timeoutMs: this.timeoutMs + 60_000 });
      return out.exitCode === 0
        ? { healthy: true, detail: `${ref} rolled out` }
        : { healthy: false, detail: `${ref} not healthy: ${(out.stderr || out.stdout).trim()}` };
    }

    try {
      const parsed = PodSchema.parse(await this.json(['get', 'pod', pod, '-n', namespace, '-o', 'json']));
      const ready = parsed.status.containerStatuses.length > 0 && parsed.status.containerStatuses.every((c) => c.ready);
      return ready && parsed.status.phase === 'Running'
        ? { healthy: true, detail: `${entityId} running and ready` }
        : { healthy: false, detail: `${entityId} phase ${parsed.status.phase ?? 'unknown'}, ready=${ready}` };
    } catch (err) {
      return { healthy: false, detail: `${entityId} unavailable: ${errorMessage(err)}` };
    }
  }

  // ---- kubectl plumbing ----

  private async json(args: string[]): Promise<unknown> {
    const out = await this.runner([this.kubectl, ...args], { timeoutMs: this.timeoutMs });
    if (out.exitCode !== 0) {
      throw new Error(`kubectl ${args.slice(0, 2).join(' ')} failed: ${out.stderr.trim() || `exit ${out.exitCode}`}`);
    }
    return JSON.parse(out.stdout);
  }

  private async optionalJson(args: string[]): Promise<unknown> {
    try {
      return await this.json(args);
    } catch (err) {
      this.logger.debug(`Optional kubectl call failed: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private async optionalLines(args: string[]): Promise<string[]> {
    const out = await this.runner([this.kubectl, ...args], { timeoutMs: this.timeoutMs });
    if (out.exitCode !== 0) {
      this.logger.debug(`kubectl ${args[0] ?? ''} failed: ${out.stderr.trim()}`);
      return [];
    }
    return out.stdout.split('\n').filter((line) => line.trim().length > 0);
  }
}
