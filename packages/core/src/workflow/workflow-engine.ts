/**
 * @module workflow/workflow-engine
 * WorkflowEngine - drives one remediation run per incident through
 *
 *   identify → diagnose → query_knowledge → generate_fixes →
 *   await_approval → execute → validate → learn → done
 *
 * Runs are independent and concurrent. Only `await_approval` suspends for
 * long, and every wait is bounded, so a run always reaches `done`.
 * `learn` runs on every path, including errors and cancellation.
 */

import { randomUUID } from 'node:crypto';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import type { PatternDetector } from '../patterns/pattern-detector.js';
import type { FixGenerator } from '../fixes/fix-generator.js';
import type { FixContext } from '../fixes/prompt.js';
import { validateProposal } from '../fixes/validation.js';
import type { ApprovalQueue } from '../approval/approval-queue.js';
import { SYSTEM_ACTOR, workflowChannel } from '../approval/approval-queue.js';
import type { LearningStore } from '../learning/learning-store.js';
import type {
  DiagnosticSource,
  ExecutionResult,
  HealthCheckResult,
  RemediationExecutor,
} from '../collaborators.js';
import type { DiagnosticBundle, FixProposal, PatternId, Priority, StructuredCommand } from '../types.js';
import { priorityFromSeverity } from '../types.js';
import type { Notifier } from '../notifier.js';
import type { EventBus } from '../sse-bus.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import {
  ApprovalTimeoutError,
  ExecutionFailureError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import type {
  EntityReport,
  ProposalOutcome,
  RollbackOutcome,
  RunResult,
  WorkflowRun,
  WorkflowState,
} from './types.js';

export const RUNS_CHANNEL = 'runs';

const PRIORITY_RANK: Record<Priority, number> = { low: 0, medium: 1, high: 2, critical: 3 };

export interface WorkflowEngineOptions {
  graph: KnowledgeGraph;
  detector: PatternDetector;
  generator: FixGenerator;
  queue: ApprovalQueue;
  learning: LearningStore;
  source: DiagnosticSource;
  executor: RemediationExecutor;
  notifier?: Notifier;
  /** Run events are published here. Default: the queue's bus. */
  bus?: EventBus;
  logger?: Logger;
  /** Default: 300000 */
  approvalTimeoutMs?: number;
  /** Default: 5000 */
  pollIntervalMs?: number;
  /** Default: 10000 */
  settleDelayMs?: number;
  /** Default: 3 */
  maxRounds?: number;
  /** Finished runs kept for `get`/`list`; older ones are forgotten. Default: 100 */
  retainRuns?: number;
}

interface ExecutionInfo {
  executed: boolean;
  healthy: boolean | null;
  rollback: RollbackOutcome;
  detail: string;
}

interface RunEntry {
  run: WorkflowRun;
  promise: Promise<WorkflowRun>;
  controller: AbortController;
  /** False once execution has begun. */
  cancellable: boolean;
  executions: Map<string, ExecutionInfo>;
}

/** Entities to diagnose, each with the patterns to propose for; `null` means every detected pattern. */
type DiagnoseTargets = Map<string, Set<PatternId> | null>;

interface Diagnosis {
  entityId: string;
  bundle: DiagnosticBundle;
  contexts: Map<PatternId, FixContext>;
}

type WaitOutcome = 'decided' | 'timeout' | 'cancelled';

class RunCancelled extends Error {
  constructor() {
    super('Run cancelled');
    this.name = 'RunCancelled';
  }
}

function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class WorkflowEngine {
  private readonly runs = new Map<string, RunEntry>();
  private readonly graph: KnowledgeGraph;
  private readonly detector: PatternDetector;
  private readonly generator: FixGenerator;
  private readonly queue: ApprovalQueue;
  private readonly learning: LearningStore;
  private readonly source: DiagnosticSource;
  private readonly executor: RemediationExecutor;
  private readonly notifier?: Notifier;
  private readonly bus: EventBus;
  private readonly logger: Logger;
  private readonly approvalTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly settleDelayMs: number;
  private readonly maxRounds: number;
  private readonly retainRuns: number;

  constructor(options: WorkflowEngineOptions) {
    this.graph = options.graph;
    this.detector = options.detector;
    this.generator = options.generator;
    this.queue = options.queue;
    this.learning = options.learning;
    this.source = options.source;
    this.executor = options.executor;
    this.notifier = options.notifier;
    this.bus = options.bus ?? options.queue.bus;
    this.logger = options.logger ?? silentLogger;
    this.approvalTimeoutMs = options.approvalTimeoutMs ?? 300_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.settleDelayMs = options.settleDelayMs ?? 10_000;
    this.maxRounds = Math.max(1, options.maxRounds ?? 3);
    this.retainRuns = Math.max(1, options.retainRuns ?? 100);
  }

  // =====================================================================
  // Public API
  // =====================================================================

  /** Begin a run and return immediately. */
  start(scope: string): WorkflowRun {
    if (!scope.trim()) throw new ValidationError('scope is required');

    const run: WorkflowRun = {
      id: `wf-${randomUUID()}`,
      scope,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      state: 'identify',
      status: 'running',
      result: null,
      proposals: [],
      outcomes: {},
      entities: [],
      rounds: 0,
      error: null,
    };
    const entry: RunEntry = {
      run,
      promise: Promise.resolve(run),
      controller: new AbortController(),
      cancellable: true,
      executions: new Map(),
    };
    this.runs.set(run.id, entry);
    entry.promise = this.execute(entry);
    return this.snapshot(run);
  }

  /** Resolve once the run is done. @throws {NotFoundError} */
  async waitFor(runId: string): Promise<WorkflowRun> {
    return this.requireEntry(runId).promise;
  }

  get(runId: string): WorkflowRun | undefined {
    const entry = this.runs.get(runId);
    return entry ? this.snapshot(entry.run) : undefined;
  }

  list(): WorkflowRun[] {
    return [...this.runs.values()].map((e) => this.snapshot(e.run));
  }

  /**
   * Cancel a run that has not started executing. Its pending and approved
   * proposals are rejected with feedback `cancelled`.
   * @returns false when the run is done or already executing
   * @throws {NotFoundError}
   */
  async cancel(runId: string): Promise<boolean> {
    const entry = this.requireEntry(runId);
    if (entry.run.status === 'done' || !entry.cancellable) return false;
    entry.controller.abort();
    await this.queue.cancelWorkflow(runId);
    this.logger.info(`Run ${runId} cancelled`);
    return true;
  }

  // =====================================================================
  // Run driver
  // =====================================================================

  private async execute(entry: RunEntry): Promise<WorkflowRun> {
    const { run } = entry;
    this.logger.info(`Run ${run.id} started for ${run.scope}`);
    this.publish(run, 'run_started', { scope: run.scope });

    let result: RunResult;
    try {
      result = await this.drive(entry);
    } catch (err) {
      if (err instanceof RunCancelled) {
        result = 'cancelled';
      } else {
        result = 'error';
        run.error = errorMessage(err);
        this.logger.error(`Run ${run.id} failed in ${run.state}: ${run.error}`);
        await this.closeOpenProposals(run.id);
      }
    }

    await this.learn(entry);
    this.finish(entry, result);
    return this.snapshot(run);
  }

  private async drive(entry: RunEntry): Promise<RunResult> {
    const { run } = entry;
    const signal = entry.controller.signal;

    // ---- identify ----
    this.setState(entry, 'identify');
    const findings = await this.source.identify(run.scope);
    this.throwIfCancelled(signal);
    if (findings.length === 0) {
      this.logger.info(`Run ${run.id}: no findings in ${run.scope}`);
      return 'no_action';
    }

    const priorities = new Map<string, Priority>();
    for (const finding of findings) {
      const patternId = finding.patternId ?? this.detector.primaryPattern(finding.description);
      this.graph.addFinding({ ...finding, patternId });
      const priority = priorityFromSeverity(finding.severity);
      const current = priorities.get(finding.entityId);
      if (!current || PRIORITY_RANK[priority] > PRIORITY_RANK[current]) {
        priorities.set(finding.entityId, priority);
      }
    }

    let targets: DiagnoseTargets = new Map<string, Set<PatternId> | null>([...priorities.keys()].map((id): [string, null] => [id, null]));
    for (let round = 1; ; round++) {
      run.rounds = round;
      const submitted = await this.propose(entry, targets, priorities, round);
      if (submitted.length === 0) {
        if (round === 1) return 'no_action';
        break;
      }

      // ---- await_approval ----
      this.setState(entry, 'await_approval');
      const outcome = await this.awaitDecisions(run.id, signal);
      if (outcome === 'cancelled') throw new RunCancelled();
      if (outcome === 'timeout') {
        const timeout = new ApprovalTimeoutError(run.id, this.approvalTimeoutMs);
        const expired = await this.queue.expireWorkflow(run.id, 'approval timeout');
        run.error = timeout.message;
        this.logger.warn(`Run ${run.id}: ${timeout.message}, expired ${expired.length} proposal(s)`);
        return 'timeout';
      }

      if (this.queue.status(run.id).anyRejected) {
        await this.queue.cancelWorkflow(run.id, SYSTEM_ACTOR, 'another proposal of this run was rejected');
        this.logger.info(`Run ${run.id}: rejected by reviewer, nothing executed`);
        return 'rejected';
      }

      const moreInfo = this.queue
        .listByWorkflow(run.id)
        .filter((r) => submitted.includes(r.proposal.id) && r.status === 'needs_more_info');
      if (moreInfo.length === 0) break;
      if (round >= this.maxRounds) {
        this.logger.warn(`Run ${run.id}: still needs more info after ${round} round(s)`);
        break;
      }
      // Only the patterns a reviewer asked about; approved proposals stay as they are.
      targets = new Map();
      for (const record of moreInfo) {
        const patterns = targets.get(record.proposal.entityId) ?? new Set<PatternId>();
        patterns.add(record.proposal.patternId);
        targets.set(record.proposal.entityId, patterns);
      }
      this.logger.info(`Run ${run.id}: re-diagnosing ${[...targets.keys()].join(', ')}`);
    }

    // ---- execute ----
    this.throwIfCancelled(signal);
    const approved = this.queue.listByWorkflow(run.id).filter((r) => r.status === 'approved');
    if (approved.length === 0) return 'no_action';
    entry.cancellable = false;

    this.setState(entry, 'execute');
    const executed: FixProposal[] = [];
    for (const record of approved) {
      const proposal = record.proposal;
      try {
        await this.queue.markExecuting(proposal.id);
      } catch (err) {
        this.logger.warn(`Skipping ${proposal.id}: ${errorMessage(err)}`);
        continue;
      }

      const result = await this.runCommand(proposal.proposedAction, proposal);
      if (result.success) {
        executed.push(proposal);
        entry.executions.set(proposal.id, { executed: true, healthy: null, rollback: 'not_needed', detail: 'executed' });
      } else {
        const failure = new ExecutionFailureError(
          `command failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`,
          { proposalId: proposal.id, exitCode: result.exitCode },
        );
        this.logger.warn(`Run ${run.id}: ${proposal.id} ${failure.message}`);
        const rollback = await this.rollback(proposal);
        await this.queue.completeExecution(proposal.id, false, failure.message);
        entry.executions.set(proposal.id, { executed: true, healthy: null, rollback, detail: failure.message });
      }
    }

    // ---- validate ----
    if (executed.length > 0) {
      this.setState(entry, 'validate');
      await delay(this.settleDelayMs);
      const health = new Map<string, HealthCheckResult>();
      for (const proposal of executed) {
        let check = health.get(proposal.entityId);
        if (!check) {
          check = await this.checkHealth(proposal.entityId);
          health.set(proposal.entityId, check);
        }
        if (check.healthy) {
          await this.queue.completeExecution(proposal.id, true, check.detail);
          entry.executions.set(proposal.id, { executed: true, healthy: true, rollback: 'not_needed', detail: check.detail });
        } else {
          const rollback = await this.rollback(proposal);
          await this.queue.completeExecution(proposal.id, false, check.detail);
          entry.executions.set(proposal.id, { executed: true, healthy: false, rollback, detail: check.detail });
        }
      }
    }

    const finished = this.queue.listByWorkflow(run.id).filter((r) => entry.executions.has(r.proposal.id));
    const completed = finished.filter((r) => r.status === 'completed').length;
    const failed = finished.filter((r) => r.status === 'failed').length;
    if (completed + failed === 0) return 'no_action';
    return failed === 0 ? 'completed' : completed === 0 ? 'failed' : 'partial_failure';
  }

  /** diagnose → query_knowledge → generate_fixes → submit. @returns submitted proposal ids */
  private async propose(
    entry: RunEntry,
    targets: ReadonlyMap<string, ReadonlySet<PatternId> | null>,
    priorities: ReadonlyMap<string, Priority>,
    round: number,
  ): Promise<string[]> {
    const { run } = entry;
    const signal = entry.controller.signal;

    // ---- diagnose ----
    this.setState(entry, 'diagnose');
    const diagnosed: Diagnosis[] = [];
    for (const [entityId, wanted] of targets) {
      this.throwIfCancelled(signal);
      let bundle: DiagnosticBundle;
      try {
        bundle = await this.source.collect(entityId);
      } catch (err) {
        this.logger.warn(`Run ${run.id}: cannot collect diagnostics for ${entityId}: ${errorMessage(err)}`);
        this.report(run, { entityId, patterns: [], outcome: 'collect_failed', round });
        continue;
      }
      const patterns = [...this.detector.detect(bundle)].filter((p) => !wanted || wanted.has(p));
      if (patterns.length === 0) {
        this.logger.info(`Run ${run.id}: no known pattern for ${entityId}, manual investigation needed`);
        this.report(run, { entityId, patterns: [], outcome: 'manual_investigation', round });
        continue;
      }
      diagnosed.push({ entityId, bundle, contexts: new Map(patterns.map((p): [PatternId, FixContext] => [p, { priorFixes: [], similarCases: [] }])) });
    }

    // ---- query_knowledge ----
    this.setState(entry, 'query_knowledge');
    for (const diagnosis of diagnosed) {
      for (const patternId of diagnosis.contexts.keys()) {
        this.throwIfCancelled(signal);
        const context = await this.generator.gatherContext(patternId, diagnosis.bundle);
        diagnosis.contexts.set(patternId, context);
        this.logger.debug(`Run ${run.id}: ${patternId} has ${context.priorFixes.length} prior fix(es), ${context.similarCases.length} similar case(s)`);
      }
    }

    // ---- generate_fixes ----
    this.setState(entry, 'generate_fixes');
    const proposals: FixProposal[] = [];
    for (const diagnosis of diagnosed) {
      let valid = 0;
      for (const [patternId, context] of diagnosis.contexts) {
        this.throwIfCancelled(signal);
        const proposal = await this.generator.generate({
          entityId: diagnosis.entityId,
          bundle: diagnosis.bundle,
          patternId,
          workflowId: run.id,
          priority: priorities.get(diagnosis.entityId) ?? 'medium',
          context,
        });
        try {
          validateProposal(proposal);
          proposals.push(proposal);
          valid++;
        } catch (err) {
          this.logger.warn(`Run ${run.id}: dropping invalid proposal for ${diagnosis.entityId}: ${errorMessage(err)}`);
        }
      }
      this.report(run, {
        entityId: diagnosis.entityId,
        patterns: [...diagnosis.contexts.keys()],
        outcome: valid > 0 ? 'proposed' : 'no_valid_proposal',
        round,
      });
    }

    if (proposals.length === 0) return [];
    this.throwIfCancelled(signal);
    const records = this.queue.submit(run.id, proposals);
    const ids = records.map((r) => r.proposal.id);
    run.proposals.push(...ids);

    this.notifier?.reviewRequested(run, ids).catch((err: unknown) => {
      this.logger.warn(`Review notification failed: ${errorMessage(err)}`);
    });
    return ids;
  }

  /**
   * Wait until nothing of the workflow is pending or something is rejected.
   * Woken by queue events, re-checked every poll interval, bounded by the
   * approval timeout.
   */
  private awaitDecisions(workflowId: string, signal: AbortSignal): Promise<WaitOutcome> {
    return new Promise<WaitOutcome>((resolve) => {
      let settled = false;
      let unsubscribe: (() => void) | undefined;

      const finish = (outcome: WaitOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        clearInterval(poll);
        signal.removeEventListener('abort', onAbort);
        unsubscribe?.();
        resolve(outcome);
      };
      const check = (): void => {
        const status = this.queue.status(workflowId);
        if (status.anyRejected || status.pendingCount === 0) finish('decided');
      };
      const onAbort = (): void => finish('cancelled');

      const timeout = setTimeout(() => finish('timeout'), this.approvalTimeoutMs);
      const poll = setInterval(check, this.pollIntervalMs);
      signal.addEventListener('abort', onAbort);
      if (signal.aborted) {
        finish('cancelled');
        return;
      }

      unsubscribe = this.queue.subscribe(workflowId, check);
      if (settled) unsubscribe();
    });
  }

  // =====================================================================
  // Steps & helpers
  // =====================================================================

  /** Record completed/failed executions and persist the graph. Never throws. */
  private async learn(entry: RunEntry): Promise<void> {
    const { run } = entry;
    this.setState(entry, 'learn');
    for (const record of this.queue.listByWorkflow(run.id)) {
      if (!entry.executions.has(record.proposal.id)) continue;
      if (record.status !== 'completed' && record.status !== 'failed') continue;
      await this.learning.record({
        patternId: record.proposal.patternId,
        proposal: record.proposal,
        success: record.status === 'completed',
        entityScope: record.proposal.entityId,
      });
    }
    await this.graph.persist();
  }

  private finish(entry: RunEntry, result: RunResult): void {
    const { run } = entry;
    const outcomes: Record<string, ProposalOutcome> = {};
    for (const record of this.queue.listByWorkflow(run.id)) {
      const info = entry.executions.get(record.proposal.id);
      outcomes[record.proposal.id] = {
        proposalId: record.proposal.id,
        entityId: record.proposal.entityId,
        patternId: record.proposal.patternId,
        status: record.status,
        executed: info?.executed ?? false,
        healthy: info?.healthy ?? null,
        rollback: info?.rollback ?? 'not_needed',
        detail: info?.detail ?? record.feedback ?? '',
      };
    }

    run.outcomes = outcomes;
    run.result = result;
    run.state = 'done';
    run.status = 'done';
    run.finishedAt = new Date().toISOString();

    const summary = summarizeRun(run);
    this.logger.info(`Run ${run.id} finished: ${summary}`);
    this.publish(run, 'run_finished', { result, summary });

    this.notifier?.runFinished(this.snapshot(run), summary).catch((err: unknown) => {
      this.logger.warn(`Outcome notification failed: ${errorMessage(err)}`);
    });
    this.forgetOldRuns();
  }

  /** Drop the oldest finished runs beyond `retainRuns`. Running ones are always kept. */
  private forgetOldRuns(): void {
    const finished = [...this.runs.values()].filter((e) => e.run.status === 'done');
    for (const entry of finished.slice(0, Math.max(0, finished.length - this.retainRuns))) {
      this.runs.delete(entry.run.id);
    }
  }

  /** Expire whatever a failed run left pending or approved. Never throws. */
  private async closeOpenProposals(runId: string): Promise<void> {
    try {
      const expired = await this.queue.expireWorkflow(runId, 'run error');
      if (expired.length > 0) this.logger.warn(`Run ${runId}: expired ${expired.length} open proposal(s) after the error`);
    } catch (err) {
      this.logger.error(`Run ${runId}: cannot expire open proposals: ${errorMessage(err)}`);
    }
  }

  private async runCommand(command: StructuredCommand, proposal: FixProposal): Promise<ExecutionResult> {
    try {
      return await this.executor.execute(command, proposal);
    } catch (err) {
      return { success: false, exitCode: null, stdout: '', stderr: errorMessage(err), durationMs: 0, dryRun: false };
    }
  }

  private async rollback(proposal: FixProposal): Promise<RollbackOutcome> {
    const result = await this.runCommand(proposal.rollbackAction, proposal);
    if (result.success) {
      this.logger.info(`Rolled back ${proposal.id}`);
      return 'succeeded';
    }
    this.logger.error(`Rollback of ${proposal.id} failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    return 'failed';
  }

  private async checkHealth(entityId: string): Promise<HealthCheckResult> {
    try {
      return await this.source.checkHealth(entityId);
    } catch (err) {
      return { healthy: false, detail: `health check failed: ${errorMessage(err)}` };
    }
  }

  private report(run: WorkflowRun, report: EntityReport): void {
    run.entities = [...run.entities.filter((e) => e.entityId !== report.entityId), report];
  }

  private setState(entry: RunEntry, state: WorkflowState): void {
    entry.run.state = state;
    this.publish(entry.run, 'run_state', { state });
  }

  private publish(run: WorkflowRun, event: string, data: Record<string, unknown>): void {
    const message = { event, data: { runId: run.id, ...data } };
    this.bus.emit(workflowChannel(run.id), message);
    this.bus.emit(RUNS_CHANNEL, message);
  }

  private throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) throw new RunCancelled();
  }

  private requireEntry(runId: string): RunEntry {
    const entry = this.runs.get(runId);
    if (!entry) throw new NotFoundError('run', runId);
    return entry;
  }

  private snapshot(run: WorkflowRun): WorkflowRun {
    return structuredClone(run);
  }
}

/** One-line outcome, e.g. `completed: 2 completed, 0 failed of 2 proposal(s)`. */
export function summarizeRun(run: WorkflowRun): string {
  const outcomes = Object.values(run.outcomes);
  const completed = outcomes.filter((o) => o.status === 'completed').length;
  const failed = outcomes.filter((o) => o.status === 'failed').length;
  return `${run.result ?? 'running'}: ${completed} completed, ${failed} failed of ${outcomes.length} proposal(s)`;
}
