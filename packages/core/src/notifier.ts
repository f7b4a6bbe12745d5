/**
 * @module notifier
 * Tells people about runs: a review request when proposals are submitted,
 * and an outcome notice when a run ends in anything but `completed`.
 *
 * Notices go to every sink at or above the notifier's minimum severity.
 * Shipped sinks write through a Logger or POST JSON to a webhook.
 */

import type { Logger } from './logger.js';
import { createConsoleLogger, silentLogger } from './logger.js';
import { errorMessage } from './errors.js';
import type { ApprovalStatus, PatternId } from './types.js';
import type { RollbackOutcome, RunResult, WorkflowRun } from './workflow/types.js';

// =====================================================================
// Notices
// =====================================================================

export type NoticeSeverity = 'info' | 'warning' | 'error';

interface NoticeBase {
  runId: string;
  scope: string;
  severity: NoticeSeverity;
  /** ISO-8601 */
  at: string;
}

export interface ReviewNotice extends NoticeBase {
  kind: 'review_requested';
  proposalIds: string[];
}

export interface ProposalLine {
  proposalId: string;
  entityId: string;
  patternId: PatternId;
  status: ApprovalStatus;
  rollback: RollbackOutcome;
}

export interface OutcomeNotice extends NoticeBase {
  kind: 'run_outcome';
  result: RunResult;
  summary: string;
  proposals: ProposalLine[];
}

export type RunNotice = ReviewNotice | OutcomeNotice;

/** Severity a finished run is announced with; `null` means it is not announced. */
export const RESULT_SEVERITY: Record<RunResult, NoticeSeverity | null> = {
  completed: null,
  no_action: 'info',
  partial_failure: 'warning',
  rejected: 'warning',
  timeout: 'warning',
  cancelled: 'warning',
  failed: 'error',
  error: 'error',
};

const SEVERITY_RANK: Record<NoticeSeverity, number> = { info: 0, warning: 1, error: 2 };

/** One line for chat and logs. */
export function headline(notice: RunNotice): string {
  if (notice.kind === 'review_requested') {
    return `[${notice.scope}] ${notice.proposalIds.length} proposal(s) awaiting review in ${notice.runId}`;
  }
  return `[${notice.scope}] ${notice.summary}`;
}

// =====================================================================
// Notifier
// =====================================================================

export interface NoticeSink {
  readonly name: string;
  deliver(notice: RunNotice): Promise<void>;
}

export interface DeliveryReport {
  delivered: string[];
  failed: { sink: string; error: string }[];
}

export interface NotifierOptions {
  sinks?: NoticeSink[];
  /** Default: 'warning' */
  minSeverity?: NoticeSeverity;
  /** Failed deliveries are logged here. */
  logger?: Logger;
  now?: () => Date;
}

export class Notifier {
  private readonly sinks: NoticeSink[];
  private readonly minSeverity: NoticeSeverity;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: NotifierOptions = {}) {
    this.sinks = [...(options.sinks ?? [])];
    this.minSeverity = options.minSeverity ?? 'warning';
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get sinkNames(): string[] {
    return this.sinks.map((s) => s.name);
  }

  async reviewRequested(run: Pick<WorkflowRun, 'id' | 'scope'>, proposalIds: string[]): Promise<DeliveryReport> {
    return this.publish({
      kind: 'review_requested',
      runId: run.id,
      scope: run.scope,
      severity: 'info',
      at: this.now().toISOString(),
      proposalIds,
    });
  }

  /** @returns null for runs that need no attention */
  async runFinished(run: WorkflowRun, summary: string): Promise<DeliveryReport | null> {
    const severity = run.result ? RESULT_SEVERITY[run.result] : null;
    if (!run.result || !severity) return null;
    return this.publish({
      kind: 'run_outcome',
      runId: run.id,
      scope: run.scope,
      severity,
      at: this.now().toISOString(),
      result: run.result,
      summary,
      proposals: Object.values(run.outcomes).map((o) => ({
        proposalId: o.proposalId,
        entityId: o.entityId,
        patternId: o.patternId,
        status: o.status,
        rollback: o.rollback,
      })),
    });
  }

  async publish(notice: RunNotice): Promise<DeliveryReport> {
    if (SEVERITY_RANK[notice.severity] < SEVERITY_RANK[this.minSeverity]) {
      return { delivered: [], failed: [] };
    }

    const attempts = await Promise.all(this.sinks.map(async (sink): Promise<{ sink: string; error?: string }> => {
      try {
        await sink.deliver(notice);
        return { sink: sink.name };
      } catch (err) {
        return { sink: sink.name, error: errorMessage(err) };
      }
    }));

    const report: DeliveryReport = { delivered: [], failed: [] };
    for (const attempt of attempts) {
      if (attempt.error === undefined) {
        report.delivered.push(attempt.sink);
      } else {
        report.failed.push({ sink: attempt.sink, error: attempt.error });
        this.logger.warn(`${notice.kind} notice for ${notice.runId} not delivered to ${attempt.sink}: ${attempt.error}`);
      }
    }
    return report;
  }
}

// =====================================================================
// Sinks
// =====================================================================

/** Writes the headline, and each failed proposal of an outcome, at the notice's severity. */
export class LoggerSink implements NoticeSink {
  readonly name = 'console';

  constructor(private readonly logger: Logger = createConsoleLogger('notify')) {}

  async deliver(notice: RunNotice): Promise<void> {
    const lines = [headline(notice)];
    if (notice.kind === 'run_outcome') {
      for (const p of notice.proposals) {
        if (p.status !== 'failed') continue;
        lines.push(`  ${p.proposalId} ${p.entityId} (${p.patternId}) failed, rollback ${p.rollback}`);
      }
    }
    const level = notice.severity === 'warning' ? 'warn' : notice.severity;
    for (const line of lines) this.logger[level](line);
  }
}

export interface WebhookSinkOptions {
  url: string;
  headers?: Record<string, string>;
  /** Default: 10000 */
  timeoutMs?: number;
  /** Default: 'webhook' */
  name?: string;
}

/** POSTs `{ text, ...notice }`; `text` is the headline, which chat webhooks display as is. */
export class WebhookSink implements NoticeSink {
  readonly name: string;

  constructor(private readonly options: WebhookSinkOptions) {
    this.name = options.name ?? 'webhook';
  }

  async deliver(notice: RunNotice): Promise<void> {
    const response = await fetch(this.options.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...this.options.headers },
      body: JSON.stringify({ text: headline(notice), ...notice }),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
    });
    if (!response.ok) {
      throw new Error(`${this.name} answered ${response.status}`);
    }
  }
}

// =====================================================================
// Factory
// =====================================================================

export interface NotifierConfig {
  /** Log notices through `logger`. Default: false */
  console?: boolean;
  webhooks?: WebhookSinkOptions[];
  minSeverity?: NoticeSeverity;
  logger?: Logger;
}

export function createNotifier(config: NotifierConfig = {}): Notifier {
  const sinks: NoticeSink[] = config.console ? [new LoggerSink(config.logger)] : [];
  (config.webhooks ?? []).forEach((hook, i) => {
    sinks.push(new WebhookSink({ ...hook, name: hook.name ?? (i === 0 ? 'webhook' : `webhook-${i + 1}`) }));
  });
  return new Notifier({ sinks, minSeverity: config.minSeverity, logger: config.logger });
}
