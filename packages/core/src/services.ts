/**
 * @module services
 * Wire a validated configuration into the running services: graph,
 * detector, generator, approval queue, learning store and workflow engine.
 *
 * Every collaborator can be replaced through `overrides`, which is how the
 * server tests and embedders swap in their own source or executor.
 */

import path from 'node:path';
import type { MendgraphConfig } from './config-loader.js';
import { parseConfig } from './config-loader.js';
import type { DiagnosticSource, RemediationExecutor, SimilarityIndex, TextGenerator } from './collaborators.js';
import { KnowledgeGraph } from './graph/knowledge-graph.js';
import type { PatternDetector } from './patterns/pattern-detector.js';
import { createDefaultDetector } from './patterns/built-in-patterns.js';
import { FixGenerator } from './fixes/fix-generator.js';
import { ApprovalQueue } from './approval/approval-queue.js';
import type { ApprovalStore } from './approval/approval-store.js';
import { MemoryApprovalStore } from './approval/approval-store.js';
import { SQLiteApprovalStore } from './approval/sqlite-approval-store.js';
import { LearningStore } from './learning/learning-store.js';
import { KeywordSimilarityIndex } from './learning/keyword-similarity-index.js';
import { WorkflowEngine } from './workflow/workflow-engine.js';
import type { Notifier } from './notifier.js';
import { createNotifier } from './notifier.js';
import { EventBus } from './sse-bus.js';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';
import { KubectlDiagnosticSource } from './integrations/kubectl-source.js';
import { CommandExecutor } from './integrations/command-executor.js';
import { HttpTextGenerator } from './integrations/http-text-generator.js';

export interface Services {
  config: MendgraphConfig;
  bus: EventBus;
  graph: KnowledgeGraph;
  detector: PatternDetector;
  generator: FixGenerator;
  queue: ApprovalQueue;
  learning: LearningStore;
  engine: WorkflowEngine;
  notifier: Notifier;
  /** Stop background work and release the approval store. */
  close(): Promise<void>;
}

export interface ServiceOverrides {
  source?: DiagnosticSource;
  executor?: RemediationExecutor;
  textGenerator?: TextGenerator;
  similarity?: SimilarityIndex;
  store?: ApprovalStore;
  notifier?: Notifier;
  bus?: EventBus;
}

export interface CreateServicesOptions {
  /** Default: all defaults. */
  config?: MendgraphConfig;
  /** Relative paths in the config resolve against this. Default: cwd. */
  baseDir?: string;
  /** Scoped logger factory. Default: console loggers. */
  loggerFor?: (scope: string) => Logger;
  /** Load the graph snapshot before returning. Default: true */
  loadGraph?: boolean;
  overrides?: ServiceOverrides;
  env?: Record<string, string | undefined>;
}

export async function createServices(options: CreateServicesOptions = {}): Promise<Services> {
  const config = options.config ?? parseConfig({});
  const baseDir = options.baseDir ?? process.cwd();
  const loggerFor = options.loggerFor ?? ((scope: string) => createConsoleLogger(scope));
  const overrides = options.overrides ?? {};
  const resolve = (p: string): string => path.resolve(baseDir, p);

  const bus = overrides.bus ?? new EventBus(loggerFor('bus'));
  const detector = createDefaultDetector();
  const graphPath = resolve(config.graph.snapshotPath);
  const graph = new KnowledgeGraph({
    snapshotPath: graphPath,
    categorize: (patternId) => detector.categoryOf(patternId),
    logger: loggerFor('graph'),
  });
  if (options.loadGraph ?? true) await graph.load();

  const similarity = overrides.similarity ?? new KeywordSimilarityIndex({
    filePath: path.join(path.dirname(graphPath), 'similarity.json'),
    logger: loggerFor('similarity'),
  });

  let textGenerator = overrides.textGenerator;
  if (!textGenerator && config.generator.enabled) {
    textGenerator = HttpTextGenerator.fromEnv(config.generator, options.env ?? process.env);
  }

  const generator = new FixGenerator({
    graph,
    textGenerator,
    similarity,
    contextLimit: config.workflow.contextLimit,
    temperature: config.generator.temperature,
    timeoutMs: config.generator.timeout,
    logger: loggerFor('generator'),
  });

  const store = overrides.store ?? (config.approvals.store === 'sqlite'
    ? new SQLiteApprovalStore(resolve(config.approvals.sqlitePath))
    : new MemoryApprovalStore());
  const queue = new ApprovalQueue({ store, bus, ttl: config.approvals.ttl, logger: loggerFor('approvals') });
  const stopSweep = config.approvals.expirySweep > 0
    ? queue.startExpirySweep(config.approvals.expirySweep)
    : () => undefined;

  const learning = new LearningStore({ graph, similarity, logger: loggerFor('learning') });
  const notifier = overrides.notifier ?? createNotifier({
    console: config.notifications.console,
    webhooks: config.notifications.webhooks,
    minSeverity: 'info',
    logger: loggerFor('notify'),
  });

  const engine = new WorkflowEngine({
    graph,
    detector,
    generator,
    queue,
    learning,
    source: overrides.source ?? new KubectlDiagnosticSource({ kubectl: config.executor.kubectl, logger: loggerFor('kubectl') }),
    executor: overrides.executor ?? new CommandExecutor({
      dryRun: config.executor.dryRun,
      timeoutMs: config.executor.timeout,
      logger: loggerFor('executor'),
    }),
    notifier,
    bus,
    logger: loggerFor('workflow'),
    approvalTimeoutMs: config.workflow.approvalTimeout,
    pollIntervalMs: config.workflow.pollInterval,
    settleDelayMs: config.workflow.settleDelay,
    maxRounds: config.workflow.maxRounds,
    retainRuns: config.workflow.retainRuns,
  });

  return {
    config,
    bus,
    graph,
    detector,
    generator,
    queue,
    learning,
    engine,
    notifier,
    async close() {
      stopSweep();
      await graph.persist();
      queue.close();
    },
  };
}
