// mendgraph-core - remediation engine

// Types
export * from './types.js';
export * from './collaborators.js';

// Errors
export {
  RemediationError,
  ValidationError,
  InvalidTransitionError,
  NotFoundError,
  BackendUnavailableError,
  ExecutionFailureError,
  ApprovalTimeoutError,
  PersistenceError,
  ConfigError,
  ERROR_METADATA,
  createStructuredError,
  httpStatusFor,
  errorMessage,
} from './errors.js';
export type { RemediationErrorCode, ErrorCategory, ErrorSeverity, StructuredError } from './errors.js';

// Config Loader
export {
  loadConfig,
  parseConfig,
  substituteEnv,
  MendgraphConfigSchema,
  DurationSchema,
  DEFAULT_CONFIG_FILES,
} from './config-loader.js';
export type { MendgraphConfig } from './config-loader.js';
export { parseDuration } from './duration.js';

// Logging & events
export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger, ConsoleLoggerOptions } from './logger.js';
export { EventBus, createEventBus } from './sse-bus.js';
export type { BusMessage, BusHandler } from './sse-bus.js';
export { KeyedLock, Semaphore } from './keyed-lock.js';

// Knowledge graph
export { KnowledgeGraph } from './graph/knowledge-graph.js';
export type { KnowledgeGraphOptions } from './graph/knowledge-graph.js';
export * from './graph/types.js';
export { GraphSnapshotFile, SNAPSHOT_FORMAT, SNAPSHOT_VERSION } from './graph/snapshot-file.js';

// Patterns
export { PatternDetector, UNKNOWN_CATEGORY } from './patterns/pattern-detector.js';
export type { PatternDefinition } from './patterns/pattern-detector.js';
export { BUILT_IN_PATTERNS, createDefaultDetector } from './patterns/built-in-patterns.js';

// Fix generation
export { FixGenerator } from './fixes/fix-generator.js';
export type { FixGeneratorOptions, FixRequest } from './fixes/fix-generator.js';
export { FALLBACK_RULES, DEFAULT_FALLBACK_RULE, fallbackRuleFor, resolveTarget, doubleMemory } from './fixes/fallback-rules.js';
export type { FallbackRule, FixTarget } from './fixes/fallback-rules.js';
export { generatedConfidence, describeEvidence, NO_EVIDENCE } from './fixes/confidence.js';
export type { FixEvidence } from './fixes/confidence.js';
export { buildFixPrompt } from './fixes/prompt.js';
export type { FixContext, PriorFix } from './fixes/prompt.js';
export {
  parseProposal,
  validateProposal,
  FixProposalSchema,
  StructuredCommandSchema,
  ApprovalStatusSchema,
  PrioritySchema,
} from './fixes/validation.js';

// Approvals
export {
  ApprovalQueue,
  APPROVALS_CHANNEL,
  SYSTEM_ACTOR,
  DEFAULT_TTL,
  workflowChannel,
  compareForReview,
} from './approval/approval-queue.js';
export type { ApprovalQueueOptions } from './approval/approval-queue.js';
export { MemoryApprovalStore } from './approval/approval-store.js';
export type { ApprovalStore } from './approval/approval-store.js';
export { SQLiteApprovalStore } from './approval/sqlite-approval-store.js';
export * from './approval/types.js';

// Learning
export { LearningStore, fixIdentity } from './learning/learning-store.js';
export type { LearningOutcome, LearningResult, LearningStoreOptions } from './learning/learning-store.js';
export { KeywordSimilarityIndex, tokenize } from './learning/keyword-similarity-index.js';

// Workflow
export { WorkflowEngine, RUNS_CHANNEL, summarizeRun } from './workflow/workflow-engine.js';
export type { WorkflowEngineOptions } from './workflow/workflow-engine.js';
export * from './workflow/types.js';

// Notifications
export { Notifier, LoggerSink, WebhookSink, createNotifier, headline, RESULT_SEVERITY } from './notifier.js';
export type {
  DeliveryReport,
  NoticeSeverity,
  NoticeSink,
  NotifierConfig,
  NotifierOptions,
  OutcomeNotice,
  ProposalLine,
  ReviewNotice,
  RunNotice,
  WebhookSinkOptions,
} from './notifier.js';

// Integrations
export { spawnCommand } from './integrations/command-runner.js';
export type { CommandOutput, CommandRunner, RunOptions } from './integrations/command-runner.js';
export { CommandExecutor } from './integrations/command-executor.js';
export { HttpTextGenerator } from './integrations/http-text-generator.js';
export { KubectlDiagnosticSource } from './integrations/kubectl-source.js';

// Wiring
export { createServices } from './services.js';
export type { Services, ServiceOverrides, CreateServicesOptions } from './services.js';
