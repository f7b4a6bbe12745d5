/**
 * @module config-loader
 * Configuration loader for mendgraph.
 *
 * Loads `mendgraph.yaml`, validates it with Zod schemas, loads `.env` from the
 * config directory and substitutes `{{env.NAME}}` placeholders.
 * Every key has a default, so an empty file (or no file) is a valid setup.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { parseDuration } from './duration.js';
import { ConfigError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

/** Duration written as `"5s"`, `"24h"`, ... or a number of milliseconds; parsed to ms. */
export const DurationSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
    return z.NEVER;
  }
});

export const ServerSchema = z.object({
  host: z.string().default('127.0.0.1').describe('Interface the HTTP API binds to'),
  port: z.number().int().min(0).max(65535).default(9190).describe('HTTP API port'),
  keepAlive: DurationSchema.default('15s').describe('Interval between SSE keep-alive comments'),
}).describe('HTTP API server');

export const GraphSchema = z.object({
  snapshotPath: z.string().default('.mendgraph/graph.json').describe('Knowledge graph JSON snapshot'),
}).describe('Knowledge graph persistence');

export const ApprovalTtlSchema = z.object({
  critical: DurationSchema.default('24h'),
  high: DurationSchema.default('24h'),
  medium: DurationSchema.default('7d'),
  low: DurationSchema.default('7d'),
}).describe('Review window per priority');

export const ApprovalsSchema = z.object({
  store: z.enum(['memory', 'sqlite']).default('memory').describe('Approval record backend'),
  sqlitePath: z.string().default('.mendgraph/approvals.db').describe('Database file for the sqlite store'),
  expirySweep: DurationSchema.default('60s').describe('Interval of the stale-approval sweep (0 disables)'),
  ttl: ApprovalTtlSchema.default({}),
}).describe('Approval queue');

export const WorkflowSchema = z.object({
  approvalTimeout: DurationSchema.default('300s').describe('Maximum wait for reviewer decisions'),
  pollInterval: DurationSchema.default('5s').describe('Status re-check interval while waiting'),
  settleDelay: DurationSchema.default('10s').describe('Wait between execution and health validation'),
  maxRounds: z.number().int().min(1).default(3).describe('Diagnose rounds allowed by needs_more_info'),
  contextLimit: z.number().int().min(0).default(5).describe('Prior fixes and similar cases fed to the generator'),
  retainRuns: z.number().int().min(1).default(100).describe('Finished runs kept in memory for the runs API'),
}).describe('Workflow engine');

export const GeneratorSchema = z.object({
  enabled: z.boolean().default(false).describe('Use the text generation backend; fallback rules otherwise'),
  endpoint: z.string().default('https://api.openai.com/v1/chat/completions').describe('OpenAI-compatible chat completions URL'),
  model: z.string().default('gpt-4o-mini'),
  apiKeyEnv: z.string().default('MENDGRAPH_LLM_API_KEY').describe('Environment variable holding the API key'),
  temperature: z.number().min(0).max(2).default(0.2),
  timeout: DurationSchema.default('30s'),
}).describe('Fix generation backend');

export const ExecutorSchema = z.object({
  dryRun: z.boolean().default(true).describe('Log commands instead of running them'),
  timeout: DurationSchema.default('120s').describe('Per-command timeout'),
  kubectl: z.string().default('kubectl').describe('kubectl binary used by the diagnostic source'),
}).describe('Remediation executor');

export const WebhookSchema = z.object({
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
});

export const NotificationsSchema = z.object({
  console: z.boolean().default(true),
  webhooks: z.array(WebhookSchema).default([]),
}).describe('Run outcome notifications');

// =====================================================================
// Complete Configuration Schema
// =====================================================================

export const MendgraphConfigSchema = z.object({
  version: z.string().default('1'),
  server: ServerSchema.default({}),
  graph: GraphSchema.default({}),
  approvals: ApprovalsSchema.default({}),
  workflow: WorkflowSchema.default({}),
  generator: GeneratorSchema.default({}),
  executor: ExecutorSchema.default({}),
  notifications: NotificationsSchema.default({}),
}).describe('mendgraph configuration');

/** Validated configuration; durations are milliseconds. */
export type MendgraphConfig = z.infer<typeof MendgraphConfigSchema>;

export const DEFAULT_CONFIG_FILES = ['mendgraph.yaml', 'mendgraph.yml'];

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Validate an already-parsed configuration object.
 * @throws {ConfigError} listing every failing path
 */
export function parseConfig(raw: unknown, env: Record<string, string | undefined> = process.env): MendgraphConfig {
  const resolved = substituteEnv(raw ?? {}, env);
  const result = MendgraphConfigSchema.safeParse(resolved);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(
      `Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      { issues },
    );
  }
  return result.data;
}

/**
 * Load and validate a mendgraph configuration file.
 *
 * Steps:
 * 1. Load `.env` from the config file's directory
 * 2. Read and parse the YAML file
 * 3. Substitute `{{env.NAME}}` placeholders
 * 4. Validate with Zod, filling defaults
 *
 * An explicit path must exist. Without one, `mendgraph.yaml` / `mendgraph.yml`
 * in the working directory is used when present, defaults otherwise.
 */
export async function loadConfig(configPath?: string, logger: Logger = createConsoleLogger('config')): Promise<MendgraphConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  if (!resolvedPath) {
    logger.info('No mendgraph.yaml found, using defaults');
    return parseConfig({});
  }

  dotenv.config({ path: path.resolve(path.dirname(resolvedPath), '.env') });

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Configuration file not readable: ${resolvedPath} (${errorMessage(err)})`, { path: resolvedPath });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new ConfigError(`YAML syntax error in ${resolvedPath}: ${errorMessage(err)}`, { path: resolvedPath });
  }

  if (parsed !== null && parsed !== undefined && (typeof parsed !== 'object' || Array.isArray(parsed))) {
    throw new ConfigError(`Configuration file is not a mapping: ${resolvedPath}`, { path: resolvedPath });
  }

  logger.info(`Loaded ${resolvedPath}`);
  return parseConfig(parsed ?? {});
}

// =====================================================================
// Internal Helpers
// =====================================================================

async function resolveConfigPath(configPath?: string): Promise<string | undefined> {
  if (configPath) {
    const explicit = path.resolve(configPath);
    try {
      await fs.access(explicit);
    } catch {
      throw new ConfigError(`Configuration file not found: ${explicit}`, { path: explicit });
    }
    return explicit;
  }

  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.resolve(process.cwd(), name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}

/** Replace `{{env.NAME}}` in every string; unknown names are left as-is. */
export function substituteEnv(value: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof value === 'string') {
    return value.replace(/\{\{\s*env\.([A-Za-z0-9_]+)\s*\}\}/g, (match, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnv(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = substituteEnv(item, env);
    }
    return out;
  }
  return value;
}
