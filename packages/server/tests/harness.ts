/**
 * In-process server for route tests: temp data directory, fixed findings,
 * dry-run executor and no notification channels.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import {
  CommandExecutor,
  Notifier,
  createDiagnosticBundle,
  createServices,
  parseConfig,
  silentLogger,
  type DiagnosticBundle,
  type DiagnosticSource,
  type Finding,
  type FixProposal,
  type HealthCheckResult,
  type Services,
} from 'mendgraph-core';
import { createServer } from '../src/index.js';

export class InlineSource implements DiagnosticSource {
  constructor(
    public findings: Finding[] = [],
    public signals: Record<string, string[]> = {},
  ) {}

  async identify(): Promise<Finding[]> {
    return this.findings;
  }

  async collect(entityId: string): Promise<DiagnosticBundle> {
    return createDiagnosticBundle(entityId, this.signals[entityId] ?? []);
  }

  async checkHealth(): Promise<HealthCheckResult> {
    return { healthy: true, detail: 'ok' };
  }
}

export interface TestServer {
  app: FastifyInstance;
  services: Services;
  source: InlineSource;
  dir: string;
  close(): Promise<void>;
}

export async function createTestServer(options: { keepAliveMs?: number; approvalTimeout?: number } = {}): Promise<TestServer> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mendgraph-server-'));
  const source = new InlineSource();
  const services = await createServices({
    config: parseConfig({
      approvals: { expirySweep: 0 },
      workflow: { settleDelay: 0, pollInterval: 20, approvalTimeout: options.approvalTimeout ?? 2000 },
    }),
    baseDir: dir,
    loggerFor: () => silentLogger,
    loadGraph: false,
    overrides: {
      source,
      executor: new CommandExecutor({ dryRun: true }),
      notifier: new Notifier(),
    },
  });
  const { app } = await createServer({ services, keepAliveMs: options.keepAliveMs ?? 60_000, logger: false });

  return {
    app,
    services,
    source,
    dir,
    async close() {
      await app.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Submit body for one LOW-risk memory proposal. */
export function proposalBody(id: string, overrides: Partial<FixProposal> = {}): Partial<FixProposal> {
  return {
    id,
    entityId: 'prod/api',
    rootCause: 'Memory limit too low',
    proposedAction: { command: ['kubectl', 'set', 'resources', 'deployment/api', '--limits=memory=512Mi'], description: 'Raise memory' },
    rollbackAction: { command: ['kubectl', 'set', 'resources', 'deployment/api', '--limits=memory=256Mi'], description: 'Restore memory' },
    riskLevel: 'LOW',
    confidence: 0.75,
    patternId: 'resource_exhaustion',
    priority: 'medium',
    ...overrides,
  };
}

export function finding(entityId: string, description: string, severity: Finding['severity'] = 'HIGH'): Finding {
  return {
    id: `test:${entityId}:${description}`,
    entityId,
    description,
    severity,
    detectedAt: '2026-01-01T00:00:00.000Z',
    toolName: 'test-tool',
  };
}
