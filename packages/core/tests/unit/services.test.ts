import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createServices } from '../../src/services.js';
import { parseConfig } from '../../src/config-loader.js';
import { silentLogger } from '../../src/logger.js';
import { ConfigError } from '../../src/errors.js';
import { APPROVALS_CHANNEL } from '../../src/approval/approval-queue.js';
import { SQLiteApprovalStore } from '../../src/approval/sqlite-approval-store.js';
import { FakeExecutor, FakeSource, finding } from '../helpers/fakes.js';

describe('createServices', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mendgraph-services-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const config = () => parseConfig({
    approvals: { expirySweep: 0 },
    workflow: { settleDelay: 0, pollInterval: 20, approvalTimeout: 2000 },
  });

  it('runs a workflow end to end and persists what it learned', async () => {
    const executor = new FakeExecutor();
    const services = await createServices({
      config: config(),
      baseDir: dir,
      loggerFor: () => silentLogger,
      overrides: {
        source: new FakeSource([finding('prod/api', 'OOMKilled')], { 'prod/api': ['OOMKilled'] }),
        executor,
      },
    });
    const decisions: Promise<unknown>[] = [];
    services.bus.subscribe(APPROVALS_CHANNEL, (msg) => {
      const workflowId = msg.data['workflowId'];
      if (msg.event === 'submitted' && typeof workflowId === 'string') {
        decisions.push(services.queue.decideBatch(workflowId, 'approved', 'alice'));
      }
    });

    const run = await services.engine.waitFor(services.engine.start('prod').id);
    await Promise.all(decisions);
    await services.close();

    expect(run.result).toBe('completed');
    expect(executor.commands).toHaveLength(1);
    expect(fs.existsSync(path.join(dir, '.mendgraph', 'graph.json'))).toBe(true);
    expect(fs.existsSync(path.join(dir, '.mendgraph', 'similarity.json'))).toBe(true);

    const reloaded = await createServices({ config: config(), baseDir: dir, loggerFor: () => silentLogger });
    expect(reloaded.graph.getRelationships('cause:resource_exhaustion', 'remediates')).toHaveLength(1);
    expect(reloaded.graph.getNode('cause:resource_exhaustion')?.attributes).toEqual({ category: 'resources' });
    await reloaded.close();
  });

  it('opens a sqlite approval store when configured', async () => {
    const services = await createServices({
      config: parseConfig({ approvals: { store: 'sqlite', sqlitePath: 'data/approvals.db', expirySweep: 0 } }),
      baseDir: dir,
      loggerFor: () => silentLogger,
      loadGraph: false,
    });
    await services.close();

    expect(fs.existsSync(path.join(dir, 'data', 'approvals.db'))).toBe(true);
    const store = new SQLiteApprovalStore(path.join(dir, 'data', 'approvals.db'));
    expect(store.all()).toEqual([]);
    store.close();
  });

  it('requires the API key when the generator is enabled', async () => {
    await expect(createServices({
      config: parseConfig({ generator: { enabled: true } }),
      baseDir: dir,
      loggerFor: () => silentLogger,
      env: {},
    })).rejects.toBeInstanceOf(ConfigError);
  });
});
