/**
 * Unit tests for config-loader module.
 *
 * Tests cover:
 * - Defaults for a missing or empty file
 * - Duration parsing
 * - .env loading and {{env.NAME}} substitution
 * - Validation and YAML error reporting
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { loadConfig, parseConfig, substituteEnv } from '../../src/config-loader.js';
import { parseDuration } from '../../src/duration.js';
import { ConfigError } from '../../src/errors.js';
import { recordingLogger } from '../helpers/recording-logger.js';

async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'mendgraph-config-test-'));
}

describe('parseDuration', () => {
  it('parses units and plain milliseconds', () => {
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('5s')).toBe(5000);
    expect(parseDuration('1.5m')).toBe(90_000);
    expect(parseDuration('24h')).toBe(86_400_000);
    expect(parseDuration('7d')).toBe(604_800_000);
    expect(parseDuration('250')).toBe(250);
    expect(parseDuration(42)).toBe(42);
  });

  it('rejects unknown formats', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration: "soon"');
    expect(() => parseDuration('5w')).toThrow('Invalid duration');
  });
});

describe('parseConfig', () => {
  it('fills every default', () => {
    const config = parseConfig({});
    expect(config.server).toEqual({ host: '127.0.0.1', port: 9190, keepAlive: 15_000 });
    expect(config.graph.snapshotPath).toBe('.mendgraph/graph.json');
    expect(config.approvals).toEqual({
      store: 'memory',
      sqlitePath: '.mendgraph/approvals.db',
      expirySweep: 60_000,
      ttl: { critical: 86_400_000, high: 86_400_000, medium: 604_800_000, low: 604_800_000 },
    });
    expect(config.workflow).toEqual({
      approvalTimeout: 300_000,
      pollInterval: 5_000,
      settleDelay: 10_000,
      maxRounds: 3,
      contextLimit: 5,
      retainRuns: 100,
    });
    expect(config.generator.enabled).toBe(false);
    expect(config.generator.timeout).toBe(30_000);
    expect(config.executor).toEqual({ dryRun: true, timeout: 120_000, kubectl: 'kubectl' });
    expect(config.notifications).toEqual({ console: true, webhooks: [] });
  });

  it('converts duration strings in nested sections', () => {
    const config = parseConfig({ workflow: { approvalTimeout: '2m', settleDelay: 0 }, approvals: { ttl: { high: '1h' } } });
    expect(config.workflow.approvalTimeout).toBe(120_000);
    expect(config.workflow.settleDelay).toBe(0);
    expect(config.approvals.ttl.high).toBe(3_600_000);
    expect(config.approvals.ttl.low).toBe(604_800_000);
  });

  it('substitutes environment placeholders before validation', () => {
    const config = parseConfig(
      { notifications: { webhooks: [{ url: 'https://hooks.example.com/{{env.HOOK_PATH}}', headers: { Authorization: 'Bearer {{ env.HOOK_TOKEN }}' } }] } },
      { HOOK_PATH: 'remediation', HOOK_TOKEN: 'test-secret' },
    );
    expect(config.notifications.webhooks).toEqual([
      { url: 'https://hooks.example.com/remediation', headers: { Authorization: 'Bearer test-secret' } },
    ]);
  });

  it('lists every invalid path', () => {
    try {
      parseConfig({ server: { port: 'eighty' }, workflow: { pollInterval: 'often' } });
      expect.unreachable('parseConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      const issues = err.toJSON().details['issues'];
      expect(Array.isArray(issues) && issues.length).toBe(2);
      expect(err.message).toContain('server.port');
      expect(err.message).toContain('workflow.pollInterval: Invalid duration: "often"');
    }
  });
});

describe('substituteEnv', () => {
  it('leaves unknown names and non-strings untouched', () => {
    expect(substituteEnv({ a: '{{env.MISSING}}', b: 3, c: [true, '{{env.X}}'] }, { X: 'x' })).toEqual({
      a: '{{env.MISSING}}',
      b: 3,
      c: [true, 'x'],
    });
  });
});

describe('loadConfig', () => {
  let tmpDir: string;
  let cwd: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
    cwd = process.cwd();
  });

  afterEach(async () => {
    process.chdir(cwd);
    delete process.env['MENDGRAPH_TEST_MODEL'];
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads YAML and the .env beside it', async () => {
    const file = path.join(tmpDir, 'mendgraph.yaml');
    await fs.writeFile(file, [
      'server:',
      '  port: 9300',
      'generator:',
      '  model: "{{env.MENDGRAPH_TEST_MODEL}}"',
      'workflow:',
      '  approvalTimeout: 45s',
    ].join('\n'));
    await fs.writeFile(path.join(tmpDir, '.env'), 'MENDGRAPH_TEST_MODEL=local-model\n');

    const logger = recordingLogger();
    const config = await loadConfig(file, logger);

    expect(config.server.port).toBe(9300);
    expect(config.generator.model).toBe('local-model');
    expect(config.workflow.approvalTimeout).toBe(45_000);
    expect(logger.lines).toEqual([`info Loaded ${file}`]);
  });

  it('uses defaults when no file is present in the working directory', async () => {
    process.chdir(tmpDir);
    const logger = recordingLogger();
    const config = await loadConfig(undefined, logger);
    expect(config.server.port).toBe(9190);
    expect(logger.lines).toEqual(['info No mendgraph.yaml found, using defaults']);
  });

  it('treats an empty file as all defaults', async () => {
    const file = path.join(tmpDir, 'empty.yaml');
    await fs.writeFile(file, '');
    const config = await loadConfig(file, recordingLogger());
    expect(config.approvals.store).toBe('memory');
  });

  it('fails for an explicit path that does not exist', async () => {
    await expect(loadConfig(path.join(tmpDir, 'nope.yaml'), recordingLogger())).rejects.toThrow('Configuration file not found');
  });

  it('reports YAML syntax errors', async () => {
    const file = path.join(tmpDir, 'broken.yaml');
    await fs.writeFile(file, 'server: [unclosed');
    await expect(loadConfig(file, recordingLogger())).rejects.toThrow('YAML syntax error');
  });

  it('rejects a document that is not a mapping', async () => {
    const file = path.join(tmpDir, 'list.yaml');
    await fs.writeFile(file, '- a\n- b\n');
    await expect(loadConfig(file, recordingLogger())).rejects.toThrow('Configuration file is not a mapping');
  });
});
