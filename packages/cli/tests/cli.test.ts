/**
 * CLI tests against a stubbed fetch.
 *
 * Tests cover:
 * - command registration and --help
 * - URL selection (--url, MENDGRAPH_URL, default)
 * - reviewer commands and their request bodies
 * - error rendering and exit codes
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createProgram } from '../src/program.js';
import { BOLD, GRAY, GREEN, RED, RESET } from '../src/format.js';

interface Call {
  method: string;
  url: string;
  body: unknown;
}

type Reply = { status?: number; body: unknown } | Error;

function harness(replies: Reply[], env: Record<string, string | undefined> = {}) {
  const calls: Call[] = [];
  const logs: string[] = [];
  const errors: string[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    calls.push({
      method: init?.method ?? 'GET',
      url,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const reply = replies.shift();
    if (!reply) throw new Error(`unexpected request ${url}`);
    if (reply instanceof Error) throw reply;
    return new Response(JSON.stringify(reply.body), {
      status: reply.status ?? 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  const program = createProgram({ fetchImpl, env, out: { log: (l) => logs.push(l), error: (l) => errors.push(l) } });
  const run = (...args: string[]) => program.parseAsync(args, { from: 'user' });
  return { calls, logs, errors, run, program };
}

const record = {
  proposal: {
    id: 'p-1',
    workflowId: 'wf-1',
    entityId: 'prod/api',
    rootCause: 'Memory limit too low',
    patternId: 'resource_exhaustion',
    riskLevel: 'LOW',
    confidence: 0.75,
    proposedAction: { command: ['kubectl', 'set', 'resources', 'deployment/api', '--limits=memory=512Mi'], description: '' },
    rollbackAction: { command: ['kubectl', 'set', 'resources', 'deployment/api', '--limits=memory=256Mi'], description: '' },
  },
  status: 'pending_review',
  priority: 'medium',
  decidedBy: null,
  feedback: null,
  expiresAt: '2026-01-08T00:00:00.000Z',
};

const doneRun = {
  id: 'wf-9',
  scope: 'prod',
  state: 'done',
  status: 'done',
  result: 'completed',
  rounds: 1,
  proposals: ['p-1'],
  entities: [{ entityId: 'prod/api', outcome: 'proposed', patterns: ['resource_exhaustion'] }],
  error: null,
  summary: 'completed: 1 completed, 0 failed of 1 proposal(s)',
};

afterEach(() => {
  process.exitCode = undefined;
});

describe('CLI', () => {
  it('registers every command', () => {
    const help = harness([]).program.helpInformation();
    for (const name of ['serve', 'runs', 'approvals', 'decide', 'approve-all', 'reject-all', 'graph']) {
      expect(help).toContain(name);
    }
  });

  describe('approvals list', () => {
    it('prints pending records from the default URL', async () => {
      const h = harness([{ body: { success: true, count: 1, records: [record] } }]);
      await h.run('approvals', 'list');

      expect(h.calls[0]?.url).toBe('http://127.0.0.1:9190/api/approvals/pending');
      expect(h.logs).toEqual([
        `${BOLD}1 pending${RESET}`,
        `${BOLD}p-1${RESET}  ${GREEN}LOW${RESET}  0.75  prod/api  ${GRAY}kubectl set resources deployment/api --limits=memory=512Mi${RESET}`,
      ]);
    });

    it('uses --url and passes the scope', async () => {
      const h = harness([{ body: { success: true, count: 0, records: [] } }], { MENDGRAPH_URL: 'http://ignored:1' });
      await h.run('--url', 'http://api.test:8080/', 'approvals', 'list', '--scope', 'prod');

      expect(h.calls[0]?.url).toBe('http://api.test:8080/api/approvals/pending?scope=prod');
      expect(h.logs).toEqual(['No pending proposals']);
    });

    it('falls back to MENDGRAPH_URL', async () => {
      const h = harness([{ body: { success: true, count: 0, records: [] } }], { MENDGRAPH_URL: 'http://env.test:1' });
      await h.run('approvals', 'list');

      expect(h.calls[0]?.url).toBe('http://env.test:1/api/approvals/pending');
    });
  });

  describe('decide', () => {
    it('posts the decision', async () => {
      const h = harness([{ body: { success: true, record: { ...record, status: 'approved', decidedBy: 'alice' } } }]);
      await h.run('decide', 'p-1', 'approved', '--actor', 'alice');

      expect(h.calls).toEqual([{
        method: 'POST',
        url: 'http://127.0.0.1:9190/api/approvals/p-1/decide',
        body: { decision: 'approved', actor: 'alice' },
      }]);
      expect(h.logs).toEqual([`p-1: approved  ${GRAY}kubectl set resources deployment/api --limits=memory=512Mi${RESET}`]);
      expect(process.exitCode).toBeUndefined();
    });

    it('rejects an unknown decision without calling the API', async () => {
      const h = harness([]);
      await h.run('decide', 'p-1', 'maybe', '--actor', 'alice');

      expect(h.calls).toEqual([]);
      expect(h.errors).toEqual([`${RED}Decision must be one of approved, rejected, needs_more_info${RESET}`]);
      expect(process.exitCode).toBe(1);
    });

    it('prints the structured error of a conflict', async () => {
      const h = harness([{
        status: 409,
        body: { success: false, error: { code: 'INVALID_TRANSITION', message: 'Invalid transition for p-1: approved → rejected' } },
      }]);
      await h.run('decide', 'p-1', 'rejected', '--actor', 'bob', '--feedback', 'late');

      expect(h.calls[0]?.body).toEqual({ decision: 'rejected', actor: 'bob', feedback: 'late' });
      expect(h.errors).toEqual([`${RED}INVALID_TRANSITION: Invalid transition for p-1: approved → rejected${RESET}`]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('approve-all / reject-all', () => {
    it('approves a whole workflow', async () => {
      const h = harness([{ body: { success: true, workflowId: 'wf-1', decision: 'approved', proposalIds: ['p-2', 'p-1'] } }]);
      await h.run('approve-all', 'wf-1', '--actor', 'alice');

      expect(h.calls[0]?.url).toBe('http://127.0.0.1:9190/api/workflows/wf-1/approve-all');
      expect(h.logs).toEqual(['2 proposal(s) approved in wf-1', '  p-2', '  p-1']);
    });

    it('rejects with feedback', async () => {
      const h = harness([{ body: { success: true, workflowId: 'wf-1', decision: 'rejected', proposalIds: ['p-1'] } }]);
      await h.run('reject-all', 'wf-1', '--actor', 'bob', '--feedback', 'too risky');

      expect(h.calls[0]).toEqual({
        method: 'POST',
        url: 'http://127.0.0.1:9190/api/workflows/wf-1/reject-all',
        body: { actor: 'bob', feedback: 'too risky' },
      });
    });
  });

  describe('runs', () => {
    it('starts a run', async () => {
      const h = harness([{ status: 202, body: { success: true, run: { ...doneRun, state: 'identify', status: 'running', result: null, summary: undefined } } }]);
      await h.run('runs', 'start', 'prod');

      expect(h.calls[0]?.body).toEqual({ scope: 'prod' });
      expect(h.logs).toEqual([`${GREEN}Started${RESET} ${BOLD}wf-9${RESET} for prod`]);
    });

    it('waits for the run to finish', async () => {
      const h = harness([
        { status: 202, body: { success: true, run: { ...doneRun, state: 'identify', status: 'running', result: null } } },
        { body: { success: true, run: doneRun } },
      ]);
      await h.run('runs', 'start', 'prod', '--wait', '--poll', '1');

      expect(h.calls.map((c) => `${c.method} ${c.url}`)).toEqual([
        'POST http://127.0.0.1:9190/api/runs',
        'GET http://127.0.0.1:9190/api/runs/wf-9',
      ]);
      expect(h.logs.slice(1)).toEqual([
        `${BOLD}wf-9${RESET}  ${GREEN}completed${RESET}  scope prod  state done  rounds 1`,
        '  completed: 1 completed, 0 failed of 1 proposal(s)',
        '  prod/api: proposed [resource_exhaustion]',
      ]);
      expect(process.exitCode).toBeUndefined();
    });

    it('reports 404 for an unknown run', async () => {
      const h = harness([{ status: 404, body: { success: false, error: { code: 'NOT_FOUND', message: 'run not found: nope' } } }]);
      await h.run('runs', 'show', 'nope');

      expect(h.errors).toEqual([`${RED}NOT_FOUND: run not found: nope${RESET}`]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('graph', () => {
    it('traverses with relation filters', async () => {
      const h = harness([{
        body: {
          success: true,
          start: 'cause:x',
          path: ['cause:x', 'entity:prod/api'],
          nodes: [{ id: 'entity:prod/api', type: 'entity', label: 'prod/api', attributes: {} }],
        },
      }]);
      await h.run('graph', 'traverse', 'cause:x', '--relations', 'found_in');

      expect(h.calls[0]?.url).toBe('http://127.0.0.1:9190/api/graph/traverse?start=cause%3Ax&depth=2&relations=found_in&direction=out');
      expect(h.logs).toEqual(['cause:x → entity:prod/api', `  entity:prod/api  ${GRAY}entity${RESET}`]);
    });
  });

  it('reports an unreachable server', async () => {
    const h = harness([new Error('connect ECONNREFUSED')]);
    await h.run('graph', 'stats');

    expect(h.errors).toEqual([`${RED}Cannot reach http://127.0.0.1:9190: connect ECONNREFUSED${RESET}`]);
    expect(process.exitCode).toBe(1);
  });
});
