/**
 * Integration tests for the workflow run API.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestServer, finding, type TestServer } from '../../tests/harness.js';

let server: TestServer;

beforeEach(async () => {
  server = await createTestServer();
  server.source.findings = [finding('prod/api', 'OOMKilled')];
  server.source.signals = { 'prod/api': ['container api: OOMKilled'] };
});

afterEach(async () => {
  await server.close();
});

async function startRun(scope: string): Promise<string> {
  const res = await server.app.inject({ method: 'POST', url: '/api/runs', payload: { scope } });
  expect(res.statusCode).toBe(202);
  return JSON.parse(res.body).run.id;
}

async function waitForPending(runId: string): Promise<void> {
  await vi.waitFor(() => expect(server.services.queue.status(runId).pendingCount).toBe(1));
}

describe('POST /api/runs', () => {
  it('starts a run that completes once its proposals are approved', async () => {
    const runId = await startRun('prod');
    await waitForPending(runId);

    await server.app.inject({ method: 'POST', url: `/api/workflows/${runId}/approve-all`, payload: { actor: 'alice' } });
    await server.services.engine.waitFor(runId);

    const res = await server.app.inject({ method: 'GET', url: `/api/runs/${runId}` });
    const run = JSON.parse(res.body).run;
    expect(run.status).toBe('done');
    expect(run.result).toBe('completed');
    expect(run.summary).toBe('completed: 1 completed, 0 failed of 1 proposal(s)');
  });

  it('requires a scope', async () => {
    const res = await server.app.inject({ method: 'POST', url: '/api/runs', payload: {} });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error.message).toBe('Invalid run request: scope: Required');
  });
});

describe('GET /api/runs', () => {
  it('lists runs', async () => {
    server.source.findings = [];
    const runId = await startRun('prod');
    await server.services.engine.waitFor(runId);

    const body = JSON.parse((await server.app.inject({ method: 'GET', url: '/api/runs' })).body);
    expect(body.count).toBe(1);
    expect(body.runs[0].id).toBe(runId);
    expect(body.runs[0].result).toBe('no_action');
  });

  it('returns 404 for an unknown run', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/api/runs/nope' });

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body).error.message).toBe('run not found: nope');
  });
});

describe('POST /api/runs/:id/cancel', () => {
  it('cancels a run awaiting approval', async () => {
    const runId = await startRun('prod');
    await waitForPending(runId);

    const res = await server.app.inject({ method: 'POST', url: `/api/runs/${runId}/cancel` });
    expect(JSON.parse(res.body)).toEqual({ success: true, runId, cancelled: true });

    const run = await server.services.engine.waitFor(runId);
    expect(run.result).toBe('cancelled');

    const again = await server.app.inject({ method: 'POST', url: `/api/runs/${runId}/cancel` });
    expect(JSON.parse(again.body).cancelled).toBe(false);
  });
});
