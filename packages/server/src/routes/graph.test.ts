/**
 * Integration tests for the knowledge graph API.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { createTestServer, type TestServer } from '../../tests/harness.js';
import { parseRelations } from './graph.js';

let server: TestServer;

beforeEach(async () => {
  server = await createTestServer();
});

afterEach(async () => {
  await server.close();
});

async function ingest(): Promise<Record<string, unknown>> {
  const res = await server.app.inject({
    method: 'POST',
    url: '/api/findings',
    payload: {
      findings: [{ id: 'f-1', entityId: 'prod/api', description: 'container OOMKilled', severity: 'HIGH', toolName: 'kubectl' }],
    },
  });
  expect(res.statusCode).toBe(201);
  return JSON.parse(res.body);
}

describe('POST /api/findings', () => {
  it('classifies, ingests and persists findings', async () => {
    expect(await ingest()).toEqual({
      success: true,
      ingested: 1,
      nodesAdded: 4,
      edgesAdded: 3,
      patterns: { 'f-1': 'resource_exhaustion' },
      persisted: true,
    });
    expect(fs.existsSync(path.join(server.dir, '.mendgraph', 'graph.json'))).toBe(true);
  });

  it('ignores a finding it has already seen', async () => {
    await ingest();
    const again = await ingest();

    expect(again['nodesAdded']).toBe(0);
    expect(again['edgesAdded']).toBe(0);
  });

  it('keeps a pattern the tool supplied', async () => {
    const res = await server.app.inject({
      method: 'POST',
      url: '/api/findings',
      payload: { findings: [{ id: 'f-2', entityId: 'prod/db', description: 'slow', toolName: 'probe', patternId: 'dependency_unavailable' }] },
    });

    expect(JSON.parse(res.body).patterns).toEqual({ 'f-2': 'dependency_unavailable' });
    expect(server.services.graph.getNode('cause:dependency_unavailable')?.attributes).toEqual({ category: 'connectivity' });
  });

  it('rejects a finding without a tool', async () => {
    const res = await server.app.inject({
      method: 'POST',
      url: '/api/findings',
      payload: { findings: [{ id: 'f-1', entityId: 'prod/api', description: 'x' }] },
    });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error.message).toBe('Invalid findings: findings.0.toolName: Required');
  });
});

describe('GET /api/graph/nodes', () => {
  it('searches by substring and type', async () => {
    await ingest();

    const api = JSON.parse((await server.app.inject({ method: 'GET', url: '/api/graph/nodes?q=api' })).body);
    expect(api.nodes.map((n: { id: string }) => n.id)).toEqual(['entity:prod/api']);

    const causes = JSON.parse((await server.app.inject({ method: 'GET', url: '/api/graph/nodes?type=cause' })).body);
    expect(causes.nodes.map((n: { id: string }) => n.id)).toEqual(['cause:resource_exhaustion']);
  });

  it('rejects an unknown node type', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/api/graph/nodes?type=bogus' });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error.message).toBe('Invalid query: type: unknown node type');
  });
});

describe('GET /api/graph/traverse', () => {
  it('walks outgoing edges from a cause', async () => {
    await ingest();

    const body = JSON.parse((await server.app.inject({
      method: 'GET',
      url: '/api/graph/traverse?start=cause:resource_exhaustion&depth=1',
    })).body);

    expect(body.path).toEqual(['cause:resource_exhaustion', 'category:resources', 'tool:kubectl', 'entity:prod/api']);
  });

  it('follows only the named relations', async () => {
    await ingest();

    const body = JSON.parse((await server.app.inject({
      method: 'GET',
      url: '/api/graph/traverse?start=entity:prod/api&direction=in&relations=found_in',
    })).body);

    expect(body.path).toEqual(['entity:prod/api', 'cause:resource_exhaustion']);
  });

  it('returns 404 for an unknown start node', async () => {
    const res = await server.app.inject({ method: 'GET', url: '/api/graph/traverse?start=cause:nope' });

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body).error.message).toBe('node not found: cause:nope');
  });
});

describe('GET /api/graph/stats', () => {
  it('counts nodes, edges and findings', async () => {
    await ingest();

    const stats = JSON.parse((await server.app.inject({ method: 'GET', url: '/api/graph/stats' })).body).stats;
    expect(stats.nodes).toBe(4);
    expect(stats.edges).toBe(3);
    expect(stats.findings).toBe(1);
    expect(stats.nodesByType.cause).toBe(1);
  });
});

describe('parseRelations', () => {
  it('splits a comma list', () => {
    expect(parseRelations('found_in, remediates')).toEqual(['found_in', 'remediates']);
    expect(parseRelations('')).toBeUndefined();
    expect(parseRelations(undefined)).toBeUndefined();
  });

  it('rejects unknown relations', () => {
    expect(() => parseRelations('found_in,bogus')).toThrow('Unknown relation: bogus');
  });
});
