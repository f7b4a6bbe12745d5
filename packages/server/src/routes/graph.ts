/**
 * Knowledge graph API.
 *
 * - POST /findings          ingest findings, classifying ones without a pattern
 * - GET  /graph/nodes       substring search, optionally by node type
 * - GET  /graph/traverse    breadth-first walk from a node
 * - GET  /graph/stats       node and edge counts
 */

import { type FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NODE_TYPES, NotFoundError, RELATIONS, ValidationError } from 'mendgraph-core';
import type { AddFindingResult, Finding, NodeType, Relation } from 'mendgraph-core';
import { getAppState } from '../app-state.js';
import { parseInput } from '../validation.js';

const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'UNKNOWN'] as const;

const FindingSchema = z.object({
  id: z.string().min(1),
  entityId: z.string().min(1),
  description: z.string(),
  severity: z.enum(SEVERITIES).default('UNKNOWN'),
  detectedAt: z.string().datetime({ offset: true }).optional(),
  toolName: z.string().min(1),
  patternId: z.string().min(1).optional(),
});

const IngestSchema = z.object({
  findings: z.array(FindingSchema).min(1),
});

const NodeQuerySchema = z.object({
  q: z.string().default(''),
  type: z.string().refine((t): t is NodeType => NODE_TYPES.some((n) => n === t), 'unknown node type').optional(),
});

const TraverseQuerySchema = z.object({
  start: z.string().min(1),
  depth: z.coerce.number().int().min(0).max(10).default(2),
  relations: z.string().optional(),
  direction: z.enum(['out', 'in', 'both']).default('out'),
});

/** Split a comma list of relation names, rejecting unknown ones. */
export function parseRelations(list: string | undefined): Relation[] | undefined {
  if (list === undefined || list.trim() === '') return undefined;
  const names = list.split(',').map((s) => s.trim()).filter(Boolean);
  return names.map((name) => {
    const relation = RELATIONS.find((r) => r === name);
    if (!relation) throw new ValidationError(`Unknown relation: ${name}`, [`allowed: ${RELATIONS.join(', ')}`]);
    return relation;
  });
}

export const graphRoutes: FastifyPluginAsync = async (app) => {

  // ─── POST /findings ─────────────────────────────────────────────────

  app.post('/findings', async (request, reply) => {
    const { findings } = parseInput(IngestSchema, request.body, 'findings');
    const { graph, detector } = getAppState().services;
    const now = new Date().toISOString();

    const total: AddFindingResult = { nodesAdded: 0, edgesAdded: 0 };
    const patterns: Record<string, string> = {};
    for (const input of findings) {
      const finding: Finding = {
        ...input,
        detectedAt: input.detectedAt ?? now,
        patternId: input.patternId ?? detector.primaryPattern(input.description),
      };
      const added = graph.addFinding(finding);
      total.nodesAdded += added.nodesAdded;
      total.edgesAdded += added.edgesAdded;
      patterns[finding.id] = finding.patternId ?? '';
    }
    const persisted = await graph.persist();

    return reply.status(201).send({ success: true, ingested: findings.length, ...total, patterns, persisted });
  });

  // ─── GET /graph/nodes ───────────────────────────────────────────────

  app.get('/graph/nodes', async (request) => {
    const { q, type } = parseInput(NodeQuerySchema, request.query, 'query');
    const nodes = getAppState().services.graph.findNodes(q, type);
    return { success: true, count: nodes.length, nodes };
  });

  // ─── GET /graph/traverse ────────────────────────────────────────────

  app.get('/graph/traverse', async (request) => {
    const query = parseInput(TraverseQuerySchema, request.query, 'query');
    const { graph } = getAppState().services;
    if (!graph.getNode(query.start)) throw new NotFoundError('node', query.start);

    const result = graph.traverse(query.start, {
      maxDepth: query.depth,
      relations: parseRelations(query.relations),
      direction: query.direction,
    });
    return { success: true, start: query.start, ...result };
  });

  // ─── GET /graph/stats ───────────────────────────────────────────────

  app.get('/graph/stats', async () => {
    return { success: true, stats: getAppState().services.graph.stats() };
  });
};
