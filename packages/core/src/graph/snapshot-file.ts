/**
 * @module graph/snapshot-file
 * JSON snapshot persistence for the knowledge graph.
 *
 * Writes go to a temporary sibling file which is then renamed over the
 * target, so a crash mid-write leaves the previous snapshot intact. Every
 * write uses its own temporary name; concurrent writers never share one.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { GraphEdge, GraphNode } from './types.js';
import { PersistenceError, errorMessage } from '../errors.js';

export const SNAPSHOT_FORMAT = 'mendgraph.knowledge-graph';
export const SNAPSHOT_VERSION = 1;

const NodeTypeSchema = z.enum(['cause', 'fix', 'tool', 'entity', 'category']);
const RelationSchema = z.enum(['instance_of', 'categorized_as', 'detected_by', 'remediates', 'found_in', 'similar_to']);

const SnapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  savedAt: z.string(),
  nodes: z.array(z.object({
    id: z.string().min(1),
    type: NodeTypeSchema,
    label: z.string(),
    attributes: z.record(z.string()).default({}),
  })),
  edges: z.array(z.object({
    from: z.string().min(1),
    to: z.string().min(1),
    relation: RelationSchema,
    metadata: z.record(z.unknown()).default({}),
  })),
  findings: z.array(z.string()).default([]),
});

export interface GraphSnapshotData {
  nodes: GraphNode[];
  edges: GraphEdge[];
  findings: string[];
}

export class GraphSnapshotFile {
  constructor(readonly filePath: string) {}

  /**
   * Read and validate the snapshot.
   * @returns `undefined` when the file does not exist
   * @throws {PersistenceError} when the file is unreadable, not JSON or malformed
   */
  async read(): Promise<GraphSnapshotData | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw new PersistenceError(`Cannot read graph snapshot ${this.filePath}: ${errorMessage(err)}`, { path: this.filePath });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`Graph snapshot is not valid JSON: ${errorMessage(err)}`, { path: this.filePath });
    }

    const result = SnapshotSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new PersistenceError(`Graph snapshot is malformed (${issues.length} issue(s))`, { path: this.filePath, issues });
    }

    const { nodes, edges, findings } = result.data;
    return { nodes, edges, findings };
  }

  /** @throws {PersistenceError} */
  async write(data: GraphSnapshotData): Promise<void> {
    const body = JSON.stringify({
      format: SNAPSHOT_FORMAT,
      version: SNAPSHOT_VERSION,
      savedAt: new Date().toISOString(),
      nodes: data.nodes,
      edges: data.edges,
      findings: data.findings,
    }, null, 2);

    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, body, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw new PersistenceError(`Cannot write graph snapshot ${this.filePath}: ${errorMessage(err)}`, { path: this.filePath });
    }
  }
}
