/**
 * @module graph/knowledge-graph
 * Typed, directed, multi-relationship graph of causes, fixes, tools,
 * entities and categories.
 *
 * Every write builds a new immutable snapshot and swaps the reference, so
 * a reader holding `snapshot()` (or iterating within a query) always sees a
 * complete state. Nodes and edges are append-only; edge metadata changes
 * only through additive counter increments.
 */

import type {
  AddFindingResult,
  GraphEdge,
  GraphNode,
  GraphStats,
  NodeType,
  Relation,
  Relationship,
  TraverseOptions,
  TraverseResult,
} from './types.js';
import { NODE_TYPES, RELATIONS, nodeId } from './types.js';
import { GraphSnapshotFile } from './snapshot-file.js';
import type { Finding, PatternId } from '../types.js';
import { UNKNOWN_PATTERN } from '../types.js';
import { NotFoundError, ValidationError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

// =====================================================================
// Snapshot
// =====================================================================

interface GraphState {
  readonly nodes: ReadonlyMap<string, GraphNode>;
  readonly edges: readonly GraphEdge[];
  /** edge key → index into `edges` */
  readonly edgeIndex: ReadonlyMap<string, number>;
  readonly outgoing: ReadonlyMap<string, readonly number[]>;
  readonly incoming: ReadonlyMap<string, readonly number[]>;
  readonly findings: ReadonlySet<string>;
}

const EMPTY_STATE: GraphState = {
  nodes: new Map(),
  edges: [],
  edgeIndex: new Map(),
  outgoing: new Map(),
  incoming: new Map(),
  findings: new Set(),
};

/** Mutable working copy of a snapshot, committed in one swap. */
class Draft {
  readonly nodes: Map<string, GraphNode>;
  readonly edges: GraphEdge[];
  readonly edgeIndex: Map<string, number>;
  readonly outgoing: Map<string, readonly number[]>;
  readonly incoming: Map<string, readonly number[]>;
  readonly findings: Set<string>;
  nodesAdded = 0;
  edgesAdded = 0;

  constructor(base: GraphState) {
    this.nodes = new Map(base.nodes);
    this.edges = [...base.edges];
    this.edgeIndex = new Map(base.edgeIndex);
    this.outgoing = new Map(base.outgoing);
    this.incoming = new Map(base.incoming);
    this.findings = new Set(base.findings);
  }

  addNode(node: GraphNode): boolean {
    validateNode(node);
    if (this.nodes.has(node.id)) return false;
    this.nodes.set(node.id, Object.freeze({ ...node, attributes: Object.freeze({ ...node.attributes }) }));
    this.nodesAdded++;
    return true;
  }

  addEdge(edge: GraphEdge): boolean {
    this.validateEdge(edge);
    const key = edgeKey(edge.from, edge.to, edge.relation);
    if (this.edgeIndex.has(key)) return false;
    const index = this.edges.length;
    this.edges.push(freezeEdge(edge));
    this.edgeIndex.set(key, index);
    this.outgoing.set(edge.from, [...(this.outgoing.get(edge.from) ?? []), index]);
    this.incoming.set(edge.to, [...(this.incoming.get(edge.to) ?? []), index]);
    this.edgesAdded++;
    return true;
  }

  replaceEdge(index: number, edge: GraphEdge): void {
    this.edges[index] = freezeEdge(edge);
  }

  commit(): GraphState {
    return {
      nodes: this.nodes,
      edges: this.edges,
      edgeIndex: this.edgeIndex,
      outgoing: this.outgoing,
      incoming: this.incoming,
      findings: this.findings,
    };
  }

  private validateEdge(edge: GraphEdge): void {
    if (!RELATIONS.includes(edge.relation)) {
      throw new ValidationError(`Unknown relation: ${edge.relation}`);
    }
    const from = this.nodes.get(edge.from);
    const to = this.nodes.get(edge.to);
    if (!from) throw new NotFoundError('node', edge.from);
    if (!to) throw new NotFoundError('node', edge.to);
    if (edge.relation === 'instance_of') {
      if ((from.type !== 'cause' && from.type !== 'entity') || to.type !== 'category') {
        throw new ValidationError(
          `instance_of must link a cause or entity to a category (got ${from.type} → ${to.type})`,
          [`${edge.from} -instance_of-> ${edge.to}`],
        );
      }
    }
  }
}

function validateNode(node: GraphNode): void {
  if (!NODE_TYPES.includes(node.type)) {
    throw new ValidationError(`Unknown node type: ${node.type}`);
  }
  if (!node.id.startsWith(`${node.type}:`) || node.id.length === node.type.length + 1) {
    throw new ValidationError(`Node id must be namespaced as "${node.type}:<key>": ${node.id}`);
  }
}

function edgeKey(from: string, to: string, relation: Relation): string {
  return `${from}\u0000${to}\u0000${relation}`;
}

function freezeEdge(edge: GraphEdge): GraphEdge {
  return Object.freeze({ ...edge, metadata: Object.freeze({ ...edge.metadata }) });
}

// =====================================================================
// KnowledgeGraph
// =====================================================================

export interface KnowledgeGraphOptions {
  /** JSON snapshot location used by `persist()` / `load()`. */
  snapshotPath?: string;
  /** Category of a pattern, for `addFinding`. Default: `uncategorized`. */
  categorize?: (patternId: PatternId) => string;
  logger?: Logger;
}

export class KnowledgeGraph {
  private state: GraphState = EMPTY_STATE;
  private readonly file?: GraphSnapshotFile;
  /** Tail of the persist queue; never rejects. */
  private persisting: Promise<boolean> = Promise.resolve(true);
  private readonly categorize: (patternId: PatternId) => string;
  private readonly logger: Logger;

  constructor(options: KnowledgeGraphOptions = {}) {
    this.file = options.snapshotPath ? new GraphSnapshotFile(options.snapshotPath) : undefined;
    this.categorize = options.categorize ?? (() => 'uncategorized');
    this.logger = options.logger ?? silentLogger;
  }

  // ---- Writes ----

  /** @returns false when a node with this id already exists */
  addNode(node: GraphNode): boolean {
    return this.write((draft) => draft.addNode(node));
  }

  /** @returns false when the `(from, to, relation)` edge already exists */
  addEdge(edge: GraphEdge): boolean {
    return this.write((draft) => draft.addEdge(edge));
  }

  /**
   * Ingest a finding: entity, cause, category and tool nodes plus the
   * `instance_of`, `detected_by` and `found_in` edges of its cause.
   * Re-adding a finding id is a no-op returning zeros.
   */
  addFinding(finding: Finding): AddFindingResult {
    if (!finding.id || !finding.entityId || !finding.toolName) {
      throw new ValidationError('Finding requires id, entityId and toolName');
    }
    if (this.state.findings.has(finding.id)) {
      return { nodesAdded: 0, edgesAdded: 0 };
    }

    const draft = new Draft(this.state);
    const patternId = finding.patternId ?? UNKNOWN_PATTERN;
    const category = this.categorize(patternId);

    const entity = nodeId('entity', finding.entityId);
    const cause = nodeId('cause', patternId);
    const categoryId = nodeId('category', category);
    const tool = nodeId('tool', finding.toolName);

    draft.addNode({ id: entity, type: 'entity', label: finding.entityId, attributes: {} });
    draft.addNode({ id: cause, type: 'cause', label: patternId, attributes: { category } });
    draft.addNode({ id: categoryId, type: 'category', label: category, attributes: {} });
    draft.addNode({ id: tool, type: 'tool', label: finding.toolName, attributes: {} });

    draft.addEdge({ from: cause, to: categoryId, relation: 'instance_of', metadata: {} });
    draft.addEdge({ from: cause, to: tool, relation: 'detected_by', metadata: {} });
    this.incrementIn(draft, cause, entity, 'found_in', { finding_count: 1 }, { last_seen: finding.detectedAt });

    draft.findings.add(finding.id);
    this.state = draft.commit();
    return { nodesAdded: draft.nodesAdded, edgesAdded: draft.edgesAdded };
  }

  /**
   * Add numeric increments to an edge's metadata (missing counters start at
   * 0) and overwrite the `set` keys, creating the edge when absent.
   */
  incrementEdge(
    from: string,
    to: string,
    relation: Relation,
    increments: Record<string, number>,
    set: Record<string, unknown> = {},
  ): GraphEdge {
    return this.write((draft) => this.incrementIn(draft, from, to, relation, increments, set));
  }

  // ---- Reads ----

  getNode(id: string): GraphNode | undefined {
    return this.state.nodes.get(id);
  }

  getEdge(from: string, to: string, relation: Relation): GraphEdge | undefined {
    const state = this.state;
    const index = state.edgeIndex.get(edgeKey(from, to, relation));
    return index === undefined ? undefined : state.edges[index];
  }

  hasFinding(findingId: string): boolean {
    return this.state.findings.has(findingId);
  }

  /** Case-insensitive substring match over id, label and attribute values, in insertion order. */
  findNodes(query: string, type?: NodeType): GraphNode[] {
    const needle = query.toLowerCase();
    const matches: GraphNode[] = [];
    for (const node of this.state.nodes.values()) {
      if (type && node.type !== type) continue;
      if (
        node.id.toLowerCase().includes(needle) ||
        node.label.toLowerCase().includes(needle) ||
        Object.values(node.attributes).some((v) => v.toLowerCase().includes(needle))
      ) {
        matches.push(node);
      }
    }
    return matches;
  }

  /**
   * Breadth-first walk from `startId`, following edges in insertion order.
   * Each node is visited at most once, so cycles terminate.
   */
  traverse(startId: string, options: TraverseOptions = {}): TraverseResult {
    const state = this.state;
    if (!state.nodes.has(startId)) return { path: [], nodes: [] };

    const maxDepth = Math.max(0, options.maxDepth ?? 2);
    const direction = options.direction ?? 'out';
    const allowed = options.relations ? new Set(options.relations) : undefined;

    const visited = new Set<string>([startId]);
    const path: string[] = [startId];
    const nodes: GraphNode[] = [];
    let frontier = [startId];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const current of frontier) {
        for (const neighbour of neighbours(state, current, direction, allowed)) {
          if (visited.has(neighbour)) continue;
          visited.add(neighbour);
          const node = state.nodes.get(neighbour);
          if (!node) continue;
          path.push(neighbour);
          nodes.push(node);
          next.push(neighbour);
        }
      }
      frontier = next;
    }

    return { path, nodes };
  }

  /** One-hop outgoing relationships of a node, optionally filtered by relation. */
  getRelationships(id: string, relation?: Relation): Relationship[] {
    const state = this.state;
    const result: Relationship[] = [];
    for (const index of state.outgoing.get(id) ?? []) {
      const edge = state.edges[index];
      if (!edge || (relation && edge.relation !== relation)) continue;
      result.push({ targetId: edge.to, metadata: edge.metadata });
    }
    return result;
  }

  stats(): GraphStats {
    const state = this.state;
    const nodesByType: Record<NodeType, number> = { cause: 0, fix: 0, tool: 0, entity: 0, category: 0 };
    const edgesByRelation: Record<Relation, number> = {
      instance_of: 0, categorized_as: 0, detected_by: 0, remediates: 0, found_in: 0, similar_to: 0,
    };
    for (const node of state.nodes.values()) nodesByType[node.type]++;
    for (const edge of state.edges) edgesByRelation[edge.relation]++;
    return {
      nodes: state.nodes.size,
      edges: state.edges.length,
      findings: state.findings.size,
      nodesByType,
      edgesByRelation,
    };
  }

  /** Current immutable state as plain arrays. */
  snapshot(): { nodes: GraphNode[]; edges: GraphEdge[]; findings: string[] } {
    const state = this.state;
    return { nodes: [...state.nodes.values()], edges: [...state.edges], findings: [...state.findings] };
  }

  // ---- Persistence ----

  /**
   * Write the current snapshot to disk. Calls are queued, and each write
   * takes its snapshot when its turn comes, so the last call leaves the
   * newest graph on disk.
   * @returns false when no path is configured or the write failed (logged)
   */
  async persist(): Promise<boolean> {
    const file = this.file;
    if (!file) return false;
    const next = this.persisting.then(() => this.writeSnapshot(file));
    this.persisting = next;
    return next;
  }

  /**
   * Replace the in-memory graph with the snapshot on disk. A missing file
   * yields an empty graph; a corrupt one is logged and yields an empty graph.
   * @returns true when a snapshot was loaded
   */
  async load(): Promise<boolean> {
    if (!this.file) return false;
    try {
      const data = await this.file.read();
      if (!data) {
        this.logger.info(`No graph snapshot at ${this.file.filePath}, starting empty`);
        this.state = EMPTY_STATE;
        return false;
      }
      const draft = new Draft(EMPTY_STATE);
      for (const node of data.nodes) draft.addNode(node);
      for (const edge of data.edges) draft.addEdge(edge);
      for (const id of data.findings) draft.findings.add(id);
      this.state = draft.commit();
      this.logger.info(`Loaded ${draft.nodesAdded} nodes and ${draft.edgesAdded} edges from ${this.file.filePath}`);
      return true;
    } catch (err) {
      this.logger.error(`Graph snapshot unusable, starting empty: ${errorMessage(err)}`);
      this.state = EMPTY_STATE;
      return false;
    }
  }

  // ---- Internals ----

  private async writeSnapshot(file: GraphSnapshotFile): Promise<boolean> {
    try {
      await file.write(this.snapshot());
      this.logger.debug(`Persisted ${this.state.nodes.size} nodes to ${file.filePath}`);
      return true;
    } catch (err) {
      this.logger.error(`Graph persist failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private write<T>(fn: (draft: Draft) => T): T {
    const draft = new Draft(this.state);
    const result = fn(draft);
    this.state = draft.commit();
    return result;
  }

  private incrementIn(
    draft: Draft,
    from: string,
    to: string,
    relation: Relation,
    increments: Record<string, number>,
    set: Record<string, unknown>,
  ): GraphEdge {
    draft.addEdge({ from, to, relation, metadata: {} });
    const index = draft.edgeIndex.get(edgeKey(from, to, relation));
    const current = index === undefined ? undefined : draft.edges[index];
    if (index === undefined || !current) {
      throw new NotFoundError('edge', `${from} -${relation}-> ${to}`);
    }

    const metadata: Record<string, unknown> = { ...current.metadata };
    for (const [key, delta] of Object.entries(increments)) {
      const previous = metadata[key];
      metadata[key] = (typeof previous === 'number' ? previous : 0) + delta;
    }
    Object.assign(metadata, set);

    const updated: GraphEdge = { ...current, metadata };
    draft.replaceEdge(index, updated);
    return updated;
  }
}

function* neighbours(
  state: GraphState,
  id: string,
  direction: 'out' | 'in' | 'both',
  allowed: ReadonlySet<Relation> | undefined,
): Generator<string> {
  if (direction !== 'in') {
    for (const index of state.outgoing.get(id) ?? []) {
      const edge = state.edges[index];
      if (edge && (!allowed || allowed.has(edge.relation))) yield edge.to;
    }
  }
  if (direction !== 'out') {
    for (const index of state.incoming.get(id) ?? []) {
      const edge = state.edges[index];
      if (edge && (!allowed || allowed.has(edge.relation))) yield edge.from;
    }
  }
}
