/**
 * @module graph/types
 * Node, edge and query types of the knowledge graph.
 */

export type NodeType = 'cause' | 'fix' | 'tool' | 'entity' | 'category';

export const NODE_TYPES: readonly NodeType[] = ['cause', 'fix', 'tool', 'entity', 'category'];

export type Relation =
  | 'instance_of'
  | 'categorized_as'
  | 'detected_by'
  | 'remediates'
  | 'found_in'
  | 'similar_to';

export const RELATIONS: readonly Relation[] = [
  'instance_of',
  'categorized_as',
  'detected_by',
  'remediates',
  'found_in',
  'similar_to',
];

export interface GraphNode {
  /** Namespaced by type, e.g. `cause:resource_exhaustion`. */
  id: string;
  type: NodeType;
  label: string;
  attributes: Record<string, string>;
}

export interface GraphEdge {
  from: string;
  to: string;
  relation: Relation;
  metadata: Record<string, unknown>;
}

export interface TraverseOptions {
  /** Default: 2 */
  maxDepth?: number;
  /** Only follow these relations. Default: all. */
  relations?: readonly Relation[];
  /** Default: `out` */
  direction?: 'out' | 'in' | 'both';
}

export interface TraverseResult {
  /** Node ids in visit order, starting node first. */
  path: string[];
  /** Reached nodes, excluding the start. */
  nodes: GraphNode[];
}

export interface Relationship {
  targetId: string;
  metadata: Record<string, unknown>;
}

export interface AddFindingResult {
  nodesAdded: number;
  edgesAdded: number;
}

export interface GraphStats {
  nodes: number;
  edges: number;
  findings: number;
  nodesByType: Record<NodeType, number>;
  edgesByRelation: Record<Relation, number>;
}

/** Build a namespaced node id. */
export function nodeId(type: NodeType, key: string): string {
  return `${type}:${key}`;
}

export function isRelation(value: string): value is Relation {
  return RELATIONS.some((r) => r === value);
}
