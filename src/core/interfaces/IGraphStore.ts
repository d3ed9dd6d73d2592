/**
 * IGraphStore - Abstract code graph store interface
 *
 * Provides the operations the code graph needs from a graph database:
 * - Create-or-update by id (MERGE semantics) for nodes and edges
 * - Tag-scoped delete by (business area, repository)
 * - Pattern match over typed edges
 *
 * @module
 */

// =============================================================================
// Graph Model
// =============================================================================

export type GraphNodeKind = "Function" | "Class" | "File" | "Script" | "Module";

export type GraphEdgeKind = "CALLS" | "RUNS_SUBPROCESS" | "IMPORTS";

export const GRAPH_EDGE_KINDS: readonly GraphEdgeKind[] = ["CALLS", "RUNS_SUBPROCESS", "IMPORTS"];

/**
 * Derived graph node. `id` is `{area}:{repo}:{kind}:{name}` with the kind
 * lower-cased.
 */
export interface GraphNode {
  id: string;
  kind: GraphNodeKind;
  name: string;
  businessArea: string;
  repo: string;
  filePath?: string;
  /** Script path (Script nodes) */
  path?: string;
  lineStart?: number;
  lineEnd?: number;
}

/**
 * Directed edge, tagged with its owning (area, repo) for scoped deletion.
 * Identity is (kind, fromId, toId).
 */
export interface GraphEdge {
  kind: GraphEdgeKind;
  fromId: string;
  toId: string;
  businessArea: string;
  repo: string;
}

export interface GraphRelationship {
  kind: GraphEdgeKind;
  source: GraphNode;
  target: GraphNode;
}

// =============================================================================
// Query Options
// =============================================================================

export interface NodeSearchOptions {
  businessArea: string;
  /** Case-insensitive substring matched against name, file path and path */
  text: string;
  limit: number;
}

export interface RelationshipOptions {
  businessArea: string;
  kinds?: readonly GraphEdgeKind[];
  /** Applied to each direction separately */
  limit: number;
}

export interface ConnectedOptions {
  businessArea: string;
  edgeKind: GraphEdgeKind;
  /** `inbound`: neighbor -> anchor; `outbound`: anchor -> neighbor */
  direction: "inbound" | "outbound";
  anchor: { kind: GraphNodeKind; name?: string; path?: string };
  neighborKind?: GraphNodeKind;
  limit: number;
}

export interface ConnectedNode {
  anchor: GraphNode;
  neighbor: GraphNode;
}

export interface GraphDeleteResult {
  nodesDeleted: number;
  edgesDeleted: number;
}

export interface GraphStats {
  nodes: number;
  edges: number;
}

// =============================================================================
// Interface
// =============================================================================

/**
 * Graph store interface.
 *
 * @example
 * ```typescript
 * const store = createGraphStore(settings.graphStore);
 * await store.initialize();
 *
 * await store.deleteByTag("pharmacy", "org/refills");
 * await store.upsertNodes(nodes);
 * await store.upsertEdges(edges);
 *
 * const matches = await store.findNodes({ businessArea: "pharmacy", text: "refill", limit: 5 });
 * ```
 */
export interface IGraphStore {
  /** Connect and create collections / indexes if missing */
  initialize(): Promise<void>;

  close(): Promise<void>;

  /** Whether the backend is reachable. Never throws. */
  isAvailable(): Promise<boolean>;

  /** Create-or-update nodes by id */
  upsertNodes(nodes: readonly GraphNode[]): Promise<void>;

  /** Create-or-update edges by (kind, fromId, toId) */
  upsertEdges(edges: readonly GraphEdge[]): Promise<void>;

  /** Delete every node and edge tagged with (businessArea, repo) */
  deleteByTag(businessArea: string, repo: string): Promise<GraphDeleteResult>;

  findNodes(options: NodeSearchOptions): Promise<GraphNode[]>;

  /** Outgoing then incoming relationships of a node within the area */
  getRelationships(nodeId: string, options: RelationshipOptions): Promise<GraphRelationship[]>;

  findConnected(options: ConnectedOptions): Promise<ConnectedNode[]>;

  stats(filter?: { businessArea?: string; repo?: string }): Promise<GraphStats>;
}

// =============================================================================
// Helpers
// =============================================================================

export function graphNodeId(
  businessArea: string,
  repo: string,
  kind: GraphNodeKind,
  name: string
): string {
  return `${businessArea}:${repo}:${kind.toLowerCase()}:${name}`;
}

export function graphEdgeKey(edge: Pick<GraphEdge, "kind" | "fromId" | "toId">): string {
  return `${edge.kind}|${edge.fromId}|${edge.toId}`;
}
