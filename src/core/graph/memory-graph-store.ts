/**
 * In-process graph store
 *
 * Same semantics as the ArangoDB adapter: MERGE by id, tag-scoped delete,
 * typed-edge pattern matching. Used for `graphStore.engine = "mem"` and in
 * tests.
 *
 * @module
 */

import {
  GRAPH_EDGE_KINDS,
  graphEdgeKey,
  type ConnectedNode,
  type ConnectedOptions,
  type GraphDeleteResult,
  type GraphEdge,
  type GraphNode,
  type GraphRelationship,
  type GraphStats,
  type IGraphStore,
  type NodeSearchOptions,
  type RelationshipOptions,
} from "../interfaces/IGraphStore.js";

export class MemoryGraphStore implements IGraphStore {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();
  private available = true;

  async initialize(): Promise<void> {}

  async close(): Promise<void> {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  /** Simulate the backend going away */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  async upsertNodes(nodes: readonly GraphNode[]): Promise<void> {
    for (const node of nodes) {
      const existing = this.nodes.get(node.id);
      this.nodes.set(node.id, existing ? { ...existing, ...node } : { ...node });
    }
  }

  async upsertEdges(edges: readonly GraphEdge[]): Promise<void> {
    for (const edge of edges) {
      this.edges.set(graphEdgeKey(edge), { ...edge });
    }
  }

  async deleteByTag(businessArea: string, repo: string): Promise<GraphDeleteResult> {
    const removedNodes = new Set<string>();
    for (const [id, node] of this.nodes) {
      if (node.businessArea === businessArea && node.repo === repo) {
        removedNodes.add(id);
        this.nodes.delete(id);
      }
    }

    let edgesDeleted = 0;
    for (const [key, edge] of this.edges) {
      const tagged = edge.businessArea === businessArea && edge.repo === repo;
      if (tagged || removedNodes.has(edge.fromId) || removedNodes.has(edge.toId)) {
        this.edges.delete(key);
        edgesDeleted++;
      }
    }
    return { nodesDeleted: removedNodes.size, edgesDeleted };
  }

  async findNodes(options: NodeSearchOptions): Promise<GraphNode[]> {
    const needle = options.text.toLowerCase();
    const matches: GraphNode[] = [];
    for (const node of this.nodes.values()) {
      if (matches.length >= options.limit) break;
      if (node.businessArea !== options.businessArea) continue;
      const haystacks = [node.name, node.filePath ?? "", node.path ?? ""];
      if (haystacks.some((value) => value.toLowerCase().includes(needle))) {
        matches.push({ ...node });
      }
    }
    return matches;
  }

  async getRelationships(nodeId: string, options: RelationshipOptions): Promise<GraphRelationship[]> {
    const kinds = options.kinds ?? GRAPH_EDGE_KINDS;
    const outgoing: GraphRelationship[] = [];
    const incoming: GraphRelationship[] = [];

    for (const edge of this.edges.values()) {
      if (!kinds.includes(edge.kind)) continue;
      const source = this.nodes.get(edge.fromId);
      const target = this.nodes.get(edge.toId);
      if (!source || !target) continue;

      if (edge.fromId === nodeId && target.businessArea === options.businessArea && outgoing.length < options.limit) {
        outgoing.push({ kind: edge.kind, source: { ...source }, target: { ...target } });
      }
      if (edge.toId === nodeId && source.businessArea === options.businessArea && incoming.length < options.limit) {
        incoming.push({ kind: edge.kind, source: { ...source }, target: { ...target } });
      }
    }
    return [...outgoing, ...incoming];
  }

  async findConnected(options: ConnectedOptions): Promise<ConnectedNode[]> {
    const { anchor: target, businessArea } = options;
    const results: ConnectedNode[] = [];

    for (const edge of this.edges.values()) {
      if (results.length >= options.limit) break;
      if (edge.kind !== options.edgeKind) continue;

      const anchorId = options.direction === "inbound" ? edge.toId : edge.fromId;
      const neighborId = options.direction === "inbound" ? edge.fromId : edge.toId;
      const anchor = this.nodes.get(anchorId);
      const neighbor = this.nodes.get(neighborId);
      if (!anchor || !neighbor) continue;

      if (anchor.businessArea !== businessArea || anchor.kind !== target.kind) continue;
      if (target.name !== undefined && anchor.name !== target.name) continue;
      if (target.path !== undefined && anchor.path !== target.path) continue;
      if (neighbor.businessArea !== businessArea) continue;
      if (options.neighborKind && neighbor.kind !== options.neighborKind) continue;

      results.push({ anchor: { ...anchor }, neighbor: { ...neighbor } });
    }
    return results;
  }

  async stats(filter: { businessArea?: string; repo?: string } = {}): Promise<GraphStats> {
    const matches = (item: { businessArea: string; repo: string }): boolean =>
      (filter.businessArea === undefined || item.businessArea === filter.businessArea) &&
      (filter.repo === undefined || item.repo === filter.repo);

    return {
      nodes: [...this.nodes.values()].filter(matches).length,
      edges: [...this.edges.values()].filter(matches).length,
    };
  }

  /** Snapshot for inspection */
  getNode(id: string): GraphNode | undefined {
    const node = this.nodes.get(id);
    return node ? { ...node } : undefined;
  }

  listEdges(): GraphEdge[] {
    return [...this.edges.values()].map((edge) => ({ ...edge }));
  }
}
