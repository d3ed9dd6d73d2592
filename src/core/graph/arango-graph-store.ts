/**
 * ArangoDB graph store
 *
 * Nodes live in one document collection and edges in one edge collection,
 * each tagged with `business_area` and `repo`. Document keys are hashes of
 * the composite node id because ids contain characters Arango keys reject.
 *
 * @module
 */

import * as crypto from "node:crypto";
import { Database } from "arangojs";
import { z } from "zod";
import { ErrorCode, ExternalUnavailableError } from "../errors.js";
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
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("arango-graph-store");

const NODE_COLLECTION = "code_nodes";
const EDGE_COLLECTION = "code_edges";
const BATCH_SIZE = 500;

// =============================================================================
// Document shapes
// =============================================================================

const NodeDocSchema = z.object({
  id: z.string(),
  kind: z.enum(["Function", "Class", "File", "Script", "Module"]),
  name: z.string(),
  business_area: z.string(),
  repo: z.string(),
  file_path: z.string().nullish(),
  path: z.string().nullish(),
  line_start: z.number().nullish(),
  line_end: z.number().nullish(),
});

const EdgeKindSchema = z.enum(["CALLS", "RUNS_SUBPROCESS", "IMPORTS"]);

const RelationshipDocSchema = z.object({
  kind: EdgeKindSchema,
  source: NodeDocSchema,
  target: NodeDocSchema,
});

const ConnectedDocSchema = z.object({
  anchor: NodeDocSchema,
  neighbor: NodeDocSchema,
});

type NodeDoc = z.infer<typeof NodeDocSchema>;

function documentKey(value: string): string {
  return crypto.createHash("sha1").update(value).digest("hex");
}

function nodeHandle(nodeId: string): string {
  return `${NODE_COLLECTION}/${documentKey(nodeId)}`;
}

function toNodeDoc(node: GraphNode): NodeDoc & { _key: string } {
  return {
    _key: documentKey(node.id),
    id: node.id,
    kind: node.kind,
    name: node.name,
    business_area: node.businessArea,
    repo: node.repo,
    file_path: node.filePath ?? null,
    path: node.path ?? null,
    line_start: node.lineStart ?? null,
    line_end: node.lineEnd ?? null,
  };
}

function fromNodeDoc(doc: NodeDoc): GraphNode {
  const node: GraphNode = {
    id: doc.id,
    kind: doc.kind,
    name: doc.name,
    businessArea: doc.business_area,
    repo: doc.repo,
  };
  if (doc.file_path != null) node.filePath = doc.file_path;
  if (doc.path != null) node.path = doc.path;
  if (doc.line_start != null) node.lineStart = doc.line_start;
  if (doc.line_end != null) node.lineEnd = doc.line_end;
  return node;
}

// =============================================================================
// ArangoGraphStore
// =============================================================================

export interface ArangoGraphStoreOptions {
  url: string;
  database: string;
  username: string;
  password?: string;
}

export class ArangoGraphStore implements IGraphStore {
  private readonly options: ArangoGraphStoreOptions;
  private db: Database | null = null;

  constructor(options: ArangoGraphStoreOptions) {
    this.options = options;
  }

  private connection(): Database {
    if (!this.db) {
      this.db = new Database({
        url: this.options.url,
        databaseName: this.options.database,
        auth: { username: this.options.username, password: this.options.password ?? "" },
      });
    }
    return this.db;
  }

  async initialize(): Promise<void> {
    try {
      const system = new Database({
        url: this.options.url,
        auth: { username: this.options.username, password: this.options.password ?? "" },
      });
      const databases = await system.listDatabases();
      if (!databases.includes(this.options.database)) {
        await system.createDatabase(this.options.database);
        logger.info({ database: this.options.database }, "Created database");
      }
      system.close();

      const db = this.connection();
      const nodes = db.collection(NODE_COLLECTION);
      if (!(await nodes.exists())) {
        await db.createCollection(NODE_COLLECTION);
      }
      const edges = db.collection(EDGE_COLLECTION);
      if (!(await edges.exists())) {
        await db.createEdgeCollection(EDGE_COLLECTION);
      }

      await nodes.ensureIndex({ type: "persistent", fields: ["business_area", "repo"], name: "idx_nodes_area_repo" });
      await nodes.ensureIndex({ type: "persistent", fields: ["business_area", "kind", "name"], name: "idx_nodes_area_kind_name" });
      await edges.ensureIndex({ type: "persistent", fields: ["business_area", "repo"], name: "idx_edges_area_repo" });
      logger.info({ database: this.options.database }, "Graph store initialized");
    } catch (error) {
      throw new ExternalUnavailableError(
        "arangodb",
        `Failed to initialize graph store: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.GRAPH_CONNECTION_FAILED,
        { url: this.options.url, database: this.options.database }
      );
    }
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.connection().version();
      return true;
    } catch (error) {
      logger.debug({ err: error }, "Graph store unreachable");
      return false;
    }
  }

  private async run(query: string, bindVars: Record<string, unknown>): Promise<unknown[]> {
    try {
      const cursor = await this.connection().query(query, bindVars);
      const rows: unknown[] = await cursor.all();
      return rows;
    } catch (error) {
      throw new ExternalUnavailableError(
        "arangodb",
        `Graph query failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.GRAPH_QUERY_FAILED,
        { query: query.trim().split("\n")[0] }
      );
    }
  }

  async upsertNodes(nodes: readonly GraphNode[]): Promise<void> {
    for (let i = 0; i < nodes.length; i += BATCH_SIZE) {
      const items = nodes.slice(i, i + BATCH_SIZE).map((node) => {
        const doc = toNodeDoc(node);
        // Absent properties leave stored values in place
        const patch = Object.fromEntries(Object.entries(doc).filter(([, value]) => value !== null));
        return { doc, patch };
      });
      await this.run(
        `FOR item IN @items
           UPSERT { _key: item.doc._key }
           INSERT item.doc
           UPDATE item.patch
           IN @@nodes`,
        { items, "@nodes": NODE_COLLECTION }
      );
    }
  }

  async upsertEdges(edges: readonly GraphEdge[]): Promise<void> {
    for (let i = 0; i < edges.length; i += BATCH_SIZE) {
      const docs = edges.slice(i, i + BATCH_SIZE).map((edge) => ({
        _key: documentKey(graphEdgeKey(edge)),
        _from: nodeHandle(edge.fromId),
        _to: nodeHandle(edge.toId),
        kind: edge.kind,
        from_id: edge.fromId,
        to_id: edge.toId,
        business_area: edge.businessArea,
        repo: edge.repo,
      }));
      await this.run(
        `FOR doc IN @docs
           UPSERT { _key: doc._key }
           INSERT doc
           UPDATE doc
           IN @@edges`,
        { docs, "@edges": EDGE_COLLECTION }
      );
    }
  }

  async deleteByTag(businessArea: string, repo: string): Promise<GraphDeleteResult> {
    const [edgesDeleted] = await this.run(
      `LET removed = (
         FOR e IN @@edges
           FILTER e.business_area == @area AND e.repo == @repo
           REMOVE e IN @@edges
           RETURN 1
       )
       RETURN LENGTH(removed)`,
      { area: businessArea, repo, "@edges": EDGE_COLLECTION }
    );
    const [nodesDeleted] = await this.run(
      `LET removed = (
         FOR n IN @@nodes
           FILTER n.business_area == @area AND n.repo == @repo
           REMOVE n IN @@nodes
           RETURN 1
       )
       RETURN LENGTH(removed)`,
      { area: businessArea, repo, "@nodes": NODE_COLLECTION }
    );
    return {
      nodesDeleted: z.number().catch(0).parse(nodesDeleted),
      edgesDeleted: z.number().catch(0).parse(edgesDeleted),
    };
  }

  async findNodes(options: NodeSearchOptions): Promise<GraphNode[]> {
    const rows = await this.run(
      `FOR n IN @@nodes
         FILTER n.business_area == @area
         FILTER CONTAINS(LOWER(n.name), @text)
             OR CONTAINS(LOWER(n.file_path || ""), @text)
             OR CONTAINS(LOWER(n.path || ""), @text)
         LIMIT @limit
         RETURN n`,
      { area: options.businessArea, text: options.text.toLowerCase(), limit: options.limit, "@nodes": NODE_COLLECTION }
    );
    return rows.map((row) => fromNodeDoc(NodeDocSchema.parse(row)));
  }

  async getRelationships(nodeId: string, options: RelationshipOptions): Promise<GraphRelationship[]> {
    const [row] = await this.run(
      `LET outgoing = (
         FOR e IN @@edges
           FILTER e._from == @handle AND e.kind IN @kinds
           LET t = DOCUMENT(e._to)
           FILTER t != null AND t.business_area == @area
           LIMIT @limit
           RETURN { kind: e.kind, source: DOCUMENT(e._from), target: t }
       )
       LET incoming = (
         FOR e IN @@edges
           FILTER e._to == @handle AND e.kind IN @kinds
           LET s = DOCUMENT(e._from)
           FILTER s != null AND s.business_area == @area
           LIMIT @limit
           RETURN { kind: e.kind, source: s, target: DOCUMENT(e._to) }
       )
       RETURN APPEND(outgoing, incoming)`,
      {
        handle: nodeHandle(nodeId),
        kinds: [...(options.kinds ?? GRAPH_EDGE_KINDS)],
        area: options.businessArea,
        limit: options.limit,
        "@edges": EDGE_COLLECTION,
      }
    );
    return z
      .array(RelationshipDocSchema)
      .parse(row ?? [])
      .map((rel) => ({ kind: rel.kind, source: fromNodeDoc(rel.source), target: fromNodeDoc(rel.target) }));
  }

  async findConnected(options: ConnectedOptions): Promise<ConnectedNode[]> {
    const inbound = options.direction === "inbound";
    const anchorSide = inbound ? "e._to" : "e._from";
    const neighborSide = inbound ? "e._from" : "e._to";

    const rows = await this.run(
      `FOR a IN @@nodes
         FILTER a.business_area == @area AND a.kind == @anchorKind
         FILTER @name == null OR a.name == @name
         FILTER @path == null OR a.path == @path
         FOR e IN @@edges
           FILTER e.kind == @edgeKind AND ${anchorSide} == a._id
           LET nb = DOCUMENT(${neighborSide})
           FILTER nb != null AND nb.business_area == @area
           FILTER @neighborKind == null OR nb.kind == @neighborKind
           LIMIT @limit
           RETURN { anchor: a, neighbor: nb }`,
      {
        area: options.businessArea,
        anchorKind: options.anchor.kind,
        name: options.anchor.name ?? null,
        path: options.anchor.path ?? null,
        edgeKind: options.edgeKind,
        neighborKind: options.neighborKind ?? null,
        limit: options.limit,
        "@nodes": NODE_COLLECTION,
        "@edges": EDGE_COLLECTION,
      }
    );
    return rows.map((row) => {
      const doc = ConnectedDocSchema.parse(row);
      return { anchor: fromNodeDoc(doc.anchor), neighbor: fromNodeDoc(doc.neighbor) };
    });
  }

  async stats(filter: { businessArea?: string; repo?: string } = {}): Promise<GraphStats> {
    const [row] = await this.run(
      `LET nodes = LENGTH(
         FOR n IN @@nodes
           FILTER @area == null OR n.business_area == @area
           FILTER @repo == null OR n.repo == @repo
           RETURN 1
       )
       LET edges = LENGTH(
         FOR e IN @@edges
           FILTER @area == null OR e.business_area == @area
           FILTER @repo == null OR e.repo == @repo
           RETURN 1
       )
       RETURN { nodes, edges }`,
      {
        area: filter.businessArea ?? null,
        repo: filter.repo ?? null,
        "@nodes": NODE_COLLECTION,
        "@edges": EDGE_COLLECTION,
      }
    );
    return z.object({ nodes: z.number(), edges: z.number() }).parse(row);
  }
}
