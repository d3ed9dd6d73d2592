/**
 * Graph Emitter
 *
 * Materializes query rows as graph nodes and edges. Emission is a full
 * rebuild: everything tagged with (business area, repo) is deleted first,
 * then each analysis' nodes and edges are upserted.
 *
 * | analysis           | edge                          |
 * |--------------------|-------------------------------|
 * | `call_graph`       | Function CALLS Function       |
 * | `subprocess_calls` | Function RUNS_SUBPROCESS Script |
 * | `imports`          | File IMPORTS Module           |
 *
 * @module
 */

import { ErrorCode, ExternalUnavailableError } from "../errors.js";
import {
  graphEdgeKey,
  graphNodeId,
  type GraphEdge,
  type GraphEdgeKind,
  type GraphNode,
  type GraphNodeKind,
  type IGraphStore,
} from "../interfaces/IGraphStore.js";
import { createLogger } from "../../utils/logger.js";
import type { EmitStats, QueryResults, QueryRow } from "./types.js";

const logger = createLogger("graph-emitter");

// =============================================================================
// Row decoding
// =============================================================================

type Fields = Record<string, unknown>;

type NodeDetails = Pick<GraphNode, "filePath" | "path" | "lineStart" | "lineEnd">;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function integer(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

function stripFileScheme(uri: string): string {
  return uri.startsWith("file://") ? uri.slice("file://".length) : uri;
}

/** Name of an entity column, or the column itself when it is a string */
function entityName(value: unknown): string | undefined {
  if (typeof value === "string") return text(value);
  if (!isFields(value)) return undefined;
  return text(value.label) ?? text(value.name) ?? text(value.value);
}

function location(value: unknown): NodeDetails {
  if (!isFields(value)) return {};
  const url = isFields(value.url) ? value.url : undefined;
  const file = value.file;
  const fromFile = isFields(file) ? text(file.value) ?? text(file.label) : text(file);
  const uri = url ? text(url.uri) : undefined;
  const fromUrl = uri ? stripFileScheme(uri) : undefined;
  return {
    filePath: fromFile ?? fromUrl,
    lineStart: integer(value.startLine) ?? integer(url?.startLine),
    lineEnd: integer(value.endLine) ?? integer(url?.endLine),
  };
}

// =============================================================================
// Per-analysis accumulator
// =============================================================================

class GraphBatch {
  readonly nodes = new Map<string, GraphNode>();
  readonly edges = new Map<string, GraphEdge>();

  constructor(
    private readonly businessArea: string,
    private readonly repo: string
  ) {}

  node(kind: GraphNodeKind, name: string, details: NodeDetails = {}): string {
    const id = graphNodeId(this.businessArea, this.repo, kind, name);
    const previous = this.nodes.get(id);
    const filePath = details.filePath ?? previous?.filePath;
    const nodePath = details.path ?? previous?.path;
    const lineStart = details.lineStart ?? previous?.lineStart;
    const lineEnd = details.lineEnd ?? previous?.lineEnd;
    this.nodes.set(id, {
      id,
      kind,
      name,
      businessArea: this.businessArea,
      repo: this.repo,
      ...(filePath !== undefined ? { filePath } : {}),
      ...(nodePath !== undefined ? { path: nodePath } : {}),
      ...(lineStart !== undefined ? { lineStart } : {}),
      ...(lineEnd !== undefined ? { lineEnd } : {}),
    });
    return id;
  }

  edge(kind: GraphEdgeKind, fromId: string, toId: string): void {
    const edge: GraphEdge = { kind, fromId, toId, businessArea: this.businessArea, repo: this.repo };
    this.edges.set(graphEdgeKey(edge), edge);
  }
}

type RowHandler = (batch: GraphBatch, row: QueryRow) => boolean;

interface FunctionRef {
  name: string;
  details: NodeDetails;
}

function functionRef(value: unknown): FunctionRef | undefined {
  const name = entityName(value);
  return name ? { name, details: location(value) } : undefined;
}

const ROW_HANDLERS: Readonly<Record<string, RowHandler>> = {
  call_graph: (batch, row) => {
    const caller = functionRef(row["#1"]);
    const callee = functionRef(row["#2"]);
    if (!caller || !callee) return false;
    batch.edge(
      "CALLS",
      batch.node("Function", caller.name, caller.details),
      batch.node("Function", callee.name, callee.details)
    );
    return true;
  },
  subprocess_calls: (batch, row) => {
    const caller = functionRef(row["#1"]);
    const scriptPath = entityName(row["#2"]);
    if (!caller || !scriptPath) return false;
    batch.edge(
      "RUNS_SUBPROCESS",
      batch.node("Function", caller.name, caller.details),
      batch.node("Script", scriptPath, { path: scriptPath })
    );
    return true;
  },
  imports: (batch, row) => {
    const filePath = entityName(row["#1"]);
    const moduleName = entityName(row["#2"]);
    if (!filePath || !moduleName) return false;
    batch.edge("IMPORTS", batch.node("File", filePath, { filePath }), batch.node("Module", moduleName));
    return true;
  },
};

// =============================================================================
// Emitter
// =============================================================================

export class GraphEmitter {
  constructor(private readonly store: IGraphStore) {}

  /**
   * Replace the (area, repo) graph with the given results.
   *
   * @returns distinct nodes per analysis and distinct edges, summed
   * @throws ExternalUnavailableError when the graph store is unreachable
   */
  async emit(results: QueryResults, businessArea: string, repo: string, language?: string): Promise<EmitStats> {
    if (!(await this.store.isAvailable())) {
      throw new ExternalUnavailableError("graph-store", "Graph store not available", ErrorCode.GRAPH_CONNECTION_FAILED, {
        businessArea,
        repo,
      });
    }

    const deleted = await this.store.deleteByTag(businessArea, repo);
    logger.info({ businessArea, repo, ...deleted }, "Deleted existing graph for repo");

    const stats: EmitStats = { nodes: 0, edges: 0 };
    for (const [analysis, rows] of results) {
      const handler = ROW_HANDLERS[analysis];
      if (!handler) {
        logger.warn({ analysis }, "No emitter for analysis, skipping");
        continue;
      }

      const batch = new GraphBatch(businessArea, repo);
      let skipped = 0;
      for (const row of rows) {
        if (!handler(batch, row)) skipped++;
      }
      if (skipped > 0) {
        logger.debug({ analysis, skipped }, "Skipped rows without both endpoints");
      }

      await this.store.upsertNodes([...batch.nodes.values()]);
      await this.store.upsertEdges([...batch.edges.values()]);
      stats.nodes += batch.nodes.size;
      stats.edges += batch.edges.size;
    }

    logger.info({ businessArea, repo, language, ...stats }, "Emitted code graph");
    return stats;
  }
}

/**
 * Concatenate per-language results by analysis name
 */
export function mergeQueryResults(all: readonly QueryResults[]): QueryResults {
  const merged: QueryResults = new Map();
  for (const results of all) {
    for (const [analysis, rows] of results) {
      merged.set(analysis, [...(merged.get(analysis) ?? []), ...rows]);
    }
  }
  return merged;
}
