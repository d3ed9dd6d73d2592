/**
 * Graph retriever
 *
 * Answers a query from the code graph: nodes whose name or path contains the
 * query, then the relationships around the first few of them.
 *
 * @module
 */

import type { GraphNode, GraphRelationship, IGraphStore } from "../../interfaces/IGraphStore.js";
import { createLogger } from "../../../utils/logger.js";
import type { IRetriever, RetrievalResult, RetrievedDocument, RetrieveOptions } from "../types.js";
import { errorMessage } from "../../errors.js";


const logger = createLogger("graph-retriever");

const GRAPH_SOURCE = "code_graph";
const EXPANDED_NODES = 5;
const RELATIONSHIPS_PER_NODE = 3;
const DEFAULT_HELPER_LIMIT = 10;

export interface ScriptCaller {
  caller: GraphNode;
  script: GraphNode;
}

function nodeLabel(node: GraphNode): string {
  return node.name || node.path || "unknown";
}

export function formatNode(node: GraphNode): string {
  const lines = [`${node.kind}: ${nodeLabel(node)}`];
  if (node.filePath) lines.push(`File: ${node.filePath}`);
  if (node.lineStart && node.lineEnd) lines.push(`Lines: ${node.lineStart}-${node.lineEnd}`);
  if (node.repo) lines.push(`Repo: ${node.repo}`);
  return lines.join("\n");
}

function nodeDocument(node: GraphNode): RetrievedDocument {
  const metadata: Record<string, unknown> = {
    nodeId: node.id,
    nodeType: node.kind,
    businessArea: node.businessArea,
    repo: node.repo,
    filePath: node.filePath ?? null,
  };
  if (node.lineStart !== undefined) metadata.lineStart = node.lineStart;
  if (node.lineEnd !== undefined) metadata.lineEnd = node.lineEnd;

  return {
    title: `${node.kind}: ${nodeLabel(node)}`,
    content: formatNode(node),
    source: GRAPH_SOURCE,
    documentType: GRAPH_SOURCE,
    score: 1.0,
    url: "",
    metadata,
  };
}

function relationshipDocument(rel: GraphRelationship, businessArea: string): RetrievedDocument {
  return {
    title: `${rel.kind}: ${nodeLabel(rel.source)} -> ${nodeLabel(rel.target)}`,
    content: `${rel.kind} relationship: ${nodeLabel(rel.source)} connects to ${nodeLabel(rel.target)}`,
    source: GRAPH_SOURCE,
    documentType: GRAPH_SOURCE,
    score: 0.9,
    url: "",
    metadata: {
      edgeType: rel.kind,
      sourceId: rel.source.id,
      targetId: rel.target.id,
      businessArea,
    },
  };
}

export class GraphRetriever implements IRetriever {
  readonly name = "graph";

  constructor(private readonly store: IGraphStore) {}

  isAvailable(): Promise<boolean> {
    return this.store.isAvailable();
  }

  async retrieve(query: string, businessArea: string, options: RetrieveOptions): Promise<RetrievalResult> {
    if (!(await this.isAvailable())) {
      logger.debug({ businessArea }, "Graph store not available");
      return {
        documents: [],
        retrieverName: this.name,
        source: GRAPH_SOURCE,
        message: "Graph retriever not available",
        error: "graph store not available",
      };
    }

    try {
      const documents = await this.graphContext(query, businessArea, options.limit);
      return {
        documents,
        retrieverName: this.name,
        source: GRAPH_SOURCE,
        message: `Retrieved ${documents.length} graph relationships`,
      };
    } catch (error) {
      logger.error({ err: error, businessArea, query }, "Graph retrieval failed");
      return {
        documents: [],
        retrieverName: this.name,
        source: GRAPH_SOURCE,
        message: "Graph retrieval failed",
        error: errorMessage(error),
      };
    }
  }

  private async graphContext(query: string, businessArea: string, limit: number): Promise<RetrievedDocument[]> {
    const nodes = await this.store.findNodes({ businessArea, text: query, limit });
    const context = nodes.map(nodeDocument);

    for (const node of nodes.slice(0, EXPANDED_NODES)) {
      const relationships = await this.store.getRelationships(node.id, {
        businessArea,
        limit: RELATIONSHIPS_PER_NODE,
      });
      context.push(...relationships.map((rel) => relationshipDocument(rel, businessArea)));
    }

    const seen = new Set<string>();
    const unique: RetrievedDocument[] = [];
    for (const doc of context) {
      const key = doc.title + doc.content;
      if (seen.has(key)) continue;
      seen.add(key);
      unique.push(doc);
      if (unique.length >= limit) break;
    }
    return unique;
  }

  /** Functions that call `functionName` */
  async getCallers(functionName: string, businessArea: string, limit = DEFAULT_HELPER_LIMIT): Promise<GraphNode[]> {
    if (!(await this.isAvailable())) return [];
    const matches = await this.store.findConnected({
      businessArea,
      edgeKind: "CALLS",
      direction: "inbound",
      anchor: { kind: "Function", name: functionName },
      neighborKind: "Function",
      limit,
    });
    return matches.map((match) => match.neighbor);
  }

  /** Functions called by `functionName` */
  async getCallees(functionName: string, businessArea: string, limit = DEFAULT_HELPER_LIMIT): Promise<GraphNode[]> {
    if (!(await this.isAvailable())) return [];
    const matches = await this.store.findConnected({
      businessArea,
      edgeKind: "CALLS",
      direction: "outbound",
      anchor: { kind: "Function", name: functionName },
      neighborKind: "Function",
      limit,
    });
    return matches.map((match) => match.neighbor);
  }

  /** Functions that launch the script at `scriptPath` as a subprocess */
  async getScriptCallers(scriptPath: string, businessArea: string, limit = DEFAULT_HELPER_LIMIT): Promise<ScriptCaller[]> {
    if (!(await this.isAvailable())) return [];
    const matches = await this.store.findConnected({
      businessArea,
      edgeKind: "RUNS_SUBPROCESS",
      direction: "inbound",
      anchor: { kind: "Script", path: scriptPath },
      limit,
    });
    return matches.map((match) => ({ caller: match.neighbor, script: match.anchor }));
  }
}
