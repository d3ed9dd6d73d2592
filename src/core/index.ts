/**
 * Core module - shared between the CLI and embedding applications
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./config/index.js";
export * from "./search/index.js";
export * from "./vector/index.js";
export * from "./embeddings/index.js";
export * from "./graph/index.js";
export * from "./retrieval/index.js";
export * from "./ingestion/index.js";
export * from "./code-graph/index.js";

export type { IDocumentSource } from "./interfaces/IDocumentSource.js";
export type { IEmbeddingService } from "./interfaces/IEmbeddingService.js";
export type { IVectorStore, CollectionInfo } from "./interfaces/IVectorStore.js";
export type {
  GraphNode,
  GraphNodeKind,
  GraphEdge,
  GraphEdgeKind,
  GraphRelationship,
  GraphStats,
} from "./interfaces/IGraphStore.js";

export {
  KnowledgeRouter,
  createKnowledgeRouter,
  type KnowledgeRouterOverrides,
  type KnowledgeRouterStatus,
  type DocumentSourceRegistration,
} from "./knowledge-router.js";

// Re-export types
export * from "../types/index.js";
