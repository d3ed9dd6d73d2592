/**
 * Shared types for knowledge-router
 */

// =============================================================================
// Documents
// =============================================================================

export const DOCUMENT_TYPES = ["requirement", "config", "code", "issue", "wiki", "lineage", "other"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/**
 * Unit of retrievable content produced by a document source.
 * Immutable once produced; a newer fetch supersedes it.
 */
export interface Document {
  /** Globally unique, source-prefixed id */
  id: string;
  content: string;
  title: string;
  /** Source tag (confluence, firestore, gitlab, openmetadata, ...) */
  source: string;
  documentType: DocumentType;
  businessArea: string;
  lastModified: Date;
  url: string;
  metadata: Record<string, unknown>;
}

/**
 * Payload stored alongside each chunk in the vector index and the lexical
 * index. Keys are snake_case because they are also the filter keys.
 */
export type ChunkPayload = {
  content: string;
  title: string;
  source: string;
  document_type: DocumentType;
  business_area: string;
  url: string;
  last_modified: string;
  parent_document_id: string;
  chunk_index: number;
  total_chunks: number;
  [key: string]: unknown;
};

export interface Chunk {
  /** `{documentId}_chunk_{index}` */
  id: string;
  payload: ChunkPayload;
}

export interface EmbeddedChunk extends Chunk {
  vector: number[];
}

// =============================================================================
// Search
// =============================================================================

export type FilterScalar = string | number | boolean;

/**
 * Metadata filters. A scalar matches by equality, an array matches when the
 * payload value equals any element.
 */
export type SearchFilters = Record<string, FilterScalar | FilterScalar[]>;

export interface RankedResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

// =============================================================================
// Helpers
// =============================================================================

export function chunkId(documentId: string, index: number): string {
  return `${documentId}_chunk_${index}`;
}

/**
 * Test a payload against filters using scalar-equals / array-any semantics
 */
export function matchesFilters(payload: Record<string, unknown>, filters?: SearchFilters): boolean {
  if (!filters) return true;
  for (const [key, expected] of Object.entries(filters)) {
    const actual = payload[key];
    if (Array.isArray(expected)) {
      if (!expected.some((value) => value === actual)) return false;
    } else if (actual !== expected) {
      return false;
    }
  }
  return true;
}

export function stringField(payload: Record<string, unknown>, key: string, fallback = ""): string {
  const value = payload[key];
  return typeof value === "string" ? value : fallback;
}
