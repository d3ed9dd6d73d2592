/**
 * IVectorStore - Dense vector index, one collection per business area
 *
 * @module
 */

import type { Chunk, EmbeddedChunk, RankedResult, SearchFilters } from "../../types/index.js";

export interface CollectionInfo {
  name: string;
  pointsCount: number;
  vectorSize: number;
  status: string;
}

export interface IVectorStore {
  /** Create the area's collection and payload indexes if missing */
  ensureCollection(businessArea: string): Promise<void>;

  /** Upsert chunks with their vectors; stamps `indexed_at` on each payload */
  upsert(businessArea: string, chunks: readonly EmbeddedChunk[]): Promise<number>;

  /**
   * Similarity search, filters applied server-side.
   * Scalar filter values match by equality, arrays match any element.
   */
  search(
    businessArea: string,
    vector: readonly number[],
    limit: number,
    filters?: SearchFilters
  ): Promise<RankedResult[]>;

  /** Delete every chunk whose `parent_document_id` is in the list */
  deleteByDocumentIds(businessArea: string, documentIds: readonly string[]): Promise<void>;

  /**
   * Every stored chunk of the area, without vectors, ordered by parent
   * document then chunk index. Points whose payload is not a chunk payload
   * are left out. Empty when the collection does not exist.
   */
  listChunks(businessArea: string): Promise<Chunk[]>;

  getCollectionInfo(businessArea: string): Promise<CollectionInfo | null>;
}

export function collectionName(businessArea: string): string {
  return `${businessArea}_knowledge`;
}

/** Payload fields that get a keyword index */
export const INDEXED_PAYLOAD_FIELDS = ["source", "document_type", "business_area"] as const;
