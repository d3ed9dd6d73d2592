/**
 * Hybrid Search Engine
 *
 * Dense retrieval from the vector index plus an in-memory BM25 index per
 * business area, fused with Reciprocal Rank Fusion.
 *
 * @module
 */

import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import type { IVectorStore } from "../interfaces/IVectorStore.js";
import type { Chunk, RankedResult, SearchFilters } from "../../types/index.js";
import { matchesFilters } from "../../types/index.js";
import { ReadWriteLock } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import { BM25Index, type BM25Parameters } from "./bm25-index.js";

const logger = createLogger("hybrid-search");

// =============================================================================
// Types
// =============================================================================

export const RRF_K = 60;

/**
 * Fused result. `ranks` holds the 1-based rank in each input list, or null
 * when the item was absent from that list.
 */
export interface FusedResult extends RankedResult {
  ranks: Array<number | null>;
}

export interface HybridSearchEngineOptions {
  vectorStore: IVectorStore;
  embeddings: IEmbeddingService;
  bm25?: Partial<BM25Parameters>;
}

// =============================================================================
// Fusion
// =============================================================================

/**
 * Reciprocal Rank Fusion: each item at 1-based rank r in a list contributes
 * 1 / (k + r); contributions are summed per id. Output is sorted by fused
 * score descending, ties in first-seen order. The payload comes from the
 * first list that contains the id.
 */
export function reciprocalRankFusion(
  lists: ReadonlyArray<readonly RankedResult[]>,
  k: number = RRF_K
): FusedResult[] {
  const fused = new Map<string, FusedResult>();

  lists.forEach((list, listIndex) => {
    list.forEach((item, index) => {
      const rank = index + 1;
      let entry = fused.get(item.id);
      if (!entry) {
        entry = {
          id: item.id,
          score: 0,
          payload: item.payload,
          ranks: lists.map(() => null),
        };
        fused.set(item.id, entry);
      }
      // Duplicate ids within one list count once, at their best rank
      if (entry.ranks[listIndex] !== null) return;
      entry.ranks[listIndex] = rank;
      entry.score += 1 / (k + rank);
    });
  });

  return [...fused.values()].sort((a, b) => b.score - a.score);
}

// =============================================================================
// HybridSearchEngine
// =============================================================================

export class HybridSearchEngine {
  private readonly vectorStore: IVectorStore;
  private readonly embeddings: IEmbeddingService;
  private readonly bm25Params: Partial<BM25Parameters>;
  private readonly indexes = new Map<string, BM25Index>();
  private readonly locks = new Map<string, ReadWriteLock>();

  constructor(options: HybridSearchEngineOptions) {
    this.vectorStore = options.vectorStore;
    this.embeddings = options.embeddings;
    this.bm25Params = options.bm25 ?? {};
  }

  private lockFor(businessArea: string): ReadWriteLock {
    let lock = this.locks.get(businessArea);
    if (!lock) {
      lock = new ReadWriteLock();
      this.locks.set(businessArea, lock);
    }
    return lock;
  }

  // ===========================================================================
  // Lexical index lifecycle
  // ===========================================================================

  /**
   * Replace the area's lexical index with one built from `chunks`.
   * Readers see either the old index or the new one.
   */
  async buildLexicalIndex(businessArea: string, chunks: readonly Chunk[]): Promise<void> {
    const index = new BM25Index(chunks, this.bm25Params);
    await this.lockFor(businessArea).write(() => {
      this.indexes.set(businessArea, index);
    });
    logger.info({ businessArea, chunkCount: index.size }, "Built BM25 index");
  }

  /**
   * Rebuild the area's index without chunks of the given parent documents
   */
  async removeFromLexicalIndex(businessArea: string, documentIds: readonly string[]): Promise<number> {
    if (documentIds.length === 0) return 0;
    const removed = new Set(documentIds);

    return this.lockFor(businessArea).write(() => {
      const current = this.indexes.get(businessArea);
      if (!current) return 0;
      const kept = current.entries().filter((chunk) => !removed.has(chunk.payload.parent_document_id));
      const removedCount = current.size - kept.length;
      if (removedCount > 0) {
        this.indexes.set(businessArea, new BM25Index(kept, this.bm25Params));
      }
      return removedCount;
    });
  }

  hasLexicalIndex(businessArea: string): boolean {
    return this.indexes.has(businessArea);
  }

  lexicalIndexSize(businessArea: string): number {
    return this.indexes.get(businessArea)?.size ?? 0;
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Embed the query and search the vector index. Errors propagate.
   */
  async denseSearch(
    businessArea: string,
    query: string,
    limit: number,
    filters?: SearchFilters
  ): Promise<RankedResult[]> {
    try {
      const vector = await this.embeddings.embedQuery(query);
      const results = await this.vectorStore.search(businessArea, vector, limit, filters);
      logger.debug({ businessArea, resultCount: results.length }, "Dense search completed");
      return results;
    } catch (error) {
      logger.error({ businessArea, err: error }, "Dense search failed");
      throw error;
    }
  }

  /**
   * BM25 search over the area's index. Returns [] when no index exists.
   * Filters use the same semantics the vector index applies server-side.
   */
  async lexicalSearch(
    businessArea: string,
    query: string,
    limit: number,
    filters?: SearchFilters
  ): Promise<RankedResult[]> {
    return this.lockFor(businessArea).read(() => {
      const index = this.indexes.get(businessArea);
      if (!index) {
        logger.debug({ businessArea }, "No BM25 index for business area");
        return [];
      }
      return index
        .search(query, limit, (chunk) => matchesFilters(chunk.payload, filters))
        .map((hit) => ({ id: hit.chunk.id, score: hit.score, payload: hit.chunk.payload }));
    });
  }

  fuse(dense: readonly RankedResult[], lexical: readonly RankedResult[], k: number = RRF_K): FusedResult[] {
    return reciprocalRankFusion([dense, lexical], k);
  }

  /**
   * Dense and lexical candidates (2 x topK each) fused with RRF, top `topK`
   * returned. A dense failure fails the call; a missing lexical index
   * degrades to dense-only ranking.
   */
  async hybridSearch(
    businessArea: string,
    query: string,
    topK: number,
    filters?: SearchFilters
  ): Promise<FusedResult[]> {
    const candidates = topK * 2;
    const [dense, lexical] = await Promise.all([
      this.denseSearch(businessArea, query, candidates, filters),
      this.lexicalSearch(businessArea, query, candidates, filters),
    ]);

    const fused = this.fuse(dense, lexical).slice(0, topK);

    logger.info(
      {
        businessArea,
        query: query.slice(0, 50),
        denseCount: dense.length,
        lexicalCount: lexical.length,
        resultCount: fused.length,
      },
      "Hybrid search completed"
    );
    return fused;
  }
}
