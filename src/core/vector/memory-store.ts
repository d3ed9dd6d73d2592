/**
 * In-process vector store (cosine similarity, same filter semantics as Qdrant).
 * Used for local runs without a vector server and in tests.
 *
 * @module
 */

import { collectionName, type CollectionInfo, type IVectorStore } from "../interfaces/IVectorStore.js";
import type { Chunk, EmbeddedChunk, RankedResult, SearchFilters } from "../../types/index.js";
import { matchesFilters } from "../../types/index.js";
import { chunkFromPayload, compareChunks } from "./payload.js";

interface StoredPoint {
  vector: number[];
  payload: Record<string, unknown>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class MemoryVectorStore implements IVectorStore {
  private readonly collections = new Map<string, Map<string, StoredPoint>>();

  constructor(private readonly dimension: number = 768) {}

  async ensureCollection(businessArea: string): Promise<void> {
    const name = collectionName(businessArea);
    if (!this.collections.has(name)) {
      this.collections.set(name, new Map());
    }
  }

  async upsert(businessArea: string, chunks: readonly EmbeddedChunk[]): Promise<number> {
    await this.ensureCollection(businessArea);
    const points = this.collections.get(collectionName(businessArea));
    if (!points) return 0;
    const indexedAt = new Date().toISOString();
    for (const chunk of chunks) {
      points.set(chunk.id, {
        vector: [...chunk.vector],
        payload: { ...chunk.payload, chunk_id: chunk.id, indexed_at: indexedAt },
      });
    }
    return chunks.length;
  }

  async search(
    businessArea: string,
    vector: readonly number[],
    limit: number,
    filters?: SearchFilters
  ): Promise<RankedResult[]> {
    const points = this.collections.get(collectionName(businessArea));
    if (!points) return [];

    const scored: RankedResult[] = [];
    for (const [id, point] of points) {
      if (!matchesFilters(point.payload, filters)) continue;
      scored.push({ id, score: cosineSimilarity(vector, point.vector), payload: { ...point.payload } });
    }
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit);
  }

  async deleteByDocumentIds(businessArea: string, documentIds: readonly string[]): Promise<void> {
    const points = this.collections.get(collectionName(businessArea));
    if (!points) return;
    const removed = new Set(documentIds);
    for (const [id, point] of points) {
      const parent = point.payload.parent_document_id;
      if (typeof parent === "string" && removed.has(parent)) {
        points.delete(id);
      }
    }
  }

  async listChunks(businessArea: string): Promise<Chunk[]> {
    const points = this.collections.get(collectionName(businessArea));
    if (!points) return [];
    const chunks: Chunk[] = [];
    for (const [id, point] of points) {
      const chunk = chunkFromPayload(id, { ...point.payload });
      if (chunk) chunks.push(chunk);
    }
    return chunks.sort(compareChunks);
  }

  async getCollectionInfo(businessArea: string): Promise<CollectionInfo | null> {
    const name = collectionName(businessArea);
    const points = this.collections.get(name);
    if (!points) return null;
    return { name, pointsCount: points.size, vectorSize: this.dimension, status: "green" };
  }
}
