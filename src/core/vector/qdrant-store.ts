/**
 * Qdrant vector store
 *
 * One collection per business area (`{area}_knowledge`), cosine distance,
 * keyword payload indexes on the filterable fields.
 *
 * @module
 */

import * as crypto from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { ErrorCode, ExternalUnavailableError } from "../errors.js";
import {
  collectionName,
  INDEXED_PAYLOAD_FIELDS,
  type CollectionInfo,
  type IVectorStore,
} from "../interfaces/IVectorStore.js";
import type { Chunk, EmbeddedChunk, RankedResult, SearchFilters } from "../../types/index.js";
import { stringField } from "../../types/index.js";
import { createLogger } from "../../utils/logger.js";
import { chunkFromPayload, compareChunks } from "./payload.js";

const logger = createLogger("qdrant-store");

const UPSERT_BATCH = 100;
const SCROLL_PAGE = 256;

// =============================================================================
// Filters
// =============================================================================

type MatchCondition =
  | { key: string; match: { value: string | number | boolean } }
  | { key: string; match: { any: string[] | number[] } };

export interface QdrantFilter {
  must: MatchCondition[];
}

/**
 * Scalar -> MatchValue, array -> MatchAny, all under `must`
 */
export function buildQdrantFilter(filters?: SearchFilters): QdrantFilter | undefined {
  if (!filters) return undefined;
  const must: MatchCondition[] = [];

  for (const [key, value] of Object.entries(filters)) {
    if (!Array.isArray(value)) {
      must.push({ key, match: { value } });
      continue;
    }
    const numbers = value.filter((v): v is number => typeof v === "number");
    if (numbers.length === value.length && numbers.length > 0) {
      must.push({ key, match: { any: numbers } });
    } else {
      must.push({ key, match: { any: value.map((v) => String(v)) } });
    }
  }
  return must.length > 0 ? { must } : undefined;
}

/**
 * Qdrant point ids must be UUIDs or integers; chunk ids are neither, so the
 * point id is a name-based UUID of the chunk id and the chunk id travels in
 * the payload.
 */
export function pointIdFor(chunkId: string): string {
  const hex = crypto.createHash("sha1").update(chunkId).digest("hex");
  const variant = ((parseInt(hex.slice(16, 18), 16) & 0x3f) | 0x80).toString(16).padStart(2, "0");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(18, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

// =============================================================================
// QdrantVectorStore
// =============================================================================

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  dimension: number;
  /** Overrides the REST client */
  client?: QdrantClient;
}

export class QdrantVectorStore implements IVectorStore {
  private readonly client: QdrantClient;
  private readonly dimension: number;
  private readonly knownCollections = new Set<string>();

  constructor(options: QdrantVectorStoreOptions) {
    this.client = options.client ?? new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.dimension = options.dimension;
  }

  async ensureCollection(businessArea: string): Promise<void> {
    const name = collectionName(businessArea);
    if (this.knownCollections.has(name)) return;

    try {
      const { collections } = await this.client.getCollections();
      if (!collections.some((c) => c.name === name)) {
        await this.client.createCollection(name, {
          vectors: { size: this.dimension, distance: "Cosine" },
        });
        for (const field of INDEXED_PAYLOAD_FIELDS) {
          await this.client.createPayloadIndex(name, { field_name: field, field_schema: "keyword", wait: true });
        }
        logger.info({ collection: name, dimension: this.dimension }, "Created collection");
      }
      this.knownCollections.add(name);
    } catch (error) {
      throw new ExternalUnavailableError(
        "qdrant",
        `Failed to ensure collection ${name}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.VECTOR_CONNECTION_FAILED,
        { collection: name }
      );
    }
  }

  async upsert(businessArea: string, chunks: readonly EmbeddedChunk[]): Promise<number> {
    if (chunks.length === 0) return 0;
    await this.ensureCollection(businessArea);
    const name = collectionName(businessArea);
    const indexedAt = new Date().toISOString();

    for (let i = 0; i < chunks.length; i += UPSERT_BATCH) {
      const points = chunks.slice(i, i + UPSERT_BATCH).map((chunk) => ({
        id: pointIdFor(chunk.id),
        vector: chunk.vector,
        payload: { ...chunk.payload, chunk_id: chunk.id, indexed_at: indexedAt },
      }));
      try {
        await this.client.upsert(name, { wait: true, points });
      } catch (error) {
        throw new ExternalUnavailableError(
          "qdrant",
          `Upsert into ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
          ErrorCode.VECTOR_UPSERT_FAILED,
          { collection: name, batchStart: i }
        );
      }
    }
    logger.info({ collection: name, count: chunks.length }, "Upserted chunks");
    return chunks.length;
  }

  async search(
    businessArea: string,
    vector: readonly number[],
    limit: number,
    filters?: SearchFilters
  ): Promise<RankedResult[]> {
    const name = collectionName(businessArea);
    try {
      const hits = await this.client.search(name, {
        vector: [...vector],
        limit,
        filter: buildQdrantFilter(filters),
        with_payload: true,
      });
      return hits.map((hit) => {
        const payload: Record<string, unknown> = { ...(hit.payload ?? {}) };
        return {
          id: stringField(payload, "chunk_id", String(hit.id)),
          score: hit.score,
          payload,
        };
      });
    } catch (error) {
      throw new ExternalUnavailableError(
        "qdrant",
        `Search in ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.VECTOR_SEARCH_FAILED,
        { collection: name }
      );
    }
  }

  async deleteByDocumentIds(businessArea: string, documentIds: readonly string[]): Promise<void> {
    if (documentIds.length === 0) return;
    const name = collectionName(businessArea);
    await this.client.delete(name, {
      wait: true,
      filter: { must: [{ key: "parent_document_id", match: { any: [...documentIds] } }] },
    });
    logger.info({ collection: name, documents: documentIds.length }, "Deleted document chunks");
  }

  async listChunks(businessArea: string): Promise<Chunk[]> {
    const name = collectionName(businessArea);
    const { collections } = await this.client.getCollections();
    if (!collections.some((c) => c.name === name)) return [];

    const chunks: Chunk[] = [];
    let skipped = 0;
    let offset: string | number | undefined;
    do {
      const page = await this.client.scroll(name, {
        limit: SCROLL_PAGE,
        offset,
        with_payload: true,
        with_vector: false,
      });
      for (const point of page.points) {
        const payload: Record<string, unknown> = { ...(point.payload ?? {}) };
        const chunk = chunkFromPayload(stringField(payload, "chunk_id", String(point.id)), payload);
        if (chunk) {
          chunks.push(chunk);
        } else {
          skipped++;
        }
      }
      const next = page.next_page_offset;
      offset = typeof next === "string" || typeof next === "number" ? next : undefined;
    } while (offset !== undefined);

    if (skipped > 0) {
      logger.warn({ collection: name, skipped }, "Skipped points without a chunk payload");
    }
    return chunks.sort(compareChunks);
  }

  async getCollectionInfo(businessArea: string): Promise<CollectionInfo | null> {
    const name = collectionName(businessArea);
    const { collections } = await this.client.getCollections();
    if (!collections.some((c) => c.name === name)) return null;

    const info = await this.client.getCollection(name);
    const vectors = info.config.params.vectors;
    const size = vectors && "size" in vectors && typeof vectors.size === "number" ? vectors.size : this.dimension;
    return {
      name,
      pointsCount: info.points_count ?? 0,
      vectorSize: size,
      status: info.status,
    };
  }
}
