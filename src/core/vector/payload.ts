/**
 * Chunks read back from a vector index
 *
 * @module
 */

import { z } from "zod";
import { DOCUMENT_TYPES, type Chunk } from "../../types/index.js";

const StoredChunkFieldsSchema = z.object({
  content: z.string(),
  title: z.string(),
  source: z.string(),
  document_type: z.enum(DOCUMENT_TYPES),
  business_area: z.string(),
  url: z.string(),
  last_modified: z.string(),
  parent_document_id: z.string(),
  chunk_index: z.number().int(),
  total_chunks: z.number().int(),
});

/**
 * Rebuild a chunk from a stored payload. Returns null when a required
 * field is missing or mistyped.
 */
export function chunkFromPayload(id: string, payload: Record<string, unknown>): Chunk | null {
  const parsed = StoredChunkFieldsSchema.safeParse(payload);
  if (!parsed.success) return null;
  return { id, payload: { ...payload, ...parsed.data } };
}

/** Stable corpus order: by parent document, then chunk index */
export function compareChunks(a: Chunk, b: Chunk): number {
  return (
    a.payload.parent_document_id.localeCompare(b.payload.parent_document_id) ||
    a.payload.chunk_index - b.payload.chunk_index
  );
}
