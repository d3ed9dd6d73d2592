/**
 * Retrieval types
 *
 * @module
 */

import { z } from "zod";
import type { RetrievalResult } from "../interfaces/IRetriever.js";
import type { SearchFilters } from "../../types/index.js";
import type { FusedResult } from "../search/hybrid-service.js";

export type {
  IRetriever,
  RetrievalResult,
  RetrievedDocument,
  RetrieveOptions,
} from "../interfaces/IRetriever.js";

// =============================================================================
// Retrieval plan
// =============================================================================

export const DEFAULT_RETRIEVAL_LIMIT = 5;

const FilterScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Caller-facing shape that steers dispatch
 */
export const RetrievalPlanSchema = z.object({
  sources: z.array(z.string().min(1)).optional(),
  limit: z.number().int().min(1).max(50).default(DEFAULT_RETRIEVAL_LIMIT),
  filters: z.record(z.union([FilterScalarSchema, z.array(FilterScalarSchema)])).optional(),
});

export type RetrievalPlan = z.infer<typeof RetrievalPlanSchema>;
export type RetrievalPlanInput = z.input<typeof RetrievalPlanSchema>;

/** Results keyed by source name, one entry per retriever that served it */
export type DispatchResult = Map<string, RetrievalResult[]>;

// =============================================================================
// Collaborators
// =============================================================================

/**
 * The part of the hybrid engine the document-backed retrievers use
 */
export interface HybridSearcher {
  hybridSearch(businessArea: string, query: string, topK: number, filters?: SearchFilters): Promise<FusedResult[]>;
}

/**
 * Built-in source -> retriever mapping, used when no override exists.
 * `codeql` maps to the graph retriever, which is only registered when the
 * code graph is enabled.
 */
export const DEFAULT_SOURCE_RETRIEVERS: Readonly<Record<string, readonly string[]>> = {
  confluence: ["docs"],
  firestore: ["docs"],
  gitlab: ["code"],
  openmetadata: ["lineage"],
  codeql: ["graph"],
};
