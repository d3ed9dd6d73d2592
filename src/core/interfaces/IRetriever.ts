/**
 * IRetriever - one retrieval strategy over one category of source
 *
 * Retrievers never throw for empty or failed retrievals; the failure is
 * carried in `RetrievalResult.error`.
 *
 * @module
 */

import type { SearchFilters } from "../../types/index.js";
import type { ErrorCode } from "../errors.js";

export interface RetrievedDocument {
  title: string;
  content: string;
  source: string;
  documentType: string;
  score: number;
  url: string;
  metadata: Record<string, unknown>;
}

export interface RetrievalResult {
  documents: RetrievedDocument[];
  retrieverName: string;
  source: string;
  message: string;
  error?: string;
  /** Set on slots the dispatcher fills in after a failure */
  errorCode?: ErrorCode;
}

export interface RetrieveOptions {
  limit: number;
  filters?: SearchFilters;
}

export interface IRetriever {
  readonly name: string;

  retrieve(query: string, businessArea: string, options: RetrieveOptions): Promise<RetrievalResult>;
}
