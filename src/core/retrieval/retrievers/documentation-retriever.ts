/**
 * Documentation retriever
 *
 * Hybrid search over documentation-style sources (Confluence, Firestore).
 *
 * @module
 */

import { stringField } from "../../../types/index.js";
import { createLogger } from "../../../utils/logger.js";
import type {
  HybridSearcher,
  IRetriever,
  RetrievalResult,
  RetrievedDocument,
  RetrieveOptions,
} from "../types.js";
import { omitKeys, sourceLabel } from "./payload.js";
import { errorMessage } from "../../errors.js";

const logger = createLogger("docs-retriever");

const NAMED_FIELDS = ["title", "content", "source", "document_type", "url"] as const;

export class DocumentationRetriever implements IRetriever {
  readonly name = "docs";

  constructor(private readonly search: HybridSearcher) {}

  async retrieve(query: string, businessArea: string, options: RetrieveOptions): Promise<RetrievalResult> {
    const { limit, filters } = options;
    const source = sourceLabel(filters, "all");

    try {
      logger.debug({ query: query.slice(0, 50), businessArea, limit, filters }, "Documentation retrieval");
      const results = await this.search.hybridSearch(businessArea, query, limit, filters);

      const documents: RetrievedDocument[] = results.map((result) => ({
        title: stringField(result.payload, "title"),
        content: stringField(result.payload, "content"),
        source: stringField(result.payload, "source"),
        documentType: stringField(result.payload, "document_type"),
        score: result.score,
        url: stringField(result.payload, "url"),
        metadata: omitKeys(result.payload, NAMED_FIELDS),
      }));

      if (documents.length === 0) {
        logger.warn({ businessArea, source }, "Documentation retriever found no results");
      }

      return {
        documents,
        retrieverName: this.name,
        source,
        message: documents.length > 0 ? "success" : "no_results",
      };
    } catch (error) {
      logger.error({ err: error, businessArea }, "Documentation retrieval failed");
      return { documents: [], retrieverName: this.name, source, message: "error", error: errorMessage(error) };
    }
  }
}
