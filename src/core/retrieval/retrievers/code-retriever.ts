/**
 * Code retriever
 *
 * Hybrid search restricted to code documents, with code-unit metadata
 * lifted to the top of the document metadata.
 *
 * @module
 */

import type { SearchFilters } from "../../../types/index.js";
import { stringField } from "../../../types/index.js";
import { createLogger } from "../../../utils/logger.js";
import type {
  HybridSearcher,
  IRetriever,
  RetrievalResult,
  RetrievedDocument,
  RetrieveOptions,
} from "../types.js";
import { omitKeys } from "./payload.js";
import { errorMessage } from "../../errors.js";

const logger = createLogger("code-retriever");

const NAMED_FIELDS = ["title", "content", "source", "document_type", "url"] as const;

export class CodeRetriever implements IRetriever {
  readonly name = "code";

  constructor(private readonly search: HybridSearcher) {}

  async retrieve(query: string, businessArea: string, options: RetrieveOptions): Promise<RetrievalResult> {
    // caller filters win
    const filters: SearchFilters = { document_type: "code", source: "code", ...options.filters };

    try {
      const results = await this.search.hybridSearch(businessArea, query, options.limit, filters);

      const documents: RetrievedDocument[] = results.map((result) => {
        const payload = result.payload;
        return {
          title: stringField(payload, "title"),
          content: stringField(payload, "content"),
          source: stringField(payload, "source", "code"),
          documentType: stringField(payload, "document_type", "code"),
          score: result.score,
          url: stringField(payload, "url"),
          metadata: {
            unitType: payload.unit_type ?? null,
            unitName: payload.unit_name ?? null,
            filePath: payload.file_path ?? null,
            fileType: payload.file_type ?? null,
            lineStart: payload.line_start ?? null,
            lineEnd: payload.line_end ?? null,
            ...omitKeys(payload, NAMED_FIELDS),
          },
        };
      });

      return {
        documents,
        retrieverName: this.name,
        source: "code",
        message: `Retrieved ${documents.length} code documents`,
      };
    } catch (error) {
      logger.error({ err: error, businessArea, query }, "Code retrieval failed");
      return {
        documents: [],
        retrieverName: this.name,
        source: "code",
        message: "Code retrieval failed",
        error: errorMessage(error),
      };
    }
  }
}
