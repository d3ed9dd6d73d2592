/**
 * Lineage retriever
 *
 * Searches lineage-catalog assets, deduplicated by fully qualified name.
 * When fewer than `limit` assets match, entities referenced from the matched
 * assets' content are looked up as well and returned at a reduced score.
 *
 * @module
 */

import type { SearchFilters } from "../../../types/index.js";
import { stringField } from "../../../types/index.js";
import { createLogger } from "../../../utils/logger.js";
import type { FusedResult } from "../../search/hybrid-service.js";
import type {
  HybridSearcher,
  IRetriever,
  RetrievalResult,
  RetrievedDocument,
  RetrieveOptions,
} from "../types.js";
import { omitKeys } from "./payload.js";
import { errorMessage } from "../../errors.js";

const logger = createLogger("lineage-retriever");

const NAMED_FIELDS = ["title", "content", "source", "asset_type", "fully_qualified_name", "url"] as const;

export const RELATED_SCORE_FACTOR = 0.8;

function entityName(payload: Record<string, unknown>): string | undefined {
  const fqn = stringField(payload, "fully_qualified_name") || stringField(payload, "entity_fqn");
  return fqn || undefined;
}

function toDocument(result: FusedResult, fqn: string | undefined, related: boolean): RetrievedDocument {
  const payload = result.payload;
  const metadata: Record<string, unknown> = {
    assetType: payload.asset_type ?? null,
    fullyQualifiedName: fqn ?? null,
    service: payload.service ?? null,
  };
  if (related) {
    metadata.isRelated = true;
  } else {
    metadata.upstreamCount = payload.upstream_count ?? null;
    metadata.downstreamCount = payload.downstream_count ?? null;
  }

  return {
    title: stringField(payload, "title"),
    content: stringField(payload, "content"),
    source: stringField(payload, "source", "openmetadata"),
    documentType: stringField(payload, "asset_type", "lineage"),
    score: related ? result.score * RELATED_SCORE_FACTOR : result.score,
    url: stringField(payload, "url"),
    metadata: { ...metadata, ...omitKeys(payload, NAMED_FIELDS) },
  };
}

/**
 * Entity references in lineage content: `- `-prefixed lines that contain a
 * `.` or `/` and are longer than 3 characters once the marker is removed.
 */
export function extractRelatedEntities(documents: readonly RetrievedDocument[]): string[] {
  const entities: string[] = [];
  for (const doc of documents) {
    for (const raw of doc.content.split("\n")) {
      const line = raw.trim();
      if (!line.startsWith("- ") || !(line.includes(".") || line.includes("/"))) continue;
      const entity = line.slice(2).trim();
      if (entity.length > 3 && !entities.includes(entity)) {
        entities.push(entity);
      }
    }
  }
  return entities;
}

export class LineageRetriever implements IRetriever {
  readonly name = "lineage";

  constructor(private readonly search: HybridSearcher) {}

  async retrieve(query: string, businessArea: string, options: RetrieveOptions): Promise<RetrievalResult> {
    const { limit } = options;
    const filters: SearchFilters = { source: "openmetadata", ...options.filters };

    try {
      const results = await this.search.hybridSearch(businessArea, query, limit, filters);
      const documents: RetrievedDocument[] = [];
      const seen = new Set<string>();

      for (const result of results) {
        const fqn = entityName(result.payload);
        if (fqn) {
          if (seen.has(fqn)) continue;
          seen.add(fqn);
        }
        documents.push(toDocument(result, fqn, false));
      }

      if (documents.length > 0 && documents.length < limit) {
        const related = extractRelatedEntities(documents).slice(0, limit - documents.length);
        for (const entity of related) {
          if (seen.has(entity)) continue;
          const hits = await this.search.hybridSearch(businessArea, entity, 1, filters);
          for (const hit of hits) {
            const fqn = entityName(hit.payload);
            if (fqn && !seen.has(fqn)) {
              seen.add(fqn);
              documents.push(toDocument(hit, fqn, true));
            }
          }
        }
      }

      return {
        documents,
        retrieverName: this.name,
        source: "openmetadata",
        message: `Retrieved ${documents.length} lineage documents`,
      };
    } catch (error) {
      logger.error({ err: error, businessArea, query }, "Lineage retrieval failed");
      return {
        documents: [],
        retrieverName: this.name,
        source: "openmetadata",
        message: "Lineage retrieval failed",
        error: errorMessage(error),
      };
    }
  }
}
