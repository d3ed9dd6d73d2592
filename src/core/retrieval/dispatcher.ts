/**
 * Retriever Dispatcher
 *
 * Fans a query out across the configured sources of a business area. Each
 * source is served by its override list or the default mapping; every
 * (source, retriever) pair runs concurrently and fails on its own.
 *
 * @module
 */

import { ErrorCode, InvalidTenantError, KnowledgeRouterError, RetrieverError, errorMessage } from "../errors.js";
import type { SourceConfigResolver } from "../config/source-config.js";
import type { SearchFilters } from "../../types/index.js";
import { createLogger } from "../../utils/logger.js";
import {
  DEFAULT_RETRIEVAL_LIMIT,
  DEFAULT_SOURCE_RETRIEVERS,
  RetrievalPlanSchema,
  type DispatchResult,
  type IRetriever,
  type RetrievalPlan,
  type RetrievalPlanInput,
  type RetrievalResult,
} from "./types.js";

const logger = createLogger("retriever-dispatcher");

export interface RetrieverDispatcherOptions {
  resolver: SourceConfigResolver;
  retrievers?: readonly IRetriever[];
  /** Replaces the built-in source -> retriever mapping */
  defaultMapping?: Readonly<Record<string, readonly string[]>>;
  /** Limit applied when a plan names none */
  defaultLimit?: number;
}

export class RetrieverDispatcher {
  private readonly resolver: SourceConfigResolver;
  private readonly retrievers = new Map<string, IRetriever>();
  private readonly defaultMapping: Readonly<Record<string, readonly string[]>>;
  private readonly defaultLimit: number;

  constructor(options: RetrieverDispatcherOptions) {
    this.resolver = options.resolver;
    this.defaultMapping = options.defaultMapping ?? DEFAULT_SOURCE_RETRIEVERS;
    this.defaultLimit = options.defaultLimit ?? DEFAULT_RETRIEVAL_LIMIT;
    for (const retriever of options.retrievers ?? []) {
      this.registerRetriever(retriever);
    }
  }

  registerRetriever(retriever: IRetriever): void {
    if (this.retrievers.has(retriever.name)) {
      logger.warn({ retriever: retriever.name }, "Replacing registered retriever");
    }
    this.retrievers.set(retriever.name, retriever);
  }

  availableRetrievers(): string[] {
    return [...this.retrievers.keys()];
  }

  /**
   * Retriever names for a source: the area's override, else the default
   * mapping, else none.
   */
  retrieversFor(businessArea: string, sourceName: string): readonly string[] {
    return this.resolver.getOverride(businessArea, sourceName) ?? this.defaultMapping[sourceName] ?? [];
  }

  /**
   * Dispatch a query. Throws only for an unknown business area or an invalid
   * plan; every other failure is recorded in the slot it belongs to.
   */
  async retrieve(query: string, businessArea: string, planInput: RetrievalPlanInput = {}): Promise<DispatchResult> {
    if (!this.resolver.isKnownArea(businessArea)) {
      throw new InvalidTenantError(businessArea, this.resolver.businessAreas);
    }

    const parsed = RetrievalPlanSchema.safeParse({ ...planInput, limit: planInput.limit ?? this.defaultLimit });
    if (!parsed.success) {
      throw new RetrieverError(
        `Invalid retrieval plan: ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`,
        ErrorCode.INVALID_RETRIEVAL_PLAN
      );
    }
    const plan = parsed.data;

    const results: DispatchResult = new Map();
    const sources = this.resolver.getSources(businessArea, plan.sources);
    if (sources.length === 0) {
      logger.warn({ businessArea, requested: plan.sources }, "No sources configured for business area");
      return results;
    }

    await Promise.all(
      sources.map(async ([sourceName]) => {
        results.set(sourceName, await this.dispatchSource(query, businessArea, sourceName, plan));
      })
    );

    logger.info(
      {
        businessArea,
        sources: sources.map(([name]) => name),
        documents: [...results.values()].flat().reduce((sum, r) => sum + r.documents.length, 0),
      },
      "Dispatch completed"
    );
    return results;
  }

  private async dispatchSource(
    query: string,
    businessArea: string,
    sourceName: string,
    plan: RetrievalPlan
  ): Promise<RetrievalResult[]> {
    const names = this.retrieversFor(businessArea, sourceName);
    if (names.length === 0) {
      const error = new RetrieverError(
        `no retriever configured for source '${sourceName}'`,
        ErrorCode.NO_RETRIEVER_CONFIGURED,
        { sourceName, businessArea }
      );
      logger.warn({ err: error, businessArea, source: sourceName }, "No retriever configured for source");
      return [
        {
          documents: [],
          retrieverName: "none",
          source: sourceName,
          message: "no_retriever",
          error: error.message,
          errorCode: error.code,
        },
      ];
    }

    const filters: SearchFilters = { ...plan.filters, source: sourceName };

    return Promise.all(
      names.map(async (name): Promise<RetrievalResult> => {
        const retriever = this.retrievers.get(name);
        if (!retriever) {
          const error = new RetrieverError(`Retriever '${name}' is not registered.`, ErrorCode.RETRIEVER_NOT_FOUND, {
            sourceName,
            retrieverName: name,
          });
          logger.warn({ err: error, businessArea, source: sourceName, retriever: name }, "Retriever not registered");
          return {
            documents: [],
            retrieverName: name,
            source: sourceName,
            message: "retriever_not_found",
            error: error.message,
            errorCode: error.code,
          };
        }

        try {
          return await retriever.retrieve(query, businessArea, { limit: plan.limit, filters });
        } catch (error) {
          logger.error({ err: error, businessArea, source: sourceName, retriever: name }, "Retriever failed");
          return {
            documents: [],
            retrieverName: name,
            source: sourceName,
            message: "error",
            error: errorMessage(error),
            errorCode: error instanceof KnowledgeRouterError ? error.code : ErrorCode.RETRIEVAL_FAILED,
          };
        }
      })
    );
  }
}
