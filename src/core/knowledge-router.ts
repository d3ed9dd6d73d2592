/**
 * Knowledge Router - composition root
 *
 * Builds every component once from validated settings and wires the
 * dependencies between them. Tests and embedders swap the external
 * collaborators through {@link KnowledgeRouterOverrides}.
 *
 * @module
 */

import { SourceConfigResolver } from "./config/source-config.js";
import type { Settings } from "./config/settings.js";
import { CodeqlCli, type IAnalysisCli } from "./code-graph/analysis-cli.js";
import { CodeGraphAnalysisService } from "./code-graph/analysis-service.js";
import { DatabaseBuilder } from "./code-graph/database-builder.js";
import { DatabaseStorage } from "./code-graph/database-storage.js";
import { GraphEmitter } from "./code-graph/graph-emitter.js";
import { QueryExecutor } from "./code-graph/query-executor.js";
import { CodeSourceRegistry } from "./code-graph/source-registry.js";
import { createEmbeddingService } from "./embeddings/index.js";
import { createGraphStore } from "./graph/index.js";
import { ChangeDetector } from "./ingestion/change-detector.js";
import { DocumentProcessor } from "./ingestion/document-processor.js";
import { IngestionService } from "./ingestion/ingestion-service.js";
import type { IDocumentSource } from "./interfaces/IDocumentSource.js";
import type { IEmbeddingService } from "./interfaces/IEmbeddingService.js";
import type { IGraphStore } from "./interfaces/IGraphStore.js";
import type { IVectorStore } from "./interfaces/IVectorStore.js";
import { RetrieverDispatcher } from "./retrieval/dispatcher.js";
import {
  CodeRetriever,
  DocumentationRetriever,
  GraphRetriever,
  LineageRetriever,
} from "./retrieval/retrievers/index.js";
import type { DispatchResult, RetrievalPlanInput } from "./retrieval/types.js";
import { HybridSearchEngine } from "./search/hybrid-service.js";
import { QdrantVectorStore } from "./vector/qdrant-store.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("knowledge-router");

export interface DocumentSourceRegistration {
  businessArea: string;
  sourceName: string;
  source: IDocumentSource;
}

export interface KnowledgeRouterOverrides {
  vectorStore?: IVectorStore;
  embeddings?: IEmbeddingService;
  graphStore?: IGraphStore;
  analysisCli?: IAnalysisCli;
  documentSources?: readonly DocumentSourceRegistration[];
}

export interface KnowledgeRouterStatus {
  businessAreas: string[];
  retrievers: string[];
  codeGraphEnabled: boolean;
  graphStoreAvailable: boolean;
  registeredCodeSources: number;
}

export class KnowledgeRouter {
  readonly settings: Settings;
  readonly resolver: SourceConfigResolver;
  readonly vectorStore: IVectorStore;
  readonly embeddings: IEmbeddingService;
  readonly search: HybridSearchEngine;
  readonly dispatcher: RetrieverDispatcher;
  readonly graphStore: IGraphStore;
  readonly changeDetector: ChangeDetector;
  readonly ingestion: IngestionService;
  readonly registry: CodeSourceRegistry;
  readonly analysisCli: IAnalysisCli;
  readonly storage: DatabaseStorage;
  readonly builder: DatabaseBuilder;
  readonly executor: QueryExecutor;
  readonly analysis: CodeGraphAnalysisService;

  private graphAvailable = false;
  private initialized = false;

  constructor(settings: Settings, overrides: KnowledgeRouterOverrides = {}) {
    this.settings = settings;
    this.resolver = SourceConfigResolver.fromStrings(
      settings.businessAreas,
      settings.sourcesConfig,
      settings.retrieverOverrides
    );

    this.embeddings =
      overrides.embeddings ??
      createEmbeddingService({
        apiKey: settings.embeddings.apiKey,
        model: settings.embeddings.model,
        dimension: settings.embeddings.dimension,
      });
    this.vectorStore =
      overrides.vectorStore ??
      new QdrantVectorStore({
        url: settings.qdrant.url,
        apiKey: settings.qdrant.apiKey,
        dimension: settings.embeddings.dimension,
      });
    this.search = new HybridSearchEngine({ vectorStore: this.vectorStore, embeddings: this.embeddings });

    this.dispatcher = new RetrieverDispatcher({
      resolver: this.resolver,
      retrievers: [
        new DocumentationRetriever(this.search),
        new CodeRetriever(this.search),
        new LineageRetriever(this.search),
      ],
      defaultLimit: settings.search.topK,
    });

    this.changeDetector = new ChangeDetector(settings.ingestion.metadataPath);
    this.ingestion = new IngestionService({
      processor: new DocumentProcessor({
        embeddings: this.embeddings,
        chunkSize: settings.ingestion.chunkSize,
        chunkOverlap: settings.ingestion.chunkOverlap,
        batchSize: settings.ingestion.batchSize,
      }),
      vectorStore: this.vectorStore,
      search: this.search,
      changeDetector: this.changeDetector,
      resolver: this.resolver,
    });
    for (const { businessArea, sourceName, source } of overrides.documentSources ?? []) {
      this.ingestion.registerSource(businessArea, sourceName, source);
    }

    this.graphStore = overrides.graphStore ?? createGraphStore(settings.graphStore);
    this.registry = new CodeSourceRegistry({
      registryPath: settings.codeGraph.registryPath,
      resolver: this.resolver,
      codeGraphEnabled: settings.codeGraph.enabled,
    });
    this.analysisCli =
      overrides.analysisCli ??
      new CodeqlCli({
        executablePath: settings.codeGraph.codeqlPath,
        buildTimeoutMs: settings.codeGraph.buildTimeoutMs,
        queryTimeoutMs: settings.codeGraph.queryTimeoutMs,
        versionTimeoutMs: settings.codeGraph.versionTimeoutMs,
      });
    this.storage = new DatabaseStorage(settings.codeGraph.databasePath);
    this.builder = new DatabaseBuilder({ cli: this.analysisCli, storage: this.storage, registry: this.registry });
    this.executor = new QueryExecutor({ cli: this.analysisCli, queriesDir: settings.codeGraph.queriesDir });
    this.analysis = new CodeGraphAnalysisService({
      registry: this.registry,
      builder: this.builder,
      executor: this.executor,
      emitter: new GraphEmitter(this.graphStore),
      resolver: this.resolver,
      defaultLanguages: settings.codeGraph.defaultLanguages,
    });
  }

  /**
   * Load persisted state and connect to the stores. An unreachable vector
   * index or graph store is logged; retrievals against it then report
   * their own errors.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.registry.load();
    await this.changeDetector.load();

    for (const area of this.resolver.businessAreas) {
      try {
        await this.vectorStore.ensureCollection(area);
        await this.ingestion.restoreLexicalIndex(area);
      } catch (error) {
        logger.warn({ err: error, businessArea: area }, "Vector collection unavailable");
      }
    }

    if (this.settings.codeGraph.enabled) {
      try {
        await this.graphStore.initialize();
      } catch (error) {
        logger.warn({ err: error }, "Graph store initialization failed");
      }
      this.graphAvailable = await this.graphStore.isAvailable();
      if (this.graphAvailable) {
        this.dispatcher.registerRetriever(new GraphRetriever(this.graphStore));
      } else {
        logger.warn("Graph store unavailable, graph retriever not registered");
      }
    }

    this.initialized = true;
    logger.info(
      {
        businessAreas: this.resolver.businessAreas,
        retrievers: this.dispatcher.availableRetrievers(),
        codeGraph: this.settings.codeGraph.enabled,
      },
      "Knowledge router initialized"
    );
  }

  retrieve(query: string, businessArea: string, plan?: RetrievalPlanInput): Promise<DispatchResult> {
    return this.dispatcher.retrieve(query, businessArea, plan);
  }

  status(): KnowledgeRouterStatus {
    return {
      businessAreas: [...this.resolver.businessAreas],
      retrievers: this.dispatcher.availableRetrievers(),
      codeGraphEnabled: this.settings.codeGraph.enabled,
      graphStoreAvailable: this.graphAvailable,
      registeredCodeSources: this.registry.list().length,
    };
  }

  async close(): Promise<void> {
    await this.graphStore.close();
    this.initialized = false;
    logger.debug("Knowledge router closed");
  }
}

export function createKnowledgeRouter(settings: Settings, overrides?: KnowledgeRouterOverrides): KnowledgeRouter {
  return new KnowledgeRouter(settings, overrides);
}
