/**
 * Ingestion Service
 *
 * Pulls documents from registered sources, writes their chunks to the
 * vector index and rebuilds the area's lexical index from every chunk the
 * area currently holds.
 *
 * @module
 */

import { ErrorCode, IngestionError } from "../errors.js";
import type { SourceConfigResolver } from "../config/source-config.js";
import type { IDocumentSource } from "../interfaces/IDocumentSource.js";
import type { IVectorStore } from "../interfaces/IVectorStore.js";
import type { HybridSearchEngine } from "../search/hybrid-service.js";
import type { Chunk, Document } from "../../types/index.js";
import { createLogger } from "../../utils/logger.js";
import type { ChangeDetector } from "./change-detector.js";
import type { DocumentProcessor } from "./document-processor.js";

const logger = createLogger("ingestion-service");

/** Sources handled by the code graph pipeline, not by ingestion */
const NON_INGESTIBLE_SOURCES = new Set(["codeql"]);

function notIngestible(businessArea: string, sourceName: string): IngestionError {
  return new IngestionError(
    `'${sourceName}' is not an ingestion source; use code graph analysis instead`,
    ErrorCode.INVALID_ARGUMENT,
    { businessArea, sourceName }
  );
}

export type SyncMode = "full" | "incremental";

export interface IngestionResult {
  status: "success";
  mode: SyncMode;
  documentsProcessed: number;
  chunksCreated: number;
  chunksSkipped: number;
  documentsDeleted: number;
  durationMs: number;
}

export type SourceIngestionOutcome =
  | IngestionResult
  | { status: "skipped"; reason: string }
  | { status: "error"; error: string };

export interface IngestionServiceOptions {
  processor: DocumentProcessor;
  vectorStore: IVectorStore;
  search: Pick<HybridSearchEngine, "buildLexicalIndex">;
  changeDetector: ChangeDetector;
  resolver: SourceConfigResolver;
}

export class IngestionService {
  private readonly processor: DocumentProcessor;
  private readonly vectorStore: IVectorStore;
  private readonly search: Pick<HybridSearchEngine, "buildLexicalIndex">;
  private readonly changeDetector: ChangeDetector;
  private readonly resolver: SourceConfigResolver;

  /** area -> source name -> fetcher */
  private readonly sources = new Map<string, Map<string, IDocumentSource>>();
  /** area -> sync key -> parent document id -> chunks */
  private readonly corpus = new Map<string, Map<string, Map<string, Chunk[]>>>();
  /** area -> parent document id -> chunks read back from the vector index */
  private readonly restored = new Map<string, Map<string, Chunk[]>>();

  constructor(options: IngestionServiceOptions) {
    this.processor = options.processor;
    this.vectorStore = options.vectorStore;
    this.search = options.search;
    this.changeDetector = options.changeDetector;
    this.resolver = options.resolver;
  }

  registerSource(businessArea: string, sourceName: string, source: IDocumentSource): void {
    if (NON_INGESTIBLE_SOURCES.has(sourceName)) {
      throw notIngestible(businessArea, sourceName);
    }
    let byName = this.sources.get(businessArea);
    if (!byName) {
      byName = new Map();
      this.sources.set(businessArea, byName);
    }
    byName.set(sourceName, source);
  }

  registeredSources(businessArea: string): string[] {
    return [...(this.sources.get(businessArea)?.keys() ?? [])];
  }

  private syncKeyFor(sourceName: string, source: IDocumentSource): string {
    return source.key ? `${sourceName}_${source.key}` : sourceName;
  }

  private corpusFor(businessArea: string, key: string): Map<string, Chunk[]> {
    let bySource = this.corpus.get(businessArea);
    if (!bySource) {
      bySource = new Map();
      this.corpus.set(businessArea, bySource);
    }
    let byDocument = bySource.get(key);
    if (!byDocument) {
      byDocument = new Map();
      bySource.set(key, byDocument);
    }
    return byDocument;
  }

  /** Every chunk the area holds, across sources */
  areaChunks(businessArea: string): Chunk[] {
    const chunks: Chunk[] = [];
    for (const documentChunks of this.restored.get(businessArea)?.values() ?? []) {
      chunks.push(...documentChunks);
    }
    for (const byDocument of this.corpus.get(businessArea)?.values() ?? []) {
      for (const documentChunks of byDocument.values()) {
        chunks.push(...documentChunks);
      }
    }
    return chunks;
  }

  /**
   * Seed the area's lexical index with the chunks already in the vector
   * index, so a fresh process serves hybrid results before any sync.
   * Restored documents are superseded when a later sync fetches or deletes
   * them.
   */
  async restoreLexicalIndex(businessArea: string): Promise<number> {
    const chunks = await this.vectorStore.listChunks(businessArea);
    const byDocument = new Map<string, Chunk[]>();
    for (const chunk of chunks) {
      const id = chunk.payload.parent_document_id;
      const documentChunks = byDocument.get(id);
      if (documentChunks) {
        documentChunks.push(chunk);
      } else {
        byDocument.set(id, [chunk]);
      }
    }
    this.restored.set(businessArea, byDocument);

    if (chunks.length > 0) {
      await this.search.buildLexicalIndex(businessArea, this.areaChunks(businessArea));
    }
    logger.info({ businessArea, chunks: chunks.length, documents: byDocument.size }, "Restored lexical index");
    return chunks.length;
  }

  private forgetRestored(businessArea: string, documentIds: readonly string[]): void {
    const byDocument = this.restored.get(businessArea);
    if (!byDocument) return;
    for (const id of documentIds) {
      byDocument.delete(id);
    }
  }

  /**
   * Ingest one source. Incremental mode fetches changes since the last
   * sync and falls back to a full fetch on first sync.
   */
  async ingest(businessArea: string, sourceName: string, mode: SyncMode = "incremental"): Promise<IngestionResult> {
    const started = Date.now();
    if (NON_INGESTIBLE_SOURCES.has(sourceName)) {
      throw notIngestible(businessArea, sourceName);
    }
    const source = this.sources.get(businessArea)?.get(sourceName);
    if (!source) {
      throw new IngestionError(
        `No document source registered for '${sourceName}' in '${businessArea}'`,
        ErrorCode.DOCUMENT_SOURCE_NOT_FOUND,
        { businessArea, sourceName }
      );
    }

    const key = this.syncKeyFor(sourceName, source);
    logger.info({ businessArea, source: sourceName, mode }, "Starting ingestion");

    let effectiveMode = mode;
    let documents: Document[];
    const lastSync = mode === "incremental" ? this.changeDetector.getLastSyncTimestamp(businessArea, key) : null;
    if (lastSync) {
      documents = await source.fetchSince(lastSync);
    } else {
      if (mode === "incremental") {
        logger.info({ businessArea, source: sourceName }, "No previous sync found, performing full sync");
      }
      effectiveMode = "full";
      documents = await source.fetchAll();
    }

    const corpus = this.corpusFor(businessArea, key);
    if (effectiveMode === "full") {
      corpus.clear();
    }

    const processed = await this.processor.processDocuments(documents);
    const fetchedIds = documents.map((doc) => doc.id);

    // Stale chunks of re-fetched documents go before the new ones land
    await this.vectorStore.deleteByDocumentIds(businessArea, fetchedIds);
    await this.vectorStore.upsert(businessArea, processed.embedded);

    this.forgetRestored(businessArea, fetchedIds);
    for (const id of fetchedIds) {
      corpus.set(id, []);
    }
    for (const chunk of processed.chunks) {
      corpus.get(chunk.payload.parent_document_id)?.push(chunk);
    }

    const currentIds = await source.getAllDocumentIds();
    const changes = this.changeDetector.detectChanges(businessArea, key, currentIds);
    if (changes.deleted.length > 0) {
      await this.vectorStore.deleteByDocumentIds(businessArea, changes.deleted);
      for (const id of changes.deleted) {
        corpus.delete(id);
      }
      this.forgetRestored(businessArea, changes.deleted);
      logger.info({ businessArea, source: sourceName, count: changes.deleted.length }, "Deleted documents");
    }

    await this.search.buildLexicalIndex(businessArea, this.areaChunks(businessArea));
    await this.changeDetector.updateSyncMetadata(businessArea, key, currentIds);

    const result: IngestionResult = {
      status: "success",
      mode: effectiveMode,
      documentsProcessed: documents.length,
      chunksCreated: processed.embedded.length,
      chunksSkipped: processed.chunks.length - processed.embedded.length,
      documentsDeleted: changes.deleted.length,
      durationMs: Date.now() - started,
    };
    logger.info({ businessArea, source: sourceName, ...result }, "Ingestion completed");
    return result;
  }

  /**
   * Ingest every configured source of an area. Failures are recorded per
   * source.
   */
  async ingestAll(businessArea: string, mode: SyncMode = "incremental"): Promise<Map<string, SourceIngestionOutcome>> {
    const outcomes = new Map<string, SourceIngestionOutcome>();

    for (const [sourceName] of this.resolver.getSources(businessArea)) {
      if (NON_INGESTIBLE_SOURCES.has(sourceName)) {
        logger.debug({ businessArea, source: sourceName }, "Skipping code graph source");
        continue;
      }
      if (!this.sources.get(businessArea)?.has(sourceName)) {
        logger.warn({ businessArea, source: sourceName }, "Skipping source without a registered fetcher");
        outcomes.set(sourceName, { status: "skipped", reason: "no_document_source" });
        continue;
      }
      try {
        outcomes.set(sourceName, await this.ingest(businessArea, sourceName, mode));
      } catch (error) {
        logger.error({ err: error, businessArea, source: sourceName }, "Failed to ingest from source");
        outcomes.set(sourceName, { status: "error", error: error instanceof Error ? error.message : String(error) });
      }
    }
    return outcomes;
  }
}
