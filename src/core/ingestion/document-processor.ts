/**
 * Document Processor
 *
 * Splits documents into chunks and embeds them in batches.
 *
 * @module
 */

import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import type { IEmbeddingService } from "../interfaces/IEmbeddingService.js";
import type { Chunk, ChunkPayload, Document, EmbeddedChunk } from "../../types/index.js";
import { chunkId } from "../../types/index.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("document-processor");

const SEPARATORS = ["\n\n", "\n", ". ", " ", ""];

export interface DocumentProcessorOptions {
  embeddings: IEmbeddingService;
  chunkSize: number;
  chunkOverlap: number;
  batchSize: number;
}

export interface FailedBatch {
  start: number;
  size: number;
  error: string;
}

export interface ProcessedDocuments {
  /** Every chunk produced, embedded or not */
  chunks: Chunk[];
  /** Chunks whose embedding batch succeeded */
  embedded: EmbeddedChunk[];
  failedBatches: FailedBatch[];
}

export class DocumentProcessor {
  private readonly embeddings: IEmbeddingService;
  private readonly splitter: RecursiveCharacterTextSplitter;
  private readonly batchSize: number;

  constructor(options: DocumentProcessorOptions) {
    this.embeddings = options.embeddings;
    this.batchSize = options.batchSize;
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: options.chunkSize,
      chunkOverlap: options.chunkOverlap,
      separators: SEPARATORS,
    });
  }

  /**
   * Split one document. Document metadata is flattened into each payload
   * underneath the fixed fields.
   */
  async chunkDocument(document: Document): Promise<Chunk[]> {
    const pieces = await this.splitter.splitText(document.content);
    return pieces.map((content, index) => {
      const payload: ChunkPayload = {
        ...document.metadata,
        content,
        title: document.title,
        source: document.source,
        document_type: document.documentType,
        business_area: document.businessArea,
        url: document.url,
        last_modified: document.lastModified.toISOString(),
        parent_document_id: document.id,
        chunk_index: index,
        total_chunks: pieces.length,
      };
      return { id: chunkId(document.id, index), payload };
    });
  }

  /**
   * Chunk all documents and embed the chunks batch by batch. A failed batch
   * is recorded and its chunks are left out of `embedded`.
   */
  async processDocuments(documents: readonly Document[]): Promise<ProcessedDocuments> {
    const chunks: Chunk[] = [];
    for (const document of documents) {
      chunks.push(...(await this.chunkDocument(document)));
    }

    const embedded: EmbeddedChunk[] = [];
    const failedBatches: FailedBatch[] = [];
    const batchCount = Math.ceil(chunks.length / this.batchSize);

    for (let start = 0; start < chunks.length; start += this.batchSize) {
      const batch = chunks.slice(start, start + this.batchSize);
      try {
        const vectors = await this.embeddings.embedDocuments(batch.map((chunk) => chunk.payload.content));
        batch.forEach((chunk, i) => {
          const vector = vectors[i];
          if (vector) embedded.push({ ...chunk, vector });
        });
        logger.debug({ batch: `${start / this.batchSize + 1}/${batchCount}`, count: batch.length }, "Embedded batch");
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ err: error, batchStart: start, size: batch.length }, "Failed to embed batch");
        failedBatches.push({ start, size: batch.length, error: message });
      }
    }

    logger.info(
      { documents: documents.length, chunks: chunks.length, embedded: embedded.length, failedBatches: failedBatches.length },
      "Processed documents"
    );
    return { chunks, embedded, failedBatches };
  }
}
