/**
 * Ingestion: change detection, chunking and the ingestion cycle
 *
 * @module
 */

export { ChangeDetector, type ChangeSet } from "./change-detector.js";
export {
  DocumentProcessor,
  type DocumentProcessorOptions,
  type FailedBatch,
  type ProcessedDocuments,
} from "./document-processor.js";
export {
  IngestionService,
  type IngestionResult,
  type IngestionServiceOptions,
  type SourceIngestionOutcome,
  type SyncMode,
} from "./ingestion-service.js";
