/**
 * Change Detector
 *
 * Persists, per (business area, source key), the last sync time and the ids
 * seen at that sync, and diffs a new id set against it.
 *
 * @module
 */

import { z } from "zod";
import { ErrorCode, IngestionError } from "../errors.js";
import { atomicWriteJson, readJsonFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("change-detector");

const SyncRecordSchema = z.object({
  last_sync_timestamp: z.string(),
  document_ids: z.array(z.string()),
  document_count: z.number().int().nonnegative(),
});

const MetadataFileSchema = z.record(SyncRecordSchema);

type SyncRecord = z.infer<typeof SyncRecordSchema>;

export interface ChangeSet {
  added: string[];
  deleted: string[];
  existing: string[];
}

function syncKey(businessArea: string, sourceKey: string): string {
  return `${businessArea}_${sourceKey}`;
}

export class ChangeDetector {
  private records = new Map<string, SyncRecord>();

  constructor(private readonly metadataPath: string) {}

  async load(): Promise<void> {
    const raw = await readJsonFile(this.metadataPath);
    if (raw === null) {
      this.records = new Map();
      return;
    }
    const parsed = MetadataFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IngestionError(`Invalid ingestion metadata file: ${this.metadataPath}`, ErrorCode.INGESTION_FAILED, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    this.records = new Map(Object.entries(parsed.data));
    logger.debug({ path: this.metadataPath, entries: this.records.size }, "Loaded sync metadata");
  }

  getLastSyncTimestamp(businessArea: string, sourceKey: string): Date | null {
    const record = this.records.get(syncKey(businessArea, sourceKey));
    if (!record) return null;
    const date = new Date(record.last_sync_timestamp);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  getStoredDocumentIds(businessArea: string, sourceKey: string): string[] {
    return [...(this.records.get(syncKey(businessArea, sourceKey))?.document_ids ?? [])];
  }

  async updateSyncMetadata(
    businessArea: string,
    sourceKey: string,
    documentIds: readonly string[],
    timestamp: Date = new Date()
  ): Promise<void> {
    this.records.set(syncKey(businessArea, sourceKey), {
      last_sync_timestamp: timestamp.toISOString(),
      document_ids: [...documentIds],
      document_count: documentIds.length,
    });
    await atomicWriteJson(this.metadataPath, Object.fromEntries(this.records));
    logger.info({ businessArea, sourceKey, documentCount: documentIds.length }, "Updated sync metadata");
  }

  /**
   * Exact set difference against the stored ids. `added` and `existing`
   * follow the order of `currentIds`; `deleted` follows the stored order.
   */
  detectChanges(businessArea: string, sourceKey: string, currentIds: readonly string[]): ChangeSet {
    const stored = this.getStoredDocumentIds(businessArea, sourceKey);
    const storedSet = new Set(stored);
    const current = [...new Set(currentIds)];
    const currentSet = new Set(current);

    const changes: ChangeSet = {
      added: current.filter((id) => !storedSet.has(id)),
      deleted: stored.filter((id) => !currentSet.has(id)),
      existing: current.filter((id) => storedSet.has(id)),
    };
    logger.info(
      {
        businessArea,
        sourceKey,
        added: changes.added.length,
        deleted: changes.deleted.length,
        existing: changes.existing.length,
      },
      "Detected changes"
    );
    return changes;
  }
}
