/**
 * IDocumentSource - a fetcher for one (business area, source) pair
 *
 * Concrete fetchers (wiki spaces, config stores, repositories, lineage
 * catalogs) live outside this package and are registered with the
 * ingestion service.
 *
 * @module
 */

import type { Document } from "../../types/index.js";

export interface IDocumentSource {
  /** Source tag written on every produced document */
  readonly source: string;

  /**
   * Stable key for sync metadata. Defaults to `source` when absent; set it
   * when one area has several instances of the same source.
   */
  readonly key?: string;

  fetchAll(): Promise<Document[]>;

  fetchSince(since: Date): Promise<Document[]>;

  /** Ids of every document currently present at the source */
  getAllDocumentIds(): Promise<string[]>;
}
