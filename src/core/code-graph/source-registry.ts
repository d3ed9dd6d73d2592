/**
 * Code Source Registry
 *
 * Durable catalog of code sources per business area. The whole registry is
 * held in memory and rewritten to a JSON file (temp file + rename) after
 * every mutation.
 *
 * @module
 */

import { ErrorCode, KnowledgeRouterError, SourceNotFoundError, errorMessage } from "../errors.js";
import { configFlag, type SourceConfigResolver } from "../config/source-config.js";
import { Mutex } from "../../utils/async.js";
import { atomicWriteJson, readJsonFile } from "../../utils/fs.js";
import { normalizeRepoPath } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";
import {
  RegistryFileSchema,
  toCodeSource,
  toCodeSourceRecord,
  type CodeSource,
  type CodeSourceType,
} from "./types.js";

const logger = createLogger("source-registry");

/** Source block name that turns the code graph on for an area */
export const CODE_GRAPH_SOURCE = "codeql";

export interface RegisterOptions {
  name?: string;
  sourceId?: string;
  enabled?: boolean;
  metadata?: Record<string, unknown>;
}

export interface ListOptions {
  businessArea?: string;
  sourceType?: CodeSourceType;
  enabledOnly?: boolean;
}

export interface CodeSourceRegistryOptions {
  registryPath: string;
  resolver: SourceConfigResolver;
  /** Global code graph switch */
  codeGraphEnabled: boolean;
}

export function makeSourceId(businessArea: string, sourceType: string, sourcePath: string): string {
  return `${businessArea}_${sourceType}_${normalizeRepoPath(sourcePath)}`;
}

export class CodeSourceRegistry {
  private readonly registryPath: string;
  private readonly resolver: SourceConfigResolver;
  private readonly codeGraphEnabled: boolean;
  private readonly writeLock = new Mutex();
  private sources = new Map<string, CodeSource>();

  constructor(options: CodeSourceRegistryOptions) {
    this.registryPath = options.registryPath;
    this.resolver = options.resolver;
    this.codeGraphEnabled = options.codeGraphEnabled;
  }

  /**
   * Load every entry from disk, replacing the in-memory view. A missing
   * file is an empty registry.
   */
  async load(): Promise<void> {
    const raw = await readJsonFile(this.registryPath);
    if (raw === null) {
      logger.info({ path: this.registryPath }, "Registry file not found, starting fresh");
      this.sources = new Map();
      return;
    }
    const parsed = RegistryFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new KnowledgeRouterError(`Invalid code source registry: ${this.registryPath}`, ErrorCode.CONFIG_VALUE_INVALID, {
        path: this.registryPath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    this.sources = new Map(Object.values(parsed.data).map((record) => [record.source_id, toCodeSource(record)]));
    logger.info({ path: this.registryPath, count: this.sources.size }, "Loaded code source registry");
  }

  private async save(): Promise<void> {
    const data = Object.fromEntries(
      [...this.sources.values()].map((source) => [source.sourceId, toCodeSourceRecord(source)])
    );
    try {
      await atomicWriteJson(this.registryPath, data);
    } catch (error) {
      throw new KnowledgeRouterError(
        `Failed to persist code source registry: ${errorMessage(error)}`,
        ErrorCode.REGISTRY_PERSIST_FAILED,
        { path: this.registryPath }
      );
    }
    logger.debug({ count: this.sources.size }, "Saved code source registry");
  }

  /**
   * Register a source. Registering an existing id replaces the entry's
   * descriptive fields and keeps its analysis history.
   */
  async register(
    businessArea: string,
    sourceType: CodeSourceType,
    sourcePath: string,
    languages: readonly string[],
    options: RegisterOptions = {}
  ): Promise<string> {
    const sourceId = options.sourceId ?? makeSourceId(businessArea, sourceType, sourcePath);

    return this.writeLock.runExclusive(async () => {
      const existing = this.sources.get(sourceId);
      if (existing) {
        logger.warn({ sourceId, businessArea }, "Source already registered, updating");
      }
      this.sources.set(sourceId, {
        sourceId,
        businessArea,
        sourceType,
        path: sourcePath,
        languages: [...languages],
        name: options.name ?? sourcePath,
        enabled: options.enabled ?? true,
        lastAnalyzedCommit: existing?.lastAnalyzedCommit ?? null,
        lastAnalyzedTime: existing?.lastAnalyzedTime ?? null,
        metadata: { ...(options.metadata ?? {}) },
      });
      await this.save();
      logger.info({ sourceId, businessArea, sourceType, path: sourcePath }, "Registered code source");
      return sourceId;
    });
  }

  get(sourceId: string): CodeSource | undefined {
    const source = this.sources.get(sourceId);
    return source ? { ...source, languages: [...source.languages], metadata: { ...source.metadata } } : undefined;
  }

  list(options: ListOptions = {}): CodeSource[] {
    return [...this.sources.values()]
      .filter((s) => !options.businessArea || s.businessArea === options.businessArea)
      .filter((s) => !options.sourceType || s.sourceType === options.sourceType)
      .filter((s) => !options.enabledOnly || s.enabled)
      .map((s) => ({ ...s, languages: [...s.languages], metadata: { ...s.metadata } }));
  }

  /**
   * Record the revision a successful build reflects
   *
   * @throws SourceNotFoundError for an unknown id
   */
  async updateCommitHash(sourceId: string, commitHash: string, analyzedAt: Date = new Date()): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      const source = this.sources.get(sourceId);
      if (!source) throw new SourceNotFoundError(sourceId);
      this.sources.set(sourceId, { ...source, lastAnalyzedCommit: commitHash, lastAnalyzedTime: analyzedAt });
      await this.save();
    });
    logger.debug({ sourceId, commitHash }, "Updated commit hash for source");
  }

  getLastAnalyzedCommit(sourceId: string): string | null {
    return this.sources.get(sourceId)?.lastAnalyzedCommit ?? null;
  }

  /**
   * @throws SourceNotFoundError for an unknown id
   */
  async delete(sourceId: string): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      if (!this.sources.has(sourceId)) throw new SourceNotFoundError(sourceId);
      this.sources.delete(sourceId);
      await this.save();
    });
    logger.info({ sourceId }, "Deleted code source");
  }

  /**
   * True only when the global switch is on AND the area declares a
   * non-empty `codeql` block whose `enabled` flag reads as true (or is absent).
   */
  isCodeGraphEnabled(businessArea: string): boolean {
    if (!this.codeGraphEnabled) return false;
    const block = this.resolver.getSourceConfig(businessArea, CODE_GRAPH_SOURCE);
    if (!block || Object.keys(block).length === 0) return false;
    return configFlag(block, "enabled", true);
  }
}
