/**
 * Database Builder
 *
 * Revision-gated code database builds. For one (source, language):
 * look up the checkout's revision; reuse the stored database when the
 * revision matches the last analyzed one, otherwise build into a temp
 * directory, store the result and record the revision.
 *
 * Builds of the same (source, language) are serialized, and concurrent
 * identical requests share a single in-flight build.
 *
 * @module
 */

import * as path from "node:path";
import { BuildError, CancelledError, CommandTimeoutError, ErrorCode, errorMessage } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { KeyedMutex, SingleFlight, type CancellationToken } from "../../utils/async.js";
import { makeTempDirectory, removePath } from "../../utils/fs.js";
import { normalizeRepoPath } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";
import type { IAnalysisCli } from "./analysis-cli.js";
import type { DatabaseStorage } from "./database-storage.js";
import type { CodeSourceRegistry } from "./source-registry.js";
import type { BuildOutcome, CodeSource } from "./types.js";

const logger = createLogger("database-builder");

export interface BuildOptions {
  token?: CancellationToken;
  /** Checkout to analyze; defaults to the source's `local_path` metadata, then its path */
  sourceRoot?: string;
  buildCommand?: string;
}

export interface DatabaseBuilderOptions {
  cli: IAnalysisCli;
  storage: DatabaseStorage;
  registry: Pick<CodeSourceRegistry, "getLastAnalyzedCommit" | "updateCommitHash">;
}

/**
 * Where the source's code is checked out locally
 */
export function sourceRootFor(source: CodeSource): string {
  const localPath = source.metadata.local_path;
  return typeof localPath === "string" && localPath.length > 0 ? localPath : source.path;
}

export class DatabaseBuilder {
  private readonly cli: IAnalysisCli;
  private readonly storage: DatabaseStorage;
  private readonly registry: DatabaseBuilderOptions["registry"];
  private readonly locks = new KeyedMutex();
  private readonly inFlight = new SingleFlight<Result<BuildOutcome, BuildError>>();

  constructor(options: DatabaseBuilderOptions) {
    this.cli = options.cli;
    this.storage = options.storage;
    this.registry = options.registry;
  }

  /**
   * Build (or reuse) the database for one language of a source.
   *
   * Build failures come back as `err`; cancellation is thrown as
   * CancelledError.
   */
  build(source: CodeSource, language: string, options: BuildOptions = {}): Promise<Result<BuildOutcome, BuildError>> {
    const key = `${source.sourceId}::${language}`;
    return this.inFlight.run(key, () => this.locks.runExclusive(key, () => this.buildExclusive(source, language, options)));
  }

  /**
   * Whether `build` would run the CLI for this (source, language)
   */
  async needsRebuild(source: CodeSource, language: string, sourceRoot: string = sourceRootFor(source)): Promise<boolean> {
    const current = await this.cli.currentRevision(sourceRoot);
    return !(await this.cachedDatabase(source, language, current));
  }

  async deleteDatabase(source: CodeSource, language: string): Promise<boolean> {
    return this.storage.delete(source.businessArea, source.path, language);
  }

  private async cachedDatabase(source: CodeSource, language: string, current: string | null): Promise<string | null> {
    if (current === null || current !== this.registry.getLastAnalyzedCommit(source.sourceId)) {
      return null;
    }
    const stored = await this.storage.getDatabase(source.businessArea, source.path, language);
    if (!stored) return null;
    // A database stored for another revision is stale even if the source's commit matches
    if (stored.revision !== null && stored.revision !== current) return null;
    return stored.path;
  }

  private async buildExclusive(
    source: CodeSource,
    language: string,
    options: BuildOptions
  ): Promise<Result<BuildOutcome, BuildError>> {
    const context = { sourceId: source.sourceId, language };
    const sourceRoot = options.sourceRoot ?? sourceRootFor(source);
    let workDir: string | null = null;

    try {
      options.token?.throwIfCancelled();
      const current = await this.cli.currentRevision(sourceRoot);

      const cached = await this.cachedDatabase(source, language, current);
      if (cached) {
        logger.info({ ...context, revision: current }, "Revision unchanged, reusing stored database");
        return ok({ status: "cached", databasePath: cached, revision: current });
      }

      workDir = await makeTempDirectory("kr-codedb-");
      const builtPath = path.join(workDir, `${normalizeRepoPath(source.path)}_${language}.db`);
      await this.cli.databaseCreate(builtPath, sourceRoot, language, {
        buildCommand: options.buildCommand,
        token: options.token,
      });
      options.token?.throwIfCancelled();

      const storedPath = await this.storage.store(builtPath, source.businessArea, source.path, language, current);
      if (current !== null) {
        await this.registry.updateCommitHash(source.sourceId, current);
      }

      logger.info({ ...context, revision: current, path: storedPath }, "Built code database");
      return ok({ status: "built", databasePath: storedPath, revision: current });
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      logger.error({ err: error, ...context }, "Failed to build code database");
      const code = error instanceof CommandTimeoutError ? ErrorCode.COMMAND_TIMEOUT : ErrorCode.BUILD_FAILED;
      return err(new BuildError(`Failed to build ${language} database for ${source.sourceId}: ${errorMessage(error)}`, code, context));
    } finally {
      if (workDir) {
        await removePath(workDir);
      }
    }
  }
}
