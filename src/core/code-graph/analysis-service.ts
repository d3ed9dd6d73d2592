/**
 * Code Graph Analysis Service
 *
 * Per source: build (or reuse) a database for every language, run the
 * query battery against it, then rebuild the source's graph once from the
 * merged results. Languages fail independently; the token is checked
 * between phases.
 *
 * @module
 */

import { CancelledError, errorMessage } from "../errors.js";
import {
  configFlag,
  configList,
  type SourceConfig,
  type SourceConfigResolver,
} from "../config/source-config.js";
import { isOk } from "../../types/result.js";
import type { CancellationToken } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { DatabaseBuilder } from "./database-builder.js";
import { mergeQueryResults, type GraphEmitter } from "./graph-emitter.js";
import type { QueryExecutor } from "./query-executor.js";
import { CODE_GRAPH_SOURCE, type CodeSourceRegistry } from "./source-registry.js";
import type {
  AreaAnalysisResult,
  EmitStats,
  LanguageOutcome,
  QueryResults,
  SourceAnalysisResult,
} from "./types.js";

const logger = createLogger("analysis-service");

export interface AnalyzeOptions {
  token?: CancellationToken;
}

export interface CodeGraphAnalysisServiceOptions {
  registry: CodeSourceRegistry;
  builder: DatabaseBuilder;
  executor: QueryExecutor;
  emitter: GraphEmitter;
  resolver: SourceConfigResolver;
  /** Languages given to sources registered from configuration */
  defaultLanguages: readonly string[];
}

export class CodeGraphAnalysisService {
  private readonly registry: CodeSourceRegistry;
  private readonly builder: DatabaseBuilder;
  private readonly executor: QueryExecutor;
  private readonly emitter: GraphEmitter;
  private readonly resolver: SourceConfigResolver;
  private readonly defaultLanguages: readonly string[];

  constructor(options: CodeGraphAnalysisServiceOptions) {
    this.registry = options.registry;
    this.builder = options.builder;
    this.executor = options.executor;
    this.emitter = options.emitter;
    this.resolver = options.resolver;
    this.defaultLanguages = [...options.defaultLanguages];
  }

  isCodeGraphEnabled(businessArea: string): boolean {
    return this.registry.isCodeGraphEnabled(businessArea);
  }

  async analyzeSource(sourceId: string, options: AnalyzeOptions = {}): Promise<SourceAnalysisResult> {
    const { token } = options;
    const source = this.registry.get(sourceId);
    if (!source) {
      return { status: "error", error: `Source not found: ${sourceId}` };
    }
    if (!source.enabled) {
      return { status: "skipped", reason: "source_disabled" };
    }
    if (!this.isCodeGraphEnabled(source.businessArea)) {
      return { status: "skipped", reason: "codeql_not_enabled_for_business_area" };
    }

    logger.info({ sourceId, businessArea: source.businessArea, repoPath: source.path }, "Starting code graph analysis");

    const languages: Record<string, LanguageOutcome> = {};
    const collected: QueryResults[] = [];

    try {
      for (const language of source.languages) {
        token?.throwIfCancelled();
        try {
          const built = await this.builder.build(source, language, { token });
          if (!isOk(built)) {
            languages[language] = { status: "failed", error: built.error.message };
            continue;
          }

          token?.throwIfCancelled();
          const results = await this.executor.executeAll(built.value.databasePath, language, token);
          collected.push(results);
          languages[language] = {
            status: "success",
            build: built.value.status,
            databasePath: built.value.databasePath,
            revision: built.value.revision,
            queries: Object.fromEntries([...results].map(([analysis, rows]) => [analysis, rows.length])),
          };
        } catch (error) {
          if (error instanceof CancelledError) throw error;
          logger.error({ err: error, sourceId, language }, "Analysis failed for language");
          languages[language] = { status: "failed", error: errorMessage(error) };
        }
      }

      let graph: EmitStats | null = null;
      let graphError: string | undefined;
      if (collected.length > 0) {
        token?.throwIfCancelled();
        try {
          graph = await this.emitter.emit(
            mergeQueryResults(collected),
            source.businessArea,
            source.path,
            source.languages.join(",")
          );
        } catch (error) {
          logger.error({ err: error, sourceId }, "Graph emission failed");
          graphError = errorMessage(error);
        }
      } else {
        logger.warn({ sourceId }, "No language produced results, graph left unchanged");
      }

      logger.info({ sourceId, businessArea: source.businessArea, graph }, "Code graph analysis completed");
      return {
        status: "success",
        sourceId,
        businessArea: source.businessArea,
        repoPath: source.path,
        languages,
        graph,
        ...(graphError !== undefined ? { graphError } : {}),
      };
    } catch (error) {
      if (error instanceof CancelledError) {
        logger.info({ sourceId, reason: error.message }, "Code graph analysis cancelled");
        return { status: "cancelled", sourceId, reason: error.message };
      }
      throw error;
    }
  }

  /**
   * Analyze every enabled source of an area. A failing source is recorded
   * and the rest still run.
   */
  async analyzeBusinessArea(businessArea: string, options: AnalyzeOptions = {}): Promise<AreaAnalysisResult> {
    if (!this.isCodeGraphEnabled(businessArea)) {
      return { status: "skipped", businessArea, reason: "codeql_not_enabled_for_business_area" };
    }
    const sources = this.registry.list({ businessArea, enabledOnly: true });
    if (sources.length === 0) {
      return { status: "skipped", businessArea, reason: "no_sources_registered" };
    }

    logger.info({ businessArea, sourceCount: sources.length }, "Analyzing all sources for business area");
    const results: Record<string, SourceAnalysisResult> = {};
    for (const source of sources) {
      try {
        results[source.sourceId] = await this.analyzeSource(source.sourceId, options);
      } catch (error) {
        logger.error({ err: error, sourceId: source.sourceId }, "Source analysis failed");
        results[source.sourceId] = { status: "error", error: errorMessage(error) };
      }
    }
    return { status: "success", businessArea, sources: results };
  }

  /**
   * Register each repo of a `codeql` block as a gitlab source with the
   * default languages.
   *
   * @returns registered ids; empty when the block is disabled or lists no repos
   */
  async registerSourcesFromConfig(businessArea: string, config: SourceConfig): Promise<string[]> {
    if (!configFlag(config, "enabled", true)) {
      logger.info({ businessArea }, "Code graph disabled for business area");
      return [];
    }
    const repos = configList(config, "repos");
    if (repos.length === 0) {
      logger.warn({ businessArea }, "No repos specified for code graph");
      return [];
    }

    const ids: string[] = [];
    for (const repo of repos) {
      ids.push(
        await this.registry.register(businessArea, "gitlab", repo, this.defaultLanguages, {
          name: `${businessArea} - ${repo}`,
          enabled: true,
        })
      );
    }
    logger.info({ businessArea, sourceCount: ids.length }, "Registered sources from config");
    return ids;
  }

  /**
   * Register configured repos for every area that declares a `codeql` block
   */
  async syncSourcesFromSettings(): Promise<Map<string, string[]>> {
    const registered = new Map<string, string[]>();
    for (const area of this.resolver.areasWithSource(CODE_GRAPH_SOURCE)) {
      const config = this.resolver.getSourceConfig(area, CODE_GRAPH_SOURCE);
      if (config) {
        registered.set(area, await this.registerSourcesFromConfig(area, config));
      }
    }
    return registered;
  }
}
