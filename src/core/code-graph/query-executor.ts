/**
 * Query Executor
 *
 * Runs the fixed per-language battery of graph queries against a code
 * database. Query files live under `{queriesDir}/{language}/{name}.ql`.
 *
 * @module
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { CancelledError } from "../errors.js";
import type { CancellationToken } from "../../utils/async.js";
import { fileExists, findFiles } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import type { IAnalysisCli } from "./analysis-cli.js";
import type { QueryResults, QueryRow } from "./types.js";

const logger = createLogger("query-executor");

/** language -> analyses, in execution order */
export const QUERY_BATTERY: Readonly<Record<string, readonly string[]>> = {
  python: ["call_graph", "subprocess_calls", "imports"],
  java: ["call_graph"],
};

/** `queries/` at the package root, from both src/ and dist/ */
export const DEFAULT_QUERIES_DIR = fileURLToPath(new URL("../../../queries", import.meta.url));

export interface QueryExecutorOptions {
  cli: IAnalysisCli;
  queriesDir?: string;
}

export class QueryExecutor {
  private readonly cli: IAnalysisCli;
  readonly queriesDir: string;

  constructor(options: QueryExecutorOptions) {
    this.cli = options.cli;
    this.queriesDir = options.queriesDir ?? DEFAULT_QUERIES_DIR;
  }

  analysesFor(language: string): readonly string[] {
    return QUERY_BATTERY[language] ?? [];
  }

  queryFile(language: string, analysis: string): string {
    return path.join(this.queriesDir, language, `${analysis}.ql`);
  }

  /**
   * Run one analysis. Any failure other than cancellation yields `[]`.
   */
  async executeQuery(
    databasePath: string,
    language: string,
    analysis: string,
    token?: CancellationToken
  ): Promise<QueryRow[]> {
    const queryFile = this.queryFile(language, analysis);
    if (!(await fileExists(queryFile))) {
      logger.error({ queryFile }, "Query file not found");
      return [];
    }
    try {
      const rows = await this.cli.queryRun(databasePath, queryFile, { token });
      logger.info({ analysis, language, rows: rows.length }, "Executed query");
      return rows;
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      logger.error({ err: error, analysis, language, databasePath }, "Failed to execute query");
      return [];
    }
  }

  /**
   * Run the whole battery for a language; each analysis is independent.
   */
  async executeAll(databasePath: string, language: string, token?: CancellationToken): Promise<QueryResults> {
    const results: QueryResults = new Map();
    const analyses = this.analysesFor(language);
    if (analyses.length === 0) {
      logger.warn({ language }, "No queries defined for language");
      return results;
    }
    for (const analysis of analyses) {
      token?.throwIfCancelled();
      results.set(analysis, await this.executeQuery(databasePath, language, analysis, token));
    }
    return results;
  }

  /**
   * Query files present on disk, as `{language}/{name}.ql`
   */
  async listAvailableQueries(language?: string): Promise<string[]> {
    return findFiles([language ? `${language}/*.ql` : "*/*.ql"], this.queriesDir);
  }
}
