/**
 * analyze command - Build code databases and refresh the code graph
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/index.js";
import type { AreaAnalysisResult, SourceAnalysisResult } from "../../core/code-graph/types.js";
import { cancelOnSignal, heading, withRouter, type GlobalOptions } from "./shared.js";

const logger = createLogger("analyze");

export interface AnalyzeOptions extends GlobalOptions {
  source?: string;
  area?: string;
  /** Register the repos listed in configuration first */
  sync?: boolean;
  json?: boolean;
}

/**
 * One-line plain-text summary of a source analysis
 */
export function describeSourceAnalysis(result: SourceAnalysisResult): string {
  switch (result.status) {
    case "skipped":
      return `skipped (${result.reason})`;
    case "cancelled":
      return `cancelled (${result.reason})`;
    case "error":
      return `error: ${result.error}`;
    case "success": {
      const languages = Object.entries(result.languages).map(([language, outcome]) =>
        outcome.status === "success" ? `${language}: ${outcome.build}` : `${language}: failed`
      );
      const graph = result.graph
        ? `${result.graph.nodes} nodes, ${result.graph.edges} edges`
        : `graph unchanged${result.graphError ? ` (${result.graphError})` : ""}`;
      return `${languages.join(", ") || "no languages"}; ${graph}`;
    }
  }
}

function colorFor(status: SourceAnalysisResult["status"]): (text: string) => string {
  switch (status) {
    case "success":
      return chalk.green;
    case "skipped":
    case "cancelled":
      return chalk.yellow;
    case "error":
      return chalk.red;
  }
}

function printSource(sourceId: string, result: SourceAnalysisResult): void {
  console.log(`  ${chalk.white(sourceId)}`);
  console.log(`    ${colorFor(result.status)(describeSourceAnalysis(result))}`);
  if (result.status === "success") {
    for (const [language, outcome] of Object.entries(result.languages)) {
      if (outcome.status === "failed") {
        console.log(`    ${chalk.red("✗")} ${language}: ${chalk.dim(outcome.error)}`);
      }
    }
  }
}

export async function analyzeCommand(options: AnalyzeOptions): Promise<void> {
  logger.info({ options }, "Starting code graph analysis");
  const { source: cancellation, dispose } = cancelOnSignal();
  const spinner = options.json ? null : ora("Analyzing code sources...").start();

  try {
    const output = await withRouter<
      { sources: Record<string, SourceAnalysisResult> } | { areas: Record<string, AreaAnalysisResult> }
    >(options, async (router) => {
      if (options.sync) {
        if (spinner) spinner.text = "Registering configured repositories...";
        await router.analysis.syncSourcesFromSettings();
      }

      if (options.source) {
        if (spinner) spinner.text = `Analyzing ${options.source}...`;
        const result = await router.analysis.analyzeSource(options.source, { token: cancellation.token });
        return { sources: { [options.source]: result } };
      }

      const areas = options.area ? [options.area] : router.resolver.businessAreas;
      const byArea: Record<string, AreaAnalysisResult> = {};
      for (const area of areas) {
        if (cancellation.token.cancelled) break;
        if (spinner) spinner.text = `Analyzing ${area}...`;
        byArea[area] = await router.analysis.analyzeBusinessArea(area, { token: cancellation.token });
      }
      return { areas: byArea };
    });

    spinner?.succeed(chalk.green(cancellation.token.cancelled ? "Analysis stopped" : "Analysis complete"));

    if (options.json) {
      console.log(JSON.stringify(output, null, 2));
      return;
    }

    heading("Code Graph Analysis");
    if ("sources" in output) {
      for (const [sourceId, result] of Object.entries(output.sources)) {
        printSource(sourceId, result);
      }
    } else {
      for (const [area, result] of Object.entries(output.areas)) {
        console.log();
        console.log(chalk.white.bold(area));
        if (result.status === "skipped") {
          console.log(`  ${chalk.yellow(`skipped (${result.reason})`)}`);
          continue;
        }
        for (const [sourceId, sourceResult] of Object.entries(result.sources)) {
          printSource(sourceId, sourceResult);
        }
      }
    }
    console.log();
  } catch (error) {
    spinner?.fail(chalk.red("Analysis failed"));
    logger.error({ err: error }, "Analysis failed");
    throw error;
  } finally {
    dispose();
  }
}
