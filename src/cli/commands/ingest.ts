/**
 * ingest command - Sync document sources into the area's indexes
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/index.js";
import type { SourceIngestionOutcome } from "../../core/ingestion/ingestion-service.js";
import { formatDuration, heading, withRouter, type GlobalOptions } from "./shared.js";

const logger = createLogger("ingest");

export interface IngestOptions extends GlobalOptions {
  source?: string;
  full?: boolean;
}

function describeOutcome(outcome: SourceIngestionOutcome): string {
  switch (outcome.status) {
    case "success":
      return chalk.green(
        `${outcome.documentsProcessed} documents, ${outcome.chunksCreated} chunks` +
          (outcome.chunksSkipped > 0 ? `, ${outcome.chunksSkipped} not embedded` : "") +
          (outcome.documentsDeleted > 0 ? `, ${outcome.documentsDeleted} deleted` : "") +
          ` (${outcome.mode}, ${formatDuration(outcome.durationMs)})`
      );
    case "skipped":
      return chalk.yellow(`skipped: ${outcome.reason}`);
    case "error":
      return chalk.red(`failed: ${outcome.error}`);
  }
}

export async function ingestCommand(area: string, options: IngestOptions): Promise<void> {
  const mode = options.full ? "full" : "incremental";
  logger.info({ area, source: options.source, mode }, "Starting ingestion");

  const spinner = ora(`Ingesting ${area}...`).start();
  let outcomes: Map<string, SourceIngestionOutcome>;
  try {
    outcomes = await withRouter(options, async (router) => {
      if (options.source) {
        spinner.text = `Ingesting ${area}/${options.source} (${mode})...`;
        const result = await router.ingestion.ingest(area, options.source, mode);
        return new Map<string, SourceIngestionOutcome>([[options.source, result]]);
      }
      return router.ingestion.ingestAll(area, mode);
    });
  } catch (error) {
    spinner.fail(chalk.red("Ingestion failed"));
    logger.error({ err: error, area }, "Ingestion failed");
    throw error;
  }

  const failed = [...outcomes.values()].filter((outcome) => outcome.status === "error").length;
  if (failed > 0) {
    spinner.warn(chalk.yellow(`Ingestion completed with ${failed} failed source(s)`));
  } else {
    spinner.succeed(chalk.green("Ingestion complete"));
  }

  heading(`Ingestion: ${area}`);
  if (outcomes.size === 0) {
    console.log(chalk.yellow("  No ingestible sources configured"));
  }
  for (const [source, outcome] of outcomes) {
    console.log(`  ${chalk.white(source.padEnd(14))} ${describeOutcome(outcome)}`);
  }
  console.log();
}
