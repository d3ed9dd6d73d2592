/**
 * retrieve command - Dispatch a query across a business area's sources
 */

import chalk from "chalk";
import { createLogger } from "../../utils/index.js";
import type { DispatchResult } from "../../core/retrieval/types.js";
import { parseFilters, withRouter, heading, type GlobalOptions } from "./shared.js";

const logger = createLogger("retrieve");

export interface RetrieveOptions extends GlobalOptions {
  source?: string[];
  limit?: number;
  filter?: string[];
  json?: boolean;
}

const PREVIEW_LENGTH = 160;

/**
 * Plain JSON view of a dispatch result, sources in dispatch order
 */
export function dispatchResultToJson(results: DispatchResult): Record<string, unknown> {
  return Object.fromEntries(results);
}

function preview(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH - 3)}...` : flat;
}

export async function retrieveCommand(area: string, query: string, options: RetrieveOptions): Promise<void> {
  logger.info({ area, options }, "Retrieving");

  const results = await withRouter(options, (router) =>
    router.retrieve(query, area, {
      ...(options.source ? { sources: options.source } : {}),
      ...(options.limit !== undefined ? { limit: options.limit } : {}),
      ...(options.filter ? { filters: parseFilters(options.filter) } : {}),
    })
  );

  if (options.json) {
    console.log(JSON.stringify(dispatchResultToJson(results), null, 2));
    return;
  }

  heading(`Results for "${query}" in ${area}`);
  if (results.size === 0) {
    console.log(chalk.yellow("  No sources configured for this business area"));
    return;
  }

  for (const [source, retrievals] of results) {
    for (const retrieval of retrievals) {
      console.log();
      const label = `${source} / ${retrieval.retrieverName}`;
      if (retrieval.error) {
        console.log(`${chalk.white.bold(label)}  ${chalk.red(retrieval.error)}`);
        continue;
      }
      console.log(`${chalk.white.bold(label)}  ${chalk.dim(`${retrieval.documents.length} documents`)}`);
      for (const doc of retrieval.documents) {
        console.log(`  ${chalk.green(doc.score.toFixed(4))} ${chalk.cyan(doc.title || "(untitled)")}`);
        if (doc.url) console.log(`         ${chalk.dim(doc.url)}`);
        console.log(`         ${preview(doc.content)}`);
      }
    }
  }
  console.log();
}
