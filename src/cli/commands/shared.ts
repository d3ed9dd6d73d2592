/**
 * Helpers shared by the CLI commands
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { loadSettings } from "../../core/config/settings.js";
import { createKnowledgeRouter, type KnowledgeRouter } from "../../core/knowledge-router.js";
import type { FilterScalar, SearchFilters } from "../../types/index.js";
import { CancellationTokenSource } from "../../utils/async.js";

export interface GlobalOptions {
  config?: string;
}

/**
 * Load settings and build an initialized router
 */
export async function openRouter(options: GlobalOptions = {}): Promise<KnowledgeRouter> {
  const settings = await loadSettings(options.config ? { configPath: options.config } : {});
  const router = createKnowledgeRouter(settings);
  await router.initialize();
  return router;
}

/**
 * Run `fn` against an initialized router and close it afterwards
 */
export async function withRouter<T>(options: GlobalOptions, fn: (router: KnowledgeRouter) => Promise<T>): Promise<T> {
  const router = await openRouter(options);
  try {
    return await fn(router);
  } finally {
    await router.close();
  }
}

/**
 * A cancellation source tripped by the first SIGINT or SIGTERM
 */
export function cancelOnSignal(): { source: CancellationTokenSource; dispose: () => void } {
  const source = new CancellationTokenSource();
  const onSignal = (signal: NodeJS.Signals): void => {
    console.log(chalk.dim(`\nReceived ${signal}, stopping after the current step...`));
    source.cancel(`interrupted by ${signal}`);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return {
    source,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

// =============================================================================
// Option parsers
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function filterScalar(raw: string): FilterScalar {
  if (raw === "true") return true;
  if (raw === "false") return false;
  const asNumber = Number(raw);
  return raw.trim() !== "" && Number.isFinite(asNumber) ? asNumber : raw;
}

/**
 * Parse repeated `key=value` filters; `a|b` becomes a list matching either
 */
export function parseFilters(entries: readonly string[]): SearchFilters {
  const filters: SearchFilters = {};
  for (const entry of entries) {
    const eq = entry.indexOf("=");
    const key = eq > 0 ? entry.slice(0, eq).trim() : "";
    if (!key) {
      throw new InvalidArgumentError(`Invalid filter '${entry}', expected key=value.`);
    }
    const raw = entry.slice(eq + 1);
    filters[key] = raw.includes("|") ? raw.split("|").map(filterScalar) : filterScalar(raw);
  }
  return filters;
}

export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds % 60).toFixed(0)}s`;
}

export function heading(title: string): void {
  console.log();
  console.log(chalk.cyan.bold(title));
  console.log(chalk.dim("─".repeat(40)));
}
