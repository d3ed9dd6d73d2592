#!/usr/bin/env node

/**
 * Knowledge Router CLI
 * Retrieval, ingestion and code graph management from the command line
 */

import { Command } from "commander";
import chalk from "chalk";
import { retrieveCommand } from "./commands/retrieve.js";
import { ingestCommand } from "./commands/ingest.js";
import { listSourcesCommand, registerSourceCommand, removeSourceCommand } from "./commands/sources.js";
import { analyzeCommand } from "./commands/analyze.js";
import { statusCommand } from "./commands/status.js";
import { collect, parsePositiveInt } from "./commands/shared.js";
import { wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("knowledge-router")
  .description("Multi-tenant knowledge retrieval with hybrid ranking and a code graph")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to the JSON config file")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

function globals(): { config?: string } {
  const { config } = program.opts<{ config?: string }>();
  return config ? { config } : {};
}

// =============================================================================
// Commands
// =============================================================================

program
  .command("retrieve")
  .description("Retrieve documents for a query from a business area's sources")
  .argument("<area>", "Business area")
  .argument("<query>", "Query text")
  .option("-s, --source <name>", "Restrict to a source (repeatable)", collect)
  .option("-l, --limit <n>", "Documents per retriever", parsePositiveInt)
  .option("-f, --filter <key=value>", "Payload filter, a|b matches either (repeatable)", collect)
  .option("--json", "Print raw JSON")
  .action((area: string, query: string, options: { source?: string[]; limit?: number; filter?: string[]; json?: boolean }) =>
    retrieveCommand(area, query, { ...options, ...globals() })
  );

program
  .command("ingest")
  .description("Sync document sources into the area's vector and lexical indexes")
  .argument("<area>", "Business area")
  .option("-s, --source <name>", "Only this source")
  .option("--full", "Refetch everything instead of changes since the last sync")
  .action((area: string, options: { source?: string; full?: boolean }) => ingestCommand(area, { ...options, ...globals() }));

const sources = program.command("sources").description("Manage registered code sources");

sources
  .command("register")
  .description("Register a repository for code graph analysis")
  .argument("<area>", "Business area")
  .argument("<path>", "Repository path (org/repo for gitlab, a directory for filesystem)")
  .option("-t, --type <type>", "gitlab or filesystem", "gitlab")
  .option("-L, --language <language>", "Language to analyze (repeatable)", collect)
  .option("-n, --name <name>", "Display name")
  .option("--id <id>", "Explicit source id")
  .option("--local-path <dir>", "Checkout to build from")
  .option("--disabled", "Register without enabling")
  .action(
    (
      area: string,
      repoPath: string,
      options: { type: string; language?: string[]; name?: string; id?: string; localPath?: string; disabled?: boolean }
    ) => registerSourceCommand(area, repoPath, { ...options, ...globals() })
  );

sources
  .command("list")
  .description("List registered code sources")
  .option("-a, --area <area>", "Only this business area")
  .option("--enabled-only", "Hide disabled sources")
  .action((options: { area?: string; enabledOnly?: boolean }) => listSourcesCommand({ ...options, ...globals() }));

sources
  .command("remove")
  .description("Remove a code source and its stored databases")
  .argument("<sourceId>", "Source id")
  .action((sourceId: string) => removeSourceCommand(sourceId, globals()));

program
  .command("analyze")
  .description("Build code databases and refresh the code graph")
  .option("-s, --source <id>", "Only this source")
  .option("-a, --area <area>", "Only this business area")
  .option("--sync", "Register repositories listed in configuration first")
  .option("--json", "Print raw JSON")
  .action((options: { source?: string; area?: string; sync?: boolean; json?: boolean }) =>
    analyzeCommand({ ...options, ...globals() })
  );

program
  .command("status")
  .description("Show configuration, stores and code graph state")
  .option("-v, --verbose", "Show detailed statistics")
  .action((options: { verbose?: boolean }) => statusCommand({ ...options, ...globals() }));

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const wrapped = wrapError(error);
  logger.error({ err: error }, "CLI error occurred");
  console.error(chalk.red(`\nError: ${wrapped.message}`) + chalk.dim(` [${wrapped.code}]`));
  if (process.env.DEBUG || process.env.NODE_ENV === "development") {
    console.error(chalk.dim(wrapped.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
