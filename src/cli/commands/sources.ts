/**
 * sources command - Manage the code source registry
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { createLogger } from "../../utils/index.js";
import { isCodeSourceType } from "../../core/code-graph/types.js";
import { heading, withRouter, type GlobalOptions } from "./shared.js";

const logger = createLogger("sources");

export interface RegisterOptions extends GlobalOptions {
  type: string;
  language?: string[];
  name?: string;
  id?: string;
  localPath?: string;
  disabled?: boolean;
}

export interface ListOptions extends GlobalOptions {
  area?: string;
  enabledOnly?: boolean;
}

export async function registerSourceCommand(area: string, repoPath: string, options: RegisterOptions): Promise<void> {
  const sourceType = options.type;
  if (!isCodeSourceType(sourceType)) {
    throw new InvalidArgumentError(`Unknown source type '${sourceType}' (expected gitlab or filesystem).`);
  }

  const sourceId = await withRouter(options, async (router) => {
    if (!router.resolver.isKnownArea(area)) {
      throw new InvalidArgumentError(
        `Unknown business area '${area}' (configured: ${router.resolver.businessAreas.join(", ")}).`
      );
    }
    return router.registry.register(
      area,
      sourceType,
      repoPath,
      options.language ?? router.settings.codeGraph.defaultLanguages,
      {
        ...(options.name ? { name: options.name } : {}),
        ...(options.id ? { sourceId: options.id } : {}),
        enabled: !options.disabled,
        ...(options.localPath ? { metadata: { local_path: options.localPath } } : {}),
      }
    );
  });

  logger.info({ sourceId }, "Registered code source");
  console.log(chalk.green(`Registered ${chalk.white(sourceId)}`));
}

export async function listSourcesCommand(options: ListOptions): Promise<void> {
  const sources = await withRouter(options, async (router) =>
    router.registry.list({
      ...(options.area ? { businessArea: options.area } : {}),
      enabledOnly: options.enabledOnly ?? false,
    })
  );

  heading("Code Sources");
  if (sources.length === 0) {
    console.log(chalk.yellow("  No code sources registered"));
    console.log(chalk.dim("  Run"), chalk.white("knowledge-router sources register <area> <path>"), chalk.dim("to add one"));
    return;
  }

  for (const source of sources) {
    console.log();
    const state = source.enabled ? chalk.green("enabled") : chalk.dim("disabled");
    console.log(`${chalk.white.bold(source.sourceId)}  ${state}`);
    console.log(`  Area:       ${source.businessArea}`);
    console.log(`  Path:       ${source.sourceType}:${source.path}`);
    console.log(`  Languages:  ${source.languages.join(", ")}`);
    console.log(
      `  Analyzed:   ${
        source.lastAnalyzedCommit
          ? `${source.lastAnalyzedCommit.slice(0, 12)} at ${source.lastAnalyzedTime?.toISOString() ?? "unknown"}`
          : chalk.dim("never")
      }`
    );
  }
  console.log();
}

export async function removeSourceCommand(sourceId: string, options: GlobalOptions): Promise<void> {
  await withRouter(options, async (router) => {
    const source = router.registry.get(sourceId);
    await router.registry.delete(sourceId);
    if (source) {
      for (const language of source.languages) {
        await router.builder.deleteDatabase(source, language);
      }
    }
  });
  logger.info({ sourceId }, "Removed code source");
  console.log(chalk.green(`Removed ${chalk.white(sourceId)}`));
}
