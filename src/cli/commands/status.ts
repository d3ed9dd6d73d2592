/**
 * status command - Show configuration, stores and code graph state
 */

import chalk from "chalk";
import { createLogger } from "../../utils/index.js";
import { heading, withRouter, type GlobalOptions } from "./shared.js";

const logger = createLogger("status");

export interface StatusOptions extends GlobalOptions {
  verbose?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  logger.info({ options }, "Checking status");

  await withRouter(options, async (router) => {
    const status = router.status();

    heading("Knowledge Router Status");

    console.log();
    console.log(chalk.white.bold("Business Areas"));
    for (const area of status.businessAreas) {
      const sources = router.resolver.getSources(area).map(([name]) => name);
      const info = await router.vectorStore.getCollectionInfo(area).catch((error: unknown) => {
        logger.debug({ err: error, businessArea: area }, "Collection info unavailable");
        return null;
      });
      const points = info ? `${info.pointsCount} chunks` : chalk.dim("no collection");
      console.log(`  ${chalk.cyan(area.padEnd(16))} ${sources.join(", ") || chalk.dim("no sources")}  ${points}`);
      if (options.verbose) {
        console.log(
          `  ${" ".repeat(16)} ${chalk.dim(`lexical index: ${router.search.lexicalIndexSize(area)} chunks`)}`
        );
      }
    }

    console.log();
    console.log(chalk.white.bold("Retrievers"));
    console.log(`  ${status.retrievers.join(", ")}`);

    console.log();
    console.log(chalk.white.bold("Code Graph"));
    console.log(`  Enabled:      ${status.codeGraphEnabled ? chalk.green("yes") : chalk.dim("no")}`);
    if (status.codeGraphEnabled) {
      console.log(`  Graph store:  ${status.graphStoreAvailable ? chalk.green("available") : chalk.red("unavailable")}`);
      const cliVersion = await router.analysisCli.version().catch((error: unknown) => {
        logger.debug({ err: error }, "CodeQL CLI unavailable");
        return null;
      });
      console.log(`  CodeQL CLI:   ${cliVersion ?? chalk.red("not found")}`);
      console.log(`  Sources:      ${status.registeredCodeSources}`);
      if (options.verbose) {
        const databases = await router.storage.list();
        console.log(`  Databases:    ${databases.length}`);
        for (const db of databases) {
          console.log(chalk.dim(`    ${db.businessArea}/${db.repo}/${db.language}`));
        }
      }
    }
    console.log();
  });
}
