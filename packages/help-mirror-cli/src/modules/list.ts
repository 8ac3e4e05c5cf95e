import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "../lib/config.js";
import { groupByCategory, loadCatalog } from "../lib/catalog.js";
import { createLogger } from "../lib/logger.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type ListResultJson } from "../lib/json-output.js";

export interface ListCommandOptions {
  catalog?: string;
  settings?: string;
}

/**
 * Print every downloadable page, grouped by category.
 */
export function listPages(options: ListCommandOptions): void {
  const { config } = loadConfig({ catalogPath: options.catalog }, options.settings);
  const logger = createLogger({ level: config.logLevel, json: config.logJson });
  const catalog = loadCatalog(config.catalogPath, logger);
  const groups = groupByCategory(catalog.entries);

  if (isJsonMode()) {
    const result: ListResultJson = {
      categories: groups.map(({ category, entries }) => ({
        category,
        entries: entries.map(({ id, name, url, order }) => ({
          id,
          name,
          url,
          ...(order !== undefined && { order }),
        })),
      })),
      total: catalog.entries.length,
      excluded: [...catalog.excluded],
    };
    outputSuccess(result);
    return;
  }

  console.log(`${catalog.entries.length} help pages:`);
  console.log();
  for (const { category, entries } of groups) {
    console.log(chalk.cyan(`[${category || "uncategorized"}]`));
    for (const entry of entries) {
      console.log(`   ${entry.id} - ${entry.name}`);
    }
    console.log();
  }
}

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List the help pages in the catalog")
    .option("-c, --catalog <path>", "Catalog YAML file")
    .option("--settings <path>", "Settings file to use instead of the user settings")
    .action((options: ListCommandOptions) => {
      try {
        listPages(options);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
