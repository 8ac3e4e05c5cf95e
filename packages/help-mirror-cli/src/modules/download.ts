import { Command } from "commander";
import { z } from "zod";
import chalk from "chalk";
import { resolve } from "path";
import { loadConfig, DelaySecondsSchema, TimeoutMsSchema, type ResolvedConfig } from "../lib/config.js";
import { loadCatalog, selectEntry, type CatalogEntry } from "../lib/catalog.js";
import { runBatch, type BatchSummary } from "../lib/batch.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { createConsoleReporter, createJsonReporter, type Reporter } from "../lib/reporter.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJsonMode, shouldAutoConfirm } from "../lib/cli-context.js";
import { isInteractiveTerminal } from "../lib/output/mode.js";
import { outputNdjson } from "../lib/json-output.js";
import { createHttpPageSource, interactivePrompts } from "../lib/adapters/index.js";
import type { DelayFn, PageSource, PromptService } from "../lib/ports/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw commander options; numbers arrive as strings */
export interface DownloadCommandOptions {
  catalog?: string;
  outputDir?: string;
  delay?: string;
  timeout?: string;
  settings?: string;
  verbose?: boolean;
}

/** Collaborators, replaceable in tests */
export interface DownloadDeps {
  createSource?: (config: ResolvedConfig) => PageSource;
  delay?: DelayFn;
  prompts?: PromptService;
  reporter?: Reporter;
  logger?: Logger;
  isInteractive?: () => boolean;
}

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

// Plain decimals only: Number() alone would take "" as 0 and "0x10" as 16.
const DelayFlagSchema = z.string().regex(/^\d+(\.\d+)?$/).transform(Number).pipe(DelaySecondsSchema);
const TimeoutFlagSchema = z.string().regex(/^\d+$/).transform(Number).pipe(TimeoutMsSchema);

/**
 * Turn command flags into settings overrides. Throws VALIDATION_INVALID_OPTION.
 */
export function parseDownloadOptions(options: DownloadCommandOptions): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {
    catalogPath: options.catalog,
    outputDir: options.outputDir,
  };

  if (options.delay !== undefined) {
    const parsed = DelayFlagSchema.safeParse(options.delay);
    if (!parsed.success) {
      throw invalidOption("delay", `expected seconds between 0 and 3600, got "${options.delay}"`);
    }
    overrides.requestDelaySeconds = parsed.data;
  }

  if (options.timeout !== undefined) {
    const parsed = TimeoutFlagSchema.safeParse(options.timeout);
    if (!parsed.success) {
      throw invalidOption("timeout", `expected whole milliseconds between 1 and 600000, got "${options.timeout}"`);
    }
    overrides.timeoutMs = parsed.data;
  }

  if (options.verbose) {
    overrides.logLevel = "debug";
  }

  return overrides;
}

function defaultSource(config: ResolvedConfig): PageSource {
  return createHttpPageSource({
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    acceptLanguage: config.acceptLanguage,
  });
}

async function confirmBatch(
  entries: readonly CatalogEntry[],
  config: ResolvedConfig,
  prompts: PromptService
): Promise<boolean> {
  const minutes = ((entries.length * config.requestDelaySeconds) / 60).toFixed(1);
  return prompts.confirm(
    `Download ${entries.length} pages to ${config.outputDir}? (about ${minutes} min)`,
    false
  );
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * Download one page (when `id` is given) or the whole catalog.
 *
 * Resolves with the run summary, or undefined when the user declined the
 * confirmation. Rejects only for fatal errors: settings, catalog, unknown id.
 */
export async function downloadPages(
  id: string | undefined,
  options: DownloadCommandOptions,
  deps: DownloadDeps = {}
): Promise<BatchSummary | undefined> {
  const { config } = loadConfig(parseDownloadOptions(options), options.settings);
  const logger = deps.logger ?? createLogger({ level: config.logLevel, json: config.logJson });

  const catalog = loadCatalog(config.catalogPath, logger);
  const single = id !== undefined;
  const entries = single ? [selectEntry(catalog, id)] : catalog.entries;

  const isInteractive = deps.isInteractive ?? isInteractiveTerminal;
  if (!single && entries.length > 0 && !shouldAutoConfirm() && isInteractive()) {
    const confirmed = await confirmBatch(entries, config, deps.prompts ?? interactivePrompts);
    if (!confirmed) {
      if (isJsonMode()) {
        outputNdjson({ type: "cancelled", timestamp: new Date().toISOString() });
      } else {
        console.log(chalk.yellow("Download cancelled"));
      }
      return undefined;
    }
  }

  const reporter = deps.reporter ?? (isJsonMode() ? createJsonReporter() : createConsoleReporter());
  reporter.start({
    total: entries.length,
    outputDir: resolve(config.outputDir),
    excluded: single ? [] : catalog.excluded,
  });

  const summary = await runBatch(entries, {
    outputDir: config.outputDir,
    delayMs: Math.round(config.requestDelaySeconds * 1000),
    source: (deps.createSource ?? defaultSource)(config),
    delay: deps.delay,
    logger,
    onEntryStart: (entry, position) => reporter.entryStart(entry, position),
    onEntryResult: (entry, position, result) => reporter.entryResult(entry, position, result),
  });

  reporter.summary(summary);
  return summary;
}

export function registerDownloadCommand(program: Command, deps: DownloadDeps = {}): void {
  program
    .command("download [id]", { isDefault: true })
    .description("Download every help page in the catalog, or only the page with the given id")
    .option("-c, --catalog <path>", "Catalog YAML file")
    .option("-o, --output-dir <dir>", "Directory for the downloaded pages")
    .option("-d, --delay <seconds>", "Pause between requests")
    .option("-t, --timeout <ms>", "Per-request timeout")
    .option("--settings <path>", "Settings file to use instead of the user settings")
    .option("--verbose", "Log debug details to stderr")
    .action(async (id: string | undefined, options: DownloadCommandOptions) => {
      try {
        await downloadPages(id, options, deps);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
