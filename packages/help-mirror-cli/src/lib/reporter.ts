import chalk from "chalk";
import { basename } from "path";
import type { BatchSummary, EntryPosition } from "./batch.js";
import type { CatalogEntry, ExcludedEntry } from "./catalog.js";
import type { DownloadResult } from "./entry-processor.js";
import { outputNdjson, type DownloadEventJson } from "./json-output.js";
import { createSpinner, type Spinner } from "./spinner.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunInfo {
  total: number;
  outputDir: string;
  excluded: readonly ExcludedEntry[];
}

/**
 * Observer for a download run. Reporters print; they never change the run.
 */
export interface Reporter {
  start(info: RunInfo): void;
  entryStart(entry: CatalogEntry, position: EntryPosition): void;
  entryResult(entry: CatalogEntry, position: EntryPosition, result: DownloadResult): void;
  summary(summary: BatchSummary): void;
}

const RULE_WIDTH = 60;

// ---------------------------------------------------------------------------
// Console Reporter
// ---------------------------------------------------------------------------

export function formatOutcome(result: DownloadResult): string[] {
  switch (result.status) {
    case "saved":
      return [chalk.green(`  ✓ saved ${basename(result.path)} (${result.bytes} bytes)`)];
    case "skipped-existing":
      return [chalk.gray(`  ↷ skipped, ${basename(result.path)} already exists`)];
    case "failed": {
      const lines = [chalk.red(`  ✗ failed [${result.error.code}] ${result.error.message}`)];
      if (result.kind === "write" && result.error.details) {
        lines.push(chalk.dim(`    ${result.error.details}`));
      }
      return lines;
    }
  }
}

export function formatSummary(summary: BatchSummary): string[] {
  return [
    "",
    "=".repeat(RULE_WIDTH),
    chalk.bold("Download summary"),
    `  total:     ${summary.total}`,
    `  succeeded: ${summary.saved}`,
    `  failed:    ${summary.failed} (network ${summary.networkFailures}, write ${summary.writeFailures})`,
    `  skipped:   ${summary.skipped}`,
    `  output:    ${summary.outputDir}`,
  ];
}

/**
 * Human-readable progress on stdout, with a spinner while a page is in flight.
 */
export function createConsoleReporter(options: { spinner?: Spinner } = {}): Reporter {
  const spinner = options.spinner ?? createSpinner();
  const print = (lines: string[]) => {
    for (const line of lines) console.log(line);
  };

  return {
    start({ total, outputDir, excluded }) {
      const lines = [`Downloading ${total} help page${total === 1 ? "" : "s"}`, `Output directory: ${outputDir}`];
      if (excluded.length > 0) {
        lines.push(chalk.yellow(`${excluded.length} catalog entr${excluded.length === 1 ? "y" : "ies"} excluded`));
      }
      lines.push("-".repeat(RULE_WIDTH));
      print(lines);
    },

    entryStart(entry, { index, total }) {
      print([
        "",
        chalk.bold(`[${index}/${total}] ${entry.id}`),
        `  category: ${entry.category}`,
        `  name:     ${entry.name}`,
        `  url:      ${entry.url}`,
      ]);
      spinner.start(`Processing ${entry.id}`);
    },

    entryResult(_entry, _position, result) {
      spinner.stop();
      print(formatOutcome(result));
    },

    summary(summary) {
      spinner.stop();
      print(formatSummary(summary));
    },
  };
}

// ---------------------------------------------------------------------------
// JSON Reporter
// ---------------------------------------------------------------------------

export function toEntryEvent(
  entry: CatalogEntry,
  position: EntryPosition,
  result: DownloadResult,
  timestamp: string
): DownloadEventJson {
  const base = {
    position: position.index,
    total: position.total,
    id: entry.id,
    category: entry.category,
    name: entry.name,
    url: entry.url,
    status: result.status,
  };

  switch (result.status) {
    case "saved":
      return { type: "entry", timestamp, data: { ...base, path: result.path, bytes: result.bytes } };
    case "skipped-existing":
      return { type: "entry", timestamp, data: { ...base, path: result.path } };
    case "failed":
      return {
        type: "entry",
        timestamp,
        data: {
          ...base,
          failure: {
            kind: result.kind,
            code: result.error.code,
            message: result.error.message,
            ...(result.error.details !== undefined && { details: result.error.details }),
          },
        },
      };
  }
}

/**
 * NDJSON events on stdout, one per line.
 */
export function createJsonReporter(options: { now?: () => Date } = {}): Reporter {
  const now = options.now ?? (() => new Date());
  const timestamp = () => now().toISOString();

  return {
    start({ total, outputDir, excluded }) {
      outputNdjson({
        type: "start",
        timestamp: timestamp(),
        data: { total, outputDir, excluded: [...excluded] },
      });
    },

    entryStart() {},

    entryResult(entry, position, result) {
      outputNdjson(toEntryEvent(entry, position, result, timestamp()));
    },

    summary(summary) {
      outputNdjson({ type: "summary", timestamp: timestamp(), data: { summary } });
    },
  };
}
