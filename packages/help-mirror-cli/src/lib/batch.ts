import { mkdir } from "fs/promises";
import { resolve } from "path";
import type { CatalogEntry } from "./catalog.js";
import { madeRequest, processEntry, type DownloadResult } from "./entry-processor.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { PageSource } from "./ports/page-source.js";
import type { DelayFn } from "./ports/timer.js";
import { realDelay } from "./adapters/real-timers.js";
import { writeFailed } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Where an entry sits in the run, for progress display */
export interface EntryPosition {
  /** 1-based */
  index: number;
  total: number;
}

export interface BatchOptions {
  outputDir: string;
  /** Pause after each network request, before the next entry */
  delayMs: number;
  source: PageSource;
  delay?: DelayFn;
  logger?: Logger;
  onEntryStart?: (entry: CatalogEntry, position: EntryPosition) => void;
  onEntryResult?: (entry: CatalogEntry, position: EntryPosition, result: DownloadResult) => void;
}

export interface BatchSummary {
  total: number;
  saved: number;
  skipped: number;
  failed: number;
  networkFailures: number;
  writeFailures: number;
  /** Absolute path */
  outputDir: string;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function emptySummary(total: number, outputDir: string): BatchSummary {
  return {
    total,
    saved: 0,
    skipped: 0,
    failed: 0,
    networkFailures: 0,
    writeFailures: 0,
    outputDir: resolve(outputDir),
  };
}

export function tally(summary: BatchSummary, result: DownloadResult): void {
  switch (result.status) {
    case "saved":
      summary.saved++;
      break;
    case "skipped-existing":
      summary.skipped++;
      break;
    case "failed":
      summary.failed++;
      if (result.kind === "network") {
        summary.networkFailures++;
      } else {
        summary.writeFailures++;
      }
      break;
  }
}

/**
 * Process entries one at a time, in order.
 *
 * After any entry that made a network request, and only when another
 * entry follows, waits `delayMs`. Skipped entries don't wait, so resumed
 * runs move quickly through pages that are already on disk.
 */
export async function runBatch(
  entries: readonly CatalogEntry[],
  options: BatchOptions
): Promise<BatchSummary> {
  const { outputDir, delayMs, source } = options;
  const delay = options.delay ?? realDelay;
  const logger = options.logger ?? createNoopLogger();
  const summary = emptySummary(entries.length, outputDir);

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw writeFailed(outputDir, reason, error instanceof Error ? error : undefined);
  }
  logger.debug("Batch started", { total: entries.length, outputDir: summary.outputDir, delayMs });

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const position: EntryPosition = { index: i + 1, total: entries.length };

    options.onEntryStart?.(entry, position);
    const result = await processEntry(entry, outputDir, source, logger);
    tally(summary, result);
    options.onEntryResult?.(entry, position, result);

    const hasNext = i < entries.length - 1;
    if (hasNext && delayMs > 0 && madeRequest(result)) {
      await delay(delayMs);
    }
  }

  logger.debug("Batch finished", { ...summary });
  return summary;
}
