import { existsSync } from "fs";
import { link, rm, writeFile } from "fs/promises";
import { join } from "path";
import { randomBytes } from "crypto";
import type { CatalogEntry } from "./catalog.js";
import { CLIError, isCLIError } from "./errors/types.js";
import { unknownError, writeFailed } from "./errors/catalog.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { PageSource } from "./ports/page-source.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FailureKind = "network" | "write";

/** Outcome of processing a single catalog entry */
export type DownloadResult =
  | { status: "saved"; path: string; bytes: number }
  | { status: "skipped-existing"; path: string }
  | { status: "failed"; kind: FailureKind; error: CLIError };

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function targetPathFor(entry: CatalogEntry, outputDir: string): string {
  return join(outputDir, `${entry.id}.html`);
}

/**
 * Hidden file used while writing. Fixed length whatever the id, and never
 * ends in `.html`, so a leftover from an interrupted run is not taken for
 * a finished page.
 */
export function tempPathIn(outputDir: string): string {
  return join(outputDir, `.part-${randomBytes(4).toString("hex")}`);
}

/**
 * Whether processing this result involved a network request.
 */
export function madeRequest(result: DownloadResult): boolean {
  return result.status !== "skipped-existing";
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Write the body to a temp file, then hard-link it to the target. Unlike
 * rename, link refuses an existing target. Resolves false when the target
 * appeared in the meantime. The temp file is always removed.
 */
async function publishExclusively(tempPath: string, targetPath: string, body: Uint8Array): Promise<boolean> {
  try {
    await writeFile(tempPath, body, { flag: "wx" });
    await link(tempPath, targetPath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      return false;
    }
    throw error;
  } finally {
    await rm(tempPath, { force: true });
  }
}

// ---------------------------------------------------------------------------
// Processing
// ---------------------------------------------------------------------------

/**
 * Fetch one entry and store it as `{outputDir}/{id}.html`.
 * Existing files are left alone and reported as skipped. Failures are
 * returned, never thrown. `outputDir` must already exist.
 */
export async function processEntry(
  entry: CatalogEntry,
  outputDir: string,
  source: PageSource,
  logger: Logger = createNoopLogger()
): Promise<DownloadResult> {
  const log = logger.child({ id: entry.id });
  const path = targetPathFor(entry, outputDir);

  if (existsSync(path)) {
    log.debug("Output exists, skipping", { path });
    return { status: "skipped-existing", path };
  }

  let body: Uint8Array;
  try {
    body = await source.fetch(entry.url);
  } catch (error) {
    const cliError = isCLIError(error) ? error : unknownError(error);
    log.warn("Download failed", { url: entry.url, code: cliError.code, reason: cliError.message });
    return { status: "failed", kind: "network", error: cliError };
  }

  let published: boolean;
  try {
    published = await publishExclusively(tempPathIn(outputDir), path, body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.warn("Write failed", { path, reason });
    return {
      status: "failed",
      kind: "write",
      error: writeFailed(path, reason, error instanceof Error ? error : undefined),
    };
  }

  if (!published) {
    log.debug("Output appeared while fetching, keeping it", { path });
    return { status: "skipped-existing", path };
  }

  log.debug("Saved", { path, bytes: body.byteLength });
  return { status: "saved", path, bytes: body.byteLength };
}
