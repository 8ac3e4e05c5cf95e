/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import type { BatchSummary } from "./batch.js";
import type { ExcludedEntry } from "./catalog.js";
import type { ErrorCode } from "./errors/types.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadEventJson {
  type: "start" | "entry" | "summary" | "cancelled";
  timestamp: string;
  data?: {
    total?: number;
    outputDir?: string;
    excluded?: ExcludedEntry[];
    position?: number;
    id?: string;
    category?: string;
    name?: string;
    url?: string;
    status?: "saved" | "skipped-existing" | "failed";
    path?: string;
    bytes?: number;
    failure?: {
      kind: "network" | "write";
      code: ErrorCode;
      message: string;
      details?: string;
    };
    summary?: BatchSummary;
  };
}

export interface ListResultJson {
  categories: Array<{
    category: string;
    entries: Array<{
      id: string;
      name: string;
      url: string;
      order?: number;
    }>;
  }>;
  total: number;
  excluded: ExcludedEntry[];
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
  settingsPath: string;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (one line per download event).
 */
export function outputNdjson(event: DownloadEventJson): void {
  console.log(JSON.stringify(event));
}
