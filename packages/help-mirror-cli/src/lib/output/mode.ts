/**
 * Output mode detection for determining how to render CLI output.
 */

import { isJsonMode } from "../cli-context.js";

export type OutputMode = "text" | "json";

/**
 * Detect the output mode from the current CLI context.
 *
 * - `text`: human-readable lines, colored when the terminal allows
 * - `json`: structured JSON / NDJSON for scripting
 */
export function getOutputMode(): OutputMode {
  return isJsonMode() ? "json" : "text";
}

/**
 * Check if we're attached to an interactive terminal.
 * Dumb terminals and CI runs count as non-interactive.
 */
export function isInteractiveTerminal(): boolean {
  if (process.env.CI) return false;
  if (process.env.TERM === "dumb") return false;
  return Boolean(process.stdout.isTTY && process.stdin.isTTY);
}
