import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Catalog Errors
// ============================================================================

export function configNotFound(path: string): CLIError {
  return new CLIError("CONFIG_NOT_FOUND", `Can't find the catalog "${path}"`, {
    suggestion: "Point --catalog at the help content YAML file",
    example: "help-mirror --catalog path/to/HelpContent.yaml",
  });
}

export function configMalformed(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("CONFIG_MALFORMED", `Catalog "${path}" is malformed`, {
    suggestion: "Expect a mapping of id → { category, name, url } or a list of { id, detailUrl } items",
    details,
  });
}

export function entryNotFound(id: string, reason?: string): CLIError {
  return new CLIError("ENTRY_NOT_FOUND", `No help page with id "${id}"`, {
    suggestion: "List the available ids and try again",
    example: "help-mirror list",
    details: reason,
  });
}

// ============================================================================
// Settings Errors
// ============================================================================

export function settingsInvalid(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("SETTINGS_INVALID", `Settings file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function invalidOption(optionName: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    examples: [`help-mirror --help`],
  });
}

// ============================================================================
// Download Errors
// ============================================================================

export function httpStatus(url: string, status: number, statusText: string): CLIError {
  const text = statusText ? `${status} ${statusText}` : String(status);
  return new CLIError("HTTP_STATUS", `Server answered ${text}`, {
    details: url,
  });
}

export function networkTimeout(url: string, timeoutMs: number): CLIError {
  return new CLIError("NETWORK_TIMEOUT", `Request timed out after ${timeoutMs}ms`, {
    suggestion: "Raise --timeout or try again later",
    details: url,
  });
}

export function networkUnreachable(url: string, reason: string, cause?: Error): CLIError {
  return new CLIError("NETWORK_UNREACHABLE", `Request failed: ${reason}`, {
    suggestion: "Check your internet connection and the page URL",
    details: url,
    cause,
  });
}

export function writeFailed(path: string, reason: string, cause?: Error): CLIError {
  return new CLIError("WRITE_FAILED", `Can't write "${path}"`, {
    suggestion: "Check free disk space and permissions on the output directory",
    details: reason,
    cause,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

// ============================================================================
// Fetch Failure Mapping
// ============================================================================

/**
 * Convert a transport-level failure thrown by fetch into a CLIError.
 * Abort is how the request timeout surfaces.
 */
export function fromFetchFailure(url: string, error: unknown, timeoutMs: number): CLIError {
  if (error instanceof CLIError) return error;
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return networkTimeout(url, timeoutMs);
    }
    const reason = "code" in error && typeof error.code === "string"
      ? `${error.code} (${error.message})`
      : error.message;
    return networkUnreachable(url, reason, error);
  }
  return networkUnreachable(url, String(error));
}
