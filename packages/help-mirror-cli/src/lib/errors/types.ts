/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Catalog errors (fatal)
  | "CONFIG_NOT_FOUND"
  | "CONFIG_MALFORMED"
  | "ENTRY_NOT_FOUND"
  // Settings and flag errors (fatal)
  | "SETTINGS_INVALID"
  | "VALIDATION_INVALID_OPTION"
  // Per-entry download errors
  | "HTTP_STATUS"
  | "NETWORK_TIMEOUT"
  | "NETWORK_UNREACHABLE"
  | "WRITE_FAILED"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      examples?: string[];
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
