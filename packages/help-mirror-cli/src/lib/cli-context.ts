/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Skip confirmation prompts (auto-yes); also set by --no-input and CI */
  yes: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function envFlag(name: string, env: NodeJS.ProcessEnv): boolean {
  const value = env[name];
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || envFlag("HELP_MIRROR_JSON", env)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || envFlag("HELP_MIRROR_QUIET", env)) {
    currentContext.quiet = true;
  }

  const noInput = argv.includes("--no-input") || Boolean(env.CI) || envFlag("HELP_MIRROR_NO_INPUT", env);
  if (noInput || argv.includes("--yes") || argv.includes("-y") || envFlag("HELP_MIRROR_YES", env)) {
    currentContext.yes = true;
  }

  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we should skip confirmations.
 */
export function shouldAutoConfirm(): boolean {
  return currentContext.yes;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
