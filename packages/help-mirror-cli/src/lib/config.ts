import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { settingsInvalid } from "./errors/catalog.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** User-level settings path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "help-mirror",
  "config.yaml"
);

/** Upper bound for the per-request timeout (10 minutes) */
export const MAX_TIMEOUT_MS = 600_000;

/** Default values for all settings */
export const CONFIG_DEFAULTS = {
  catalogPath: "gakumasu-diff/orig/HelpContent.yaml",
  outputDir: "downloaded_help_pages",
  requestDelaySeconds: 1.0,
  timeoutMs: 30_000,
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  acceptLanguage: "ja-JP,ja;q=0.9,en;q=0.8",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Bounds shared by the settings file and CLI flags */
export const DelaySecondsSchema = z.number().min(0).max(3600);
export const TimeoutMsSchema = z.number().int().min(1).max(MAX_TIMEOUT_MS);

const DownloadSchema = z.object({
  outputDir: z.string().min(1).optional(),
  delaySeconds: DelaySecondsSchema.optional(),
  timeoutMs: TimeoutMsSchema.optional(),
  userAgent: z.string().min(1).optional(),
  acceptLanguage: z.string().min(1).optional(),
});

/** Complete settings file schema */
export const ConfigFileSchema = z.object({
  catalog: z
    .object({
      path: z.string().min(1).optional(),
    })
    .optional(),
  download: DownloadSchema.optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved settings with all defaults applied */
export interface ResolvedConfig {
  catalogPath: string;
  outputDir: string;
  requestDelaySeconds: number;
  timeoutMs: number;
  userAgent: string;
  acceptLanguage: string;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML settings file from disk.
 * Returns undefined if the file doesn't exist.
 * Throws SETTINGS_INVALID if it exists but can't be used.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw settingsInvalid(path, [`cannot read file: ${(err as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw settingsInvalid(path, [`invalid YAML: ${(err as Error).message}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw settingsInvalid(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a settings file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.catalog?.path !== undefined) {
    target.catalogPath = source.catalog.path;
  }
  if (source.download?.outputDir !== undefined) {
    target.outputDir = source.download.outputDir;
  }
  if (source.download?.delaySeconds !== undefined) {
    target.requestDelaySeconds = source.download.delaySeconds;
  }
  if (source.download?.timeoutMs !== undefined) {
    target.timeoutMs = source.download.timeoutMs;
  }
  if (source.download?.userAgent !== undefined) {
    target.userAgent = source.download.userAgent;
  }
  if (source.download?.acceptLanguage !== undefined) {
    target.acceptLanguage = source.download.acceptLanguage;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Merge settings sources with proper precedence:
 * CLI args > settings file > defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  fileConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    catalogPath: CONFIG_DEFAULTS.catalogPath,
    outputDir: CONFIG_DEFAULTS.outputDir,
    requestDelaySeconds: CONFIG_DEFAULTS.requestDelaySeconds,
    timeoutMs: CONFIG_DEFAULTS.timeoutMs,
    userAgent: CONFIG_DEFAULTS.userAgent,
    acceptLanguage: CONFIG_DEFAULTS.acceptLanguage,
    logLevel: "info",
    logJson: false,
  };

  if (fileConfig) {
    applyConfigFile(config, fileConfig);
  }

  for (const [key, value] of Object.entries(cliOptions)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  return config;
}

/**
 * Load settings from the explicit path, or the user settings file.
 * A missing user settings file means defaults; a missing explicit one is an error.
 *
 * @param explicitPath - Optional path to a specific settings file
 * @returns The resolved settings and the files that were loaded
 */
export function loadConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  explicitPath?: string
): {
  config: ResolvedConfig;
  sources: string[];
} {
  if (explicitPath && !existsSync(explicitPath)) {
    throw settingsInvalid(explicitPath, ["file not found"]);
  }

  const path = explicitPath ?? USER_CONFIG_PATH;
  const fileConfig = loadConfigFile(path);
  const sources = fileConfig ? [path] : [];

  return { config: resolveConfig(cliOptions, fileConfig), sources };
}
