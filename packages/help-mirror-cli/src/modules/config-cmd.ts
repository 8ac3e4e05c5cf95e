import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { loadConfig, USER_CONFIG_PATH } from "../lib/config.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# help-mirror settings
# Place at ~/.config/help-mirror/config.yaml or pass --settings <path>
#
# Precedence (highest to lowest):
# 1. CLI flags
# 2. This file
# 3. Built-in defaults

catalog:
  # Help content catalog (YAML)
  path: gakumasu-diff/orig/HelpContent.yaml

download:
  # One <id>.html per page lands here
  outputDir: downloaded_help_pages

  # Pause after each request, in seconds (0-3600)
  delaySeconds: 1.0

  # Per-request timeout in milliseconds (1-600000)
  timeoutMs: 30000

  # Request headers
  # userAgent: "Mozilla/5.0 ..."
  acceptLanguage: "ja-JP,ja;q=0.9,en;q=0.8"

logging:
  # debug, info, warn, error
  level: info

  # JSON log lines on stderr
  json: false
`;

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

/**
 * Write the example settings file. Returns false if one already exists.
 */
export function initConfig(targetPath: string = USER_CONFIG_PATH): boolean {
  if (existsSync(targetPath)) {
    console.error(chalk.yellow(`Settings file already exists: ${targetPath}`));
    console.error(chalk.gray("Edit it in place, or delete it first."));
    return false;
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
  console.log(chalk.green(`Created settings file: ${targetPath}`));
  return true;
}

export function showConfig(settingsPath?: string): void {
  const { config, sources } = loadConfig({}, settingsPath);

  if (isJsonMode()) {
    const result: ConfigShowJson = {
      effective: { ...config },
      sources,
      settingsPath: settingsPath ?? USER_CONFIG_PATH,
    };
    outputSuccess(result);
    return;
  }

  console.log(chalk.cyan("Effective settings:"));
  console.log(chalk.gray("─".repeat(40)));
  console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));

  console.log();
  console.log(chalk.bold("Catalog:"));
  console.log(`  path:           ${config.catalogPath}`);

  console.log();
  console.log(chalk.bold("Download:"));
  console.log(`  outputDir:      ${config.outputDir}`);
  console.log(`  delaySeconds:   ${config.requestDelaySeconds}`);
  console.log(`  timeoutMs:      ${config.timeoutMs}`);
  console.log(`  userAgent:      ${config.userAgent}`);
  console.log(`  acceptLanguage: ${config.acceptLanguage}`);

  console.log();
  console.log(chalk.bold("Logging:"));
  console.log(`  level:          ${config.logLevel}`);
  console.log(`  json:           ${config.logJson}`);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage help-mirror settings");

  config
    .command("init")
    .description("Create an example settings file")
    .option("--path <path>", "Where to write it", USER_CONFIG_PATH)
    .action((options: { path: string }) => {
      try {
        if (!initConfig(options.path)) process.exitCode = 1;
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  config
    .command("show")
    .description("Display the effective settings")
    .option("--settings <path>", "Specific settings file to use")
    .action((options: { settings?: string }) => {
      try {
        showConfig(options.settings);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
