#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { registerDownloadCommand } from "./modules/download.js";
import { registerListCommand } from "./modules/list.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("help-mirror")
    .description("Mirror in-app help pages listed in a YAML catalog to local HTML files")
    .version(readVersion())
    .option("--json", "Machine-readable output (NDJSON for downloads)")
    .option("-q, --quiet", "No spinners")
    .option("-y, --yes", "Skip the confirmation before a full download")
    .option("--no-input", "Never prompt");

  registerDownloadCommand(program);
  registerListCommand(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main();
