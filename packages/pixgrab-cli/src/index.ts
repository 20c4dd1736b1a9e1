#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerFetchCommand } from "./modules/fetch.js";
import { registerInteractiveCommand } from "./modules/interactive.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("pixgrab")
    .description("Download images from URLs, skipping duplicates")
    .version(readVersion())
    .option("--json", "Print machine-readable JSON")
    .option("-q, --quiet", "Hide spinners")
    .option("-v, --verbose", "Log debug details to stderr")
    .option("--no-input", "Never prompt; interactive mode is unavailable");

  registerFetchCommand(program);
  registerInteractiveCommand(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
