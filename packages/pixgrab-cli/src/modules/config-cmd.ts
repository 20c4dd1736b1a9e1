import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type ConfigShowJson } from "../lib/json-output.js";
import { isCLIError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# pixgrab configuration
# Place at ~/.config/pixgrab/config.yaml (user) or /etc/pixgrab/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/pixgrab/config.yaml)
# 3. System config (/etc/pixgrab/config.yaml)
# 4. Built-in defaults

# Network and validation limits
fetch:
  # Per-attempt timeout in seconds (1-300), also used as the idle
  # timeout between body chunks (--timeout)
  timeoutSeconds: 10

  # Total attempts for connection failures and timeouts (1-10) (--retries)
  maxAttempts: 3

  # Fixed pause between attempts (ms)
  retryDelayMs: 500

  # Largest image to accept, in MiB (1-1024) (--max-size)
  maxSizeMiB: 50

  # Content types that count as images
  allowedTypePrefixes:
    - "image/"

  # User-Agent header sent with every request
  # userAgent: "pixgrab/1.0.0"

# Where images are written (--output-dir)
output:
  dir: "Fetched_Images"

# Logging configuration (always written to stderr)
logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON log lines
  json: false
`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function describeError(error: unknown): string {
  if (isCLIError(error) && error.details) {
    return `${error.message}\n${error.details}`;
  }
  return (error as Error).message;
}

function printResolved(resolved: ResolvedConfig): void {
  console.log(chalk.bold("Fetch:"));
  console.log(`  timeoutSeconds: ${resolved.timeoutSeconds}`);
  console.log(`  maxAttempts:    ${resolved.maxAttempts}`);
  console.log(`  retryDelayMs:   ${resolved.retryDelayMs}`);
  console.log(`  maxSizeMiB:     ${resolved.maxSizeMiB}`);
  console.log(`  userAgent:      ${resolved.userAgent}`);

  console.log();
  console.log(chalk.bold("Allowed types:"));
  for (const prefix of resolved.allowedTypePrefixes) {
    console.log(`  - ${prefix}*`);
  }

  console.log();
  console.log(chalk.bold("Output:"));
  console.log(`  dir:            ${resolved.outputDir}`);

  console.log();
  console.log(chalk.bold("Logging:"));
  console.log(`  level:          ${resolved.logLevel}`);
  console.log(`  json:           ${resolved.logJson}`);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage pixgrab configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/pixgrab/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${(error as Error).message}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${describeError(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'pixgrab config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        if (isJsonMode()) {
          outputSuccess<ConfigShowJson>({ effective: { ...resolved }, sources });
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        printResolved(resolved);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${describeError(error)}`)
        );
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
