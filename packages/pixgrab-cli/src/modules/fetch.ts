import { Command } from "commander";
import { isJsonMode } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { outputSuccess, type FetchResultJson } from "../lib/json-output.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { invalidOption, missingUrls } from "../lib/errors/catalog.js";
import { parseUrlList, readUrlInput } from "../lib/input.js";
import { createFetchState, processBatch } from "../lib/pipeline.js";
import { formatResultLine, formatSummary } from "../lib/result-format.js";
import {
  prepareRun,
  type PreparedRun,
  type RunOptions,
  type RuntimeDeps,
} from "../lib/run-setup.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchOptions extends RunOptions {
  input?: string;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerFetchCommand(program: Command, runtime: RuntimeDeps = {}): void {
  program
    .command("fetch")
    .description("Download images from one or more URLs")
    .argument("[urls...]", "Image URLs; each may be a comma-separated list")
    .option("-i, --input <file>", "Read URLs from a file, one per line (- for stdin)")
    .option("-o, --output-dir <dir>", "Directory to save images in")
    .option("--timeout <seconds>", "Per-attempt network timeout")
    .option("--retries <n>", "Total attempts for network failures")
    .option("--max-size <MiB>", "Largest image to accept")
    .option("-c, --config <path>", "Use this config file instead of the default ones")
    .action(async (urls: string[], options: FetchOptions) => {
      await runFetch(urls, options, runtime);
    });
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

/**
 * Gather URLs from arguments and the --input file, in that order.
 *
 * @throws CLIError when the input file cannot be read or nothing was given
 */
export async function collectUrls(args: readonly string[], input?: string): Promise<string[]> {
  const urls = args.flatMap(parseUrlList);

  if (input) {
    try {
      urls.push(...(await readUrlInput(input)));
    } catch (error) {
      throw invalidOption("input", `cannot read ${input}: ${(error as Error).message}`);
    }
  }

  if (urls.length === 0) {
    throw missingUrls();
  }
  return urls;
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * Fetch every URL once, in order. Per-URL failures are reported and do
 * not change the exit code; setup failures set it to 1.
 */
export async function runFetch(
  args: string[],
  options: FetchOptions,
  runtime: RuntimeDeps = {}
): Promise<FetchResultJson | undefined> {
  let urls: string[];
  let prepared: PreparedRun;
  try {
    urls = await collectUrls(args, options.input);
    prepared = prepareRun(options, runtime);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
    return undefined;
  }

  const { settings, deps, logger } = prepared;
  const json = isJsonMode();
  const spinner = createSpinner();

  logger.debug("Starting batch", { count: urls.length, outputDir: settings.outputDir });

  const { results, summary } = await processBatch(urls, settings, createFetchState(), deps, {
    onStart: (url, index, total) => {
      spinner.start(`[${index + 1}/${total}] ${url}`);
    },
    onResult: (result) => {
      spinner.stop();
      if (!json) console.log(formatResultLine(result));
    },
  });

  if (json) {
    outputSuccess<FetchResultJson>({ results, summary });
  } else {
    console.log(formatSummary(summary));
  }

  return { results, summary };
}
