import { Command } from "commander";
import chalk from "chalk";
import { isNonInteractive } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { interactiveUnavailable } from "../lib/errors/catalog.js";
import { parseUrlList } from "../lib/input.js";
import {
  createFetchState,
  processBatch,
  summarize,
  type BatchSummary,
  type DownloadResult,
} from "../lib/pipeline.js";
import { formatResultLine, formatSummary } from "../lib/result-format.js";
import {
  prepareRun,
  type PreparedRun,
  type RunOptions,
  type RuntimeDeps,
} from "../lib/run-setup.js";
import type { PromptChoice, PromptService } from "../lib/ports/prompt.js";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";

// ---------------------------------------------------------------------------
// Menu
// ---------------------------------------------------------------------------

export type MenuAction = "single" | "batch" | "summary" | "quit";

export const MENU_CHOICES: PromptChoice<MenuAction>[] = [
  { title: "Fetch a single image", value: "single" },
  { title: "Fetch several images", value: "batch", description: "Comma or newline separated URLs" },
  { title: "Show session summary", value: "summary" },
  { title: "Quit", value: "quit" },
];

export interface InteractiveDeps extends RuntimeDeps {
  prompts?: PromptService;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerInteractiveCommand(program: Command, deps: InteractiveDeps = {}): void {
  program
    .command("interactive", { isDefault: true })
    .description("Fetch images from a menu (default command)")
    .option("-o, --output-dir <dir>", "Directory to save images in")
    .option("--timeout <seconds>", "Per-attempt network timeout")
    .option("--retries <n>", "Total attempts for network failures")
    .option("--max-size <MiB>", "Largest image to accept")
    .option("-c, --config <path>", "Use this config file instead of the default ones")
    .action(async (options: RunOptions) => {
      // An injected prompt service needs no terminal
      if (!deps.prompts && isNonInteractive()) {
        renderUnknownError(interactiveUnavailable());
        process.exitCode = 1;
        return;
      }
      await runInteractive(options, deps);
    });
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

async function askForUrls(prompts: PromptService, action: "single" | "batch"): Promise<string[] | undefined> {
  if (action === "single") {
    const answer = await prompts.text("Image URL");
    if (answer === undefined) return undefined;
    const url = answer.trim();
    return url ? [url] : [];
  }

  const answer = await prompts.text("Image URLs (separate with commas)");
  return answer === undefined ? undefined : parseUrlList(answer);
}

/**
 * Run the menu loop until the user quits or cancels. One FetchState spans
 * the whole session, so content fetched in an earlier round is still a
 * duplicate later.
 *
 * @returns Totals for everything processed in the session, or undefined
 *   when setup failed
 */
export async function runInteractive(
  options: RunOptions,
  deps: InteractiveDeps = {}
): Promise<BatchSummary | undefined> {
  let prepared: PreparedRun;
  try {
    prepared = prepareRun(options, deps);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
    return undefined;
  }

  const { settings, logger } = prepared;
  const prompts = deps.prompts ?? interactivePrompts;
  const state = createFetchState();
  const history: DownloadResult[] = [];
  const spinner = createSpinner();

  console.log(chalk.cyan(`Saving images to ${settings.outputDir}`));

  for (;;) {
    const action = await prompts.select("What would you like to do?", MENU_CHOICES);

    // Cancelling the menu ends the session like Quit
    if (action === undefined || action === "quit") break;

    if (action === "summary") {
      console.log(formatSummary(summarize(history)));
      continue;
    }

    const urls = await askForUrls(prompts, action);
    if (urls === undefined) continue;
    if (urls.length === 0) {
      console.log(chalk.yellow("No URL entered"));
      continue;
    }

    logger.debug("Menu round", { action, count: urls.length });
    const { results } = await processBatch(urls, settings, state, prepared.deps, {
      onStart: (url, index, total) => {
        spinner.start(total > 1 ? `[${index + 1}/${total}] ${url}` : url);
      },
      onResult: (result) => {
        spinner.stop();
        console.log(formatResultLine(result));
      },
    });
    history.push(...results);
  }

  const summary = summarize(history);
  console.log(formatSummary(summary));
  return summary;
}
