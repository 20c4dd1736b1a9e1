import { z } from "zod";
import type { Clock, DelayFn, HttpClient } from "./ports/index.js";
import { createNodeFetchHttpClient, realDelay, systemClock } from "./adapters/index.js";
import { createLogger, type Logger } from "./logger.js";
import { isVerbose } from "./cli-context.js";
import { loadConfig, toFetchSettings, type ResolvedConfig } from "./config.js";
import { invalidOption } from "./errors/catalog.js";
import { ensureDirectory } from "./store.js";
import type { FetchSettings, PipelineDeps } from "./pipeline.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw flag values shared by `fetch` and `interactive` */
export interface RunOptions {
  outputDir?: string;
  timeout?: string;
  retries?: string;
  maxSize?: string;
  config?: string;
}

/** Collaborators a command may be handed instead of the real ones */
export interface RuntimeDeps {
  http?: HttpClient;
  delay?: DelayFn;
  clock?: Clock;
  /** Replaces the logger built from configuration */
  logger?: Logger;
}

export interface PreparedRun {
  config: ResolvedConfig;
  settings: FetchSettings;
  deps: PipelineDeps;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Option Parsing
// ---------------------------------------------------------------------------

interface NumericRange {
  min: number;
  max: number;
  integer: boolean;
}

const TIMEOUT_RANGE: NumericRange = { min: 1, max: 300, integer: false };
const RETRIES_RANGE: NumericRange = { min: 1, max: 10, integer: true };
const MAX_SIZE_RANGE: NumericRange = { min: 1, max: 1024, integer: false };

/**
 * Parse a numeric flag value, or return undefined when the flag is absent.
 *
 * @throws CLIError VALIDATION_INVALID_OPTION
 */
export function parseNumericOption(
  name: string,
  raw: string | undefined,
  range: NumericRange
): number | undefined {
  if (raw === undefined) return undefined;

  const base = range.integer ? z.number().int() : z.number();
  const schema = base.min(range.min).max(range.max);
  const result = schema.safeParse(raw.trim() === "" ? Number.NaN : Number(raw));

  if (!result.success) {
    const kind = range.integer ? "a whole number" : "a number";
    throw invalidOption(name, `"${raw}" is not ${kind} from ${range.min} to ${range.max}`);
  }
  return result.data;
}

/**
 * Turn flag values into config overrides. Absent flags stay undefined so
 * config files and defaults show through.
 */
export function toConfigOverrides(options: RunOptions): Partial<ResolvedConfig> {
  return {
    outputDir: options.outputDir,
    timeoutSeconds: parseNumericOption("timeout", options.timeout, TIMEOUT_RANGE),
    maxAttempts: parseNumericOption("retries", options.retries, RETRIES_RANGE),
    maxSizeMiB: parseNumericOption("max-size", options.maxSize, MAX_SIZE_RANGE),
  };
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Everything a command needs before the first URL: validated options,
 * merged configuration, a logger and an existing output directory.
 *
 * @throws CLIError for bad flags, a bad config file or an unusable directory
 */
export function prepareRun(options: RunOptions, runtime: RuntimeDeps = {}): PreparedRun {
  const overrides = toConfigOverrides(options);
  const { config, sources } = loadConfig(options.config, overrides);

  const logger =
    runtime.logger ??
    createLogger({
      level: isVerbose() ? "debug" : config.logLevel,
      json: config.logJson,
    });
  logger.debug("Configuration loaded", { sources });

  const settings = toFetchSettings(config);
  settings.outputDir = ensureDirectory(settings.outputDir);

  return {
    config,
    settings,
    logger,
    deps: {
      http: runtime.http ?? createNodeFetchHttpClient(),
      delay: runtime.delay ?? realDelay,
      clock: runtime.clock ?? systemClock,
      logger,
    },
  };
}
