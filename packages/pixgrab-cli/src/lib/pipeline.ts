import { basename } from "path";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import type { HttpClient } from "./ports/http.js";
import { systemClock } from "./adapters/system-clock.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { isCLIError, type ErrorCode } from "./errors/types.js";
import { unknownError } from "./errors/catalog.js";
import { normalizeUrl } from "./url.js";
import { downloadImage, type FetchSettings } from "./fetcher.js";
import { deriveFilename } from "./filename.js";
import { ensureDirectory, writeUnique } from "./store.js";

export type { FetchSettings } from "./fetcher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadRequest {
  /** Raw user input; a missing scheme is filled in */
  url: string;
  /** Overrides the settings' output directory for this URL */
  outputDir?: string;
}

export interface ResultError {
  code: ErrorCode;
  message: string;
}

export type DownloadResult =
  | { status: "saved"; url: string; filename: string; path: string; size: number; hash: string }
  | { status: "duplicate"; url: string; size: number; hash: string }
  | { status: "rejected"; url: string; error: ResultError }
  | { status: "failed"; url: string; error: ResultError };

/**
 * State shared by every URL of a session.
 * `seenHashes` holds a digest exactly when its file was written this run.
 */
export interface FetchState {
  readonly seenHashes: Set<string>;
  /** Sequence for synthesized filenames */
  nameCounter: number;
}

export interface PipelineDeps {
  http: HttpClient;
  clock?: Clock;
  delay?: DelayFn;
  logger?: Logger;
}

export interface BatchSummary {
  total: number;
  saved: number;
  duplicates: number;
  /** Rejected and failed URLs together */
  failed: number;
}

export interface BatchHooks {
  /** Called before each URL is processed */
  onStart?: (url: string, index: number, total: number) => void;
  /** Called with each result as soon as it is known */
  onResult?: (result: DownloadResult, index: number) => void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Codes that mean the URL or its content was refused, not that I/O broke */
const REJECTION_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "INVALID_URL",
  "UNSUPPORTED_TYPE",
  "TOO_LARGE",
]);

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export function createFetchState(): FetchState {
  return { seenHashes: new Set(), nameCounter: 0 };
}

function toResultError(error: unknown): ResultError {
  const cliError = isCLIError(error) ? error : unknownError(error);
  return { code: cliError.code, message: cliError.message };
}

/**
 * Run one URL through normalize → fetch → validate → hash → dedupe → store.
 * Per-URL failures come back as `rejected` or `failed` results; this never
 * throws for them.
 */
export async function processUrl(
  request: DownloadRequest | string,
  settings: FetchSettings,
  state: FetchState,
  deps: PipelineDeps
): Promise<DownloadResult> {
  const normalized: DownloadRequest = typeof request === "string" ? { url: request } : request;
  const { url: raw, outputDir = settings.outputDir } = normalized;
  const log = deps.logger ?? createNoopLogger();
  const clock = deps.clock ?? systemClock;

  let url = raw.trim();
  try {
    url = normalizeUrl(raw);
    const image = await downloadImage(url, settings, {
      http: deps.http,
      delay: deps.delay,
      logger: log,
    });

    if (state.seenHashes.has(image.hash)) {
      log.info("Duplicate content, skipping", { url, hash: image.hash });
      return { status: "duplicate", url, size: image.size, hash: image.hash };
    }

    const dir = ensureDirectory(outputDir);
    const filename = deriveFilename(url, image.mediaType, () => {
      state.nameCounter += 1;
      return `image_${clock.now()}_${state.nameCounter}`;
    });
    const path = await writeUnique(dir, filename, image.bytes, log);
    state.seenHashes.add(image.hash);

    log.info("Image saved", { url, path, size: image.size });
    return {
      status: "saved",
      url,
      filename: basename(path),
      path,
      size: image.size,
      hash: image.hash,
    };
  } catch (error) {
    const resultError = toResultError(error);
    log.info("Image not saved", { url, code: resultError.code, error: resultError.message });

    return REJECTION_CODES.has(resultError.code)
      ? { status: "rejected", url, error: resultError }
      : { status: "failed", url, error: resultError };
  }
}

/**
 * Count results by outcome.
 */
export function summarize(results: readonly DownloadResult[]): BatchSummary {
  const summary: BatchSummary = { total: results.length, saved: 0, duplicates: 0, failed: 0 };
  for (const result of results) {
    switch (result.status) {
      case "saved":
        summary.saved++;
        break;
      case "duplicate":
        summary.duplicates++;
        break;
      case "rejected":
      case "failed":
        summary.failed++;
        break;
    }
  }
  return summary;
}

/**
 * Process URLs strictly one after another, best effort: a failing URL is
 * reported and the batch moves on.
 */
export async function processBatch(
  urls: readonly string[],
  settings: FetchSettings,
  state: FetchState,
  deps: PipelineDeps,
  hooks: BatchHooks = {}
): Promise<{ results: DownloadResult[]; summary: BatchSummary }> {
  const results: DownloadResult[] = [];

  for (const [index, url] of urls.entries()) {
    hooks.onStart?.(url, index, urls.length);
    const result = await processUrl(url, settings, state, deps);
    results.push(result);
    hooks.onResult?.(result, index);
  }

  return { results, summary: summarize(results) };
}
