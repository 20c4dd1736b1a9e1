import { HttpTimeoutError, type HttpClient } from "./ports/http.js";
import type { DelayFn } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import { httpError, networkError } from "./errors/catalog.js";
import { isCLIError } from "./errors/types.js";
import { checkContentType, checkDeclaredLength } from "./validator.js";
import { readImageBody } from "./content-hash.js";
import { RetryExhaustedError, withRetry } from "./retry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Fixed settings the pipeline runs with */
export interface FetchSettings {
  /** Connect/read deadline per attempt */
  timeoutMs: number;
  /** Total attempts for transient network failures */
  maxAttempts: number;
  /** Pause between attempts */
  retryDelayMs: number;
  /** Size ceiling, enforced on the declared length and while streaming */
  maxBytes: number;
  /** Accepted Content-Type prefixes, e.g. "image/" */
  allowedTypePrefixes: readonly string[];
  /** Destination directory */
  outputDir: string;
  userAgent: string;
}

export interface FetcherDeps {
  http: HttpClient;
  delay?: DelayFn;
  logger?: Logger;
}

/** A fully downloaded, validated and hashed image */
export interface DownloadedImage {
  url: string;
  mediaType: string;
  bytes: Buffer;
  size: number;
  hash: string;
}

// ---------------------------------------------------------------------------
// Retry classification
// ---------------------------------------------------------------------------

/** System error codes for failures that may clear up on another attempt */
const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENETDOWN",
  "EPIPE",
  "ERR_STREAM_PREMATURE_CLOSE",
]);

/**
 * True for transport failures worth another attempt: timeouts, refused or
 * reset connections and DNS lookups. Redirect loops, TLS failures and
 * programming errors are not.
 */
export function isTransientNetworkError(error: unknown): boolean {
  if (error instanceof HttpTimeoutError) return true;
  if (!(error instanceof Error)) return false;

  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && TRANSIENT_ERROR_CODES.has(code)) return true;

  return error.cause !== undefined && isTransientNetworkError(error.cause);
}

// ---------------------------------------------------------------------------
// Download
// ---------------------------------------------------------------------------

async function attemptDownload(
  url: string,
  settings: FetchSettings,
  http: HttpClient
): Promise<DownloadedImage> {
  const response = await http.get(url, {
    timeoutMs: settings.timeoutMs,
    headers: {
      "User-Agent": settings.userAgent,
      Accept: "image/*,*/*;q=0.8",
    },
  });

  let mediaType: string;
  try {
    if (response.status < 200 || response.status > 299) {
      throw httpError(url, response.status, response.statusText);
    }
    mediaType = checkContentType(url, response.header("content-type"), settings.allowedTypePrefixes);
    checkDeclaredLength(url, response.header("content-length"), settings.maxBytes);
  } catch (error) {
    response.cancel();
    throw error;
  }

  const body = await readImageBody(response.body, { url, maxBytes: settings.maxBytes });
  return { url, mediaType, ...body };
}

/**
 * GET an image, validate it and hash it while streaming.
 *
 * Transient transport failures (refused, reset, DNS, timeout) are retried
 * under the settings' fixed policy. Any other transport failure, HTTP status
 * or validation failure is final.
 *
 * @throws CLIError NETWORK_ERROR, HTTP_ERROR, UNSUPPORTED_TYPE or TOO_LARGE
 */
export async function downloadImage(
  url: string,
  settings: FetchSettings,
  deps: FetcherDeps
): Promise<DownloadedImage> {
  const log = deps.logger ?? createNoopLogger();

  try {
    return await withRetry(
      (attempt) => {
        log.debug("Requesting image", { url, attempt });
        return attemptDownload(url, settings, deps.http);
      },
      {
        policy: { maxAttempts: settings.maxAttempts, delayMs: settings.retryDelayMs },
        isRetryable: isTransientNetworkError,
        onRetry: (attempt, error) =>
          log.warn("Transient network failure, retrying", {
            url,
            attempt,
            maxAttempts: settings.maxAttempts,
            error: error instanceof Error ? error.message : String(error),
          }),
        delay: deps.delay,
      }
    );
  } catch (error) {
    if (error instanceof RetryExhaustedError) {
      throw networkError(url, error.attempts, error.lastError);
    }
    if (isCLIError(error)) {
      throw error;
    }
    // Non-transient transport failure: final after one attempt
    throw networkError(url, 1, error);
  }
}
