import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors.
 * Every failure the pipeline reports is built here so messages stay uniform.
 */

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatMiB(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(1);
}

// ============================================================================
// URL Errors
// ============================================================================

export function invalidUrl(raw: string, reason: string): CLIError {
  return new CLIError("INVALID_URL", `Invalid URL "${raw}": ${reason}`, {
    url: raw,
    suggestion: "Use a full web address such as https://example.com/cat.jpg",
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkError(url: string, attempts: number, lastError: unknown): CLIError {
  const plural = attempts === 1 ? "attempt" : "attempts";
  return new CLIError(
    "NETWORK_ERROR",
    `Network error after ${attempts} ${plural}: ${describeCause(lastError)}`,
    {
      url,
      suggestion: "Check your internet connection and that the host is reachable",
      cause: lastError,
    }
  );
}

export function httpError(url: string, status: number, statusText: string): CLIError {
  const text = statusText ? ` ${statusText}` : "";
  return new CLIError("HTTP_ERROR", `Server responded with HTTP ${status}${text}`, {
    url,
    status,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function unsupportedType(
  url: string,
  contentType: string | undefined,
  allowedPrefixes: readonly string[]
): CLIError {
  const received = contentType ? `"${contentType}"` : "no content type";
  return new CLIError("UNSUPPORTED_TYPE", `Not an image (${received})`, {
    url,
    details: `Accepted content types: ${allowedPrefixes.map((p) => `${p}*`).join(", ")}`,
  });
}

export function tooLarge(
  url: string,
  sizeBytes: number,
  limitBytes: number,
  declared: boolean
): CLIError {
  const size = declared
    ? `declares ${formatMiB(sizeBytes)}MB`
    : `exceeded ${formatMiB(limitBytes)}MB while downloading`;
  return new CLIError("TOO_LARGE", `Image is too large (${size})`, {
    url,
    suggestion: `Maximum size is ${formatMiB(limitBytes)}MB; raise it with --max-size`,
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function writeError(path: string, cause: unknown): CLIError {
  return new CLIError("WRITE_ERROR", `Could not write "${path}": ${describeCause(cause)}`, {
    suggestion: "Check free disk space and permissions on the output directory",
    cause,
  });
}

export function directoryError(dir: string, cause: unknown): CLIError {
  return new CLIError(
    "DIRECTORY_ERROR",
    `Cannot use output directory "${dir}": ${describeCause(cause)}`,
    {
      suggestion: "Pick another directory with --output-dir",
      cause,
    }
  );
}

// ============================================================================
// CLI Errors
// ============================================================================

export function missingUrls(): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", "No image URLs given", {
    suggestion: "Pass one or more URLs, or a file of URLs with --input",
    example: "pixgrab fetch https://example.com/cat.jpg",
  });
}

export function invalidOption(optionName: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`);
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details: issues.join("\n"),
  });
}

export function interactiveUnavailable(): CLIError {
  return new CLIError("INTERACTIVE_UNAVAILABLE", "Interactive mode needs a terminal", {
    suggestion: "Pass the URLs on the command line instead",
    example: "pixgrab fetch https://example.com/cat.jpg",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", describeCause(error), { cause: error });
}
