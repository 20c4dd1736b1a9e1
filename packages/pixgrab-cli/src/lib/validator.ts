import { tooLarge, unsupportedType } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Content Type
// ---------------------------------------------------------------------------

/**
 * Extract the lowercased media type from a Content-Type header value,
 * dropping parameters such as "; charset=utf-8".
 */
export function parseMediaType(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  return mediaType || undefined;
}

/**
 * Check a Content-Type header against the allowed prefixes.
 * Returns the normalized media type.
 *
 * @throws CLIError UNSUPPORTED_TYPE when the header is missing or not allowed
 */
export function checkContentType(
  url: string,
  contentType: string | undefined,
  allowedPrefixes: readonly string[]
): string {
  const mediaType = parseMediaType(contentType);
  const allowed =
    mediaType !== undefined &&
    allowedPrefixes.some((prefix) => mediaType.startsWith(prefix.toLowerCase()));

  if (!allowed || mediaType === undefined) {
    throw unsupportedType(url, mediaType ?? contentType, allowedPrefixes);
  }
  return mediaType;
}

// ---------------------------------------------------------------------------
// Size
// ---------------------------------------------------------------------------

/**
 * Parse a Content-Length header. Malformed values count as undeclared.
 */
export function parseContentLength(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return undefined;
  const length = Number(value);
  return Number.isSafeInteger(length) ? length : undefined;
}

/**
 * Reject a response whose declared length is over the ceiling before any
 * body byte is read. Returns the declared length, if any.
 *
 * @throws CLIError TOO_LARGE
 */
export function checkDeclaredLength(
  url: string,
  contentLength: string | undefined,
  maxBytes: number
): number | undefined {
  const declared = parseContentLength(contentLength);
  if (declared !== undefined && declared > maxBytes) {
    throw tooLarge(url, declared, maxBytes, true);
  }
  return declared;
}
