import { invalidUrl } from "./errors/catalog.js";

/** Scheme prepended to URLs typed without one */
export const DEFAULT_SCHEME = "https://";

const HTTP_SCHEME = /^https?:\/\//i;
const ANY_SCHEME = /^([a-z][a-z0-9+.-]*):/i;
/** "localhost:8080/x.png" looks like a scheme but is a host and port */
const HOST_WITH_PORT = /^[a-z0-9.-]+:\d+(?:[/?#]|$)/i;

/**
 * Normalize user input into an absolute http(s) URL.
 *
 * Input without a scheme gets {@link DEFAULT_SCHEME}; protocol-relative
 * input ("//host/path") gets "https:". Any other scheme is refused.
 *
 * @throws CLIError INVALID_URL when the input is empty or has no usable host
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw invalidUrl(raw, "URL is empty");
  }

  let candidate: string;
  if (HTTP_SCHEME.test(trimmed)) {
    candidate = trimmed;
  } else if (trimmed.startsWith("//")) {
    candidate = `https:${trimmed}`;
  } else {
    const scheme = ANY_SCHEME.exec(trimmed);
    if (scheme && !HOST_WITH_PORT.test(trimmed)) {
      throw invalidUrl(raw, `unsupported scheme "${scheme[1].toLowerCase()}:"`);
    }
    candidate = `${DEFAULT_SCHEME}${trimmed}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw invalidUrl(raw, "not a valid web address");
  }

  if (!parsed.hostname) {
    throw invalidUrl(raw, "missing host");
  }

  return parsed.href;
}
