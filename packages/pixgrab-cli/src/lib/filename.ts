import { extname } from "path";

/** Extensions accepted as-is from the URL path */
export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".webp",
  ".bmp",
  ".svg",
  ".tif",
  ".tiff",
  ".ico",
  ".avif",
]);

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/pjpeg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/bmp": ".bmp",
  "image/svg+xml": ".svg",
  "image/tiff": ".tiff",
  "image/x-icon": ".ico",
  "image/vnd.microsoft.icon": ".ico",
  "image/avif": ".avif",
};

/** Extension for image subtypes without a known mapping */
export const FALLBACK_EXTENSION = ".img";

/**
 * Longest filename we produce, in UTF-8 bytes with the extension. Leaves
 * room under the usual 255-byte limit for a `_N` collision suffix.
 */
export const MAX_FILENAME_BYTES = 200;

// Separators, reserved characters on common filesystems, control characters
// eslint-disable-next-line no-control-regex
const UNSAFE_CHARACTERS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

/**
 * Map a media type to a file extension.
 */
export function extensionForContentType(mediaType: string): string {
  return CONTENT_TYPE_EXTENSIONS[mediaType.toLowerCase()] ?? FALLBACK_EXTENSION;
}

function utf8Length(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

// Cut at code point boundaries so a surrogate pair is never split
function truncateUtf8(text: string, maxBytes: number): string {
  let kept = "";
  let used = 0;
  for (const char of text) {
    const size = utf8Length(char);
    if (used + size > maxBytes) break;
    kept += char;
    used += size;
  }
  return kept;
}

/**
 * Make a name safe to join onto the output directory: no separators, no
 * reserved or control characters, no leading dots, at most
 * MAX_FILENAME_BYTES of UTF-8.
 * May return an empty string.
 */
export function sanitizeFilename(name: string): string {
  let safe = name.replace(UNSAFE_CHARACTERS, "_").trim().replace(/^\.+/, "");

  if (utf8Length(safe) > MAX_FILENAME_BYTES) {
    const ext = extname(safe);
    const keep = utf8Length(ext) < MAX_FILENAME_BYTES / 2 ? ext : "";
    const stem = safe.slice(0, safe.length - keep.length);
    safe = truncateUtf8(stem, MAX_FILENAME_BYTES - utf8Length(keep)) + keep;
  }

  return safe;
}

function lastPathSegment(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return "";
  }

  const segment = pathname.split("/").pop() ?? "";
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escapes: keep the raw segment
    return segment;
  }
}

/**
 * Pick the filename for a downloaded image.
 *
 * The URL's last path segment wins when it carries a known image extension;
 * otherwise the name is `fallbackStem()` plus an extension inferred from the
 * media type.
 */
export function deriveFilename(
  url: string,
  mediaType: string,
  fallbackStem: () => string
): string {
  const fromUrl = sanitizeFilename(lastPathSegment(url));
  const ext = extname(fromUrl).toLowerCase();

  if (IMAGE_EXTENSIONS.has(ext) && fromUrl.length > ext.length) {
    return fromUrl;
  }

  return `${sanitizeFilename(fallbackStem())}${extensionForContentType(mediaType)}`;
}
