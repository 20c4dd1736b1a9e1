/**
 * Content hashing for duplicate detection.
 * Hashing, size enforcement and buffering happen in one pass over the body.
 */

import { createHash } from "crypto";
import { tooLarge } from "./errors/catalog.js";

export const HASH_ALGORITHM = "sha256";

/** Hash prefix length used when showing a hash to people */
const SHORT_HASH_LENGTH = 12;

export interface ImageBody {
  bytes: Buffer;
  size: number;
  /** Hex SHA-256 digest of exactly `bytes` */
  hash: string;
}

/**
 * Compute the hex SHA-256 digest of a buffer.
 */
export function computeContentHash(bytes: Uint8Array): string {
  return createHash(HASH_ALGORITHM).update(bytes).digest("hex");
}

/**
 * Abbreviate a digest for display.
 */
export function shortHash(hash: string): string {
  return hash.slice(0, SHORT_HASH_LENGTH);
}

/**
 * Consume a streamed body, hashing and counting each chunk as it arrives.
 * Stops reading as soon as the running total passes `maxBytes`; leaving the
 * loop early lets the source release its connection.
 *
 * @throws CLIError TOO_LARGE
 */
export async function readImageBody(
  chunks: AsyncIterable<Uint8Array>,
  options: { url: string; maxBytes: number }
): Promise<ImageBody> {
  const hash = createHash(HASH_ALGORITHM);
  const parts: Uint8Array[] = [];
  let size = 0;

  for await (const chunk of chunks) {
    size += chunk.byteLength;
    if (size > options.maxBytes) {
      throw tooLarge(options.url, size, options.maxBytes, false);
    }
    hash.update(chunk);
    parts.push(chunk);
  }

  return {
    bytes: Buffer.concat(parts, size),
    size,
    hash: hash.digest("hex"),
  };
}
