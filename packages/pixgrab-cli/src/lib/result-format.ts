import chalk from "chalk";
import { shortHash } from "./content-hash.js";
import type { BatchSummary, DownloadResult } from "./pipeline.js";

/**
 * One human-readable line per processed URL.
 */
export function formatResultLine(result: DownloadResult): string {
  switch (result.status) {
    case "saved":
      return chalk.green(`Saved as ${result.filename} (${result.size} bytes)`);
    case "duplicate":
      return chalk.yellow(`Skipped: duplicate of ${shortHash(result.hash)}`);
    case "rejected":
    case "failed":
      return chalk.red(`Error: ${result.url}: ${result.error.message}`);
  }
}

export function formatSummary(summary: BatchSummary): string {
  const noun = summary.total === 1 ? "URL" : "URLs";
  return chalk.bold(
    `Done: ${summary.saved} saved, ${summary.duplicates} skipped, ${summary.failed} failed (${summary.total} ${noun})`
  );
}
