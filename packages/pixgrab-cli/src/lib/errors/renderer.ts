import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { isJsonMode } from "../cli-context.js";
import { outputError } from "../json-output.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Build the human-readable lines for an error.
 */
export function formatError(error: CLIError, width: number = Math.min(getTerminalWidth(), 80)): string[] {
  const output: string[] = [""];

  const errorLines = wrapText(error.message, width - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  // Details keep their own line breaks (one config issue per line)
  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, width - 4, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion || error.example) {
    output.push("");

    if (error.suggestion) {
      const suggestionLines = wrapText(error.suggestion, width - 4, "  ");
      output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0]}`);
      for (let i = 1; i < suggestionLines.length; i++) {
        output.push(`    ${suggestionLines[i]}`);
      }
    }

    if (error.example) {
      output.push("");
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
    }
  }

  output.push("");
  return output;
}

/**
 * Render an error to stderr, as JSON in JSON mode.
 */
export function renderError(error: CLIError): void {
  if (isJsonMode()) {
    outputError(error);
    return;
  }

  for (const line of formatError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown): void {
  if (isCLIError(error)) {
    renderError(error);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    renderError(new CLIError("UNKNOWN_ERROR", message, { cause: error }));
  }
}
