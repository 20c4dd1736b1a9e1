import { readFile } from "fs/promises";

/**
 * Split user input into URLs. Newlines and commas both separate entries;
 * blank entries are dropped.
 */
export function parseUrlList(text: string): string[] {
  return text
    .split(/[\n,]/)
    .map((entry) => entry.trim())
    .filter(Boolean);
}

/**
 * Parse a URL list file: one or more URLs per line, "#" starts a comment line.
 */
export function parseUrlFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .filter((line) => !line.trim().startsWith("#"))
    .flatMap(parseUrlList);
}

async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Read URLs from a file, or from stdin when the path is "-".
 */
export async function readUrlInput(path: string): Promise<string[]> {
  const content = path === "-" ? await readStdin() : await readFile(path, "utf-8");
  return parseUrlFile(content);
}
