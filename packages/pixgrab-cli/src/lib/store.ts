import { existsSync, mkdirSync, statSync, constants } from "fs";
import { copyFile, link, unlink, writeFile } from "fs/promises";
import { randomUUID } from "crypto";
import { basename, extname, join, resolve } from "path";
import { directoryError, writeError } from "./errors/catalog.js";
import { isCLIError } from "./errors/types.js";
import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Give up disambiguating after this many taken names */
const MAX_NAME_ATTEMPTS = 10_000;

/** Filesystems without hard links report one of these from link() */
const LINK_UNSUPPORTED = new Set(["EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS", "EXDEV"]);

// ---------------------------------------------------------------------------
// Directory
// ---------------------------------------------------------------------------

/**
 * Create the output directory (and parents) if needed.
 * Returns the resolved absolute path.
 *
 * @throws CLIError DIRECTORY_ERROR
 */
export function ensureDirectory(dir: string): string {
  const resolved = resolve(dir);

  try {
    if (!existsSync(resolved)) {
      mkdirSync(resolved, { recursive: true });
    }
    if (!statSync(resolved).isDirectory()) {
      throw new Error("not a directory");
    }
  } catch (error) {
    throw directoryError(resolved, error);
  }

  return resolved;
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

/**
 * Name to try on the given collision count: "image.jpg", "image_1.jpg", ...
 */
export function candidateName(filename: string, attempt: number): string {
  if (attempt === 0) return filename;
  const ext = extname(filename);
  return `${basename(filename, ext)}_${attempt}${ext}`;
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error ? (error as NodeJS.ErrnoException).code : undefined;
}

/**
 * Publish a finished temp file under `target` without ever replacing an
 * existing file. Returns false when the name is taken.
 */
async function publish(tempPath: string, target: string, logger?: Logger): Promise<boolean> {
  try {
    await link(tempPath, target);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === "EEXIST") return false;
    if (!code || !LINK_UNSUPPORTED.has(code)) throw error;

    logger?.debug("Hard links unavailable, using exclusive copy", { target, code });
  }

  try {
    await copyFile(tempPath, target, constants.COPYFILE_EXCL);
    return true;
  } catch (error) {
    if (errorCode(error) === "EEXIST") return false;
    throw error;
  }
}

/**
 * Write bytes under `dir` using `filename`, or `<stem>_<n><ext>` when that
 * name is taken. Existing files are never overwritten.
 *
 * The bytes land in a temporary file first and are then linked into place,
 * so the final name only ever refers to a complete file.
 *
 * @returns Absolute path of the written file
 * @throws CLIError WRITE_ERROR
 */
export async function writeUnique(
  dir: string,
  filename: string,
  bytes: Uint8Array,
  logger?: Logger
): Promise<string> {
  const tempPath = join(dir, `.pixgrab-${randomUUID()}.tmp`);
  let target = join(dir, filename);

  try {
    await writeFile(tempPath, bytes, { flag: "wx" });

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      target = join(dir, candidateName(filename, attempt));
      if (await publish(tempPath, target, logger)) {
        if (attempt > 0) {
          logger?.debug("Name taken, stored under a suffixed name", { filename, target });
        }
        return target;
      }
    }

    throw writeError(join(dir, filename), new Error("too many files with this name"));
  } catch (error) {
    if (isCLIError(error)) throw error;
    throw writeError(target, error);
  } finally {
    await unlink(tempPath).catch((error: unknown) => {
      if (errorCode(error) !== "ENOENT") {
        logger?.warn("Could not remove temporary file", {
          path: tempPath,
          error: (error as Error).message,
        });
      }
    });
  }
}
