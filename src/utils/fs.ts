/**
 * @module utils/fs
 * @fileoverview Local filesystem helpers used by the handlers.
 */

import { createWriteStream } from "node:fs";
import { access, mkdir, readdir, stat, writeFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

const INVALID_CHARS =
  process.platform === "win32" ? /[/\\:<>"|?*]/g : /[/\\]/g;

/**
 * Make a display name usable as a single path segment by replacing path
 * separators (and, on Windows, the other reserved characters) with `-`.
 *
 * @example
 * ```ts
 * fileEscape("Slides 1/2"); // "Slides 1-2"
 * ```
 */
export function fileEscape(name: string): string {
  return name.replace(INVALID_CHARS, "-");
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Create one directory. An existing directory is not an error; a missing
 * parent is.
 */
export async function createDir(dir: string): Promise<void> {
  try {
    await mkdir(dir);
  } catch (error) {
    if (!hasCode(error, "EEXIST")) {
      throw error;
    }
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size in bytes, or `undefined` if nothing exists at `target`.
 */
export async function fileSize(target: string): Promise<number | undefined> {
  try {
    return (await stat(target)).size;
  } catch (error) {
    if (hasCode(error, "ENOENT")) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Number of entries in a directory, 0 if it does not exist.
 */
export async function countEntries(dir: string): Promise<number> {
  try {
    return (await readdir(dir)).length;
  } catch (error) {
    if (hasCode(error, "ENOENT") || hasCode(error, "ENOTDIR")) {
      return 0;
    }
    throw error;
  }
}

/** Create or truncate `file` and write `data` to it. */
export async function writeFileData(file: string, data: string | Uint8Array): Promise<void> {
  await writeFile(file, data);
}

/**
 * Stream a response body to `file`. A response without a body produces an
 * empty file.
 */
export async function writeStreamToFile(file: string, response: Response): Promise<void> {
  if (response.body === null) {
    await writeFile(file, "");
    return;
  }
  await pipeline(Readable.fromWeb(response.body), createWriteStream(file));
}
