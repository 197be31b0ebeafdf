/**
 * @module handlers/exercise
 * @fileoverview Exercise pages: assignment files and feedback downloads.
 */

import path from "node:path";
import type { CheerioAPI } from "cheerio";
import type { SyncContext } from "../crawler/context.js";
import { parseLocator } from "../crawler/locator.js";
import type { ExerciseHandler, File } from "../crawler/resource.js";
import { PageStructureError } from "../utils/errors.js";
import { createDir, fileEscape } from "../utils/fs.js";

const DOWNLOAD_COMMANDS: ReadonlySet<string> = new Set([
  "downloadFile",
  "downloadGlobalFeedbackFile",
  "downloadFeedbackFile",
]);

export interface ExerciseDownload {
  /** Escaped, unique within the exercise. */
  fileName: string;
  resource: File;
}

/**
 * Pick a name not in `taken` by numbering the stem: `a.pdf`, `a2.pdf`,
 * `a3.pdf`. A name without an extension is numbered at the end. The result is
 * added to `taken`.
 */
export function uniqueFileName(fileName: string, taken: Set<string>): string {
  const dot = fileName.lastIndexOf(".");
  const stem = dot === -1 ? fileName : fileName.slice(0, dot);
  const extension = dot === -1 ? "" : fileName.slice(dot);

  let candidate = fileName;
  for (let i = 2; taken.has(candidate); i++) {
    candidate = `${stem}${i}${extension}`;
  }
  taken.add(candidate);
  return candidate;
}

/**
 * Every `.form-group` row whose first link is a download command becomes a
 * file named after the row's `.il_InfoScreenProperty`.
 *
 * @throws {PageStructureError} For a download row without a file name.
 * @throws {InvalidLocatorError} For a malformed link.
 */
export function parseExercisePage($: CheerioAPI, baseUrl: string): ExerciseDownload[] {
  const downloads: ExerciseDownload[] = [];
  const taken = new Set<string>();

  for (const element of $(".form-group").toArray()) {
    const row = $(element);
    const href = row.find("a").first().attr("href");
    if (href === undefined) {
      continue;
    }
    const locator = parseLocator(href, baseUrl);
    if (!DOWNLOAD_COMMANDS.has(locator.cmd ?? "")) {
      continue;
    }

    const label = row.find(".il_InfoScreenProperty").first();
    if (label.length === 0) {
      throw new PageStructureError(`link without file name: ${locator.raw}`);
    }
    const name = label.text().trim();
    downloads.push({
      fileName: uniqueFileName(fileEscape(name), taken),
      resource: { type: "File", name, locator },
    });
  }

  return downloads;
}

export async function syncExercise(
  ctx: SyncContext,
  dir: string,
  resource: ExerciseHandler,
): Promise<void> {
  await createDir(dir);
  const $ = await ctx.client.getHtml(resource.locator.raw);
  for (const download of parseExercisePage($, ctx.config.baseUrl)) {
    ctx.scheduler.submit({ path: path.join(dir, download.fileName), resource: download.resource });
  }
}
