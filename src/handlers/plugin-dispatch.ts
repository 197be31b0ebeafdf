/**
 * @module handlers/plugin-dispatch
 * @fileoverview Opencast video series pages.
 *
 * The series table is loaded asynchronously in pages of 20. Its "show 800
 * rows" link leads to the full table once `cmd`, `cmdClass` and `cmdMode` are
 * rewritten to the asynchronous variant.
 */

import path from "node:path";
import * as cheerio from "cheerio";
import type { SyncContext } from "../crawler/context.js";
import { rawLocator } from "../crawler/locator.js";
import type { PluginDispatch } from "../crawler/resource.js";
import { PageStructureError } from "../utils/errors.js";
import { createDir, fileEscape } from "../utils/fs.js";

const NO_ENTRIES = "Keine Einträge";

/* ────────────────────────────────────────────────────────────────────────────
 * Parsers
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Address of the first page of a series table.
 */
export function videoListUrl(baseUrl: string, refId: string): string {
  return `${baseUrl}ilias.php?ref_id=${refId}&cmdClass=xocteventgui&cmdNode=nc:n4:14u&baseClass=ilObjPluginDispatchGUI&lang=de&limit=20&cmd=asyncGetTableGUI&cmdMode=asynch`;
}

/**
 * @throws {PageStructureError} If the page has no `trows=800` link.
 */
export function findFullListLink($: cheerio.CheerioAPI): string {
  const href = $("a[href]")
    .toArray()
    .map((element) => $(element).attr("href") ?? "")
    .find((value) => value.includes("trows=800"));
  if (href === undefined) {
    throw new PageStructureError("video list link not found");
  }
  return href;
}

/**
 * Turn the "show 800 rows" link into the address of the asynchronous full
 * table: `cmd` and `cmdClass` are replaced in place, `cmdMode=asynch` is
 * appended.
 */
export function rewriteFullListUrl(href: string, baseUrl: string): string {
  const url = new URL(href.startsWith(baseUrl) ? href : `${baseUrl}${href}`);
  const params = new URLSearchParams();
  for (const [key, value] of url.searchParams) {
    if (key === "cmd") {
      params.append(key, "asyncGetTableGUI");
    } else if (key === "cmdClass") {
      params.append(key, "xocteventgui");
    } else {
      params.append(key, value);
    }
  }
  params.append("cmdMode", "asynch");
  url.search = params.toString();
  return url.href;
}

export interface VideoRow {
  /** Third cell of the row, trimmed. */
  title: string;
  /** Player page. */
  href: string;
}

export interface VideoTable {
  videos: VideoRow[];
  /** Rows that had neither a player link nor the empty-table notice. */
  rowsWithoutLink: number;
}

/**
 * @throws {PageStructureError} For a player link without `href`.
 */
export function parseVideoTable($: cheerio.CheerioAPI): VideoTable {
  const videos: VideoRow[] = [];
  let rowsWithoutLink = 0;

  for (const element of $(".ilTableOuter > div > table > tbody > tr").toArray()) {
    const row = $(element);
    const link = row.find('a[target="_blank"]').first();
    if (link.length === 0) {
      if (!row.text().includes(NO_ENTRIES)) {
        rowsWithoutLink += 1;
      }
      continue;
    }

    const cell = row.find("td").eq(2);
    if (cell.length === 0) {
      continue;
    }
    const title = cell.text().trim();
    if (title.startsWith("<div")) {
      continue;
    }
    const href = link.attr("href");
    if (href === undefined) {
      throw new PageStructureError("video link without href");
    }
    videos.push({ title, href });
  }

  return { videos, rowsWithoutLink };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Handler
 * ──────────────────────────────────────────────────────────────────────────── */

export async function syncPluginDispatch(
  ctx: SyncContext,
  dir: string,
  resource: PluginDispatch,
): Promise<void> {
  if (ctx.config.noVideos) {
    return;
  }
  await createDir(dir);

  const listUrl = videoListUrl(ctx.config.baseUrl, resource.locator.ref_id);
  ctx.logger.info(`Loading ${listUrl}`);
  const fullList = findFullListLink(cheerio.load(await ctx.client.getText(listUrl)));

  ctx.logger.info(`Rewriting ${fullList}`);
  const fullUrl = rewriteFullListUrl(fullList, ctx.config.baseUrl);
  ctx.logger.info(`Loading ${fullUrl}`);
  const table = parseVideoTable(cheerio.load(await ctx.client.getText(fullUrl)));

  if (table.rowsWithoutLink > 0) {
    ctx.logger.warn(`${table.rowsWithoutLink} table row(s) without link in ${resource.locator.raw}`);
  }
  for (const video of table.videos) {
    ctx.logger.info(`Found video: ${video.title}`);
    ctx.scheduler.submit({
      path: path.join(dir, `${fileEscape(video.title)}.mp4`),
      resource: { type: "Video", locator: rawLocator(video.href) },
    });
  }
}
