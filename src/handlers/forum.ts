/**
 * @module handlers/forum
 * @fileoverview Forum thread lists.
 *
 * The first page of a forum shows a handful of threads; its "show 800 rows"
 * link (`trows=800`) loads the full table. Each thread becomes a directory
 * named `{thr_pk}_{title}` holding one file per post, and is only queued again
 * when the table reports more posts than that directory holds.
 */

import path from "node:path";
import type { CheerioAPI } from "cheerio";
import { relativePath, type SyncContext } from "../crawler/context.js";
import { parseLocator } from "../crawler/locator.js";
import { linkName, type Forum, type Thread } from "../crawler/resource.js";
import { PageStructureError } from "../utils/errors.js";
import { countEntries, createDir, fileEscape } from "../utils/fs.js";

const NO_ENTRIES = "Keine Einträge";

/* ────────────────────────────────────────────────────────────────────────────
 * Parsers
 * ──────────────────────────────────────────────────────────────────────────── */

export type ThreadListLink = { kind: "link"; href: string } | { kind: "empty" };

/**
 * Find the link to the full thread table on a forum's first page.
 *
 * @throws {PageStructureError} If there is neither such a link nor an empty-forum notice.
 */
export function findThreadListLink($: CheerioAPI): ThreadListLink {
  const href = $("a[href]")
    .toArray()
    .map((element) => $(element).attr("href") ?? "")
    .find((value) => value.includes("trows=800"));
  if (href !== undefined) {
    return { kind: "link", href };
  }
  if ($("td").first().text().includes(NO_ENTRIES)) {
    return { kind: "empty" };
  }
  throw new PageStructureError("can't find forum thread count selector (empty forum?)");
}

export interface ThreadRow {
  /** `{thr_pk}_{title}`, unescaped. */
  name: string;
  resource: Thread;
  /** Posts in the thread according to the table. */
  postCount: number;
}

export interface ThreadTable {
  threads: ThreadRow[];
  /** Cell counts of rows that were not thread rows. */
  unusualRows: number[];
  /** The table is paginated; only the first page was read. */
  hasMorePages: boolean;
}

/**
 * Read the full thread table. Rows carrying headers or the thread count are
 * skipped; a thread row has exactly six cells.
 *
 * @throws {PageStructureError} For a thread row without link, `thr_pk` or post count.
 */
export function parseThreadTable($: CheerioAPI, baseUrl: string): ThreadTable {
  const threads: ThreadRow[] = [];
  const unusualRows: number[] = [];

  for (const element of $("tr").toArray()) {
    const row = $(element);
    if (row.attr("class") === "hidden-print" || row.find("th").length > 0) {
      continue;
    }
    const cells = row.find("td");
    if (cells.length !== 6) {
      unusualRows.push(cells.length);
      continue;
    }

    const link = cells.eq(1).find("a").first();
    const href = link.attr("href");
    if (href === undefined) {
      throw new PageStructureError("thread link not found");
    }
    const locator = parseLocator(href, baseUrl);
    if (locator.thr_pk === undefined) {
      throw new PageStructureError(`thr_pk not found for thread ${locator.raw}`);
    }

    const count = /^\d+/.exec(cells.eq(3).text().trim());
    if (count === null) {
      throw new PageStructureError(`parsing post count failed for thread ${locator.thr_pk}`);
    }

    threads.push({
      name: `${locator.thr_pk}_${linkName(link.text())}`,
      resource: { type: "Thread", locator },
      postCount: Number.parseInt(count[0], 10),
    });
  }

  return {
    threads,
    unusualRows,
    hasMorePages: $("div.ilTableNav > table > tbody > tr > td > a").length > 0,
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Handler
 * ──────────────────────────────────────────────────────────────────────────── */

export async function syncForum(ctx: SyncContext, dir: string, resource: Forum): Promise<void> {
  if (!ctx.config.forum) {
    return;
  }
  await createDir(dir);

  const listing = findThreadListLink(await ctx.client.getHtml(resource.locator.raw));
  if (listing.kind === "empty") {
    return;
  }
  const table = parseThreadTable(await ctx.client.getHtml(listing.href), ctx.config.baseUrl);

  for (const cells of table.unusualRows) {
    ctx.logger.warn(`unusual table row (${cells} cells) in ${resource.locator.raw}`);
  }

  for (const thread of table.threads) {
    const threadDir = path.join(dir, fileEscape(thread.name));
    const saved = await countEntries(threadDir);
    if (thread.postCount <= saved && !ctx.config.force) {
      continue;
    }
    ctx.logger.notice(`New posts in ${relativePath(ctx, threadDir)}..`);
    ctx.scheduler.submit({ path: threadDir, resource: thread.resource });
  }

  if (table.hasMorePages) {
    ctx.logger.notice(`Ignoring older threads in ${relativePath(ctx, dir)}..`);
  }
}
