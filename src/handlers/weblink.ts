/**
 * @module handlers/weblink
 * @fileoverview Weblinks, saved as a file containing the target URL.
 *
 * A weblink pointing outside the site is one file. One that resolves back
 * into the site is a link list and becomes a directory with one such file per
 * `cmd=callLink` entry.
 */

import path from "node:path";
import type { CheerioAPI } from "cheerio";
import { logWriting, type SyncContext } from "../crawler/context.js";
import { parseLocator, type Locator } from "../crawler/locator.js";
import type { Weblink } from "../crawler/resource.js";
import { createDir, fileEscape, pathExists, writeFileData } from "../utils/fs.js";

export interface LinkListEntry {
  /** Link text, trimmed. */
  name: string;
  locator: Locator;
}

/**
 * Entries of a link list page.
 *
 * @throws {InvalidLocatorError} For a malformed link anywhere on the page.
 */
export function parseLinkList($: CheerioAPI, baseUrl: string): LinkListEntry[] {
  return $("a[href]")
    .toArray()
    .map((element) => {
      const link = $(element);
      return { name: link.text().trim(), locator: parseLocator(link.attr("href") ?? "", baseUrl) };
    })
    .filter((entry) => entry.locator.cmd === "callLink");
}

/**
 * Where a HEAD request ended up after redirects. Transports that do not report
 * a final URL leave `Response.url` empty; the requested URL stands in then.
 */
async function finalUrl(ctx: SyncContext, url: string): Promise<string> {
  const response = await ctx.client.head(url);
  return response.url === "" ? ctx.client.resolve(url) : response.url;
}

export async function syncWeblink(ctx: SyncContext, target: string, resource: Weblink): Promise<void> {
  const exists = await pathExists(target);
  if (!ctx.config.force && exists) {
    ctx.logger.debug("Skipping download, link exists already");
    return;
  }

  const url = await finalUrl(ctx, resource.locator.raw);
  if (!url.startsWith(ctx.config.baseUrl)) {
    logWriting(ctx, target);
    await writeFileData(target, url);
    return;
  }

  if (!exists) {
    await createDir(target);
    logWriting(ctx, target);
  }
  const entries = parseLinkList(await ctx.client.getHtml(url), ctx.config.baseUrl);
  for (const entry of entries) {
    let resolved: string;
    try {
      resolved = await finalUrl(ctx, entry.locator.raw);
    } catch (error) {
      ctx.logger.warn(`HEAD request to web link failed:`, error);
      continue;
    }
    await writeFileData(path.join(target, fileEscape(entry.name)), resolved);
  }
}
