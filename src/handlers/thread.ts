/**
 * @module handlers/thread
 * @fileoverview Forum threads: posts, embedded images and attachments.
 *
 * ```
 *   {thread dir}/
 *     {post id}_{author}_{title}.html      post body
 *     {post id}_{media id}_{file name}     image uploaded to the site
 *     {post id}_{image src}                external image
 *     {post id}_{attachment name}          attachment
 * ```
 *
 * Long threads are paginated; the `>>` link queues the next page as another
 * thread unit writing into the same directory.
 */

import path from "node:path";
import type { CheerioAPI } from "cheerio";
import { logWriting, type SyncContext } from "../crawler/context.js";
import { parseLocator } from "../crawler/locator.js";
import type { Thread } from "../crawler/resource.js";
import { PageStructureError } from "../utils/errors.js";
import { createDir, fileEscape, writeFileData, writeStreamToFile } from "../utils/fs.js";

const IMAGE_SRC = /\.\/data\/produktiv\/mobs\/mm_(\d+)\/([^?]+).+/;

/* ────────────────────────────────────────────────────────────────────────────
 * Parser
 * ──────────────────────────────────────────────────────────────────────────── */

/** Something to download next to a post. */
export interface PostAsset {
  /** Escaped file name. */
  fileName: string;
  /** Address as found in the markup. */
  href: string;
}

export interface Post {
  id: string;
  /** Escaped `{id}_{author}_{title}.html`. */
  fileName: string;
  /** Complete HTML document wrapping the post body. */
  html: string;
  assets: PostAsset[];
}

export interface ThreadPage {
  posts: Post[];
  /** Href of the `>>` link, when this is not the last page. */
  nextPage: string | undefined;
  /** False when the page had a table but no pagination links in it. */
  paginationFound: boolean;
}

/**
 * Author as shown in the post header, `"Name | Login | date"`. Pseudonymous
 * forums show two parts, or `"Pseudonym"` in the second position.
 */
export function parseAuthor(header: string): string {
  const parts = header
    .trim()
    .split("|")
    .map((part) => part.trim());
  if (parts.length === 2) {
    return parts[0] ?? "";
  }
  if (parts.length === 3) {
    return (parts[1] === "Pseudonym" ? parts[0] : parts[1]) ?? "";
  }
  throw new PageStructureError(`author data in unknown format: ${header.trim()}`);
}

/**
 * Local name of an embedded image. Images uploaded to the site are named
 * after their media id and file name, anything else after its full src.
 */
export function imageFileName(postId: string, src: string): string {
  const match = IMAGE_SRC.exec(src);
  if (match !== null) {
    return fileEscape(`${postId}_${match[1]}_${match[2]}`);
  }
  return fileEscape(`${postId}_${src}`);
}

export function wrapHtml(body: string): string {
  return `<!DOCTYPE html>\n<html>\n<head>\n<meta charset="utf-8">\n</head>\n<body>\n${body}\n</body>\n</html>\n`;
}

function required<T>(value: T | undefined, message: string): T {
  if (value === undefined) {
    throw new PageStructureError(message);
  }
  return value;
}

/**
 * @throws {PageStructureError} When a post lacks its title, author, body, id,
 *   an image `src` or an attachment `href`.
 */
export function parseThreadPage($: CheerioAPI): ThreadPage {
  const posts: Post[] = [];

  for (const element of $(".ilFrmPostRow").toArray()) {
    const row = $(element);

    const title = row.find(".ilFrmPostTitle").first();
    if (title.length === 0) {
      throw new PageStructureError("post title not found");
    }
    const header = row.find("span.small").first();
    if (header.length === 0) {
      throw new PageStructureError("post author not found");
    }
    const author = parseAuthor(header.text());
    const container = row.find(".ilFrmPostContentContainer").first();
    if (container.length === 0) {
      throw new PageStructureError("post container not found");
    }
    const id = required(container.find("a").first().attr("id"), "no id in thread link");

    const assets: PostAsset[] = [];
    for (const image of container.find("img").toArray()) {
      const src = required($(image).attr("src"), "no src on image");
      assets.push({ fileName: imageFileName(id, src), href: src });
    }
    const attachments = container.find(".ilFrmPostAttachmentsContainer").first().find("a");
    for (const attachment of attachments.toArray()) {
      const href = required($(attachment).attr("href"), "attachment link without href");
      if (href.includes("cmd=deliverZipFile")) {
        // "download all" bundle of the attachments listed anyway
        continue;
      }
      assets.push({ fileName: fileEscape(`${id}_${$(attachment).text().trim()}`), href });
    }

    posts.push({
      id,
      fileName: fileEscape(`${id}_${author}_${title.text().trim()}.html`),
      html: wrapHtml(container.html() ?? ""),
      assets,
    });
  }

  let nextPage: string | undefined;
  let paginationFound = true;
  const table = $("table").first();
  if (table.length > 0) {
    const last = table.find("tbody tr td a").last();
    if (last.length === 0) {
      paginationFound = false;
    } else if (last.text().trim() === ">>") {
      nextPage = required(last.attr("href"), "page link not found");
    }
  }

  return { posts, nextPage, paginationFound };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Handler
 * ──────────────────────────────────────────────────────────────────────────── */

export async function syncThread(ctx: SyncContext, dir: string, resource: Thread): Promise<void> {
  if (!ctx.config.forum) {
    return;
  }
  await createDir(dir);

  const page = parseThreadPage(await ctx.client.getHtml(resource.locator.raw));

  if (page.nextPage !== undefined) {
    ctx.scheduler.submit({
      path: dir,
      resource: { type: "Thread", locator: parseLocator(page.nextPage, ctx.config.baseUrl) },
    });
  } else if (!page.paginationFound) {
    ctx.logger.warn(`unable to find pagination links in ${resource.locator.raw}`);
  }

  for (const post of page.posts) {
    const target = path.join(dir, post.fileName);
    logWriting(ctx, target);
    await writeFileData(target, post.html);
  }

  for (const post of page.posts) {
    for (const asset of post.assets) {
      const response = await ctx.client.download(asset.href);
      const target = path.join(dir, asset.fileName);
      logWriting(ctx, target);
      await writeStreamToFile(target, response);
    }
  }
}
