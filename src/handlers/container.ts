/**
 * @module handlers/container
 * @fileoverview Courses, folders and the personal desktop.
 *
 * All three render the same item list:
 *
 * ```
 *   div.il_ContainerListItem
 *     a.il_ContainerItemTitle        -> link + display name
 *     span.il_ItemProperty  [0]      -> file extension
 *     span.il_ItemProperty  [1]      -> size
 *     span.il_ItemProperty  [2]      -> "Version: 3" or a date
 * ```
 *
 * Every item is classified and submitted as a child unit. A folder whose
 * sessions are collapsed is reloaded through its expand link first.
 *
 * With `contentTree`, a course is listed from the repository explorer
 * instead, which also shows folders the course page hides:
 *
 * ```
 *   course page --cmdNode=uf:xx--> showRepTree fragment --> a[href] items
 *        |                                 |
 *        |                              failed
 *        v                                 v
 *   join button? -> skip     otherwise -> warn, use the course page
 * ```
 */

import path from "node:path";
import type { CheerioAPI } from "cheerio";
import { submitChild, logWriting, type SyncContext } from "../crawler/context.js";
import { parseLocator } from "../crawler/locator.js";
import {
  resourceFromLink,
  resourceName,
  type Course,
  type FileMetadataHint,
  type Folder,
  type PersonalDesktop,
  type Resource,
} from "../crawler/resource.js";
import { formatError, PageStructureError } from "../utils/errors.js";
import { createDir, fileEscape, writeFileData } from "../utils/fs.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Parser
 * ──────────────────────────────────────────────────────────────────────────── */

/** Shorter main texts are layout leftovers, not content. */
const MIN_MAIN_TEXT_LENGTH = 40;

const EXPAND_LINK = /expand=\d/;

/** A folder page is reloaded at most this many times to expand sessions. */
const MAX_EXPANSIONS = 16;

const CMD_NODE = /cmdNode=uf:\w\w/;

export interface ContainerItem {
  href: string | undefined;
  text: string;
  hint: FileMetadataHint | undefined;
}

export interface ContainerPage {
  items: ContainerItem[];
  /** Custom text shown above the item list, as HTML. */
  mainText: string | undefined;
  /** First link that expands a collapsed session. */
  expandLink: string | undefined;
}

/**
 * Extract the item list, the main text and the first session expand link of a
 * container page. Items without a title link are left out.
 */
export function parseContainerPage($: CheerioAPI): ContainerPage {
  const items: ContainerItem[] = [];
  $("div.il_ContainerListItem").each((_index, element) => {
    const item = $(element);
    const link = item.find("a.il_ContainerItemTitle").first();
    if (link.length === 0) {
      return;
    }
    const props = item.find("span.il_ItemProperty");
    items.push({
      href: link.attr("href"),
      text: link.text(),
      hint:
        props.length >= 3
          ? { extension: props.eq(0).text(), version: props.eq(2).text() }
          : undefined,
    });
  });

  let mainText: string | undefined;
  const center = $("#il_center_col").first();
  if (center.length > 0) {
    const startsWithBlock = center.children().first().hasClass("ilContainerBlock");
    const html = center.html() ?? "";
    if (!startsWithBlock && html.length > MIN_MAIN_TEXT_LENGTH) {
      mainText = html;
    }
  }

  const expandLink = $("a[href]")
    .toArray()
    .map((element) => $(element).attr("href") ?? "")
    .find((href) => EXPAND_LINK.test(href));

  return { items, mainText, expandLink };
}

/** The `cmdNode` value of the course GUI, e.g. `"uf:ab"`. */
export function findCmdNode(html: string): string | undefined {
  return CMD_NODE.exec(html)?.[0].slice("cmdNode=".length);
}

export function contentTreeUrl(baseUrl: string, refId: string, cmdNode: string): string {
  return (
    `${baseUrl}ilias.php?ref_id=${refId}&cmdClass=ilobjcoursegui&cmd=showRepTree` +
    `&cmdNode=${cmdNode}&baseClass=ilRepositoryGUI&cmdMode=asynch&exp_cmd=getNodeAsync` +
    `&node_id=exp_node_rep_exp_${refId}&exp_cont=il_expl2_jstree_cont_rep_exp&searchterm=`
  );
}

/**
 * Items of a content tree fragment. Entries without a link are courses the
 * user cannot open and are left out.
 */
export function parseContentTree($: CheerioAPI): ContainerItem[] {
  return $("a[href]")
    .toArray()
    .map((element) => ({
      href: $(element).attr("href"),
      text: $(element).text(),
      hint: undefined,
    }));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Handler
 * ──────────────────────────────────────────────────────────────────────────── */

function pageFileName(resource: Course | Folder | PersonalDesktop): string | undefined {
  switch (resource.type) {
    case "Course":
      return "course.html";
    case "Folder":
      return "folder.html";
    case "PersonalDesktop":
      return undefined;
  }
}

/**
 * List a course through its content tree. Resolves to `undefined` for a group
 * the user has not joined.
 */
async function loadCourseTree(ctx: SyncContext, course: Course): Promise<ContainerPage | undefined> {
  const $ = await ctx.client.getHtml(course.locator.raw);
  try {
    const cmdNode = findCmdNode($.html());
    if (cmdNode === undefined) {
      throw new PageStructureError(`can't find cmdNode on ${course.locator.raw}`);
    }
    const tree = await ctx.client.getHtml(
      contentTreeUrl(ctx.config.baseUrl, course.locator.ref_id, cmdNode),
    );
    return { items: parseContentTree(tree), mainText: undefined, expandLink: undefined };
  } catch (error) {
    if ($('input[name="cmd[join]"]').length > 0) {
      ctx.logger.info(`Skipping ${course.name}, not a member`);
      return undefined;
    }
    ctx.logger.warn(`${course.name}: falling back to incomplete course content extractor!`, error);
    return parseContainerPage($);
  }
}

async function loadPage(
  ctx: SyncContext,
  resource: Course | Folder | PersonalDesktop,
): Promise<ContainerPage | undefined> {
  if (resource.type === "Course" && ctx.config.contentTree) {
    return loadCourseTree(ctx, resource);
  }
  let page = parseContainerPage(await ctx.client.getHtml(resource.locator.raw));
  if (resource.type !== "Folder") {
    return page;
  }
  for (let expansions = 0; page.expandLink !== undefined; expansions++) {
    if (expansions >= MAX_EXPANSIONS) {
      ctx.logger.warn(`giving up expanding sessions of ${resource.locator.raw}`);
      break;
    }
    const next = parseLocator(page.expandLink, ctx.config.baseUrl);
    ctx.logger.debug(`Expanding ${next.raw}`);
    page = parseContainerPage(await ctx.client.getHtml(next.raw));
  }
  return page;
}

/**
 * Create the directory, optionally save the page text, then submit every item.
 */
export async function syncContainer(
  ctx: SyncContext,
  dir: string,
  resource: Course | Folder | PersonalDesktop,
): Promise<void> {
  await createDir(dir);
  const page = await loadPage(ctx, resource);
  if (page === undefined) {
    return;
  }

  const pageFile = pageFileName(resource);
  if (ctx.config.savePages && pageFile !== undefined && page.mainText !== undefined) {
    const target = path.join(dir, pageFile);
    logWriting(ctx, target);
    await writeFileData(target, page.mainText);
  }

  const names = new Set<string>();
  for (const item of page.items) {
    let child: Resource;
    try {
      child = resourceFromLink(item.href, item.text, ctx.config.baseUrl, item.hint);
    } catch (error) {
      ctx.logger.info(`Ignoring: ${formatError(error)}`);
      continue;
    }

    const name = resourceName(child);
    if (name !== undefined) {
      const escaped = fileEscape(name);
      if (names.has(escaped)) {
        ctx.logger.warn(`${dir} contains duplicated item "${escaped}"`);
      }
      names.add(escaped);
    }
    submitChild(ctx, dir, child);
  }
}
