/**
 * @module handlers/file
 * @fileoverview Direct file downloads.
 */

import { logWriting, type SyncContext } from "../crawler/context.js";
import type { File } from "../crawler/resource.js";
import { pathExists, writeStreamToFile } from "../utils/fs.js";

/**
 * Download `resource` to `target` unless files are skipped or it is already
 * there (and `force` is off).
 */
export async function syncFile(ctx: SyncContext, target: string, resource: File): Promise<void> {
  if (ctx.config.skipFiles) {
    return;
  }
  if (!ctx.config.force && (await pathExists(target))) {
    ctx.logger.debug("Skipping download, file exists already");
    return;
  }

  const response = await ctx.client.download(resource.locator.raw);
  logWriting(ctx, target);
  await writeStreamToFile(target, response);
}
