/**
 * @module handlers/video
 * @fileoverview Opencast videos.
 *
 * The player page embeds its configuration as the first argument of
 * `xoctPaellaPlayer.init(...)`. A video with one stream is saved as the
 * `.mp4` itself; a video with several streams (e.g. camera and slides) as a
 * directory of the same name holding `Stream1.mp4`, `Stream2.mp4`, ...
 */

import path from "node:path";
import { z } from "zod";
import { logWriting, relativePath, type SyncContext } from "../crawler/context.js";
import type { Video } from "../crawler/resource.js";
import { PageStructureError } from "../utils/errors.js";
import { createDir, fileSize, pathExists, writeStreamToFile } from "../utils/fs.js";

const PLAYER_INIT = /<script>\s+xoctPaellaPlayer\.init\(([\s\S]+)\)\s+<\/script>/m;

const PlayerConfigSchema = z.object({
  streams: z
    .array(
      z.object({
        sources: z.object({
          mp4: z.array(z.object({ src: z.string().min(1) })).nonempty(),
        }),
      }),
    )
    .nonempty(),
});

export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;

/**
 * Extract the mp4 source of every stream from a player page.
 *
 * @throws {PageStructureError} If the configuration is missing, not JSON, or
 *   lacks a stream source.
 */
export function parseVideoSources(html: string): string[] {
  const match = PLAYER_INIT.exec(html);
  const args = match?.[1];
  if (args === undefined) {
    throw new PageStructureError("xoct player json not found");
  }
  // the configuration object is followed by further arguments
  const json = (args.split(",\n")[0] ?? "").trim();

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new PageStructureError("invalid xoct player json", { cause: error });
  }

  const parsed = PlayerConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new PageStructureError(
      `video src not found: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`,
    );
  }
  return parsed.data.streams.map((stream) => stream.sources.mp4[0].src);
}

async function downloadStream(ctx: SyncContext, target: string, src: string): Promise<void> {
  const size = await fileSize(target);
  if (!ctx.config.force && size !== undefined && ctx.config.checkVideos) {
    const head = await ctx.client.head(src);
    const length = head.headers.get("content-length");
    if (length !== null && Number(length) !== size) {
      ctx.logger.warn(`${relativePath(ctx, target)} was updated, consider moving the outdated file`);
    }
    return;
  }

  const response = await ctx.client.download(src);
  logWriting(ctx, target);
  await writeStreamToFile(target, response);
}

export async function syncVideo(ctx: SyncContext, target: string, resource: Video): Promise<void> {
  if (ctx.config.noVideos) {
    return;
  }
  if ((await pathExists(target)) && !(ctx.config.force || ctx.config.checkVideos)) {
    ctx.logger.debug("Skipping download, file exists already");
    return;
  }

  const sources = parseVideoSources(await ctx.client.getText(resource.locator.raw));
  const [only] = sources;
  if (sources.length === 1 && only !== undefined) {
    await downloadStream(ctx, target, only);
    return;
  }

  await createDir(target);
  for (const [index, src] of sources.entries()) {
    await downloadStream(ctx, path.join(target, `Stream${index + 1}.mp4`), src);
  }
}
