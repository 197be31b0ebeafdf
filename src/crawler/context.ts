/**
 * @module crawler/context
 * @fileoverview State shared by every unit of one sync run.
 *
 * The driver builds exactly one {@link SyncContext} per run and hands it to
 * each unit; nothing in the crawler reads module-level state.
 */

import path from "node:path";
import type { AppConfig } from "../config.js";
import type { IliasClient } from "../services/http.js";
import type { IgnoreMatcher } from "../services/ignore.js";
import { fileEscape } from "../utils/fs.js";
import type { Logger } from "../utils/log.js";
import { resourceKind, resourceName, type Resource } from "./resource.js";
import type { Scheduler } from "./scheduler.js";

/**
 * One schedulable piece of work: a resource and the local path it is
 * mirrored to.
 */
export interface SyncUnit {
  readonly path: string;
  readonly resource: Resource;
}

export interface SyncContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly client: IliasClient;
  readonly ignore: IgnoreMatcher;
  readonly scheduler: Scheduler<SyncUnit>;
}

/**
 * Path of `target` relative to the output directory, with `/` separators.
 * The output directory itself is `""`.
 */
export function relativePath(ctx: SyncContext, target: string): string {
  return path.relative(ctx.config.outputDir, target).split(path.sep).join("/");
}

/**
 * Log the headline line for a file about to be written.
 */
export function logWriting(ctx: SyncContext, target: string): void {
  ctx.logger.notice(`Writing ${relativePath(ctx, target)}`);
}

/**
 * Submit a discovered child below `parentPath`, named after its escaped
 * display name. A child without a name is logged and dropped.
 */
export function submitChild(ctx: SyncContext, parentPath: string, resource: Resource): void {
  const name = resourceName(resource);
  if (name === undefined) {
    ctx.logger.warn(`${resourceKind(resource)} without a name below ${parentPath}, skipping`);
    return;
  }
  ctx.scheduler.submit({ path: path.join(parentPath, fileEscape(name)), resource });
}
