/**
 * @module crawler/process
 * @fileoverview What the scheduler runs for each unit.
 *
 * ```
 *   processUnit(ctx, { path, resource })
 *     |
 *     +--> ignored by .iliasignore?  -> log, done
 *     |
 *     +--> "Syncing {kind} {path}"
 *     |
 *     +--> handler for resource.type (may submit children)
 * ```
 */

import { syncContainer } from "../handlers/container.js";
import { syncExercise } from "../handlers/exercise.js";
import { syncFile } from "../handlers/file.js";
import { syncForum } from "../handlers/forum.js";
import { syncPluginDispatch } from "../handlers/plugin-dispatch.js";
import { syncThread } from "../handlers/thread.js";
import { syncVideo } from "../handlers/video.js";
import { syncWeblink } from "../handlers/weblink.js";
import { relativePath, type SyncContext, type SyncUnit } from "./context.js";
import { assertNever, isContainer, resourceKind, type Resource } from "./resource.js";

async function dispatch(ctx: SyncContext, target: string, resource: Resource): Promise<void> {
  switch (resource.type) {
    case "Course":
    case "Folder":
    case "PersonalDesktop":
      return syncContainer(ctx, target, resource);
    case "File":
      return syncFile(ctx, target, resource);
    case "Forum":
      return syncForum(ctx, target, resource);
    case "Thread":
      return syncThread(ctx, target, resource);
    case "ExerciseHandler":
      return syncExercise(ctx, target, resource);
    case "Weblink":
      return syncWeblink(ctx, target, resource);
    case "PluginDispatch":
      return syncPluginDispatch(ctx, target, resource);
    case "Video":
      return syncVideo(ctx, target, resource);
    case "Wiki":
      ctx.logger.info("Ignored wiki!");
      return;
    case "Survey":
      ctx.logger.info("Ignored survey!");
      return;
    case "Presentation":
      ctx.logger.info("Ignored interactive presentation! (visit it yourself, it's probably interesting)");
      return;
    case "Generic":
      ctx.logger.info(`Ignored generic ${resource.name} (${resource.locator.raw})`);
      return;
    default:
      return assertNever(resource);
  }
}

/**
 * Run one unit. Errors propagate to the scheduler, which logs and counts them.
 */
export async function processUnit(ctx: SyncContext, unit: SyncUnit): Promise<void> {
  const relative = relativePath(ctx, unit.path);
  if (ctx.ignore.shouldIgnore(relative, isContainer(unit.resource))) {
    ctx.logger.info(`Ignored ${relative}`);
    return;
  }
  ctx.logger.info(`Syncing ${resourceKind(unit.resource)} ${relative}`);
  ctx.logger.debug(` URL: ${unit.resource.locator.raw}`);
  await dispatch(ctx, unit.path, unit.resource);
}
