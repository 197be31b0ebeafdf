/**
 * @module crawler/sync
 * @fileoverview Driver of one sync run.
 *
 * ```
 *   runSync(config)
 *     |
 *     +--> output directory, .iliasignore walk
 *     +--> rate limiter (ticking), HTTP client (proxied), scheduler
 *     +--> content tree on          (ILIAS_CONTENT_TREE)
 *     +--> submit root unit         (personal desktop or ILIAS_SYNC_URL)
 *     +--> await quiescence
 *     +--> content tree off
 *     +--> stop limiter, close proxy, return counts
 * ```
 */

import path from "node:path";
import { ProxyAgent } from "undici";
import type { AppConfig } from "../config.js";
import { IliasClient, proxiedFetch, type FetchTransport } from "../services/http.js";
import { IgnoreMatcher } from "../services/ignore.js";
import { RateLimiter } from "../services/rate-limiter.js";
import { createDir } from "../utils/fs.js";
import { createLogger, type Logger } from "../utils/log.js";
import type { SyncContext, SyncUnit } from "./context.js";
import { parseLocator } from "./locator.js";
import { processUnit } from "./process.js";
import { classify, type Resource } from "./resource.js";
import { Scheduler } from "./scheduler.js";

/** Landing page listing the courses and groups a user has selected. */
export const PERSONAL_DESKTOP_PATH =
  "ilias.php?baseClass=ilPersonalDesktopGUI&cmd=jumpToSelectedItems";

/**
 * Switches the repository explorer of the session between the tree view,
 * which the course content tree is served from, and the faster flat view.
 */
export function explorerModeUrl(baseUrl: string, mode: "tree" | "flat"): string {
  return `${baseUrl}ilias.php?baseClass=ilRepositoryGUI&cmd=frameset&set_mode=${mode}&ref_id=1`;
}

/** Replaceable collaborators, for tests and embedding. */
export interface SyncDependencies {
  logger?: Logger;
  fetch?: FetchTransport;
}

export interface SyncSummary {
  completed: number;
  failed: number;
}

/**
 * The resource a run starts from: `syncUrl` when configured, otherwise the
 * personal desktop.
 */
export function rootResource(config: AppConfig): Resource {
  const locator = parseLocator(config.syncUrl ?? PERSONAL_DESKTOP_PATH, config.baseUrl);
  return classify(locator, "", config.baseUrl);
}

/**
 * Mirror the site into `config.outputDir`. Resolves once every discovered
 * unit has finished; failed units are logged and counted, never thrown.
 *
 * @throws When the output directory cannot be created or the root link is invalid.
 */
export async function runSync(
  config: AppConfig,
  deps: SyncDependencies = {},
): Promise<SyncSummary> {
  const logger = deps.logger ?? createLogger(config.verbose);
  const runConfig: AppConfig = { ...config, outputDir: path.resolve(config.outputDir) };
  const root = rootResource(runConfig);

  await createDir(runConfig.outputDir);
  const ignore = await IgnoreMatcher.load(runConfig.outputDir, logger);
  const limiter = new RateLimiter(runConfig.rate);
  const proxy = runConfig.proxy === undefined ? undefined : new ProxyAgent(runConfig.proxy);
  const client = new IliasClient({
    baseUrl: runConfig.baseUrl,
    sessionCookie: runConfig.sessionCookie,
    userAgent: runConfig.userAgent,
    limiter,
    logger,
    fetch: deps.fetch ?? (proxy === undefined ? undefined : proxiedFetch(proxy)),
  });

  const ctx: SyncContext = {
    config: runConfig,
    logger,
    client,
    ignore,
    scheduler: new Scheduler<SyncUnit>({
      concurrency: runConfig.jobs,
      logger,
      describe: (unit) => unit.path,
      run: (unit) => processUnit(ctx, unit),
    }),
  };

  limiter.start();
  try {
    if (runConfig.contentTree) {
      await setExplorerMode(ctx, "tree");
    }
    ctx.scheduler.submit({ path: runConfig.outputDir, resource: root });
    await ctx.scheduler.idle();
    if (runConfig.contentTree) {
      await setExplorerMode(ctx, "flat");
    }
  } finally {
    limiter.stop();
    await proxy?.close();
  }

  const { completed, failed } = ctx.scheduler.stats;
  return { completed, failed };
}

async function setExplorerMode(ctx: SyncContext, mode: "tree" | "flat"): Promise<void> {
  const action = mode === "tree" ? "enable" : "disable";
  try {
    const response = await ctx.client.get(explorerModeUrl(ctx.config.baseUrl, mode));
    await response.body?.cancel();
  } catch (error) {
    ctx.logger.warn(`could not ${action} content tree:`, error);
  }
}
