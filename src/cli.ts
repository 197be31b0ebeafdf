/**
 * @module cli
 * @fileoverview Process-level flow of a sync run, separate from the entry
 * point so it can be called with a custom environment.
 *
 * | exit code | meaning                                    |
 * |-----------|--------------------------------------------|
 * | 0         | every unit completed                       |
 * | 1         | at least one unit failed, or a fatal error |
 * | 2         | invalid configuration                      |
 */

import { loadConfig, type AppConfig } from "./config.js";
import { runSync, type SyncDependencies } from "./crawler/sync.js";
import { ConfigError } from "./utils/errors.js";
import { createLogger } from "./utils/log.js";

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_CONFIG = 2;

/**
 * Load the configuration, run the sync and report the outcome.
 *
 * @returns The process exit code.
 */
export async function main(
  env: NodeJS.ProcessEnv = process.env,
  deps: SyncDependencies = {},
): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      (deps.logger ?? createLogger(0)).error(undefined, error);
      return EXIT_CONFIG;
    }
    throw error;
  }

  const logger = deps.logger ?? createLogger(config.verbose);
  try {
    const summary = await runSync(config, { ...deps, logger });
    logger.notice(`Done: ${summary.completed} completed, ${summary.failed} failed`);
    return summary.failed > 0 ? EXIT_FAILURES : EXIT_OK;
  } catch (error) {
    logger.error(undefined, error);
    return EXIT_FAILURES;
  }
}
