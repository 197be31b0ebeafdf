/**
 * @module services/ignore
 * @fileoverview Hierarchical `.iliasignore` matching.
 *
 * A sync directory can be excluded from any of its ancestors, so the
 * matcher loads one `.iliasignore` per directory level between the sync
 * directory and the filesystem root.
 *
 * ```
 *   /home/me/.iliasignore          prefix "uni/ILIAS/"   (least specific)
 *   /home/me/uni/.iliasignore      prefix "ILIAS/"
 *   /home/me/uni/ILIAS/.iliasignore prefix ""            (most specific)
 *                      ^ sync directory
 * ```
 *
 * A query is evaluated level by level, most specific first. The first level
 * with a verdict decides: a `!` re-include means "keep", a match means
 * "ignore"; a level without a verdict defers to the next one. Within a level,
 * gitignore semantics apply (implemented by the `ignore` package).
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import ignore, { type Ignore } from "ignore";
import type { Logger } from "../utils/log.js";

/** File name looked up at every directory level. */
export const IGNORE_FILE_NAME = ".iliasignore";

/**
 * Patterns of one `.iliasignore` plus the path from its directory down to the
 * sync directory.
 */
interface IgnoreLevel {
  readonly patterns: Ignore;
  /** `""` for the sync directory itself, else `"a/b/"`. */
  readonly prefix: string;
}

/**
 * Count the lines of an ignore file that are actual rules.
 */
function countRules(content: string): number {
  return content
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "" && !line.startsWith("#")).length;
}

/**
 * Read and compile one ignore file. A missing file yields `undefined`
 * silently; an unreadable or malformed one yields `undefined` and a warning.
 */
async function loadLevel(
  file: string,
  logger: Logger,
): Promise<{ patterns: Ignore; rules: number } | undefined> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    logger.warn(`could not read ${file}:`, error);
    return undefined;
  }

  try {
    return { patterns: ignore().add(content), rules: countRules(content) };
  } catch (error) {
    logger.warn(`malformed ${file}, ignoring its patterns:`, error);
    return undefined;
  }
}

/**
 * Read-only rule set shared by every unit of a run.
 *
 * @example
 * ```ts
 * const matcher = await IgnoreMatcher.load("/data/ilias", logger);
 * matcher.shouldIgnore("Algorithms I/Exercises", true);
 * ```
 */
export class IgnoreMatcher {
  private constructor(private readonly levels: readonly IgnoreLevel[]) {}

  /**
   * Walk from `syncDir` up to the filesystem root and collect every non-empty
   * `.iliasignore`.
   */
  static async load(syncDir: string, logger: Logger): Promise<IgnoreMatcher> {
    const levels: IgnoreLevel[] = [];
    const segments: string[] = [];
    let dir = path.resolve(syncDir);

    for (;;) {
      const file = path.join(dir, IGNORE_FILE_NAME);
      const loaded = await loadLevel(file, logger);
      if (loaded !== undefined && loaded.rules > 0) {
        levels.push({
          patterns: loaded.patterns,
          prefix: segments.map((segment) => `${segment}/`).join(""),
        });
        logger.debug(`Loaded ${loaded.rules} ignore rules from ${file}`);
      }

      const parent = path.dirname(dir);
      if (parent === dir) {
        break;
      }
      segments.unshift(path.basename(dir));
      dir = parent;
    }

    return new IgnoreMatcher(levels);
  }

  /**
   * A matcher with no rules, for runs that skip the ignore walk.
   */
  static empty(): IgnoreMatcher {
    return new IgnoreMatcher([]);
  }

  /** Number of ignore files that contributed rules. */
  get levelCount(): number {
    return this.levels.length;
  }

  /**
   * Decide whether a path below the sync directory is out of scope.
   *
   * @param relativePath - Path relative to the sync directory, either separator.
   * @param isDir - Evaluate with directory semantics (`foo/` patterns).
   */
  shouldIgnore(relativePath: string, isDir: boolean): boolean {
    const normalized = relativePath.split(path.sep).join("/").replace(/\/+$/, "");
    if (normalized === "") {
      return false;
    }

    for (const level of this.levels) {
      const fullPath = `${level.prefix}${normalized}${isDir ? "/" : ""}`;
      const verdict = level.patterns.test(fullPath);
      if (verdict.unignored) {
        return false;
      }
      if (verdict.ignored) {
        return true;
      }
    }
    return false;
  }
}
