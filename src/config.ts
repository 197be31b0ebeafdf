/**
 * @module config
 * @fileoverview Run configuration loaded from environment variables.
 *
 * `cli` loads the configuration once; the driver copies what each service
 * needs into its options and hands the whole record to the handlers through
 * the run context:
 *
 * ```
 *   env --> loadConfig --> cli.main --> runSync --+--> IliasClient options
 *                                                 |    (base URL, cookie, proxied fetch)
 *                                                 +--> RateLimiter (rate)
 *                                                 +--> Scheduler (jobs)
 *                                                 +--> SyncContext.config
 *                                                      (read by the handlers)
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All variables are prefixed `ILIAS_` and written in SCREAMING_SNAKE_CASE.
 * - Booleans are true for `1`, `true` or `yes` (any case), false otherwise.
 * - Numbers go through zod's coercion and are validated, never silently clamped.
 *
 * @example
 * ```ts
 * import { loadConfig } from "./config.js";
 *
 * const config = loadConfig({ ILIAS_OUTPUT: "/data/ilias", ILIAS_JOBS: "4" });
 * config.jobs; // 4
 * config.rate; // 8
 * ```
 */

import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

const flag = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined ? false : ["1", "true", "yes"].includes(value.trim().toLowerCase()),
  );

/**
 * Environment variables understood by {@link loadConfig}, keyed by variable name.
 */
const EnvSchema = z.object({
  ILIAS_OUTPUT: z
    .string({ required_error: "output directory is required" })
    .min(1, "output directory is required"),
  ILIAS_JOBS: z.coerce
    .number()
    .int("must be an integer")
    .positive("must be positive")
    .default(1),
  ILIAS_RATE: z.coerce
    .number()
    .positive("must be positive")
    .finite("must be finite")
    .default(8),
  ILIAS_FORCE: flag,
  ILIAS_SKIP_FILES: flag,
  ILIAS_NO_VIDEOS: flag,
  ILIAS_FORUM: flag,
  ILIAS_CHECK_VIDEOS: flag,
  ILIAS_SAVE_PAGES: flag,
  ILIAS_CONTENT_TREE: flag,
  ILIAS_SYNC_URL: z.string().url("must be an absolute URL").optional(),
  ILIAS_SESSION_COOKIE: z.string().min(1).optional(),
  ILIAS_BASE_URL: z
    .string()
    .url("must be an absolute URL")
    .refine((url) => url.endsWith("/"), "must end with '/'")
    .default("https://ilias.studium.kit.edu/"),
  ILIAS_PROXY: z
    .string()
    .url("must be an absolute URL")
    .refine((url) => /^https?:\/\//i.test(url), "must be an http(s) proxy URL")
    .optional(),
  ILIAS_USER_AGENT: z.string().default("ilias-sync/1.0"),
  ILIAS_VERBOSE: z.coerce.number().int().min(0).max(2).default(0),
});

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Complete configuration of one sync run. Every field is populated.
 */
export interface AppConfig {
  /** Directory the site is mirrored into; also the root of the ignore walk. */
  outputDir: string;

  /**
   * Maximum number of units running at the same time.
   *
   * @default 1
   */
  jobs: number;

  /**
   * Sustained outbound request rate, in requests per minute.
   *
   * @default 8
   */
  rate: number;

  /** Re-download files, weblinks and forum threads that already exist locally. */
  force: boolean;

  /** Do not download files. */
  skipFiles: boolean;

  /** Do not download Opencast videos. */
  noVideos: boolean;

  /** Download forum threads and posts. */
  forum: boolean;

  /** HEAD already-downloaded videos and warn when their size changed. */
  checkVideos: boolean;

  /** Save the overview text of courses and folders as `course.html` / `folder.html`. */
  savePages: boolean;

  /**
   * List course contents through the repository tree instead of the course
   * page, which also reaches folders the page hides.
   */
  contentTree: boolean;

  /** Page to mirror instead of the personal desktop. */
  syncUrl?: string;

  /** Value of the `Cookie` header of an established session. */
  sessionCookie?: string;

  /**
   * Site root, always ending in `/`.
   *
   * @default "https://ilias.studium.kit.edu/"
   */
  baseUrl: string;

  /** HTTP(S) proxy every request is sent through. */
  proxy?: string;

  /** User-Agent header sent with every request. */
  userAgent: string;

  /** 0, 1 or 2. See `utils/log`. */
  verbose: number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read the environment and build a validated {@link AppConfig}.
 *
 * Pure: it only reads the `env` record it is given.
 *
 * @param env - Environment to read, `process.env` by default.
 * @throws {ConfigError} Listing every invalid variable.
 *
 * @example
 * ```ts
 * loadConfig({ ILIAS_OUTPUT: "/data", ILIAS_JOBS: "0" });
 * // throws ConfigError: invalid configuration: ILIAS_JOBS: must be positive
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(emptyToUndefined(env));

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    outputDir: vars.ILIAS_OUTPUT,
    jobs: vars.ILIAS_JOBS,
    rate: vars.ILIAS_RATE,
    force: vars.ILIAS_FORCE,
    skipFiles: vars.ILIAS_SKIP_FILES,
    noVideos: vars.ILIAS_NO_VIDEOS,
    forum: vars.ILIAS_FORUM,
    checkVideos: vars.ILIAS_CHECK_VIDEOS,
    savePages: vars.ILIAS_SAVE_PAGES,
    contentTree: vars.ILIAS_CONTENT_TREE,
    syncUrl: vars.ILIAS_SYNC_URL,
    sessionCookie: vars.ILIAS_SESSION_COOKIE,
    baseUrl: vars.ILIAS_BASE_URL,
    proxy: vars.ILIAS_PROXY,
    userAgent: vars.ILIAS_USER_AGENT,
    verbose: vars.ILIAS_VERBOSE,
  };
}

/**
 * Shells export unset-but-declared variables as `""`; treat those as absent
 * so defaults apply.
 */
function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value === "" ? undefined : value;
  }
  return result;
}
