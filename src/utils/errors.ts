/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for ilias-sync.
 *
 * Every error raised by the sync engine extends {@link SyncError}, which
 * carries a machine-readable `code` next to the human-readable `message`.
 * Unit boundaries in the scheduler log these through {@link formatError}.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── SyncError (base)  ─── code: string
 *         ├── InvalidLocatorError         ─── "INVALID_LOCATOR"
 *         ├── UnclassifiableLocatorError  ─── "UNCLASSIFIABLE_LOCATOR"
 *         ├── MissingFileMetadataError    ─── "MISSING_FILE_METADATA"
 *         ├── FetchError                  ─── "FETCH_FAILED" + optional statusCode
 *         ├── SessionExpiredError         ─── "SESSION_EXPIRED"
 *         ├── PageStructureError          ─── "PAGE_STRUCTURE"
 *         └── ConfigError                 ─── "CONFIG_INVALID"
 * ```
 *
 * Only {@link ConfigError} is fatal to a run. Everything else is caught at the
 * boundary of the unit that raised it: the link is skipped, the unit is marked
 * failed, and the crawl continues elsewhere.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new FetchError("HTTP 503 for https://ilias.example.org/", 503);
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "[FETCH_FAILED] HTTP 503 for https://ilias.example.org/"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all ilias-sync errors.
 *
 * Subclasses only pick a {@link code}; `name` follows the concrete class so
 * stack traces read `FetchError: ...` rather than `Error: ...`.
 */
export class SyncError extends Error {
  /**
   * Machine-readable error code in SCREAMING_SNAKE_CASE.
   *
   * @example "FETCH_FAILED", "INVALID_LOCATOR"
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   * @param options - Standard error options; `cause` keeps the underlying error.
   */
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Link Parsing & Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when an href cannot be turned into an absolute URL.
 *
 * @example
 * ```ts
 * throw new InvalidLocatorError("http://[broken");
 * ```
 */
export class InvalidLocatorError extends SyncError {
  /** The href exactly as it was discovered. */
  public readonly href: string;

  constructor(href: string, options?: ErrorOptions) {
    super(`invalid link: ${href}`, "INVALID_LOCATOR", options);
    this.href = href;
  }
}

/**
 * Thrown when a discovered link has no usable address at all, for example an
 * anchor element without an `href` attribute.
 */
export class UnclassifiableLocatorError extends SyncError {
  constructor(message: string) {
    super(message, "UNCLASSIFIABLE_LOCATOR");
  }
}

/**
 * Thrown when a direct file download link is classified without the
 * surrounding item properties needed to build its file name.
 */
export class MissingFileMetadataError extends SyncError {
  constructor(url: string) {
    super(
      `can't construct file object without item properties: ${url}`,
      "MISSING_FILE_METADATA",
    );
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Transport & Pages
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when an HTTP request fails.
 *
 * Network-level failures carry the transport error as `cause` and no
 * {@link statusCode}; HTTP-level failures carry the status.
 *
 * @example
 * ```ts
 * throw new FetchError("HTTP 404 Not Found for https://ilias.example.org/x", 404);
 * ```
 */
export class FetchError extends SyncError {
  /** HTTP status code, when the server answered at all. */
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, "FETCH_FAILED", options);
    this.statusCode = statusCode;
  }
}

/**
 * Thrown when the site redirects to its public landing page or to the login
 * form, which means the session cookie is missing or no longer valid.
 */
export class SessionExpiredError extends SyncError {
  constructor(url: string) {
    super(`not logged in / session expired (at ${url})`, "SESSION_EXPIRED");
  }
}

/**
 * Thrown when a fetched page does not contain the markup a handler expects.
 *
 * @example
 * ```ts
 * throw new PageStructureError("video list link not found");
 * ```
 */
export class PageStructureError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PAGE_STRUCTURE", options);
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Configuration
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown by the configuration loader. The entry point treats it as fatal.
 */
export class ConfigError extends SyncError {
  /** One entry per offending setting, e.g. `"ILIAS_JOBS: must be positive"`. */
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`invalid configuration: ${issues.join("; ")}`, "CONFIG_INVALID");
    this.issues = issues;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any caught value to a single log line.
 *
 * - {@link SyncError}: `"[CODE] message"`
 * - other `Error`s: the message
 * - anything else: `String(value)`
 *
 * An `Error` `cause` chain is appended as `": cause"` for each link.
 *
 * @example
 * ```ts
 * formatError(new FetchError("Failed to fetch x", undefined, { cause: new Error("ECONNRESET") }));
 * // => "[FETCH_FAILED] Failed to fetch x: ECONNRESET"
 *
 * formatError("something went wrong");
 * // => "something went wrong"
 * ```
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  let line =
    error instanceof SyncError ? `[${error.code}] ${error.message}` : error.message;

  let cause: unknown = error.cause;
  // cause chains are short; the bound only guards against cycles
  for (let depth = 0; cause !== undefined && depth < 8; depth++) {
    line += `: ${cause instanceof Error ? cause.message : String(cause)}`;
    cause = cause instanceof Error ? cause.cause : undefined;
  }

  return line;
}
