/**
 * @module crawler/locator
 * @fileoverview Parsed form of a discovered ILIAS hyperlink.
 *
 * ILIAS addresses almost everything through query parameters on `ilias.php`
 * or `goto.php`. A {@link Locator} keeps the full URL plus the handful of
 * parameters the classifier and the handlers route on; everything else in the
 * query string is dropped.
 *
 * @example
 * ```ts
 * const locator = parseLocator(
 *   "ilias.php?ref_id=42&cmd=view&baseClass=ilRepositoryGUI&lang=de",
 *   "https://ilias.example.org/",
 * );
 * locator.raw;       // "https://ilias.example.org/ilias.php?ref_id=42&cmd=view&baseClass=ilRepositoryGUI&lang=de"
 * locator.ref_id;    // "42"
 * locator.baseClass; // "ilRepositoryGUI"
 * ```
 */

import { InvalidLocatorError } from "../utils/errors.js";

/**
 * Immutable record of one link. Optional fields are present only when the
 * matching query parameter was on the URL. Field names are the ILIAS query keys.
 */
export interface Locator {
  /** Full absolute URL (or, for {@link rawLocator}, the string as given). */
  readonly raw: string;
  readonly baseClass?: string;
  readonly cmdClass?: string;
  readonly cmdNode?: string;
  readonly cmd?: string;
  readonly forwardCmd?: string;
  /** Forum thread id. Its presence alone makes a link a thread. */
  readonly thr_pk?: string;
  readonly pos_pk?: string;
  /** Repository reference id; `""` when unknown. */
  readonly ref_id: string;
  /** Target of the `goto.php` redirector, e.g. `"crs_1234"` or `"file_99_download"`. */
  readonly target?: string;
  readonly file?: string;
}

type QueryKey = Exclude<keyof Locator, "raw">;

const RECOGNIZED_KEYS: ReadonlySet<string> = new Set<QueryKey>([
  "baseClass",
  "cmdClass",
  "cmdNode",
  "cmd",
  "forwardCmd",
  "thr_pk",
  "pos_pk",
  "ref_id",
  "target",
  "file",
]);

function isQueryKey(key: string): key is QueryKey {
  return RECOGNIZED_KEYS.has(key);
}

/**
 * Parse an href found on a page.
 *
 * Hrefs that do not start with `baseUrl` are site-relative and get `baseUrl`
 * prepended. When a parameter occurs more than once the last value wins.
 *
 * @param href - Attribute value as found in the markup.
 * @param baseUrl - Site root ending in `/`.
 * @throws {InvalidLocatorError} If the result is not a valid absolute URL.
 */
export function parseLocator(href: string, baseUrl: string): Locator {
  const absolute = href.startsWith(baseUrl) ? href : `${baseUrl}${href}`;

  let url: URL;
  try {
    url = new URL(absolute);
  } catch (error) {
    throw new InvalidLocatorError(href, { cause: error });
  }

  const fields: { -readonly [K in QueryKey]?: string } = {};
  for (const [key, value] of url.searchParams) {
    if (isQueryKey(key)) {
      fields[key] = value;
    }
  }

  return { ...fields, raw: url.href, ref_id: fields.ref_id ?? "" };
}

/**
 * Wrap a string that addresses a resource directly (e.g. a media link from a
 * video table) without looking at its query string.
 */
export function rawLocator(raw: string): Locator {
  return { raw, ref_id: "" };
}
