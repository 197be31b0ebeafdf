/**
 * @module services/http
 * @fileoverview Session-bound HTTP client for the ILIAS site.
 *
 * Wraps a `fetch` transport with the reliability controls every request of a
 * sync run goes through:
 *
 * ```
 *   client.get(url)
 *     |
 *     +--> resolve(url)             site-relative -> absolute
 *     |
 *     +--> limiter.acquire()        one unit per call, taken once
 *     |
 *     +--> withHttp2Retry(fetch)    Cookie + User-Agent, redirects followed
 *     |
 *     +--> transport error -> FetchError (underlying error kept as cause)
 * ```
 *
 * With a proxy configured, the driver passes {@link proxiedFetch} as the
 * transport.
 *
 * `getHtml` adds the page-level checks: an expired session and the site's
 * own error page are both reported as errors instead of being parsed.
 */

import * as cheerio from "cheerio";
import type { ProxyAgent } from "undici";
import { FetchError, SessionExpiredError } from "../utils/errors.js";
import type { Logger } from "../utils/log.js";
import type { RateLimiter } from "./rate-limiter.js";
import { withHttp2Retry } from "./retry.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * The subset of the global `fetch` the client calls. Tests pass a fake.
 */
export type FetchTransport = (url: string, init: RequestInit) => Promise<Response>;

export interface IliasClientOptions {
  /** Site root ending in `/`. */
  baseUrl: string;
  /** Value of the `Cookie` header; omitted when undefined. */
  sessionCookie?: string;
  userAgent: string;
  limiter: RateLimiter;
  logger: Logger;
  /** @default globalThis.fetch */
  fetch?: FetchTransport;
}

/**
 * Transport over the global `fetch` that sends every request through `proxy`.
 * The caller owns the agent and closes it when the run is over.
 */
export function proxiedFetch(proxy: ProxyAgent): FetchTransport {
  return (url, init) => fetch(url, { ...init, dispatcher: proxy });
}

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/** Query parameters the site redirects to when nobody is logged in. */
const LOGGED_OUT_MARKERS = ["reloadpublic=1", "cmd=force_login"];

/** Release the connection of a response that will not be read. */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

function isLoggedOutUrl(finalUrl: string): boolean {
  const query = finalUrl.split("?")[1] ?? "";
  return LOGGED_OUT_MARKERS.some((marker) => query.includes(marker));
}

// ---------------------------------------------------------------------------
// IliasClient Class
// ---------------------------------------------------------------------------

export class IliasClient {
  readonly baseUrl: string;
  private readonly host: string;
  private readonly headers: Record<string, string>;
  private readonly transport: FetchTransport;

  constructor(private readonly options: IliasClientOptions) {
    this.baseUrl = options.baseUrl;
    this.host = new URL(options.baseUrl).host;
    this.headers = { "User-Agent": options.userAgent };
    if (options.sessionCookie !== undefined) {
      this.headers.Cookie = options.sessionCookie;
    }
    this.transport = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Make a discovered address absolute.
   *
   * @example
   * ```ts
   * client.resolve("ilias.php?ref_id=1");        // "{baseUrl}ilias.php?ref_id=1"
   * client.resolve("ilias.example.org/x");       // "https://ilias.example.org/x"
   * client.resolve("https://cdn.example.org/v"); // unchanged
   * ```
   */
  resolve(url: string): string {
    if (url.startsWith("http://") || url.startsWith("https://")) {
      return url;
    }
    if (url.startsWith(this.host)) {
      return `https://${url}`;
    }
    return `${this.baseUrl}${url}`;
  }

  /**
   * GET a resource. Any HTTP status is returned as is.
   *
   * @throws {FetchError} When no response arrives.
   */
  async get(url: string): Promise<Response> {
    return this.request("GET", url, "download");
  }

  /**
   * HEAD a resource, e.g. to learn where a link redirects to or how large a
   * download is.
   *
   * @throws {FetchError} When no response arrives.
   */
  async head(url: string): Promise<Response> {
    return this.request("HEAD", url, "HEAD request");
  }

  /**
   * GET a page and parse it.
   *
   * @throws {FetchError} On a non-2xx status or the site's error page.
   * @throws {SessionExpiredError} When the request ended on the login page.
   */
  async getHtml(url: string): Promise<cheerio.CheerioAPI> {
    const response = await this.get(url);
    if (isLoggedOutUrl(response.url)) {
      await discardBody(response);
      throw new SessionExpiredError(response.url);
    }
    const text = await this.readText(await this.ensureOk(response, url), url);
    const $ = cheerio.load(text);
    if ($("div.alert-danger").length > 0) {
      throw new FetchError(`ILIAS error page at ${url}`, response.status);
    }
    return $;
  }

  /**
   * GET a resource and return its body as text.
   *
   * @throws {FetchError} On a non-2xx status.
   */
  async getText(url: string): Promise<string> {
    return this.readText(await this.download(url), url);
  }

  /**
   * GET a resource that is expected to exist, e.g. a file to be saved.
   *
   * @throws {FetchError} On a non-2xx status or when no response arrives.
   */
  async download(url: string): Promise<Response> {
    return this.ensureOk(await this.get(url), url);
  }

  private async ensureOk(response: Response, url: string): Promise<Response> {
    if (!response.ok) {
      await discardBody(response);
      const status = `${response.status} ${response.statusText}`.trim();
      throw new FetchError(`HTTP ${status} for ${url}`, response.status);
    }
    return response;
  }

  private async readText(response: Response, url: string): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new FetchError(`Error reading response body of ${url}`, undefined, {
        cause: error,
      });
    }
  }

  private async request(method: "GET" | "HEAD", url: string, label: string): Promise<Response> {
    const absolute = this.resolve(url);
    await this.options.limiter.acquire();
    this.options.logger.debug(`${method === "GET" ? "Downloading" : "HEAD"} ${absolute}`);

    try {
      return await withHttp2Retry(
        () => this.transport(absolute, { method, headers: this.headers, redirect: "follow" }),
        { logger: this.options.logger, label },
      );
    } catch (error) {
      throw new FetchError(`Failed to fetch ${absolute}`, undefined, {
        cause: error,
      });
    }
  }
}
