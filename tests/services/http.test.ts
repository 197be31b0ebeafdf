/**
 * @fileoverview Tests for IliasClient.
 *
 * Covers: URL resolution, request headers, page-level checks in getHtml,
 * status handling, transport error wrapping and the NO_ERROR retry.
 */

import { ProxyAgent } from "undici";
import { afterEach, describe, it, expect, vi } from "vitest";
import { IliasClient, proxiedFetch, type FetchTransport } from "../../src/services/http.js";
import { RateLimiter } from "../../src/services/rate-limiter.js";
import { FetchError, SessionExpiredError } from "../../src/utils/errors.js";
import {
  BASE_URL,
  fakeFetch,
  makeResponse,
  recordingLogger,
  type FakeResponse,
  type RecordingLogger,
} from "../helpers.js";

const limiters: RateLimiter[] = [];

afterEach(() => {
  for (const limiter of limiters.splice(0)) {
    limiter.stop();
  }
});

function makeClient(
  transport: FetchTransport,
  sessionCookie: string | undefined = "PHPSESSID=test-session",
): { client: IliasClient; logger: RecordingLogger } {
  const limiter = new RateLimiter(60_000);
  limiter.start();
  limiters.push(limiter);
  const logger = recordingLogger();
  const client = new IliasClient({
    baseUrl: BASE_URL,
    sessionCookie,
    userAgent: "ilias-sync-test",
    limiter,
    logger,
    fetch: transport,
  });
  return { client, logger };
}

function routes(entries: Record<string, FakeResponse>): Record<string, FakeResponse> {
  const absolute: Record<string, FakeResponse> = {};
  for (const [relative, response] of Object.entries(entries)) {
    absolute[`${BASE_URL}${relative}`] = response;
  }
  return absolute;
}

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

describe("IliasClient.resolve", () => {
  const { client } = makeClient(fakeFetch({}));

  it("prefixes site-relative paths with the base URL", () => {
    expect(client.resolve("ilias.php?ref_id=1")).toBe(`${BASE_URL}ilias.php?ref_id=1`);
  });

  it("adds a scheme to addresses starting with the site host", () => {
    expect(client.resolve("ilias.example.org/goto.php")).toBe("https://ilias.example.org/goto.php");
  });

  it("keeps absolute URLs", () => {
    expect(client.resolve("https://cdn.example.org/v.mp4")).toBe("https://cdn.example.org/v.mp4");
    expect(client.resolve("http://cdn.example.org/v.mp4")).toBe("http://cdn.example.org/v.mp4");
  });
});

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

describe("IliasClient requests", () => {
  it("sends the session cookie and user agent and follows redirects", async () => {
    const transport = fakeFetch(routes({ "ilias.php?x=1": { body: "hi" } }));
    const { client, logger } = makeClient(transport);

    const response = await client.get("ilias.php?x=1");

    expect(response.status).toBe(200);
    expect(transport).toHaveBeenCalledWith(`${BASE_URL}ilias.php?x=1`, {
      method: "GET",
      headers: { "User-Agent": "ilias-sync-test", Cookie: "PHPSESSID=test-session" },
      redirect: "follow",
    });
    expect(logger.out).toEqual([`Downloading ${BASE_URL}ilias.php?x=1`]);
  });

  it("omits the Cookie header without a session", async () => {
    const transport = fakeFetch(routes({ a: {} }));
    const { client } = makeClient(transport, undefined);

    await client.get("a");

    expect(transport).toHaveBeenCalledWith(`${BASE_URL}a`, {
      method: "GET",
      headers: { "User-Agent": "ilias-sync-test" },
      redirect: "follow",
    });
  });

  it("sends HEAD requests with their own log line", async () => {
    const transport = fakeFetch(routes({ "f.mp4": { headers: { "content-length": "42" } } }));
    const { client, logger } = makeClient(transport);

    const response = await client.head("f.mp4");

    expect(response.headers.get("content-length")).toBe("42");
    expect(transport.mock.calls[0]?.[1].method).toBe("HEAD");
    expect(logger.out).toEqual([`HEAD ${BASE_URL}f.mp4`]);
  });

  it("returns non-2xx responses from get()", async () => {
    const { client } = makeClient(fakeFetch({}));
    const response = await client.get("missing");
    expect(response.status).toBe(404);
  });

  it("rejects non-2xx responses in download()", async () => {
    const { client } = makeClient(fakeFetch({}));
    const failure = client.download("missing");

    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 404,
      message: "HTTP 404 for missing",
    });
  });

  it("releases the body of a rejected response", async () => {
    const response = makeResponse({ status: 404, body: "not found", url: `${BASE_URL}missing` });
    const { client } = makeClient(vi.fn<FetchTransport>().mockResolvedValue(response));

    await expect(client.download("missing")).rejects.toBeInstanceOf(FetchError);
    expect(response.bodyUsed).toBe(true);
  });

  it("returns the body from getText()", async () => {
    const { client } = makeClient(fakeFetch(routes({ list: { body: "<table></table>" } })));
    await expect(client.getText("list")).resolves.toBe("<table></table>");
  });

  it("wraps transport failures in FetchError and keeps the cause", async () => {
    const cause = new TypeError("fetch failed", { cause: new Error("ECONNREFUSED") });
    const transport = vi.fn<FetchTransport>().mockRejectedValue(cause);
    const { client } = makeClient(transport);

    const failure = client.get("ilias.php");

    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toMatchObject({
      message: `Failed to fetch ${BASE_URL}ilias.php`,
      statusCode: undefined,
      cause,
    });
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it("repeats a request the server reset with NO_ERROR", async () => {
    const transport = vi
      .fn<FetchTransport>()
      .mockRejectedValueOnce(new TypeError("fetch failed", { cause: new Error("NGHTTP2_NO_ERROR") }))
      .mockResolvedValueOnce(makeResponse({ body: "ok", url: `${BASE_URL}x` }));
    const { client, logger } = makeClient(transport);

    const response = await client.get("x");

    expect(await response.text()).toBe("ok");
    expect(transport).toHaveBeenCalledTimes(2);
    expect(logger.out).toEqual([
      `Downloading ${BASE_URL}x`,
      "Warning: encountered HTTP/2 NO_ERROR, retrying download..",
    ]);
  });
});

// ---------------------------------------------------------------------------
// getHtml
// ---------------------------------------------------------------------------

describe("IliasClient.getHtml", () => {
  it("parses the page", async () => {
    const { client } = makeClient(
      fakeFetch(routes({ page: { body: "<div id='il_center_col'>Hello</div>" } })),
    );
    const $ = await client.getHtml("page");
    expect($("#il_center_col").text()).toBe("Hello");
  });

  it.each(["login.php?target=&cmd=force_login", "index.php?reloadpublic=1"])(
    "reports an expired session when redirected to %s",
    async (landing) => {
      const { client } = makeClient(
        fakeFetch(routes({ page: { body: "<form></form>", url: `${BASE_URL}${landing}` } })),
      );
      await expect(client.getHtml("page")).rejects.toBeInstanceOf(SessionExpiredError);
    },
  );

  it("releases the body of the login page", async () => {
    const response = makeResponse({
      body: "<form></form>",
      url: `${BASE_URL}login.php?cmd=force_login`,
    });
    const { client } = makeClient(vi.fn<FetchTransport>().mockResolvedValue(response));

    await expect(client.getHtml("page")).rejects.toBeInstanceOf(SessionExpiredError);
    expect(response.bodyUsed).toBe(true);
  });

  it("reports the site's error page", async () => {
    const { client } = makeClient(
      fakeFetch(routes({ page: { body: "<div class='alert-danger'>No permission</div>" } })),
    );
    await expect(client.getHtml("page")).rejects.toMatchObject({
      code: "FETCH_FAILED",
      message: "ILIAS error page at page",
      statusCode: 200,
    });
  });

  it("rejects non-2xx pages", async () => {
    const { client } = makeClient(fakeFetch(routes({ page: { status: 500, body: "oops" } })));
    await expect(client.getHtml("page")).rejects.toMatchObject({
      statusCode: 500,
      message: "HTTP 500 for page",
    });
  });
});

// ---------------------------------------------------------------------------
// proxiedFetch
// ---------------------------------------------------------------------------

describe("proxiedFetch", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("hands the proxy agent to fetch as its dispatcher", async () => {
    const globalFetch = vi.fn<typeof fetch>(async () => makeResponse({ body: "ok" }));
    vi.stubGlobal("fetch", globalFetch);
    const agent = new ProxyAgent("http://127.0.0.1:3128");

    try {
      const response = await proxiedFetch(agent)(`${BASE_URL}x`, { method: "GET" });

      expect(await response.text()).toBe("ok");
      expect(globalFetch).toHaveBeenCalledTimes(1);
      expect(globalFetch.mock.calls[0]?.[0]).toBe(`${BASE_URL}x`);
      expect(globalFetch.mock.calls[0]?.[1]).toEqual({ method: "GET", dispatcher: agent });
    } finally {
      await agent.close();
    }
  });
});
