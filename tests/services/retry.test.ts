/**
 * @fileoverview Tests for HTTP/2 NO_ERROR retries.
 */

import { describe, it, expect, vi } from "vitest";
import { isHttp2NoErrorReset, withHttp2Retry } from "../../src/services/retry.js";
import { recordingLogger } from "../helpers.js";

function noErrorReset(): TypeError {
  return new TypeError("fetch failed", {
    cause: new Error("Stream closed with error code NGHTTP2_NO_ERROR"),
  });
}

const WARNING = "Warning: encountered HTTP/2 NO_ERROR, retrying download..";

// ---------------------------------------------------------------------------
// isHttp2NoErrorReset
// ---------------------------------------------------------------------------

describe("isHttp2NoErrorReset", () => {
  it("finds the marker in the error itself", () => {
    expect(isHttp2NoErrorReset(new Error("NGHTTP2_NO_ERROR"))).toBe(true);
  });

  it("finds the marker in the cause chain", () => {
    expect(isHttp2NoErrorReset(noErrorReset())).toBe(true);
  });

  it.each([
    new Error("ECONNRESET"),
    new TypeError("fetch failed", { cause: new Error("NGHTTP2_INTERNAL_ERROR") }),
    "NGHTTP2_NO_ERROR",
    undefined,
  ])("rejects %s", (error) => {
    expect(isHttp2NoErrorReset(error)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// withHttp2Retry
// ---------------------------------------------------------------------------

describe("withHttp2Retry", () => {
  it("returns the first success without warnings", async () => {
    const logger = recordingLogger();
    const attempt = vi.fn(async () => "ok");

    await expect(withHttp2Retry(attempt, { logger, label: "download" })).resolves.toBe("ok");
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(logger.out).toEqual([]);
  });

  it("retries NO_ERROR resets and logs one warning per retry", async () => {
    const logger = recordingLogger();
    const attempt = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(noErrorReset())
      .mockRejectedValueOnce(noErrorReset())
      .mockResolvedValueOnce("third time");

    await expect(withHttp2Retry(attempt, { logger, label: "download" })).resolves.toBe(
      "third time",
    );
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(logger.out).toEqual([WARNING, WARNING]);
  });

  it("gives up after three retries and rethrows the last error", async () => {
    const logger = recordingLogger();
    const last = noErrorReset();
    const attempt = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(noErrorReset())
      .mockRejectedValueOnce(noErrorReset())
      .mockRejectedValueOnce(noErrorReset())
      .mockRejectedValueOnce(last);

    await expect(withHttp2Retry(attempt, { logger, label: "download" })).rejects.toBe(last);
    expect(attempt).toHaveBeenCalledTimes(4);
    expect(logger.out).toEqual([WARNING, WARNING, WARNING]);
  });

  it("does not retry other errors", async () => {
    const logger = recordingLogger();
    const failure = new TypeError("fetch failed", { cause: new Error("ECONNREFUSED") });
    const attempt = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withHttp2Retry(attempt, { logger, label: "download" })).rejects.toBe(failure);
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(logger.out).toEqual([]);
  });

  it("honours a custom retry limit and label", async () => {
    const logger = recordingLogger();
    const attempt = vi.fn<() => Promise<string>>().mockRejectedValue(noErrorReset());

    await expect(
      withHttp2Retry(attempt, { logger, label: "HEAD request", maxRetries: 1 }),
    ).rejects.toBeInstanceOf(TypeError);
    expect(attempt).toHaveBeenCalledTimes(2);
    expect(logger.out).toEqual(["Warning: encountered HTTP/2 NO_ERROR, retrying HEAD request.."]);
  });
});
