/**
 * @module services/retry
 * @fileoverview Retry of requests the server reset with HTTP/2 `NO_ERROR`.
 *
 * Some servers close an HTTP/2 stream with the `NO_ERROR` reason code while a
 * response is still expected. The request is fine to repeat right away. No
 * other failure is retried.
 */

import type { Logger } from "../utils/log.js";

/** Retries after the first attempt. */
export const DEFAULT_MAX_RETRIES = 3;

const NO_ERROR_MARKER = "NGHTTP2_NO_ERROR";

export interface RetryOptions {
  logger: Logger;
  /** What is being retried, for the warning line, e.g. `"download"`. */
  label: string;
  /** @default 3 */
  maxRetries?: number;
}

/**
 * Whether an error, or anything in its `cause` chain, is an HTTP/2 stream
 * closed with `NO_ERROR`.
 *
 * Node reports the condition as an error whose message names
 * `NGHTTP2_NO_ERROR`; fetch wraps it as the `cause` of a `TypeError`.
 */
export function isHttp2NoErrorReset(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; current instanceof Error && depth < 8; depth++) {
    if (current.message.includes(NO_ERROR_MARKER)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

/**
 * Run `attempt`, repeating it immediately while it fails with
 * {@link isHttp2NoErrorReset}, at most `maxRetries` more times. Each retry
 * logs one warning. Any other error, or the last qualifying one, propagates
 * unchanged.
 *
 * @example
 * ```ts
 * const response = await withHttp2Retry(() => fetch(url), { logger, label: "download" });
 * ```
 */
export async function withHttp2Retry<T>(
  attempt: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  for (let retries = 0; ; retries++) {
    try {
      return await attempt();
    } catch (error) {
      if (retries >= maxRetries || !isHttp2NoErrorReset(error)) {
        throw error;
      }
      options.logger.warn(`encountered HTTP/2 NO_ERROR, retrying ${options.label}..`);
    }
  }
}
