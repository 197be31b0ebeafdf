/**
 * @fileoverview Shared fixtures: a recording logger, an in-process fetch
 * transport, temporary directories and a ready-made run context.
 */

import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { AppConfig } from "../src/config.js";
import type { SyncContext, SyncUnit } from "../src/crawler/context.js";
import { Scheduler } from "../src/crawler/scheduler.js";
import { IliasClient, type FetchTransport } from "../src/services/http.js";
import { IgnoreMatcher } from "../src/services/ignore.js";
import { RateLimiter } from "../src/services/rate-limiter.js";
import { createLogger, type Logger } from "../src/utils/log.js";

export const BASE_URL = "https://ilias.example.org/";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export interface RecordingLogger extends Logger {
  /** Lines printed to the standard stream, in order. */
  readonly out: string[];
  /** Lines printed to the error stream, in order. */
  readonly err: string[];
}

export function recordingLogger(verbosity = 2): RecordingLogger {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger(verbosity, {
    log: (message) => out.push(message),
    error: (message) => err.push(message),
  });
  return { ...logger, out, err };
}

// ---------------------------------------------------------------------------
// Fetch transport
// ---------------------------------------------------------------------------

export interface FakeResponse {
  body?: string;
  status?: number;
  /** Final URL after redirects. */
  url?: string;
  headers?: Record<string, string>;
}

/**
 * Build a `Response` whose `url` is set, as one from a real fetch would be.
 */
export function makeResponse(fake: FakeResponse): Response {
  const response = new Response(fake.body ?? "", {
    status: fake.status ?? 200,
    headers: fake.headers,
  });
  return Object.defineProperty(response, "url", { value: fake.url ?? "" });
}

/**
 * In-process transport answering from a route table keyed by absolute URL.
 * Unknown URLs get a 404.
 */
export function fakeFetch(routes: Record<string, FakeResponse>) {
  return vi.fn<FetchTransport>(async (url) => {
    const route = routes[url];
    if (route === undefined) {
      return makeResponse({ status: 404, url, body: "not found" });
    }
    return makeResponse({ url, ...route });
  });
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export async function makeTempDir(prefix = "ilias-sync-test-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

// ---------------------------------------------------------------------------
// Configuration and context
// ---------------------------------------------------------------------------

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    outputDir: "/tmp/ilias-sync-unused",
    jobs: 2,
    // one unit per millisecond: fast enough that tests never wait on it
    rate: 60_000,
    force: false,
    skipFiles: false,
    noVideos: false,
    forum: false,
    checkVideos: false,
    savePages: false,
    contentTree: false,
    baseUrl: BASE_URL,
    userAgent: "ilias-sync-test",
    verbose: 2,
    ...overrides,
  };
}

export interface TestContext {
  ctx: SyncContext;
  logger: RecordingLogger;
  limiter: RateLimiter;
  /** Units the handler under test submitted. They are recorded, not run. */
  submitted: SyncUnit[];
}

/**
 * A context whose scheduler records submitted units instead of processing
 * them, so a handler can be tested on its own. Stop the limiter when done.
 */
export function testContext(
  transport: FetchTransport,
  overrides: Partial<AppConfig> = {},
): TestContext {
  const config = testConfig(overrides);
  const logger = recordingLogger();
  const limiter = new RateLimiter(config.rate);
  limiter.start();
  const submitted: SyncUnit[] = [];
  const ctx: SyncContext = {
    config,
    logger,
    client: new IliasClient({
      baseUrl: config.baseUrl,
      userAgent: config.userAgent,
      sessionCookie: "PHPSESSID=test-session",
      limiter,
      logger,
      fetch: transport,
    }),
    ignore: IgnoreMatcher.empty(),
    scheduler: new Scheduler<SyncUnit>({
      concurrency: 1,
      logger,
      describe: (unit) => unit.path,
      run: async (unit) => {
        submitted.push(unit);
      },
    }),
  };
  return { ctx, logger, limiter, submitted };
}
