/**
 * @module utils/log
 * @fileoverview Console logging with the verbosity levels of the sync run.
 *
 * | level | prints                                   |
 * |-------|------------------------------------------|
 * | 0     | warnings, errors, files being written    |
 * | 1     | + ignored paths, "Syncing ..." per unit  |
 * | 2     | + URLs and skipped downloads             |
 *
 * Every unit receives the same {@link Logger} through the run context, so
 * tests can swap in a recording sink.
 */

import { formatError } from "./errors.js";

/**
 * Where formatted lines end up. `console` satisfies this interface.
 */
export interface LogSink {
  log(message: string): void;
  error(message: string): void;
}

export interface Logger {
  /** Verbosity 2: URLs, skipped downloads, raw extracted data. */
  debug(message: string): void;
  /** Verbosity 1: per-unit progress. */
  info(message: string): void;
  /** Always printed: files written and other headline events. */
  notice(message: string): void;
  /** Always printed, prefixed with `Warning:`. */
  warn(message: string, error?: unknown): void;
  /** Always printed to the error stream, prefixed with `Error:` unless a context is given. */
  error(context: string | undefined, error: unknown): void;
}

/**
 * Build a {@link Logger} for the given verbosity.
 *
 * @param verbosity - 0, 1 or 2; higher values print more.
 * @param sink - Output target, `console` by default.
 *
 * @example
 * ```ts
 * const log = createLogger(1);
 * log.info("Syncing course Algorithms I");
 * log.error("Syncing /data/Algorithms I", new FetchError("HTTP 500", 500));
 * // stderr: Syncing /data/Algorithms I: [FETCH_FAILED] HTTP 500
 * ```
 */
export function createLogger(verbosity: number, sink: LogSink = console): Logger {
  return {
    debug(message) {
      if (verbosity >= 2) {
        sink.log(message);
      }
    },
    info(message) {
      if (verbosity >= 1) {
        sink.log(message);
      }
    },
    notice(message) {
      sink.log(message);
    },
    warn(message, error) {
      sink.log(
        error === undefined
          ? `Warning: ${message}`
          : `Warning: ${message} ${formatError(error)}`,
      );
    },
    error(context, error) {
      sink.error(`${context ?? "Error"}: ${formatError(error)}`);
    },
  };
}
