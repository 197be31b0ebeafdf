#!/usr/bin/env node
/**
 * @module index
 * @fileoverview ilias-sync entry point.
 *
 * Configuration comes from `ILIAS_*` environment variables (see `config.ts`).
 *
 * ```
 * ILIAS_OUTPUT=~/ilias ILIAS_SESSION_COOKIE="PHPSESSID=..." ILIAS_JOBS=4 ilias-sync
 * ```
 */

import { main } from "./cli.js";

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  },
);
