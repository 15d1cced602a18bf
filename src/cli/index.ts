#!/usr/bin/env node
/**
 * govctl: governance kernel CLI entry point.
 *
 * See USAGE in ./run.ts for commands. Exit codes: 0 success, 1 command
 * error, 2 fatal (bad configuration or an unexpected throw).
 */

import { runCli } from "./run.js";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(2);
  },
);
