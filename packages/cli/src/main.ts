#!/usr/bin/env node
/**
 * @tally/cli — Entry point.
 */

import { main } from "./cli.js";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exitCode = 1;
  },
);
