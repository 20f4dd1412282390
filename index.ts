#!/usr/bin/env node
/**
 * guardduty-org-sync: CLI entry point
 */

import { runCli } from "./src/cli.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
