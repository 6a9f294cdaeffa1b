#!/usr/bin/env node
/**
 * Entry point. Argument parsing and exit code only.
 */

import { runCli } from "./cli.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("VCD report failed:", err);
    process.exitCode = 1;
  }
);
