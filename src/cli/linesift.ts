#!/usr/bin/env node
/**
 * linesift CLI - print lines that match patterns
 *
 * Usage:
 *   linesift [options] PATTERNS [FILE]...
 *   linesift -e PATTERNS [-e PATTERNS]... [FILE]...
 *   some-command | linesift -n --color=always error
 *
 * Run `linesift --help` for the full option list.
 */

import { runCli } from "./run-cli.js";

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  stdin: process.stdin,
  env: process.env,
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((e) => {
    console.error("Fatal error:", e);
    process.exit(2);
  });
