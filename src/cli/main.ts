#!/usr/bin/env node
/**
 * Kiln CLI entry point.
 *
 * Usage: kiln <command> [options]
 */
import 'dotenv/config';

import { runCli } from './cli.js';

runCli(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  color: process.stdout.isTTY,
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((e: unknown) => {
    console.error('Fatal error:', e);
    process.exitCode = 1;
  });
