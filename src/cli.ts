#!/usr/bin/env node
/**
 * pdf-sweep - command-line entry point
 *
 * Usage:
 *   pdf-sweep scan.pdf clean.pdf
 *   pdf-sweep scan.pdf small.pdf --compress --quality screen
 *
 * @module cli
 */

import { loadEnvFile } from './utils/env.js';
import { runCli } from './cli/command.js';

loadEnvFile();

runCli(process.argv.slice(2), {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  color: process.stdout.isTTY === true,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  });
