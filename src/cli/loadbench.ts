#!/usr/bin/env node

/**
 * loadbench CLI
 *
 * Usage:
 *   loadbench [--config config/loadbench.yaml] [--models a,b] [--concurrency 1,2,4]
 */

import { runCli } from './run.js';

void runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`loadbench failed: ${String(error)}\n`);
    process.exitCode = 1;
  }
);
