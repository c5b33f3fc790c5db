#!/usr/bin/env node
/**
 * CLI entry point. Signature goes to stdout, diagnostics to stderr.
 */

import 'dotenv/config';
import { run } from './cli/program.js';
import { errorMessage } from './errors.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(`error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
