#!/usr/bin/env node
/**
 * Load the bundled brickset dataset and print the query report to stdout.
 */

import { runReport } from './app/run-report.js';

process.exitCode = runReport({
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
});
