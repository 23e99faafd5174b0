#!/usr/bin/env node

/**
 * gc-triage CLI
 *
 * Usage:
 *   gc-triage <gc.log> [--tail-window <minutes>] [--format md|txt|json]
 */

import { EXIT_CODES } from '../report/severity.js';
import { runCli } from './run.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_CODES.FAILURE;
  }
);
