#!/usr/bin/env node

/**
 * CLI entry point for the barwatch command
 */

import { start } from './start.js';

start(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  }
);
