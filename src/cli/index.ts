#!/usr/bin/env node

/**
 * gwt-prose CLI entry point.
 *
 * This is the main entry point for the 'gwt-prose' command.
 */

import { text } from 'node:stream/consumers';
import { runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

const colors = process.stderr.isTTY;

withErrorHandling(
  () =>
    runCli(process.argv.slice(2), {
      stdout: (chunk) => {
        process.stdout.write(chunk);
      },
      stderr: (chunk) => {
        process.stderr.write(chunk);
      },
      readStdin: () => text(process.stdin),
      colors,
    }),
  { colors }
);
