#!/usr/bin/env tsx
/**
 * Road Reference CLI Entry Point
 *
 * @module road-reference-cli
 */

import { createProgram } from '../src/cli/program.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof Error && error.stack && process.env.LOG_LEVEL === 'debug') {
      console.error(error.stack);
    }
    process.exit(EXIT_CODES.ERRORS);
  });
