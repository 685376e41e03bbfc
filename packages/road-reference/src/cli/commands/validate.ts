/**
 * Validate Command
 *
 * Check that a store's point index is complete and SQLite reports no
 * corruption.
 *
 * Usage:
 *   road-reference validate <storePath> [--json]
 *
 * Exit codes:
 *   0  store is valid
 *   2  store cannot be opened
 *   5  store failed validation
 */

import type { Command } from 'commander';
import { fileExists } from '../../core/utils/atomic-write.js';
import { validateStore } from '../../persistence/store-builder.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson } from '../lib/output.js';

interface ValidateOptions {
  readonly json?: boolean;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <storePath>')
    .description('Validate a published store')
    .option('--json', 'Output as JSON')
    .action(async (storePath: string, options: ValidateOptions) => {
      process.exitCode = await executeValidate(storePath, options);
    });
}

export async function executeValidate(
  storePath: string,
  options: ValidateOptions
): Promise<ExitCode> {
  if (!(await fileExists(storePath))) {
    console.error(`Error: store not found: ${storePath}`);
    return EXIT_CODES.ERRORS;
  }

  let result: ReturnType<typeof validateStore>;
  try {
    result = validateStore(storePath);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.ERRORS;
  }

  if (options.json) {
    console.log(formatJson({ storePath, ...result }));
  } else if (result.valid) {
    console.log(`Store is valid: ${result.pointCount} points indexed`);
  } else {
    console.log('Store failed validation:');
    for (const issue of result.issues) {
      console.log(`  - ${issue}`);
    }
  }

  return result.valid ? EXIT_CODES.SUCCESS : EXIT_CODES.DATA_INTEGRITY_ERROR;
}
