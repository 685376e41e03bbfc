/**
 * CLI program definition
 *
 * @module cli/program
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { z } from 'zod';
import { registerBuildCommand } from './commands/build.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerValidateCommand } from './commands/validate.js';

const PACKAGE_NAME = 'road-reference';

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() });

/**
 * Version from the nearest package.json named road-reference, searching
 * upward. Works from the sources and from a dist/ build alike.
 */
export function findPackageVersion(startDir: string): string {
  let dir = startDir;

  for (;;) {
    const filePath = join(dir, 'package.json');
    if (existsSync(filePath)) {
      const result = PackageJsonSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
      if (result.success && result.data.name === PACKAGE_NAME) {
        return result.data.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('road-reference')
    .description('Load a TMC road location table into a queryable spatial store')
    .version(findPackageVersion(dirname(fileURLToPath(import.meta.url))), '-V, --version', 'Output the version number');

  registerBuildCommand(program);
  registerStatsCommand(program);
  registerValidateCommand(program);

  return program;
}
