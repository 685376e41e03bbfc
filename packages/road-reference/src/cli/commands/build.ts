/**
 * Build Command (default)
 *
 * Parse a location table directory and publish a spatial store.
 *
 * Usage:
 *   road-reference <inputDir> <storePath> [options]
 *   road-reference build <inputDir> <storePath> [options]
 *
 * Options:
 *   --strict              Fail on the first malformed row or unknown file
 *   --force               Rebuild even when the store exists
 *   --encoding <enc>      DAT file encoding: utf-8|windows-1250|iso-8859-2
 *   --source-crs <crs>    Coordinate system of XCOORD/YCOORD
 *   --language-id <lid>   Preferred name language
 *   --config <path>       Config file (default: .road-referencerc)
 *   --json                Print the run report as JSON
 *   -v, --verbose         Print every warning and dropped row
 *
 * Examples:
 *   road-reference ./data/tmc ./out/roads.sqlite
 *   road-reference ./data/tmc ./out/roads.sqlite --source-crs TMC:WGS84-E5 --force
 */

import type { Command } from 'commander';
import { ConfigError } from '../../core/errors.js';
import { runPipeline } from '../../pipeline/orchestrator.js';
import { getSummary } from '../../pipeline/report.js';
import { loadConfig, type RoadReferenceConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { createProgressReporter, formatJson } from '../lib/output.js';

export interface BuildOptions {
  readonly strict?: boolean;
  readonly force?: boolean;
  readonly encoding?: string;
  readonly sourceCrs?: string;
  readonly languageId?: string;
  readonly config?: string;
  readonly json?: boolean;
  readonly verbose?: boolean;
}

/**
 * Register the build command as the program's default command
 */
export function registerBuildCommand(program: Command): void {
  program
    .command('build <inputDir> <storePath>', { isDefault: true })
    .description('Parse a location table directory and publish a spatial store')
    .option('--strict', 'Fail on the first malformed row or unknown file')
    .option('--force', 'Rebuild even when the store exists')
    .option('--encoding <enc>', 'DAT file encoding: utf-8|windows-1250|iso-8859-2')
    .option('--source-crs <crs>', 'Coordinate system of XCOORD/YCOORD: EPSG:23700|TMC:WGS84-E5')
    .option('--language-id <lid>', 'Preferred name language (LID)')
    .option('--config <path>', 'Path to config file (default: .road-referencerc)')
    .option('--json', 'Print the run report as JSON')
    .option('-v, --verbose', 'Print every warning and dropped row')
    .action(async (inputDir: string, storePath: string, options: BuildOptions) => {
      process.exitCode = await executeBuild(inputDir, storePath, options);
    });
}

/**
 * Execute the build command
 *
 * @returns Process exit code
 */
export async function executeBuild(
  inputDir: string,
  storePath: string,
  options: BuildOptions
): Promise<ExitCode> {
  let config: RoadReferenceConfig;
  try {
    config = await loadConfig({
      configPath: options.config,
      overrides: {
        encoding: options.encoding,
        sourceCrs: options.sourceCrs,
        strict: options.strict,
        languageId: options.languageId === undefined ? undefined : parseLanguageId(options.languageId),
      },
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      const source = error.source ? ` (${error.source})` : '';
      console.error(`Configuration error${source}: ${error.message}`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  if (!options.json) {
    console.log('\nRoad Reference Build');
    console.log('='.repeat(50));
    console.log(`Input: ${inputDir}`);
    console.log(`Store: ${storePath}`);
    console.log(`Source CRS: ${config.sourceCrs}`);
    if (config.strict) {
      console.log('Strict mode: on');
    }
    console.log('');
  }

  const report = await runPipeline(
    {
      inputDir,
      storePath,
      strict: config.strict,
      force: options.force ?? false,
      encoding: config.encoding ?? undefined,
      sourceCrs: config.sourceCrs,
      languageId: config.languageId,
      envelope: config.envelope,
    },
    options.json ? undefined : createProgressReporter({ verbose: options.verbose })
  );

  if (options.json) {
    console.log(formatJson(report));
  } else {
    console.log('');
    console.log(getSummary(report));
  }

  return report.status === 'Complete' ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
}

/**
 * Language ids are validated with the rest of the configuration; a value
 * that is not an integer is passed on as NaN so it fails there.
 */
function parseLanguageId(value: string): number {
  return /^\d+$/.test(value.trim()) ? Number(value) : Number.NaN;
}
