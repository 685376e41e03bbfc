/**
 * CLI Configuration Management
 *
 * Loads configuration from .road-referencerc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (ROAD_REFERENCE_*)
 * 3. Config file (.road-referencerc, --config path or ROAD_REFERENCE_CONFIG)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import { DAT_ENCODINGS, type DatEncoding } from '../../schema/types.js';
import {
  NATIONAL_ENVELOPE,
  SOURCE_CRS,
  type Envelope,
  type SourceCrs,
} from '../../transformation/eov.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface RoadReferenceConfig {
  /** Encoding of every DAT file; null keeps each schema's declared encoding */
  readonly encoding: DatEncoding | null;
  readonly strict: boolean;
  readonly sourceCrs: SourceCrs;
  /** Preferred language for names */
  readonly languageId: number;
  readonly envelope: Envelope;
  /** Resolved config file path, null when none was used */
  readonly configPath: string | null;
}

export interface ConfigOverrides {
  readonly encoding?: string;
  readonly strict?: boolean;
  readonly sourceCrs?: string;
  readonly languageId?: number;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
  /** Defaults to process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts from. Defaults to cwd. */
  readonly cwd?: string;
}

// ============================================================================
// Schemas
// ============================================================================

const EnvelopeSchema = z
  .object({
    minLon: z.number().min(-180).max(180),
    maxLon: z.number().min(-180).max(180),
    minLat: z.number().min(-90).max(90),
    maxLat: z.number().min(-90).max(90),
  })
  .strict()
  .refine((e) => e.minLon <= e.maxLon, 'envelope.minLon must be <= envelope.maxLon')
  .refine((e) => e.minLat <= e.maxLat, 'envelope.minLat must be <= envelope.maxLat');

const EncodingSchema = z.enum(DAT_ENCODINGS, {
  errorMap: () => ({ message: `encoding must be one of ${DAT_ENCODINGS.join(', ')}` }),
});

const SourceCrsSchema = z.enum(SOURCE_CRS, {
  errorMap: () => ({ message: `sourceCrs must be one of ${SOURCE_CRS.join(', ')}` }),
});

const LanguageIdSchema = z
  .number({ invalid_type_error: 'languageId must be a number' })
  .int('languageId must be an integer')
  .positive('languageId must be positive');

const ConfigFileSchema = z
  .object({
    encoding: EncodingSchema.optional(),
    strict: z.boolean().optional(),
    sourceCrs: SourceCrsSchema.optional(),
    languageId: LanguageIdSchema.optional(),
    envelope: EnvelopeSchema.optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: Omit<RoadReferenceConfig, 'configPath'> = {
  encoding: null,
  strict: false,
  sourceCrs: 'EPSG:23700',
  languageId: 1,
  envelope: NATIONAL_ENVELOPE,
};

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.road-referencerc',
  '.road-referencerc.yaml',
  '.road-referencerc.yml',
  '.road-referencerc.json',
];

const ENV_PREFIX = 'ROAD_REFERENCE_';

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Find a config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFile {
  let content: unknown;
  try {
    const text = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON
    content = filePath.endsWith('.json') ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  // An empty YAML document parses to null
  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    throw new ConfigError(formatIssue(result.error), filePath);
  }
  return result.data;
}

function formatIssue(error: z.ZodError): string {
  const issue = error.errors[0];
  if (issue === undefined) {
    return 'invalid configuration';
  }
  const path = issue.path.join('.');
  return path === '' || issue.message.startsWith(path) ? issue.message : `${path}: ${issue.message}`;
}

/**
 * Validate one value with a schema, reporting where it came from
 */
function check<T>(schema: z.ZodType<T>, value: unknown, source: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(formatIssue(result.error), source);
  }
  return result.data;
}

function envBoolean(value: string | undefined, name: string): boolean | undefined {
  if (value === undefined) return undefined;
  const normalised = value.trim().toLowerCase();
  if (normalised === 'true' || normalised === '1') return true;
  if (normalised === 'false' || normalised === '0') return false;
  throw new ConfigError(`${name} must be true, false, 1 or 0`, name);
}

function envInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\s*\d+\s*$/.test(value)) {
    throw new ConfigError(`${name} must be a positive integer`, name);
  }
  return Number(value);
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a file, variable or flag holds an invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RoadReferenceConfig> {
  const env = options.env ?? process.env;
  const envVar = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`];

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? envVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const overrides = options.overrides ?? {};

  const encoding = overrides.encoding ?? envVar('ENCODING');
  const sourceCrs = overrides.sourceCrs ?? envVar('SOURCE_CRS');
  const languageId = overrides.languageId ?? envInteger(envVar('LANGUAGE_ID'), `${ENV_PREFIX}LANGUAGE_ID`);
  const strict = overrides.strict ?? envBoolean(envVar('STRICT'), `${ENV_PREFIX}STRICT`);

  return {
    encoding:
      encoding !== undefined
        ? check(EncodingSchema, encoding, overrides.encoding !== undefined ? '--encoding' : `${ENV_PREFIX}ENCODING`)
        : fileConfig.encoding ?? DEFAULT_CONFIG.encoding,
    strict: strict ?? fileConfig.strict ?? DEFAULT_CONFIG.strict,
    sourceCrs:
      sourceCrs !== undefined
        ? check(SourceCrsSchema, sourceCrs, overrides.sourceCrs !== undefined ? '--source-crs' : `${ENV_PREFIX}SOURCE_CRS`)
        : fileConfig.sourceCrs ?? DEFAULT_CONFIG.sourceCrs,
    languageId:
      languageId !== undefined
        ? check(LanguageIdSchema, languageId, overrides.languageId !== undefined ? '--language-id' : `${ENV_PREFIX}LANGUAGE_ID`)
        : fileConfig.languageId ?? DEFAULT_CONFIG.languageId,
    envelope: fileConfig.envelope ?? DEFAULT_CONFIG.envelope,
    configPath,
  };
}
