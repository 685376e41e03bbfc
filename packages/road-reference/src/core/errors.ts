/**
 * Road Reference Error Types
 *
 * Structural defects (bad schema, failed store write) abort a run because the
 * output could not be trusted. Row-level defects are recovered where they
 * occur: the row is dropped and counted, and the run goes on.
 */

/**
 * Error kinds that show up in run reports
 */
export type PipelineErrorKind =
  | 'SchemaError'
  | 'RowParseError'
  | 'TransformError'
  | 'StoreWriteError'
  | 'ConfigError';

/**
 * Base class for every error raised by the pipeline
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  /** Whether the error aborts the whole run */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Unknown file category, missing required file, or a header that does not
 * carry the columns its schema declares.
 */
export class SchemaError extends PipelineError {
  readonly kind = 'SchemaError' as const;
  readonly fatal = true;

  constructor(
    message: string,
    public readonly category: string | null = null,
    public readonly file: string | null = null
  ) {
    super(message);
  }
}

/**
 * A single malformed row.
 *
 * Recovered by default (row skipped); the orchestrator promotes it to fatal
 * in strict mode.
 */
export class RowParseError extends PipelineError {
  readonly kind = 'RowParseError' as const;
  readonly fatal = false;

  /**
   * @param file - File name the row came from
   * @param line - 1-based physical line number (header is line 1)
   * @param reason - What failed
   * @param field - Field that failed coercion, when a single field is to blame
   */
  constructor(
    public readonly file: string,
    public readonly line: number,
    public readonly reason: string,
    public readonly field: string | null = null
  ) {
    super(`${file}:${line}: ${field ? `field '${field}' ` : ''}${reason}`);
  }
}

/**
 * A coordinate pair that produced a non-finite result.
 *
 * Fatal for the offending row only.
 */
export class TransformError extends PipelineError {
  readonly kind = 'TransformError' as const;
  readonly fatal = false;

  constructor(
    public readonly lcd: number,
    public readonly easting: number,
    public readonly northing: number,
    reason: string
  ) {
    super(`Point ${lcd}: cannot transform (${easting}, ${northing}): ${reason}`);
  }
}

/**
 * Any failure while writing, indexing or publishing the store.
 *
 * RECOVERY:
 * - The temporary store is deleted; a previously published store is untouched
 * - Rerun the pipeline from scratch once the cause is fixed
 */
export class StoreWriteError extends PipelineError {
  readonly kind = 'StoreWriteError' as const;
  readonly fatal = true;

  constructor(
    message: string,
    public readonly storePath: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

/**
 * Invalid configuration file, environment variable or CLI option
 */
export class ConfigError extends PipelineError {
  readonly kind = 'ConfigError' as const;
  readonly fatal = true;

  constructor(message: string, public readonly source: string | null = null) {
    super(message);
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
