/**
 * Pipeline Orchestrator
 *
 * Runs Parsing -> Resolving -> Transforming -> Loading over one input
 * directory and publishes the store atomically.
 *
 * STATE MACHINE:
 *   NotStarted -> Parsing -> Resolving -> Transforming -> Loading -> Complete
 *   NotStarted -> Complete            (target exists, run skipped)
 *   any non-terminal state -> Failed
 *
 * FAILURE HANDLING:
 * - Fatal errors (SchemaError, StoreWriteError, RowParseError in strict mode)
 *   end the run in Failed; the report carries the error
 * - The store is built under a temporary name and renamed onto the target
 *   only after validation; on failure the temporary file is deleted and an
 *   existing target is left untouched
 * - No retries
 */

import { readdir } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import {
  PipelineError,
  type RowParseError,
  SchemaError,
  StoreWriteError,
  type TransformError,
} from '../core/errors.js';
import {
  discardFile,
  ensureParentDirectory,
  fileExists,
  publishFile,
  temporaryPathFor,
} from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { describeWarning, type PipelineWarning } from '../core/warnings.js';
import type { LocatedNetwork, ResolvedNetwork } from '../core/types.js';
import { readDatFile } from '../parsing/dat-reader.js';
import type { ParsedDataset, ParsedFile, ParsedRow } from '../parsing/types.js';
import { StoreBuilder } from '../persistence/store-builder.js';
import type { EntityTotals } from '../persistence/types.js';
import { resolveNetwork } from '../resolution/resolver.js';
import {
  FILE_CATEGORIES,
  categoryForFile,
  type FileCategory,
  type RowFor,
} from '../schema/registry.js';
import type { DatEncoding } from '../schema/types.js';
import {
  NATIONAL_ENVELOPE,
  transformNetwork,
  type Envelope,
  type SourceCrs,
} from '../transformation/eov.js';
import {
  emptyWarningCounts,
  type FileReadReport,
  type PipelineState,
  type RunFailure,
  type RunReport,
} from './report.js';

const logger = createLogger({ module: 'orchestrator' });

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
  readonly inputDir: string;
  readonly storePath: string;
  /** Promote row errors and unknown files to fatal */
  readonly strict?: boolean;
  /** Rebuild even when the target exists */
  readonly force?: boolean;
  /** Overrides the encoding every schema declares */
  readonly encoding?: DatEncoding;
  readonly sourceCrs?: SourceCrs;
  readonly languageId?: number;
  readonly envelope?: Envelope;
}

export type PipelineEvent =
  | { readonly type: 'transition'; readonly from: PipelineState; readonly to: PipelineState }
  | { readonly type: 'warning'; readonly warning: PipelineWarning }
  | { readonly type: 'rowDropped'; readonly error: RowParseError | TransformError }
  | { readonly type: 'fileRead'; readonly report: FileReadReport };

export type PipelineListener = (event: PipelineEvent) => void;

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  NotStarted: ['Parsing', 'Complete', 'Failed'],
  Parsing: ['Resolving', 'Failed'],
  Resolving: ['Transforming', 'Failed'],
  Transforming: ['Loading', 'Failed'],
  Loading: ['Complete', 'Failed'],
  Complete: [],
  Failed: [],
};

type MutableDataset = { -readonly [C in FileCategory]?: ParsedFile<C> };

// ============================================================================
// Orchestrator
// ============================================================================

export class PipelineOrchestrator {
  private state: PipelineState = 'NotStarted';
  private readonly listeners: PipelineListener[] = [];
  private readonly builder = new StoreBuilder();

  private readonly files: FileReadReport[] = [];
  private readonly warningCounts = emptyWarningCounts();
  private readonly dropped = { RowParseError: 0, TransformError: 0 };
  private counts: EntityTotals | null = null;

  private readonly inputDir: string;
  private readonly storePath: string;
  private readonly sourceCrs: SourceCrs;

  constructor(private readonly options: PipelineOptions) {
    this.inputDir = resolve(options.inputDir);
    this.storePath = resolve(options.storePath);
    this.sourceCrs = options.sourceCrs ?? 'EPSG:23700';
  }

  get currentState(): PipelineState {
    return this.state;
  }

  /**
   * Register a listener for transitions, warnings and dropped rows
   *
   * @returns Function that removes the listener
   */
  onEvent(listener: PipelineListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /**
   * Run the pipeline once.
   *
   * Pipeline errors end in a Failed report. Anything else is a defect and is
   * rethrown after the run is marked Failed.
   */
  async run(): Promise<RunReport> {
    if (this.state !== 'NotStarted') {
      throw new Error(`Pipeline already ran (state: ${this.state})`);
    }

    const startedAt = new Date();
    const started = performance.now();
    const finish = (failure: RunFailure | null, skipped = false): RunReport => ({
      status: failure === null ? 'Complete' : 'Failed',
      skipped,
      inputDir: this.inputDir,
      storePath: this.storePath,
      startedAt: startedAt.toISOString(),
      durationMs: performance.now() - started,
      files: this.files,
      rowsDropped: { ...this.dropped },
      warnings: { ...this.warningCounts },
      counts: this.counts,
      failure,
    });

    try {
      if (!this.options.force && (await this.storeExists())) {
        logger.info('Store already exists, skipping run', { storePath: this.storePath });
        this.transition('Complete');
        return finish(null, true);
      }

      this.transition('Parsing');
      const dataset = await this.parse();

      this.transition('Resolving');
      const resolved = this.resolve(dataset);

      this.transition('Transforming');
      const located = this.transform(resolved);

      this.transition('Loading');
      await this.load(located);

      this.transition('Complete');
      return finish(null);
    } catch (error) {
      const failedIn = this.state;
      this.transition('Failed');

      if (!(error instanceof PipelineError)) {
        throw error;
      }

      logger.error('Pipeline failed', { state: failedIn, kind: error.kind, message: error.message });
      return finish({ kind: error.kind, message: error.message, state: failedIn });
    }
  }

  // --------------------------------------------------------------------------
  // Stages
  // --------------------------------------------------------------------------

  private async parse(): Promise<ParsedDataset> {
    const discovered = await this.discoverFiles();
    const dataset: MutableDataset = {};

    for (const [category, fileName] of discovered) {
      this.readCategory(dataset, category, join(this.inputDir, fileName));
    }

    for (const category of FILE_CATEGORIES) {
      if (!discovered.has(category)) {
        this.warn({ kind: 'MissingFileWarning', category });
      }
    }

    return dataset;
  }

  /**
   * Map categories to file names. Unknown .DAT files are reported, other
   * files ignored.
   *
   * @throws SchemaError when nothing is recognised or POINTS.DAT is missing
   */
  private async discoverFiles(): Promise<Map<FileCategory, string>> {
    let entries: string[];
    try {
      entries = (await readdir(this.inputDir, { withFileTypes: true }))
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      throw new SchemaError(
        `Cannot read input directory ${this.inputDir}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const discovered = new Map<FileCategory, string>();
    for (const name of entries) {
      if (!/\.dat$/i.test(name)) {
        continue;
      }

      const category = categoryForFile(name);
      if (category === null) {
        if (this.options.strict) {
          throw new SchemaError(`${name}: no schema declared for this file`, null, name);
        }
        this.warn({ kind: 'UnknownFileWarning', file: name });
        continue;
      }

      const previous = discovered.get(category);
      if (previous !== undefined) {
        throw new SchemaError(`${name} and ${previous} both provide ${category}`, category, name);
      }
      discovered.set(category, name);
    }

    if (discovered.size === 0) {
      throw new SchemaError(`${this.inputDir}: no recognised DAT files`);
    }
    if (!discovered.has('POINTS')) {
      throw new SchemaError(`${this.inputDir}: POINTS.DAT is required`, 'POINTS');
    }

    return discovered;
  }

  private readCategory<C extends FileCategory>(
    dataset: { -readonly [K in C]?: ParsedFile<K> },
    category: C,
    filePath: string
  ): void {
    const rows: ParsedRow<RowFor<C>>[] = [];
    let rejected = 0;

    for (const outcome of readDatFile(filePath, category, { encoding: this.options.encoding })) {
      if (outcome.ok) {
        rows.push({ row: outcome.row, line: outcome.line });
        continue;
      }
      if (this.options.strict) {
        throw outcome.error;
      }
      rejected++;
      this.dropRow(outcome.error);
    }

    const parsed: ParsedFile<C> = { category, file: basename(filePath), rows };
    dataset[category] = parsed;

    const report: FileReadReport = {
      file: parsed.file,
      category,
      rowsRead: rows.length + rejected,
      rowsAccepted: rows.length,
      rowsRejected: rejected,
    };
    this.files.push(report);
    this.emit({ type: 'fileRead', report });
    logger.debug('File parsed', { ...report });
  }

  private resolve(dataset: ParsedDataset): ResolvedNetwork {
    const { network, warnings } = resolveNetwork(dataset, {
      languageId: this.options.languageId,
    });
    for (const warning of warnings) {
      this.warn(warning);
    }
    return network;
  }

  private transform(network: ResolvedNetwork): LocatedNetwork {
    const result = transformNetwork(network, {
      sourceCrs: this.sourceCrs,
      envelope: this.options.envelope ?? NATIONAL_ENVELOPE,
    });
    for (const error of result.errors) {
      this.dropRow(error);
    }
    for (const warning of result.warnings) {
      this.warn(warning);
    }
    return result.network;
  }

  /**
   * @throws StoreWriteError when the target path cannot be inspected
   */
  private async storeExists(): Promise<boolean> {
    try {
      return await fileExists(this.storePath);
    } catch (error) {
      throw new StoreWriteError(
        `Cannot inspect store path: ${error instanceof Error ? error.message : String(error)}`,
        this.storePath,
        error
      );
    }
  }

  private async load(network: LocatedNetwork): Promise<void> {
    try {
      await ensureParentDirectory(this.storePath);
    } catch (error) {
      throw new StoreWriteError(
        `Cannot create store directory: ${error instanceof Error ? error.message : String(error)}`,
        this.storePath,
        error
      );
    }
    const tempPath = temporaryPathFor(this.storePath);

    try {
      const statistics = this.builder.build(network, tempPath, { sourceCrs: this.sourceCrs });

      const validation = this.builder.validateStore(tempPath);
      if (!validation.valid) {
        throw new StoreWriteError(
          `Store failed validation: ${validation.issues.join('; ')}`,
          this.storePath
        );
      }

      await publishFile(tempPath, this.storePath);
      this.counts = statistics.totals;
      logger.info('Store published', { storePath: this.storePath, points: statistics.totals.points });
    } catch (error) {
      await discardFile(tempPath);
      if (error instanceof PipelineError) {
        throw error;
      }
      throw new StoreWriteError(
        `Cannot publish store: ${error instanceof Error ? error.message : String(error)}`,
        this.storePath,
        error
      );
    }
  }

  // --------------------------------------------------------------------------
  // Events
  // --------------------------------------------------------------------------

  private transition(to: PipelineState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid pipeline transition: ${from} -> ${to}`);
    }
    this.state = to;
    logger.debug('Pipeline state changed', { from, to });
    this.emit({ type: 'transition', from, to });
  }

  private warn(warning: PipelineWarning): void {
    this.warningCounts[warning.kind]++;
    logger.warn(describeWarning(warning));
    this.emit({ type: 'warning', warning });
  }

  private dropRow(error: RowParseError | TransformError): void {
    this.dropped[error.kind]++;
    logger.warn(error.message);
    this.emit({ type: 'rowDropped', error });
  }

  private emit(event: PipelineEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

/**
 * Run the pipeline once with the given options
 */
export async function runPipeline(
  options: PipelineOptions,
  listener?: PipelineListener
): Promise<RunReport> {
  const orchestrator = new PipelineOrchestrator(options);
  if (listener) {
    orchestrator.onEvent(listener);
  }
  return orchestrator.run();
}
