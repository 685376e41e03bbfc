/**
 * Output Formatting for CLI Commands
 *
 * Tables and JSON for command results, and the human-readable progress
 * trace the build command prints while the pipeline runs.
 *
 * @module cli/lib/output
 */

import { describeWarning } from '../../core/warnings.js';
import type { PipelineListener } from '../../pipeline/orchestrator.js';
import type { PipelineState } from '../../pipeline/report.js';

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: T[keyof T & string]) => string;
}

/**
 * Format rows as a plain-text table
 */
export function formatTable<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cell = (row: T, column: TableColumn<T>): string => {
    const value = row[column.key];
    return column.formatter ? column.formatter(value) : String(value ?? '');
  };

  const widths = columns.map((column) =>
    Math.max(column.header.length, ...data.map((row) => cell(row, column).length))
  );

  const pad = (value: string, index: number, align: 'left' | 'right' = 'left'): string => {
    const width = widths[index] ?? value.length;
    return align === 'right' ? value.padStart(width) : value.padEnd(width);
  };

  const headerRow = columns.map((column, i) => pad(column.header, i, column.align)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const rows = data.map((row) =>
    columns.map((column, i) => pad(cell(row, column), i, column.align)).join(' | ')
  );

  return [headerRow, separator, ...rows].map((line) => line.trimEnd()).join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

// ============================================================================
// Progress Trace
// ============================================================================

export interface ProgressReporterOptions {
  /** Print every warning and dropped row, not only counts */
  readonly verbose?: boolean;
  /** Defaults to console.log */
  readonly write?: (line: string) => void;
}

const STAGE_LABELS: Partial<Record<PipelineState, string>> = {
  Parsing: 'Parsing DAT files...',
  Resolving: 'Resolving cross-references...',
  Transforming: 'Transforming coordinates...',
  Loading: 'Loading store and building indexes...',
};

/**
 * Pipeline listener that prints one line per stage and file, plus every
 * warning and dropped row in verbose mode
 */
export function createProgressReporter(options: ProgressReporterOptions = {}): PipelineListener {
  const write = options.write ?? ((line: string) => console.log(line));

  return (event) => {
    switch (event.type) {
      case 'transition': {
        const label = STAGE_LABELS[event.to];
        if (label !== undefined) {
          write(label);
        }
        break;
      }
      case 'fileRead': {
        const { file, rowsAccepted, rowsRejected } = event.report;
        const rejected = rowsRejected > 0 ? `, ${rowsRejected} rejected` : '';
        write(`  ${file}: ${rowsAccepted} rows${rejected}`);
        break;
      }
      case 'warning':
        if (options.verbose) {
          write(`  warning: ${describeWarning(event.warning)}`);
        }
        break;
      case 'rowDropped':
        if (options.verbose) {
          write(`  dropped: ${event.error.message}`);
        }
        break;
    }
  };
}
