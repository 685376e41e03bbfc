/**
 * Run report
 */

import type { PipelineErrorKind } from '../core/errors.js';
import type { WarningKind } from '../core/warnings.js';
import type { EntityTotals } from '../persistence/types.js';
import type { FileCategory } from '../schema/registry.js';

export type PipelineState =
  | 'NotStarted'
  | 'Parsing'
  | 'Resolving'
  | 'Transforming'
  | 'Loading'
  | 'Complete'
  | 'Failed';

export type RunStatus = 'Complete' | 'Failed';

export interface FileReadReport {
  readonly file: string;
  readonly category: FileCategory;
  /** Data rows, header excluded */
  readonly rowsRead: number;
  readonly rowsAccepted: number;
  readonly rowsRejected: number;
}

export interface RunFailure {
  readonly kind: PipelineErrorKind;
  readonly message: string;
  /** Stage the run was in when it failed */
  readonly state: PipelineState;
}

export interface RunReport {
  readonly status: RunStatus;
  /** The target already existed and nothing was rebuilt */
  readonly skipped: boolean;
  readonly inputDir: string;
  readonly storePath: string;
  readonly startedAt: string;
  readonly durationMs: number;
  readonly files: readonly FileReadReport[];
  readonly rowsDropped: Readonly<Record<'RowParseError' | 'TransformError', number>>;
  readonly warnings: Readonly<Record<WarningKind, number>>;
  /** Entity counts written to the store; null unless a store was built */
  readonly counts: EntityTotals | null;
  readonly failure: RunFailure | null;
}

export function emptyWarningCounts(): Record<WarningKind, number> {
  return {
    DanglingReferenceWarning: 0,
    DuplicateIdentifierWarning: 0,
    CoordinateRangeWarning: 0,
    UnknownFileWarning: 0,
    MissingFileWarning: 0,
  };
}

/**
 * Multi-line human summary of a report
 */
export function getSummary(report: RunReport): string {
  if (report.skipped) {
    return `Store ${report.storePath} already exists, nothing to do (use --force to rebuild)`;
  }

  const lines: string[] = [];
  const seconds = (report.durationMs / 1000).toFixed(1);
  lines.push(`${report.status === 'Complete' ? 'Build complete' : 'Build failed'} in ${seconds}s`);

  if (report.failure !== null) {
    lines.push(`  ${report.failure.kind} during ${report.failure.state}: ${report.failure.message}`);
  }

  for (const file of report.files) {
    const rejected = file.rowsRejected > 0 ? ` (${file.rowsRejected} rejected)` : '';
    lines.push(`  ${file.file}: ${file.rowsAccepted}/${file.rowsRead} rows${rejected}`);
  }

  const dropped = Object.entries(report.rowsDropped).filter(([, count]) => count > 0);
  for (const [kind, count] of dropped) {
    lines.push(`  dropped: ${count} x ${kind}`);
  }

  const warnings = Object.entries(report.warnings).filter(([, count]) => count > 0);
  for (const [kind, count] of warnings) {
    lines.push(`  warning: ${count} x ${kind}`);
  }

  if (report.counts !== null) {
    const { roads, segments, points, intersections } = report.counts;
    lines.push(
      `  stored: ${points} points, ${roads} roads, ${segments} segments, ${intersections} intersections -> ${report.storePath}`
    );
  }

  return lines.join('\n');
}
