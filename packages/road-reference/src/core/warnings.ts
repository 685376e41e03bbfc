/**
 * Non-fatal findings
 *
 * Warnings are collected, logged and counted in the run report. They never
 * abort a run.
 */

export type EntityKind =
  | 'road'
  | 'segment'
  | 'point'
  | 'intersection'
  | 'administrativeArea'
  | 'otherArea'
  | 'name';

/**
 * A foreign key that points at nothing. The relationship is stored as null.
 */
export interface DanglingReferenceWarning {
  readonly kind: 'DanglingReferenceWarning';
  readonly entity: EntityKind;
  readonly lcd: number;
  readonly field: string;
  readonly target: EntityKind;
  readonly missingId: number;
}

/**
 * The same identifier twice in one file. The last row seen wins.
 */
export interface DuplicateIdentifierWarning {
  readonly kind: 'DuplicateIdentifierWarning';
  readonly file: string;
  readonly id: string;
  readonly line: number;
  readonly previousLine: number;
}

/**
 * A transformed coordinate outside the national envelope. Still persisted,
 * with its out-of-envelope flag set.
 */
export interface CoordinateRangeWarning {
  readonly kind: 'CoordinateRangeWarning';
  readonly lcd: number;
  readonly lon: number;
  readonly lat: number;
}

/**
 * A .DAT file no schema is declared for
 */
export interface UnknownFileWarning {
  readonly kind: 'UnknownFileWarning';
  readonly file: string;
}

/**
 * An optional category with no file in the input directory
 */
export interface MissingFileWarning {
  readonly kind: 'MissingFileWarning';
  readonly category: string;
}

export type PipelineWarning =
  | DanglingReferenceWarning
  | DuplicateIdentifierWarning
  | CoordinateRangeWarning
  | UnknownFileWarning
  | MissingFileWarning;

export type WarningKind = PipelineWarning['kind'];

/**
 * One-line description for logs and the CLI trace
 */
export function describeWarning(warning: PipelineWarning): string {
  switch (warning.kind) {
    case 'DanglingReferenceWarning':
      return `${warning.entity} ${warning.lcd}: ${warning.field} -> ${warning.target} ${warning.missingId} not found`;
    case 'DuplicateIdentifierWarning':
      return `${warning.file}:${warning.line}: duplicate id ${warning.id} (first seen on line ${warning.previousLine}), keeping the later row`;
    case 'CoordinateRangeWarning':
      return `point ${warning.lcd}: (${warning.lon.toFixed(6)}, ${warning.lat.toFixed(6)}) is outside the national envelope`;
    case 'UnknownFileWarning':
      return `${warning.file}: no schema declared, file ignored`;
    case 'MissingFileWarning':
      return `${warning.category}: no file in input directory`;
  }
}
