/**
 * Parsed dataset: the valid rows of every DAT file that was read
 */

import type { FileCategory, RowFor } from '../schema/registry.js';

export interface ParsedRow<T> {
  readonly row: T;
  /** 1-based line number in the source file */
  readonly line: number;
}

export interface ParsedFile<C extends FileCategory> {
  readonly category: C;
  readonly file: string;
  readonly rows: readonly ParsedRow<RowFor<C>>[];
}

export type ParsedDataset = {
  readonly [C in FileCategory]?: ParsedFile<C>;
};
