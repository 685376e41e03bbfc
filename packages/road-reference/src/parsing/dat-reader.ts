/**
 * DAT Record Parser
 *
 * Reads one DAT file of a declared category and yields typed rows.
 *
 * - The first non-blank line is the header; columns are resolved by name
 * - Each line is decoded on its own with the declared encoding, so one bad
 *   byte sequence costs one row, not the file
 * - Cells are split with csv-parse on ';' and coerced per semantic type
 *
 * The returned iterable is lazy and restartable: nothing is read until it is
 * iterated, and every iteration re-reads the file from the start.
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { RowParseError, SchemaError } from '../core/errors.js';
import { coerceField } from '../schema/coercion.js';
import {
  conformsTo,
  schemaFor,
  validateHeader,
  type FileCategory,
  type RowFor,
  type SchemaFor,
} from '../schema/registry.js';
import type { DatEncoding, FieldValue } from '../schema/types.js';

// ============================================================================
// Types
// ============================================================================

export type ParseOutcome<T> =
  | { readonly ok: true; readonly row: T; readonly line: number }
  | { readonly ok: false; readonly error: RowParseError };

export interface DatReadOptions {
  /** Overrides the encoding the schema declares */
  readonly encoding?: DatEncoding;
}

const CellMatrix = z.array(z.array(z.string()));

// ============================================================================
// Public API
// ============================================================================

/**
 * Lazily parse a DAT file.
 *
 * @param filePath - Path to the DAT file
 * @param category - Declared category of the file
 * @throws SchemaError (during iteration) when the header is missing or lacks
 *   a required column
 */
export function readDatFile<C extends FileCategory>(
  filePath: string,
  category: C,
  options: DatReadOptions = {}
): Iterable<ParseOutcome<RowFor<C>>> {
  return {
    [Symbol.iterator]: () => parseDatFile(filePath, category, options),
  };
}

// ============================================================================
// Implementation
// ============================================================================

function* parseDatFile<C extends FileCategory>(
  filePath: string,
  category: C,
  options: DatReadOptions
): Generator<ParseOutcome<RowFor<C>>, void, undefined> {
  const schema = schemaFor(category);
  const file = basename(filePath);
  const decoder = new TextDecoder(options.encoding ?? schema.encoding, { fatal: true });

  let columns: ReadonlyMap<string, number> | null = null;
  let lineNumber = 0;

  for (const bytes of splitLines(readFileSync(filePath))) {
    lineNumber++;

    let text: string;
    try {
      text = decoder.decode(bytes);
    } catch {
      const error = new RowParseError(file, lineNumber, `cannot decode line as ${decoder.encoding}`);
      if (columns === null) {
        throw new SchemaError(`${file}: header is not valid ${decoder.encoding}`, category, file);
      }
      yield { ok: false, error };
      continue;
    }

    if (text.trim() === '') {
      continue;
    }

    let cells: string[];
    try {
      cells = splitCells(text);
    } catch (error) {
      if (columns === null) {
        throw new SchemaError(`${file}: header cannot be split`, category, file);
      }
      yield {
        ok: false,
        error: new RowParseError(file, lineNumber, error instanceof Error ? error.message : String(error)),
      };
      continue;
    }

    if (columns === null) {
      columns = validateHeader(category, cells, file);
      continue;
    }

    const record: Record<string, FieldValue> = {};
    let failure: RowParseError | null = null;

    for (const field of schema.fields) {
      const index = columns.get(field.name);
      const result = coerceField(field, index === undefined ? undefined : cells[index]);
      if (!result.ok) {
        failure = new RowParseError(file, lineNumber, result.reason, field.name.toUpperCase());
        break;
      }
      record[field.name] = result.value;
    }

    if (failure !== null) {
      yield { ok: false, error: failure };
    } else if (conformsTo<SchemaFor<C>['fields']>(schema.fields, record)) {
      yield { ok: true, row: record, line: lineNumber };
    } else {
      yield { ok: false, error: new RowParseError(file, lineNumber, 'row does not match schema') };
    }
  }

  if (columns === null) {
    throw new SchemaError(`${file}: no header row`, category, file);
  }
}

/**
 * Split a buffer on LF, dropping a CR before it. A final line without a
 * terminator is kept.
 */
function* splitLines(buffer: Buffer): Generator<Buffer, void, undefined> {
  let start = 0;
  while (start < buffer.length) {
    let end = buffer.indexOf(0x0a, start);
    const next = end === -1 ? buffer.length : end + 1;
    if (end === -1) end = buffer.length;
    if (end > start && buffer[end - 1] === 0x0d) end--;
    yield buffer.subarray(start, end);
    start = next;
  }
}

function splitCells(line: string): string[] {
  const rows = CellMatrix.parse(
    parse(line, {
      delimiter: ';',
      bom: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
    })
  );
  return rows[0] ?? [];
}
