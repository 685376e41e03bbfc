/**
 * Shared test fixtures: the sample location table, temp directories and row
 * builders for hand-made datasets.
 */

import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readDatFile } from '../../parsing/dat-reader.js';
import type { ParsedFile, ParsedRow } from '../../parsing/types.js';
import { FILE_CATEGORIES, type FileCategory, type RowFor } from '../../schema/registry.js';

/** Nine-file sample table: 4 roads, 3 segments, 5 points, 2 intersections */
export const SAMPLE_DIR = fileURLToPath(new URL('../fixtures/tmc-sample/', import.meta.url));

type MutableDataset = { -readonly [C in FileCategory]?: ParsedFile<C> };

export async function createTempDir(prefix = 'road-reference-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write DAT files (CRLF line endings, as exported tables use)
 */
export async function writeDatFiles(
  dir: string,
  files: Readonly<Record<string, readonly string[]>>
): Promise<void> {
  for (const [name, lines] of Object.entries(files)) {
    await writeFile(join(dir, name), lines.map((line) => `${line}\r\n`).join(''), 'utf-8');
  }
}

/**
 * Parse every DAT file of a directory, keeping only valid rows
 */
export function loadDataset(dir: string): MutableDataset {
  const dataset: MutableDataset = {};
  for (const category of FILE_CATEGORIES) {
    const path = join(dir, `${category}.DAT`);
    if (existsSync(path)) {
      readInto(dataset, category, path);
    }
  }
  return dataset;
}

function readInto<C extends FileCategory>(dataset: { -readonly [K in C]?: ParsedFile<K> }, category: C, path: string): void {
  const rows: ParsedRow<RowFor<C>>[] = [];
  for (const outcome of readDatFile(path, category)) {
    if (outcome.ok) {
      rows.push({ row: outcome.row, line: outcome.line });
    }
  }
  dataset[category] = { category, file: `${category}.DAT`, rows };
}

/**
 * Wrap rows as a parsed file; row n sits on line n + 1 (after the header)
 */
export function parsedFile<C extends FileCategory>(
  category: C,
  rows: readonly RowFor<C>[]
): ParsedFile<C> {
  return {
    category,
    file: `${category}.DAT`,
    rows: rows.map((row, index) => ({ row, line: index + 2 })),
  };
}

// ============================================================================
// Row Builders
// ============================================================================

export function pointRow(lcd: number, overrides: Partial<RowFor<'POINTS'>> = {}): RowFor<'POINTS'> {
  return {
    cid: 36,
    tabcd: 1,
    lcd,
    class: 'P',
    tcd: 1,
    stcd: 3,
    junctionnumber: null,
    rnid: null,
    n1id: null,
    n2id: null,
    pol_lcd: null,
    oth_lcd: null,
    seg_lcd: null,
    roa_lcd: null,
    inpos: null,
    inneg: null,
    outpos: null,
    outneg: null,
    presentpos: null,
    presentneg: null,
    diversionpos: null,
    diversionneg: null,
    xcoord: 650000,
    ycoord: 200000,
    interruptsroad: null,
    urban: null,
    jnid: null,
    ...overrides,
  };
}

export function roadRow(lcd: number, overrides: Partial<RowFor<'ROADS'>> = {}): RowFor<'ROADS'> {
  return {
    cid: 36,
    tabcd: 1,
    lcd,
    class: 'L',
    tcd: 1,
    stcd: 1,
    roadnumber: null,
    rnid: null,
    n1id: null,
    n2id: null,
    pol_lcd: null,
    pes_lev: null,
    rdid: null,
    ...overrides,
  };
}

export function segmentRow(
  lcd: number,
  overrides: Partial<RowFor<'SEGMENTS'>> = {}
): RowFor<'SEGMENTS'> {
  return {
    cid: 36,
    tabcd: 1,
    lcd,
    class: 'L',
    tcd: 3,
    stcd: 0,
    roadnumber: null,
    rnid: null,
    n1id: null,
    n2id: null,
    roa_lcd: null,
    seg_lcd: null,
    pol_lcd: null,
    rdid: null,
    ...overrides,
  };
}

export function nameRow(lid: number, nid: number, name: string): RowFor<'NAMES'> {
  return { cid: 36, lid, nid, name, ncomment: null, officialname: null };
}

export function intersectionRow(
  lcd: number,
  intLcd: number,
  overrides: Partial<RowFor<'INTERSECTIONS'>> = {}
): RowFor<'INTERSECTIONS'> {
  return { cid: 36, tabcd: 1, lcd, int_cid: 36, int_tabcd: 1, int_lcd: intLcd, ...overrides };
}
