/**
 * DAT Record Parser Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RowParseError, SchemaError } from '../../../core/errors.js';
import { readDatFile } from '../../../parsing/dat-reader.js';
import {
  SAMPLE_DIR,
  createTempDir,
  removeTempDir,
  writeDatFiles,
} from '../../helpers/fixtures.js';

describe('readDatFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should yield typed rows with their line numbers', () => {
    const outcomes = [...readDatFile(join(SAMPLE_DIR, 'POINTS.DAT'), 'POINTS')];
    expect(outcomes).toHaveLength(5);

    const [first] = outcomes;
    expect(first?.ok).toBe(true);
    if (first?.ok) {
      expect(first.line).toBe(2);
      expect(first.row.lcd).toBe(1000);
      expect(first.row.class).toBe('P');
      expect(first.row.junctionnumber).toBe('1');
      expect(first.row.n1id).toBe(203);
      expect(first.row.roa_lcd).toBe(100);
      expect(first.row.urban).toBe(0);
      expect(first.row.inpos).toBe(1);
      expect(first.row.jnid).toBeNull();
      expect(first.row.xcoord).toBe(650000);
      expect(first.row.ycoord).toBe(240000);
    }
  });

  it('should drop a malformed row and keep reading', async () => {
    await writeDatFiles(dir, {
      'POFFSETS.DAT': [
        'CID;TABCD;LCD;NEG_OFF_LCD;POS_OFF_LCD',
        '36;1;1000;0;1001',
        '36;1;abc;0;0',
        '',
        '36;1;1002;;',
      ],
    });

    const outcomes = [...readDatFile(join(dir, 'POFFSETS.DAT'), 'POFFSETS')];
    expect(outcomes).toHaveLength(3);

    const [valid, invalid, last] = outcomes;
    expect(valid).toEqual({
      ok: true,
      line: 2,
      row: { cid: 36, tabcd: 1, lcd: 1000, neg_off_lcd: 0, pos_off_lcd: 1001 },
    });

    expect(invalid?.ok).toBe(false);
    if (invalid !== undefined && !invalid.ok) {
      expect(invalid.error).toBeInstanceOf(RowParseError);
      expect(invalid.error.file).toBe('POFFSETS.DAT');
      expect(invalid.error.line).toBe(3);
      expect(invalid.error.field).toBe('LCD');
      expect(invalid.error.message).toBe("POFFSETS.DAT:3: field 'LCD' expected an integer (got 'abc')");
    }

    expect(last).toEqual({
      ok: true,
      line: 5,
      row: { cid: 36, tabcd: 1, lcd: 1002, neg_off_lcd: null, pos_off_lcd: null },
    });
  });

  it('should keep a delimiter inside a quoted cell', async () => {
    await writeDatFiles(dir, {
      'NAMES.DAT': ['CID;LID;NID;NAME', '36;1;202;"Győr; Nord"'],
    });

    const [outcome] = [...readDatFile(join(dir, 'NAMES.DAT'), 'NAMES')];
    expect(outcome).toEqual({
      ok: true,
      line: 2,
      row: { cid: 36, lid: 1, nid: 202, name: 'Győr; Nord', ncomment: null, officialname: null },
    });
  });

  it('should decode a declared single-byte encoding', async () => {
    const path = join(dir, 'NAMES.DAT');
    await writeFile(
      path,
      Buffer.concat([
        Buffer.from('CID;LID;NID;NAME\r\n36;1;202;Gy', 'latin1'),
        Buffer.from([0xf5]),
        Buffer.from('r\r\n', 'latin1'),
      ])
    );

    const [decoded] = [...readDatFile(path, 'NAMES', { encoding: 'windows-1250' })];
    expect(decoded?.ok && decoded.row.name).toBe('Győr');

    const [undecodable] = [...readDatFile(path, 'NAMES')];
    expect(undecodable?.ok).toBe(false);
    if (undecodable !== undefined && !undecodable.ok) {
      expect(undecodable.error.message).toBe('NAMES.DAT:2: cannot decode line as utf-8');
    }
  });

  it('should throw SchemaError when a required column is missing', async () => {
    await writeDatFiles(dir, { 'POFFSETS.DAT': ['CID;LCD', '36;1000'] });

    expect(() => [...readDatFile(join(dir, 'POFFSETS.DAT'), 'POFFSETS')]).toThrow(SchemaError);
  });

  it('should throw SchemaError for a file without a header', async () => {
    await writeDatFiles(dir, { 'POFFSETS.DAT': ['', '  '] });

    expect(() => [...readDatFile(join(dir, 'POFFSETS.DAT'), 'POFFSETS')]).toThrow(
      'POFFSETS.DAT: no header row'
    );
  });

  it('should read nothing until iterated, and re-read on every iteration', async () => {
    const path = join(dir, 'CLASSES.DAT');
    const reader = readDatFile(path, 'CLASSES');

    await writeDatFiles(dir, { 'CLASSES.DAT': ['CLASS;CLASSDESC', 'P;Point'] });
    expect([...reader]).toHaveLength(1);

    await writeDatFiles(dir, { 'CLASSES.DAT': ['CLASS;CLASSDESC', 'P;Point', 'L;Line'] });
    expect([...reader]).toHaveLength(2);
  });
});
