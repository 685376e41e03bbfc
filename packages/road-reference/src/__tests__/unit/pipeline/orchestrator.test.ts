/**
 * Pipeline Orchestrator Tests
 *
 * End-to-end runs over temp directories with a real SQLite store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { fileExists } from '../../../core/utils/atomic-write.js';
import {
  PipelineOrchestrator,
  runPipeline,
  type PipelineEvent,
} from '../../../pipeline/orchestrator.js';
import { StoreBuilder, validateStore } from '../../../persistence/store-builder.js';
import { SAMPLE_DIR, createTempDir, removeTempDir, writeDatFiles } from '../../helpers/fixtures.js';

const THREE_POINTS = [
  'CID;TABCD;LCD;CLASS;TCD;STCD;XCOORD;YCOORD',
  '36;1;1;P;1;3;650000;200000',
  '36;1;2;P;1;3;abc;200000',
  '36;1;3;P;1;3;650000;240000',
];

describe('PipelineOrchestrator', () => {
  let dir: string;
  let inputDir: string;
  let storePath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    inputDir = join(dir, 'input');
    storePath = join(dir, 'out', 'roads.sqlite');
    await mkdir(inputDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('should persist valid rows and drop the malformed one', async () => {
    await writeDatFiles(inputDir, { 'POINTS.DAT': THREE_POINTS });

    const report = await runPipeline({ inputDir, storePath });

    expect(report.status).toBe('Complete');
    expect(report.failure).toBeNull();
    expect(report.files).toEqual([
      { file: 'POINTS.DAT', category: 'POINTS', rowsRead: 3, rowsAccepted: 2, rowsRejected: 1 },
    ]);
    expect(report.rowsDropped).toEqual({ RowParseError: 1, TransformError: 0 });
    expect(report.counts?.points).toBe(2);
    expect(report.warnings.MissingFileWarning).toBe(22);
    expect(validateStore(storePath).pointCount).toBe(2);
  });

  it('should load the sample table with every relationship intact', async () => {
    const report = await runPipeline({ inputDir: SAMPLE_DIR, storePath });

    expect(report.status).toBe('Complete');
    expect(report.files).toHaveLength(9);
    expect(report.counts).toEqual({
      roads: 4,
      segments: 3,
      points: 5,
      intersections: 2,
      administrativeAreas: 2,
      otherAreas: 0,
      names: 11,
    });
    expect(report.warnings).toEqual({
      DanglingReferenceWarning: 0,
      DuplicateIdentifierWarning: 0,
      CoordinateRangeWarning: 0,
      UnknownFileWarning: 0,
      MissingFileWarning: 14,
    });

    const db = new Database(storePath, { readonly: true });
    try {
      const orphans = db
        .prepare<[], { n: number }>(`
          SELECT
            (SELECT COUNT(*) FROM points WHERE road_lcd IS NOT NULL AND road_lcd NOT IN (SELECT lcd FROM roads))
            + (SELECT COUNT(*) FROM segments WHERE road_lcd IS NOT NULL AND road_lcd NOT IN (SELECT lcd FROM roads))
            + (SELECT COUNT(*) FROM intersection_points WHERE point_lcd NOT IN (SELECT lcd FROM points))
            AS n
        `)
        .get();
      expect(orphans?.n).toBe(0);
    } finally {
      db.close();
    }

    // Only the published store remains; the temporary file was renamed
    expect(await readdir(join(dir, 'out'))).toEqual(['roads.sqlite']);
  });

  it('should emit state transitions in order', async () => {
    const orchestrator = new PipelineOrchestrator({ inputDir: SAMPLE_DIR, storePath });
    const transitions: string[] = [];
    orchestrator.onEvent((event: PipelineEvent) => {
      if (event.type === 'transition') {
        transitions.push(`${event.from}->${event.to}`);
      }
    });

    await orchestrator.run();

    expect(transitions).toEqual([
      'NotStarted->Parsing',
      'Parsing->Resolving',
      'Resolving->Transforming',
      'Transforming->Loading',
      'Loading->Complete',
    ]);
    expect(orchestrator.currentState).toBe('Complete');
    await expect(orchestrator.run()).rejects.toThrow('Pipeline already ran (state: Complete)');
  });

  it('should stop notifying a removed listener', async () => {
    const orchestrator = new PipelineOrchestrator({ inputDir: SAMPLE_DIR, storePath });
    const events: PipelineEvent[] = [];
    const unsubscribe = orchestrator.onEvent((event) => events.push(event));
    unsubscribe();

    await orchestrator.run();

    expect(events).toEqual([]);
  });

  it('should fail with SchemaError on an empty directory and write nothing', async () => {
    const report = await runPipeline({ inputDir, storePath });

    expect(report.status).toBe('Failed');
    expect(report.failure).toEqual({
      kind: 'SchemaError',
      message: `${inputDir}: no recognised DAT files`,
      state: 'Parsing',
    });
    expect(report.counts).toBeNull();
    expect(await fileExists(storePath)).toBe(false);
  });

  it('should require POINTS.DAT', async () => {
    await writeDatFiles(inputDir, { 'CLASSES.DAT': ['CLASS;CLASSDESC', 'P;Point'] });

    const report = await runPipeline({ inputDir, storePath });

    expect(report.failure?.message).toBe(`${inputDir}: POINTS.DAT is required`);
  });

  it('should skip a run when the store exists and rebuild it with force', async () => {
    const first = await runPipeline({ inputDir: SAMPLE_DIR, storePath });
    const second = await runPipeline({ inputDir: SAMPLE_DIR, storePath });
    const forced = await runPipeline({ inputDir: SAMPLE_DIR, storePath, force: true });

    expect(second.status).toBe('Complete');
    expect(second.skipped).toBe(true);
    expect(second.files).toEqual([]);
    expect(second.counts).toBeNull();

    expect(forced.skipped).toBe(false);
    expect(forced.counts).toEqual(first.counts);
    expect(validateStore(storePath).valid).toBe(true);
  });

  it('should leave a published store untouched when a rebuild fails', async () => {
    await runPipeline({ inputDir: SAMPLE_DIR, storePath });
    await writeDatFiles(inputDir, { 'POINTS.DAT': ['CID;TABCD;LCD;CLASS;TCD;STCD', '36;1;1;P;1;3'] });

    const report = await runPipeline({ inputDir, storePath, force: true });

    expect(report.status).toBe('Failed');
    expect(report.failure?.kind).toBe('SchemaError');
    expect(validateStore(storePath).pointCount).toBe(5);
  });

  it('should roll back a load that fails validation and keep the published store', async () => {
    await runPipeline({ inputDir: SAMPLE_DIR, storePath });
    const published = await readFile(storePath);
    vi.spyOn(StoreBuilder.prototype, 'validateStore').mockReturnValue({
      valid: false,
      pointCount: 5,
      indexedPointCount: 4,
      integrity: 'ok',
      issues: ['points table has 5 rows but points_rtree has 4'],
    });

    const report = await runPipeline({ inputDir: SAMPLE_DIR, storePath, force: true });

    expect(report.status).toBe('Failed');
    expect(report.failure).toEqual({
      kind: 'StoreWriteError',
      message: 'Store failed validation: points table has 5 rows but points_rtree has 4',
      state: 'Loading',
    });
    expect(report.counts).toBeNull();
    expect(await readdir(join(dir, 'out'))).toEqual(['roads.sqlite']);
    expect((await readFile(storePath)).equals(published)).toBe(true);
  });

  describe('unusable store path', () => {
    let blockedPath: string;

    beforeEach(async () => {
      await writeFile(join(dir, 'blocker'), '');
      blockedPath = join(dir, 'blocker', 'roads.sqlite');
    });

    it('should fail before parsing when the store path cannot be inspected', async () => {
      const orchestrator = new PipelineOrchestrator({ inputDir: SAMPLE_DIR, storePath: blockedPath });

      const report = await orchestrator.run();

      expect(orchestrator.currentState).toBe('Failed');
      expect(report.status).toBe('Failed');
      expect(report.failure?.kind).toBe('StoreWriteError');
      expect(report.failure?.state).toBe('NotStarted');
      expect(report.failure?.message).toMatch(/^Cannot inspect store path: ENOTDIR/);
    });

    it('should fail in Loading when the store directory cannot be created', async () => {
      const report = await runPipeline({ inputDir: SAMPLE_DIR, storePath: blockedPath, force: true });

      expect(report.status).toBe('Failed');
      expect(report.failure?.kind).toBe('StoreWriteError');
      expect(report.failure?.state).toBe('Loading');
      expect(report.failure?.message).toMatch(/^Cannot create store directory: /);
    });
  });

  describe('strict mode', () => {
    it('should fail on the first malformed row', async () => {
      await writeDatFiles(inputDir, { 'POINTS.DAT': THREE_POINTS });

      const report = await runPipeline({ inputDir, storePath, strict: true });

      expect(report.status).toBe('Failed');
      expect(report.failure).toEqual({
        kind: 'RowParseError',
        message: "POINTS.DAT:3: field 'XCOORD' expected a decimal number (got 'abc')",
        state: 'Parsing',
      });
      expect(await fileExists(storePath)).toBe(false);
    });

    it('should fail on an unknown DAT file', async () => {
      await writeDatFiles(inputDir, { 'POINTS.DAT': THREE_POINTS.slice(0, 2), 'WEATHER.DAT': ['X', '1'] });

      const report = await runPipeline({ inputDir, storePath, strict: true });

      expect(report.failure?.message).toBe('WEATHER.DAT: no schema declared for this file');
    });
  });

  it('should warn about unknown DAT files and ignore other files', async () => {
    await writeDatFiles(inputDir, { 'POINTS.DAT': THREE_POINTS.slice(0, 2), 'WEATHER.DAT': ['X', '1'] });
    await writeFile(join(inputDir, 'README.txt'), 'sample export\n');

    const report = await runPipeline({ inputDir, storePath });

    expect(report.status).toBe('Complete');
    expect(report.warnings.UnknownFileWarning).toBe(1);
    expect(report.files.map((file) => file.file)).toEqual(['POINTS.DAT']);
  });
});

