import { describe, it, expect } from 'vitest';
import { emptyWarningCounts, getSummary, type RunReport } from '../../../pipeline/report.js';

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    status: 'Complete',
    skipped: false,
    inputDir: '/data/tmc',
    storePath: '/out/roads.sqlite',
    startedAt: '2026-03-01T10:00:00.000Z',
    durationMs: 1234,
    files: [],
    rowsDropped: { RowParseError: 0, TransformError: 0 },
    warnings: emptyWarningCounts(),
    counts: null,
    failure: null,
    ...overrides,
  };
}

describe('getSummary', () => {
  it('should summarise a completed run', () => {
    const summary = getSummary(
      report({
        files: [{ file: 'POINTS.DAT', category: 'POINTS', rowsRead: 3, rowsAccepted: 2, rowsRejected: 1 }],
        rowsDropped: { RowParseError: 1, TransformError: 0 },
        warnings: { ...emptyWarningCounts(), MissingFileWarning: 22 },
        counts: {
          roads: 0,
          segments: 0,
          points: 2,
          intersections: 0,
          administrativeAreas: 0,
          otherAreas: 0,
          names: 0,
        },
      })
    );

    expect(summary.split('\n')).toEqual([
      'Build complete in 1.2s',
      '  POINTS.DAT: 2/3 rows (1 rejected)',
      '  dropped: 1 x RowParseError',
      '  warning: 22 x MissingFileWarning',
      '  stored: 2 points, 0 roads, 0 segments, 0 intersections -> /out/roads.sqlite',
    ]);
  });

  it('should name the failure and the stage', () => {
    const summary = getSummary(
      report({
        status: 'Failed',
        durationMs: 50,
        failure: { kind: 'SchemaError', message: '/data/tmc: no recognised DAT files', state: 'Parsing' },
      })
    );

    expect(summary).toBe(
      'Build failed in 0.1s\n  SchemaError during Parsing: /data/tmc: no recognised DAT files'
    );
  });

  it('should explain a skipped run', () => {
    expect(getSummary(report({ skipped: true }))).toBe(
      'Store /out/roads.sqlite already exists, nothing to do (use --force to rebuild)'
    );
  });
});
