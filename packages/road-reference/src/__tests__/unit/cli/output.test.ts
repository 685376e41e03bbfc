import { describe, it, expect } from 'vitest';
import { RowParseError } from '../../../core/errors.js';
import { createProgressReporter, formatJson, formatTable } from '../../../cli/lib/output.js';

describe('formatTable', () => {
  const columns = [
    { key: 'code', header: 'Type' },
    { key: 'count', header: 'Count', align: 'right' },
  ] as const;

  it('should pad columns to the widest cell', () => {
    const table = formatTable(
      [
        { code: 'P1.3', count: 2 },
        { code: 'P3.14', count: 10 },
      ],
      columns
    );

    expect(table.split('\n')).toEqual(['Type  | Count', '------+------', 'P1.3  |     2', 'P3.14 |    10']);
  });

  it('should say so when there are no rows', () => {
    expect(formatTable<{ code: string; count: number }>([], columns)).toBe('No entries found.');
  });
});

describe('formatJson', () => {
  it('should indent by default', () => {
    expect(formatJson({ a: 1 })).toBe('{\n  "a": 1\n}');
    expect(formatJson({ a: 1 }, false)).toBe('{"a":1}');
  });
});

describe('createProgressReporter', () => {
  const events = [
    { type: 'transition', from: 'NotStarted', to: 'Parsing' },
    {
      type: 'fileRead',
      report: { file: 'POINTS.DAT', category: 'POINTS', rowsRead: 3, rowsAccepted: 2, rowsRejected: 1 },
    },
    { type: 'rowDropped', error: new RowParseError('POINTS.DAT', 3, "expected a decimal number (got 'abc')", 'XCOORD') },
    { type: 'warning', warning: { kind: 'MissingFileWarning', category: 'NAMES' } },
    { type: 'transition', from: 'Loading', to: 'Complete' },
  ] as const;

  it('should print stages and files', () => {
    const lines: string[] = [];
    const report = createProgressReporter({ write: (line) => lines.push(line) });
    events.forEach(report);

    expect(lines).toEqual(['Parsing DAT files...', '  POINTS.DAT: 2 rows, 1 rejected']);
  });

  it('should add warnings and dropped rows when verbose', () => {
    const lines: string[] = [];
    const report = createProgressReporter({ verbose: true, write: (line) => lines.push(line) });
    events.forEach(report);

    expect(lines).toEqual([
      'Parsing DAT files...',
      '  POINTS.DAT: 2 rows, 1 rejected',
      "  dropped: POINTS.DAT:3: field 'XCOORD' expected a decimal number (got 'abc')",
      '  warning: NAMES: no file in input directory',
    ]);
  });
});
