/**
 * Cross-Reference Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveNetwork } from '../../../resolution/resolver.js';
import {
  SAMPLE_DIR,
  intersectionRow,
  loadDataset,
  nameRow,
  parsedFile,
  pointRow,
  roadRow,
  segmentRow,
} from '../../helpers/fixtures.js';

describe('resolveNetwork', () => {
  describe('sample table', () => {
    const { network, warnings } = resolveNetwork(loadDataset(SAMPLE_DIR));
    const point = (lcd: number) => network.points.find((p) => p.lcd === lcd);

    it('should resolve without warnings', () => {
      expect(warnings).toEqual([]);
    });

    it('should classify roads by subtype', () => {
      expect(network.roads.map((road) => [road.lcd, road.roadNumber, road.classification])).toEqual([
        [100, 'M1', 'motorway'],
        [101, 'M5', 'motorway'],
        [102, '6', 'first-class'],
        [103, '8102', 'third-class'],
      ]);
    });

    it('should resolve road names and areas', () => {
      const [m1] = network.roads;
      expect(m1?.name).toBeNull();
      expect(m1?.startName).toBe('Budapest');
      expect(m1?.endName).toBe('Győr');
      expect(m1?.administrativeAreaLcd).toBe(1);
      expect(network.roads[2]?.name).toBe('Budapest');
    });

    it('should link administrative areas to their parents', () => {
      expect(network.administrativeAreas.map((area) => [area.lcd, area.name, area.parentLcd])).toEqual([
        [1, 'Magyarország', null],
        [10, 'Pest', 1],
      ]);
    });

    it('should link segments to roads and parent segments', () => {
      expect(network.segments.map((s) => [s.lcd, s.roadLcd, s.parentSegmentLcd])).toEqual([
        [200, 100, null],
        [201, 101, null],
        [202, 101, 201],
      ]);
    });

    it('should carry the location type with its subtype description', () => {
      expect(point(1000)?.type).toEqual({
        class: 'P',
        tcd: 1,
        stcd: 3,
        code: 'P1.3',
        description: 'motorway intersection',
      });
    });

    it('should categorise points', () => {
      expect(network.points.map((p) => [p.lcd, p.category])).toEqual([
        [1000, 'junction'],
        [1001, 'junction'],
        [1002, 'service'],
        [1003, 'infrastructure'],
        [1004, 'junction'],
      ]);
    });

    it('should take the road of a point from its segment when ROA_LCD is 0', () => {
      expect(point(1002)?.segmentLcd).toBe(202);
      expect(point(1002)?.roadLcd).toBe(101);
    });

    it('should fall back to the lowest language id for names', () => {
      expect(point(1003)?.name).toBe('Tiszaug bridge');
      expect(point(1004)?.name).toBe('Debrecen kör');
    });

    it('should attach point offsets', () => {
      expect(point(1000)).toMatchObject({ negativeOffsetLcd: null, positiveOffsetLcd: 1001 });
      expect(point(1001)).toMatchObject({ negativeOffsetLcd: 1000, positiveOffsetLcd: null });
    });

    it('should map direction and urban flags to booleans', () => {
      expect(point(1001)?.urban).toBe(true);
      expect(point(1000)?.urban).toBe(false);
      expect(point(1003)?.urban).toBeNull();
      expect(point(1003)?.directions.inPos).toBeNull();
      expect(point(1004)?.directions.presentNeg).toBe(true);
    });

    it('should group intersections with their points and roads', () => {
      expect(network.intersections).toEqual([
        { lcd: 1003, type: 'other', pointLcds: [1004], roadLcds: [102] },
        { lcd: 1004, type: 'roundabout', pointLcds: [1000, 1003], roadLcds: [100, 102] },
      ]);
    });

    it('should build the code tables', () => {
      expect(network.codeTables.countries).toEqual([
        { cid: 36, ecc: 'E0', ccd: '5', name: 'Magyarország' },
      ]);
      expect(network.codeTables.subtypes).toHaveLength(7);
      expect(network.codeTables.types).toEqual([]);
      expect(network.codeTables.names).toHaveLength(11);
    });
  });

  it('should prefer the configured language', () => {
    const { network } = resolveNetwork(loadDataset(SAMPLE_DIR), { languageId: 2 });
    const names = new Map(network.points.map((p) => [p.lcd, p.name]));
    expect(names.get(1004)).toBe('Debrecen roundabout');
    expect(names.get(1000)).toBe('Budaörs');
  });

  it('should store a dangling reference as null and report it', () => {
    const { network, warnings } = resolveNetwork({
      ROADS: parsedFile('ROADS', [roadRow(10)]),
      POINTS: parsedFile('POINTS', [pointRow(1, { roa_lcd: 99 })]),
    });

    expect(network.points[0]?.roadLcd).toBeNull();
    expect(warnings).toEqual([
      {
        kind: 'DanglingReferenceWarning',
        entity: 'point',
        lcd: 1,
        field: 'ROA_LCD',
        target: 'road',
        missingId: 99,
      },
    ]);
  });

  it('should not report references into a category that was not supplied', () => {
    const { network, warnings } = resolveNetwork({
      POINTS: parsedFile('POINTS', [pointRow(1, { roa_lcd: 99, pol_lcd: 5, n1id: 7 })]),
    });

    expect(warnings).toEqual([]);
    expect(network.points[0]).toMatchObject({ roadLcd: null, administrativeAreaLcd: null, name: null });
  });

  it('should report a name id with no name', () => {
    const { warnings } = resolveNetwork({
      NAMES: parsedFile('NAMES', [nameRow(1, 1, 'Vác')]),
      POINTS: parsedFile('POINTS', [pointRow(1, { n1id: 5 })]),
    });

    expect(warnings).toEqual([
      {
        kind: 'DanglingReferenceWarning',
        entity: 'point',
        lcd: 1,
        field: 'N1ID',
        target: 'name',
        missingId: 5,
      },
    ]);
  });

  it('should keep the last of duplicate rows', () => {
    const { network, warnings } = resolveNetwork({
      POINTS: parsedFile('POINTS', [pointRow(5, { xcoord: 1 }), pointRow(5, { xcoord: 2 })]),
    });

    expect(network.points).toHaveLength(1);
    expect(network.points[0]?.projected.easting).toBe(2);
    expect(warnings).toEqual([
      { kind: 'DuplicateIdentifierWarning', file: 'POINTS.DAT', id: '5', line: 3, previousLine: 2 },
    ]);
  });

  it('should prefer an explicit road over the segment road', () => {
    const { network } = resolveNetwork({
      ROADS: parsedFile('ROADS', [roadRow(10), roadRow(11)]),
      SEGMENTS: parsedFile('SEGMENTS', [segmentRow(20, { roa_lcd: 10 })]),
      POINTS: parsedFile('POINTS', [
        pointRow(1, { seg_lcd: 20 }),
        pointRow(2, { seg_lcd: 20, roa_lcd: 11 }),
      ]),
    });

    expect(network.points.map((p) => p.roadLcd)).toEqual([10, 11]);
  });

  it('should sort entities by location code', () => {
    const { network } = resolveNetwork({
      POINTS: parsedFile('POINTS', [pointRow(3), pointRow(1), pointRow(2)]),
    });

    expect(network.points.map((p) => p.lcd)).toEqual([1, 2, 3]);
  });

  it('should treat an intersection member of another table as dangling', () => {
    const { network, warnings } = resolveNetwork({
      POINTS: parsedFile('POINTS', [pointRow(1), pointRow(2)]),
      INTERSECTIONS: parsedFile('INTERSECTIONS', [intersectionRow(1, 2, { int_cid: 40 })]),
    });

    expect(network.intersections).toEqual([{ lcd: 1, type: 'other', pointLcds: [], roadLcds: [] }]);
    expect(warnings).toEqual([
      {
        kind: 'DanglingReferenceWarning',
        entity: 'intersection',
        lcd: 1,
        field: 'INT_LCD',
        target: 'point',
        missingId: 2,
      },
    ]);
  });

  it('should drop an intersection whose junction point is unknown', () => {
    const { network, warnings } = resolveNetwork({
      POINTS: parsedFile('POINTS', [pointRow(1)]),
      INTERSECTIONS: parsedFile('INTERSECTIONS', [intersectionRow(3, 1)]),
    });

    expect(network.intersections).toEqual([]);
    expect(warnings).toEqual([
      {
        kind: 'DanglingReferenceWarning',
        entity: 'intersection',
        lcd: 3,
        field: 'LCD',
        target: 'point',
        missingId: 3,
      },
    ]);
  });
});
