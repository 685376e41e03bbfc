/**
 * Cross-Reference Resolver
 *
 * Joins the parsed DAT files into one network in two passes:
 *
 * 1. Index: one identifier-keyed map per category (O(n)). Within one file the
 *    last row seen wins and the duplicate is reported.
 * 2. Resolve: every foreign key becomes a map lookup (O(1)). A key that
 *    resolves to nothing is stored as null and reported; it never fails the
 *    run, since published tables carry incomplete references.
 *
 * Reference value 0 means "none" in TMC tables and is not looked up. References
 * into a category whose file was not supplied are stored as null without a
 * per-row warning; the missing file is reported once by the orchestrator.
 */

import type {
  AdministrativeArea,
  CodeTables,
  DirectionFlags,
  Intersection,
  LocationType,
  NameEntry,
  Point,
  ResolvedNetwork,
  Road,
  Segment,
} from '../core/types.js';
import type { EntityKind, PipelineWarning } from '../core/warnings.js';
import type { FileCategory, RowFor } from '../schema/registry.js';
import type { ParsedDataset, ParsedFile, ParsedRow } from '../parsing/types.js';
import {
  classifyIntersection,
  classifyPoint,
  classifyRoad,
  locationTypeCode,
} from './classification.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'resolver' });

// ============================================================================
// Types
// ============================================================================

export interface ResolveOptions {
  /**
   * Preferred language (LID) for names. Falls back to the lowest LID that has
   * the name. Default: 1.
   */
  readonly languageId?: number;
}

export interface ResolutionResult {
  readonly network: ResolvedNetwork;
  readonly warnings: readonly PipelineWarning[];
}

interface TypedRow {
  readonly class: string;
  readonly tcd: number;
  readonly stcd: number;
}

interface Offsets {
  readonly negativeOffsetLcd: number | null;
  readonly positiveOffsetLcd: number | null;
}

// ============================================================================
// Public API
// ============================================================================

export function resolveNetwork(
  dataset: ParsedDataset,
  options: ResolveOptions = {}
): ResolutionResult {
  return new CrossReferenceResolver(dataset, options).resolve();
}

// ============================================================================
// Resolver
// ============================================================================

class CrossReferenceResolver {
  private readonly warnings: PipelineWarning[] = [];
  private readonly languageId: number;

  constructor(
    private readonly dataset: ParsedDataset,
    options: ResolveOptions
  ) {
    this.languageId = options.languageId ?? 1;
  }

  resolve(): ResolutionResult {
    const { dataset } = this;

    // Pass 1: identifier indexes
    const subtypeRows = this.index(dataset.SUBTYPES, (r) => `${r.class}:${r.tcd}:${r.stcd}`);
    const nameRows = this.index(dataset.NAMES, (r) => `${r.lid}:${r.nid}`);
    const areaRows = this.index(dataset.ADMINISTRATIVEAREA, (r) => r.lcd);
    const otherAreaRows = this.index(dataset.OTHERAREAS, (r) => r.lcd);
    const roadRows = this.index(dataset.ROADS, (r) => r.lcd);
    const segmentRows = this.index(dataset.SEGMENTS, (r) => r.lcd);
    const pointRows = this.index(dataset.POINTS, (r) => r.lcd);
    const soffsetRows = this.index(dataset.SOFFSETS, (r) => r.lcd);
    const poffsetRows = this.index(dataset.POFFSETS, (r) => r.lcd);
    const intersectionRows = this.index(
      dataset.INTERSECTIONS,
      (r) => `${r.lcd}:${r.int_cid}:${r.int_tabcd}:${r.int_lcd}`
    );

    const descriptions = new Map<string, string | null>();
    for (const [key, { row }] of subtypeRows) {
      descriptions.set(key, row.sdesc);
    }
    const typeOf = (row: TypedRow): LocationType => ({
      class: row.class,
      tcd: row.tcd,
      stcd: row.stcd,
      code: locationTypeCode(row.class, row.tcd, row.stcd),
      description: descriptions.get(`${row.class}:${row.tcd}:${row.stcd}`) ?? null,
    });

    const names = this.buildNameLookup(nameRows);
    const nameOf = (
      entity: EntityKind,
      lcd: number,
      field: string,
      nid: number | null
    ): string | null => {
      if (nid === null || nid === 0 || dataset.NAMES === undefined) {
        return null;
      }
      const name = names(nid);
      if (name === null) {
        this.dangling(entity, lcd, field, 'name', nid);
      }
      return name;
    };

    // Pass 2: references
    const administrativeAreas = this.resolveAreas('administrativeArea', areaRows, typeOf, nameOf);
    // Other areas hang off administrative areas
    const otherAreas = this.resolveAreas('otherArea', otherAreaRows, typeOf, nameOf).map((area) => {
      const source = otherAreaRows.get(area.lcd);
      const parentLcd = source
        ? this.reference('otherArea', area.lcd, 'POL_LCD', source.row.pol_lcd, areaRows, 'administrativeArea', 'ADMINISTRATIVEAREA')
        : null;
      return { ...area, parentLcd };
    });

    const roads = sortedValues(roadRows).map(({ row }): Road => {
      const type = typeOf(row);
      return {
        lcd: row.lcd,
        cid: row.cid,
        tabcd: row.tabcd,
        type,
        roadNumber: row.roadnumber,
        classification: classifyRoad(type),
        name: nameOf('road', row.lcd, 'RNID', row.rnid),
        startName: nameOf('road', row.lcd, 'N1ID', row.n1id),
        endName: nameOf('road', row.lcd, 'N2ID', row.n2id),
        administrativeAreaLcd: this.reference('road', row.lcd, 'POL_LCD', row.pol_lcd, areaRows, 'administrativeArea', 'ADMINISTRATIVEAREA'),
        networkLevel: row.pes_lev,
        rdid: row.rdid,
      };
    });

    const segmentOffsets = this.resolveOffsets('segment', soffsetRows, segmentRows, 'SEGMENTS');
    const segments = sortedValues(segmentRows).map(({ row }): Segment => {
      const offsets = segmentOffsets.get(row.lcd);
      return {
        lcd: row.lcd,
        cid: row.cid,
        tabcd: row.tabcd,
        type: typeOf(row),
        roadNumber: row.roadnumber,
        name: nameOf('segment', row.lcd, 'RNID', row.rnid),
        startName: nameOf('segment', row.lcd, 'N1ID', row.n1id),
        endName: nameOf('segment', row.lcd, 'N2ID', row.n2id),
        roadLcd: this.reference('segment', row.lcd, 'ROA_LCD', row.roa_lcd, roadRows, 'road', 'ROADS'),
        parentSegmentLcd: this.reference('segment', row.lcd, 'SEG_LCD', row.seg_lcd, segmentRows, 'segment', 'SEGMENTS'),
        administrativeAreaLcd: this.reference('segment', row.lcd, 'POL_LCD', row.pol_lcd, areaRows, 'administrativeArea', 'ADMINISTRATIVEAREA'),
        negativeOffsetLcd: offsets?.negativeOffsetLcd ?? null,
        positiveOffsetLcd: offsets?.positiveOffsetLcd ?? null,
      };
    });
    const segmentRoads = new Map(segments.map((segment) => [segment.lcd, segment.roadLcd]));

    const pointOffsets = this.resolveOffsets('point', poffsetRows, pointRows, 'POINTS');
    const points = sortedValues(pointRows).map(({ row }): Point => {
      const type = typeOf(row);
      const offsets = pointOffsets.get(row.lcd);
      const segmentLcd = this.reference('point', row.lcd, 'SEG_LCD', row.seg_lcd, segmentRows, 'segment', 'SEGMENTS');
      const directRoad = this.reference('point', row.lcd, 'ROA_LCD', row.roa_lcd, roadRows, 'road', 'ROADS');
      const roadLcd = isAbsent(row.roa_lcd) && segmentLcd !== null
        ? segmentRoads.get(segmentLcd) ?? null
        : directRoad;

      return {
        lcd: row.lcd,
        cid: row.cid,
        tabcd: row.tabcd,
        type,
        category: classifyPoint(type),
        junctionNumber: row.junctionnumber,
        name: nameOf('point', row.lcd, 'N1ID', row.n1id),
        secondaryName: nameOf('point', row.lcd, 'N2ID', row.n2id),
        roadName: nameOf('point', row.lcd, 'RNID', row.rnid),
        roadLcd,
        segmentLcd,
        administrativeAreaLcd: this.reference('point', row.lcd, 'POL_LCD', row.pol_lcd, areaRows, 'administrativeArea', 'ADMINISTRATIVEAREA'),
        otherAreaLcd: this.reference('point', row.lcd, 'OTH_LCD', row.oth_lcd, otherAreaRows, 'otherArea', 'OTHERAREAS'),
        urban: toBoolean(row.urban),
        interruptsRoad: row.interruptsroad,
        directions: directionsOf(row),
        negativeOffsetLcd: offsets?.negativeOffsetLcd ?? null,
        positiveOffsetLcd: offsets?.positiveOffsetLcd ?? null,
        projected: { easting: row.xcoord, northing: row.ycoord },
      };
    });

    const intersections = this.resolveIntersections(
      [...intersectionRows.values()],
      new Map(points.map((point) => [point.lcd, point]))
    );

    const network: ResolvedNetwork = {
      administrativeAreas,
      otherAreas,
      roads,
      segments,
      points,
      intersections,
      codeTables: this.codeTables(subtypeRows, nameRows),
    };

    logger.info('Cross-references resolved', {
      roads: roads.length,
      segments: segments.length,
      points: points.length,
      intersections: intersections.length,
      administrativeAreas: administrativeAreas.length,
      warnings: this.warnings.length,
    });

    return { network, warnings: this.warnings };
  }

  // --------------------------------------------------------------------------
  // Pass 1
  // --------------------------------------------------------------------------

  /**
   * Index the rows of one file by key. Last row seen wins.
   */
  private index<C extends FileCategory, K extends string | number>(
    parsed: ParsedFile<C> | undefined,
    keyOf: (row: RowFor<C>) => K
  ): Map<K, ParsedRow<RowFor<C>>> {
    const indexed = new Map<K, ParsedRow<RowFor<C>>>();
    if (parsed === undefined) {
      return indexed;
    }

    for (const entry of parsed.rows) {
      const key = keyOf(entry.row);
      const previous = indexed.get(key);
      if (previous !== undefined) {
        this.warnings.push({
          kind: 'DuplicateIdentifierWarning',
          file: parsed.file,
          id: String(key),
          line: entry.line,
          previousLine: previous.line,
        });
        // Re-insert so iteration order follows the winning row
        indexed.delete(key);
      }
      indexed.set(key, entry);
    }
    return indexed;
  }

  /**
   * Name lookup by NID: preferred language first, then the lowest LID
   */
  private buildNameLookup(
    nameRows: ReadonlyMap<string, ParsedRow<RowFor<'NAMES'>>>
  ): (nid: number) => string | null {
    const byNid = new Map<number, Map<number, string>>();
    for (const { row } of nameRows.values()) {
      let languages = byNid.get(row.nid);
      if (languages === undefined) {
        languages = new Map();
        byNid.set(row.nid, languages);
      }
      languages.set(row.lid, row.name);
    }

    return (nid) => {
      const languages = byNid.get(nid);
      if (languages === undefined) {
        return null;
      }
      const preferred = languages.get(this.languageId);
      if (preferred !== undefined) {
        return preferred;
      }
      const [lowest] = [...languages.keys()].sort((a, b) => a - b);
      return lowest === undefined ? null : languages.get(lowest) ?? null;
    };
  }

  // --------------------------------------------------------------------------
  // Pass 2
  // --------------------------------------------------------------------------

  /**
   * Resolve one foreign key against an index.
   *
   * @returns The referenced location code, or null when absent or dangling
   */
  private reference(
    entity: EntityKind,
    lcd: number,
    field: string,
    value: number | null,
    target: ReadonlyMap<number, unknown>,
    targetKind: EntityKind,
    targetCategory: FileCategory
  ): number | null {
    if (isAbsent(value) || this.dataset[targetCategory] === undefined) {
      return null;
    }
    if (!target.has(value)) {
      this.dangling(entity, lcd, field, targetKind, value);
      return null;
    }
    return value;
  }

  private dangling(
    entity: EntityKind,
    lcd: number,
    field: string,
    target: EntityKind,
    missingId: number
  ): void {
    this.warnings.push({
      kind: 'DanglingReferenceWarning',
      entity,
      lcd,
      field,
      target,
      missingId,
    });
  }

  private resolveAreas(
    entity: 'administrativeArea' | 'otherArea',
    rows: ReadonlyMap<number, ParsedRow<RowFor<'ADMINISTRATIVEAREA'>>>,
    typeOf: (row: TypedRow) => LocationType,
    nameOf: (entity: EntityKind, lcd: number, field: string, nid: number | null) => string | null
  ): AdministrativeArea[] {
    return sortedValues(rows).map(({ row }) => ({
      lcd: row.lcd,
      cid: row.cid,
      tabcd: row.tabcd,
      type: typeOf(row),
      name: nameOf(entity, row.lcd, 'NID', row.nid),
      parentLcd:
        entity === 'administrativeArea'
          ? this.reference(entity, row.lcd, 'POL_LCD', row.pol_lcd, rows, 'administrativeArea', 'ADMINISTRATIVEAREA')
          : null,
    }));
  }

  private resolveOffsets(
    entity: 'segment' | 'point',
    offsetRows: ReadonlyMap<number, ParsedRow<RowFor<'POFFSETS'>>>,
    owners: ReadonlyMap<number, unknown>,
    ownerCategory: FileCategory
  ): Map<number, Offsets> {
    const offsets = new Map<number, Offsets>();
    for (const { row } of offsetRows.values()) {
      if (!owners.has(row.lcd)) {
        this.dangling(entity, row.lcd, 'LCD', entity, row.lcd);
        continue;
      }
      offsets.set(row.lcd, {
        negativeOffsetLcd: this.reference(entity, row.lcd, 'NEG_OFF_LCD', row.neg_off_lcd, owners, entity, ownerCategory),
        positiveOffsetLcd: this.reference(entity, row.lcd, 'POS_OFF_LCD', row.pos_off_lcd, owners, entity, ownerCategory),
      });
    }
    return offsets;
  }

  private resolveIntersections(
    rows: readonly ParsedRow<RowFor<'INTERSECTIONS'>>[],
    points: ReadonlyMap<number, Point>
  ): Intersection[] {
    const connections = new Map<number, Set<number>>();

    for (const { row } of rows) {
      if (!points.has(row.lcd)) {
        this.dangling('intersection', row.lcd, 'LCD', 'point', row.lcd);
        continue;
      }
      let connected = connections.get(row.lcd);
      if (connected === undefined) {
        connected = new Set();
        connections.set(row.lcd, connected);
      }
      if (row.int_cid !== row.cid || row.int_tabcd !== row.tabcd || !points.has(row.int_lcd)) {
        this.dangling('intersection', row.lcd, 'INT_LCD', 'point', row.int_lcd);
        continue;
      }
      connected.add(row.int_lcd);
    }

    return [...connections.keys()]
      .sort((a, b) => a - b)
      .flatMap((lcd) => {
        const point = points.get(lcd);
        if (point === undefined) {
          return [];
        }
        const pointLcds = [...(connections.get(lcd) ?? [])].sort((a, b) => a - b);
        const roads = new Set<number>();
        for (const member of [lcd, ...pointLcds]) {
          const roadLcd = points.get(member)?.roadLcd;
          if (roadLcd !== null && roadLcd !== undefined) {
            roads.add(roadLcd);
          }
        }
        return [
          {
            lcd,
            type: classifyIntersection(point.type),
            pointLcds,
            roadLcds: [...roads].sort((a, b) => a - b),
          },
        ];
      });
  }

  private codeTables(
    subtypeRows: ReadonlyMap<string, ParsedRow<RowFor<'SUBTYPES'>>>,
    nameRows: ReadonlyMap<string, ParsedRow<RowFor<'NAMES'>>>
  ): CodeTables {
    const countryRows = this.index(this.dataset.COUNTRIES, (r) => r.cid);
    const typeRows = this.index(this.dataset.TYPES, (r) => `${r.class}:${r.tcd}`);

    return {
      countries: sortedValues(countryRows).map(({ row }) => ({
        cid: row.cid,
        ecc: row.ecc,
        ccd: row.ccd,
        name: row.cname,
      })),
      types: [...typeRows.values()].map(({ row }) => ({
        class: row.class,
        tcd: row.tcd,
        stcd: null,
        description: row.tdesc,
        nationalCode: row.tnatcode,
        nationalDescription: row.tnatdesc,
      })),
      subtypes: [...subtypeRows.values()].map(({ row }) => ({
        class: row.class,
        tcd: row.tcd,
        stcd: row.stcd,
        description: row.sdesc,
        nationalCode: row.snatcode,
        nationalDescription: row.snatdesc,
      })),
      names: [...nameRows.values()].map(
        ({ row }): NameEntry => ({
          cid: row.cid,
          lid: row.lid,
          nid: row.nid,
          name: row.name,
          comment: row.ncomment,
          officialName: row.officialname,
        })
      ),
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isAbsent(value: number | null): value is null | 0 {
  return value === null || value === 0;
}

function sortedValues<T>(map: ReadonlyMap<number, T>): T[] {
  return [...map.entries()].sort(([a], [b]) => a - b).map(([, value]) => value);
}

function toBoolean(flag: number | null): boolean | null {
  return flag === null ? null : flag === 1;
}

function directionsOf(row: RowFor<'POINTS'>): DirectionFlags {
  return {
    inPos: toBoolean(row.inpos),
    inNeg: toBoolean(row.inneg),
    outPos: toBoolean(row.outpos),
    outNeg: toBoolean(row.outneg),
    presentPos: toBoolean(row.presentpos),
    presentNeg: toBoolean(row.presentneg),
  };
}
