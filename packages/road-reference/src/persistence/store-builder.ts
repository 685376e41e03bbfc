/**
 * Load & Index Builder
 *
 * Writes a located network into a fresh SQLite database:
 *
 * - Entity tables (roads, segments, points, intersections, areas) and code
 *   tables, all inserted in one transaction
 * - R-tree virtual tables over point positions and road extents
 * - Secondary indexes for road number, classification, point type and name
 * - Cached statistics and run metadata
 *
 * The caller owns the path: the orchestrator builds into a temporary file and
 * publishes it by rename.
 */

import Database from 'better-sqlite3';
import * as turf from '@turf/turf';
import { StoreWriteError, errorMessage } from '../core/errors.js';
import type {
  BoundingBox,
  LocatedNetwork,
  LocatedPoint,
  PointCategory,
  Road,
  RoadClassification,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { SourceCrs } from '../transformation/eov.js';
import { STORE_DDL, STORE_FORMAT_VERSION, STORE_INDEXES } from './schema.js';
import type {
  PointTypeCount,
  StoreMetadata,
  StoreStatistics,
  StoreValidationResult,
} from './types.js';

const logger = createLogger({ module: 'store-builder' });

export interface StoreBuildOptions {
  readonly sourceCrs: SourceCrs;
  /** Defaults to now */
  readonly builtAt?: Date;
}

type Extent = readonly [minLon: number, minLat: number, maxLon: number, maxLat: number];

const flag = (value: boolean | null): number | null => (value === null ? null : value ? 1 : 0);

/**
 * SQLite store builder
 */
export class StoreBuilder {
  /**
   * Build the store at `dbPath`. The file must not exist yet.
   *
   * @returns Statistics written to the store
   * @throws StoreWriteError on any SQLite failure
   */
  build(network: LocatedNetwork, dbPath: string, options: StoreBuildOptions): StoreStatistics {
    logger.info('Building road reference store', {
      points: network.points.length,
      roads: network.roads.length,
      outputPath: dbPath,
    });

    const db = openStore(dbPath);

    try {
      db.exec(STORE_DDL);

      const extents = this.roadExtents(network);
      const statistics = computeStatistics(network);
      const metadata: StoreMetadata = {
        formatVersion: STORE_FORMAT_VERSION,
        sourceCrs: options.sourceCrs,
        builtAt: (options.builtAt ?? new Date()).toISOString(),
        pointCount: network.points.length,
      };

      db.transaction(() => {
        this.insertCodeTables(db, network);
        this.insertAreas(db, network);
        this.insertRoads(db, network.roads, extents);
        this.insertSegments(db, network);
        this.insertPoints(db, network.points);
        this.insertIntersections(db, network);
        this.insertStatistics(db, statistics);
        this.insertMetadata(db, metadata);
      })();

      db.exec(STORE_INDEXES);
      db.exec('ANALYZE');

      logger.info('Store build complete', {
        dbPath,
        points: statistics.totals.points,
        indexedRoads: extents.size,
      });
      return statistics;
    } catch (error) {
      throw new StoreWriteError(`Cannot build store: ${errorMessage(error)}`, dbPath, error);
    } finally {
      db.close();
    }
  }

  // --------------------------------------------------------------------------
  // Inserts
  // --------------------------------------------------------------------------

  private insertCodeTables(db: Database.Database, network: LocatedNetwork): void {
    const { countries, types, subtypes, names } = network.codeTables;

    const insertCountry = db.prepare<[number, string | null, string | null, string]>(
      'INSERT OR REPLACE INTO countries (cid, ecc, ccd, name) VALUES (?, ?, ?, ?)'
    );
    for (const country of countries) {
      insertCountry.run(country.cid, country.ecc, country.ccd, country.name);
    }

    const insertType = db.prepare<[string, number, number | null, string | null, string | null, string | null]>(`
      INSERT INTO location_types (class, tcd, stcd, description, national_code, national_description)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    for (const entry of [...types, ...subtypes]) {
      insertType.run(entry.class, entry.tcd, entry.stcd, entry.description, entry.nationalCode, entry.nationalDescription);
    }

    const insertName = db.prepare<[number, number, number, string, string | null, string | null]>(`
      INSERT OR REPLACE INTO names (cid, lid, nid, name, comment, official_name)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    for (const name of names) {
      insertName.run(name.cid, name.lid, name.nid, name.name, name.comment, name.officialName);
    }
  }

  private insertAreas(db: Database.Database, network: LocatedNetwork): void {
    for (const [table, areas] of [
      ['administrative_areas', network.administrativeAreas],
      ['other_areas', network.otherAreas],
    ] as const) {
      const insert = db.prepare<[number, number, number, string, string | null, string | null, number | null]>(`
        INSERT INTO ${table} (lcd, cid, tabcd, type_code, type_description, name, parent_lcd)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      for (const area of areas) {
        insert.run(area.lcd, area.cid, area.tabcd, area.type.code, area.type.description, area.name, area.parentLcd);
      }
    }
  }

  private insertRoads(
    db: Database.Database,
    roads: readonly Road[],
    extents: ReadonlyMap<number, Extent>
  ): void {
    const insertRoad = db.prepare<
      [number, number, number, string, string | null, string | null, RoadClassification, string | null,
        string | null, string | null, number | null, string | null, string | null,
        number | null, number | null, number | null, number | null]
    >(`
      INSERT INTO roads (
        lcd, cid, tabcd, type_code, type_description, road_number, classification, name,
        start_name, end_name, administrative_area_lcd, network_level, rdid,
        min_lon, min_lat, max_lon, max_lat
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertRTree = db.prepare<[number, number, number, number, number]>(
      'INSERT INTO roads_rtree (id, min_lon, max_lon, min_lat, max_lat) VALUES (?, ?, ?, ?, ?)'
    );

    for (const road of roads) {
      const extent = extents.get(road.lcd);
      insertRoad.run(
        road.lcd,
        road.cid,
        road.tabcd,
        road.type.code,
        road.type.description,
        road.roadNumber,
        road.classification,
        road.name,
        road.startName,
        road.endName,
        road.administrativeAreaLcd,
        road.networkLevel,
        road.rdid,
        extent?.[0] ?? null,
        extent?.[1] ?? null,
        extent?.[2] ?? null,
        extent?.[3] ?? null
      );
      if (extent !== undefined) {
        insertRTree.run(road.lcd, extent[0], extent[2], extent[1], extent[3]);
      }
    }
  }

  private insertSegments(db: Database.Database, network: LocatedNetwork): void {
    const insert = db.prepare<
      [number, number, number, string, string | null, string | null, string | null, string | null,
        string | null, number | null, number | null, number | null, number | null, number | null]
    >(`
      INSERT INTO segments (
        lcd, cid, tabcd, type_code, type_description, road_number, name, start_name, end_name,
        road_lcd, parent_segment_lcd, administrative_area_lcd, negative_offset_lcd, positive_offset_lcd
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    for (const s of network.segments) {
      insert.run(
        s.lcd, s.cid, s.tabcd, s.type.code, s.type.description, s.roadNumber, s.name, s.startName, s.endName,
        s.roadLcd, s.parentSegmentLcd, s.administrativeAreaLcd, s.negativeOffsetLcd, s.positiveOffsetLcd
      );
    }
  }

  private insertPoints(db: Database.Database, points: readonly LocatedPoint[]): void {
    const insertPoint = db.prepare<[PointRecord]>(`
      INSERT INTO points (
        lcd, cid, tabcd, type_code, type_description, category, junction_number, name,
        secondary_name, road_name, road_lcd, segment_lcd, administrative_area_lcd, other_area_lcd,
        urban, interrupts_road, in_pos, in_neg, out_pos, out_neg, present_pos, present_neg,
        negative_offset_lcd, positive_offset_lcd, easting, northing, lon, lat, out_of_envelope
      ) VALUES (
        @lcd, @cid, @tabcd, @type_code, @type_description, @category, @junction_number, @name,
        @secondary_name, @road_name, @road_lcd, @segment_lcd, @administrative_area_lcd, @other_area_lcd,
        @urban, @interrupts_road, @in_pos, @in_neg, @out_pos, @out_neg, @present_pos, @present_neg,
        @negative_offset_lcd, @positive_offset_lcd, @easting, @northing, @lon, @lat, @out_of_envelope
      )
    `);
    // A point is a degenerate box
    const insertRTree = db.prepare<[number, number, number, number, number]>(
      'INSERT INTO points_rtree (id, min_lon, max_lon, min_lat, max_lat) VALUES (?, ?, ?, ?, ?)'
    );

    for (const point of points) {
      insertPoint.run(toPointRecord(point));
      const { lon, lat } = point.geographic;
      insertRTree.run(point.lcd, lon, lon, lat, lat);
    }

    logger.debug('Points inserted', { count: points.length });
  }

  private insertIntersections(db: Database.Database, network: LocatedNetwork): void {
    const insertIntersection = db.prepare<[number, string]>(
      'INSERT INTO intersections (lcd, type) VALUES (?, ?)'
    );
    const insertPoint = db.prepare<[number, number]>(
      'INSERT INTO intersection_points (intersection_lcd, point_lcd) VALUES (?, ?)'
    );
    const insertRoad = db.prepare<[number, number]>(
      'INSERT INTO intersection_roads (intersection_lcd, road_lcd) VALUES (?, ?)'
    );

    for (const intersection of network.intersections) {
      insertIntersection.run(intersection.lcd, intersection.type);
      for (const pointLcd of intersection.pointLcds) {
        insertPoint.run(intersection.lcd, pointLcd);
      }
      for (const roadLcd of intersection.roadLcds) {
        insertRoad.run(intersection.lcd, roadLcd);
      }
    }
  }

  private insertStatistics(db: Database.Database, statistics: StoreStatistics): void {
    const insert = db.prepare<[string, string]>('INSERT INTO statistics (key, value) VALUES (?, ?)');
    for (const [key, value] of Object.entries(statistics)) {
      insert.run(key, JSON.stringify(value));
    }
  }

  private insertMetadata(db: Database.Database, metadata: StoreMetadata): void {
    const insert = db.prepare<[string, string]>('INSERT INTO metadata (key, value) VALUES (?, ?)');
    insert.run('format_version', String(metadata.formatVersion));
    insert.run('source_crs', metadata.sourceCrs);
    insert.run('built_at', metadata.builtAt);
    insert.run('point_count', String(metadata.pointCount));
  }

  // --------------------------------------------------------------------------
  // Extents
  // --------------------------------------------------------------------------

  /**
   * Bounding box of each road's points. Roads without points have none.
   */
  private roadExtents(network: LocatedNetwork): Map<number, Extent> {
    const positions = new Map<number, number[][]>();
    for (const point of network.points) {
      if (point.roadLcd === null) {
        continue;
      }
      const list = positions.get(point.roadLcd) ?? [];
      list.push([point.geographic.lon, point.geographic.lat]);
      positions.set(point.roadLcd, list);
    }

    const extents = new Map<number, Extent>();
    for (const [roadLcd, coordinates] of positions) {
      const [minLon, minLat, maxLon, maxLat] = turf.bbox(turf.multiPoint(coordinates));
      extents.set(roadLcd, [minLon, minLat, maxLon, maxLat]);
    }
    return extents;
  }

  // --------------------------------------------------------------------------
  // Validation
  // --------------------------------------------------------------------------

  /**
   * Check a built store: every point is indexed and SQLite reports no
   * corruption.
   */
  validateStore(dbPath: string): StoreValidationResult {
    const db = new Database(dbPath, { readonly: true, fileMustExist: true });

    try {
      const pointCount = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM points').get()?.count ?? 0;
      const indexedPointCount =
        db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM points_rtree').get()?.count ?? 0;
      const integrity =
        db.prepare<[], { integrity_check: string }>('PRAGMA integrity_check').get()?.integrity_check ?? 'no result';

      const issues: string[] = [];
      if (pointCount !== indexedPointCount) {
        issues.push(`points table has ${pointCount} rows but points_rtree has ${indexedPointCount}`);
      }
      if (integrity !== 'ok') {
        issues.push(`integrity check failed: ${integrity}`);
      }

      if (issues.length > 0) {
        logger.error('Store validation failed', { dbPath, issues });
      } else {
        logger.info('Store validation passed', { dbPath, pointCount });
      }

      return { valid: issues.length === 0, pointCount, indexedPointCount, integrity, issues };
    } finally {
      db.close();
    }
  }
}

function openStore(dbPath: string): Database.Database {
  try {
    return new Database(dbPath);
  } catch (error) {
    throw new StoreWriteError(`Cannot open store: ${errorMessage(error)}`, dbPath, error);
  }
}

/**
 * Validate a store file without keeping a builder around
 */
export function validateStore(dbPath: string): StoreValidationResult {
  return new StoreBuilder().validateStore(dbPath);
}

// ============================================================================
// Records & Statistics
// ============================================================================

interface PointRecord {
  readonly lcd: number;
  readonly cid: number;
  readonly tabcd: number;
  readonly type_code: string;
  readonly type_description: string | null;
  readonly category: PointCategory;
  readonly junction_number: string | null;
  readonly name: string | null;
  readonly secondary_name: string | null;
  readonly road_name: string | null;
  readonly road_lcd: number | null;
  readonly segment_lcd: number | null;
  readonly administrative_area_lcd: number | null;
  readonly other_area_lcd: number | null;
  readonly urban: number | null;
  readonly interrupts_road: string | null;
  readonly in_pos: number | null;
  readonly in_neg: number | null;
  readonly out_pos: number | null;
  readonly out_neg: number | null;
  readonly present_pos: number | null;
  readonly present_neg: number | null;
  readonly negative_offset_lcd: number | null;
  readonly positive_offset_lcd: number | null;
  readonly easting: number;
  readonly northing: number;
  readonly lon: number;
  readonly lat: number;
  readonly out_of_envelope: number;
}

function toPointRecord(point: LocatedPoint): PointRecord {
  return {
    lcd: point.lcd,
    cid: point.cid,
    tabcd: point.tabcd,
    type_code: point.type.code,
    type_description: point.type.description,
    category: point.category,
    junction_number: point.junctionNumber,
    name: point.name,
    secondary_name: point.secondaryName,
    road_name: point.roadName,
    road_lcd: point.roadLcd,
    segment_lcd: point.segmentLcd,
    administrative_area_lcd: point.administrativeAreaLcd,
    other_area_lcd: point.otherAreaLcd,
    urban: flag(point.urban),
    interrupts_road: point.interruptsRoad,
    in_pos: flag(point.directions.inPos),
    in_neg: flag(point.directions.inNeg),
    out_pos: flag(point.directions.outPos),
    out_neg: flag(point.directions.outNeg),
    present_pos: flag(point.directions.presentPos),
    present_neg: flag(point.directions.presentNeg),
    negative_offset_lcd: point.negativeOffsetLcd,
    positive_offset_lcd: point.positiveOffsetLcd,
    easting: point.projected.easting,
    northing: point.projected.northing,
    lon: point.geographic.lon,
    lat: point.geographic.lat,
    out_of_envelope: point.outOfEnvelope ? 1 : 0,
  };
}

export function computeStatistics(network: LocatedNetwork): StoreStatistics {
  const roadClassifications: Record<RoadClassification, number> = {
    motorway: 0,
    'first-class': 0,
    'second-class': 0,
    'third-class': 0,
    other: 0,
  };
  for (const road of network.roads) {
    roadClassifications[road.classification]++;
  }

  const pointCategories: Record<PointCategory, number> = {
    junction: 0,
    infrastructure: 0,
    service: 0,
    other: 0,
  };
  const types = new Map<string, { description: string | null; count: number }>();
  let outOfEnvelope = 0;

  for (const point of network.points) {
    pointCategories[point.category]++;
    const entry = types.get(point.type.code) ?? { description: point.type.description, count: 0 };
    entry.count++;
    types.set(point.type.code, entry);
    if (point.outOfEnvelope) {
      outOfEnvelope++;
    }
  }

  const pointTypes: PointTypeCount[] = [...types.entries()]
    .map(([code, { description, count }]) => ({ code, description, count }))
    .sort((a, b) => b.count - a.count || a.code.localeCompare(b.code));

  let bbox: BoundingBox | null = null;
  if (network.points.length > 0) {
    const [west, south, east, north] = turf.bbox(
      turf.multiPoint(network.points.map((point) => [point.geographic.lon, point.geographic.lat]))
    );
    bbox = { west, south, east, north };
  }

  return {
    totals: {
      roads: network.roads.length,
      segments: network.segments.length,
      points: network.points.length,
      intersections: network.intersections.length,
      administrativeAreas: network.administrativeAreas.length,
      otherAreas: network.otherAreas.length,
      names: network.codeTables.names.length,
    },
    roadClassifications,
    pointCategories,
    pointTypes,
    outOfEnvelope,
    bbox,
    center: bbox === null ? null : { lon: (bbox.west + bbox.east) / 2, lat: (bbox.south + bbox.north) / 2 },
  };
}
