/**
 * Road Network Store
 *
 * Read-only query API over a published store. Viewport queries go through
 * the R-tree tables and are then checked against the exact coordinates,
 * since R-tree boxes are stored as rounded-outward 32-bit floats.
 */

import Database from 'better-sqlite3';
import * as turf from '@turf/turf';
import type { Feature, FeatureCollection, Point as GeoJsonPoint } from 'geojson';
import { z } from 'zod';
import type {
  BoundingBox,
  PointCategory,
  RoadClassification,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { STORE_FORMAT_VERSION } from '../persistence/schema.js';
import type { StoreMetadata, StoreStatistics } from '../persistence/types.js';
import {
  assertBoundingBox,
  assertClassifications,
  assertLimit,
  assertSearchText,
  assertTypeCodes,
  RoadClassificationSchema,
} from './input-validator.js';

const logger = createLogger({ module: 'store' });

const DEFAULT_ROAD_LIMIT = 5000;
const DEFAULT_POINT_LIMIT = 10_000;
const DEFAULT_SEARCH_LIMIT = 50;
const TOP_POINT_TYPES = 20;

// ============================================================================
// Types
// ============================================================================

export interface RoadFeature {
  readonly lcd: number;
  readonly roadNumber: string | null;
  readonly classification: RoadClassification;
  readonly typeCode: string;
  readonly typeDescription: string | null;
  readonly name: string | null;
  readonly startName: string | null;
  readonly endName: string | null;
  /** Extent of the road's points; null for a road without points */
  readonly extent: BoundingBox | null;
}

export interface RoadDetails extends RoadFeature {
  readonly cid: number;
  readonly tabcd: number;
  readonly networkLevel: string | null;
  readonly administrativeAreaLcd: number | null;
  readonly administrativeAreaName: string | null;
  readonly segmentCount: number;
  readonly pointCount: number;
}

export interface PointFeature {
  readonly lcd: number;
  readonly lon: number;
  readonly lat: number;
  readonly typeCode: string;
  readonly typeDescription: string | null;
  readonly category: PointCategory;
  readonly name: string | null;
  readonly junctionNumber: string | null;
  readonly roadLcd: number | null;
  readonly urban: boolean | null;
  readonly outOfEnvelope: boolean;
}

export type PointProperties = Omit<PointFeature, 'lon' | 'lat'>;

export interface SearchResult {
  readonly kind: 'point' | 'road';
  readonly lcd: number;
  readonly name: string;
  readonly typeCode: string;
  readonly typeDescription: string | null;
  /** Point position, or centre of a road's extent */
  readonly lon: number | null;
  readonly lat: number | null;
}

export interface Motorway {
  readonly roadNumber: string;
  readonly roads: number;
  readonly segments: number;
}

export interface RoadQueryOptions {
  readonly classifications?: readonly RoadClassification[];
  readonly limit?: number;
}

export interface PointQueryOptions {
  readonly typeCodes?: readonly string[];
  readonly limit?: number;
}

export class StoreReadError extends Error {
  constructor(message: string, public readonly storePath: string) {
    super(message);
    this.name = 'StoreReadError';
  }
}

// ============================================================================
// Rows
// ============================================================================

interface RoadRow {
  readonly lcd: number;
  readonly road_number: string | null;
  readonly classification: string;
  readonly type_code: string;
  readonly type_description: string | null;
  readonly name: string | null;
  readonly start_name: string | null;
  readonly end_name: string | null;
  readonly min_lon: number | null;
  readonly min_lat: number | null;
  readonly max_lon: number | null;
  readonly max_lat: number | null;
}

interface RoadDetailsRow extends RoadRow {
  readonly cid: number;
  readonly tabcd: number;
  readonly network_level: string | null;
  readonly administrative_area_lcd: number | null;
  readonly administrative_area_name: string | null;
  readonly segment_count: number;
  readonly point_count: number;
}

interface PointRow {
  readonly lcd: number;
  readonly lon: number;
  readonly lat: number;
  readonly type_code: string;
  readonly type_description: string | null;
  readonly category: string;
  readonly name: string | null;
  readonly junction_number: string | null;
  readonly road_lcd: number | null;
  readonly urban: number | null;
  readonly out_of_envelope: number;
}

interface SearchRow {
  readonly kind: 'point' | 'road';
  readonly lcd: number;
  readonly name: string;
  readonly type_code: string;
  readonly type_description: string | null;
  readonly lon: number | null;
  readonly lat: number | null;
}

const ROAD_COLUMNS = `
  r.lcd, r.road_number, r.classification, r.type_code, r.type_description,
  r.name, r.start_name, r.end_name, r.min_lon, r.min_lat, r.max_lon, r.max_lat
`;

const POINT_COLUMNS = `
  p.lcd, p.lon, p.lat, p.type_code, p.type_description, p.category, p.name,
  p.junction_number, p.road_lcd, p.urban, p.out_of_envelope
`;

const PointCategorySchema = z.enum(['junction', 'infrastructure', 'service', 'other']);

const BoundingBoxValue = z.object({
  west: z.number(),
  south: z.number(),
  east: z.number(),
  north: z.number(),
});

const StatisticsSchema = z.object({
  totals: z.object({
    roads: z.number(),
    segments: z.number(),
    points: z.number(),
    intersections: z.number(),
    administrativeAreas: z.number(),
    otherAreas: z.number(),
    names: z.number(),
  }),
  roadClassifications: z.object({
    motorway: z.number(),
    'first-class': z.number(),
    'second-class': z.number(),
    'third-class': z.number(),
    other: z.number(),
  }),
  pointCategories: z.object({
    junction: z.number(),
    infrastructure: z.number(),
    service: z.number(),
    other: z.number(),
  }),
  pointTypes: z.array(
    z.object({ code: z.string(), description: z.string().nullable(), count: z.number() })
  ),
  outOfEnvelope: z.number(),
  bbox: BoundingBoxValue.nullable(),
  center: z.object({ lon: z.number(), lat: z.number() }).nullable(),
});

// ============================================================================
// Store
// ============================================================================

export class RoadNetworkStore {
  private readonly db: Database.Database;

  /**
   * Open a published store read-only
   *
   * @throws StoreReadError when the file is not a store of the current format
   */
  constructor(private readonly storePath: string) {
    try {
      this.db = new Database(storePath, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new StoreReadError(
        `Cannot open store: ${error instanceof Error ? error.message : String(error)}`,
        storePath
      );
    }

    // Unicode-aware lower case; SQLite's lower() only folds ASCII
    this.db.function('fold_case', { deterministic: true }, (value: unknown) =>
      typeof value === 'string' ? value.toLowerCase() : null
    );

    let metadata: StoreMetadata;
    try {
      metadata = this.readMetadata();
    } catch (error) {
      this.db.close();
      throw error;
    }
    if (metadata.formatVersion !== STORE_FORMAT_VERSION) {
      this.db.close();
      throw new StoreReadError(
        `Unsupported store format ${metadata.formatVersion} (expected ${STORE_FORMAT_VERSION})`,
        storePath
      );
    }

    logger.debug('Store opened', { storePath, points: metadata.pointCount });
  }

  close(): void {
    this.db.close();
  }

  // --------------------------------------------------------------------------
  // Metadata & Statistics
  // --------------------------------------------------------------------------

  getMetadata(): StoreMetadata {
    return this.readMetadata();
  }

  /**
   * Cached aggregates, with the 20 most frequent point types
   */
  getStatistics(): StoreStatistics {
    const rows = this.db
      .prepare<[], { key: string; value: string }>('SELECT key, value FROM statistics')
      .all();
    const raw = Object.fromEntries(rows.map((row) => [row.key, parseJson(row.value)]));

    const result = StatisticsSchema.safeParse(raw);
    if (!result.success) {
      throw new StoreReadError(
        `Statistics table is malformed: ${result.error.errors[0]?.message ?? 'unknown issue'}`,
        this.storePath
      );
    }

    return { ...result.data, pointTypes: result.data.pointTypes.slice(0, TOP_POINT_TYPES) };
  }

  // --------------------------------------------------------------------------
  // Viewport Queries
  // --------------------------------------------------------------------------

  /**
   * Roads whose extent intersects the box, ordered by location code
   */
  getRoadsInBbox(bbox: BoundingBox, options: RoadQueryOptions = {}): RoadFeature[] {
    const { west, south, east, north } = assertBoundingBox(bbox);
    const limit = assertLimit(options.limit ?? DEFAULT_ROAD_LIMIT);
    const classifications = assertClassifications(options.classifications ?? []);

    const filter = classifications.length > 0
      ? `AND r.classification IN (${placeholders(classifications.length)})`
      : '';

    const rows = this.db
      .prepare<unknown[], RoadRow>(`
        SELECT ${ROAD_COLUMNS}
        FROM roads_rtree t
        JOIN roads r ON r.lcd = t.id
        WHERE t.min_lon <= ? AND t.max_lon >= ?
          AND t.min_lat <= ? AND t.max_lat >= ?
          AND r.min_lon <= ? AND r.max_lon >= ?
          AND r.min_lat <= ? AND r.max_lat >= ?
          ${filter}
        ORDER BY r.lcd
        LIMIT ?
      `)
      .all(east, west, north, south, east, west, north, south, ...classifications, limit);

    return rows.map(toRoadFeature);
  }

  /**
   * Points inside the box, boundaries inclusive, ordered by location code
   */
  getPointsInBbox(bbox: BoundingBox, options: PointQueryOptions = {}): PointFeature[] {
    const { west, south, east, north } = assertBoundingBox(bbox);
    const limit = assertLimit(options.limit ?? DEFAULT_POINT_LIMIT);
    const typeCodes = assertTypeCodes(options.typeCodes ?? []);

    const filter = typeCodes.length > 0
      ? `AND p.type_code IN (${placeholders(typeCodes.length)})`
      : '';

    const rows = this.db
      .prepare<unknown[], PointRow>(`
        SELECT ${POINT_COLUMNS}
        FROM points_rtree t
        JOIN points p ON p.lcd = t.id
        WHERE t.min_lon <= ? AND t.max_lon >= ?
          AND t.min_lat <= ? AND t.max_lat >= ?
          AND p.lon BETWEEN ? AND ?
          AND p.lat BETWEEN ? AND ?
          ${filter}
        ORDER BY p.lcd
        LIMIT ?
      `)
      .all(east, west, north, south, west, east, south, north, ...typeCodes, limit);

    return rows.map(toPointFeature);
  }

  getPointsGeoJSON(
    bbox: BoundingBox,
    options: PointQueryOptions = {}
  ): FeatureCollection<GeoJsonPoint, PointProperties> {
    const features = this.getPointsInBbox(bbox, options).map(
      ({ lon, lat, ...properties }): Feature<GeoJsonPoint, PointProperties> =>
        turf.point([lon, lat], properties, { id: properties.lcd })
    );
    return turf.featureCollection(features);
  }

  // --------------------------------------------------------------------------
  // Lookups
  // --------------------------------------------------------------------------

  /**
   * Case-insensitive substring search over point and road names, ordered by
   * name then location code
   */
  search(text: string, limit: number = DEFAULT_SEARCH_LIMIT): SearchResult[] {
    const needle = assertSearchText(text).toLowerCase();
    const max = assertLimit(limit);

    const rows = this.db
      .prepare<[string, string, number], SearchRow>(`
        SELECT * FROM (
          SELECT 'point' AS kind, p.lcd, p.name, p.type_code, p.type_description, p.lon, p.lat
          FROM points p
          WHERE p.name IS NOT NULL AND instr(fold_case(p.name), ?) > 0
          UNION ALL
          SELECT 'road' AS kind, r.lcd, r.name, r.type_code, r.type_description,
            (r.min_lon + r.max_lon) / 2, (r.min_lat + r.max_lat) / 2
          FROM roads r
          WHERE r.name IS NOT NULL AND instr(fold_case(r.name), ?) > 0
        )
        ORDER BY name, kind, lcd
        LIMIT ?
      `)
      .all(needle, needle, max);

    return rows.map((row) => ({
      kind: row.kind,
      lcd: row.lcd,
      name: row.name,
      typeCode: row.type_code,
      typeDescription: row.type_description,
      lon: row.lon,
      lat: row.lat,
    }));
  }

  getRoadsByClassification(classification: RoadClassification): RoadFeature[] {
    const [checked = classification] = assertClassifications([classification]);
    return this.db
      .prepare<[RoadClassification], RoadRow>(`
        SELECT ${ROAD_COLUMNS}
        FROM roads r
        WHERE r.classification = ?
        ORDER BY r.road_number, r.lcd
      `)
      .all(checked)
      .map(toRoadFeature);
  }

  /**
   * Distinct motorway numbers (M...) with their road and segment counts
   */
  getMotorways(): Motorway[] {
    return this.db
      .prepare<[], { road_number: string; roads: number; segments: number }>(`
        SELECT r.road_number,
          COUNT(DISTINCT r.lcd) AS roads,
          COUNT(s.lcd) AS segments
        FROM roads r
        LEFT JOIN segments s ON s.road_lcd = r.lcd
        WHERE r.road_number LIKE 'M%'
        GROUP BY r.road_number
        ORDER BY r.road_number
      `)
      .all()
      .map((row) => ({ roadNumber: row.road_number, roads: row.roads, segments: row.segments }));
  }

  getRoadDetails(lcd: number): RoadDetails | null {
    const row = this.db
      .prepare<[number], RoadDetailsRow>(`
        SELECT ${ROAD_COLUMNS},
          r.cid, r.tabcd, r.network_level, r.administrative_area_lcd,
          a.name AS administrative_area_name,
          (SELECT COUNT(*) FROM segments s WHERE s.road_lcd = r.lcd) AS segment_count,
          (SELECT COUNT(*) FROM points p WHERE p.road_lcd = r.lcd) AS point_count
        FROM roads r
        LEFT JOIN administrative_areas a ON a.lcd = r.administrative_area_lcd
        WHERE r.lcd = ?
      `)
      .get(lcd);

    if (row === undefined) {
      return null;
    }

    return {
      ...toRoadFeature(row),
      cid: row.cid,
      tabcd: row.tabcd,
      networkLevel: row.network_level,
      administrativeAreaLcd: row.administrative_area_lcd,
      administrativeAreaName: row.administrative_area_name,
      segmentCount: row.segment_count,
      pointCount: row.point_count,
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private readMetadata(): StoreMetadata {
    let rows: { key: string; value: string }[];
    try {
      rows = this.db
        .prepare<[], { key: string; value: string }>('SELECT key, value FROM metadata')
        .all();
    } catch (error) {
      throw new StoreReadError(
        `Not a road reference store: ${error instanceof Error ? error.message : String(error)}`,
        this.storePath
      );
    }
    const values = new Map(rows.map((row) => [row.key, row.value]));

    return {
      formatVersion: Number(values.get('format_version') ?? Number.NaN),
      sourceCrs: values.get('source_crs') ?? 'unknown',
      builtAt: values.get('built_at') ?? 'unknown',
      pointCount: Number(values.get('point_count') ?? 0),
    };
  }
}

// ============================================================================
// Mapping
// ============================================================================

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

function parseJson(text: string): unknown {
  return JSON.parse(text);
}

function toRoadFeature(row: RoadRow): RoadFeature {
  const extent =
    row.min_lon !== null && row.min_lat !== null && row.max_lon !== null && row.max_lat !== null
      ? { west: row.min_lon, south: row.min_lat, east: row.max_lon, north: row.max_lat }
      : null;
  const classification = RoadClassificationSchema.safeParse(row.classification);

  return {
    lcd: row.lcd,
    roadNumber: row.road_number,
    classification: classification.success ? classification.data : 'other',
    typeCode: row.type_code,
    typeDescription: row.type_description,
    name: row.name,
    startName: row.start_name,
    endName: row.end_name,
    extent,
  };
}

function toPointFeature(row: PointRow): PointFeature {
  const category = PointCategorySchema.safeParse(row.category);
  return {
    lcd: row.lcd,
    lon: row.lon,
    lat: row.lat,
    typeCode: row.type_code,
    typeDescription: row.type_description,
    category: category.success ? category.data : 'other',
    name: row.name,
    junctionNumber: row.junction_number,
    roadLcd: row.road_lcd,
    urban: row.urban === null ? null : row.urban === 1,
    outOfEnvelope: row.out_of_envelope === 1,
  };
}
