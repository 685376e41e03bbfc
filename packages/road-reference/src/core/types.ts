/**
 * Road Reference Network Types
 *
 * Entities of a resolved TMC location table. Identifiers are location codes
 * (LCD), unique within one table. Relationships are materialised as location
 * codes that are known to resolve, or null.
 */

// ============================================================================
// Coordinates
// ============================================================================

/**
 * Projected coordinate pair as read from the source (metres for EOV)
 */
export interface ProjectedCoordinate {
  readonly easting: number;
  readonly northing: number;
}

/**
 * WGS84 coordinate pair in degrees
 */
export interface GeographicCoordinate {
  readonly lon: number;
  readonly lat: number;
}

/**
 * Axis-aligned rectangle in WGS84 degrees, boundaries inclusive
 */
export interface BoundingBox {
  readonly west: number;
  readonly south: number;
  readonly east: number;
  readonly north: number;
}

// ============================================================================
// Classifications
// ============================================================================

export type RoadClassification =
  | 'motorway'
  | 'first-class'
  | 'second-class'
  | 'third-class'
  | 'other';

export const ROAD_CLASSIFICATIONS: readonly RoadClassification[] = [
  'motorway',
  'first-class',
  'second-class',
  'third-class',
  'other',
];

export type PointCategory = 'junction' | 'infrastructure' | 'service' | 'other';

export type IntersectionType =
  | 't-junction'
  | 'crossroads'
  | 'roundabout'
  | 'gyratory'
  | 'link-road'
  | 'other';

/**
 * Location type triple with its display code (`P1.11`) and the subtype
 * description from SUBTYPES.DAT, when that file was supplied.
 */
export interface LocationType {
  readonly class: string;
  readonly tcd: number;
  readonly stcd: number;
  readonly code: string;
  readonly description: string | null;
}

// ============================================================================
// Entities
// ============================================================================

export interface AdministrativeArea {
  readonly lcd: number;
  readonly cid: number;
  readonly tabcd: number;
  readonly type: LocationType;
  readonly name: string | null;
  readonly parentLcd: number | null;
}

export interface Road {
  readonly lcd: number;
  readonly cid: number;
  readonly tabcd: number;
  readonly type: LocationType;
  readonly roadNumber: string | null;
  readonly classification: RoadClassification;
  readonly name: string | null;
  readonly startName: string | null;
  readonly endName: string | null;
  readonly administrativeAreaLcd: number | null;
  readonly networkLevel: string | null;
  readonly rdid: string | null;
}

export interface Segment {
  readonly lcd: number;
  readonly cid: number;
  readonly tabcd: number;
  readonly type: LocationType;
  readonly roadNumber: string | null;
  readonly name: string | null;
  readonly startName: string | null;
  readonly endName: string | null;
  readonly roadLcd: number | null;
  readonly parentSegmentLcd: number | null;
  readonly administrativeAreaLcd: number | null;
  readonly negativeOffsetLcd: number | null;
  readonly positiveOffsetLcd: number | null;
}

/**
 * Traffic direction flags of a point (null when the table leaves them blank)
 */
export interface DirectionFlags {
  readonly inPos: boolean | null;
  readonly inNeg: boolean | null;
  readonly outPos: boolean | null;
  readonly outNeg: boolean | null;
  readonly presentPos: boolean | null;
  readonly presentNeg: boolean | null;
}

export interface Point {
  readonly lcd: number;
  readonly cid: number;
  readonly tabcd: number;
  readonly type: LocationType;
  readonly category: PointCategory;
  readonly junctionNumber: string | null;
  readonly name: string | null;
  readonly secondaryName: string | null;
  readonly roadName: string | null;
  readonly roadLcd: number | null;
  readonly segmentLcd: number | null;
  readonly administrativeAreaLcd: number | null;
  readonly otherAreaLcd: number | null;
  readonly urban: boolean | null;
  readonly interruptsRoad: string | null;
  readonly directions: DirectionFlags;
  readonly negativeOffsetLcd: number | null;
  readonly positiveOffsetLcd: number | null;
  readonly projected: ProjectedCoordinate;
}

/**
 * Point with its derived WGS84 position
 */
export interface LocatedPoint extends Point {
  readonly geographic: GeographicCoordinate;
  /** Set when the position lies outside the national envelope */
  readonly outOfEnvelope: boolean;
}

export interface Intersection {
  /** Location code of the junction point */
  readonly lcd: number;
  readonly type: IntersectionType;
  /** Points the junction connects to, sorted */
  readonly pointLcds: readonly number[];
  /** Distinct roads of the junction and its connected points, sorted */
  readonly roadLcds: readonly number[];
}

// ============================================================================
// Code Tables
// ============================================================================

export interface Country {
  readonly cid: number;
  readonly ecc: string | null;
  readonly ccd: string | null;
  readonly name: string;
}

export interface LocationTypeEntry {
  readonly class: string;
  readonly tcd: number;
  readonly stcd: number | null;
  readonly description: string | null;
  readonly nationalCode: string | null;
  readonly nationalDescription: string | null;
}

export interface NameEntry {
  readonly cid: number;
  readonly lid: number;
  readonly nid: number;
  readonly name: string;
  readonly comment: string | null;
  readonly officialName: string | null;
}

export interface CodeTables {
  readonly countries: readonly Country[];
  readonly types: readonly LocationTypeEntry[];
  readonly subtypes: readonly LocationTypeEntry[];
  readonly names: readonly NameEntry[];
}

// ============================================================================
// Networks
// ============================================================================

/**
 * Output of cross-reference resolution
 */
export interface ResolvedNetwork<P extends Point = Point> {
  readonly administrativeAreas: readonly AdministrativeArea[];
  readonly otherAreas: readonly AdministrativeArea[];
  readonly roads: readonly Road[];
  readonly segments: readonly Segment[];
  readonly points: readonly P[];
  readonly intersections: readonly Intersection[];
  readonly codeTables: CodeTables;
}

/**
 * Resolved network whose points carry WGS84 positions, ready to load
 */
export type LocatedNetwork = ResolvedNetwork<LocatedPoint>;
