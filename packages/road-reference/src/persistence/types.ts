/**
 * Store statistics and validation types
 */

import type {
  BoundingBox,
  GeographicCoordinate,
  PointCategory,
  RoadClassification,
} from '../core/types.js';

export interface EntityTotals {
  readonly roads: number;
  readonly segments: number;
  readonly points: number;
  readonly intersections: number;
  readonly administrativeAreas: number;
  readonly otherAreas: number;
  readonly names: number;
}

export interface PointTypeCount {
  readonly code: string;
  readonly description: string | null;
  readonly count: number;
}

/**
 * Aggregates computed once per build and cached in the `statistics` table
 */
export interface StoreStatistics {
  readonly totals: EntityTotals;
  readonly roadClassifications: Readonly<Record<RoadClassification, number>>;
  readonly pointCategories: Readonly<Record<PointCategory, number>>;
  /** Sorted by count descending, then code */
  readonly pointTypes: readonly PointTypeCount[];
  readonly outOfEnvelope: number;
  /** Extent of all points; null for a store without points */
  readonly bbox: BoundingBox | null;
  readonly center: GeographicCoordinate | null;
}

export interface StoreMetadata {
  readonly formatVersion: number;
  readonly sourceCrs: string;
  readonly builtAt: string;
  readonly pointCount: number;
}

export interface StoreValidationResult {
  readonly valid: boolean;
  readonly pointCount: number;
  readonly indexedPointCount: number;
  readonly integrity: string;
  readonly issues: readonly string[];
}
