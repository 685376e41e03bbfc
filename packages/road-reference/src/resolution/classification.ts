/**
 * Location type classification
 *
 * Road classes come from the subtype code of road types (L1.1 motorway to
 * L1.4 third-class road). Point categories and intersection types are read
 * from the English subtype description in SUBTYPES.DAT, since national tables
 * number their point subtypes differently.
 */

import type {
  IntersectionType,
  LocationType,
  PointCategory,
  RoadClassification,
} from '../core/types.js';

const ROAD_CLASS_BY_SUBTYPE: Readonly<Record<number, RoadClassification>> = {
  1: 'motorway',
  2: 'first-class',
  3: 'second-class',
  4: 'third-class',
};

const INTERSECTION_PATTERNS: readonly (readonly [RegExp, IntersectionType])[] = [
  [/roundabout/i, 'roundabout'],
  [/gyratory/i, 'gyratory'],
  [/cross-?roads?|crossing/i, 'crossroads'],
  [/\bt-junction\b/i, 't-junction'],
  [/link road|connection|slip road|ramp/i, 'link-road'],
];

const POINT_CATEGORY_PATTERNS: readonly (readonly [RegExp, PointCategory])[] = [
  [/service|rest area|parking|petrol|fuel|lay-by/i, 'service'],
  [/bridge|tunnel|toll|border|ferry|viaduct|dam|level crossing|port|airport/i, 'infrastructure'],
];

export function locationTypeCode(cls: string, tcd: number, stcd: number): string {
  return `${cls}${tcd}.${stcd}`;
}

export function classifyRoad(type: LocationType): RoadClassification {
  if (type.class !== 'L' || type.tcd !== 1) {
    return 'other';
  }
  return ROAD_CLASS_BY_SUBTYPE[type.stcd] ?? 'other';
}

export function classifyPoint(type: LocationType): PointCategory {
  if (type.class === 'P' && type.tcd === 1) {
    return 'junction';
  }
  return matchDescription(type.description, POINT_CATEGORY_PATTERNS) ?? 'other';
}

export function classifyIntersection(type: LocationType): IntersectionType {
  return matchDescription(type.description, INTERSECTION_PATTERNS) ?? 'other';
}

function matchDescription<T>(
  description: string | null,
  patterns: readonly (readonly [RegExp, T])[]
): T | null {
  if (description === null) {
    return null;
  }
  for (const [pattern, value] of patterns) {
    if (pattern.test(description)) {
      return value;
    }
  }
  return null;
}
