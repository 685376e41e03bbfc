/**
 * Query input validation
 *
 * Zod schemas for everything a map front end sends to the store: viewport
 * bounding boxes, result limits, filters and search text.
 */

import { z } from 'zod';
import type { BoundingBox, RoadClassification } from '../core/types.js';
import { ROAD_CLASSIFICATIONS } from '../core/types.js';

// ============================================================================
// Errors
// ============================================================================

export class QueryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

// ============================================================================
// Bounding Boxes
// ============================================================================

const longitude = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` })
    .finite(`${label} must be a finite number`)
    .min(-180, `${label} must be >= -180`)
    .max(180, `${label} must be <= 180`);

const latitude = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` })
    .finite(`${label} must be a finite number`)
    .min(-90, `${label} must be >= -90`)
    .max(90, `${label} must be <= 90`);

/**
 * WGS84 viewport, boundaries inclusive. Boxes crossing the antimeridian are
 * not supported.
 */
export const BoundingBoxSchema = z
  .object({
    west: longitude('west'),
    south: latitude('south'),
    east: longitude('east'),
    north: latitude('north'),
  })
  .refine((box) => box.west <= box.east, 'west must be <= east')
  .refine((box) => box.south <= box.north, 'south must be <= north');

export const LimitSchema = z
  .number()
  .int('limit must be an integer')
  .min(1, 'limit must be >= 1')
  .max(100_000, 'limit must be <= 100000');

export const SearchTextSchema = z
  .string()
  .trim()
  .min(1, 'search text must not be empty')
  .max(100, 'search text must be at most 100 characters');

export const RoadClassificationSchema = z.enum([
  'motorway',
  'first-class',
  'second-class',
  'third-class',
  'other',
]);

export const TypeCodeSchema = z
  .string()
  .regex(/^[A-Z]\d+\.\d+$/, 'type code must look like P1.3');

// ============================================================================
// Helpers
// ============================================================================

function firstIssue(error: z.ZodError, fallback: string): string {
  return error.errors[0]?.message ?? fallback;
}

/**
 * Validate a bounding box
 *
 * @throws QueryValidationError with the first failing rule
 */
export function assertBoundingBox(input: unknown): BoundingBox {
  const result = BoundingBoxSchema.safeParse(input);
  if (!result.success) {
    throw new QueryValidationError(firstIssue(result.error, 'Invalid bounding box'));
  }
  return result.data;
}

export function assertLimit(input: unknown): number {
  const result = LimitSchema.safeParse(input);
  if (!result.success) {
    throw new QueryValidationError(firstIssue(result.error, 'Invalid limit'));
  }
  return result.data;
}

export function assertSearchText(input: unknown): string {
  const result = SearchTextSchema.safeParse(input);
  if (!result.success) {
    throw new QueryValidationError(firstIssue(result.error, 'Invalid search text'));
  }
  return result.data;
}

export function assertClassifications(input: readonly unknown[]): RoadClassification[] {
  const result = z.array(RoadClassificationSchema).safeParse(input);
  if (!result.success) {
    throw new QueryValidationError(
      `classification must be one of ${ROAD_CLASSIFICATIONS.join(', ')}`
    );
  }
  return result.data;
}

export function assertTypeCodes(input: readonly unknown[]): string[] {
  const result = z.array(TypeCodeSchema).safeParse(input);
  if (!result.success) {
    throw new QueryValidationError(firstIssue(result.error, 'Invalid type code'));
  }
  return result.data;
}

/**
 * Parse a `west,south,east,north` query parameter
 */
export function parseBoundingBoxParam(
  param: string | undefined
): { success: true; data: BoundingBox } | { success: false; error: string } {
  if (!param) {
    return { success: false, error: 'Missing required parameter: bbox' };
  }
  if (param.length > 100) {
    return { success: false, error: 'bbox parameter too long (max 100 characters)' };
  }

  const parts = param.split(',').map((part) => part.trim());
  if (parts.length !== 4 || parts.some((part) => part === '')) {
    return { success: false, error: 'bbox must be west,south,east,north' };
  }

  const [west, south, east, north] = parts.map(Number);
  const result = BoundingBoxSchema.safeParse({ west, south, east, north });
  if (!result.success) {
    return { success: false, error: firstIssue(result.error, 'Invalid bounding box') };
  }
  return { success: true, data: result.data };
}
