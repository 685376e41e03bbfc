import { describe, it, expect } from 'vitest';
import {
  classifyIntersection,
  classifyPoint,
  classifyRoad,
  locationTypeCode,
} from '../../../resolution/classification.js';
import type { LocationType } from '../../../core/types.js';

function type(cls: string, tcd: number, stcd: number, description: string | null = null): LocationType {
  return { class: cls, tcd, stcd, code: locationTypeCode(cls, tcd, stcd), description };
}

describe('classification', () => {
  it('should format type codes', () => {
    expect(locationTypeCode('P', 3, 14)).toBe('P3.14');
  });

  it('should classify L1 roads by subtype', () => {
    expect(classifyRoad(type('L', 1, 1))).toBe('motorway');
    expect(classifyRoad(type('L', 1, 3))).toBe('second-class');
    expect(classifyRoad(type('L', 1, 9))).toBe('other');
    expect(classifyRoad(type('L', 2, 1))).toBe('other');
  });

  it('should treat every P1 point as a junction', () => {
    expect(classifyPoint(type('P', 1, 11, 'bridge'))).toBe('junction');
  });

  it('should categorise other points by description', () => {
    expect(classifyPoint(type('P', 3, 14, 'Service area'))).toBe('service');
    expect(classifyPoint(type('P', 4, 3, 'tunnel'))).toBe('infrastructure');
    expect(classifyPoint(type('P', 5, 1, 'town'))).toBe('other');
    expect(classifyPoint(type('P', 3, 4, null))).toBe('other');
  });

  it('should classify intersections by description', () => {
    expect(classifyIntersection(type('P', 1, 8, 'Roundabout'))).toBe('roundabout');
    expect(classifyIntersection(type('P', 1, 4, 'crossroads'))).toBe('crossroads');
    expect(classifyIntersection(type('P', 1, 2, 'T-junction'))).toBe('t-junction');
    expect(classifyIntersection(type('P', 1, 10, 'link road'))).toBe('link-road');
    expect(classifyIntersection(type('P', 1, 3, null))).toBe('other');
  });
});
