import type { GeometryCollection, Point } from '../geometry/types.js';
import {
  calculatePolygonArea,
  isPointInPolygon,
  isPointOnPolygonBoundary,
  isRingClosed,
  isSelfIntersecting,
  openRing,
  pointsEqual,
} from '../geometry/index.js';

// ============================================================================
// Validation Error
// ============================================================================

export interface ValidationError {
  code: string;
  message: string;
  key?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Error Codes
// ============================================================================

export const ValidationCodes = {
  RING_NOT_CLOSED: 'E601',
  RING_TOO_FEW_POINTS: 'E602',
  RING_SELF_INTERSECTING: 'E603',
  ZERO_AREA: 'E604',
  KEY_MISMATCH: 'E610',
  BUFFER_OUTSIDE_PLOT: 'E611',
} as const;

// ============================================================================
// Geometry Validation Helpers
// ============================================================================

function countDistinct(points: readonly Point[], epsilon: number): number {
  const distinct: Point[] = [];
  for (const point of points) {
    if (!distinct.some((p) => pointsEqual(p, point, epsilon))) {
      distinct.push(point);
    }
  }
  return distinct.length;
}

function isInsideOrOnBoundary(point: Point, polygon: readonly Point[], epsilon: number): boolean {
  return isPointInPolygon(point, polygon) || isPointOnPolygonBoundary(point, polygon, epsilon);
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Check that every ring is closed, has at least four distinct vertices,
 * encloses some area and does not cross itself.
 */
export function validateCollection(collection: GeometryCollection, epsilon = 1e-9): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const record of collection.records) {
    const { ring, key } = record;
    const name = `${collection.label} plot ${key}`;

    if (!isRingClosed(ring, epsilon)) {
      errors.push({
        code: ValidationCodes.RING_NOT_CLOSED,
        message: `Ring of ${name} is not closed`,
        key,
      });
    }

    const distinct = countDistinct(openRing(ring), epsilon);
    if (distinct < 4) {
      errors.push({
        code: ValidationCodes.RING_TOO_FEW_POINTS,
        message: `Ring of ${name} has ${distinct} distinct vertices, expected at least 4`,
        key,
        details: { distinct },
      });
      continue;
    }

    if (calculatePolygonArea(ring) <= epsilon) {
      errors.push({
        code: ValidationCodes.ZERO_AREA,
        message: `Ring of ${name} has zero area`,
        key,
      });
    }

    if (isSelfIntersecting(ring)) {
      errors.push({
        code: ValidationCodes.RING_SELF_INTERSECTING,
        message: `Ring of ${name} crosses itself`,
        key,
      });
    }
  }

  return errors;
}

/**
 * Check that buffered footprints pair up with raw ones and stay inside them.
 */
export function validateContainment(
  raw: GeometryCollection<'raw'>,
  buffered: GeometryCollection<'buffered'>,
  epsilon = 1e-6
): ValidationError[] {
  const errors: ValidationError[] = [];

  if (raw.records.length !== buffered.records.length) {
    errors.push({
      code: ValidationCodes.KEY_MISMATCH,
      message: `Raw collection has ${raw.records.length} plot(s) but buffered has ${buffered.records.length}`,
      details: { raw: raw.records.length, buffered: buffered.records.length },
    });
    return errors;
  }

  raw.records.forEach((outer, i) => {
    const inner = buffered.records[i];
    if (outer.key !== inner.key) {
      errors.push({
        code: ValidationCodes.KEY_MISMATCH,
        message: `Buffered plot ${inner.key} does not line up with raw plot ${outer.key}`,
        key: outer.key,
        details: { raw: outer.key, buffered: inner.key },
      });
      return;
    }

    const outside = inner.ring.filter((p) => !isInsideOrOnBoundary(p, outer.ring, epsilon));
    if (outside.length > 0) {
      errors.push({
        code: ValidationCodes.BUFFER_OUTSIDE_PLOT,
        message: `Buffered footprint of plot ${outer.key} extends outside its raw footprint`,
        key: outer.key,
        details: { outside },
      });
    }
  });

  return errors;
}
