import type { LocalPoint, LocalRect, Point } from './types.js';

export * from './types.js';

// ============================================================================
// Vector Utilities
// ============================================================================

export function distance(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function dot(a: Point, b: Point): number {
  return a.x * b.x + a.y * b.y;
}

export function pointsEqual(p1: Point, p2: Point, epsilon = 1e-10): boolean {
  return Math.abs(p1.x - p2.x) < epsilon && Math.abs(p1.y - p2.y) < epsilon;
}

// ============================================================================
// Polygon Utilities
// ============================================================================

/** Shoelace sum; positive for counter-clockwise rings */
export function signedPolygonArea(points: readonly Point[]): number {
  let area = 0;
  const n = points.length;

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += points[i].x * points[j].y;
    area -= points[j].x * points[i].y;
  }

  return area / 2;
}

export function calculatePolygonArea(points: readonly Point[]): number {
  return Math.abs(signedPolygonArea(points));
}

export function isRingClosed(points: readonly Point[], epsilon = 1e-10): boolean {
  if (points.length < 2) return false;
  return pointsEqual(points[0], points[points.length - 1], epsilon);
}

/** Drop the repeated closing vertex, if any */
export function openRing(points: readonly Point[]): Point[] {
  return isRingClosed(points) ? points.slice(0, -1) : [...points];
}

export function isPointInPolygon(point: Point, polygon: readonly Point[]): boolean {
  let inside = false;
  const n = polygon.length;

  for (let i = 0, j = n - 1; i < n; j = i++) {
    const xi = polygon[i].x;
    const yi = polygon[i].y;
    const xj = polygon[j].x;
    const yj = polygon[j].y;

    if ((yi > point.y) !== (yj > point.y) && point.x < ((xj - xi) * (point.y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }

  return inside;
}

export function isPointOnPolygonBoundary(point: Point, polygon: readonly Point[], epsilon = 1e-9): boolean {
  const n = polygon.length;
  for (let i = 0; i < n; i++) {
    const p1 = polygon[i];
    const p2 = polygon[(i + 1) % n];

    const d1 = distance(point, p1);
    const d2 = distance(point, p2);
    const d12 = distance(p1, p2);

    if (Math.abs(d1 + d2 - d12) < epsilon) {
      return true;
    }
  }
  return false;
}

function direction(p1: Point, p2: Point, p3: Point): number {
  return (p3.x - p1.x) * (p2.y - p1.y) - (p2.x - p1.x) * (p3.y - p1.y);
}

/** Proper crossing only; shared endpoints and touching do not count */
export function segmentsIntersect(a1: Point, a2: Point, b1: Point, b2: Point): boolean {
  const d1 = direction(b1, b2, a1);
  const d2 = direction(b1, b2, a2);
  const d3 = direction(a1, a2, b1);
  const d4 = direction(a1, a2, b2);

  return ((d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)) && ((d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0));
}

export function isSelfIntersecting(points: readonly Point[]): boolean {
  const ring = openRing(points);
  const n = ring.length;

  for (let i = 0; i < n; i++) {
    for (let j = i + 2; j < n; j++) {
      // First and last edges share a vertex
      if (i === 0 && j === n - 1) continue;
      if (segmentsIntersect(ring[i], ring[(i + 1) % n], ring[j], ring[(j + 1) % n])) {
        return true;
      }
    }
  }

  return false;
}

// ============================================================================
// Local Rectangles
// ============================================================================

/**
 * Corners of a local rectangle from (rangeMin, rowMin), closed by repeating
 * the first corner. Counter-clockwise with rows on x and ranges on y, as the
 * frame maps them, so absolute rings are counter-clockwise as well.
 */
export function localRing(rect: LocalRect): LocalPoint[] {
  const first = { range: rect.rangeMin, row: rect.rowMin };
  return [
    first,
    { range: rect.rangeMin, row: rect.rowMax },
    { range: rect.rangeMax, row: rect.rowMax },
    { range: rect.rangeMax, row: rect.rowMin },
    { ...first },
  ];
}

export function shrinkRect(rect: LocalRect, rowBy: number, rangeBy: number): LocalRect {
  return {
    rangeMin: rect.rangeMin + rangeBy,
    rangeMax: rect.rangeMax - rangeBy,
    rowMin: rect.rowMin + rowBy,
    rowMax: rect.rowMax - rowBy,
  };
}
