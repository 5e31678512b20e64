/**
 * Field reference frame built from the AB line.
 *
 * Local coordinates are (range, row): `range` runs from A toward B and `row`
 * runs across the AB line. Row offsets increase to the right of the AB line
 * (clockwise from u), so a field whose B lies due north of A lays its rows out
 * to the east.
 */

import { DegenerateFrameError } from '../errors.js';
import { distance, dot } from '../geometry/index.js';
import type { LocalPoint, Point, ReferenceFrame } from '../geometry/types.js';

export const DEFAULT_EPSILON = 1e-9;

export function buildReferenceFrame(a: Point, b: Point, epsilon = DEFAULT_EPSILON): ReferenceFrame {
  const length = distance(a, b);
  if (!(length > epsilon)) {
    throw new DegenerateFrameError(length);
  }

  const u = { x: (b.x - a.x) / length, y: (b.y - a.y) / length };
  const v = { x: u.y, y: -u.x };

  return Object.freeze({
    origin: Object.freeze({ x: a.x, y: a.y }),
    u: Object.freeze(u),
    v: Object.freeze(v),
    theta: Math.atan2(u.y, u.x),
  });
}

/** Map a local point to absolute coordinates; the origin is added last. */
export function toAbsolute(frame: ReferenceFrame, local: LocalPoint): Point {
  const dx = local.range * frame.u.x + local.row * frame.v.x;
  const dy = local.range * frame.u.y + local.row * frame.v.y;
  return { x: frame.origin.x + dx, y: frame.origin.y + dy };
}

export function toLocal(frame: ReferenceFrame, point: Point): LocalPoint {
  const d = { x: point.x - frame.origin.x, y: point.y - frame.origin.y };
  return { range: dot(d, frame.u), row: dot(d, frame.v) };
}

/** Rotation of the field in degrees, for labelling */
export function frameAngleDegrees(frame: ReferenceFrame): number {
  return (frame.theta * 180) / Math.PI;
}
