import { EmptyLayoutError } from '../errors.js';
import { toAbsolute } from '../frame/index.js';
import { localRing } from '../geometry/index.js';
import type {
  GeometryCollection,
  LayoutUnit,
  LocalRect,
  PlotRecord,
  Point,
  ReferenceFrame,
  SpatialReferenceInput,
} from '../geometry/types.js';

/** Absolute ring of a local rectangle, closed */
export function rectToRing(frame: ReferenceFrame, rect: LocalRect): Point[] {
  return localRing(rect).map((corner) => toAbsolute(frame, corner));
}

/**
 * Map every unit's local rectangle into absolute coordinates.
 */
export function assemblePlots(
  frame: ReferenceFrame,
  units: readonly LayoutUnit[],
  spatialReference: SpatialReferenceInput = { hemisphere: 'N' }
): GeometryCollection<'raw'> {
  if (units.length === 0) {
    throw new EmptyLayoutError();
  }

  const records: PlotRecord[] = units.map((unit) => ({
    ...unit,
    ring: rectToRing(frame, unit.local),
  }));

  return {
    label: 'raw',
    frame,
    spatialReference: { ...spatialReference },
    records,
  };
}
