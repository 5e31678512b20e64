/**
 * Inward buffer for plot footprints.
 *
 * The margin is taken off the local rectangle, so it follows the field's rows
 * and ranges rather than the absolute axes, and the result is mapped through
 * the same frame as the raw footprint.
 */

import { InvalidBufferError, type BufferAxis } from '../errors.js';
import { rectToRing } from '../assembly/index.js';
import { DEFAULT_EPSILON } from '../frame/index.js';
import { shrinkRect } from '../geometry/index.js';
import type { GeometryCollection, PlotRecord } from '../geometry/types.js';

function checkBuffer(record: PlotRecord, axis: BufferAxis, extent: number, buffer: number, epsilon: number): void {
  if (buffer < 0 || 2 * buffer >= extent - epsilon) {
    throw new InvalidBufferError(record.key, record.plot, axis, extent, buffer);
  }
}

export function applyBuffer(
  raw: GeometryCollection<'raw'>,
  rowBuffer: number,
  rangeBuffer: number,
  epsilon = DEFAULT_EPSILON
): GeometryCollection<'buffered'> {
  const records = raw.records.map((record): PlotRecord => {
    const { local } = record;
    checkBuffer(record, 'row', local.rowMax - local.rowMin, rowBuffer, epsilon);
    checkBuffer(record, 'range', local.rangeMax - local.rangeMin, rangeBuffer, epsilon);

    const shrunk = shrinkRect(local, rowBuffer, rangeBuffer);
    return {
      ...record,
      local: shrunk,
      ring: rectToRing(raw.frame, shrunk),
    };
  });

  return {
    label: 'buffered',
    frame: raw.frame,
    spatialReference: raw.spatialReference,
    records,
  };
}
