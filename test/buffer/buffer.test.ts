import { describe, it, expect } from 'vitest';
import { applyBuffer } from '../../src/buffer/index.js';
import { assemblePlots } from '../../src/assembly/index.js';
import { buildReferenceFrame } from '../../src/frame/index.js';
import { buildLayoutGrid } from '../../src/grid/index.js';
import { resolveConfig } from '../../src/config/types.js';
import { calculatePolygonArea, isPointInPolygon } from '../../src/geometry/index.js';
import { validateContainment } from '../../src/validation/index.js';
import { InvalidBufferError, ErrorCodes } from '../../src/errors.js';
import type { FieldTable } from '../../src/config/types.js';
import type { LayoutConfigInput } from '../../src/config/schema.js';
import { createConfig, sixRowTable, twoPlotTable, utmA, utmB } from '../__fixtures__/tables.js';

function assemble(table: FieldTable, input: LayoutConfigInput) {
  const config = resolveConfig(input);
  const grid = buildLayoutGrid(table, config);
  return assemblePlots(buildReferenceFrame(config.a, config.b), grid.units);
}

function catchBufferError(run: () => unknown): InvalidBufferError {
  try {
    run();
  } catch (e) {
    if (e instanceof InvalidBufferError) return e;
    throw e;
  }
  throw new Error('expected an InvalidBufferError');
}

describe('Buffer', () => {
  it('should shrink local rectangles on both axes', () => {
    const buffered = applyBuffer(assemble(twoPlotTable, createConfig()), 0.1, 2);
    const { local } = buffered.records[0];

    expect(buffered.label).toBe('buffered');
    expect(local.rangeMin).toBe(2);
    expect(local.rangeMax).toBe(23);
    expect(local.rowMin).toBeCloseTo(-1.15, 12);
    expect(local.rowMax).toBeCloseTo(1.15, 12);
    expect(calculatePolygonArea(buffered.records[0].ring)).toBeCloseTo(21 * 2.3, 9);
  });

  it('should keep buffered vertices strictly inside the raw footprint', () => {
    const raw = assemble(sixRowTable, createConfig({ a: [utmA.x, utmA.y], b: [utmB.x, utmB.y], rowsPerPlot: 2 }));
    const buffered = applyBuffer(raw, 0.1, 2);

    buffered.records.forEach((record, i) => {
      for (const point of record.ring) {
        expect(isPointInPolygon(point, raw.records[i].ring)).toBe(true);
      }
    });
    expect(validateContainment(raw, buffered)).toEqual([]);
  });

  it('should preserve keys, order, frame and spatial reference', () => {
    const raw = assemble(sixRowTable, createConfig({ rowsPerPlot: 2, individualRows: true }));
    const buffered = applyBuffer(raw, 0.1, 2);

    expect(buffered.records.map((r) => r.key)).toEqual(raw.records.map((r) => r.key));
    expect(buffered.records.map((r) => r.id)).toEqual(raw.records.map((r) => r.id));
    expect(buffered.frame).toBe(raw.frame);
    expect(buffered.spatialReference).toBe(raw.spatialReference);
  });

  it('should return the raw rings when both buffers are zero', () => {
    const raw = assemble(twoPlotTable, createConfig());
    const buffered = applyBuffer(raw, 0, 0);
    expect(buffered.records.map((r) => r.ring)).toEqual(raw.records.map((r) => r.ring));
  });

  it('should reject a row buffer that consumes the plot', () => {
    const raw = assemble(twoPlotTable, createConfig());
    const error = catchBufferError(() => applyBuffer(raw, 2, 2));

    expect(error.code).toBe(ErrorCodes.INVALID_BUFFER);
    expect(error.phase).toBe('buffer');
    expect(error.axis).toBe('row');
    expect(error.key).toBe('1');
    expect(error.extent).toBe(2.5);
    expect(error.message).toBe('Plot 1 (1): row buffer 2 on both sides leaves nothing of the 2.5 row extent');
  });

  it('should reject a range buffer that consumes the plot', () => {
    const raw = assemble(twoPlotTable, createConfig());
    const error = catchBufferError(() => applyBuffer(raw, 0.1, 12.5));

    expect(error.axis).toBe('range');
    expect(error.extent).toBe(25);
  });

  it('should reject a buffer within epsilon of half the extent', () => {
    const raw = assemble(twoPlotTable, createConfig());
    expect(() => applyBuffer(raw, 1.25 - 1e-12, 0)).toThrow(InvalidBufferError);
    expect(() => applyBuffer(raw, 1.2, 0)).not.toThrow();
  });

  it('should reject negative buffers', () => {
    const raw = assemble(twoPlotTable, createConfig());
    const error = catchBufferError(() => applyBuffer(raw, -0.1, 2));
    expect(error.message).toBe('Plot 1 (1): row buffer -0.1 is negative');
  });
});
