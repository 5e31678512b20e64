/**
 * Shared field tables and configs for layout tests.
 */

import { expect } from 'vitest';
import type { LayoutConfigInput } from '../../src/config/schema.js';
import type { FieldTable } from '../../src/config/types.js';
import type { Point } from '../../src/geometry/types.js';

// ============ Tables ============

/** Two single-row plots side by side in the first range */
export const twoPlotTable: FieldTable = [
  { Plot: 1, Range: 1, Row: 1, Barcode: 'BC001' },
  { Plot: 2, Range: 1, Row: 2, Barcode: 'BC002' },
];

/** Three two-row plots across six rows of one range */
export const sixRowTable: FieldTable = [
  { Plot: 1, Range: 1, Row: 1, Barcode: 'BC001' },
  { Plot: 1, Range: 1, Row: 2, Barcode: 'BC002' },
  { Plot: 2, Range: 1, Row: 3, Barcode: 'BC003' },
  { Plot: 2, Range: 1, Row: 4, Barcode: 'BC004' },
  { Plot: 3, Range: 1, Row: 5, Barcode: 'BC005' },
  { Plot: 3, Range: 1, Row: 6, Barcode: 'BC006' },
];

/** Four two-row plots over two ranges and four rows */
export const twoRangeTable: FieldTable = [
  { Plot: 1, Range: 1, Row: 1, Barcode: 'BC001' },
  { Plot: 1, Range: 1, Row: 2, Barcode: 'BC002' },
  { Plot: 2, Range: 1, Row: 3, Barcode: 'BC003' },
  { Plot: 2, Range: 1, Row: 4, Barcode: 'BC004' },
  { Plot: 3, Range: 2, Row: 1, Barcode: 'BC005' },
  { Plot: 3, Range: 2, Row: 2, Barcode: 'BC006' },
  { Plot: 4, Range: 2, Row: 3, Barcode: 'BC007' },
  { Plot: 4, Range: 2, Row: 4, Barcode: 'BC008' },
];

// ============ Configs ============

/** AB line running due north for 100 units from the origin */
export const northConfig: LayoutConfigInput = { a: [0, 0], b: [0, 100] };

/** An AB line in UTM metres, rotated off the grid axes */
export const utmA: Point = { x: 746239.817, y: 3382052.264 };
export const utmB: Point = { x: 746334.224, y: 3382152.87 };

export function createConfig(overrides: Partial<LayoutConfigInput> = {}): LayoutConfigInput {
  return { ...northConfig, ...overrides };
}

// ============ Assertions ============

export function expectPointsClose(actual: readonly Point[], expected: readonly Point[], digits = 9): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((point, i) => {
    expect(point.x).toBeCloseTo(expected[i].x, digits);
    expect(point.y).toBeCloseTo(expected[i].y, digits);
  });
}
