import type { Hemisphere, LengthUnit, Point } from '../geometry/types.js';
import { DEFAULT_EPSILON } from '../frame/index.js';
import type { LayoutConfigInput, StaggerSpec } from './schema.js';

/** Rows of the field table as read from a file; checked by the layout grid */
export type FieldTable = readonly Record<string, unknown>[];

/** Fully resolved layout configuration */
export interface LayoutConfig {
  readonly a: Point;
  readonly b: Point;
  readonly rowSpacing: number;
  readonly rangeSpacing: number;
  readonly rowBuffer: number;
  readonly rangeBuffer: number;
  readonly rowsPerPlot: number;
  readonly individualRows: boolean;
  readonly unit: LengthUnit;
  readonly stagger?: Readonly<StaggerSpec>;
  readonly plotSubset: number;
  readonly utmZone?: string;
  readonly hemisphere: Hemisphere;
  readonly field?: string;
  readonly epsilon: number;
}

export const DEFAULT_LAYOUT_OPTIONS = {
  rowSpacing: 2.5,
  rangeSpacing: 25,
  rowBuffer: 0.1,
  rangeBuffer: 2,
  rowsPerPlot: 1,
  individualRows: false,
  unit: 'feet',
  plotSubset: 0,
  hemisphere: 'N',
  epsilon: DEFAULT_EPSILON,
} as const satisfies Partial<LayoutConfig>;

/**
 * Fill defaults into a validated configuration.
 */
export function resolveConfig(input: LayoutConfigInput): LayoutConfig {
  const config: LayoutConfig = {
    a: { x: input.a[0], y: input.a[1] },
    b: { x: input.b[0], y: input.b[1] },
    rowSpacing: input.rowSpacing ?? DEFAULT_LAYOUT_OPTIONS.rowSpacing,
    rangeSpacing: input.rangeSpacing ?? DEFAULT_LAYOUT_OPTIONS.rangeSpacing,
    rowBuffer: input.rowBuffer ?? DEFAULT_LAYOUT_OPTIONS.rowBuffer,
    rangeBuffer: input.rangeBuffer ?? DEFAULT_LAYOUT_OPTIONS.rangeBuffer,
    rowsPerPlot: input.rowsPerPlot ?? DEFAULT_LAYOUT_OPTIONS.rowsPerPlot,
    individualRows: input.individualRows ?? DEFAULT_LAYOUT_OPTIONS.individualRows,
    unit: input.unit ?? DEFAULT_LAYOUT_OPTIONS.unit,
    stagger: input.stagger ? Object.freeze({ ...input.stagger }) : undefined,
    plotSubset: input.plotSubset ?? DEFAULT_LAYOUT_OPTIONS.plotSubset,
    utmZone: input.utmZone,
    hemisphere: input.hemisphere ?? DEFAULT_LAYOUT_OPTIONS.hemisphere,
    field: input.field,
    epsilon: input.epsilon ?? DEFAULT_LAYOUT_OPTIONS.epsilon,
  };

  return Object.freeze(config);
}
