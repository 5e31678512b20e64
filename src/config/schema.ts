/**
 * TypeBox schemas for layout configuration, table rows and job files.
 * These provide:
 * - Runtime validation
 * - TypeScript type inference
 * - JSON Schema generation for users
 */

import { Type, type Static } from '@sinclair/typebox';

// =============================================================================
// Basic Types
// =============================================================================

export const Point2DSchema = Type.Tuple([Type.Number(), Type.Number()], {
  description: 'An absolute coordinate as [easting, northing]',
});

export const LengthUnitSchema = Type.Union([Type.Literal('feet'), Type.Literal('meter')], {
  description:
    'Unit the spacing and buffer values are expressed in. Informational only: values are never converted.',
});

export const HemisphereSchema = Type.Union([Type.Literal('N'), Type.Literal('S')], {
  description: 'Northern or southern hemisphere of the UTM zone',
});

export const StaggerSchema = Type.Object(
  {
    startRow: Type.Integer({ minimum: 1, description: 'First row shifted by the planter stagger' }),
    rowsPerPass: Type.Integer({ minimum: 1, description: 'Rows sown in a single planter pass' }),
    offset: Type.Number({ description: 'Shift along the AB line applied to staggered rows' }),
  },
  {
    description: 'Planter stagger: alternate passes start further along the AB line',
    additionalProperties: false,
  }
);

// =============================================================================
// Layout Configuration
// =============================================================================

export const LayoutConfigSchema = Type.Object(
  {
    a: Point2DSchema,
    b: Point2DSchema,
    rowSpacing: Type.Optional(
      Type.Number({ exclusiveMinimum: 0, description: 'Spacing between planting rows (default 2.5)' })
    ),
    rangeSpacing: Type.Optional(
      Type.Number({ exclusiveMinimum: 0, description: 'Length of a range along the AB line (default 25)' })
    ),
    rowBuffer: Type.Optional(
      Type.Number({ minimum: 0, description: 'Margin removed from each side across the rows (default 0.1)' })
    ),
    rangeBuffer: Type.Optional(
      Type.Number({ minimum: 0, description: 'Margin removed from each end along the range (default 2)' })
    ),
    rowsPerPlot: Type.Optional(Type.Integer({ minimum: 1, description: 'Adjacent rows forming a plot (default 1)' })),
    individualRows: Type.Optional(
      Type.Boolean({ description: 'Keep one footprint per row instead of merging the rows of a plot' })
    ),
    unit: Type.Optional(LengthUnitSchema),
    stagger: Type.Optional(StaggerSchema),
    plotSubset: Type.Optional(
      Type.Integer({ minimum: 0, description: 'Edge rows dropped from each side of every plot (default 0)' })
    ),
    utmZone: Type.Optional(Type.String({ minLength: 1, description: 'UTM zone number, e.g. "14"' })),
    hemisphere: Type.Optional(HemisphereSchema),
    field: Type.Optional(Type.String({ minLength: 1, description: 'Field trial identifier used in file names' })),
    epsilon: Type.Optional(
      Type.Number({ exclusiveMinimum: 0, description: 'Tolerance for degenerate frames and buffers' })
    ),
  },
  {
    $id: 'LayoutConfig',
    title: 'Plot Layout Configuration',
    description: 'AB line, spacing and buffer settings for a field trial layout',
    additionalProperties: false,
  }
);

// =============================================================================
// Table
// =============================================================================

export const TableRowSchema = Type.Object(
  {
    Plot: Type.Integer({ description: 'Plot identifier' }),
    Range: Type.Integer({ minimum: 1, description: '1-based range index' }),
    Row: Type.Integer({ minimum: 1, description: '1-based row index' }),
    Barcode: Type.Union([Type.String(), Type.Number()], { description: 'Seed or entry barcode' }),
  },
  {
    description: 'One planting row of the trial; extra columns are ignored',
  }
);

export const PlotJobSchema = Type.Object(
  {
    config: LayoutConfigSchema,
    table: Type.Array(Type.Record(Type.String(), Type.Unknown()), {
      description: 'Rows with Plot, Range, Row and Barcode columns',
    }),
  },
  {
    $id: 'PlotJob',
    title: 'Plot Layout Job',
    description: 'Configuration and field table for one layout run',
    additionalProperties: false,
  }
);

// =============================================================================
// Type Exports
// =============================================================================

export type Point2D = Static<typeof Point2DSchema>;
export type StaggerSpec = Static<typeof StaggerSchema>;
export type LayoutConfigInput = Static<typeof LayoutConfigSchema>;
export type TableRow = Static<typeof TableRowSchema>;
export type PlotJob = Static<typeof PlotJobSchema>;
