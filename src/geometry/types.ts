// ============================================================================
// Core Types
// ============================================================================

/** Absolute coordinate, e.g. UTM easting (x) and northing (y) */
export interface Point {
  x: number;
  y: number;
}

/** Field-local coordinate: offset along the AB line and across it */
export interface LocalPoint {
  range: number;
  row: number;
}

/** Axis-aligned rectangle in field-local space */
export interface LocalRect {
  rangeMin: number;
  rangeMax: number;
  rowMin: number;
  rowMax: number;
}

export type Hemisphere = 'N' | 'S';

export type LengthUnit = 'feet' | 'meter';

/** UTM zone and hemisphere as supplied by the caller, passed through untouched */
export interface SpatialReferenceInput {
  utmZone?: string;
  hemisphere: Hemisphere;
}

// ============================================================================
// Reference Frame
// ============================================================================

export interface ReferenceFrame {
  readonly origin: Point;
  /** Unit vector from A toward B */
  readonly u: Point;
  /** Unit vector across the AB line, in the direction rows increase */
  readonly v: Point;
  /** Angle of u from the absolute x axis, radians */
  readonly theta: number;
}

// ============================================================================
// Layout Units
// ============================================================================

interface LayoutUnitBase {
  /** Group key: "<plot>" for merged units, "<plot>:<row>" for row units */
  readonly key: string;
  readonly plot: number;
  readonly range: number;
  /** Row indexes covered, ascending */
  readonly rows: readonly number[];
  readonly barcodes: readonly string[];
  /** Label written to exchange artifacts */
  readonly id: string;
  /** Footprint in field-local space */
  readonly local: LocalRect;
}

/** Several adjacent rows of one plot drawn as a single footprint */
export interface MergedUnit extends LayoutUnitBase {
  readonly kind: 'merged';
}

/** One physical row, keeping its own footprint */
export interface RowUnit extends LayoutUnitBase {
  readonly kind: 'row';
  /** Rows of the same plot kept in the layout, this one included */
  readonly siblingRows: readonly number[];
}

export type LayoutUnit = MergedUnit | RowUnit;

export interface LayoutGrid {
  units: LayoutUnit[];
  warnings: string[];
}

// ============================================================================
// Geometry Collections
// ============================================================================

export type CollectionLabel = 'raw' | 'buffered';

export type PlotRecord = LayoutUnit & {
  /** Closed ring in absolute coordinates (first vertex repeated last) */
  readonly ring: readonly Point[];
};

export interface GeometryCollection<L extends CollectionLabel = CollectionLabel> {
  readonly label: L;
  readonly frame: ReferenceFrame;
  readonly spatialReference: SpatialReferenceInput;
  readonly records: readonly PlotRecord[];
}
