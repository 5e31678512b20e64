/**
 * Layout grid: turns the field table into plot units with local rectangles.
 *
 * Row r sits at row offset (r - 1) * rowSpacing and range g at range offset
 * (g - 1) * rangeSpacing. A footprint covers its range band and extends half
 * a row spacing beyond its outermost rows, so neighbouring plots abut.
 */

import { Value } from '@sinclair/typebox/value';
import {
  ConfigurationError,
  DuplicateRowError,
  ErrorCodes,
  InvalidTableError,
  MissingColumnError,
} from '../errors.js';
import type { LayoutGrid, LayoutUnit, LocalRect } from '../geometry/types.js';
import { TableRowSchema, type StaggerSpec } from '../config/schema.js';
import type { FieldTable, LayoutConfig } from '../config/types.js';
import { formatPath } from '../config/validate.js';

export const REQUIRED_COLUMNS = ['Plot', 'Range', 'Row', 'Barcode'] as const;

/** A validated table row and its position in the source table */
export interface FieldRow {
  index: number;
  plot: number;
  range: number;
  row: number;
  barcode: string;
}

type GridOptions = Pick<
  LayoutConfig,
  'rowSpacing' | 'rangeSpacing' | 'rowsPerPlot' | 'individualRows' | 'stagger' | 'plotSubset'
>;

// ============================================================================
// Table Checks
// ============================================================================

export function findMissingColumns(table: FieldTable): string[] {
  return REQUIRED_COLUMNS.filter((column) => table.some((row) => !(column in row)));
}

export function readFieldRows(table: FieldTable): FieldRow[] {
  const missing = findMissingColumns(table);
  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }

  const rows: FieldRow[] = [];
  const seen = new Set<string>();

  table.forEach((source, index) => {
    if (!Value.Check(TableRowSchema, source)) {
      const [first] = [...Value.Errors(TableRowSchema, source)];
      const column = first ? formatPath(first.path) : '';
      const value = column ? source[column] : undefined;
      throw new InvalidTableError(
        `Table row ${index + 1}: ${column || 'row'} has invalid value ${JSON.stringify(value)}`,
        ErrorCodes.INVALID_TABLE_VALUE,
        { index, column, value }
      );
    }

    const key = `${source.Plot}:${source.Row}`;
    if (seen.has(key)) {
      throw new DuplicateRowError(source.Plot, source.Row);
    }
    seen.add(key);

    rows.push({
      index,
      plot: source.Plot,
      range: source.Range,
      row: source.Row,
      barcode: String(source.Barcode),
    });
  });

  return rows;
}

/** Rows of each plot, plots in first-appearance order, rows ascending */
export function groupByPlot(rows: readonly FieldRow[]): Map<number, FieldRow[]> {
  const plots = new Map<number, FieldRow[]>();

  for (const row of rows) {
    const group = plots.get(row.plot);
    if (group) {
      group.push(row);
    } else {
      plots.set(row.plot, [row]);
    }
  }

  for (const [plot, group] of plots) {
    group.sort((x, y) => x.row - y.row);

    const ranges = new Set(group.map((r) => r.range));
    if (ranges.size > 1) {
      throw new InvalidTableError(
        `Plot ${plot} spans ranges ${[...ranges].join(', ')}; a plot must lie in a single range`,
        ErrorCodes.PLOT_SPANS_RANGES,
        { plot, ranges: [...ranges] }
      );
    }
  }

  return plots;
}

// ============================================================================
// Option Checks
// ============================================================================

/** A plot subset always yields one footprint per remaining row */
export function emitsRowUnits(options: Pick<GridOptions, 'individualRows' | 'plotSubset'>): boolean {
  return options.individualRows || options.plotSubset > 0;
}

export function checkGridOptions(options: GridOptions): void {
  const { stagger, plotSubset, rowsPerPlot } = options;

  if (!Number.isInteger(plotSubset) || plotSubset < 0) {
    throw new ConfigurationError(`Plot subset must be a whole number of rows, got ${plotSubset}`, { plotSubset });
  }
  if (!Number.isInteger(rowsPerPlot) || rowsPerPlot < 1) {
    throw new ConfigurationError(`Rows per plot must be a whole number of at least 1, got ${rowsPerPlot}`, {
      rowsPerPlot,
    });
  }

  if (stagger) {
    if (stagger.startRow === 1) {
      throw new ConfigurationError('Stagger must start beyond the first row (stagger.startRow != 1)', {
        startRow: stagger.startRow,
      });
    }
    if (stagger.startRow > stagger.rowsPerPass + 1) {
      throw new ConfigurationError(
        `Stagger start row ${stagger.startRow} lies beyond the first pass of ${stagger.rowsPerPass} row(s); stagger is expected to repeat with every pass`,
        { startRow: stagger.startRow, rowsPerPass: stagger.rowsPerPass }
      );
    }
    if (rowsPerPlot > 1 && !emitsRowUnits(options) && rowsPerPlot > stagger.rowsPerPass / 2) {
      throw new ConfigurationError(
        `Merged ${rowsPerPlot}-row plots cannot follow a ${stagger.rowsPerPass}-row planter stagger; use individual rows`,
        { rowsPerPlot, rowsPerPass: stagger.rowsPerPass }
      );
    }
  }

  if (plotSubset > 0) {
    if (rowsPerPlot === 1) {
      throw new ConfigurationError('Cannot take a subset of single-row plots (rowsPerPlot is 1)', { plotSubset });
    }
    if (rowsPerPlot < 3) {
      throw new ConfigurationError(`Cannot take a central subset of ${rowsPerPlot}-row plots; need at least 3 rows`, {
        plotSubset,
        rowsPerPlot,
      });
    }
    if (rowsPerPlot <= 2 * plotSubset) {
      throw new ConfigurationError(
        `Dropping ${plotSubset} row(s) from each side of ${rowsPerPlot}-row plots leaves no rows`,
        { plotSubset, rowsPerPlot }
      );
    }
  }
}

// ============================================================================
// Geometry
// ============================================================================

/** Whether a row falls in a pass that the planter stagger shifts */
export function isStaggeredRow(row: number, stagger: StaggerSpec): boolean {
  const pass = Math.ceil((Math.floor(row - stagger.startRow) + 1 + stagger.rowsPerPass) / stagger.rowsPerPass);
  return pass % 2 === 0;
}

export function unitRect(range: number, rowLo: number, rowHi: number, options: GridOptions): LocalRect {
  const { rowSpacing, rangeSpacing, stagger } = options;
  const shift = stagger && isStaggeredRow(rowLo, stagger) ? stagger.offset : 0;
  const rangeMin = (range - 1) * rangeSpacing + shift;

  return {
    rangeMin,
    rangeMax: rangeMin + rangeSpacing,
    rowMin: (rowLo - 1) * rowSpacing - rowSpacing / 2,
    rowMax: (rowHi - 1) * rowSpacing + rowSpacing / 2,
  };
}

function applySubset(plots: Map<number, FieldRow[]>, subset: number): Map<number, FieldRow[]> {
  if (subset === 0) return plots;

  const kept = new Map<number, FieldRow[]>();
  for (const [plot, rows] of plots) {
    const interior = rows.slice(subset, rows.length - subset);
    if (interior.length === 0) {
      throw new ConfigurationError(
        `Plot ${plot} has ${rows.length} row(s); dropping ${subset} from each side leaves none`,
        { plot, rows: rows.length, plotSubset: subset }
      );
    }
    kept.set(plot, interior);
  }
  return kept;
}

function mergedUnits(plots: Map<number, FieldRow[]>, options: GridOptions, warnings: string[]): LayoutUnit[] {
  const units: LayoutUnit[] = [];

  for (const [plot, rows] of plots) {
    const first = rows[0];
    const last = rows[rows.length - 1];
    const rowIndexes = rows.map((r) => r.row);

    if (rows.length !== options.rowsPerPlot) {
      warnings.push(`Plot ${plot} has ${rows.length} row(s), expected ${options.rowsPerPlot}`);
    }
    if (last.row - first.row + 1 !== rows.length) {
      warnings.push(`Plot ${plot} rows ${rowIndexes.join(', ')} are not contiguous; footprint covers the gaps`);
    }

    units.push({
      kind: 'merged',
      key: String(plot),
      plot,
      range: first.range,
      rows: rowIndexes,
      barcodes: rows.map((r) => r.barcode),
      id: first.barcode,
      local: unitRect(first.range, first.row, last.row, options),
    });
  }

  return units;
}

function rowUnits(
  rows: readonly FieldRow[],
  allPlots: Map<number, FieldRow[]>,
  keptPlots: Map<number, FieldRow[]>,
  options: GridOptions
): LayoutUnit[] {
  const units: LayoutUnit[] = [];

  for (const row of rows) {
    const kept = keptPlots.get(row.plot) ?? [];
    // Dropped by the plot subset
    if (!kept.includes(row)) continue;
    const position = (allPlots.get(row.plot) ?? kept).indexOf(row) + 1;

    units.push({
      kind: 'row',
      key: `${row.plot}:${row.row}`,
      plot: row.plot,
      range: row.range,
      rows: [row.row],
      barcodes: [row.barcode],
      id: options.rowsPerPlot > 1 ? `${row.barcode}_${position}` : row.barcode,
      siblingRows: kept.map((s) => s.row),
      local: unitRect(row.range, row.row, row.row, options),
    });
  }

  return units;
}

function tableShapeWarning(rows: readonly FieldRow[]): string | undefined {
  const ranges = new Set(rows.map((r) => r.range)).size;
  const rowCount = new Set(rows.map((r) => r.row)).size;
  if (rows.length > 0 && rows.length !== ranges * rowCount) {
    return `Table has ${rows.length} row(s) but ${ranges} range(s) x ${rowCount} row position(s); the field is not a full grid`;
  }
  return undefined;
}

// ============================================================================
// Main Grid Function
// ============================================================================

/**
 * Build the plot units of a field table.
 * Merged units follow the first appearance of their plot; row units follow
 * table order. A plot subset switches to row units.
 */
export function buildLayoutGrid(table: FieldTable, options: GridOptions): LayoutGrid {
  checkGridOptions(options);

  const rows = readFieldRows(table);
  const allPlots = groupByPlot(rows);
  const plots = applySubset(allPlots, options.plotSubset);
  const warnings: string[] = [];

  const shapeWarning = tableShapeWarning(rows);
  if (shapeWarning) warnings.push(shapeWarning);

  const units = emitsRowUnits(options)
    ? rowUnits(rows, allPlots, plots, options)
    : mergedUnits(plots, options, warnings);

  return { units, warnings };
}
