import { ConfigurationError, PlotLayoutError, type ErrorPhase } from './errors.js';
import { buildReferenceFrame, frameAngleDegrees } from './frame/index.js';
import { buildLayoutGrid, emitsRowUnits } from './grid/index.js';
import { assemblePlots } from './assembly/index.js';
import { applyBuffer } from './buffer/index.js';
import { describeSpatialReference, type SpatialReference } from './crs/index.js';
import { validateCollection, validateContainment, type ValidationError } from './validation/index.js';
import { resolveConfig, type FieldTable, type LayoutConfig } from './config/types.js';
import type { LayoutConfigInput } from './config/schema.js';
import { validateConfigSchema } from './config/validate.js';
import type { GeometryCollection, LayoutGrid, ReferenceFrame } from './geometry/types.js';

// ============================================================================
// Generate Error
// ============================================================================

export interface GenerateError {
  phase: ErrorPhase;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Generate Options
// ============================================================================

export interface GenerateOptions {
  /** Check ring validity and buffer containment after building (default true) */
  validate?: boolean;
  /** Log intermediate results to the console */
  debug?: boolean;
}

// ============================================================================
// Generate Result
// ============================================================================

export interface PlotCollections {
  config: LayoutConfig;
  frame: ReferenceFrame;
  /** Local (pre-rotation) units, for square plot views */
  grid: LayoutGrid;
  raw: GeometryCollection<'raw'>;
  buffered: GeometryCollection<'buffered'>;
  spatialReference?: SpatialReference;
  warnings: string[];
}

export interface GenerateSuccess extends PlotCollections {
  success: true;
  errors: [];
}

export interface GenerateFailure {
  success: false;
  errors: GenerateError[];
  warnings: string[];
}

export type GenerateResult = GenerateSuccess | GenerateFailure;

export class GeometryValidationError extends Error {
  constructor(public readonly errors: ValidationError[]) {
    super(`Generated geometry failed validation:\n${errors.map((e) => `  ${e.message}`).join('\n')}`);
    this.name = 'GeometryValidationError';
  }
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Build raw and buffered plot collections from a field table.
 * Throws PlotLayoutError subclasses for invalid input and
 * GeometryValidationError if the output breaks a ring invariant.
 */
export function buildPlotCollections(
  table: FieldTable,
  input: LayoutConfigInput,
  options: GenerateOptions = {}
): PlotCollections {
  const { validate = true, debug = false } = options;

  const checked = validateConfigSchema(input);
  if (!checked.success) {
    const problems = checked.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message));
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { errors: checked.errors });
  }

  const config = resolveConfig(input);

  if (debug) {
    console.log('Resolved config:', JSON.stringify(config, null, 2));
  }

  const spatialReference = describeSpatialReference(config);
  const warnings: string[] = [];
  if (!spatialReference) {
    warnings.push('No UTM zone given: output has no coordinate reference system');
  }

  // Grid
  const grid = buildLayoutGrid(table, config);
  warnings.push(...grid.warnings);

  if (debug) {
    const kind = emitsRowUnits(config) ? 'row' : 'merged';
    console.log(`Layout grid: ${grid.units.length} ${kind} unit(s) from ${table.length} table row(s)`);
  }

  // Frame
  const frame = buildReferenceFrame(config.a, config.b, config.epsilon);

  if (debug) {
    console.log('Reference frame:', {
      origin: frame.origin,
      u: frame.u,
      v: frame.v,
      degrees: frameAngleDegrees(frame).toFixed(4),
    });
  }

  // Assemble and buffer
  const raw = assemblePlots(frame, grid.units, { utmZone: config.utmZone, hemisphere: config.hemisphere });
  const buffered = applyBuffer(raw, config.rowBuffer, config.rangeBuffer, config.epsilon);

  if (validate) {
    const errors = [...validateCollection(raw), ...validateCollection(buffered), ...validateContainment(raw, buffered)];
    if (errors.length > 0) {
      throw new GeometryValidationError(errors);
    }
  }

  if (debug) {
    console.log(`Assembled ${raw.records.length} raw and ${buffered.records.length} buffered footprint(s)`);
  }

  return { config, frame, grid, raw, buffered, spatialReference, warnings };
}

/**
 * Run the full pipeline and report input problems as result errors
 * instead of exceptions.
 */
export function generatePlots(
  table: FieldTable,
  input: LayoutConfigInput,
  options: GenerateOptions = {}
): GenerateResult {
  try {
    const collections = buildPlotCollections(table, input, options);
    return { success: true, errors: [], ...collections };
  } catch (e) {
    if (e instanceof PlotLayoutError) {
      return {
        success: false,
        errors: [{ phase: e.phase, code: e.code, message: e.message, details: e.details }],
        warnings: [],
      };
    }
    if (e instanceof GeometryValidationError) {
      return {
        success: false,
        errors: e.errors.map((err) => ({
          phase: 'validate' as const,
          code: err.code,
          message: err.message,
          details: err.key ? { key: err.key, ...err.details } : err.details,
        })),
        warnings: [],
      };
    }
    throw e;
  }
}
