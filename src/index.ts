// ============================================================================
// plotgrid - georeferenced plot footprints for field trials
// ============================================================================

// Geometry
export * from './geometry/index.js';

// Errors
export {
  ErrorCodes,
  PlotLayoutError,
  MissingColumnError,
  DuplicateRowError,
  InvalidTableError,
  ConfigurationError,
  DegenerateFrameError,
  EmptyLayoutError,
  InvalidBufferError,
  type ErrorCode,
  type ErrorPhase,
  type BufferAxis,
} from './errors.js';

// Reference frame
export { buildReferenceFrame, toAbsolute, toLocal, frameAngleDegrees, DEFAULT_EPSILON } from './frame/index.js';

// Layout grid
export {
  buildLayoutGrid,
  readFieldRows,
  groupByPlot,
  checkGridOptions,
  emitsRowUnits,
  isStaggeredRow,
  REQUIRED_COLUMNS,
  type FieldRow,
} from './grid/index.js';

// Assembly and buffer
export { assemblePlots, rectToRing } from './assembly/index.js';
export { applyBuffer } from './buffer/index.js';

// Validation
export { validateCollection, validateContainment, ValidationCodes, type ValidationError } from './validation/index.js';

// Configuration
export {
  LayoutConfigSchema,
  PlotJobSchema,
  TableRowSchema,
  resolveConfig,
  DEFAULT_LAYOUT_OPTIONS,
  validateConfigSchema,
  validateJobSchema,
  parseAndValidateJob,
  formatValidationResult,
  getPlotJobJsonSchema,
  getPlotJobJsonSchemaString,
  type LayoutConfig,
  type LayoutConfigInput,
  type FieldTable,
  type PlotJob,
  type TableRow,
  type StaggerSpec,
  type ValidationResult,
  type ValidationError as ConfigValidationError,
} from './config/index.js';

// Coordinate reference
export { describeSpatialReference, type SpatialReference } from './crs/index.js';

// Exporters
export {
  exportGeoJSON,
  toFeatureCollection,
  toFeature,
  type GeoJSONExportOptions,
  type PlotProperties,
  type PlotFeatureCollection,
} from './exporters/geojson.js';
export { exportPlotsSVG, type SVGExportOptions, type PlotView } from './exporters/svg.js';

// Generator (full pipeline)
export {
  buildPlotCollections,
  generatePlots,
  GeometryValidationError,
  type GenerateOptions,
  type GenerateResult,
  type GenerateSuccess,
  type GenerateFailure,
  type GenerateError,
  type PlotCollections,
} from './generator.js';
