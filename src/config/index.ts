export {
  LayoutConfigSchema,
  PlotJobSchema,
  TableRowSchema,
  StaggerSchema,
  Point2DSchema,
  type LayoutConfigInput,
  type PlotJob,
  type TableRow,
  type StaggerSpec,
  type Point2D,
} from './schema.js';
export { resolveConfig, DEFAULT_LAYOUT_OPTIONS, type LayoutConfig, type FieldTable } from './types.js';
export {
  validateConfigSchema,
  validateJobSchema,
  parseAndValidateJob,
  formatValidationResult,
  type ValidationError,
  type ValidationResult,
} from './validate.js';
export { getPlotJobJsonSchema, getPlotJobJsonSchemaString } from './json-schema.js';
