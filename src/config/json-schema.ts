/**
 * JSON Schema for job files, for editor validation and documentation.
 */

import { PlotJobSchema } from './schema.js';

export function getPlotJobJsonSchema(): object {
  return PlotJobSchema;
}

export function getPlotJobJsonSchemaString(indent = 2): string {
  return JSON.stringify(PlotJobSchema, null, indent);
}
