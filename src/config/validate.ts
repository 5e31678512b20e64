/**
 * Configuration and job validation using TypeBox.
 * Provides detailed, user-friendly error messages.
 */

import { Value } from '@sinclair/typebox/value';
import type { TSchema } from '@sinclair/typebox';
import { LayoutConfigSchema, PlotJobSchema, type LayoutConfigInput, type PlotJob } from './schema.js';

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  success: boolean;
  errors: ValidationError[];
  /** Semantic warnings (not schema violations but potential issues) */
  warnings: string[];
}

/**
 * Format a TypeBox error path to be user-friendly.
 */
export function formatPath(path: string): string {
  // Remove leading slash, make array indices clearer
  return path.replace(/^\//, '').replace(/\/(\d+)\//g, '[$1].').replace(/\/(\d+)$/, '[$1]').replace(/\//g, '.');
}

/**
 * Get a human-readable error message for a TypeBox error.
 */
function formatErrorMessage(error: { path: string; message: string; value: unknown }): string {
  const path = formatPath(error.path);

  if (error.message.includes('Expected union value')) {
    if (path.endsWith('unit')) {
      return `must be "feet" or "meter"`;
    }
    if (path.endsWith('hemisphere')) {
      return `must be "N" or "S"`;
    }
    if (path.endsWith('Barcode')) {
      return `must be a string or a number`;
    }
  }

  // Bound errors also start with "Expected number"
  if (/ to be (greater|less)/.test(error.message)) {
    return error.message.replace(/^Expected \w+ to be /, 'must be ');
  }

  if (error.message.includes('length greater or equal')) {
    return `must not be empty`;
  }

  if (error.message.includes('Expected integer')) {
    return `must be a whole number`;
  }

  if (error.message.includes('Expected number')) {
    return `must be a number`;
  }

  if (error.message.includes('Expected string')) {
    return `must be a string`;
  }

  if (error.message.includes('Expected boolean')) {
    return `must be true or false`;
  }

  if (error.message.includes('Expected array') || error.message.includes('Expected tuple')) {
    return path === 'a' || path === 'b' ? `must be an [easting, northing] pair` : `must be an array`;
  }

  if (error.message.includes('Expected object')) {
    return `must be an object`;
  }

  if (error.message.includes('Expected required property')) {
    return `missing required property`;
  }

  if (error.message.includes('Unexpected property')) {
    return `unknown property (check spelling or see schema)`;
  }

  return error.message;
}

function collectSchemaErrors(schema: TSchema, data: unknown): ValidationError[] {
  return [...Value.Errors(schema, data)].map((error) => ({
    path: formatPath(error.path),
    message: formatErrorMessage({ path: error.path, message: error.message, value: error.value }),
    value: error.value,
  }));
}

function configWarnings(config: LayoutConfigInput, prefix = ''): string[] {
  const warnings: string[] = [];

  if (config.utmZone === undefined) {
    warnings.push(
      `${prefix}utmZone is not set: no coordinate reference system will be attached, which may make the output hard to load in GIS tools`
    );
  }

  if (config.hemisphere !== undefined && config.utmZone === undefined) {
    warnings.push(`${prefix}hemisphere has no effect without utmZone`);
  }

  if (config.stagger && config.stagger.offset === 0) {
    warnings.push(`${prefix}stagger.offset is 0: staggered rows will not move`);
  }

  return warnings;
}

/**
 * Validate a parsed JSON object against the LayoutConfig schema.
 */
export function validateConfigSchema(data: unknown): ValidationResult {
  const errors = collectSchemaErrors(LayoutConfigSchema, data);
  const warnings = errors.length === 0 && Value.Check(LayoutConfigSchema, data) ? configWarnings(data) : [];

  return {
    success: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate a parsed job file ({ config, table }).
 */
export function validateJobSchema(data: unknown): ValidationResult {
  const errors = collectSchemaErrors(PlotJobSchema, data);
  const warnings: string[] = [];

  if (errors.length === 0 && Value.Check(PlotJobSchema, data)) {
    warnings.push(...configWarnings(data.config, 'config.'));
    if (data.table.length === 0) {
      warnings.push('table has no rows');
    }
  }

  return {
    success: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Parse and validate job JSON in one step.
 * Returns the validated job or throws with detailed errors.
 */
export function parseAndValidateJob(json: string): PlotJob {
  let data: unknown;

  try {
    data = JSON.parse(json);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid JSON: ${reason}`);
  }

  const result = validateJobSchema(data);

  if (!result.success || !Value.Check(PlotJobSchema, data)) {
    const errorMessages = result.errors.map((e) => (e.path ? `  ${e.path}: ${e.message}` : `  ${e.message}`));
    throw new Error(`Invalid job:\n${errorMessages.join('\n')}`);
  }

  return data;
}

/**
 * Format validation result as a user-friendly string.
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      if (error.path) {
        lines.push(`  ${error.path}: ${error.message}`);
      } else {
        lines.push(`  ${error.message}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ${warning}`);
    }
  }

  if (lines.length === 0) {
    return 'Valid';
  }

  return lines.join('\n');
}
