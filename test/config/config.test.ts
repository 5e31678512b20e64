import { describe, it, expect } from 'vitest';
import {
  formatValidationResult,
  parseAndValidateJob,
  validateConfigSchema,
  validateJobSchema,
} from '../../src/config/validate.js';
import { resolveConfig, DEFAULT_LAYOUT_OPTIONS } from '../../src/config/types.js';
import { getPlotJobJsonSchemaString } from '../../src/config/json-schema.js';

describe('Configuration', () => {
  describe('validateConfigSchema', () => {
    it('should accept a minimal config and warn about the missing zone', () => {
      const result = validateConfigSchema({ a: [0, 0], b: [0, 100] });

      expect(result.success).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toMatch(/^utmZone is not set/);
    });

    it('should accept a full config without warnings', () => {
      const result = validateConfigSchema({
        a: [746239.817, 3382052.264],
        b: [746334.224, 3382152.87],
        rowSpacing: 0.762,
        rangeSpacing: 7.62,
        rowBuffer: 0.05,
        rangeBuffer: 0.6,
        rowsPerPlot: 2,
        individualRows: true,
        unit: 'meter',
        stagger: { startRow: 3, rowsPerPass: 4, offset: 0.5 },
        utmZone: '14',
        hemisphere: 'N',
        field: 'North Block',
      });

      expect(result.success).toBe(true);
      expect(result.warnings).toEqual([]);
    });

    it('should report a missing AB point', () => {
      const result = validateConfigSchema({ a: [0, 0] });
      expect(result.success).toBe(false);
      expect(result.errors.some((e) => e.path === 'b' && e.message === 'missing required property')).toBe(true);
    });

    it('should report unknown properties', () => {
      const result = validateConfigSchema({ a: [0, 0], b: [0, 1], rowSpaceing: 2 });
      expect(result.errors).toContainEqual({
        path: 'rowSpaceing',
        message: 'unknown property (check spelling or see schema)',
        value: 2,
      });
    });

    it('should require positive spacing', () => {
      const result = validateConfigSchema({ a: [0, 0], b: [0, 1], rowSpacing: 0 });
      expect(result.errors).toContainEqual({ path: 'rowSpacing', message: 'must be greater than 0', value: 0 });
    });

    it('should require whole rows per plot', () => {
      const result = validateConfigSchema({ a: [0, 0], b: [0, 1], rowsPerPlot: 1.5 });
      expect(result.errors).toContainEqual({ path: 'rowsPerPlot', message: 'must be a whole number', value: 1.5 });
    });

    it('should reject an unknown unit', () => {
      const result = validateConfigSchema({ a: [0, 0], b: [0, 1], unit: 'yards' });
      expect(result.errors.map((e) => e.path)).toContain('unit');
    });

    it('should reject an empty zone', () => {
      const result = validateConfigSchema({ a: [0, 0], b: [0, 1], utmZone: '' });
      expect(result.errors).toContainEqual({ path: 'utmZone', message: 'must not be empty', value: '' });
    });

    it('should warn about a hemisphere without a zone', () => {
      const result = validateConfigSchema({ a: [0, 0], b: [0, 1], hemisphere: 'S' });
      expect(result.warnings).toContain('hemisphere has no effect without utmZone');
    });
  });

  describe('validateJobSchema', () => {
    it('should prefix config warnings and warn about an empty table', () => {
      const result = validateJobSchema({
        config: { a: [0, 0], b: [0, 1], utmZone: '14', stagger: { startRow: 2, rowsPerPass: 2, offset: 0 } },
        table: [],
      });

      expect(result.success).toBe(true);
      expect(result.warnings).toEqual(['config.stagger.offset is 0: staggered rows will not move', 'table has no rows']);
    });

    it('should report nested config paths', () => {
      const result = validateJobSchema({ config: { a: [0, 0], b: [0, 1], rangeBuffer: -1 }, table: [] });
      expect(result.success).toBe(false);
      expect(result.errors.map((e) => e.path)).toContain('config.rangeBuffer');
    });
  });

  describe('parseAndValidateJob', () => {
    it('should return a valid job', () => {
      const job = parseAndValidateJob(
        JSON.stringify({ config: { a: [0, 0], b: [0, 100] }, table: [{ Plot: 1, Range: 1, Row: 1, Barcode: 'A' }] })
      );
      expect(job.config.b).toEqual([0, 100]);
      expect(job.table).toHaveLength(1);
    });

    it('should reject malformed JSON', () => {
      expect(() => parseAndValidateJob('{ "config": ')).toThrow(/^Invalid JSON: /);
    });

    it('should list schema errors by path', () => {
      expect(() => parseAndValidateJob('{ "config": { "a": [0, 0] }, "table": [] }')).toThrow(
        /config\.b: missing required property/
      );
    });
  });

  describe('resolveConfig', () => {
    it('should fill defaults', () => {
      const config = resolveConfig({ a: [1, 2], b: [3, 4] });

      expect(config).toEqual({
        a: { x: 1, y: 2 },
        b: { x: 3, y: 4 },
        rowSpacing: 2.5,
        rangeSpacing: 25,
        rowBuffer: 0.1,
        rangeBuffer: 2,
        rowsPerPlot: 1,
        individualRows: false,
        unit: 'feet',
        plotSubset: 0,
        hemisphere: 'N',
        epsilon: DEFAULT_LAYOUT_OPTIONS.epsilon,
      });
    });

    it('should keep given values and freeze the result', () => {
      const config = resolveConfig({ a: [0, 0], b: [0, 1], rowSpacing: 0.75, stagger: { startRow: 2, rowsPerPass: 2, offset: 1 } });

      expect(config.rowSpacing).toBe(0.75);
      expect(config.stagger).toEqual({ startRow: 2, rowsPerPass: 2, offset: 1 });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.stagger)).toBe(true);
    });
  });

  describe('JSON Schema', () => {
    it('should describe the job file', () => {
      const schema = JSON.parse(getPlotJobJsonSchemaString());

      expect(schema.$id).toBe('PlotJob');
      expect(schema.title).toBe('Plot Layout Job');
      expect(schema.required).toEqual(['config', 'table']);
      expect(schema.properties.config.required).toEqual(['a', 'b']);
    });
  });

  describe('formatValidationResult', () => {
    it('should report a clean result', () => {
      expect(formatValidationResult({ success: true, errors: [], warnings: [] })).toBe('Valid');
    });

    it('should list errors then warnings', () => {
      const text = formatValidationResult({
        success: false,
        errors: [{ path: 'b', message: 'missing required property' }],
        warnings: ['table has no rows'],
      });
      expect(text).toBe('Errors:\n  b: missing required property\n\nWarnings:\n  table has no rows');
    });
  });
});
