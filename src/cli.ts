#!/usr/bin/env node

import { readFileSync, writeFileSync } from 'fs';
import { basename, extname, resolve } from 'path';
import { generatePlots, type GenerateError } from './generator.js';
import { parseAndValidateJob, validateJobSchema } from './config/validate.js';
import { getPlotJobJsonSchemaString } from './config/json-schema.js';
import type { PlotJob } from './config/schema.js';
import { exportGeoJSON } from './exporters/geojson.js';
import { exportPlotsSVG } from './exporters/svg.js';

const args = process.argv.slice(2);

// Detect subcommand
const command = args[0];

if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
  showHelp();
  process.exit(0);
}

if (command === 'generate') {
  runGenerate(args.slice(1));
} else if (command === 'schema') {
  runSchema(args.slice(1));
} else if (command?.endsWith('.json')) {
  // Auto-detect: JSON file means generate
  runGenerate(args);
} else {
  console.error(`Error: Unknown command "${command}"`);
  console.error('Run plotgrid --help for usage');
  process.exit(1);
}

function showHelp() {
  console.log(`
plotgrid - Georeferenced plot footprints for field trials

Commands:
  plotgrid generate <job.json> [options]   Build raw and buffered plot footprints
  plotgrid schema [options]                Output JSON Schema for job files

Generate Options:
  --out <prefix>       Output file prefix (default: job file name, prefixed by config.field)
  --svg                Also write <prefix>_Rotated_plots.svg
  --square-svg         Also write <prefix>_Square_plots.svg (field before rotation)
  --no-rewind          Keep rings in frame order instead of counter-clockwise
  --pretty             Pretty-print GeoJSON
  --debug              Show debug output

Schema Options:
  --out <file.json>    Write schema to file (default: stdout)

Examples:
  plotgrid generate trial.json --out plots --svg
  plotgrid trial.json --square-svg          # auto-detects generate
  plotgrid schema --out plotgrid-job.schema.json
`);
}

function runSchema(args: string[]) {
  let outputFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--out' && args[i + 1]) {
      outputFile = args[++i];
    }
  }

  const schema = getPlotJobJsonSchemaString();

  if (outputFile) {
    writeFileSync(outputFile, schema);
    console.log(`JSON Schema written to: ${outputFile}`);
  } else {
    console.log(schema);
  }
}

/**
 * Format error in a way that editors can parse for click-to-navigate.
 */
function formatError(file: string, error: GenerateError): string {
  return [file, `error[${error.code}]`, error.message].join(': ');
}

function defaultPrefix(inputFile: string, field: string | undefined): string {
  const name = basename(inputFile, extname(inputFile));
  return field ? `${field}_${name}` : name;
}

function runGenerate(args: string[]) {
  if (args.length === 0 || args[0].startsWith('-')) {
    console.error('Error: No input file specified');
    console.error('Usage: plotgrid generate <job.json> [options]');
    process.exit(1);
  }

  const inputFile = args[0];
  const absoluteInputFile = resolve(inputFile);
  let prefix: string | undefined;
  let rotatedSvg = false;
  let squareSvg = false;
  let rewind = true;
  let pretty = false;
  let debug = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--out' && args[i + 1]) {
      prefix = args[++i];
    } else if (arg === '--svg') {
      rotatedSvg = true;
    } else if (arg === '--square-svg') {
      squareSvg = true;
    } else if (arg === '--no-rewind') {
      rewind = false;
    } else if (arg === '--pretty') {
      pretty = true;
    } else if (arg === '--debug') {
      debug = true;
    }
  }

  try {
    const source = readFileSync(inputFile, 'utf-8');

    // Parse and validate with TypeBox schema
    let job: PlotJob;
    try {
      job = parseAndValidateJob(source);
    } catch (e) {
      console.error(e instanceof Error ? e.message : 'Invalid job format');
      process.exit(1);
    }

    for (const warning of validateJobSchema(job).warnings) {
      console.warn(`Warning: ${warning}`);
    }

    console.log('Generating plot footprints...');
    const result = generatePlots(job.table, job.config, { debug });

    if (!result.success) {
      console.error('');
      for (const error of result.errors) {
        console.error(formatError(absoluteInputFile, error));
      }
      console.error('');
      console.error(`Generation failed with ${result.errors.length} error(s).`);
      process.exit(1);
    }

    for (const warning of result.warnings) {
      console.warn(`Warning: ${warning}`);
    }

    const out = prefix ?? defaultPrefix(inputFile, result.config.field);
    const geojsonOptions = { pretty, rewind, spatialReference: result.spatialReference };

    console.log('Generation successful!');
    console.log(`  Plots: ${result.raw.records.length}`);
    if (result.spatialReference) {
      console.log(`  CRS: ${result.spatialReference.proj4}`);
    }

    writeFileSync(`${out}.geojson`, exportGeoJSON(result.raw, geojsonOptions));
    console.log(`  Raw footprints written to: ${out}.geojson`);

    writeFileSync(`${out}_buff.geojson`, exportGeoJSON(result.buffered, geojsonOptions));
    console.log(`  Buffered footprints written to: ${out}_buff.geojson`);

    if (rotatedSvg) {
      writeFileSync(
        `${out}_Rotated_plots.svg`,
        exportPlotsSVG(result.raw, result.buffered, { view: 'rotated', title: out })
      );
      console.log(`  SVG written to: ${out}_Rotated_plots.svg`);
    }

    if (squareSvg) {
      writeFileSync(
        `${out}_Square_plots.svg`,
        exportPlotsSVG(result.raw, result.buffered, { view: 'square', title: out })
      );
      console.log(`  SVG written to: ${out}_Square_plots.svg`);
    }
  } catch (e) {
    if (e instanceof Error) {
      console.error(`${absoluteInputFile}: error: ${e.message}`);
    } else {
      console.error(`${absoluteInputFile}: error: Unknown error occurred`);
    }
    process.exit(1);
  }
}
