import type { GeometryCollection, PlotRecord, Point, ReferenceFrame } from '../geometry/types.js';
import { localRing } from '../geometry/index.js';
import { frameAngleDegrees } from '../frame/index.js';

// ============================================================================
// SVG Export Options
// ============================================================================

export type PlotView = 'rotated' | 'square';

export interface SVGExportOptions {
  /** 'rotated' draws absolute coordinates; 'square' the field before rotation */
  view?: PlotView;
  width?: number;
  height?: number;
  padding?: number;
  showLabels?: boolean;
  title?: string;
  backgroundColor?: string;
  plotStrokeColor?: string;
  plotStrokeWidth?: number;
  bufferFillColor?: string;
  bufferFillOpacity?: number;
  labelColor?: string;
  labelFontSize?: number;
}

const defaultOptions: Required<SVGExportOptions> = {
  view: 'rotated',
  width: 1000,
  height: 1000,
  padding: 40,
  showLabels: true,
  title: '',
  backgroundColor: '#ffffff',
  plotStrokeColor: '#000000',
  plotStrokeWidth: 1,
  bufferFillColor: '#ff0000',
  bufferFillOpacity: 0.5,
  labelColor: '#0000ff',
  labelFontSize: 7,
};

// ============================================================================
// Coordinate Transform
// ============================================================================

interface Transform {
  scale: number;
  offsetX: number;
  offsetY: number;
  height: number; // For Y-flip
}

function createTransform(shapes: Point[][], opts: Required<SVGExportOptions>): Transform {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const shape of shapes) {
    for (const point of shape) {
      minX = Math.min(minX, point.x);
      minY = Math.min(minY, point.y);
      maxX = Math.max(maxX, point.x);
      maxY = Math.max(maxY, point.y);
    }
  }

  const contentWidth = maxX - minX;
  const contentHeight = maxY - minY;

  const availableWidth = opts.width - opts.padding * 2;
  const availableHeight = opts.height - opts.padding * 2;
  const scale = Math.min(availableWidth / contentWidth, availableHeight / contentHeight);

  // Center the content
  const offsetX = opts.padding + (availableWidth - contentWidth * scale) / 2 - minX * scale;
  const offsetY = opts.padding + (availableHeight - contentHeight * scale) / 2 - minY * scale;

  return { scale, offsetX, offsetY, height: opts.height };
}

function transformPoint(p: Point, t: Transform): Point {
  return {
    x: p.x * t.scale + t.offsetX,
    y: t.height - (p.y * t.scale + t.offsetY), // Flip Y
  };
}

// ============================================================================
// SVG Helpers
// ============================================================================

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function pointsToPath(points: Point[]): string {
  if (points.length === 0) return '';
  const commands = points.map((p, i) => (i === 0 ? `M ${p.x.toFixed(2)} ${p.y.toFixed(2)}` : `L ${p.x.toFixed(2)} ${p.y.toFixed(2)}`));
  commands.push('Z');
  return commands.join(' ');
}

function calculateCenter(points: Point[]): Point {
  // Rings are closed; the repeated vertex would bias the mean
  const open = points.slice(0, -1);
  const x = open.reduce((sum, p) => sum + p.x, 0) / open.length;
  const y = open.reduce((sum, p) => sum + p.y, 0) / open.length;
  return { x, y };
}

/** Labels run along the rows, turned so they never read upside down */
function labelRotation(frame: ReferenceFrame): number {
  // SVG y grows downward, so the rows' counter-clockwise angle is negated
  let degrees = 90 - frameAngleDegrees(frame);
  while (degrees > 90) degrees -= 180;
  while (degrees <= -90) degrees += 180;
  return Math.abs(degrees) < 0.005 ? 0 : degrees;
}

/** Square view puts rows on x and ranges on y */
function recordShape(record: PlotRecord, view: PlotView): Point[] {
  if (view === 'square') {
    return localRing(record.local).map((p) => ({ x: p.row, y: p.range }));
  }
  return [...record.ring];
}

// ============================================================================
// SVG Element Generation
// ============================================================================

function generatePlotsSVG(shapes: Point[][], t: Transform, opts: Required<SVGExportOptions>): string {
  return shapes
    .map((shape) => {
      const path = pointsToPath(shape.map((p) => transformPoint(p, t)));
      return `<path d="${path}" fill="none" stroke="${opts.plotStrokeColor}" stroke-width="${opts.plotStrokeWidth}" />`;
    })
    .join('\n    ');
}

function generateBuffersSVG(shapes: Point[][], t: Transform, opts: Required<SVGExportOptions>): string {
  return shapes
    .map((shape) => {
      const path = pointsToPath(shape.map((p) => transformPoint(p, t)));
      return `<path d="${path}" fill="${opts.bufferFillColor}" fill-opacity="${opts.bufferFillOpacity}" stroke="none" />`;
    })
    .join('\n    ');
}

function generateLabelsSVG(
  records: readonly PlotRecord[],
  shapes: Point[][],
  rotation: number,
  t: Transform,
  opts: Required<SVGExportOptions>
): string {
  if (!opts.showLabels) return '';

  return records
    .map((record, i) => {
      const center = transformPoint(calculateCenter(shapes[i]), t);
      const x = center.x.toFixed(2);
      const y = center.y.toFixed(2);
      const transform = rotation !== 0 ? ` transform="rotate(${rotation.toFixed(2)} ${x} ${y})"` : '';
      return (
        `<text x="${x}" y="${y}" font-size="${opts.labelFontSize}" fill="${opts.labelColor}" ` +
        `text-anchor="middle" dominant-baseline="middle" font-family="Arial, sans-serif"${transform}>` +
        `${escapeXml(String(record.plot))}</text>`
      );
    })
    .join('\n    ');
}

// ============================================================================
// Main Export Function
// ============================================================================

/**
 * Draw raw footprints as outlines with buffered footprints filled inside.
 */
export function exportPlotsSVG(
  raw: GeometryCollection<'raw'>,
  buffered: GeometryCollection<'buffered'>,
  options: SVGExportOptions = {}
): string {
  const opts: Required<SVGExportOptions> = { ...defaultOptions, ...options };

  const rawShapes = raw.records.map((r) => recordShape(r, opts.view));
  const bufferShapes = buffered.records.map((r) => recordShape(r, opts.view));
  const t = createTransform(rawShapes, opts);

  const rotation = opts.view === 'rotated' ? labelRotation(raw.frame) : 0;

  const parts: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${opts.width}" height="${opts.height}" viewBox="0 0 ${opts.width} ${opts.height}">`,
    `  <rect width="100%" height="100%" fill="${opts.backgroundColor}" />`,
  ];

  if (opts.title) {
    parts.push(`  <title>${escapeXml(opts.title)}</title>`);
  }

  parts.push('  <!-- Buffered footprints -->');
  parts.push(`  <g id="buffered">\n    ${generateBuffersSVG(bufferShapes, t, opts)}\n  </g>`);
  parts.push('  <!-- Plots -->');
  parts.push(`  <g id="plots">\n    ${generatePlotsSVG(rawShapes, t, opts)}\n  </g>`);

  const labels = generateLabelsSVG(raw.records, rawShapes, rotation, t, opts);
  if (labels) {
    parts.push('  <!-- Labels -->');
    parts.push(`  <g id="labels">\n    ${labels}\n  </g>`);
  }

  parts.push('</svg>');
  return parts.join('\n');
}
