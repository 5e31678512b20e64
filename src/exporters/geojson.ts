import type { Feature, FeatureCollection, Polygon, Position } from 'geojson';
import type { GeometryCollection, PlotRecord, Point } from '../geometry/types.js';
import { signedPolygonArea } from '../geometry/index.js';
import type { SpatialReference } from '../crs/index.js';

// ============================================================================
// GeoJSON Export Options
// ============================================================================

export interface GeoJSONExportOptions {
  pretty?: boolean;
  /** Orient exterior rings counter-clockwise as RFC 7946 recommends (default true) */
  rewind?: boolean;
  /** Adds a legacy named `crs` member when the reference has an EPSG code */
  spatialReference?: SpatialReference;
}

// ============================================================================
// Feature Types
// ============================================================================

export interface PlotProperties {
  id: string;
  Plot: number;
  Range: number;
  Rows: number[];
  Barcodes: string[];
  kind: PlotRecord['kind'];
  collection: GeometryCollection['label'];
}

export type PlotFeatureCollection = FeatureCollection<Polygon, PlotProperties> & {
  crs?: { type: 'name'; properties: { name: string } };
};

// ============================================================================
// Conversion
// ============================================================================

function ringCoordinates(ring: readonly Point[], rewind: boolean): Position[] {
  const coordinates = ring.map((p): Position => [p.x, p.y]);
  if (rewind && signedPolygonArea(ring) < 0) {
    coordinates.reverse();
  }
  return coordinates;
}

export function toFeature(
  record: PlotRecord,
  label: GeometryCollection['label'],
  rewind = true
): Feature<Polygon, PlotProperties> {
  return {
    type: 'Feature',
    properties: {
      id: record.id,
      Plot: record.plot,
      Range: record.range,
      Rows: [...record.rows],
      Barcodes: [...record.barcodes],
      kind: record.kind,
      collection: label,
    },
    geometry: {
      type: 'Polygon',
      coordinates: [ringCoordinates(record.ring, rewind)],
    },
  };
}

export function toFeatureCollection(
  collection: GeometryCollection,
  options: GeoJSONExportOptions = {}
): PlotFeatureCollection {
  const { rewind = true, spatialReference } = options;

  const result: PlotFeatureCollection = {
    type: 'FeatureCollection',
    features: collection.records.map((record) => toFeature(record, collection.label, rewind)),
  };

  if (spatialReference?.epsg !== undefined) {
    result.crs = {
      type: 'name',
      properties: { name: `urn:ogc:def:crs:EPSG::${spatialReference.epsg}` },
    };
  }

  return result;
}

// ============================================================================
// Main Export Function
// ============================================================================

export function exportGeoJSON(collection: GeometryCollection, options: GeoJSONExportOptions = {}): string {
  const result = toFeatureCollection(collection, options);

  if (options.pretty) {
    return JSON.stringify(result, null, 2);
  }

  return JSON.stringify(result);
}
