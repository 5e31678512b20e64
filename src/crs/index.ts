import { ConfigurationError } from '../errors.js';
import type { SpatialReferenceInput } from '../geometry/types.js';

export interface SpatialReference {
  zone: number;
  hemisphere: 'N' | 'S';
  proj4: string;
  /** NAD83 / UTM code; only northern zones 1 to 23 have one */
  epsg?: number;
}

/**
 * Describe the NAD83 UTM system named by a zone and hemisphere.
 * Returns undefined when no zone is given.
 */
export function describeSpatialReference(input: SpatialReferenceInput): SpatialReference | undefined {
  if (input.utmZone === undefined) return undefined;

  const zone = Number(input.utmZone.trim());
  if (!Number.isInteger(zone) || zone < 1 || zone > 60) {
    throw new ConfigurationError(`UTM zone must be a whole number from 1 to 60, got "${input.utmZone}"`, {
      utmZone: input.utmZone,
    });
  }

  const south = input.hemisphere === 'S' ? ' +south' : '';
  const proj4 = `+proj=utm +zone=${zone}${south} +datum=NAD83 +units=m +no_defs +ellps=GRS80`;
  const epsg = input.hemisphere === 'N' && zone <= 23 ? 26900 + zone : undefined;

  return { zone, hemisphere: input.hemisphere, proj4, epsg };
}
