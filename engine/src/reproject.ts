import proj4 from "proj4";
import type { Geometry, Position } from "geojson";
import { canonicalCrs, getCrsDefinition, isGeographic, resolveCrs, sameCrs } from "./crs.js";
import { mapPositions } from "./geometry.js";
import type { CrsId, SpatialCollection } from "./types.js";

type Converter = (position: Position) => Position;

const converterCache = new Map<string, Converter>();

function clampLatitude(from: CrsId, to: CrsId): ((p: Position) => Position) | null {
  const domain = getCrsDefinition(to)?.latitudeDomain;
  if (!domain || !isGeographic(from)) return null;
  const [minLat, maxLat] = domain;
  return ([x, y, ...rest]) => [x, Math.min(Math.max(y, minLat), maxLat), ...rest];
}

type LenientConverter = (position: Position) => Position | null;

const lenientCache = new Map<string, LenientConverter>();

/** Converter that returns null where the target projection is undefined instead of throwing. */
export function getLenientConverter(from: CrsId, to: CrsId): LenientConverter {
  const key = `${canonicalCrs(from)}=>${canonicalCrs(to)}`;
  const cached = lenientCache.get(key);
  if (cached) return cached;

  const transformer = proj4(resolveCrs(from), resolveCrs(to));
  const clamp = clampLatitude(from, to);
  const converter: LenientConverter = (position) => {
    const [x, y, ...rest] = clamp ? clamp(position) : position;
    const projected = transformer.forward([x, y]);
    if (!projected || !Number.isFinite(projected[0]) || !Number.isFinite(projected[1])) return null;
    return rest.length > 0 ? [projected[0], projected[1], ...rest] : [projected[0], projected[1]];
  };
  lenientCache.set(key, converter);
  return converter;
}

/** Build (and cache) a position converter between two CRSs; throws on unprojectable positions. */
export function getConverter(from: CrsId, to: CrsId): Converter {
  const key = `${canonicalCrs(from)}=>${canonicalCrs(to)}`;
  const cached = converterCache.get(key);
  if (cached) return cached;

  const lenient = getLenientConverter(from, to);
  const converter: Converter = (position) => {
    const projected = lenient(position);
    if (!projected) {
      throw new Error(`Coordinate [${position[0]}, ${position[1]}] cannot be projected to ${to}`);
    }
    return projected;
  };
  converterCache.set(key, converter);
  return converter;
}

export function reprojectPosition(position: Position, from: CrsId, to: CrsId): Position {
  if (sameCrs(from, to)) return position;
  return getConverter(from, to)(position);
}

export function reprojectGeometry<G extends Geometry>(geometry: G, from: CrsId, to: CrsId): G {
  if (sameCrs(from, to)) return geometry;
  return mapPositions(geometry, getConverter(from, to));
}

/**
 * Return an equivalent collection in `targetCrs`. Reprojecting to the CRS the
 * collection already has returns the same object.
 */
export function transformCollection<G extends Geometry | null>(
  collection: SpatialCollection<G>,
  targetCrs: CrsId
): SpatialCollection<G> {
  if (sameCrs(collection.crs, targetCrs)) return collection;
  const convert = getConverter(collection.crs, targetCrs);
  return {
    ...collection,
    crs: canonicalCrs(targetCrs),
    features: collection.features.map((f) => ({
      ...f,
      geometry: f.geometry === null ? f.geometry : mapPositions(f.geometry, convert),
    })),
  };
}
