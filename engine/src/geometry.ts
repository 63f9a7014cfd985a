import type { Geometry, Position } from "geojson";
import type { Attributes, BBox, CrsId, SpatialCollection, SpatialFeature } from "./types.js";

export type PositionFn = (position: Position) => Position;

/** Build a collection tagged with its CRS. */
export function featureCollection<G extends Geometry | null>(
  features: SpatialFeature<G>[],
  crs: CrsId,
  name?: string
): SpatialCollection<G> {
  const collection: SpatialCollection<G> = { type: "FeatureCollection", crs, features };
  if (name !== undefined) collection.name = name;
  return collection;
}

export function pointFeature(lon: number, lat: number, properties: Attributes = {}): SpatialFeature<Geometry> {
  return { type: "Feature", geometry: { type: "Point", coordinates: [lon, lat] }, properties };
}

/**
 * Rebuild a geometry with every position passed through `fn`.
 * Structure (rings, parts, collection members) is preserved.
 */
export function mapPositions<G extends Geometry>(geometry: G, fn: PositionFn): G;
export function mapPositions(geometry: Geometry, fn: PositionFn): Geometry {
  switch (geometry.type) {
    case "Point":
      return { ...geometry, coordinates: fn(geometry.coordinates) };
    case "MultiPoint":
    case "LineString":
      return { ...geometry, coordinates: geometry.coordinates.map(fn) };
    case "MultiLineString":
    case "Polygon":
      return { ...geometry, coordinates: geometry.coordinates.map((line) => line.map(fn)) };
    case "MultiPolygon":
      return {
        ...geometry,
        coordinates: geometry.coordinates.map((poly) => poly.map((ring) => ring.map(fn))),
      };
    case "GeometryCollection":
      return { ...geometry, geometries: geometry.geometries.map((g) => mapPositions(g, fn)) };
  }
}

/** Iterate over all positions of a geometry, depth first. */
export function* iteratePositions(geometry: Geometry | null): Generator<Position> {
  if (!geometry) return;
  switch (geometry.type) {
    case "Point":
      yield geometry.coordinates;
      return;
    case "MultiPoint":
    case "LineString":
      yield* geometry.coordinates;
      return;
    case "MultiLineString":
    case "Polygon":
      for (const line of geometry.coordinates) yield* line;
      return;
    case "MultiPolygon":
      for (const poly of geometry.coordinates) for (const ring of poly) yield* ring;
      return;
    case "GeometryCollection":
      for (const g of geometry.geometries) yield* iteratePositions(g);
      return;
  }
}

function boundsOf(positions: Iterable<Position>): BBox | null {
  let minX = Infinity,
    minY = Infinity,
    maxX = -Infinity,
    maxY = -Infinity;
  for (const [x, y] of positions) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  if (!Number.isFinite(minX) || !Number.isFinite(minY) || !Number.isFinite(maxX) || !Number.isFinite(maxY)) {
    return null;
  }
  return [minX, minY, maxX, maxY];
}

export function geometryBounds(geometry: Geometry | null): BBox | null {
  return boundsOf(iteratePositions(geometry));
}

/** Bounding box of every feature in the collection, or null when it has no coordinates. */
export function collectionBounds(collection: SpatialCollection): BBox | null {
  function* all(): Generator<Position> {
    for (const f of collection.features) yield* iteratePositions(f.geometry);
  }
  return boundsOf(all());
}

export function unionBounds(boxes: (BBox | null)[]): BBox | null {
  const present = boxes.filter((b): b is BBox => b !== null);
  if (present.length === 0) return null;
  return [
    Math.min(...present.map((b) => b[0])),
    Math.min(...present.map((b) => b[1])),
    Math.max(...present.map((b) => b[2])),
    Math.max(...present.map((b) => b[3])),
  ];
}

/** Pad a bounding box by a fixed amount in its own units on every side. */
export function bufferBounds(bbox: BBox, amount: number): BBox {
  return [bbox[0] - amount, bbox[1] - amount, bbox[2] + amount, bbox[3] + amount];
}

/** Grow a bounding box by a fraction of its width and height. */
export function expandBounds(bbox: BBox, fraction = 0.05): BBox {
  const dx = (bbox[2] - bbox[0]) * fraction;
  const dy = (bbox[3] - bbox[1]) * fraction;
  return [bbox[0] - dx, bbox[1] - dy, bbox[2] + dx, bbox[3] + dy];
}

function intersects(a: BBox, b: BBox): boolean {
  return a[0] <= b[2] && a[2] >= b[0] && a[1] <= b[3] && a[3] >= b[1];
}

/** Keep the features whose bounding box touches `bbox` (in the collection CRS). */
export function filterByBounds<G extends Geometry | null>(collection: SpatialCollection<G>, bbox: BBox): SpatialCollection<G> {
  return {
    ...collection,
    features: collection.features.filter((f) => {
      const bounds = geometryBounds(f.geometry);
      return bounds !== null && intersects(bounds, bbox);
    }),
  };
}

export function geometryTypes(collection: SpatialCollection): string[] {
  const types = new Set<string>();
  collection.features.forEach((f) => types.add(f.geometry ? f.geometry.type : "null"));
  return [...types];
}

export function fieldNames(collection: SpatialCollection): string[] {
  const names = new Set<string>();
  collection.features.forEach((f) => Object.keys(f.properties).forEach((k) => names.add(k)));
  return [...names];
}
