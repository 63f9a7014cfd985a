import { existsSync } from "fs";
import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { crsFromGeoJsonName, crsToGeoJsonName, featureCollection, mapPositions } from "geo-workshop-engine";
import type { Geometry, Position, SpatialCollection, SpatialFeature } from "geo-workshop-engine";
import { isRecord, isUrl, layerName, readJsonSource, reportLayer, toAttributes } from "./source.js";
import type { LoadOptions } from "./source.js";

export interface ReadGeoJSONOptions extends LoadOptions {
  name?: string;
}

function invalid(where: string, problem: string): Error {
  return new Error(`Invalid GeoJSON in ${where}: ${problem}`);
}

function position(value: unknown, where: string): Position {
  if (!Array.isArray(value) || value.length < 2) throw invalid(where, "position must have at least two numbers");
  const coords: number[] = [];
  for (const v of value) {
    if (typeof v !== "number" || !Number.isFinite(v)) throw invalid(where, `non-numeric coordinate ${JSON.stringify(v)}`);
    coords.push(v);
  }
  return coords;
}

function list<T>(value: unknown, where: string, item: (v: unknown, where: string) => T): T[] {
  if (!Array.isArray(value)) throw invalid(where, "coordinates must be an array");
  return value.map((v) => item(v, where));
}

const positions = (value: unknown, where: string) => list(value, where, position);
const rings = (value: unknown, where: string) => list(value, where, positions);

export function parseGeometry(value: unknown, where: string): Geometry | null {
  if (value === null || value === undefined) return null;
  if (!isRecord(value)) throw invalid(where, "geometry must be an object");
  switch (value.type) {
    case "Point":
      return { type: "Point", coordinates: position(value.coordinates, where) };
    case "MultiPoint":
      return { type: "MultiPoint", coordinates: positions(value.coordinates, where) };
    case "LineString":
      return { type: "LineString", coordinates: positions(value.coordinates, where) };
    case "MultiLineString":
      return { type: "MultiLineString", coordinates: rings(value.coordinates, where) };
    case "Polygon":
      return { type: "Polygon", coordinates: rings(value.coordinates, where) };
    case "MultiPolygon":
      return { type: "MultiPolygon", coordinates: list(value.coordinates, where, rings) };
    case "GeometryCollection":
      return {
        type: "GeometryCollection",
        geometries: list(value.geometries, where, (g) => {
          const parsed = parseGeometry(g, where);
          if (!parsed) throw invalid(where, "null member in GeometryCollection");
          return parsed;
        }),
      };
    default:
      throw invalid(where, `unknown geometry type ${JSON.stringify(value.type)}`);
  }
}

function parseFeature(value: unknown, where: string): SpatialFeature {
  if (!isRecord(value) || value.type !== "Feature") throw invalid(where, "expected a Feature");
  const feature: SpatialFeature = {
    type: "Feature",
    geometry: parseGeometry(value.geometry, where),
    properties: toAttributes(value.properties),
  };
  if (typeof value.id === "string" || typeof value.id === "number") feature.id = value.id;
  return feature;
}

function crsMember(value: Record<string, unknown>): string | undefined {
  const crs = value.crs;
  if (!isRecord(crs) || !isRecord(crs.properties)) return undefined;
  return typeof crs.properties.name === "string" ? crs.properties.name : undefined;
}

/** Accept a FeatureCollection, a single Feature or a bare geometry. */
export function parseGeoJSON(value: unknown, where: string, name?: string): SpatialCollection {
  if (!isRecord(value)) throw invalid(where, "top level must be an object");
  const crs = crsFromGeoJsonName(crsMember(value));
  const layer = name ?? (typeof value.name === "string" ? value.name : layerName(where));
  switch (value.type) {
    case "FeatureCollection":
      return featureCollection(list(value.features, where, parseFeature), crs, layer);
    case "Feature":
      return featureCollection([parseFeature(value, where)], crs, layer);
    default:
      return featureCollection([{ type: "Feature", geometry: parseGeometry(value, where), properties: {} }], crs, layer);
  }
}

/** Read GeoJSON from a file path or an http(s) URL. */
export async function readGeoJSON(source: string, options: ReadGeoJSONOptions = {}): Promise<SpatialCollection> {
  const collection = parseGeoJSON(await readJsonSource(source, options.fetcher), source, options.name);
  reportLayer(collection, source, options.quiet);
  return collection;
}

/** Fetch a GeoJSON web feed once. */
export async function readFeed(url: string, options: ReadGeoJSONOptions = {}): Promise<SpatialCollection> {
  if (!isUrl(url)) throw new Error(`Not a feed URL: ${url}`);
  return readGeoJSON(url, options);
}

export interface WriteGeoJSONOptions {
  overwrite?: boolean;
  precision?: number;
  quiet?: boolean;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isRecord(value)) {
    return Object.keys(value)
      .sort()
      .reduce((acc: Record<string, unknown>, key) => {
        acc[key] = sortKeys(value[key]);
        return acc;
      }, {});
  }
  return value;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, 2) + "\n";
}

function roundPosition(precision: number) {
  return (p: Position): Position => p.map((v) => Number(v.toFixed(precision)));
}

/**
 * Write a collection as a GeoJSON FeatureCollection carrying a `crs` name
 * member. Existing files are kept unless `overwrite` is set.
 */
export async function writeGeoJSON(
  collection: SpatialCollection,
  path: string,
  options: WriteGeoJSONOptions = {}
): Promise<string> {
  const outPath = resolve(path);
  if (!options.overwrite && existsSync(outPath)) {
    throw new Error(`Refusing to overwrite existing file at ${outPath}; pass overwrite: true to replace`);
  }
  const round = options.precision === undefined ? null : roundPosition(options.precision);
  const fc = {
    type: "FeatureCollection",
    name: collection.name,
    crs: { type: "name", properties: { name: crsToGeoJsonName(collection.crs) } },
    features: collection.features.map((f) => ({
      type: "Feature",
      id: f.id,
      properties: f.properties,
      geometry: f.geometry && round ? mapPositions(f.geometry, round) : f.geometry,
    })),
  };
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, stableStringify(fc), "utf-8");
  if (!options.quiet) {
    console.info(`Writing layer \`${collection.name ?? layerName(outPath)}' to ${outPath}: ${collection.features.length} features`);
  }
  return outPath;
}
