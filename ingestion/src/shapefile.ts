import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { read } from "shapefile";
import { crsFromWkt, featureCollection, WGS84 } from "geo-workshop-engine";
import type { SpatialCollection, SpatialFeature } from "geo-workshop-engine";
import { layerName, reportLayer, toAttributes } from "./source.js";
import type { LoadOptions } from "./source.js";

export interface ShapefileOptions extends Pick<LoadOptions, "quiet"> {
  /** Character encoding of the .dbf attribute table. */
  encoding?: string;
  name?: string;
}

function sibling(path: string, extension: string): string {
  return path.replace(/\.shp$/i, extension);
}

/**
 * Read a shapefile with its sibling .dbf attributes. The CRS comes from the
 * sibling .prj when present; without one the layer is taken as WGS 84.
 */
export async function readShapefile(path: string, options: ShapefileOptions = {}): Promise<SpatialCollection> {
  if (!/\.shp$/i.test(path)) throw new Error(`Not a shapefile: ${path}`);
  if (!existsSync(path)) throw new Error(`Shapefile not found: ${path}`);

  const dbfPath = sibling(path, ".dbf");
  const prjPath = sibling(path, ".prj");
  const source = await read(path, existsSync(dbfPath) ? dbfPath : undefined, {
    encoding: options.encoding ?? "utf-8",
  });
  const crs = existsSync(prjPath) ? crsFromWkt(await readFile(prjPath, "utf-8")) : WGS84;

  const features: SpatialFeature[] = source.features.map((f) => ({
    type: "Feature",
    geometry: f.geometry ?? null,
    properties: toAttributes(f.properties),
  }));
  const collection = featureCollection(features, crs, options.name ?? layerName(path));
  reportLayer(collection, path, options.quiet);
  return collection;
}
