import { readFile } from "fs/promises";
import { autoType, csvParse } from "d3-dsv";
import { canonicalCrs, featureCollection, WGS84 } from "geo-workshop-engine";
import type { Attributes, CrsId, SpatialCollection, SpatialFeature } from "geo-workshop-engine";
import { layerName, reportLayer, toAttributeValue } from "./source.js";
import type { LoadOptions } from "./source.js";

export interface CsvPointOptions extends Pick<LoadOptions, "quiet"> {
  lon?: string;
  lat?: string;
  crs?: CrsId;
  name?: string;
}

/**
 * Read a delimited table with coordinate columns as a point layer. The
 * coordinate columns become the geometry; other columns are type-inferred.
 */
export async function readCsvPoints(path: string, options: CsvPointOptions = {}): Promise<SpatialCollection> {
  const lonField = options.lon ?? "lon";
  const latField = options.lat ?? "lat";
  const rows = csvParse(await readFile(path, "utf-8"));

  for (const field of [lonField, latField]) {
    if (!rows.columns.includes(field)) {
      throw new Error(`Missing coordinate column "${field}" in ${path} (columns: ${rows.columns.join(", ")})`);
    }
  }

  const features: SpatialFeature[] = rows.map((raw, index) => {
    const lon = Number(raw[lonField]);
    const lat = Number(raw[latField]);
    if (raw[lonField]?.trim() === "" || raw[latField]?.trim() === "" || !Number.isFinite(lon) || !Number.isFinite(lat)) {
      throw new Error(`Invalid coordinate at row ${index + 1} of ${path}: ${lonField}=${raw[lonField]}, ${latField}=${raw[latField]}`);
    }
    const typed = autoType<Record<string, unknown>, string>(raw);
    const properties: Attributes = {};
    for (const column of rows.columns) {
      if (column === lonField || column === latField) continue;
      properties[column] = toAttributeValue(typed[column]);
    }
    return { type: "Feature", geometry: { type: "Point", coordinates: [lon, lat] }, properties };
  });

  const collection = featureCollection(features, canonicalCrs(options.crs ?? WGS84), options.name ?? layerName(path));
  reportLayer(collection, path, options.quiet);
  return collection;
}
