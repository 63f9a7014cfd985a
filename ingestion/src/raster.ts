import { fromArrayBuffer, fromFile } from "geotiff";
import { createRaster, crsLabel, WGS84 } from "geo-workshop-engine";
import type { AffineTransform, CrsId, RasterGrid } from "geo-workshop-engine";
import { isRecord } from "./source.js";

export interface ReadRasterOptions {
  quiet?: boolean;
  crs?: CrsId; // used when the file carries no EPSG geokey
}

const USER_DEFINED = 32767;

function epsgFromGeoKeys(keys: unknown): CrsId | null {
  if (!isRecord(keys)) return null;
  for (const key of ["ProjectedCSTypeGeoKey", "GeographicTypeGeoKey"]) {
    const code = keys[key];
    if (typeof code === "number" && code > 0 && code !== USER_DEFINED) return `EPSG:${code}`;
  }
  return null;
}

/**
 * Read every band of the first image of a GeoTIFF. Ungeoreferenced images get
 * a pixel-space transform (`0, 0, 1, -1`) to be replaced with `georeference`.
 */
export async function readRaster(source: string | ArrayBuffer, options: ReadRasterOptions = {}): Promise<RasterGrid> {
  const tiff = typeof source === "string" ? await fromFile(source) : await fromArrayBuffer(source);
  const image = await tiff.getImage();
  const width = image.getWidth();
  const height = image.getHeight();
  const rasters = await image.readRasters();
  const bands = Array.isArray(rasters) ? rasters.map((band) => Float32Array.from(band)) : [Float32Array.from(rasters)];

  const directory: unknown = image.fileDirectory;
  const georeferenced = isRecord(directory) && ("ModelTiepoint" in directory || "ModelTransformation" in directory);
  let transform: AffineTransform = { originX: 0, originY: 0, pixelWidth: 1, pixelHeight: -1 };
  if (georeferenced) {
    const [originX, originY] = image.getOrigin();
    const [pixelWidth, pixelHeight] = image.getResolution();
    transform = { originX, originY, pixelWidth, pixelHeight };
  }
  const crs = (georeferenced ? epsgFromGeoKeys(image.getGeoKeys()) : null) ?? options.crs ?? WGS84;
  const noData = image.getGDALNoData();

  const grid = createRaster(width, height, bands, transform, crs, noData ?? undefined);
  if (!options.quiet) {
    const label = typeof source === "string" ? source : "buffer";
    console.info(
      `Reading raster ${label}: ${width}x${height}, ${bands.length} band(s), ` +
        `${georeferenced ? crsLabel(crs) : "not georeferenced"}${noData === null ? "" : `, nodata ${noData}`}`
    );
  }
  return grid;
}
