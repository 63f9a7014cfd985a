import { rgb } from "d3-color";
import { canonicalCrs, sameCrs } from "./crs.js";
import { getConverter, getLenientConverter } from "./reproject.js";
import type { AffineTransform, BBox, CrsId, NumericScale, RasterGrid, RgbaImage } from "./types.js";

export function createRaster(
  width: number,
  height: number,
  bands: Float32Array[],
  transform: AffineTransform,
  crs: CrsId,
  noData?: number
): RasterGrid {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid raster size ${width}x${height}`);
  }
  bands.forEach((band, i) => {
    if (band.length !== width * height) {
      throw new Error(`Band ${i} has ${band.length} samples, expected ${width * height}`);
    }
  });
  const grid: RasterGrid = { width, height, bands, transform, crs: canonicalCrs(crs) };
  if (noData !== undefined) grid.noData = noData;
  return grid;
}

/**
 * Attach an affine transform (and optionally a CRS) to a grid. Samples are shared,
 * only the georeferencing changes.
 */
export function georeference(grid: RasterGrid, transform: Partial<AffineTransform>, crs?: CrsId): RasterGrid {
  const next: AffineTransform = { ...grid.transform, ...transform };
  if (next.pixelWidth === 0 || next.pixelHeight === 0) {
    throw new Error("Pixel size must be non-zero");
  }
  return { ...grid, transform: next, crs: crs ? canonicalCrs(crs) : grid.crs };
}

/** Bands are float32: the sentinel is compared at float32 precision. */
function noDataMatcher(sentinel: number | undefined): (value: number) => boolean {
  if (sentinel === undefined) return () => false;
  const stored = Math.fround(sentinel);
  return (value) => value === stored;
}

/** Replace every sample equal to `sentinel` (default: the grid's noData) with NaN. */
export function maskNoData(grid: RasterGrid, sentinel: number | undefined = grid.noData): RasterGrid {
  if (sentinel === undefined) return grid;
  const isNoData = noDataMatcher(sentinel);
  const bands = grid.bands.map((band) => {
    const out = new Float32Array(band.length);
    for (let i = 0; i < band.length; i++) {
      out[i] = isNoData(band[i]) ? Number.NaN : band[i];
    }
    return out;
  });
  const { noData: _dropped, ...rest } = grid;
  return { ...rest, bands };
}

/** Map pixel (col,row) to CRS coordinates; integer positions are pixel corners, +0.5 centres. */
export function pixelToCoord(transform: AffineTransform, col: number, row: number): [number, number] {
  return [transform.originX + col * transform.pixelWidth, transform.originY + row * transform.pixelHeight];
}

export function coordToPixel(transform: AffineTransform, x: number, y: number): [number, number] {
  return [(x - transform.originX) / transform.pixelWidth, (y - transform.originY) / transform.pixelHeight];
}

export function rasterBounds(grid: RasterGrid): BBox {
  const [x0, y0] = pixelToCoord(grid.transform, 0, 0);
  const [x1, y1] = pixelToCoord(grid.transform, grid.width, grid.height);
  return [Math.min(x0, x1), Math.min(y0, y1), Math.max(x0, x1), Math.max(y0, y1)];
}

/** Sample at CRS coordinates (nearest pixel); NaN outside the grid. */
export function sampleAt(grid: RasterGrid, x: number, y: number, band = 0): number {
  const [fc, fr] = coordToPixel(grid.transform, x, y);
  const col = Math.floor(fc);
  const row = Math.floor(fr);
  if (col < 0 || row < 0 || col >= grid.width || row >= grid.height) return Number.NaN;
  return grid.bands[band][row * grid.width + col];
}

function projectedExtent(grid: RasterGrid, targetCrs: CrsId, steps = 16): BBox {
  const convert = getConverter(grid.crs, targetCrs);
  let minX = Infinity,
    minY = Infinity,
    maxX = -Infinity,
    maxY = -Infinity;
  // densified edges: corners alone miss the bulge of curved projections
  for (let i = 0; i <= steps; i++) {
    const t = i / steps;
    const edgePoints: [number, number][] = [
      [t * grid.width, 0],
      [t * grid.width, grid.height],
      [0, t * grid.height],
      [grid.width, t * grid.height],
    ];
    for (const [col, row] of edgePoints) {
      const [x, y] = convert(pixelToCoord(grid.transform, col, row));
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }
  return [minX, minY, maxX, maxY];
}

export interface ReprojectRasterOptions {
  width?: number;
  height?: number;
}

/**
 * Nearest-neighbour warp onto a north-up grid in `targetCrs` covering the projected
 * source extent. Cells whose centre falls outside the source are NaN.
 */
export function reprojectRaster(grid: RasterGrid, targetCrs: CrsId, options: ReprojectRasterOptions = {}): RasterGrid {
  if (sameCrs(grid.crs, targetCrs)) return grid;
  const width = options.width ?? grid.width;
  const height = options.height ?? grid.height;
  const [minX, minY, maxX, maxY] = projectedExtent(grid, targetCrs);
  const transform: AffineTransform = {
    originX: minX,
    originY: maxY,
    pixelWidth: (maxX - minX) / width,
    pixelHeight: -(maxY - minY) / height,
  };
  const inverse = getLenientConverter(targetCrs, grid.crs);
  const isNoData = noDataMatcher(grid.noData);
  const bands = grid.bands.map(() => new Float32Array(width * height).fill(Number.NaN));
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const [x, y] = pixelToCoord(transform, col + 0.5, row + 0.5);
      const source = inverse([x, y]);
      if (!source) continue;
      const [sc, sr] = coordToPixel(grid.transform, source[0], source[1]);
      const srcCol = Math.floor(sc);
      const srcRow = Math.floor(sr);
      if (srcCol < 0 || srcRow < 0 || srcCol >= grid.width || srcRow >= grid.height) continue;
      const srcIdx = srcRow * grid.width + srcCol;
      const dstIdx = row * width + col;
      grid.bands.forEach((band, b) => {
        bands[b][dstIdx] = isNoData(band[srcIdx]) ? Number.NaN : band[srcIdx];
      });
    }
  }
  return { width, height, bands, transform, crs: canonicalCrs(targetCrs) };
}

/** Colour band `band` through a numeric scale; NaN and out-of-domain samples are fully transparent. */
export function colorizeRaster(grid: RasterGrid, scale: NumericScale, options: { band?: number; opacity?: number } = {}): RgbaImage {
  const values = grid.bands[options.band ?? 0];
  const alpha = Math.round((options.opacity ?? 1) * 255);
  const data = new Uint8ClampedArray(grid.width * grid.height * 4);
  const cache = new Map<string, [number, number, number, number]>();
  const isNoData = noDataMatcher(grid.noData);
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (Number.isNaN(value) || isNoData(value)) continue;
    const cssColor = scale(value);
    let rgba = cache.get(cssColor);
    if (!rgba) {
      const parsed = cssColor === "transparent" ? null : rgb(cssColor);
      rgba = parsed && !Number.isNaN(parsed.r) ? [parsed.r, parsed.g, parsed.b, Math.round(parsed.opacity * alpha)] : [0, 0, 0, 0];
      cache.set(cssColor, rgba);
    }
    data.set(rgba, i * 4);
  }
  return { width: grid.width, height: grid.height, data };
}

/** Summary statistics over valid (non-NaN, non-noData) samples of a band. */
export function bandStatistics(grid: RasterGrid, band = 0): { min: number; max: number; mean: number; valid: number } {
  let min = Infinity,
    max = -Infinity,
    sum = 0,
    valid = 0;
  const isNoData = noDataMatcher(grid.noData);
  for (const value of grid.bands[band]) {
    if (Number.isNaN(value) || isNoData(value)) continue;
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
    valid++;
  }
  return valid === 0 ? { min: NaN, max: NaN, mean: NaN, valid } : { min, max, mean: sum / valid, valid };
}
