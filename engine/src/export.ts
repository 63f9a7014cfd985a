import sharp from "sharp";
import type { FigureSize, RgbaImage } from "./types.js";

const UNITS_PER_INCH = { in: 1, cm: 2.54, mm: 25.4 } as const;

export interface PixelSize {
  width: number;
  height: number;
  dpi: number;
}

/** Resolve a figure size in physical units to output pixels. `px` sizes are taken as-is. */
export function figurePixels(figure: FigureSize): PixelSize {
  const dpi = figure.dpi ?? 300;
  const units = figure.units ?? "in";
  if (!(figure.width > 0) || !(figure.height > 0) || !(dpi > 0)) {
    throw new Error(`Invalid figure size ${figure.width}x${figure.height}${units} at ${dpi} dpi`);
  }
  if (units === "px") {
    return { width: Math.round(figure.width), height: Math.round(figure.height), dpi };
  }
  const perInch = UNITS_PER_INCH[units];
  return {
    width: Math.round((figure.width / perInch) * dpi),
    height: Math.round((figure.height / perInch) * dpi),
    dpi,
  };
}

/** Rasterise an SVG document (sized in pixels) and write it as PNG with the DPI in its metadata. */
export async function writePng(svg: string, path: string, dpi: number): Promise<void> {
  await sharp(Buffer.from(svg), { density: 72 }).png().withMetadata({ density: dpi }).toFile(path);
}

export async function encodeRgbaPng(image: RgbaImage): Promise<Buffer> {
  return sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
    raw: { width: image.width, height: image.height, channels: 4 },
  })
    .png()
    .toBuffer();
}

export async function rgbaToDataUrl(image: RgbaImage): Promise<string> {
  const png = await encodeRgbaPng(image);
  return `data:image/png;base64,${png.toString("base64")}`;
}
