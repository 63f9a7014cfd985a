import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import sharp from "sharp";
import { afterAll, describe, expect, it } from "vitest";
import { encodeRgbaPng, figurePixels } from "../src/export.js";
import { featureCollection, pointFeature } from "../src/geometry.js";
import { StaticMap } from "../src/staticMap.js";

const tempDirs: string[] = [];

afterAll(async () => {
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("figure sizes", () => {
  it("converts physical sizes to pixels", () => {
    expect(figurePixels({ width: 10, height: 6 })).toEqual({ width: 3000, height: 1800, dpi: 300 });
    expect(figurePixels({ width: 2.54, height: 5.08, units: "cm", dpi: 100 })).toEqual({ width: 100, height: 200, dpi: 100 });
    expect(figurePixels({ width: 254, height: 127, units: "mm", dpi: 10 })).toEqual({ width: 100, height: 50, dpi: 10 });
    expect(figurePixels({ width: 640, height: 480, units: "px" })).toEqual({ width: 640, height: 480, dpi: 300 });
  });

  it("rejects empty figures", () => {
    expect(() => figurePixels({ width: 0, height: 6 })).toThrow("Invalid figure size 0x6in at 300 dpi");
  });
});

describe("PNG output", () => {
  it("writes a PNG at width*dpi by height*dpi with the DPI recorded", async () => {
    const dir = await mkdtemp(join(tmpdir(), "export-"));
    tempDirs.push(dir);
    const map = new StaticMap().addLayer(
      featureCollection([pointFeature(0, 0), pointFeature(1, 1)], "EPSG:4326"),
      { fill: "#cd0000", radius: 2 }
    );
    const path = await map.save(join(dir, "points.png"), { width: 2, height: 1, units: "in", dpi: 100 });
    const metadata = await sharp(path).metadata();
    expect(metadata.format).toBe("png");
    expect(metadata.width).toBe(200);
    expect(metadata.height).toBe(100);
    expect(metadata.density).toBeCloseTo(100, 0);
  });

  it("encodes raw RGBA pixels", async () => {
    const png = await encodeRgbaPng({ width: 2, height: 1, data: Uint8ClampedArray.from([255, 0, 0, 255, 0, 0, 0, 0]) });
    const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
    expect(info.channels).toBe(4);
    expect([...data]).toEqual([255, 0, 0, 255, 0, 0, 0, 0]);
  });
});
