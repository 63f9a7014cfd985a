import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { afterAll, describe, expect, it, vi } from "vitest";
import { featureCollection, pointFeature } from "geo-workshop-engine";
import { parseGeoJSON, readFeed, readGeoJSON, stableStringify, writeGeoJSON } from "../src/geojson.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const tempDirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "geojson-"));
  tempDirs.push(dir);
  return dir;
}

afterAll(async () => {
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("readGeoJSON", () => {
  it("reads a feature collection without a crs member as WGS 84", async () => {
    const line = await readGeoJSON(fixture("transect.geojson"), { quiet: true });
    expect(line.name).toBe("transect");
    expect(line.crs).toBe("EPSG:4326");
    expect(line.features[0].id).toBe("t1");
    expect(line.features[0].geometry?.type).toBe("LineString");
    expect(line.features[0].properties).toEqual({ Name: "Transect", length_km: 12.5, meta: '{"crew":3}' });
  });

  it("takes the CRS and name from the file and keeps null geometries", async () => {
    const sites = await readGeoJSON(fixture("sites_bng.geojson"), { quiet: true });
    expect(sites.name).toBe("sites");
    expect(sites.crs).toBe("EPSG:27700");
    expect(sites.features).toHaveLength(2);
    expect(sites.features[1].geometry).toBeNull();
  });

  it("rejects malformed input", async () => {
    await expect(readGeoJSON(fixture("broken.geojson"), { quiet: true })).rejects.toThrow("Invalid JSON in");
    await expect(readGeoJSON(fixture("bad_geometry.geojson"), { quiet: true })).rejects.toThrow(
      'non-numeric coordinate "a"'
    );
  });

  it("fetches URLs through the injected fetcher", async () => {
    const body = { type: "FeatureCollection", features: [{ type: "Feature", properties: { mag: 4.2 }, geometry: null }] };
    const fetcher = vi.fn(async () => new Response(JSON.stringify(body)));
    const quakes = await readFeed("https://feeds.example.test/summary/2.5_day.geojson", { fetcher, quiet: true });
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(quakes.name).toBe("2.5_day");
    expect(quakes.features[0].properties).toEqual({ mag: 4.2 });
  });

  it("propagates HTTP failures", async () => {
    const fetcher = vi.fn(async () => new Response("missing", { status: 404 }));
    await expect(readGeoJSON("https://feeds.example.test/gone.geojson", { fetcher, quiet: true })).rejects.toThrow(
      "Failed to fetch https://feeds.example.test/gone.geojson: 404"
    );
  });

  it("only treats http(s) sources as feeds", async () => {
    await expect(readFeed("data/feed.geojson")).rejects.toThrow("Not a feed URL: data/feed.geojson");
  });
});

describe("parseGeoJSON", () => {
  it("wraps a bare geometry in a one-feature collection", () => {
    const parsed = parseGeoJSON({ type: "Point", coordinates: [1, 2] }, "inline");
    expect(parsed).toEqual({
      type: "FeatureCollection",
      crs: "EPSG:4326",
      name: "inline",
      features: [{ type: "Feature", geometry: { type: "Point", coordinates: [1, 2] }, properties: {} }],
    });
  });

  it("rejects unknown geometry types", () => {
    expect(() => parseGeoJSON({ type: "Circle", radius: 3 }, "inline")).toThrow(
      'Invalid GeoJSON in inline: unknown geometry type "Circle"'
    );
  });
});

describe("writeGeoJSON", () => {
  it("writes sorted keys and a crs member", async () => {
    const dir = await tempDir();
    const sites = featureCollection([pointFeature(1.5, 2.5, { name: "a" })], "EPSG:4326", "sites");
    const out = await writeGeoJSON(sites, join(dir, "sites.geojson"), { quiet: true });
    expect(await readFile(out, "utf-8")).toBe(
      stableStringify({
        crs: { properties: { name: "urn:ogc:def:crs:OGC:1.3:CRS84" }, type: "name" },
        features: [{ geometry: { coordinates: [1.5, 2.5], type: "Point" }, properties: { name: "a" }, type: "Feature" }],
        name: "sites",
        type: "FeatureCollection",
      })
    );
  });

  it("refuses to overwrite unless asked", async () => {
    const dir = await tempDir();
    const path = join(dir, "existing.geojson");
    await writeFile(path, "{}", "utf-8");
    const sites = featureCollection([pointFeature(0, 0)], "EPSG:4326");
    await expect(writeGeoJSON(sites, path, { quiet: true })).rejects.toThrow(
      `Refusing to overwrite existing file at ${path}; pass overwrite: true to replace`
    );
    await writeGeoJSON(sites, path, { overwrite: true, quiet: true });
    expect((await readGeoJSON(path, { quiet: true })).features).toHaveLength(1);
  });

  it("rounds coordinates to the requested precision", async () => {
    const dir = await tempDir();
    const sites = featureCollection([pointFeature(0.123456, 51.987654)], "EPSG:4326");
    const out = await writeGeoJSON(sites, join(dir, "nested", "rounded.geojson"), { precision: 2, quiet: true });
    expect(existsSync(out)).toBe(true);
    const reread = await readGeoJSON(out, { quiet: true });
    expect(reread.features[0].geometry).toEqual({ type: "Point", coordinates: [0.12, 51.99] });
  });

  it("keeps a projected CRS across a write and read", async () => {
    const dir = await tempDir();
    const sites = await readGeoJSON(fixture("sites_bng.geojson"), { quiet: true });
    const out = await writeGeoJSON(sites, join(dir, "bng.geojson"), { quiet: true });
    const reread = await readGeoJSON(out, { quiet: true });
    expect(reread.crs).toBe("EPSG:27700");
    expect(reread.features.map((f) => f.properties)).toEqual(sites.features.map((f) => f.properties));
  });
});
