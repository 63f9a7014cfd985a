import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { afterAll, afterEach, describe, expect, it, vi } from "vitest";
import { readCsvPoints } from "../src/csv.js";
import { readGeoJSON, writeGeoJSON } from "../src/geojson.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const tempDirs: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();
});

afterAll(async () => {
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("readCsvPoints", () => {
  it("turns lon/lat columns into point geometry and types the rest", async () => {
    const points = await readCsvPoints(fixture("points.csv"), { quiet: true });
    expect(points.crs).toBe("EPSG:4326");
    expect(points.name).toBe("points");
    expect(points.features).toHaveLength(3);
    expect(points.features[0].geometry).toEqual({ type: "Point", coordinates: [0.55, 51.48] });
    expect(points.features[0].properties).toEqual({
      Name: "Site A",
      depth: 4.5,
      surveyed: true,
      visited: "2024-05-01T00:00:00.000Z",
    });
    expect(points.features[2].properties).toEqual({ Name: "Site C", depth: null, surveyed: true, visited: null });
  });

  it("accepts other coordinate columns and a projected CRS", async () => {
    const sites = await readCsvPoints(fixture("points_xy.csv"), { lon: "x", lat: "y", crs: "epsg:27700", quiet: true });
    expect(sites.crs).toBe("EPSG:27700");
    expect(sites.features[1].geometry).toEqual({ type: "Point", coordinates: [560000, 175000] });
    expect(sites.features[1].properties).toEqual({ site: "South" });
  });

  it("fails on a missing coordinate column", async () => {
    await expect(readCsvPoints(fixture("missing_lat.csv"), { quiet: true })).rejects.toThrow(
      'Missing coordinate column "lat"'
    );
  });

  it("fails on a non-numeric coordinate", async () => {
    await expect(readCsvPoints(fixture("bad_coordinate.csv"), { quiet: true })).rejects.toThrow(
      "Invalid coordinate at row 2"
    );
  });

  it("fails on a missing file", async () => {
    await expect(readCsvPoints(fixture("absent.csv"), { quiet: true })).rejects.toThrow("ENOENT");
  });

  it("reports the layer it read", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const path = fixture("points.csv");
    await readCsvPoints(path);
    expect(info).toHaveBeenCalledWith(`Reading layer \`points' from ${path}: 3 features, 4 fields, CRS EPSG:4326 (WGS 84)`);
  });
});

describe("CSV to GeoJSON", () => {
  it("exports three points with their coordinates and CRS", async () => {
    const dir = await mkdtemp(join(tmpdir(), "csv-geojson-"));
    tempDirs.push(dir);
    const points = await readCsvPoints(fixture("points.csv"), { quiet: true });
    const out = await writeGeoJSON(points, join(dir, "points_csv.geojson"), { quiet: true });

    const written: unknown = JSON.parse(await readFile(out, "utf-8"));
    expect(written).toMatchObject({
      type: "FeatureCollection",
      crs: { type: "name", properties: { name: "urn:ogc:def:crs:OGC:1.3:CRS84" } },
    });

    const reread = await readGeoJSON(out, { quiet: true });
    expect(reread.crs).toBe("EPSG:4326");
    expect(reread.features).toHaveLength(3);
    const expected = [
      [0.55, 51.48],
      [0.7, 51.5],
      [0.85, 51.52],
    ];
    reread.features.forEach((feature, i) => {
      expect(feature.geometry?.type).toBe("Point");
      if (feature.geometry?.type !== "Point") return;
      expect(feature.geometry.coordinates[0]).toBeCloseTo(expected[i][0], 10);
      expect(feature.geometry.coordinates[1]).toBeCloseTo(expected[i][1], 10);
    });
    expect(reread.features.map((f) => f.properties)).toEqual(points.features.map((f) => f.properties));
  });
});
