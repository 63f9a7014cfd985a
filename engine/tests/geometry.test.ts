import { describe, expect, it } from "vitest";
import {
  bufferBounds,
  collectionBounds,
  expandBounds,
  featureCollection,
  fieldNames,
  filterByBounds,
  geometryTypes,
  iteratePositions,
  mapPositions,
  pointFeature,
  unionBounds,
} from "../src/geometry.js";
import type { SpatialFeature } from "../src/types.js";

const line: SpatialFeature = {
  type: "Feature",
  geometry: {
    type: "LineString",
    coordinates: [
      [0.5, 51.4],
      [0.7, 51.5],
      [0.9, 51.45],
    ],
  },
  properties: { Name: "Transect A" },
};

describe("geometry helpers", () => {
  it("builds point features in lon/lat order", () => {
    const f = pointFeature(0.6, 51.47, { Name: "Site 1", depth: 4 });
    expect(f.geometry).toEqual({ type: "Point", coordinates: [0.6, 51.47] });
    expect(f.properties).toEqual({ Name: "Site 1", depth: 4 });
  });

  it("maps every position and keeps the structure", () => {
    const shifted = mapPositions(
      {
        type: "MultiPolygon",
        coordinates: [
          [
            [
              [0, 0],
              [1, 0],
              [0, 1],
              [0, 0],
            ],
          ],
        ],
      },
      ([x, y]) => [x + 10, y - 10]
    );
    expect(shifted.coordinates[0][0]).toEqual([
      [10, -10],
      [11, -10],
      [10, -9],
      [10, -10],
    ]);
  });

  it("walks geometry collections", () => {
    const positions = [
      ...iteratePositions({
        type: "GeometryCollection",
        geometries: [
          { type: "Point", coordinates: [1, 2] },
          {
            type: "LineString",
            coordinates: [
              [3, 4],
              [5, 6],
            ],
          },
        ],
      }),
    ];
    expect(positions).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
  });

  it("computes collection bounds and ignores null geometries", () => {
    const collection = featureCollection(
      [line, pointFeature(0.3, 51.6), { type: "Feature", geometry: null, properties: {} }],
      "EPSG:4326"
    );
    expect(collectionBounds(collection)).toEqual([0.3, 51.4, 0.9, 51.6]);
    expect(collectionBounds(featureCollection([], "EPSG:4326"))).toBeNull();
  });

  it("unions, buffers and expands boxes", () => {
    expect(unionBounds([[0, 0, 1, 1], null, [-1, 0.5, 0.5, 2]])).toEqual([-1, 0, 1, 2]);
    expect(unionBounds([null])).toBeNull();
    expect(bufferBounds([0, 0, 1, 1], 0.25)).toEqual([-0.25, -0.25, 1.25, 1.25]);
    expect(expandBounds([0, 0, 10, 20], 0.1)).toEqual([-1, -2, 11, 22]);
  });

  it("summarises geometry types and fields", () => {
    const collection = featureCollection(
      [line, pointFeature(0, 0, { Name: "P", type: "Monitoring site" })],
      "EPSG:4326"
    );
    expect(geometryTypes(collection)).toEqual(["LineString", "Point"]);
    expect(fieldNames(collection)).toEqual(["Name", "type"]);
  });

  it("keeps features whose bounds touch a box", () => {
    const places = featureCollection(
      [pointFeature(2, 48, { name: "Paris" }), pointFeature(151, -34, { name: "Sydney" }), line],
      "EPSG:4326"
    );
    const europe = filterByBounds(places, [-15, 33, 45, 70]);
    expect(europe.features.map((f) => f.properties.name ?? f.properties.Name)).toEqual(["Paris", "Transect A"]);
    expect(europe.crs).toBe("EPSG:4326");
  });
});
