import { describe, expect, it } from "vitest";
import { featureCollection, pointFeature } from "../src/geometry.js";
import { InteractiveMap, leafletStyle, serializeDocument } from "../src/interactive.js";
import { createRaster } from "../src/raster.js";
import { numericScale, popupTemplate } from "../src/style.js";
import type { SpatialCollection } from "../src/types.js";

const quakes = featureCollection(
  [
    pointFeature(142.1, 38.3, { place: "off the east coast", mag: 5.1, time: 0 }),
    pointFeature(-70.5, -20.2, { place: "near <Iquique>", mag: 3.2, time: 86_400_000 }),
  ],
  "EPSG:4326"
);

const route: SpatialCollection = featureCollection(
  [
    {
      type: "Feature",
      geometry: {
        type: "LineString",
        coordinates: [
          [0.5, 51.4],
          [0.9, 51.6],
        ],
      },
      properties: { Name: "T1" },
    },
  ],
  "EPSG:4326"
);

describe("interactive map document", () => {
  it("records layers, groups and controls in draw order", async () => {
    const map = new InteractiveMap("Local layers")
      .addProviderTiles("CartoDB.Positron", { group: "Light" })
      .addProviderTiles("Esri.WorldImagery", { group: "Imagery" })
      .addCircleMarkers(quakes, { stroke: "blue", radius: 5 }, { group: "Point" })
      .addPolylines(route, { stroke: "green", strokeWidth: 3 }, { group: "Line" })
      .addLayersControl({ baseGroups: ["Light", "Imagery"], overlayGroups: ["Point", "Line"], collapsed: false })
      .hideGroup("Line");

    const doc = await map.toDocument();
    expect(doc.layers.map((l) => l.kind)).toEqual(["tiles", "tiles", "circleMarkers", "polylines"]);
    expect(doc.layers.map((l) => l.group)).toEqual(["Light", "Imagery", "Point", "Line"]);
    expect(doc.hiddenGroups).toEqual(["Line"]);
    expect(doc.visibleGroups).toEqual(["Light", "Point"]);
    expect(doc.layersControl).toEqual({
      baseGroups: ["Light", "Imagery"],
      overlayGroups: ["Point", "Line"],
      collapsed: false,
      position: "topright",
    });
    const line = doc.layers[3];
    if (line.kind !== "polylines") throw new Error("expected polylines");
    expect(line.data.features[0].properties.style).toEqual({ color: "green", weight: 3, opacity: 0.5, fillOpacity: 0.2 });
  });

  it("starts on the first base group only", async () => {
    const doc = await new InteractiveMap()
      .addProviderTiles("CartoDB.Positron", { group: "Carto" })
      .addProviderTiles("Esri.WorldImagery", { group: "Satellite" })
      .addLayersControl({ baseGroups: ["Carto", "Satellite"] })
      .toDocument();
    expect(doc.visibleGroups).toEqual(["Carto"]);

    const withoutControl = await new InteractiveMap()
      .addProviderTiles("CartoDB.Positron", { group: "Carto" })
      .addProviderTiles("Esri.WorldImagery", { group: "Satellite" })
      .toDocument();
    expect(withoutControl.visibleGroups).toEqual(["Carto", "Satellite"]);
  });

  it("applies default path options beneath the layer style", async () => {
    const outline: SpatialCollection = featureCollection(
      [
        {
          type: "Feature",
          geometry: {
            type: "Polygon",
            coordinates: [
              [
                [0, 0],
                [1, 0],
                [1, 1],
                [0, 0],
              ],
            ],
          },
          properties: {},
        },
      ],
      "EPSG:4326"
    );
    const doc = await new InteractiveMap()
      .addPolylines(route)
      .addPolygons(outline, { fill: "purple" })
      .addCircleMarkers(quakes, { opacity: 1 })
      .toDocument();
    const styles = doc.layers.map((layer) => ("data" in layer ? layer.data.features[0].properties.style : undefined));
    expect(styles).toEqual([
      { weight: 5, opacity: 0.5, fillOpacity: 0.2 },
      { weight: 5, opacity: 0.5, fillOpacity: 0.2, fillColor: "purple" },
      { radius: 10, weight: 5, opacity: 1, fillOpacity: 0.2 },
    ]);
  });

  it("fits to the data when no view is set", async () => {
    const doc = await new InteractiveMap().addTiles().addCircleMarkers(quakes).toDocument();
    expect(doc.view).toBeUndefined();
    expect(doc.bounds).toEqual([
      [-20.2, -70.5],
      [38.3, 142.1],
    ]);
  });

  it("uses an explicit view", async () => {
    const doc = await new InteractiveMap().addTiles().setView(-0.1276, 51.5074, 12).toDocument();
    expect(doc.view).toEqual({ lng: -0.1276, lat: 51.5074, zoom: 12 });
    expect(doc.bounds).toBeUndefined();
  });

  it("builds popups per feature", async () => {
    const doc = await new InteractiveMap()
      .addCircleMarkers(quakes, { radius: (a) => (typeof a.mag === "number" ? a.mag : 1) }, {
        popup: popupTemplate([
          ["Location:", "place"],
          ["Magnitude:", "mag"],
        ]),
      })
      .toDocument();
    const layer = doc.layers[0];
    if (layer.kind !== "circleMarkers") throw new Error("expected circle markers");
    expect(layer.data.features.map((f) => f.properties.popup)).toEqual([
      "Location: off the east coast<br>Magnitude: 5.1",
      "Location: near &lt;Iquique&gt;<br>Magnitude: 3.2",
    ]);
    expect(layer.data.features.map((f) => f.properties.style.radius)).toEqual([5.1, 3.2]);
  });

  it("reprojects overlays to EPSG:4326", async () => {
    const projected = featureCollection([pointFeature(-14204.367025221705, 6711542.475587636)], "EPSG:3857");
    const doc = await new InteractiveMap().addMarkers(projected).toDocument();
    const layer = doc.layers[0];
    if (layer.kind !== "markers") throw new Error("expected markers");
    expect(layer.markers[0].lng).toBeCloseTo(-0.1276, 6);
    expect(layer.markers[0].lat).toBeCloseTo(51.5074, 6);
  });

  it("rejects geometries the layer type cannot draw", () => {
    expect(() => new InteractiveMap().addPolygons(route)).toThrow("polygons layer cannot draw LineString geometries");
    expect(() => new InteractiveMap().addProviderTiles("Stamen.Toner")).toThrow("Unknown tile provider: Stamen.Toner");
    expect(() => new InteractiveMap().setView(0, 95, 2)).toThrow("Invalid coordinate");
  });

  it("builds legends from explicit colours or a numeric scale", async () => {
    const scale = numericScale({ palette: "Blues", domain: [0, 10], naColor: "#808080" });
    const doc = await new InteractiveMap()
      .addLegend({ colors: ["tomato", "goldenrod"], labels: ["hotspot area", "outer limit"], title: "Type" })
      .addLegend({ scale, values: [0, 10], bins: 2, position: "bottomright", title: "Depth" })
      .toDocument();
    expect(doc.legends[0]).toEqual({
      position: "topright",
      title: "Type",
      opacity: 1,
      entries: [
        { color: "tomato", label: "hotspot area" },
        { color: "goldenrod", label: "outer limit" },
      ],
    });
    expect(doc.legends[1].entries.map((e) => e.label)).toEqual(["0", "5", "10"]);
    expect(doc.legends[1].entries[0].color).toBe(scale(0));
    expect(() => new InteractiveMap().addLegend({ colors: ["red"], labels: [] })).toThrow(
      "Legend has 1 colors but 0 labels"
    );
  });

  it("overlays rasters as PNG images placed in lon/lat", async () => {
    const grid = createRaster(
      2,
      2,
      [Float32Array.from([1, 2, Number.NaN, 4])],
      { originX: -10, originY: 10, pixelWidth: 10, pixelHeight: -10 },
      "EPSG:4326"
    );
    const doc = await new InteractiveMap()
      .addRasterImage(grid, { colors: numericScale({ palette: "Viridis", domain: [1, 4] }), opacity: 0.8 })
      .toDocument();
    const layer = doc.layers[0];
    if (layer.kind !== "image") throw new Error("expected an image");
    expect(layer.url.startsWith("data:image/png;base64,")).toBe(true);
    expect(layer.opacity).toBe(0.8);
    expect(layer.bounds[0][0]).toBeCloseTo(-10, 6);
    expect(layer.bounds[0][1]).toBeCloseTo(-10, 6);
    expect(layer.bounds[1][0]).toBeCloseTo(10, 6);
    expect(layer.bounds[1][1]).toBeCloseTo(10, 6);
  });

  it("refuses unprojected rasters in other CRSs", () => {
    const grid = createRaster(1, 1, [Float32Array.from([1])], { originX: 0, originY: 0, pixelWidth: 1, pixelHeight: -1 }, "EPSG:27700");
    expect(() =>
      new InteractiveMap().addRasterImage(grid, { colors: numericScale({ palette: "Reds", domain: [0, 1] }), project: false })
    ).toThrow("Raster in EPSG:27700 must be projected before display");
  });
});

describe("HTML output", () => {
  it("maps style fields to Leaflet path options", () => {
    expect(leafletStyle({ stroke: "none", fill: "red", fillOpacity: 0.5 })).toEqual({
      stroke: false,
      fillColor: "red",
      fillOpacity: 0.5,
    });
  });

  it("escapes markup in the inlined document", async () => {
    const map = new InteractiveMap("Quakes & faults").addMarkers({ lng: 0, lat: 0, popup: "</script><b>x</b>" });
    const doc = await map.toDocument();
    expect(serializeDocument(doc)).not.toContain("<");
    const html = await map.toHTML();
    expect(html).toContain("<title>Quakes &amp; faults</title>");
    expect(html).toContain('"popup":"\\u003c/script>\\u003cb>x\\u003c/b>"');
    expect(html).toContain("https://unpkg.com/leaflet@1.9.4/dist/leaflet.js");
    expect(html).not.toContain("{{MAP_DOCUMENT}}");
  });
});
