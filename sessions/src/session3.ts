import { join } from "path";
import {
  formatEpochMillis,
  georeference,
  InteractiveMap,
  maskNoData,
  numericScale,
  popupTemplate,
  transformCollection,
} from "geo-workshop-engine";
import type { Attributes, LayerStyle } from "geo-workshop-engine";
import { loadWorldCountries, queryFeatureServer, readFeed, readGeoJSON, readRaster } from "geo-workshop-ingestion";
import { remoteSources, resolveSessionOptions } from "./config.js";
import type { SessionOptions } from "./config.js";

// Leaflet expects WGS84 lon/lat
const TARGET_CRS = "EPSG:4326";
const LONDON = { lng: -0.1276, lat: 51.5074 };
const SST_NO_DATA = 255;

const namePopup = popupTemplate([["Name", "Name"]]);

const earthquakePopup = popupTemplate([
  ["Location:", "place"],
  ["Magnitude:", "mag"],
  ["Date:", "time", formatEpochMillis],
]);

const magnitudeRadius = (attributes: Attributes): number => (typeof attributes.mag === "number" ? attributes.mag : 1);

const POINT_STYLE: LayerStyle = { stroke: "blue", radius: 5 };
const LINE_STYLE: LayerStyle = { stroke: "green", strokeWidth: 3 };
const POLYGON_STYLE: LayerStyle = { stroke: "red", strokeWidth: 2, fillOpacity: 0.5 };

/**
 * Interactive maps and mixed data sources: Leaflet basemaps, local layers with
 * toggles, ArcGIS and GeoJSON feed overlays and a sea-surface-temperature raster.
 */
export async function runSession3(options: SessionOptions = {}): Promise<string[]> {
  const { dataDir, outputDir, quiet } = resolveSessionOptions(options);
  const data = (name: string) => join(dataDir, name);
  const out = (name: string) => join(outputDir, "session3", name);
  const written: string[] = [];

  // basic maps
  written.push(await new InteractiveMap("Basic map").addTiles().save(out("basic_map.html")));
  written.push(await new InteractiveMap("Marker").addTiles().addMarkers(LONDON).save(out("marker_map.html")));
  written.push(
    await new InteractiveMap("Base layers")
      .addProviderTiles("OpenStreetMap", { group: "OSM" })
      .addProviderTiles("Esri.WorldImagery", { group: "Satellite" })
      .addMarkers({ ...LONDON, popup: "London" })
      .addLayersControl({ baseGroups: ["OSM", "Satellite"], collapsed: false })
      .save(out("base_layers_map.html"))
  );

  // local layers with toggles
  const point = await readGeoJSON(data("point.geojson"), { quiet });
  const line = await readGeoJSON(data("line.geojson"), { quiet });
  const polygon = await readGeoJSON(data("polygon.geojson"), { quiet });

  const localLayers = (map: InteractiveMap): InteractiveMap =>
    map
      .addProviderTiles("CartoDB.Positron", { group: "Carto" })
      .addProviderTiles("Esri.WorldImagery", { group: "Satellite" })
      .addCircleMarkers(point, POINT_STYLE, { popup: namePopup, group: "Point" })
      .addPolylines(line, LINE_STYLE, { popup: namePopup, group: "Line" })
      .addPolygons(polygon, POLYGON_STYLE, { popup: namePopup, group: "Polygon" });

  const local = localLayers(new InteractiveMap("Local layers"))
    .addLayersControl({ baseGroups: ["Carto", "Satellite"], overlayGroups: ["Point", "Line", "Polygon"], collapsed: false })
    .hideGroup("Line")
    .hideGroup("Polygon");
  written.push(await local.save(out("local_map.html")));

  // web data: Thames estuary under the local layers
  const thames = transformCollection(
    await queryFeatureServer(remoteSources.thamesEstuary.url, {
      where: remoteSources.thamesEstuary.where,
      fetcher: options.fetcher,
      quiet,
    }),
    TARGET_CRS
  );
  const thamesMap = localLayers(
    new InteractiveMap("Thames Estuary").addPolygons(thames, { fill: "darkblue", stroke: "none" }, { group: "Thames Estuary" })
  )
    .addLayersControl({
      baseGroups: ["Carto", "Satellite"],
      overlayGroups: ["Point", "Line", "Polygon", "Thames Estuary"],
      collapsed: false,
    })
    .addResetMapButton()
    .addFullscreenControl()
    .hideGroup("Line")
    .hideGroup("Polygon");
  written.push(await thamesMap.save(out("thames_map.html")));

  // earthquakes from the GeoJSON feed, sized by magnitude
  const earthquakes = await readFeed(remoteSources.earthquakes.url, { fetcher: options.fetcher, quiet: true });
  const quakeMap = new InteractiveMap("Earthquakes")
    .addProviderTiles("CartoDB.Positron", { group: "Carto" })
    .addProviderTiles("Esri.WorldImagery", { group: "Satellite" })
    .addCircleMarkers(earthquakes, { stroke: "red", radius: magnitudeRadius }, { popup: earthquakePopup, group: "Earthquakes" })
    .addLayersControl({ baseGroups: ["Carto", "Satellite"], overlayGroups: ["Earthquakes"], collapsed: false })
    .addLegend({ position: "bottomright", colors: ["red"], labels: ["Circle size proportional to magnitude"], opacity: 1 })
    .addResetMapButton()
    .addFullscreenControl();
  written.push(await quakeMap.save(out("earthquakes_map.html")));

  // fault lines and earthquakes on a dark basemap
  const faults = transformCollection(
    await queryFeatureServer(remoteSources.activeFaults.url, {
      where: remoteSources.activeFaults.where,
      fetcher: options.fetcher,
      quiet,
    }),
    TARGET_CRS
  );
  const faultMap = new InteractiveMap("Faults and earthquakes")
    .setView(63, 28, 2)
    .addProviderTiles("CartoDB.DarkMatter", { group: "Carto Dark" })
    .addProviderTiles("Esri.WorldImagery", { group: "Satellite" })
    .addPolylines(faults, { stroke: "orange", strokeWidth: 2 }, { group: "Faults" })
    .addCircleMarkers(
      earthquakes,
      { stroke: "red", fillOpacity: 1, radius: magnitudeRadius },
      { popup: earthquakePopup, group: "Earthquakes" }
    )
    .addLayersControl({ baseGroups: ["Carto Dark", "Satellite"], overlayGroups: ["Earthquakes", "Faults"], collapsed: false })
    .addLegend({
      position: "bottomright",
      colors: ["red", "orange"],
      labels: ["Circle size proportional to magnitude", "Fault lines"],
      opacity: 1,
    })
    .addResetMapButton()
    .addFullscreenControl();
  written.push(await faultMap.save(out("faults_map.html")));

  // raster: the image carries no georeferencing, so it is placed on a global lon/lat grid
  const raw = await readRaster(data("sst_sample.tif"), { quiet });
  const sst = maskNoData(
    georeference(
      raw,
      { originX: -180, originY: 90, pixelWidth: 360 / raw.width, pixelHeight: -180 / raw.height },
      TARGET_CRS
    ),
    SST_NO_DATA
  );
  const palette = numericScale({ palette: "RdYlBu", domain: [1, 254], reverse: true, naColor: "transparent" });
  const world = loadWorldCountries({ scale: "50m", quiet });
  const sstMap = new InteractiveMap("Sea surface temperature")
    .addTiles()
    .setView(13, 28, 2)
    .addRasterImage(sst, { colors: palette, opacity: 0.8, project: true })
    .addPolygons(world, { stroke: "black", strokeWidth: 1, fillOpacity: 0 }, { group: "Borders" })
    .addLegend({
      scale: numericScale({ palette: "RdYlBu", domain: [0, 35], reverse: true }),
      values: [0, 35],
      title: "SST (°C)",
      position: "bottomright",
    });
  written.push(await sstMap.save(out("sst_map.html")));

  return written;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runSession3()
    .then((files) => console.info(`Session 3 wrote ${files.length} files`))
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
