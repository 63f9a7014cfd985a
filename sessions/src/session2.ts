import { join } from "path";
import {
  assignAttribute,
  bufferBounds,
  categoricalScale,
  collectionBounds,
  publicationTheme,
  StaticMap,
  transformCollection,
} from "geo-workshop-engine";
import type { FigureSize, MapLabels } from "geo-workshop-engine";
import { loadWorldCountries, queryFeatureServer, readCsvPoints, readGeoJSON, readShapefile } from "geo-workshop-ingestion";
import { remoteSources, resolveSessionOptions } from "./config.js";
import type { SessionOptions } from "./config.js";

const TARGET_CRS = "EPSG:4326";
const FIGURE: FigureSize = { width: 10, height: 6, units: "in", dpi: 300 };
const ZOOM_BUFFER_DEG = 0.05;

const LOCAL_LABELS: MapLabels = {
  title: "Study area with monitoring site and transect",
  subtitle: "An example of a publication-ready static map",
};

const HOTSPOT_LABELS: MapLabels = {
  title: "Global Biodiversity Hotspots (2016)",
  subtitle: "Hotspots over a Natural Earth basemap",
  fillLegendTitle: null,
};

/**
 * Publication-ready static maps: local layers with legends, ArcGIS web
 * layers, a zoom to the study points and a high-resolution hotspot figure.
 */
export async function runSession2(options: SessionOptions = {}): Promise<string[]> {
  const { dataDir, outputDir, quiet } = resolveSessionOptions(options);
  const figure = options.figure ?? FIGURE;
  const data = (name: string) => join(dataDir, name);
  const out = (name: string) => join(outputDir, "session2", name);
  const written: string[] = [];

  // local layers, aligned on one CRS
  let points = transformCollection(await readCsvPoints(data("points.csv"), { quiet }), TARGET_CRS);
  let line = transformCollection(await readGeoJSON(data("line.geojson"), { quiet: true }), TARGET_CRS);
  let polygon = transformCollection(await readShapefile(data("layers/POLYGON.shp"), { quiet: true }), TARGET_CRS);

  const plain = new StaticMap({ crs: TARGET_CRS })
    .addLayer(polygon, { stroke: "#cd0000" })
    .addLayer(line, { strokeWidth: 1.6 })
    .addLayer(points, { radius: 3 })
    .labs(LOCAL_LABELS);
  written.push(await plain.save(out("local_map.png"), figure));

  // a "type" attribute per layer drives the legends
  const linePointColours = categoricalScale({ Transect: "#008b00", "Monitoring site": "#cd0000" });
  const polygonFills = categoricalScale({ "Study area": "#551a8b" });
  points = assignAttribute(points, "type", "Monitoring site");
  line = assignAttribute(line, "type", "Transect");
  polygon = assignAttribute(polygon, "type", "Study area");

  const localLayers = (map: StaticMap): StaticMap =>
    map
      .addLayer(polygon, { fill: { field: "type", scale: polygonFills }, stroke: "none" })
      .addLayer(line, { stroke: { field: "type", scale: linePointColours }, strokeWidth: 1.6 })
      .addLayer(points, { stroke: { field: "type", scale: linePointColours }, radius: 3 });

  written.push(await localLayers(new StaticMap({ crs: TARGET_CRS })).labs(LOCAL_LABELS).save(out("local_map_legend.png"), figure));

  // web layer: Thames estuary
  const thames = transformCollection(
    await queryFeatureServer(remoteSources.thamesEstuary.url, {
      where: remoteSources.thamesEstuary.where,
      fetcher: options.fetcher,
      quiet,
    }),
    TARGET_CRS
  );
  const thamesMap = (): StaticMap =>
    localLayers(new StaticMap({ crs: TARGET_CRS, theme: "bw" }).addLayer(thames, { fill: "lightblue", stroke: "none" })).labs({
      ...LOCAL_LABELS,
      subtitle: "Local layers over Thames Estuary web layer",
    });
  written.push(await thamesMap().save(out("thames_map.png"), figure));

  // zoom to the points with a fixed buffer
  const pointBounds = collectionBounds(points);
  if (!pointBounds) throw new Error("The points layer has no coordinates to zoom to");
  const [xmin, ymin, xmax, ymax] = bufferBounds(pointBounds, ZOOM_BUFFER_DEG);
  const zoomed = thamesMap().setExtent({ xlim: [xmin, xmax], ylim: [ymin, ymax], expand: false });
  written.push(await zoomed.save(out("thames_map_zoom.png"), figure));

  // web layer: biodiversity hotspots over the Natural Earth basemap
  const hotspots = transformCollection(
    await queryFeatureServer(remoteSources.biodiversityHotspots.url, {
      where: remoteSources.biodiversityHotspots.where,
      fetcher: options.fetcher,
      quiet,
    }),
    TARGET_CRS
  );
  const world = transformCollection(loadWorldCountries({ scale: "50m", quiet }), TARGET_CRS);

  const clean = new StaticMap({ crs: TARGET_CRS, theme: "clean" })
    .addLayer(hotspots, { fill: "tomato", stroke: "none", fillOpacity: 0.6 })
    .addLayer(world, { fill: "#f2f2f2", stroke: "white", strokeWidth: 0.4 })
    .labs({ title: HOTSPOT_LABELS.title, subtitle: HOTSPOT_LABELS.subtitle });
  written.push(await clean.save(out("hotspots_clean.png"), figure));

  const hotspotTypes = categoricalScale({ "hotspot area": "tomato", "outer limit": "goldenrod" });
  const byType = (basemapFill: string): StaticMap =>
    new StaticMap({ crs: TARGET_CRS })
      .addLayer(world, { fill: basemapFill, stroke: "white", strokeWidth: 0.4 })
      .addLayer(hotspots, { fill: { field: "Type", scale: hotspotTypes }, stroke: "none", fillOpacity: 0.7 })
      .labs(HOTSPOT_LABELS);

  written.push(await byType("#bebebe").theme("wsj").save(out("hotspots_by_type_wsj.png"), figure));
  written.push(
    await byType("#bfbfbf").theme(publicationTheme(12)).save(out("biodiversity_hotspots_map.png"), figure)
  );

  return written;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runSession2()
    .then((files) => console.info(`Session 2 wrote ${files.length} files`))
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
