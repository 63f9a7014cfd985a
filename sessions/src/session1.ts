import { join } from "path";
import { crsLabel, filterByBounds, StaticMap } from "geo-workshop-engine";
import type { CrsId, FigureSize } from "geo-workshop-engine";
import {
  describeCollection,
  filterByName,
  loadWorldCountries,
  readCsvPoints,
  readGeoJSON,
  readShapefile,
  writeGeoJSON,
} from "geo-workshop-ingestion";
import { resolveSessionOptions } from "./config.js";
import type { SessionOptions } from "./config.js";

const FIGURE: FigureSize = { width: 7, height: 5, units: "in", dpi: 300 };

interface ProjectionExample {
  file: string;
  crs: CrsId;
  title: string;
}

const WORLD_PROJECTIONS: ProjectionExample[] = [
  { file: "world_web_mercator.png", crs: "EPSG:3857", title: "Web Mercator (EPSG:3857)" },
  { file: "world_robinson.png", crs: "+proj=robin", title: "Robinson projection" },
  { file: "world_mollweide.png", crs: "+proj=moll", title: "Mollweide projection" },
  { file: "world_wgs84.png", crs: "EPSG:4326", title: "WGS84 (EPSG:4326), lon/lat" },
  { file: "world_equal_earth.png", crs: "EPSG:8857", title: "World Map (Equal Earth - EPSG:8857)" },
];

/**
 * Creating and loading spatial data: read CSV, GeoJSON and Shapefile layers,
 * check their CRS, combine them, compare world projections and convert
 * layers to GeoJSON.
 */
export async function runSession1(options: SessionOptions = {}): Promise<string[]> {
  const { dataDir, outputDir, quiet } = resolveSessionOptions(options);
  const figure = options.figure ?? FIGURE;
  const log = (message: string) => {
    if (!quiet) console.info(message);
  };
  const data = (name: string) => join(dataDir, name);
  const out = (name: string) => join(outputDir, "session1", name);
  const written: string[] = [];

  // CSV table to points
  const pointCsv = await readCsvPoints(data("points.csv"), { quiet });
  log(describeCollection(pointCsv));
  written.push(await new StaticMap().addLayer(pointCsv).save(out("points_csv.png"), figure));

  // GeoJSON lines
  const line = await readGeoJSON(data("line.geojson"), { quiet });
  log(describeCollection(line));
  written.push(await new StaticMap().addLayer(line).save(out("line_geojson.png"), figure));

  // Shapefile polygons
  const polygon = await readShapefile(data("layers/POLYGON.shp"), { quiet });
  log(describeCollection(polygon));
  written.push(await new StaticMap({ theme: "minimal" }).addLayer(polygon).save(out("polygon_shp.png"), figure));

  // every layer must share one CRS before combining
  for (const layer of [pointCsv, line, polygon]) {
    log(`CRS of ${layer.name}: ${crsLabel(layer.crs)}`);
  }

  const combined = new StaticMap({ theme: "minimal" })
    .addLayer(polygon, { fill: "lightgrey" })
    .addLayer(line, { stroke: "blue" })
    .addLayer(pointCsv, { stroke: "red" });
  written.push(await combined.save(out("combined_layers.png"), figure));

  // projection examples
  const world = loadWorldCountries({ scale: "50m", quiet });
  for (const example of WORLD_PROJECTIONS) {
    const map = new StaticMap({ crs: example.crs, theme: "minimal" }).addLayer(world).labs({ title: example.title });
    written.push(await map.save(out(example.file), figure));
  }

  const europe = filterByBounds(world, [-25, 30, 60, 75]);
  const europeMap = new StaticMap({ crs: "EPSG:3035", theme: "minimal" })
    .addLayer(europe)
    .setExtent({ xlim: [-15, 45], ylim: [33, 70], crs: "EPSG:4326" })
    .labs({ title: "Europe (ETRS89 / LAEA Europe - EPSG:3035)" });
  written.push(await europeMap.save(out("europe_laea.png"), figure));

  const antarctica = filterByName(world, ["Antarctica"]);
  const antarcticaMap = new StaticMap({ crs: "EPSG:3031", theme: "minimal" })
    .addLayer(antarctica)
    .labs({ title: "Antarctica (Antarctic Polar Stereographic - EPSG:3031)" });
  written.push(await antarcticaMap.save(out("antarctica_polar.png"), figure));

  // conversions to GeoJSON
  const pointShp = await readShapefile(data("layers/POINT.shp"), { quiet });
  written.push(await writeGeoJSON(pointShp, out("point_shp.geojson"), { overwrite: true, quiet }));
  written.push(await writeGeoJSON(pointCsv, out("points_csv.geojson"), { overwrite: true, quiet }));

  return written;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runSession1()
    .then((files) => console.info(`Session 1 wrote ${files.length} files`))
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
