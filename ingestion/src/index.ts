export * from "./source.js";
export * from "./csv.js";
export * from "./geojson.js";
export * from "./shapefile.js";
export * from "./arcgis.js";
export * from "./raster.js";
export * from "./naturalEarth.js";
export * from "./describe.js";
