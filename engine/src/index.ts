export * from "./types.js";
export * from "./crs.js";
export * from "./geometry.js";
export * from "./reproject.js";
export * from "./raster.js";
export * from "./style.js";
export * from "./theme.js";
export * from "./layers.js";
export * from "./export.js";
export * from "./providers.js";
export * from "./staticMap.js";
export * from "./interactive.js";
