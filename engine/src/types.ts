import type { Feature, FeatureCollection, Geometry, Position } from "geojson";

export type CrsId = string; // "EPSG:4326", "+proj=robin", or a WKT definition
export type LayerID = string;
export type GroupName = string;

export type AttributeValue = string | number | boolean | null;
export type Attributes = Record<string, AttributeValue>;

export type SpatialFeature<G extends Geometry | null = Geometry | null> = Feature<G, Attributes>;

/** A GeoJSON FeatureCollection that carries the CRS its coordinates are in. */
export interface SpatialCollection<G extends Geometry | null = Geometry | null>
  extends FeatureCollection<G, Attributes> {
  crs: CrsId;
  name?: string;
}

export type BBox = [number, number, number, number]; // [minX, minY, maxX, maxY]

export type LonLat = [number, number];

export interface CrsDefinition {
  code: CrsId;
  proj4: string;
  label: string;
  geographic: boolean;
  latitudeDomain?: [number, number]; // geographic input is clamped into this range before projecting
}

export interface AffineTransform {
  originX: number; // x of the top-left corner of the top-left pixel
  originY: number;
  pixelWidth: number;
  pixelHeight: number; // negative for north-up grids
}

export interface RasterGrid {
  width: number;
  height: number;
  bands: Float32Array[]; // row-major, one array per band
  transform: AffineTransform;
  crs: CrsId;
  noData?: number;
}

export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8ClampedArray; // width * height * 4
}

export type ColorFn = (value: number | null) => string;

export interface LegendEntry {
  label: string;
  color: string;
}

export interface CategoricalScale {
  kind: "categorical";
  domain: string[];
  (category: AttributeValue): string;
  legend(): LegendEntry[];
}

export interface NumericScale {
  kind: "numeric";
  domain: [number, number];
  palette: string;
  reverse: boolean;
  (value: number | null): string;
  ticks(count?: number): number[];
}

export type ColorScale = CategoricalScale | NumericScale;

/** A visual channel: constant, bound to an attribute through a scale, or computed from attributes. */
export type Channel<T> =
  | T
  | { field: string; scale: T extends string ? ColorScale : (value: AttributeValue) => T }
  | ((attributes: Attributes) => T);

export interface LayerStyle {
  fill?: Channel<string>;
  stroke?: Channel<string>;
  strokeWidth?: Channel<number>;
  radius?: Channel<number>;
  opacity?: Channel<number>;
  fillOpacity?: Channel<number>;
}

export interface ResolvedStyle {
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  radius?: number;
  opacity?: number;
  fillOpacity?: number;
}

export interface FigureSize {
  width: number;
  height: number;
  units?: "in" | "cm" | "mm" | "px";
  dpi?: number;
}

export type LegendPosition = "right" | "bottom" | "none";

export interface MapTheme {
  name: string;
  baseSize: number;
  fontFamily: string;
  background: string;
  panelBackground: string;
  panelBorder?: string;
  graticule?: string; // stroke colour; omitted hides the graticule
  titleWeight: "normal" | "bold";
  titleAlign: "start" | "middle";
  titleScale: number;
  subtitleScale: number;
  textColor: string;
  legendPosition: LegendPosition;
  legendDirection: "vertical" | "horizontal";
  legendTitleStyle: "normal" | "italic";
  marginMm: [number, number, number, number]; // top, right, bottom, left
}

export interface MapLabels {
  title?: string;
  subtitle?: string;
  fillLegendTitle?: string | null;
  colourLegendTitle?: string | null;
}

export interface Extent {
  xlim: [number, number];
  ylim: [number, number];
  crs?: CrsId; // the CRS the limits are expressed in, defaults to the map CRS
  expand?: boolean;
}

export type { Feature, FeatureCollection, Geometry, Position };
