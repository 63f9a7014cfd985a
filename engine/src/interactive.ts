import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { scaleLinear } from "d3-scale";
import type { Geometry } from "geojson";
import { sameCrs, WEB_MERCATOR, WGS84 } from "./crs.js";
import { rgbaToDataUrl } from "./export.js";
import { geometryBounds } from "./geometry.js";
import { LayerStack } from "./layers.js";
import type { StackedLayer } from "./layers.js";
import { colorizeRaster, rasterBounds, reprojectRaster } from "./raster.js";
import type { ReprojectRasterOptions } from "./raster.js";
import { getConverter, transformCollection } from "./reproject.js";
import { getTileProvider } from "./providers.js";
import { escapeHtml, resolveFeatureStyle } from "./style.js";
import type {
  Attributes,
  GroupName,
  LayerStyle,
  LegendEntry,
  NumericScale,
  RasterGrid,
  ResolvedStyle,
  RgbaImage,
  SpatialCollection,
} from "./types.js";

export type ControlPosition = "topleft" | "topright" | "bottomleft" | "bottomright";

export type LatLngBounds = [[south: number, west: number], [north: number, east: number]];

/** Leaflet path options, as passed to `L.circleMarker` / `L.geoJSON` styles. */
export interface LeafletPathStyle {
  stroke?: boolean;
  color?: string;
  weight?: number;
  opacity?: number;
  fillColor?: string;
  fillOpacity?: number;
  radius?: number;
}

export interface DocumentFeature {
  type: "Feature";
  geometry: Geometry;
  properties: { style: LeafletPathStyle; popup?: string };
}

interface LayerBase extends StackedLayer {
  group?: GroupName;
}

export interface TileLayerDoc extends LayerBase {
  kind: "tiles";
  provider: string;
  url: string;
  attribution: string;
  maxZoom: number;
  subdomains?: string;
}

export interface MarkerLayerDoc extends LayerBase {
  kind: "markers";
  markers: { lng: number; lat: number; popup?: string }[];
}

export type VectorKind = "circleMarkers" | "polylines" | "polygons";

export interface VectorLayerDoc extends LayerBase {
  kind: VectorKind;
  data: { type: "FeatureCollection"; features: DocumentFeature[] };
}

export interface ImageLayerDoc extends LayerBase {
  kind: "image";
  url: string; // PNG data URL
  bounds: LatLngBounds;
  opacity: number;
}

interface ImageLayerState extends LayerBase {
  kind: "image";
  image: RgbaImage;
  bounds: LatLngBounds;
  opacity: number;
}

export type LayerDoc = TileLayerDoc | MarkerLayerDoc | VectorLayerDoc | ImageLayerDoc;
type LayerState = TileLayerDoc | MarkerLayerDoc | VectorLayerDoc | ImageLayerState;

export interface LegendDoc {
  position: ControlPosition;
  title?: string;
  entries: LegendEntry[];
  opacity: number;
}

export interface LayersControlDoc {
  baseGroups: GroupName[];
  overlayGroups: GroupName[];
  collapsed: boolean;
  position: ControlPosition;
}

export interface MapDocument {
  title: string;
  layers: LayerDoc[];
  hiddenGroups: GroupName[];
  /** Groups added to the map on load: not hidden, and only the first base group of a layers control. */
  visibleGroups: GroupName[];
  legends: LegendDoc[];
  layersControl?: LayersControlDoc;
  resetButton: boolean;
  fullscreen: boolean;
  view?: { lng: number; lat: number; zoom: number };
  bounds?: LatLngBounds; // fitted when no view is set
}

export type Popup = string | ((attributes: Attributes) => string);

export interface VectorLayerOptions {
  group?: GroupName;
  popup?: Popup;
}

export interface MarkerSpec {
  lng: number;
  lat: number;
  popup?: string;
}

export interface RasterImageOptions extends ReprojectRasterOptions {
  colors: NumericScale;
  opacity?: number;
  project?: boolean;
  group?: GroupName;
  band?: number;
}

export type LegendOptions = {
  position?: ControlPosition;
  title?: string;
  opacity?: number;
} & ({ colors: string[]; labels: string[] } | { scale: NumericScale; values?: [number, number]; bins?: number });

const TEMPLATE_URL = new URL("../templates/interactive-map.html", import.meta.url);

const ACCEPTED: Record<VectorKind, Geometry["type"][]> = {
  circleMarkers: ["Point", "MultiPoint"],
  polylines: ["LineString", "MultiLineString"],
  polygons: ["Polygon", "MultiPolygon"],
};

// path options a style channel does not set
const PATH_DEFAULTS: Record<VectorKind, LeafletPathStyle> = {
  circleMarkers: { radius: 10, weight: 5, opacity: 0.5, fillOpacity: 0.2 },
  polylines: { weight: 5, opacity: 0.5, fillOpacity: 0.2 },
  polygons: { weight: 5, opacity: 0.5, fillOpacity: 0.2 },
};

export function leafletStyle(style: ResolvedStyle): LeafletPathStyle {
  const out: LeafletPathStyle = {};
  if (style.stroke === "none") out.stroke = false;
  else if (style.stroke !== undefined) out.color = style.stroke;
  if (style.strokeWidth !== undefined) out.weight = style.strokeWidth;
  if (style.opacity !== undefined) out.opacity = style.opacity;
  if (style.fill !== undefined) out.fillColor = style.fill;
  if (style.fillOpacity !== undefined) out.fillOpacity = style.fillOpacity;
  if (style.radius !== undefined) out.radius = style.radius;
  return out;
}

/** Serialise a map document for inlining in a `<script>` element. */
export function serializeDocument(doc: MapDocument): string {
  return JSON.stringify(doc).replace(/</g, "\\u003c");
}

/**
 * Browser map builder rendered with Leaflet. Overlays are stored in EPSG:4326,
 * the CRS Leaflet expects for vector data.
 */
export class InteractiveMap {
  private stack = new LayerStack<LayerState>();
  private hidden = new Set<GroupName>();
  private legendDocs: LegendDoc[] = [];
  private control?: LayersControlDoc;
  private reset = false;
  private fullscreen = false;
  private view?: { lng: number; lat: number; zoom: number };
  private bounds?: LatLngBounds;

  constructor(readonly title = "Map") {}

  addTiles(options: { group?: GroupName } = {}): this {
    return this.addProviderTiles("OpenStreetMap", options);
  }

  addProviderTiles(name: string, options: { group?: GroupName } = {}): this {
    const provider = getTileProvider(name);
    const layer: TileLayerDoc = {
      ...this.base(options.group),
      kind: "tiles",
      provider: provider.name,
      url: provider.url,
      attribution: provider.attribution,
      maxZoom: provider.maxZoom,
    };
    if (provider.subdomains) layer.subdomains = provider.subdomains;
    this.stack.add(layer);
    return this;
  }

  /** Pin markers from explicit coordinates, or one per point of a collection. */
  addMarkers(input: MarkerSpec | MarkerSpec[] | SpatialCollection, options: VectorLayerOptions = {}): this {
    let markers: MarkerSpec[];
    if (Array.isArray(input)) {
      markers = input;
    } else if ("type" in input) {
      const points = transformCollection(input, WGS84);
      markers = points.features.flatMap((f) => {
        if (!f.geometry) return [];
        if (f.geometry.type !== "Point") {
          throw new Error(`addMarkers expects Point geometries, got ${f.geometry.type}`);
        }
        const [lng, lat] = f.geometry.coordinates;
        const popup = this.popupFor(options.popup, f.properties);
        return [popup === undefined ? { lng, lat } : { lng, lat, popup }];
      });
    } else {
      markers = [input];
    }
    markers.forEach((m) => this.checkLngLat(m.lng, m.lat));
    this.stack.add({ ...this.base(options.group), kind: "markers", markers });
    this.extendBounds(markers.map((m) => [m.lng, m.lat]));
    return this;
  }

  addCircleMarkers(collection: SpatialCollection, style: LayerStyle = {}, options: VectorLayerOptions = {}): this {
    return this.addVector("circleMarkers", collection, style, options);
  }

  addPolylines(collection: SpatialCollection, style: LayerStyle = {}, options: VectorLayerOptions = {}): this {
    return this.addVector("polylines", collection, style, options);
  }

  addPolygons(collection: SpatialCollection, style: LayerStyle = {}, options: VectorLayerOptions = {}): this {
    return this.addVector("polygons", collection, style, options);
  }

  /**
   * Colour a raster band and overlay it as an image. With `project` (the
   * default) the grid is warped to Web Mercator first; otherwise it must
   * already be in EPSG:3857 or EPSG:4326 and is placed as-is.
   */
  addRasterImage(grid: RasterGrid, options: RasterImageOptions): this {
    const project = options.project ?? true;
    let placed = grid;
    if (project) {
      placed = reprojectRaster(grid, WEB_MERCATOR, options);
    } else if (!sameCrs(grid.crs, WEB_MERCATOR) && !sameCrs(grid.crs, WGS84)) {
      throw new Error(`Raster in ${grid.crs} must be projected before display`);
    }
    const [minX, minY, maxX, maxY] = rasterBounds(placed);
    const toLonLat = getConverter(placed.crs, WGS84);
    const [west, south] = toLonLat([minX, minY]);
    const [east, north] = toLonLat([maxX, maxY]);
    const bounds: LatLngBounds = [
      [south, west],
      [north, east],
    ];
    const opacity = options.opacity ?? 1;
    this.stack.add({
      ...this.base(options.group),
      kind: "image",
      image: colorizeRaster(placed, options.colors, { band: options.band ?? 0 }),
      bounds,
      opacity,
    });
    this.extendBounds([
      [west, south],
      [east, north],
    ]);
    return this;
  }

  addLayersControl(options: Partial<LayersControlDoc> = {}): this {
    this.control = {
      baseGroups: options.baseGroups ?? [],
      overlayGroups: options.overlayGroups ?? [],
      collapsed: options.collapsed ?? true,
      position: options.position ?? "topright",
    };
    return this;
  }

  hideGroup(group: GroupName): this {
    this.hidden.add(group);
    return this;
  }

  addLegend(options: LegendOptions): this {
    let entries: LegendEntry[];
    if ("scale" in options) {
      const scale = options.scale;
      const [lo, hi] = options.values ?? scale.domain;
      entries = scaleLinear()
        .domain([lo, hi])
        .ticks(options.bins ?? 5)
        .map((t) => ({ label: String(t), color: scale(t) }));
    } else {
      if (options.colors.length !== options.labels.length) {
        throw new Error(`Legend has ${options.colors.length} colors but ${options.labels.length} labels`);
      }
      const labels = options.labels;
      entries = options.colors.map((color, i) => ({ color, label: labels[i] }));
    }
    const legend: LegendDoc = { position: options.position ?? "topright", entries, opacity: options.opacity ?? 1 };
    if (options.title !== undefined) legend.title = options.title;
    this.legendDocs.push(legend);
    return this;
  }

  addResetMapButton(): this {
    this.reset = true;
    return this;
  }

  addFullscreenControl(): this {
    this.fullscreen = true;
    return this;
  }

  setView(lng: number, lat: number, zoom: number): this {
    this.checkLngLat(lng, lat);
    if (!Number.isFinite(zoom) || zoom < 0) throw new Error(`Invalid zoom: ${zoom}`);
    this.view = { lng, lat, zoom };
    return this;
  }

  get layerCount(): number {
    return this.stack.size;
  }

  /** The map as plain data: layers in draw order, controls, hidden groups and the initial view. */
  async toDocument(): Promise<MapDocument> {
    const layers: LayerDoc[] = [];
    for (const layer of this.stack.list()) {
      if (layer.kind === "image") {
        const { image, ...rest } = layer;
        layers.push({ ...rest, url: await rgbaToDataUrl(image) });
      } else {
        layers.push(layer);
      }
    }
    const doc: MapDocument = {
      title: this.title,
      layers,
      hiddenGroups: [...this.hidden],
      visibleGroups: this.visibleGroups(),
      legends: this.legendDocs,
      resetButton: this.reset,
      fullscreen: this.fullscreen,
    };
    if (this.control) doc.layersControl = this.control;
    if (this.view) doc.view = this.view;
    else if (this.bounds) doc.bounds = this.bounds;
    return doc;
  }

  async toHTML(): Promise<string> {
    const template = await readFile(TEMPLATE_URL, "utf8");
    const doc = await this.toDocument();
    return template.replace("{{TITLE}}", () => escapeHtml(this.title)).replace("{{MAP_DOCUMENT}}", () => serializeDocument(doc));
  }

  /** Write the self-contained HTML page; returns the path written. */
  async save(path: string): Promise<string> {
    const html = await this.toHTML();
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, html, "utf8");
    return path;
  }

  private visibleGroups(): GroupName[] {
    const inactiveBases = new Set(this.control?.baseGroups.slice(1));
    const groups = new Set<GroupName>();
    for (const layer of this.stack.list()) {
      if (layer.group !== undefined) groups.add(layer.group);
    }
    return [...groups].filter((g) => !this.hidden.has(g) && !inactiveBases.has(g));
  }

  private base(group: GroupName | undefined): LayerBase {
    const zIndex = this.stack.claimZIndex();
    const layer: LayerBase = { id: `layer-${zIndex}`, zIndex };
    if (group !== undefined) layer.group = group;
    return layer;
  }

  private addVector(kind: VectorKind, collection: SpatialCollection, style: LayerStyle, options: VectorLayerOptions): this {
    const data = transformCollection(collection, WGS84);
    const features: DocumentFeature[] = [];
    for (const f of data.features) {
      if (!f.geometry) continue;
      if (!ACCEPTED[kind].includes(f.geometry.type)) {
        throw new Error(`${kind} layer cannot draw ${f.geometry.type} geometries`);
      }
      const feature: DocumentFeature = {
        type: "Feature",
        geometry: f.geometry,
        properties: { style: { ...PATH_DEFAULTS[kind], ...leafletStyle(resolveFeatureStyle(f.properties, style)) } },
      };
      const popup = this.popupFor(options.popup, f.properties);
      if (popup !== undefined) feature.properties.popup = popup;
      features.push(feature);
    }
    this.stack.add({ ...this.base(options.group), kind, data: { type: "FeatureCollection", features } });
    const corners: [number, number][] = [];
    for (const f of features) {
      const b = geometryBounds(f.geometry);
      if (b) corners.push([b[0], b[1]], [b[2], b[3]]);
    }
    this.extendBounds(corners);
    return this;
  }

  private popupFor(popup: Popup | undefined, attributes: Attributes): string | undefined {
    if (popup === undefined) return undefined;
    return typeof popup === "string" ? popup : popup(attributes);
  }

  private checkLngLat(lng: number, lat: number): void {
    if (!Number.isFinite(lng) || !Number.isFinite(lat) || lat < -90 || lat > 90) {
      throw new Error(`Invalid coordinate: lng ${lng}, lat ${lat}`);
    }
  }

  private extendBounds(points: [number, number][]): void {
    for (const [lng, lat] of points) {
      if (!this.bounds) {
        this.bounds = [
          [lat, lng],
          [lat, lng],
        ];
        continue;
      }
      const [[south, west], [north, east]] = this.bounds;
      this.bounds = [
        [Math.min(south, lat), Math.min(west, lng)],
        [Math.max(north, lat), Math.max(east, lng)],
      ];
    }
  }
}
