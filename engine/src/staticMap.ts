import { mkdir, writeFile } from "fs/promises";
import { dirname, extname } from "path";
import { geoGraticule, geoIdentity, geoPath } from "d3-geo";
import type { GeoIdentityTransform, GeoPath } from "d3-geo";
import type { Geometry, MultiLineString, MultiPoint, Position } from "geojson";
import { canonicalCrs, isGeographic, WGS84 } from "./crs.js";
import { figurePixels, writePng } from "./export.js";
import type { PixelSize } from "./export.js";
import { bufferBounds, collectionBounds, expandBounds, unionBounds } from "./geometry.js";
import { LayerStack } from "./layers.js";
import type { StackedLayer } from "./layers.js";
import { getLenientConverter, transformCollection } from "./reproject.js";
import { boundScale, escapeHtml, resolveFeatureStyle } from "./style.js";
import { getTheme, themes } from "./theme.js";
import type {
  BBox,
  CategoricalScale,
  CrsId,
  Extent,
  FigureSize,
  LayerStyle,
  MapLabels,
  MapTheme,
  ResolvedStyle,
  SpatialCollection,
} from "./types.js";

export interface StaticLayer extends StackedLayer {
  name: string;
  collection: SpatialCollection; // already in the map CRS
  style: LayerStyle;
}

export type LegendSymbol = "square" | "line" | "point";

export interface LegendKey {
  label: string;
  color: string;
  symbol: LegendSymbol;
}

export interface LegendGroup {
  aesthetic: "fill" | "colour";
  title?: string;
  keys: LegendKey[];
}

export interface StaticMapOptions {
  crs?: CrsId;
  theme?: MapTheme | string;
}

export interface AddLayerOptions {
  name?: string;
  zIndex?: number;
}

const DEFAULT_FIGURE: FigureSize = { width: 7, height: 5, units: "in", dpi: 300 };

const POLYGON_DEFAULTS = { fill: "#d9d9d9", stroke: "#4d4d4d", strokeWidth: 0.5 };
const LINE_DEFAULTS = { stroke: "#000000", strokeWidth: 0.5 };
const POINT_DEFAULTS = { color: "#000000", radius: 1.5 };

// SVG drawing sizes: strokeWidth and radius are in points, text in points scaled by the theme.
interface Metrics {
  pt: number;
  mm: number;
  base: number;
}

function attrs(values: Record<string, string | number | undefined>): string {
  return Object.entries(values)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => ` ${key}="${typeof value === "number" ? round(value) : escapeHtml(value)}"`)
    .join("");
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function textWidth(text: string, size: number): number {
  return text.length * size * 0.55;
}

function symbolFor(geometry: Geometry | null): LegendSymbol {
  switch (geometry?.type) {
    case "Point":
    case "MultiPoint":
      return "point";
    case "LineString":
    case "MultiLineString":
      return "line";
    default:
      return "square";
  }
}

function validateExtent(extent: Extent): void {
  const [x0, x1] = extent.xlim;
  const [y0, y1] = extent.ylim;
  const finite = [x0, x1, y0, y1].every(Number.isFinite);
  if (!finite || x0 >= x1 || y0 >= y1) {
    throw new Error(`Invalid extent: xlim [${x0}, ${x1}], ylim [${y0}, ${y1}]`);
  }
}

/**
 * Print figure builder. Layers are reprojected to the map CRS when added and
 * drawn in order; labels, theme and extent are applied when rendering.
 */
export class StaticMap {
  readonly crs: CrsId;
  private stack = new LayerStack<StaticLayer>();
  private labels: MapLabels = {};
  private currentTheme: MapTheme;
  private extent?: Extent;

  constructor(options: StaticMapOptions = {}) {
    this.crs = canonicalCrs(options.crs ?? WGS84);
    this.currentTheme = typeof options.theme === "string" ? getTheme(options.theme) : options.theme ?? themes.grey;
  }

  addLayer(collection: SpatialCollection, style: LayerStyle = {}, options: AddLayerOptions = {}): this {
    const zIndex = options.zIndex ?? this.stack.claimZIndex();
    this.stack.add({
      id: `layer-${zIndex}`,
      zIndex,
      name: options.name ?? collection.name ?? `layer-${zIndex}`,
      collection: transformCollection(collection, this.crs),
      style,
    });
    return this;
  }

  labs(labels: MapLabels): this {
    this.labels = { ...this.labels, ...labels };
    return this;
  }

  theme(theme: MapTheme | string): this {
    this.currentTheme = typeof theme === "string" ? getTheme(theme) : theme;
    return this;
  }

  setExtent(extent: Extent): this {
    validateExtent(extent);
    this.extent = extent;
    return this;
  }

  getLayers(): StaticLayer[] {
    return this.stack.list();
  }

  get layerCount(): number {
    return this.stack.size;
  }

  get activeTheme(): MapTheme {
    return this.currentTheme;
  }

  /**
   * Legends from categorical fill and stroke bindings. Keys appear in scale
   * order and only for categories present in the data; a category shared by
   * several layers is listed once.
   */
  legends(): LegendGroup[] {
    const collected = {
      fill: { fields: new Array<string>(), scales: new Array<CategoricalScale>(), present: new Map<string, LegendSymbol>() },
      colour: { fields: new Array<string>(), scales: new Array<CategoricalScale>(), present: new Map<string, LegendSymbol>() },
    };

    for (const layer of this.stack.list()) {
      const channels = [
        { into: collected.fill, channel: layer.style.fill },
        { into: collected.colour, channel: layer.style.stroke },
      ];
      for (const { into, channel } of channels) {
        if (typeof channel !== "object") continue;
        const scale = boundScale(channel);
        if (!scale) continue;
        if (!into.fields.includes(channel.field)) into.fields.push(channel.field);
        if (!into.scales.includes(scale)) into.scales.push(scale);
        for (const feature of layer.collection.features) {
          const value = feature.properties[channel.field];
          if (value === null || value === undefined || into.present.has(String(value))) continue;
          into.present.set(String(value), symbolFor(feature.geometry));
        }
      }
    }

    const build = (aesthetic: LegendGroup["aesthetic"], title: string | null | undefined): LegendGroup => {
      const { fields, scales, present } = collected[aesthetic];
      const group: LegendGroup = { aesthetic, keys: [] };
      for (const entry of scales.flatMap((scale) => scale.legend())) {
        const symbol = present.get(entry.label);
        if (symbol === undefined || group.keys.some((k) => k.label === entry.label)) continue;
        group.keys.push({ ...entry, symbol });
      }
      const resolved = title === null ? "" : title ?? fields.join(", ");
      if (resolved) group.title = resolved;
      return group;
    };
    return [build("fill", this.labels.fillLegendTitle), build("colour", this.labels.colourLegendTitle)].filter(
      (g) => g.keys.length > 0
    );
  }

  /** Bounds of the drawing area in the map CRS. */
  viewBounds(): BBox {
    let bbox: BBox | null;
    if (this.extent) {
      bbox = this.extentInMapCrs(this.extent);
    } else {
      bbox = unionBounds(this.stack.list().map((l) => collectionBounds(l.collection)));
    }
    if (!bbox) throw new Error("Nothing to draw: add a layer or set an extent");
    if (bbox[0] === bbox[2] || bbox[1] === bbox[3]) {
      bbox = bufferBounds(bbox, isGeographic(this.crs) ? 0.5 : 1000);
    }
    const expand = this.extent ? this.extent.expand ?? true : true;
    return expand ? expandBounds(bbox, 0.05) : bbox;
  }

  private extentInMapCrs(extent: Extent): BBox {
    const [x0, x1] = extent.xlim;
    const [y0, y1] = extent.ylim;
    if (!extent.crs) return [x0, y0, x1, y1];
    const convert = getLenientConverter(extent.crs, this.crs);
    const steps = 32;
    const edge: Position[] = [];
    for (let i = 0; i <= steps; i++) {
      const t = i / steps;
      const x = x0 + (x1 - x0) * t;
      const y = y0 + (y1 - y0) * t;
      edge.push([x, y0], [x, y1], [x0, y], [x1, y]);
    }
    const projected = edge.map(convert).filter((p): p is Position => p !== null);
    if (projected.length === 0) {
      throw new Error(`Invalid extent: no part of xlim [${x0}, ${x1}], ylim [${y0}, ${y1}] projects to ${this.crs}`);
    }
    const xs = projected.map((p) => p[0]);
    const ys = projected.map((p) => p[1]);
    return [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)];
  }

  /** Render the figure as an SVG document of `size` pixels; `dpi` scales text, strokes and margins. */
  toSVG(size: { width: number; height: number; dpi?: number }): string {
    const { width, height } = size;
    const dpi = size.dpi ?? 96;
    const theme = this.currentTheme;
    const m: Metrics = { pt: dpi / 72, mm: dpi / 25.4, base: (theme.baseSize * dpi) / 72 };
    const [mt, mr, mb, ml] = theme.marginMm.map((v) => v * m.mm);
    const out: string[] = [];

    out.push(
      `<svg xmlns="http://www.w3.org/2000/svg"${attrs({ width, height, viewBox: `0 0 ${width} ${height}` })}>`,
      `<rect${attrs({ width, height, fill: theme.background })}/>`
    );

    // title block
    let top = mt;
    const titleNodes: { text: string; y: number; size: number; weight: string }[] = [];
    if (this.labels.title) {
      const s = m.base * theme.titleScale;
      titleNodes.push({ text: this.labels.title, y: top + s, size: s, weight: theme.titleWeight });
      top += s * 1.4;
    }
    if (this.labels.subtitle) {
      const s = m.base * theme.subtitleScale;
      titleNodes.push({ text: this.labels.subtitle, y: top + s, size: s, weight: "normal" });
      top += s * 1.6;
    } else if (this.labels.title) {
      top += m.base * 0.3;
    }

    // legend block
    const groups = theme.legendPosition === "none" ? [] : this.legends();
    const legend = this.measureLegends(groups, m);
    let right = width - mr;
    let bottom = height - mb;
    if (groups.length > 0 && theme.legendPosition === "right") right -= legend.width + m.base;
    if (groups.length > 0 && theme.legendPosition === "bottom") bottom -= legend.height + m.base * 0.5;
    if (right - ml <= 1 || bottom - top <= 1) {
      throw new Error(`Figure ${width}x${height} px is too small for its margins, titles and legend`);
    }

    const [minX, minY, maxX, maxY] = this.viewBounds();
    const frame: MultiPoint = { type: "MultiPoint", coordinates: [[minX, minY], [maxX, maxY]] };
    const projection = geoIdentity()
      .reflectY(true)
      .fitExtent(
        [
          [ml, top],
          [right, bottom],
        ],
        frame
      );
    const topLeft = projection([minX, maxY]);
    const bottomRight = projection([maxX, minY]);
    if (!topLeft || !bottomRight) throw new Error("Cannot place the map extent in the figure");
    const panel = { x: topLeft[0], y: topLeft[1], w: bottomRight[0] - topLeft[0], h: bottomRight[1] - topLeft[1] };
    const path = geoPath(projection);

    for (const node of titleNodes) {
      const x = theme.titleAlign === "middle" ? width / 2 : panel.x;
      out.push(
        `<text${attrs({
          x,
          y: node.y,
          "font-family": theme.fontFamily,
          "font-size": node.size,
          "font-weight": node.weight,
          "text-anchor": theme.titleAlign,
          fill: theme.textColor,
        })}>${escapeHtml(node.text)}</text>`
      );
    }

    out.push(
      `<defs><clipPath id="panel-clip"><rect${attrs({ x: panel.x, y: panel.y, width: panel.w, height: panel.h })}/></clipPath></defs>`,
      `<rect${attrs({ x: panel.x, y: panel.y, width: panel.w, height: panel.h, fill: theme.panelBackground })}/>`
    );

    if (theme.graticule) {
      const d = path(this.graticule([minX, minY, maxX, maxY]));
      if (d) {
        out.push(
          `<g class="graticule" clip-path="url(#panel-clip)"><path${attrs({
            d,
            fill: "none",
            stroke: theme.graticule,
            "stroke-width": 0.5 * m.pt,
          })}/></g>`
        );
      }
    }

    for (const layer of this.stack.list()) {
      out.push(`<g class="layer"${attrs({ "data-layer": layer.name })} clip-path="url(#panel-clip)">`);
      for (const feature of layer.collection.features) {
        if (!feature.geometry) continue;
        const style = resolveFeatureStyle(feature.properties, layer.style);
        out.push(...this.renderGeometry(feature.geometry, style, projection, path, m));
      }
      out.push("</g>");
    }

    if (theme.panelBorder) {
      out.push(
        `<rect${attrs({
          x: panel.x,
          y: panel.y,
          width: panel.w,
          height: panel.h,
          fill: "none",
          stroke: theme.panelBorder,
          "stroke-width": 0.5 * m.pt,
        })}/>`
      );
    }

    if (groups.length > 0) {
      const x =
        theme.legendPosition === "right" ? right + m.base : Math.max(ml, width / 2 - legend.width / 2);
      const y =
        theme.legendPosition === "right"
          ? panel.y + Math.max(0, (panel.h - legend.height) / 2)
          : bottom + m.base * 0.5;
      out.push(this.renderLegends(groups, x, y, m));
    }

    out.push("</svg>");
    return out.join("\n");
  }

  /** Write the figure: PNG by default, SVG when the path ends in `.svg`. Returns the path written. */
  async save(path: string, figure: FigureSize = DEFAULT_FIGURE): Promise<string> {
    const px: PixelSize = figurePixels(figure);
    const svg = this.toSVG(px);
    await mkdir(dirname(path), { recursive: true });
    if (extname(path).toLowerCase() === ".svg") {
      await writeFile(path, svg, "utf8");
    } else {
      await writePng(svg, path, px.dpi);
    }
    return path;
  }

  private graticule(view: BBox): MultiLineString {
    const inverse = getLenientConverter(this.crs, WGS84);
    const corners = [
      inverse([view[0], view[1]]),
      inverse([view[0], view[3]]),
      inverse([view[2], view[1]]),
      inverse([view[2], view[3]]),
    ];
    let extent: [[number, number], [number, number]] = [
      [-180, -90],
      [180, 90],
    ];
    let step = 30;
    const lonLat = corners.filter((c): c is Position => c !== null);
    if (lonLat.length === 4) {
      const lons = lonLat.map((c) => c[0]);
      const lats = lonLat.map((c) => c[1]);
      const span = Math.max(Math.max(...lons) - Math.min(...lons), Math.max(...lats) - Math.min(...lats));
      if (span < 90) {
        step = niceStep(span / 5);
        extent = [
          [Math.max(-180, Math.min(...lons) - step), Math.max(-90, Math.min(...lats) - step)],
          [Math.min(180, Math.max(...lons) + step), Math.min(90, Math.max(...lats) + step)],
        ];
      }
    }

    const convert = getLenientConverter(WGS84, this.crs);
    const lines: Position[][] = [];
    const graticule = geoGraticule().extent(extent).step([step, step]).precision(Math.min(2.5, step / 4));
    for (const line of graticule.lines()) {
      let current: Position[] = [];
      for (const position of line.coordinates) {
        const projected = convert(position);
        if (projected) {
          current.push(projected);
        } else if (current.length > 0) {
          lines.push(current);
          current = [];
        }
      }
      if (current.length > 1) lines.push(current);
    }
    return { type: "MultiLineString", coordinates: lines.filter((l) => l.length > 1) };
  }

  private renderGeometry(
    geometry: Geometry,
    style: ResolvedStyle,
    projection: GeoIdentityTransform,
    path: GeoPath,
    m: Metrics
  ): string[] {
    switch (geometry.type) {
      case "Point":
      case "MultiPoint": {
        const positions = geometry.type === "Point" ? [geometry.coordinates] : geometry.coordinates;
        const fill = style.fill ?? style.stroke ?? POINT_DEFAULTS.color;
        const stroke = style.fill !== undefined && style.stroke !== undefined ? style.stroke : "none";
        return positions.flatMap((p) => {
          const xy = projection([p[0], p[1]]);
          if (!xy) return [];
          return [
            `<circle${attrs({
              cx: xy[0],
              cy: xy[1],
              r: (style.radius ?? POINT_DEFAULTS.radius) * m.pt,
              fill,
              stroke,
              "stroke-width": stroke === "none" ? undefined : (style.strokeWidth ?? 0.5) * m.pt,
              "fill-opacity": style.fillOpacity,
              opacity: style.opacity,
            })}/>`,
          ];
        });
      }
      case "LineString":
      case "MultiLineString": {
        const d = path(geometry);
        if (!d) return [];
        return [
          `<path${attrs({
            d,
            fill: "none",
            stroke: style.stroke ?? LINE_DEFAULTS.stroke,
            "stroke-width": (style.strokeWidth ?? LINE_DEFAULTS.strokeWidth) * m.pt,
            "stroke-linejoin": "round",
            opacity: style.opacity,
          })}/>`,
        ];
      }
      case "Polygon":
      case "MultiPolygon": {
        const d = path(geometry);
        if (!d) return [];
        return [
          `<path${attrs({
            d,
            fill: style.fill ?? POLYGON_DEFAULTS.fill,
            "fill-opacity": style.fillOpacity,
            "fill-rule": "evenodd",
            stroke: style.stroke ?? POLYGON_DEFAULTS.stroke,
            "stroke-width": (style.strokeWidth ?? POLYGON_DEFAULTS.strokeWidth) * m.pt,
            opacity: style.opacity,
          })}/>`,
        ];
      }
      case "GeometryCollection":
        return geometry.geometries.flatMap((g) => this.renderGeometry(g, style, projection, path, m));
    }
  }

  private measureLegends(groups: LegendGroup[], m: Metrics): { width: number; height: number } {
    if (groups.length === 0) return { width: 0, height: 0 };
    const sizes = groups.map((g) => this.measureGroup(g, m));
    return {
      width: Math.max(...sizes.map((s) => s.width)),
      height: sizes.reduce((sum, s) => sum + s.height, 0) + (sizes.length - 1) * m.base * 0.6,
    };
  }

  private measureGroup(group: LegendGroup, m: Metrics): { width: number; height: number } {
    const key = m.base * 1.2;
    const label = m.base * 0.9;
    const gap = m.base * 0.4;
    const titleWidth = group.title ? textWidth(group.title, m.base) : 0;
    if (this.currentTheme.legendDirection === "horizontal") {
      const keysWidth = group.keys.reduce((sum, k) => sum + key + gap + textWidth(k.label, label) + gap * 2, 0);
      return { width: titleWidth + (group.title ? gap * 2 : 0) + keysWidth, height: Math.max(key, m.base) };
    }
    const labelsWidth = Math.max(...group.keys.map((k) => textWidth(k.label, label)));
    return {
      width: Math.max(titleWidth, key + gap + labelsWidth),
      height: (group.title ? m.base * 1.4 : 0) + group.keys.length * (key + gap / 2),
    };
  }

  private renderLegends(groups: LegendGroup[], x: number, y: number, m: Metrics): string {
    const theme = this.currentTheme;
    const key = m.base * 1.2;
    const labelSize = m.base * 0.9;
    const gap = m.base * 0.4;
    const out: string[] = ['<g class="legend">'];
    const text = (content: string, tx: number, ty: number, size: number, italic = false): string =>
      `<text${attrs({
        x: tx,
        y: ty,
        "font-family": theme.fontFamily,
        "font-size": size,
        "font-style": italic ? "italic" : undefined,
        "dominant-baseline": "central",
        fill: theme.textColor,
      })}>${escapeHtml(content)}</text>`;

    let cursorY = y;
    for (const group of groups) {
      const groupTop = cursorY;
      const italic = theme.legendTitleStyle === "italic";
      if (theme.legendDirection === "horizontal") {
        let cursorX = x;
        const mid = groupTop + key / 2;
        if (group.title) {
          out.push(text(group.title, cursorX, mid, m.base, italic));
          cursorX += textWidth(group.title, m.base) + gap * 2;
        }
        for (const k of group.keys) {
          out.push(this.renderKey(k, group.aesthetic, cursorX, groupTop, key, m));
          cursorX += key + gap;
          out.push(text(k.label, cursorX, mid, labelSize));
          cursorX += textWidth(k.label, labelSize) + gap * 2;
        }
      } else {
        let keysTop = groupTop;
        if (group.title) {
          out.push(text(group.title, x, groupTop + m.base * 0.6, m.base, italic));
          keysTop += m.base * 1.4;
        }
        group.keys.forEach((k, i) => {
          const top = keysTop + i * (key + gap / 2);
          out.push(this.renderKey(k, group.aesthetic, x, top, key, m));
          out.push(text(k.label, x + key + gap, top + key / 2, labelSize));
        });
      }
      cursorY = groupTop + this.measureGroup(group, m).height + m.base * 0.6;
    }
    out.push("</g>");
    return out.join("\n");
  }

  private renderKey(k: LegendKey, aesthetic: "fill" | "colour", x: number, y: number, size: number, m: Metrics): string {
    switch (k.symbol) {
      case "point":
        return `<circle${attrs({ cx: x + size / 2, cy: y + size / 2, r: size * 0.3, fill: k.color })}/>`;
      case "line":
        return `<line${attrs({
          x1: x,
          y1: y + size / 2,
          x2: x + size,
          y2: y + size / 2,
          stroke: k.color,
          "stroke-width": 1.5 * m.pt,
        })}/>`;
      case "square":
        return aesthetic === "fill"
          ? `<rect${attrs({ x, y, width: size, height: size, fill: k.color })}/>`
          : `<rect${attrs({ x, y, width: size, height: size, fill: "none", stroke: k.color, "stroke-width": m.pt })}/>`;
    }
  }
}

function niceStep(raw: number): number {
  const steps = [0.01, 0.02, 0.05, 0.1, 0.2, 0.5, 1, 2, 5, 10, 15, 30];
  return steps.find((s) => s >= raw) ?? 30;
}
