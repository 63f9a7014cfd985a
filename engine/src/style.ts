import { scaleLinear, scaleSequential } from "d3-scale";
import {
  interpolateBlues,
  interpolateRdYlBu,
  interpolateReds,
  interpolateSpectral,
  interpolateViridis,
} from "d3-scale-chromatic";
import type {
  AttributeValue,
  Attributes,
  CategoricalScale,
  Channel,
  LayerStyle,
  LegendEntry,
  NumericScale,
  ResolvedStyle,
  SpatialCollection,
} from "./types.js";

const PALETTES: Record<string, (t: number) => string> = {
  RdYlBu: interpolateRdYlBu,
  Viridis: interpolateViridis,
  Blues: interpolateBlues,
  Reds: interpolateReds,
  Spectral: interpolateSpectral,
};

/** Return a copy of the collection with `field` set to `value` on every feature. */
export function assignAttribute<C extends SpatialCollection>(collection: C, field: string, value: AttributeValue): C {
  return {
    ...collection,
    features: collection.features.map((f) => ({ ...f, properties: { ...f.properties, [field]: value } })),
  };
}

export interface CategoricalScaleOptions {
  fallback?: string;
}

/** Map category values to colours; legend entries keep the order of `mapping`. */
export function categoricalScale(
  mapping: Record<string, string>,
  options: CategoricalScaleOptions = {}
): CategoricalScale {
  const fallback = options.fallback ?? "#999999";
  const domain = Object.keys(mapping);
  const lookup = (category: AttributeValue): string => {
    if (category === null) return fallback;
    return mapping[String(category)] ?? fallback;
  };
  return Object.assign(lookup, {
    kind: "categorical" as const,
    domain,
    legend: (): LegendEntry[] => domain.map((label) => ({ label, color: mapping[label] })),
  });
}

export interface NumericScaleOptions {
  palette: string;
  domain: [number, number];
  reverse?: boolean;
  naColor?: string;
}

/** Continuous colour ramp; values outside the domain and missing values take `naColor`. */
export function numericScale(options: NumericScaleOptions): NumericScale {
  const interpolator = PALETTES[options.palette];
  if (!interpolator) throw new Error(`Unknown palette: ${options.palette}`);
  const [min, max] = options.domain;
  if (!(Number.isFinite(min) && Number.isFinite(max) && min < max)) {
    throw new Error(`Invalid scale domain: [${min}, ${max}]`);
  }
  const reverse = options.reverse ?? false;
  const naColor = options.naColor ?? "transparent";
  const domain: [number, number] = [min, max];
  const ramp = scaleSequential(interpolator).domain(reverse ? [max, min] : [min, max]);
  const lookup = (value: number | null): string => {
    if (value === null || Number.isNaN(value) || value < min || value > max) return naColor;
    return ramp(value);
  };
  return Object.assign(lookup, {
    kind: "numeric" as const,
    domain,
    palette: options.palette,
    reverse,
    ticks: (count = 5) => scaleLinear().domain([min, max]).ticks(count),
  });
}

function resolveColor(channel: Channel<string> | undefined, attributes: Attributes): string | undefined {
  if (channel === undefined) return undefined;
  if (typeof channel === "string") return channel;
  if (typeof channel === "function") return channel(attributes);
  const value = attributes[channel.field] ?? null;
  const scale = channel.scale;
  if (scale.kind === "categorical") return scale(value);
  return scale(typeof value === "number" ? value : null);
}

function resolveNumber(channel: Channel<number> | undefined, attributes: Attributes): number | undefined {
  if (channel === undefined) return undefined;
  if (typeof channel === "number") return channel;
  if (typeof channel === "function") return channel(attributes);
  return channel.scale(attributes[channel.field] ?? null);
}

/** Resolve every channel of a layer style for one feature's attributes. */
export function resolveFeatureStyle(attributes: Attributes, style: LayerStyle): ResolvedStyle {
  const resolved: ResolvedStyle = {};
  const fill = resolveColor(style.fill, attributes);
  const stroke = resolveColor(style.stroke, attributes);
  const strokeWidth = resolveNumber(style.strokeWidth, attributes);
  const radius = resolveNumber(style.radius, attributes);
  const opacity = resolveNumber(style.opacity, attributes);
  const fillOpacity = resolveNumber(style.fillOpacity, attributes);
  if (fill !== undefined) resolved.fill = fill;
  if (stroke !== undefined) resolved.stroke = stroke;
  if (strokeWidth !== undefined) resolved.strokeWidth = strokeWidth;
  if (radius !== undefined) resolved.radius = radius;
  if (opacity !== undefined) resolved.opacity = opacity;
  if (fillOpacity !== undefined) resolved.fillOpacity = fillOpacity;
  return resolved;
}

/** Merge layer styles; for every channel the last style that sets it wins. */
export function mergeStyles(...styles: LayerStyle[]): LayerStyle {
  const merged: LayerStyle = {};
  for (const style of styles) {
    if (style.fill !== undefined) merged.fill = style.fill;
    if (style.stroke !== undefined) merged.stroke = style.stroke;
    if (style.strokeWidth !== undefined) merged.strokeWidth = style.strokeWidth;
    if (style.radius !== undefined) merged.radius = style.radius;
    if (style.opacity !== undefined) merged.opacity = style.opacity;
    if (style.fillOpacity !== undefined) merged.fillOpacity = style.fillOpacity;
  }
  return merged;
}

/** Categorical scale bound to a channel, if any; used to build legends. */
export function boundScale(channel: Channel<string> | undefined): CategoricalScale | undefined {
  if (channel === undefined || typeof channel === "string" || typeof channel === "function") return undefined;
  return channel.scale.kind === "categorical" ? channel.scale : undefined;
}

export function escapeHtml(value: AttributeValue): string {
  return String(value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Milliseconds since the Unix epoch as `YYYY-MM-DD HH:MM:SS` (UTC). */
export function formatEpochMillis(value: AttributeValue): string {
  if (typeof value !== "number" || !Number.isFinite(value)) return "NA";
  return new Date(value).toISOString().replace("T", " ").slice(0, 19);
}

export type PopupLine = [label: string, field: string, format?: (value: AttributeValue) => string];

/** Popup builder: one `Label value` line per entry, joined with `<br>`. Values are HTML-escaped. */
export function popupTemplate(lines: PopupLine[]): (attributes: Attributes) => string {
  return (attributes) =>
    lines
      .map(([label, field, format]) => {
        const value = attributes[field] ?? null;
        return `${escapeHtml(label)} ${escapeHtml(format ? format(value) : value)}`;
      })
      .join("<br>");
}
