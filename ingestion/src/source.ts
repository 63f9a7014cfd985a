import { readFile } from "fs/promises";
import { basename, extname } from "path";
import { crsLabel, fieldNames } from "geo-workshop-engine";
import type { Attributes, AttributeValue, SpatialCollection } from "geo-workshop-engine";

export type Fetcher = typeof fetch;

export interface LoadOptions {
  fetcher?: Fetcher;
  quiet?: boolean;
}

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/** Layer name from a path or URL: the file name without its extension. */
export function layerName(source: string): string {
  const path = isUrl(source) ? new URL(source).pathname : source;
  return basename(path, extname(path));
}

export async function fetchOk(url: string, fetcher: Fetcher = fetch): Promise<Response> {
  const response = await fetcher(url);
  if (!response.ok) throw new Error(`Failed to fetch ${url}: ${response.status}`);
  return response;
}

export async function readJsonSource(source: string, fetcher?: Fetcher): Promise<unknown> {
  if (isUrl(source)) {
    const response = await fetchOk(source, fetcher);
    return response.json();
  }
  const text = await readFile(source, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toAttributeValue(value: unknown): AttributeValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (typeof value !== "object") return String(value);
  return JSON.stringify(value);
}

/** Flatten an arbitrary property bag into scalar attributes; nested values become JSON text. */
export function toAttributes(value: unknown): Attributes {
  if (!isRecord(value)) return {};
  const attributes: Attributes = {};
  for (const [key, v] of Object.entries(value)) attributes[key] = toAttributeValue(v);
  return attributes;
}

/** One status line per loaded layer, in the manner of a GIS driver's read summary. */
export function reportLayer(collection: SpatialCollection, source: string, quiet = false): void {
  if (quiet) return;
  console.info(
    `Reading layer \`${collection.name ?? layerName(source)}' from ${source}: ` +
      `${collection.features.length} features, ${fieldNames(collection).length} fields, CRS ${crsLabel(collection.crs)}`
  );
}
