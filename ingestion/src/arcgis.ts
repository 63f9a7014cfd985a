import { URLSearchParams } from "url";
import { canonicalCrs, featureCollection } from "geo-workshop-engine";
import type { CrsId, Geometry, Position, SpatialCollection, SpatialFeature } from "geo-workshop-engine";
import { fetchOk, isRecord, reportLayer, toAttributes } from "./source.js";
import type { LoadOptions } from "./source.js";

export interface FeatureServerQuery extends LoadOptions {
  where?: string;
  outFields?: string;
  outSR?: number;
  pageSize?: number;
  name?: string;
}

interface QueryPage {
  features: unknown[];
  exceededTransferLimit: boolean;
  crs?: CrsId;
}

function numberPair(value: unknown): Position | null {
  if (!Array.isArray(value) || value.length < 2) return null;
  const [x, y] = value;
  return typeof x === "number" && typeof y === "number" ? [x, y] : null;
}

function pathList(value: unknown): Position[][] {
  if (!Array.isArray(value)) return [];
  return value
    .filter(Array.isArray)
    .map((path: unknown[]) => path.map(numberPair).filter((p): p is Position => p !== null))
    .filter((path) => path.length > 0);
}

/** Twice the signed area; negative for clockwise rings in a y-up CRS. */
function signedArea(ring: Position[]): number {
  let sum = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    sum += ring[j][0] * ring[i][1] - ring[i][0] * ring[j][1];
  }
  return sum;
}

function ringContains(ring: Position[], [x, y]: Position): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) inside = !inside;
  }
  return inside;
}

/**
 * Group Esri rings into polygons: clockwise rings are shells, the others are
 * holes of the shell that contains them. Output rings follow RFC 7946 winding.
 */
export function ringsToPolygons(rings: Position[][]): Position[][][] {
  const shells = rings.filter((r) => signedArea(r) < 0);
  if (shells.length === 0) return rings.map((r) => [r]);
  const polygons = shells.map((shell) => [[...shell].reverse()]);
  for (const hole of rings.filter((r) => signedArea(r) >= 0)) {
    const owner = shells.findIndex((shell) => ringContains(shell, hole[0]));
    polygons[owner >= 0 ? owner : polygons.length - 1].push([...hole].reverse());
  }
  return polygons;
}

export function esriToGeometry(value: unknown): Geometry | null {
  if (!isRecord(value)) return null;
  if (typeof value.x === "number" && typeof value.y === "number") {
    return Number.isFinite(value.x) && Number.isFinite(value.y) ? { type: "Point", coordinates: [value.x, value.y] } : null;
  }
  // empty point: services send x as null or "NaN"
  if ("x" in value) return null;
  if ("points" in value) {
    const points = pathList([value.points])[0] ?? [];
    return points.length > 0 ? { type: "MultiPoint", coordinates: points } : null;
  }
  if ("paths" in value) {
    const paths = pathList(value.paths);
    if (paths.length === 0) return null;
    return paths.length === 1 ? { type: "LineString", coordinates: paths[0] } : { type: "MultiLineString", coordinates: paths };
  }
  if ("rings" in value) {
    const polygons = ringsToPolygons(pathList(value.rings));
    if (polygons.length === 0) return null;
    return polygons.length === 1 ? { type: "Polygon", coordinates: polygons[0] } : { type: "MultiPolygon", coordinates: polygons };
  }
  throw new Error(`Unsupported Esri geometry with keys ${Object.keys(value).join(", ")}`);
}

function pageCrs(payload: Record<string, unknown>): CrsId | undefined {
  const sr = payload.spatialReference;
  if (!isRecord(sr)) return undefined;
  const wkid = typeof sr.latestWkid === "number" ? sr.latestWkid : sr.wkid;
  return typeof wkid === "number" ? canonicalCrs(`EPSG:${wkid}`) : undefined;
}

async function queryPage(url: string, options: FeatureServerQuery): Promise<QueryPage> {
  const response = await fetchOk(url, options.fetcher);
  const payload: unknown = await response.json();
  if (!isRecord(payload)) throw new Error(`ArcGIS query failed: unexpected response from ${url}`);
  if (isRecord(payload.error)) {
    const message = typeof payload.error.message === "string" ? payload.error.message : "Unknown ArcGIS error";
    throw new Error(`ArcGIS query failed: ${message}`);
  }
  const page: QueryPage = {
    features: Array.isArray(payload.features) ? payload.features : [],
    exceededTransferLimit: payload.exceededTransferLimit === true,
  };
  const crs = pageCrs(payload);
  if (crs) page.crs = crs;
  return page;
}

export function serviceName(layerUrl: string): string {
  const match = /\/services\/(.+?)\/(?:FeatureServer|MapServer)/i.exec(new URL(layerUrl).pathname);
  return match ? match[1].split("/").pop() ?? match[1] : "features";
}

/**
 * Query every feature of an ArcGIS FeatureServer layer, following
 * `exceededTransferLimit` pages.
 */
export async function queryFeatureServer(layerUrl: string, options: FeatureServerQuery = {}): Promise<SpatialCollection> {
  const base = layerUrl.replace(/\/+$/, "");
  const outSR = options.outSR ?? 4326;
  const pageSize = options.pageSize ?? 2000;
  const features: SpatialFeature[] = [];
  let crs: CrsId | undefined;
  let offset = 0;
  let hasMore = true;

  while (hasMore) {
    const params = new URLSearchParams();
    params.set("f", "json");
    params.set("where", options.where ?? "1=1");
    params.set("outFields", options.outFields ?? "*");
    params.set("outSR", String(outSR));
    params.set("returnGeometry", "true");
    params.set("resultOffset", String(offset));
    params.set("resultRecordCount", String(pageSize));

    const page = await queryPage(`${base}/query?${params.toString()}`, options);
    crs = crs ?? page.crs;
    for (const raw of page.features) {
      if (!isRecord(raw)) continue;
      features.push({ type: "Feature", geometry: esriToGeometry(raw.geometry), properties: toAttributes(raw.attributes) });
    }
    offset += page.features.length;
    hasMore = page.exceededTransferLimit && page.features.length > 0;
  }

  const collection = featureCollection(features, crs ?? `EPSG:${outSR}`, options.name ?? serviceName(base));
  reportLayer(collection, base, options.quiet);
  return collection;
}
