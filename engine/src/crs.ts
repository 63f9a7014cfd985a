import proj4 from "proj4";
import type { CrsDefinition, CrsId } from "./types.js";

export const WGS84: CrsId = "EPSG:4326";
export const WEB_MERCATOR: CrsId = "EPSG:3857";

const MERCATOR_MAX_LAT = 85.0511287798066;

// Codes used by the sessions. Anything else must be a PROJ string or WKT.
const CRS_REGISTRY: CrsDefinition[] = [
  {
    code: "EPSG:4326",
    proj4: "+proj=longlat +datum=WGS84 +no_defs",
    label: "WGS 84",
    geographic: true,
  },
  {
    code: "EPSG:3857",
    proj4: "+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +no_defs",
    label: "WGS 84 / Pseudo-Mercator",
    geographic: false,
    latitudeDomain: [-MERCATOR_MAX_LAT, MERCATOR_MAX_LAT],
  },
  {
    code: "EPSG:8857",
    proj4: "+proj=eqearth +lon_0=0 +x_0=0 +y_0=0 +datum=WGS84 +units=m +no_defs",
    label: "WGS 84 / Equal Earth Greenwich",
    geographic: false,
  },
  {
    code: "EPSG:3035",
    proj4: "+proj=laea +lat_0=52 +lon_0=10 +x_0=4321000 +y_0=3210000 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs",
    label: "ETRS89-extended / LAEA Europe",
    geographic: false,
  },
  {
    code: "EPSG:3031",
    proj4: "+proj=stere +lat_0=-90 +lat_ts=-71 +lon_0=0 +k=1 +x_0=0 +y_0=0 +datum=WGS84 +units=m +no_defs",
    label: "WGS 84 / Antarctic Polar Stereographic",
    geographic: false,
  },
  {
    code: "EPSG:27700",
    proj4:
      "+proj=tmerc +lat_0=49 +lon_0=-2 +k=0.9996012717 +x_0=400000 +y_0=-100000 +ellps=airy " +
      "+towgs84=446.448,-125.157,542.06,0.15,0.247,0.842,-20.489 +units=m +no_defs",
    label: "OSGB36 / British National Grid",
    geographic: false,
  },
  {
    code: "ESRI:54030",
    proj4: "+proj=robin +lon_0=0 +x_0=0 +y_0=0 +datum=WGS84 +units=m +no_defs",
    label: "World Robinson",
    geographic: false,
  },
  {
    code: "ESRI:54009",
    proj4: "+proj=moll +lon_0=0 +x_0=0 +y_0=0 +datum=WGS84 +units=m +no_defs",
    label: "World Mollweide",
    geographic: false,
  },
];

const ALIASES: Record<string, CrsId> = {
  "WGS84": "EPSG:4326",
  "CRS84": "EPSG:4326",
  "OGC:CRS84": "EPSG:4326",
  "EPSG:900913": "EPSG:3857",
  "EPSG:102100": "EPSG:3857",
  "EPSG:102113": "EPSG:3857",
  "ESRI:102100": "EPSG:3857",
  "ESRI:102113": "EPSG:3857",
};

const registryByCode = new Map<CrsId, CrsDefinition>(CRS_REGISTRY.map((def) => [def.code, def]));

CRS_REGISTRY.forEach((def) => proj4.defs(def.code, def.proj4));

function isProjString(id: string): boolean {
  return id.trimStart().startsWith("+proj=");
}

function isWkt(id: string): boolean {
  return /^\s*(PROJCS|GEOGCS|PROJCRS|GEOGCRS|GEODCRS)\[/i.test(id);
}

/** Canonical form of a CRS identifier: upper-cased authority codes with aliases collapsed. */
export function canonicalCrs(id: CrsId): CrsId {
  const trimmed = id.trim();
  const urn = /^urn:ogc:def:crs:(EPSG|OGC):[\d.]*:(\w+)$/i.exec(trimmed);
  if (urn) {
    const authority = urn[1].toUpperCase();
    const code = urn[2].toUpperCase();
    return canonicalCrs(authority === "OGC" ? `OGC:${code}` : `EPSG:${code}`);
  }
  const authorityCode = /^(EPSG|ESRI|OGC):(\w+)$/i.exec(trimmed);
  const normalized = authorityCode ? `${authorityCode[1].toUpperCase()}:${authorityCode[2].toUpperCase()}` : trimmed;
  return ALIASES[normalized.toUpperCase()] ?? normalized;
}

export function getCrsDefinition(id: CrsId): CrsDefinition | undefined {
  return registryByCode.get(canonicalCrs(id));
}

/** Resolve a CRS identifier to something proj4 accepts. */
export function resolveCrs(id: CrsId): string {
  const canonical = canonicalCrs(id);
  const registered = registryByCode.get(canonical);
  if (registered) return registered.code;
  if (isProjString(canonical) || isWkt(canonical)) return canonical;
  throw new Error(`Unsupported CRS: ${id}`);
}

export function sameCrs(a: CrsId, b: CrsId): boolean {
  return canonicalCrs(a) === canonicalCrs(b);
}

export function isGeographic(id: CrsId): boolean {
  const def = getCrsDefinition(id);
  if (def) return def.geographic;
  const canonical = canonicalCrs(id);
  if (isProjString(canonical)) return /\+proj=(longlat|latlong|lonlat|latlon)\b/.test(canonical);
  return /^\s*(GEOGCS|GEOGCRS)\[/i.test(canonical);
}

export function crsLabel(id: CrsId): string {
  const def = getCrsDefinition(id);
  if (def) return `${def.code} (${def.label})`;
  const canonical = canonicalCrs(id);
  return isWkt(canonical) ? `${canonical.slice(0, 40)}...` : canonical;
}

/**
 * Map a shapefile .prj (ESRI WKT) to an EPSG code when it is one the registry knows;
 * otherwise the WKT itself is the CRS identifier.
 */
export function crsFromWkt(wkt: string): CrsId {
  const text = wkt.trim();
  const authority = /AUTHORITY\["EPSG",\s*"?(\d+)"?\]\]\s*$/i.exec(text);
  if (authority) {
    const code = canonicalCrs(`EPSG:${authority[1]}`);
    if (registryByCode.has(code)) return code;
  }
  if (/^PROJCS\[/i.test(text)) {
    if (/British_National_Grid|OSGB_1936|OSGB36/i.test(text)) return "EPSG:27700";
    if (/Web_Mercator|Pseudo[-_]Mercator/i.test(text)) return WEB_MERCATOR;
    return text;
  }
  if (/^GEOGCS\[/i.test(text) && /WGS[_ ]?(19)?84/i.test(text)) return WGS84;
  return text;
}

/** Read the legacy GeoJSON `crs` member name; RFC 7946 data without one is WGS 84. */
export function crsFromGeoJsonName(name: string | undefined): CrsId {
  if (!name) return WGS84;
  return canonicalCrs(name);
}

export function crsToGeoJsonName(id: CrsId): string {
  const canonical = canonicalCrs(id);
  if (canonical === WGS84) return "urn:ogc:def:crs:OGC:1.3:CRS84";
  const epsg = /^EPSG:(\d+)$/.exec(canonical);
  if (epsg) return `urn:ogc:def:crs:EPSG::${epsg[1]}`;
  return canonical;
}
