import { describe, expect, it } from "vitest";
import {
  canonicalCrs,
  crsFromGeoJsonName,
  crsFromWkt,
  crsLabel,
  crsToGeoJsonName,
  isGeographic,
  resolveCrs,
  sameCrs,
} from "../src/crs.js";

const BNG_PRJ =
  'PROJCS["British_National_Grid",GEOGCS["GCS_OSGB_1936",DATUM["D_OSGB_1936",SPHEROID["Airy_1830",6377563.396,299.3249646]],' +
  'PRIMEM["Greenwich",0.0],UNIT["Degree",0.0174532925199433]],PROJECTION["Transverse_Mercator"],PARAMETER["False_Easting",400000.0],' +
  'PARAMETER["False_Northing",-100000.0],PARAMETER["Central_Meridian",-2.0],PARAMETER["Scale_Factor",0.9996012717],' +
  'PARAMETER["Latitude_Of_Origin",49.0],UNIT["Meter",1.0]]';

const WGS84_PRJ =
  'GEOGCS["GCS_WGS_1984",DATUM["D_WGS_1984",SPHEROID["WGS_1984",6378137.0,298.257223563]],PRIMEM["Greenwich",0.0],UNIT["Degree",0.0174532925199433]]';

describe("CRS identifiers", () => {
  it("collapses aliases and URN forms to a canonical code", () => {
    expect(canonicalCrs("epsg:4326")).toBe("EPSG:4326");
    expect(canonicalCrs("CRS84")).toBe("EPSG:4326");
    expect(canonicalCrs("urn:ogc:def:crs:OGC:1.3:CRS84")).toBe("EPSG:4326");
    expect(canonicalCrs("urn:ogc:def:crs:EPSG::27700")).toBe("EPSG:27700");
    expect(canonicalCrs("ESRI:102100")).toBe("EPSG:3857");
    expect(canonicalCrs("+proj=robin")).toBe("+proj=robin");
  });

  it("compares CRSs after canonicalisation", () => {
    expect(sameCrs("EPSG:102113", "EPSG:3857")).toBe(true);
    expect(sameCrs("EPSG:4326", "EPSG:3857")).toBe(false);
  });

  it("rejects unknown authority codes", () => {
    expect(() => resolveCrs("EPSG:999999")).toThrow("Unsupported CRS: EPSG:999999");
    expect(resolveCrs("+proj=robin +datum=WGS84")).toBe("+proj=robin +datum=WGS84");
  });

  it("knows which systems are geographic", () => {
    expect(isGeographic("EPSG:4326")).toBe(true);
    expect(isGeographic("EPSG:3035")).toBe(false);
    expect(isGeographic("+proj=longlat +datum=WGS84")).toBe(true);
    expect(isGeographic(WGS84_PRJ)).toBe(true);
  });

  it("labels registered systems with their name", () => {
    expect(crsLabel("EPSG:3031")).toBe("EPSG:3031 (WGS 84 / Antarctic Polar Stereographic)");
  });
});

describe("shapefile .prj and GeoJSON crs members", () => {
  it("maps ESRI WKT to EPSG codes where it can", () => {
    expect(crsFromWkt(BNG_PRJ)).toBe("EPSG:27700");
    expect(crsFromWkt(WGS84_PRJ)).toBe("EPSG:4326");
    expect(crsFromWkt('PROJCS["Custom",GEOGCS["X"],AUTHORITY["EPSG","3035"]]')).toBe("EPSG:3035");
  });

  it("keeps unknown WKT as the identifier", () => {
    const wkt = 'PROJCS["Lambert_Somewhere",GEOGCS["GCS_Other"]]';
    expect(crsFromWkt(wkt)).toBe(wkt);
  });

  it("round-trips GeoJSON crs names", () => {
    expect(crsFromGeoJsonName(undefined)).toBe("EPSG:4326");
    expect(crsToGeoJsonName("EPSG:4326")).toBe("urn:ogc:def:crs:OGC:1.3:CRS84");
    expect(crsToGeoJsonName("EPSG:27700")).toBe("urn:ogc:def:crs:EPSG::27700");
    expect(crsFromGeoJsonName(crsToGeoJsonName("EPSG:3857"))).toBe("EPSG:3857");
  });
});
