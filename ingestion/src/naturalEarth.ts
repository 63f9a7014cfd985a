import countries110m from "world-atlas/countries-110m.json" with { type: "json" };
import countries50m from "world-atlas/countries-50m.json" with { type: "json" };
import { feature } from "topojson-client";
import type { Topology } from "topojson-specification";
import { featureCollection, WGS84 } from "geo-workshop-engine";
import type { SpatialCollection, SpatialFeature } from "geo-workshop-engine";
import { isRecord, reportLayer, toAttributes } from "./source.js";

export type NaturalEarthScale = "110m" | "50m";

export interface WorldOptions {
  scale?: NaturalEarthScale;
  quiet?: boolean;
}

const topologies: Record<NaturalEarthScale, unknown> = { "110m": countries110m, "50m": countries50m };
const cache = new Map<NaturalEarthScale, SpatialCollection>();

function isTopology(value: unknown): value is Topology {
  return isRecord(value) && value.type === "Topology" && isRecord(value.objects) && Array.isArray(value.arcs);
}

/** Natural Earth admin-0 countries from world-atlas, in EPSG:4326 with a `name` attribute. */
export function loadWorldCountries(options: WorldOptions = {}): SpatialCollection {
  const scale = options.scale ?? "110m";
  const source = `world-atlas/countries-${scale}.json`;
  let world = cache.get(scale);
  if (!world) {
    const topology = topologies[scale];
    if (!isTopology(topology)) throw new Error(`${source} is not a TopoJSON topology`);
    const countries = topology.objects.countries;
    if (countries?.type !== "GeometryCollection") throw new Error(`${source} has no countries collection`);
    const features: SpatialFeature[] = feature(topology, countries).features.map((f) => {
      const out: SpatialFeature = { type: "Feature", geometry: f.geometry, properties: toAttributes(f.properties) };
      if (f.id !== undefined) out.id = f.id;
      return out;
    });
    world = featureCollection(features, WGS84, `countries-${scale}`);
    cache.set(scale, world);
  }
  reportLayer(world, source, options.quiet);
  return world;
}

/** Keep (or with `exclude`, drop) features whose `name` attribute is listed. */
export function filterByName(collection: SpatialCollection, names: string[], exclude = false): SpatialCollection {
  const wanted = new Set(names.map((n) => n.toLowerCase()));
  return {
    ...collection,
    features: collection.features.filter((f) => {
      const name = f.properties.name;
      const listed = typeof name === "string" && wanted.has(name.toLowerCase());
      return exclude ? !listed : listed;
    }),
  };
}
