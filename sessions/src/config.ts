import { resolve } from "path";
import { fileURLToPath } from "url";
import type { FigureSize } from "geo-workshop-engine";
import type { Fetcher } from "geo-workshop-ingestion";

const DEFAULT_DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));
const DEFAULT_OUTPUT_DIR = fileURLToPath(new URL("../output/", import.meta.url));

export type RemoteSourceKind = "featureServer" | "geojsonFeed";

export interface RemoteSource {
  sourceId: string;
  kind: RemoteSourceKind;
  url: string;
  where?: string;
  notes?: string;
}

export const remoteSources = {
  thamesEstuary: {
    sourceId: "thames_estuary",
    kind: "featureServer",
    url: "https://services6.arcgis.com/cFcfnHqSdtEfYu8A/arcgis/rest/services/thames_estuary_new/FeatureServer/0",
    where: "1=1",
    notes: "Thames estuary outline",
  },
  biodiversityHotspots: {
    sourceId: "biodiversity_hotspots",
    kind: "featureServer",
    url: "https://services.arcgis.com/bL1WyMoaiBW4etad/ArcGIS/rest/services/Biodiversity_Hotspots_2016/FeatureServer/0",
    where: "1=1",
    notes: "Biodiversity hotspots 2016; `Type` is hotspot area or outer limit",
  },
  activeFaults: {
    sourceId: "active_faults",
    kind: "featureServer",
    url: "https://services.arcgis.com/jIL9msH9OI208GCb/ArcGIS/rest/services/Active_Faults/FeatureServer/0",
    where: "1=1",
    notes: "Global active fault lines",
  },
  earthquakes: {
    sourceId: "earthquakes_2_5_day",
    kind: "geojsonFeed",
    url: "https://earthquake.usgs.gov/earthquakes/feed/v1.0/summary/2.5_day.geojson",
    notes: "USGS M2.5+ earthquakes, past day",
  },
} satisfies Record<string, RemoteSource>;

export interface SessionConfig {
  dataDir: string;
  outputDir: string;
  quiet: boolean;
}

export interface SessionOptions extends Partial<SessionConfig> {
  fetcher?: Fetcher;
  /** Overrides the size of every static figure a session saves. */
  figure?: FigureSize;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  return {
    dataDir: resolve(env.GEO_WORKSHOP_DATA_DIR ?? DEFAULT_DATA_DIR),
    outputDir: resolve(env.GEO_WORKSHOP_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    quiet: env.GEO_WORKSHOP_QUIET === "1",
  };
}

/** Options given to a session win over the environment. */
export function resolveSessionOptions(options: SessionOptions = {}): SessionConfig {
  const config = loadConfig();
  return {
    dataDir: resolve(options.dataDir ?? config.dataDir),
    outputDir: resolve(options.outputDir ?? config.outputDir),
    quiet: options.quiet ?? config.quiet,
  };
}
