import { collectionBounds, crsLabel, fieldNames, geometryTypes } from "geo-workshop-engine";
import type { AttributeValue, SpatialCollection } from "geo-workshop-engine";

function formatValue(value: AttributeValue): string {
  if (value === null) return "NA";
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

function formatNumber(value: number): string {
  return Number(value.toPrecision(8)).toString();
}

/** Text summary of a layer: size, geometry types, CRS, bounds and a glimpse of each field. */
export function describeCollection(collection: SpatialCollection, sample = 5): string {
  const lines = [
    `Layer: ${collection.name ?? "(unnamed)"} (${collection.features.length} features)`,
    `Geometry: ${geometryTypes(collection).join(", ") || "none"}`,
    `CRS: ${crsLabel(collection.crs)}`,
  ];
  const bounds = collectionBounds(collection);
  if (bounds) {
    const [xmin, ymin, xmax, ymax] = bounds.map(formatNumber);
    lines.push(`Bounds: xmin ${xmin} ymin ${ymin} xmax ${xmax} ymax ${ymax}`);
  }
  const fields = fieldNames(collection);
  lines.push(`Fields: ${fields.length}`);
  for (const field of fields) {
    const values = collection.features.map((f) => f.properties[field] ?? null);
    const first = values.find((v) => v !== null);
    const type = first === undefined ? "null" : typeof first;
    lines.push(`  $ ${field} <${type}> ${values.slice(0, sample).map(formatValue).join(", ")}`);
  }
  return lines.join("\n");
}
