/**
 * Table catalogue – the IMDb dataset files and the addressing derived from
 * each logical table name.
 */
import { join } from "node:path";

import { ConfigError } from "./core/exceptions.js";
import type { TableDescriptor } from "./core/types.js";

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

export const TABLE_CATALOGUE = [
  "name.basics", // people: actors, directors, writers
  "title.akas", // localized titles
  "title.basics",
  "title.crew",
  "title.episode",
  "title.principals",
  "title.ratings",
] as const;

export type CatalogueTable = (typeof TABLE_CATALOGUE)[number];

export function isCatalogueTable(name: string): name is CatalogueTable {
  return TABLE_CATALOGUE.some((t) => t === name);
}

const TABLE_NAME = /^[a-z]+(\.[a-z]+)*$/;

// ---------------------------------------------------------------------------
// Descriptor derivation
// ---------------------------------------------------------------------------

export interface DescriptorSettings {
  baseUrl: string;
  rawDataFolder: string;
  parquetDataFolder: string;
}

/** Warehouse identifiers cannot contain dots. */
export function toTableId(name: string): string {
  return name.replaceAll(".", "_");
}

export function describeTable(name: string, settings: DescriptorSettings): TableDescriptor {
  if (!TABLE_NAME.test(name)) {
    throw new ConfigError([`Invalid table name: ${JSON.stringify(name)}`]);
  }
  const filename = `${name}.tsv.gz`;
  const tableId = toTableId(name);
  const baseUrl = settings.baseUrl.endsWith("/") ? settings.baseUrl : `${settings.baseUrl}/`;

  return Object.freeze({
    name,
    filename,
    sourceUrl: `${baseUrl}${filename}`,
    rawPath: join(settings.rawDataFolder, filename),
    columnarPath: join(settings.parquetDataFolder, `${tableId}.parquet`),
    blobPath: `imdb/${tableId}/${tableId}.parquet`,
    tableId,
  });
}

/**
 * Build descriptors for a run. Only catalogue tables are accepted, and
 * duplicates are rejected so no two tables share a path.
 */
export function describeTables(names: readonly string[], settings: DescriptorSettings): TableDescriptor[] {
  const unknown = names.filter((name) => !isCatalogueTable(name));
  if (unknown.length > 0) {
    throw new ConfigError([
      `Unknown tables: ${unknown.join(", ")} (available: ${TABLE_CATALOGUE.join(", ")})`,
    ]);
  }
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const name of names) {
    if (seen.has(name)) duplicates.push(name);
    seen.add(name);
  }
  if (duplicates.length > 0) {
    throw new ConfigError([`Duplicate tables requested: ${duplicates.join(", ")}`]);
  }
  return names.map((name) => describeTable(name, settings));
}
