/**
 * Configuration validation and backend factory.
 *
 * The configuration is resolved once at process start (see cli.ts) and passed
 * by reference to the Ingestor and its stages. Nothing here runs at import.
 */
import { existsSync } from "node:fs";
import { z } from "zod";

import { TABLE_CATALOGUE } from "./catalogue.js";
import { ConfigError } from "./core/exceptions.js";
import type { WarehouseBackend } from "./warehouse/backend.js";
import { BigQueryWarehouse } from "./warehouse/bigquery.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { GcsStorage } from "./storage/gcs.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const required = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .refine((v) => !v.startsWith("your-"), `${label} still holds a template placeholder`);

const StorageConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("disk"),
    basePath: z.string().default("data/blob"),
  }),
  z.object({
    provider: z.literal("gcs"),
    endpoint: z.string().url().default("https://storage.googleapis.com"),
    region: z.string().default("auto"),
    accessKeyId: required("GCS_HMAC_ACCESS_KEY_ID"),
    secretAccessKey: required("GCS_HMAC_SECRET"),
  }),
]);

export const ConfigSchema = z.object({
  projectId: required("GCP_PROJECT_ID"),
  bucketName: required("GCS_BUCKET_NAME"),
  bronzeDataset: z.string().min(1).default("bronze"),
  region: z.string().min(1).default("EU"),
  credentialsPath: z.string().default("./credentials.json"),
  baseUrl: z
    .string()
    .url()
    .default("https://datasets.imdbws.com/")
    .transform((u) => (u.endsWith("/") ? u : `${u}/`)),
  rawDataFolder: z.string().default("data/raw"),
  parquetDataFolder: z.string().default("data/parquet"),
  codec: z.enum(["snappy", "uncompressed"]).default("snappy"),
  writeMode: z.enum(["overwrite", "append", "fail-if-exists"]).default("overwrite"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  logFile: z.string().min(1).default("logs/ingestion.log"),
  tables: z.array(z.string()).default([...TABLE_CATALOGUE]),
  storage: StorageConfigSchema,
});

export type IngestConfig = Readonly<z.infer<typeof ConfigSchema>>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// ---------------------------------------------------------------------------
// Environment → config
// ---------------------------------------------------------------------------

/** Parse an already-shaped config object, throwing ConfigError with every issue. */
export function parseConfig(raw: unknown): IngestConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return Object.freeze(parsed.data);
}

function lowercase(value: string | undefined): string | undefined {
  return value === undefined ? undefined : value.toLowerCase();
}

/** Map environment variables onto the config schema. Empty values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const get = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value === "" ? undefined : value;
  };

  const provider = lowercase(get("STORAGE_PROVIDER")) ?? "gcs";
  const storage =
    provider === "gcs"
      ? {
          provider,
          endpoint: get("GCS_ENDPOINT"),
          accessKeyId: get("GCS_HMAC_ACCESS_KEY_ID"),
          secretAccessKey: get("GCS_HMAC_SECRET"),
        }
      : { provider, basePath: get("STORAGE_PATH") };

  return parseConfig({
    projectId: get("GCP_PROJECT_ID"),
    bucketName: get("GCS_BUCKET_NAME"),
    bronzeDataset: get("BQ_BRONZE_DATASET"),
    region: get("GCP_REGION"),
    credentialsPath: get("GOOGLE_APPLICATION_CREDENTIALS"),
    baseUrl: get("IMDB_BASE_URL"),
    rawDataFolder: get("RAW_DATA_FOLDER"),
    parquetDataFolder: get("PARQUET_DATA_FOLDER"),
    codec: lowercase(get("PARQUET_CODEC")),
    writeMode: lowercase(get("BQ_WRITE_MODE")),
    logLevel: lowercase(get("LOG_LEVEL")),
    logFile: get("LOG_FILE"),
    storage,
  });
}

/** The service account key is only needed when something talks to BigQuery. */
export function assertCredentials(config: IngestConfig): void {
  if (!existsSync(config.credentialsPath)) {
    throw new ConfigError([`Credentials file not found: ${config.credentialsPath}`]);
  }
}

// ---------------------------------------------------------------------------
// Backend factories
// ---------------------------------------------------------------------------

export function buildStorage(config: IngestConfig): StorageBackend {
  const storage = config.storage;
  switch (storage.provider) {
    case "disk":
      return new DiskStorage(storage.basePath);
    case "gcs":
      return new GcsStorage({
        bucket: config.bucketName,
        endpoint: storage.endpoint,
        region: storage.region,
        accessKeyId: storage.accessKeyId,
        secretAccessKey: storage.secretAccessKey,
      });
  }
}

export function buildWarehouse(config: IngestConfig): WarehouseBackend {
  return new BigQueryWarehouse({
    projectId: config.projectId,
    keyFilename: config.credentialsPath,
  });
}

/** One-line-per-setting view used by --dry-run. */
export function describeConfig(config: IngestConfig): string[] {
  return [
    `Project: ${config.projectId}`,
    `Bucket: ${config.bucketName}`,
    `Dataset: ${config.bronzeDataset}`,
    `Region: ${config.region}`,
    `Storage: ${config.storage.provider}`,
    `Raw folder: ${config.rawDataFolder}`,
    `Parquet folder: ${config.parquetDataFolder}`,
    `Write mode: ${config.writeMode}`,
    `Log file: ${config.logFile}`,
  ];
}
