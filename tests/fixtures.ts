/**
 * Shared test fixtures: TSV builders, fake HTTP, in-memory warehouse, configs.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { gzipSync, strToU8 } from "fflate";

import { parseConfig, type IngestConfig } from "../src/config.js";
import { DatasetConflictError } from "../src/core/exceptions.js";
import type { Logger } from "../src/core/logger.js";
import type { FetchFn } from "../src/stages/fetcher.js";
import { DiskStorage } from "../src/storage/disk.js";
import type {
  DatasetInfo,
  LoadJobRequest,
  LoadJobResult,
  WarehouseBackend,
} from "../src/warehouse/backend.js";
import { Ingestor, type IngestorOptions } from "../src/index.js";

// ---------------------------------------------------------------------------
// Mini TSV fixtures
// ---------------------------------------------------------------------------

export const RATINGS_TSV = [
  "tconst\taverageRating\tnumVotes",
  "tt0000001\t5.7\t2104",
  "tt0000002\t5.6\t283",
  "tt0000003\t\\N\t2035",
].join("\n") + "\n";

export function buildTsv(header: string[], rows: string[][]): string {
  return [header, ...rows].map((r) => r.join("\t")).join("\n") + "\n";
}

export function gzipText(text: string): Uint8Array {
  return gzipSync(strToU8(text));
}

export function writeFile(path: string, data: string | Uint8Array): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, data);
  return path;
}

// ---------------------------------------------------------------------------
// Temp dir helper
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "imdb-ingest-test-"));
}

// ---------------------------------------------------------------------------
// Fake HTTP
// ---------------------------------------------------------------------------

/** Serves gzipped bodies by URL; unknown URLs get a 404. Records every request. */
export function fakeFetch(bodies: Record<string, string | Uint8Array>): FetchFn & { calls: string[] } {
  const calls: string[] = [];
  const fn = async (url: string): Promise<Response> => {
    calls.push(url);
    const body = bodies[url];
    if (body === undefined) return new Response("not found", { status: 404, statusText: "Not Found" });
    const bytes = typeof body === "string" ? gzipText(body) : body;
    return new Response(bytes, { status: 200, headers: { "content-length": String(bytes.length) } });
  };
  return Object.assign(fn, { calls });
}

// ---------------------------------------------------------------------------
// In-memory warehouse
// ---------------------------------------------------------------------------

export class MemoryWarehouse implements WarehouseBackend {
  readonly projectId: string;
  datasets = new Map<string, DatasetInfo>();
  tables = new Map<string, number>();
  loads: LoadJobRequest[] = [];
  queries: string[] = [];
  /** Simulates another run creating the dataset between lookup and create. */
  raceOnCreate = false;
  failLoadFor = new Set<string>();
  rowsPerLoad = 3;
  queryRows: Record<string, unknown>[] = [];
  queryError: Error | null = null;

  constructor(projectId = "test-project") {
    this.projectId = projectId;
  }

  async getDataset(datasetId: string): Promise<DatasetInfo | null> {
    return this.datasets.get(datasetId) ?? null;
  }

  async createDataset(datasetId: string, location: string): Promise<void> {
    if (this.raceOnCreate && !this.datasets.has(datasetId)) {
      this.datasets.set(datasetId, { id: datasetId, location });
    }
    if (this.datasets.has(datasetId)) throw new DatasetConflictError(datasetId);
    this.datasets.set(datasetId, { id: datasetId, location });
  }

  async runLoadJob(request: LoadJobRequest): Promise<LoadJobResult> {
    this.loads.push(request);
    if (this.failLoadFor.has(request.tableId)) {
      throw new Error(`Schema mismatch loading ${request.tableId}`);
    }
    const key = `${request.datasetId}.${request.tableId}`;
    const existing = this.tables.get(key) ?? 0;
    if (request.writeMode === "fail-if-exists" && existing > 0) {
      throw new Error(`Already Exists: Table ${key}`);
    }
    const rows = request.writeMode === "append" ? existing + this.rowsPerLoad : this.rowsPerLoad;
    this.tables.set(key, rows);
    return {
      jobId: `job-${this.loads.length}`,
      tableRef: `${this.projectId}.${key}`,
      rows,
    };
  }

  async query(sql: string): Promise<Record<string, unknown>[]> {
    this.queries.push(sql);
    if (this.queryError) throw this.queryError;
    return this.queryRows;
  }
}

// ---------------------------------------------------------------------------
// Config + Ingestor
// ---------------------------------------------------------------------------

export const BASE_URL = "https://datasets.example.test/";

export function makeConfig(dir: string, overrides: Record<string, unknown> = {}): IngestConfig {
  return parseConfig({
    projectId: "test-project",
    bucketName: "test-bucket",
    bronzeDataset: "bronze",
    region: "EU",
    credentialsPath: join(dir, "credentials.json"),
    baseUrl: BASE_URL,
    rawDataFolder: join(dir, "raw"),
    parquetDataFolder: join(dir, "parquet"),
    storage: { provider: "disk", basePath: join(dir, "blob") },
    ...overrides,
  });
}

export function makeIngestor(
  dir: string,
  opts: Pick<IngestorOptions, "stages" | "logger"> & { config?: IngestConfig } = {},
): { ingestor: Ingestor; warehouse: MemoryWarehouse; storage: DiskStorage; config: IngestConfig } {
  const config = opts.config ?? makeConfig(dir);
  const storage = new DiskStorage(join(dir, "blob"));
  const warehouse = new MemoryWarehouse();
  const ingestor = new Ingestor({
    config,
    storage,
    warehouse,
    stages: opts.stages,
    logger: opts.logger,
  });
  return { ingestor, warehouse, storage, config };
}

// ---------------------------------------------------------------------------
// Logger that records instead of printing
// ---------------------------------------------------------------------------

export interface RecordedLine {
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

export function recordingLogger(lines: RecordedLine[] = []): Logger & { lines: RecordedLine[] } {
  const logger: Logger & { lines: RecordedLine[] } = {
    lines,
    debug: (message) => lines.push({ level: "debug", message }),
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
    child: () => recordingLogger(lines),
  };
  return logger;
}
