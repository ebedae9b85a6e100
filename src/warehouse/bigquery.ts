/**
 * BigQuery warehouse backend using @google-cloud/bigquery.
 */
import { BigQuery } from "@google-cloud/bigquery";
import { z } from "zod";

import { DatasetConflictError } from "../core/exceptions.js";
import type { WriteMode } from "../core/types.js";
import type {
  DatasetInfo,
  LoadJobRequest,
  LoadJobResult,
  WarehouseBackend,
} from "./backend.js";

export const WRITE_DISPOSITION: Record<WriteMode, string> = {
  overwrite: "WRITE_TRUNCATE",
  append: "WRITE_APPEND",
  "fail-if-exists": "WRITE_EMPTY",
};

const DatasetMetadataSchema = z.object({
  location: z.string().optional(),
});

const TableMetadataSchema = z.object({
  numRows: z.coerce.number().int().nonnegative().default(0),
});

const RowsSchema = z.array(z.record(z.unknown()));

function isConflict(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 409;
}

export interface LoadJobConfiguration {
  sourceUris: string[];
  sourceFormat: "PARQUET";
  writeDisposition: string;
  destinationTable: { projectId: string; datasetId: string; tableId: string };
}

/** The client calls the warehouse makes; metadata comes back unparsed. */
export interface BigQueryClient {
  datasetExists(datasetId: string): Promise<boolean>;
  datasetMetadata(datasetId: string): Promise<unknown>;
  createDataset(datasetId: string, location: string): Promise<void>;
  /** Submit a load job and resolve with its id once it is DONE. */
  runLoadJob(load: LoadJobConfiguration): Promise<string | undefined>;
  tableMetadata(datasetId: string, tableId: string): Promise<unknown>;
  query(sql: string): Promise<unknown>;
}

export function bigQueryClient(client: BigQuery): BigQueryClient {
  return {
    async datasetExists(datasetId) {
      const [exists] = await client.dataset(datasetId).exists();
      return exists;
    },
    async datasetMetadata(datasetId) {
      const [metadata] = await client.dataset(datasetId).getMetadata();
      return metadata;
    },
    async createDataset(datasetId, location) {
      await client.createDataset(datasetId, { location });
    },
    async runLoadJob(load) {
      const [job] = await client.createJob({ configuration: { load } });
      // Rejects with the job's errorResult.
      await job.promise();
      return job.id;
    },
    async tableMetadata(datasetId, tableId) {
      const [metadata] = await client.dataset(datasetId).table(tableId).getMetadata();
      return metadata;
    },
    async query(sql) {
      const [rows] = await client.query({ query: sql });
      return rows;
    },
  };
}

export interface BigQueryWarehouseOptions {
  projectId: string;
  keyFilename?: string;
  client?: BigQueryClient;
}

export class BigQueryWarehouse implements WarehouseBackend {
  readonly projectId: string;
  private client: BigQueryClient;

  constructor(opts: BigQueryWarehouseOptions) {
    this.projectId = opts.projectId;
    this.client =
      opts.client ??
      bigQueryClient(new BigQuery({ projectId: opts.projectId, keyFilename: opts.keyFilename }));
  }

  async getDataset(datasetId: string): Promise<DatasetInfo | null> {
    if (!(await this.client.datasetExists(datasetId))) return null;
    const { location } = DatasetMetadataSchema.parse(await this.client.datasetMetadata(datasetId));
    return { id: datasetId, location: location ?? null };
  }

  async createDataset(datasetId: string, location: string): Promise<void> {
    try {
      await this.client.createDataset(datasetId, location);
    } catch (err) {
      if (isConflict(err)) throw new DatasetConflictError(datasetId);
      throw err;
    }
  }

  async runLoadJob(request: LoadJobRequest): Promise<LoadJobResult> {
    const tableRef = `${this.projectId}.${request.datasetId}.${request.tableId}`;
    const jobId = await this.client.runLoadJob({
      sourceUris: [request.sourceUri],
      sourceFormat: "PARQUET",
      writeDisposition: WRITE_DISPOSITION[request.writeMode],
      destinationTable: {
        projectId: this.projectId,
        datasetId: request.datasetId,
        tableId: request.tableId,
      },
    });

    const metadata = await this.client.tableMetadata(request.datasetId, request.tableId);
    const { numRows } = TableMetadataSchema.parse(metadata);

    return { jobId: jobId ?? "unknown", tableRef, rows: numRows };
  }

  async query(sql: string): Promise<Record<string, unknown>[]> {
    return RowsSchema.parse(await this.client.query(sql));
  }
}
