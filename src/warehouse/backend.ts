/**
 * Abstract warehouse backend interface.
 *
 * The ingestion core only needs dataset provisioning and load jobs; `query`
 * serves the read-only warehouse query interface.
 */
import type { WriteMode } from "../core/types.js";

export interface DatasetInfo {
  id: string;
  /** Null when the warehouse does not report a location. */
  location: string | null;
}

export interface LoadJobRequest {
  sourceUri: string;
  datasetId: string;
  tableId: string;
  writeMode: WriteMode;
}

export interface LoadJobResult {
  jobId: string;
  tableRef: string;
  rows: number;
}

export interface WarehouseBackend {
  readonly projectId: string;

  /** Look up a dataset, or null if it does not exist. */
  getDataset(datasetId: string): Promise<DatasetInfo | null>;

  /**
   * Create a dataset. Throws DatasetConflictError when it already exists
   * (e.g. another run created it between the lookup and this call).
   */
  createDataset(datasetId: string, location: string): Promise<void>;

  /** Submit a load job and wait until it reaches a terminal state. */
  runLoadJob(request: LoadJobRequest): Promise<LoadJobResult>;

  /** Run a SQL query and return all rows. */
  query(sql: string): Promise<Record<string, unknown>[]>;
}
