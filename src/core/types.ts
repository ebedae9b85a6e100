/**
 * Shared pipeline types.
 */

/** Immutable per-table addressing, derived once from the logical name. */
export interface TableDescriptor {
  readonly name: string;
  readonly filename: string;
  readonly sourceUrl: string;
  readonly rawPath: string;
  readonly columnarPath: string;
  readonly blobPath: string;
  readonly tableId: string;
}

export type Stage = "fetch" | "transform" | "publish" | "load";

export type WriteMode = "overwrite" | "append" | "fail-if-exists";

export type ParquetCodec = "snappy" | "uncompressed";

export interface ConversionReport {
  rows: number;
  columns: number;
  rawBytes: number;
  columnarBytes: number;
  /** 1 - columnarBytes / rawBytes */
  compressionRatio: number;
}

export interface LoadReport {
  jobId: string;
  tableRef: string;
  rows: number;
}

export interface TableOutcome {
  table: string;
  success: boolean;
  stage?: Stage;
  error?: string;
}

export enum ExitStatus {
  Success = 0,
  PartialFailure = 1,
  TotalFailure = 2,
}

/** Result returned from runPipeline(). */
export interface RunResult {
  results: Map<string, boolean>;
  outcomes: TableOutcome[];
  status: ExitStatus;
  aborted: boolean;
}

export interface ProcessOptions {
  force?: boolean;
  skipLoad?: boolean;
}

export interface RunOptions extends ProcessOptions {
  failFast?: boolean;
  cleanup?: boolean;
  /** Also delete Parquet files on cleanup. */
  cleanupColumnar?: boolean;
}

/** Shape returned by the warehouse query interface. */
export interface QueryResult {
  success: boolean;
  rows: Record<string, unknown>[] | null;
  error: string | null;
  rowCount: number;
}
