/**
 * imdb-bronze-ingest – loads the IMDb dataset files into a warehouse bronze
 * layer: fetch → transform (Parquet) → publish (blob store) → load.
 */
import { rm } from "node:fs/promises";

import { describeTables } from "./catalogue.js";
import { buildStorage, buildWarehouse, type IngestConfig } from "./config.js";
import {
  IngestionPipeline,
  StageFailure,
  type FetchStage,
  type LoadStage,
  type PublishStage,
  type TransformStage,
} from "./core/etl.js";
import { errorMessage } from "./core/exceptions.js";
import { createLogger, type Logger } from "./core/logger.js";
import {
  ExitStatus,
  type ProcessOptions,
  type QueryResult,
  type RunOptions,
  type RunResult,
  type TableDescriptor,
  type TableOutcome,
} from "./core/types.js";
import type { StorageBackend } from "./storage/backend.js";
import { Fetcher } from "./stages/fetcher.js";
import { Loader } from "./stages/loader.js";
import { Publisher } from "./stages/publisher.js";
import { Transformer } from "./stages/transformer.js";
import type { WarehouseBackend } from "./warehouse/backend.js";

export { TABLE_CATALOGUE, describeTable, describeTables, toTableId } from "./catalogue.js";
export { loadConfig, parseConfig, type IngestConfig } from "./config.js";
export * from "./core/exceptions.js";
export * from "./core/types.js";

const RULE = "=".repeat(70);

/** 0 when nothing failed, 2 when nothing succeeded, 1 otherwise. */
export function exitStatus(outcomes: readonly TableOutcome[]): ExitStatus {
  const failed = outcomes.filter((o) => !o.success).length;
  if (failed === 0) return ExitStatus.Success;
  return failed < outcomes.length ? ExitStatus.PartialFailure : ExitStatus.TotalFailure;
}

export interface IngestorOptions {
  config: IngestConfig;
  storage: StorageBackend;
  warehouse: WarehouseBackend;
  /** Stage overrides; defaults are built from the config and backends. */
  stages?: Partial<{
    fetcher: FetchStage;
    transformer: TransformStage;
    publisher: PublishStage;
    loader: LoadStage;
  }>;
  logger?: Logger;
}

export class Ingestor {
  private config: IngestConfig;
  private warehouse: WarehouseBackend;
  private pipeline: IngestionPipeline;
  private log: Logger;

  constructor(opts: IngestorOptions) {
    this.config = opts.config;
    this.warehouse = opts.warehouse;
    this.log = opts.logger ?? createLogger("ingest");
    const stages = opts.stages ?? {};

    this.pipeline = new IngestionPipeline({
      fetcher: stages.fetcher ?? new Fetcher({ logger: this.log.child("fetch") }),
      transformer:
        stages.transformer ??
        new Transformer({ codec: opts.config.codec, logger: this.log.child("transform") }),
      publisher: stages.publisher ?? new Publisher(opts.storage, this.log.child("publish")),
      loader:
        stages.loader ??
        new Loader(opts.warehouse, {
          location: opts.config.region,
          logger: this.log.child("load"),
        }),
      datasetId: opts.config.bronzeDataset,
      writeMode: opts.config.writeMode,
      logger: this.log.child("pipeline"),
    });
  }

  /** Construct with the storage and warehouse backends the config names. */
  static fromConfig(config: IngestConfig, logger?: Logger): Ingestor {
    return new Ingestor({
      config,
      storage: buildStorage(config),
      warehouse: buildWarehouse(config),
      logger,
    });
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Descriptors for `tables`, or for the configured catalogue. */
  describe(tables?: readonly string[]): TableDescriptor[] {
    const names = tables && tables.length > 0 ? tables : this.config.tables;
    return describeTables(names, this.config);
  }

  /** Drive one table through fetch → transform → publish → load. */
  async processTable(table: TableDescriptor, opts: ProcessOptions = {}): Promise<TableOutcome> {
    const force = opts.force ?? false;
    this.log.info(RULE);
    this.log.info(`Processing table: ${table.name}`);
    this.log.info(RULE);

    try {
      await this.pipeline.fetch(table, force);
      await this.pipeline.transform(table, force);
      const uri = await this.pipeline.publish(table);

      if (opts.skipLoad) {
        this.log.info("Skipping BigQuery load (--skip-bigquery flag)");
      } else {
        await this.pipeline.load(table, uri);
      }
    } catch (err) {
      if (!(err instanceof StageFailure)) throw err;
      const cause = err.cause instanceof Error && err.cause.cause !== undefined
        ? ` (cause: ${errorMessage(err.cause.cause)})`
        : "";
      this.log.error(`Failed to process ${table.name} at ${err.stage}: ${err.message}${cause}`);
      return { table: table.name, success: false, stage: err.stage, error: err.message };
    }

    this.log.info(`Successfully processed: ${table.name}`);
    return { table: table.name, success: true };
  }

  /** Process tables in order and fold the outcomes into one run result. */
  async runPipeline(tables?: readonly TableDescriptor[], opts: RunOptions = {}): Promise<RunResult> {
    const descriptors = tables ?? this.describe();

    this.log.info(RULE);
    this.log.info("IMDb Data Ingestion Pipeline");
    this.log.info(RULE);
    this.log.info(`Project: ${this.config.projectId}`);
    this.log.info(`Bucket: ${this.config.bucketName}`);
    this.log.info(`Dataset: ${this.config.bronzeDataset}`);
    this.log.info(`Tables to process: ${descriptors.length}`);
    this.log.info(`Force download: ${opts.force ?? false}`);
    this.log.info(RULE);

    const results = new Map<string, boolean>();
    const outcomes: TableOutcome[] = [];
    let aborted = false;

    for (const [i, table] of descriptors.entries()) {
      this.log.info(`[${i + 1}/${descriptors.length}] Starting: ${table.name}`);
      const outcome = await this.processTable(table, opts);
      results.set(table.name, outcome.success);
      outcomes.push(outcome);

      if (!outcome.success && opts.failFast) {
        this.log.error("Stopping due to failure (--fail-fast enabled)");
        aborted = i < descriptors.length - 1;
        break;
      }
    }

    const status = exitStatus(outcomes);
    this.logSummary(outcomes);

    if (opts.cleanup) {
      if (status === ExitStatus.Success) {
        await this.cleanup(descriptors, { columnar: opts.cleanupColumnar ?? false });
      } else {
        this.log.warn("Skipping cleanup: local files are kept for a retry after failures");
      }
    }

    if (status === ExitStatus.Success) this.log.info("All tables processed successfully!");
    else if (status === ExitStatus.PartialFailure) this.log.warn("Pipeline completed with some failures");
    else this.log.error("Pipeline failed completely");

    return { results, outcomes, status, aborted };
  }

  /** Delete the local raw files (and optionally Parquet files) of `tables`. */
  async cleanup(
    tables: readonly TableDescriptor[],
    opts: { columnar?: boolean } = {},
  ): Promise<string[]> {
    this.log.info("Cleaning up local files");
    const targets = tables.flatMap((t) => (opts.columnar ? [t.rawPath, t.columnarPath] : [t.rawPath]));
    const deleted: string[] = [];

    for (const path of targets) {
      try {
        await rm(path, { force: true });
        deleted.push(path);
        this.log.debug(`Deleted: ${path}`);
      } catch (err) {
        this.log.error(`Could not delete ${path}: ${errorMessage(err)}`);
      }
    }
    return deleted;
  }

  /** Run a read-only query on the warehouse; failures are reported, not thrown. */
  async executeQuery(sql: string): Promise<QueryResult> {
    try {
      const rows = await this.warehouse.query(sql);
      return { success: true, rows, error: null, rowCount: rows.length };
    } catch (err) {
      return { success: false, rows: null, error: errorMessage(err), rowCount: 0 };
    }
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private logSummary(outcomes: readonly TableOutcome[]): void {
    const successful = outcomes.filter((o) => o.success);
    const failed = outcomes.filter((o) => !o.success);

    this.log.info(RULE);
    this.log.info("Pipeline Summary");
    this.log.info(RULE);
    this.log.info(`Successful: ${successful.length}/${outcomes.length}`);
    for (const o of successful) this.log.info(`  - ${o.table}`);
    if (failed.length > 0) {
      this.log.error(`Failed: ${failed.length}/${outcomes.length}`);
      for (const o of failed) this.log.error(`  - ${o.table} (${o.stage}): ${o.error}`);
    }
  }
}
