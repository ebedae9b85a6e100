/**
 * Ingestion pipeline core – stage interfaces and the per-table stage runner.
 */
import { existsSync } from "node:fs";

import {
  errorMessage,
  FormatError,
  IngestError,
  LoadError,
  TransferError,
} from "./exceptions.js";
import { createLogger, type Logger } from "./logger.js";
import type {
  ConversionReport,
  LoadReport,
  Stage,
  TableDescriptor,
  WriteMode,
} from "./types.js";

// ---------------------------------------------------------------------------
// Stage interfaces
// ---------------------------------------------------------------------------

/** Downloads one remote artifact to a local path. */
export interface FetchStage {
  fetch(url: string, destination: string, force: boolean): Promise<unknown>;
}

/** Converts a raw delimited file into a columnar file. */
export interface TransformStage {
  transform(rawPath: string, columnarPath: string): Promise<ConversionReport>;
}

/** Uploads a local file and returns its canonical URI. */
export interface PublishStage {
  publish(localPath: string, blobPath: string): Promise<string>;
}

/** Loads a published file into a warehouse table. */
export interface LoadStage {
  load(
    sourceUri: string,
    datasetId: string,
    tableId: string,
    writeMode: WriteMode,
  ): Promise<LoadReport>;
}

type StageErrorClass = new (message: string, options?: { cause?: unknown }) => IngestError;

const STAGE_ERRORS: Record<Stage, StageErrorClass> = {
  fetch: TransferError,
  transform: FormatError,
  publish: TransferError,
  load: LoadError,
};

/** Error raised out of the pipeline, tagged with the stage that failed. */
export class StageFailure extends Error {
  stage: Stage;
  table: string;

  constructor(table: string, stage: Stage, cause: IngestError) {
    super(cause.message, { cause });
    this.name = "StageFailure";
    this.stage = stage;
    this.table = table;
  }
}

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export interface IngestionPipelineOptions {
  fetcher: FetchStage;
  transformer: TransformStage;
  publisher: PublishStage;
  loader: LoadStage;
  datasetId: string;
  writeMode?: WriteMode;
  logger?: Logger;
}

export class IngestionPipeline {
  private fetcher: FetchStage;
  private transformer: TransformStage;
  private publisher: PublishStage;
  private loader: LoadStage;
  private datasetId: string;
  private writeMode: WriteMode;
  private log: Logger;

  constructor(opts: IngestionPipelineOptions) {
    this.fetcher = opts.fetcher;
    this.transformer = opts.transformer;
    this.publisher = opts.publisher;
    this.loader = opts.loader;
    this.datasetId = opts.datasetId;
    this.writeMode = opts.writeMode ?? "overwrite";
    this.log = opts.logger ?? createLogger("pipeline");
  }

  /** Run `fn`, converting anything it throws into the stage's error type. */
  private async guard<T>(table: TableDescriptor, stage: Stage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const ErrorClass = STAGE_ERRORS[stage];
      const cause =
        err instanceof ErrorClass ? err : new ErrorClass(errorMessage(err), { cause: err });
      throw new StageFailure(table.name, stage, cause);
    }
  }

  /** Step 1: download the raw file unless it is already cached. */
  async fetch(table: TableDescriptor, force: boolean): Promise<boolean> {
    if (!force && existsSync(table.rawPath)) {
      this.log.info(`Skipping download (file exists): ${table.rawPath}`);
      return false;
    }
    await this.guard(table, "fetch", () =>
      this.fetcher.fetch(table.sourceUrl, table.rawPath, force),
    );
    return true;
  }

  /** Step 2: convert to Parquet unless the columnar file is already cached. */
  async transform(table: TableDescriptor, force: boolean): Promise<ConversionReport | null> {
    if (!force && existsSync(table.columnarPath)) {
      this.log.info(`Skipping conversion (file exists): ${table.columnarPath}`);
      return null;
    }
    return this.guard(table, "transform", () =>
      this.transformer.transform(table.rawPath, table.columnarPath),
    );
  }

  /** Step 3: always re-publish. */
  async publish(table: TableDescriptor): Promise<string> {
    return this.guard(table, "publish", () =>
      this.publisher.publish(table.columnarPath, table.blobPath),
    );
  }

  /** Step 4: load into the warehouse. */
  async load(table: TableDescriptor, sourceUri: string): Promise<LoadReport> {
    return this.guard(table, "load", () =>
      this.loader.load(sourceUri, this.datasetId, table.tableId, this.writeMode),
    );
  }
}
