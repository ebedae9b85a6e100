/**
 * Load stage – provisions the target dataset and runs a load job into it.
 */
import {
  DatasetConflictError,
  errorMessage,
  LoadError,
} from "../core/exceptions.js";
import { createLogger, type Logger } from "../core/logger.js";
import type { LoadReport, WriteMode } from "../core/types.js";
import type { DatasetInfo, WarehouseBackend } from "../warehouse/backend.js";

export interface LoaderOptions {
  /** Location new datasets are created in; existing ones must match it. */
  location: string;
  logger?: Logger;
}

function sameLocation(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class Loader {
  private warehouse: WarehouseBackend;
  private location: string;
  private log: Logger;

  constructor(warehouse: WarehouseBackend, opts: LoaderOptions) {
    this.warehouse = warehouse;
    this.location = opts.location;
    this.log = opts.logger ?? createLogger("loader");
  }

  /**
   * Check-then-create. Losing a creation race to another run counts as
   * success; an existing dataset in another location is a LoadError.
   */
  async ensureDataset(datasetId: string): Promise<void> {
    const ref = `${this.warehouse.projectId}.${datasetId}`;
    try {
      let existing = await this.warehouse.getDataset(datasetId);
      if (existing === null) {
        this.log.info(`Creating dataset ${ref} in ${this.location}`);
        try {
          await this.warehouse.createDataset(datasetId, this.location);
          this.log.info(`Dataset created: ${ref}`);
          return;
        } catch (err) {
          if (!(err instanceof DatasetConflictError)) throw err;
          this.log.info(`Dataset ${ref} was created concurrently`);
          existing = await this.warehouse.getDataset(datasetId);
        }
      } else {
        this.log.debug(`Dataset ${ref} already exists`);
      }
      if (existing !== null) this.checkLocation(ref, existing);
    } catch (err) {
      if (err instanceof LoadError) throw err;
      throw new LoadError(`dataset ${ref}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private checkLocation(ref: string, dataset: DatasetInfo): void {
    if (dataset.location !== null && !sameLocation(dataset.location, this.location)) {
      throw new LoadError(
        `dataset ${ref} is in ${dataset.location}, expected ${this.location}`,
      );
    }
  }

  async load(
    sourceUri: string,
    datasetId: string,
    tableId: string,
    writeMode: WriteMode = "overwrite",
  ): Promise<LoadReport> {
    this.log.info(`Loading ${sourceUri} into ${datasetId}.${tableId} (${writeMode})`);
    await this.ensureDataset(datasetId);

    try {
      const result = await this.warehouse.runLoadJob({
        sourceUri,
        datasetId,
        tableId,
        writeMode,
      });
      this.log.info(
        `Load complete: ${result.rows.toLocaleString("en-US")} rows in ${result.tableRef} (job ${result.jobId})`,
      );
      return result;
    } catch (err) {
      if (err instanceof LoadError) throw err;
      throw new LoadError(`${datasetId}.${tableId}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
