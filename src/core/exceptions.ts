/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Only ConfigError is fatal for a run; the stage errors are turned into
 * per-table failures by the orchestrator.
 */

export class IngestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IngestError";
  }
}

export class ConfigError extends IngestError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Configuration error: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class TransferError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Transfer failed: ${message}`, options);
    this.name = "TransferError";
  }
}

export class FormatError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Format error: ${message}`, options);
    this.name = "FormatError";
  }
}

export class LoadError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Load failed: ${message}`, options);
    this.name = "LoadError";
  }
}

/** Raised by a warehouse backend when the dataset was created by someone else first. */
export class DatasetConflictError extends IngestError {
  datasetId: string;

  constructor(datasetId: string) {
    super(`Dataset already exists: ${datasetId}`);
    this.name = "DatasetConflictError";
    this.datasetId = datasetId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
