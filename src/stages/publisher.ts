/**
 * Publish stage – uploads a local artifact to the blob store.
 *
 * Always re-uploads: publishing is idempotent by overwrite, not by skip.
 */
import { existsSync } from "node:fs";

import { errorMessage, TransferError } from "../core/exceptions.js";
import { createLogger, type Logger } from "../core/logger.js";
import type { StorageBackend } from "../storage/backend.js";

export class Publisher {
  private storage: StorageBackend;
  private log: Logger;

  constructor(storage: StorageBackend, logger?: Logger) {
    this.storage = storage;
    this.log = logger ?? createLogger("publisher");
  }

  async publish(localPath: string, blobPath: string): Promise<string> {
    const uri = this.storage.uri(blobPath);
    this.log.info(`Uploading ${localPath} to ${uri}`);

    if (!existsSync(localPath)) {
      throw new TransferError(`local file not found: ${localPath}`);
    }
    try {
      await this.storage.upload(localPath, blobPath);
    } catch (err) {
      throw new TransferError(`${uri}: ${errorMessage(err)}`, { cause: err });
    }

    this.log.info(`Upload complete: ${uri}`);
    return uri;
  }
}
