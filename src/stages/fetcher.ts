/**
 * Fetch stage – streams a remote artifact to a local path.
 *
 * The body is written to `<destination>.part` and renamed on success, so an
 * interrupted download never looks like a cache hit on the next run.
 */
import { existsSync } from "node:fs";
import { mkdir, open, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";

import { errorMessage, TransferError } from "../core/exceptions.js";
import { createLogger, type Logger } from "../core/logger.js";

export const PROGRESS_INTERVAL_BYTES = 10 * 1024 * 1024;

export type FetchFn = (url: string) => Promise<Response>;

export interface FetcherOptions {
  fetchFn?: FetchFn;
  progressIntervalBytes?: number;
  logger?: Logger;
}

export type FetchOutcome = "downloaded" | "cached";

export class Fetcher {
  private fetchFn: FetchFn;
  private progressInterval: number;
  private log: Logger;

  constructor(opts: FetcherOptions = {}) {
    this.fetchFn = opts.fetchFn ?? ((url) => fetch(url));
    this.progressInterval = opts.progressIntervalBytes ?? PROGRESS_INTERVAL_BYTES;
    this.log = opts.logger ?? createLogger("fetcher");
  }

  async fetch(url: string, destination: string, force = false): Promise<FetchOutcome> {
    if (!force && existsSync(destination)) {
      this.log.info(`Skipping download (file exists): ${destination}`);
      return "cached";
    }

    this.log.info(`Downloading ${url} to ${destination}`);
    await mkdir(dirname(destination), { recursive: true });
    const partPath = `${destination}.part`;

    try {
      const bytes = await this.download(url, partPath);
      await rename(partPath, destination);
      this.log.info(`Download complete: ${destination} (${formatMiB(bytes)})`);
      return "downloaded";
    } catch (err) {
      await rm(partPath, { force: true });
      if (err instanceof TransferError) throw err;
      throw new TransferError(`${url}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async download(url: string, partPath: string): Promise<number> {
    const response = await this.fetchFn(url);
    if (!response.ok) {
      throw new TransferError(`${url}: HTTP ${response.status} ${response.statusText}`.trimEnd());
    }
    if (!response.body) {
      throw new TransferError(`${url}: empty response body`);
    }

    const total = Number(response.headers.get("content-length") ?? 0);
    const body = response.body;
    const file = await open(partPath, "w").catch(async (err: unknown) => {
      await body.cancel();
      throw err;
    });
    const reader = body.getReader();
    let written = 0;
    let nextReport = this.progressInterval;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        try {
          await file.write(value);
        } catch (err) {
          await reader.cancel();
          throw err;
        }
        written += value.byteLength;

        if (written >= nextReport) {
          const pct = total > 0 ? ((written / total) * 100).toFixed(1) : "?";
          this.log.info(`Progress: ${pct}% (${formatMiB(written)})`);
          while (nextReport <= written) nextReport += this.progressInterval;
        }
      }
    } finally {
      await file.close();
    }

    return written;
  }
}

function formatMiB(bytes: number): string {
  return `${Math.floor(bytes / 1024 / 1024)} MB`;
}
