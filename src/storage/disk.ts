/**
 * Local filesystem storage backend.
 *
 * Stands in for the blob store on local runs and in tests; URIs are file:// URLs.
 */
import { copyFile, mkdir, rename } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import { pathToFileURL } from "node:url";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(key: string): string {
    const full = resolve(join(this.basePath, key));
    if (!full.startsWith(this.basePath + sep)) {
      throw new Error(`Key escapes storage root: ${key}`);
    }
    return full;
  }

  async upload(localPath: string, key: string): Promise<void> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    // Copy beside the target first so a reader never sees a half-written object.
    const partPath = `${fullPath}.part`;
    await copyFile(localPath, partPath);
    await rename(partPath, fullPath);
  }

  uri(key: string): string {
    return pathToFileURL(this.resolve(key)).href;
  }
}
