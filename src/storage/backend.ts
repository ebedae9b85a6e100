/**
 * Abstract blob storage backend interface.
 *
 * Keys are slash-separated object paths inside a single bucket/container.
 */
export interface StorageBackend {
  /** Upload a local file to `key`, replacing any existing object. */
  upload(localPath: string, key: string): Promise<void>;

  /** Canonical URI of `key`, as handed to the warehouse load job. */
  uri(key: string): string;
}
