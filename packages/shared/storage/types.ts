/**
 * Storage abstraction over a base directory. Keys are slash-separated paths
 * relative to that directory (e.g., "20250501_103000/metadata.json").
 */

export interface StorageReader {
  /** Read file contents, returns null if not found */
  read(key: string): Promise<Uint8Array | null>;

  /** Check if file exists */
  exists(key: string): Promise<boolean>;

  /** List files under prefix recursively, yields keys */
  list(prefix: string): AsyncIterable<string>;
}

export interface StorageWriter {
  /** Write file contents (overwrites if exists) */
  write(key: string, content: Uint8Array | string): Promise<void>;
}

export interface Storage extends StorageReader, StorageWriter {
  /** Absolute path of the storage root */
  readonly basePath: string;

  /** Resolve a key to its path on disk */
  resolve(key: string): string;
}
