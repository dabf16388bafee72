/**
 * Object storage type definitions
 */

export interface StoredObject {
  key: string;
  size?: number;
}

// Where a dataset lives in object storage
export interface DatasetLocation {
  bucket: string;
  prefix: string;
}

/**
 * Minimal read-only view of a bucket. Keys are "/"-separated object names.
 */
export interface ObjectStore {
  readonly bucket: string;
  listObjects(prefix: string): Promise<StoredObject[]>;
  listPrefixes(prefix: string): Promise<string[]>;
  download(key: string, destination: string): Promise<void>;
  describe(key: string): string;
}
