import xxhash from "xxhash-wasm";
import type { DatasetLocation } from "../types";
import { joinKey, normalizePrefix } from "../utils/stringFormatting";

let hasher: ReturnType<typeof xxhash> | undefined;

/**
 * Builds a location from the bucket and dataset path given on the command line.
 * A "gs://" scheme on the bucket is accepted and dropped.
 */
export function createDatasetLocation(bucket: string, datasetPath: string): DatasetLocation {
  const name = bucket.trim().replace(/^gs:\/\//, "").replace(/\/+$/, "");
  if (name.length === 0 || name.includes("/")) {
    throw new Error(`Invalid bucket name: ${bucket}`);
  }
  return { bucket: name, prefix: normalizePrefix(datasetPath) };
}

export function datasetKey(location: DatasetLocation, ...segments: string[]): string {
  return joinKey(location.prefix, ...segments);
}

/**
 * Cache directory name for a dataset: xxh64 (seed 0) of "<bucket>/<prefix>"
 * as 16 lower case hex characters.
 */
export async function cacheKeyFor(location: DatasetLocation): Promise<string> {
  hasher ??= xxhash();
  const { h64ToString } = await hasher;
  return h64ToString(`${location.bucket}/${location.prefix}`);
}
