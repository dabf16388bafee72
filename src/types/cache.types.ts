/**
 * Local cache type definitions
 */

import type { SupportedDatasetVersion } from "./dataset.types";

// Written last by a metadata fetch; its presence marks the cache as complete
export interface CacheManifest {
  codebaseVersion: SupportedDatasetVersion;
  dataChunks: string[];
  videoKeys: string[];
  fetchedAt: string;
}

export interface FetchMetadataOptions {
  refresh?: boolean;
}
