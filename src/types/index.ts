/**
 * Central export for all type definitions
 */

// Dataset types
export type {
  DatasetVersion,
  SupportedDatasetVersion,
  FeatureDType,
  VideoFeature,
  TensorFeature,
  Feature,
  DatasetMetadata,
} from "./dataset.types";

// Episode types
export type {
  EpisodeRecord,
  FetchedEpisode,
  EpisodeSummary,
} from "./episode.types";

// Storage types
export type { StoredObject, DatasetLocation, ObjectStore } from "./storage.types";

// Cache types
export type { CacheManifest, FetchMetadataOptions } from "./cache.types";
