/**
 * Centralized constants for lerobot-preview
 */

// Formatting constants for episode and file indexing
export const PADDING = {
  EPISODE_CHUNK: 3,
  EPISODE_INDEX: 6,
} as const;

// Dataset layout inside the bucket
export const DATASET_DIRS = {
  META: "meta",
  DATA: "data",
  VIDEOS: "videos",
} as const;

// File names inside the local meta/ cache directory
export const META_FILES = {
  INFO: "info.json",
  EPISODES: "episodes.jsonl",
  ALL_EPISODES: "rerun_all_episodes.jsonl",
  MANIFEST: "preview_manifest.json",
} as const;

export const SUPPORTED_VERSIONS = ["v2.0", "v2.1"] as const;

// Local cache configuration
export const CACHE = {
  DEFAULT_DIR_NAME: "rerun",
  PARTIAL_SUFFIX: ".partial",
} as const;

// Rerun Viewer configuration
export const VIEWER = {
  DEFAULT_BIN: "rerun",
} as const;

export const EPISODE_NAME_PATTERN = /^episode_(\d+)$/;
