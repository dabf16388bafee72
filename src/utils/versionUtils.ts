/**
 * Utility functions for checking dataset version compatibility
 */

import type {
  DatasetMetadata,
  DatasetVersion,
  Feature,
  FeatureDType,
  SupportedDatasetVersion,
} from "../types";
import { SUPPORTED_VERSIONS } from "./constants";
import {
  bigIntToNumber,
  hasPropertyOfType,
  isNonEmptyString,
  isNumeric,
  isObject,
  isStringArray,
} from "./typeGuards";

const KNOWN_VERSIONS: readonly DatasetVersion[] = ["v2.0", "v2.1", "v3.0"];

const TENSOR_DTYPES: readonly Exclude<FeatureDType, "video">[] = [
  "image",
  "float32",
  "float64",
  "int32",
  "int64",
  "bool",
  "string",
];

function isDatasetVersion(value: unknown): value is DatasetVersion {
  return KNOWN_VERSIONS.some((version) => version === value);
}

export function isSupportedVersion(
  version: unknown,
): version is SupportedDatasetVersion {
  return SUPPORTED_VERSIONS.some((supported) => supported === version);
}

function parseFeature(raw: unknown): Feature | undefined {
  if (!hasPropertyOfType(raw, "dtype", isNonEmptyString)) return undefined;
  const shape = Array.isArray(raw.shape) ? raw.shape.map((dim) => bigIntToNumber(dim)) : [];

  if (raw.dtype === "video") {
    return { dtype: "video", shape, names: isStringArray(raw.names) ? raw.names : null };
  }
  const dtype = TENSOR_DTYPES.find((candidate) => candidate === raw.dtype);
  if (!dtype) return undefined;

  let names: string[] | Record<string, string[]> | null = null;
  if (isStringArray(raw.names)) {
    names = raw.names;
  } else if (isObject(raw.names)) {
    names = Object.fromEntries(
      Object.entries(raw.names).filter((entry): entry is [string, string[]] =>
        isStringArray(entry[1]),
      ),
    );
  }
  return { dtype, shape, names };
}

/**
 * Validates the parsed contents of meta/info.json.
 * Features with an unknown dtype are dropped.
 */
export function parseDatasetInfo(raw: unknown, source: string): DatasetMetadata {
  if (
    !hasPropertyOfType(raw, "codebase_version", isDatasetVersion) ||
    !hasPropertyOfType(raw, "data_path", isNonEmptyString) ||
    !hasPropertyOfType(raw, "chunks_size", isNumeric) ||
    !hasPropertyOfType(raw, "fps", isNumeric) ||
    !hasPropertyOfType(raw, "features", isObject)
  ) {
    throw new Error(`Invalid LeRobot dataset info in ${source}`);
  }

  const features: Record<string, Feature> = {};
  for (const [key, value] of Object.entries(raw.features)) {
    const feature = parseFeature(value);
    if (feature) features[key] = feature;
  }

  return {
    codebase_version: raw.codebase_version,
    robot_type: isNonEmptyString(raw.robot_type) ? raw.robot_type : null,
    total_episodes: bigIntToNumber(raw.total_episodes),
    total_frames: bigIntToNumber(raw.total_frames),
    total_tasks: bigIntToNumber(raw.total_tasks),
    total_videos: bigIntToNumber(raw.total_videos),
    total_chunks: bigIntToNumber(raw.total_chunks),
    chunks_size: bigIntToNumber(raw.chunks_size),
    fps: bigIntToNumber(raw.fps),
    splits: isObject(raw.splits)
      ? Object.fromEntries(
          Object.entries(raw.splits).filter((entry): entry is [string, string] =>
            typeof entry[1] === "string",
          ),
        )
      : {},
    data_path: raw.data_path,
    video_path: isNonEmptyString(raw.video_path) ? raw.video_path : null,
    features,
  };
}

/**
 * Determines whether the dataset version can be previewed.
 * v3.0 stores many episodes per file and is rejected.
 */
export function getDatasetVersion(info: DatasetMetadata): SupportedDatasetVersion {
  const version = info.codebase_version;
  if (isSupportedVersion(version)) {
    return version;
  }
  throw new Error(
    `Dataset version ${version} is not compatible with this previewer. ` +
      `This tool only works with dataset versions ${SUPPORTED_VERSIONS.join(", ")}.`,
  );
}

/**
 * Keys of the features stored as videos, in info.json order
 */
export function getVideoKeys(info: DatasetMetadata): string[] {
  return Object.entries(info.features)
    .filter(([, value]) => value.dtype === "video")
    .map(([key]) => key);
}
