/**
 * Dataset type definitions for LeRobot datasets
 * Based on the LeRobot dataset format (v2.0, v2.1, v3.0)
 */

// Version management
export type DatasetVersion = "v2.0" | "v2.1" | "v3.0";

// Versions whose per-episode file layout can be cached episode by episode
export type SupportedDatasetVersion = Exclude<DatasetVersion, "v3.0">;

// Feature data types
export type FeatureDType =
  | "video"
  | "image"
  | "float32"
  | "float64"
  | "int32"
  | "int64"
  | "bool"
  | "string";

// Video-specific feature
export interface VideoFeature {
  dtype: "video";
  shape: number[]; // [height, width, channels]
  names: string[] | null;
  video_info?: {
    "video.fps": number;
    "video.codec": string;
    "video.pix_fmt": string;
    "video.is_depth_map": boolean;
    has_audio: boolean;
  };
}

// Any non-video feature (state, action, timestamps, ...)
export interface TensorFeature {
  dtype: Exclude<FeatureDType, "video">;
  shape: number[];
  names: string[] | Record<string, string[]> | null;
  fps?: number;
}

// Discriminated union for all feature types
export type Feature = VideoFeature | TensorFeature;

// Contents of meta/info.json
export interface DatasetMetadata {
  codebase_version: DatasetVersion;
  robot_type: string | null;
  total_episodes: number;
  total_frames: number;
  total_tasks: number;
  total_videos?: number;
  total_chunks?: number;
  chunks_size: number;
  fps: number;
  splits: Record<string, string>;
  data_path: string;
  video_path: string | null;
  features: Record<string, Feature>;
}
