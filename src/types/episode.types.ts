/**
 * Episode type definitions for LeRobot datasets
 */

// One line of meta/episodes.jsonl (v2.x)
export interface EpisodeRecord {
  episode_index: number;
  tasks: string[];
  length: number;
  [key: string]: unknown;
}

// Episode files resolved and cached locally
export interface FetchedEpisode {
  index: number;
  name: string;
  record: EpisodeRecord;
  dataFiles: string[];
  videoFiles: string[];
  downloaded: number;
  reused: number;
}

// Human-facing description of a cached episode
export interface EpisodeSummary {
  name: string;
  index: number;
  frames: number;
  fps: number;
  duration: number;
  tasks: string[];
  cameras: string[];
}
