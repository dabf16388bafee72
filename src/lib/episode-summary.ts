import path from "node:path";
import type { DatasetMetadata, EpisodeSummary, FetchedEpisode } from "../types";
import { formatError } from "../utils/errors";
import { logger } from "../utils/logger";
import { readParquetRowCount } from "../utils/parquetUtils";

/**
 * Describes a fetched episode. The frame count comes from the data file
 * footer, or from episodes.jsonl when the file cannot be read.
 */
export async function summarizeEpisode(
  episode: FetchedEpisode,
  info: DatasetMetadata,
): Promise<EpisodeSummary> {
  let frames = episode.record.length;
  const [dataFile] = episode.dataFiles;
  if (dataFile) {
    try {
      frames = await readParquetRowCount(dataFile);
    } catch (error) {
      logger.warn(`Could not read ${dataFile}: ${formatError(error)}`);
    }
  }

  // videos/<chunk>/<camera>/<file>
  const cameras = [
    ...new Set(episode.videoFiles.map((file) => path.basename(path.dirname(file)))),
  ];

  return {
    name: episode.name,
    index: episode.index,
    frames,
    fps: info.fps,
    duration: info.fps > 0 ? frames / info.fps : 0,
    tasks: episode.record.tasks,
    cameras,
  };
}

export function formatSummary(summary: EpisodeSummary): string[] {
  return [
    `Episode:  ${summary.name} (index ${summary.index})`,
    `Frames:   ${summary.frames} @ ${summary.fps} fps (${summary.duration.toFixed(1)}s)`,
    `Tasks:    ${summary.tasks.length > 0 ? summary.tasks.join("; ") : "-"}`,
    `Cameras:  ${summary.cameras.length > 0 ? summary.cameras.join(", ") : "-"}`,
  ];
}
