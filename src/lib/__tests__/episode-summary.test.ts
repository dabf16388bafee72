import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("hyparquet", () => ({
  parquetMetadata: vi.fn(() => ({ num_rows: 150n, schema: [] })),
}));

import { parquetMetadata } from "hyparquet";
import type { DatasetMetadata, FetchedEpisode } from "@/types";
import { formatSummary, summarizeEpisode } from "../episode-summary";

const info: DatasetMetadata = {
  codebase_version: "v2.1",
  robot_type: "so100",
  total_episodes: 3,
  total_frames: 300,
  total_tasks: 1,
  chunks_size: 1000,
  fps: 30,
  splits: {},
  data_path: "data/chunk-{episode_chunk:03d}/episode_{episode_index:06d}.parquet",
  video_path: null,
  features: {},
};

describe("summarizeEpisode", () => {
  let dir: string;
  let episode: FetchedEpisode;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(path.join(os.tmpdir(), "episode-summary-"));
    const dataFile = path.join(dir, "episode_000001.parquet");
    await writeFile(dataFile, "PAR1");
    episode = {
      index: 1,
      name: "episode_000001",
      record: { episode_index: 1, tasks: ["Pick up the cube", "Place it in the bin"], length: 101 },
      dataFiles: [dataFile],
      videoFiles: [
        path.join(dir, "videos", "chunk-000", "observation.images.top", "episode_000001.mp4"),
        path.join(dir, "videos", "chunk-000", "observation.images.wrist", "episode_000001.mp4"),
      ],
      downloaded: 3,
      reused: 0,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("counts frames from the parquet footer", async () => {
    const summary = await summarizeEpisode(episode, info);

    expect(parquetMetadata).toHaveBeenCalledTimes(1);
    expect(summary).toEqual({
      name: "episode_000001",
      index: 1,
      frames: 150,
      fps: 30,
      duration: 5,
      tasks: ["Pick up the cube", "Place it in the bin"],
      cameras: ["observation.images.top", "observation.images.wrist"],
    });
  });

  it("falls back to the episode length when the file cannot be read", async () => {
    vi.mocked(parquetMetadata).mockImplementationOnce(() => {
      throw new Error("parquet file invalid");
    });

    const summary = await summarizeEpisode(episode, info);

    expect(summary.frames).toBe(101);
  });

  it("formats the summary for the terminal", async () => {
    const summary = await summarizeEpisode(episode, info);

    expect(formatSummary(summary)).toEqual([
      "Episode:  episode_000001 (index 1)",
      "Frames:   150 @ 30 fps (5.0s)",
      "Tasks:    Pick up the cube; Place it in the bin",
      "Cameras:  observation.images.top, observation.images.wrist",
    ]);
  });

  it("prints placeholders when there are no tasks or cameras", () => {
    expect(
      formatSummary({ name: "episode_000000", index: 0, frames: 0, fps: 0, duration: 0, tasks: [], cameras: [] }),
    ).toEqual([
      "Episode:  episode_000000 (index 0)",
      "Frames:   0 @ 0 fps (0.0s)",
      "Tasks:    -",
      "Cameras:  -",
    ]);
  });
});
