import { describe, expect, it } from "vitest";
import { getDatasetVersion, getVideoKeys, parseDatasetInfo } from "../versionUtils";

const baseInfo = {
  codebase_version: "v2.1",
  robot_type: "so100",
  total_episodes: 2,
  total_frames: 200,
  total_tasks: 1,
  chunks_size: 1000,
  fps: 30,
  splits: { train: "0:2" },
  data_path: "data/chunk-{episode_chunk:03d}/episode_{episode_index:06d}.parquet",
  video_path: "videos/chunk-{episode_chunk:03d}/{video_key}/episode_{episode_index:06d}.mp4",
  features: {
    "observation.images.top": { dtype: "video", shape: [480, 640, 3], names: ["height", "width", "channel"] },
    "observation.state": { dtype: "float32", shape: [6], names: { motors: ["a", "b"] } },
    "observation.point_cloud": { dtype: "pointcloud", shape: [1024, 3], names: null },
  },
};

describe("parseDatasetInfo", () => {
  it("reads the fields used for previewing", () => {
    const info = parseDatasetInfo(baseInfo, "info.json");

    expect(info.codebase_version).toBe("v2.1");
    expect(info.chunks_size).toBe(1000);
    expect(info.video_path).toBe(baseInfo.video_path);
    expect(info.features["observation.state"]).toEqual({
      dtype: "float32",
      shape: [6],
      names: { motors: ["a", "b"] },
    });
  });

  it("drops features with an unknown dtype", () => {
    const info = parseDatasetInfo(baseInfo, "info.json");
    expect(Object.keys(info.features)).toEqual(["observation.images.top", "observation.state"]);
  });

  it("rejects files missing required fields", () => {
    const { data_path: _dataPath, ...withoutDataPath } = baseInfo;
    expect(() => parseDatasetInfo(withoutDataPath, "/cache/meta/info.json")).toThrow(
      "Invalid LeRobot dataset info in /cache/meta/info.json",
    );
    expect(() => parseDatasetInfo([], "info.json")).toThrow("Invalid LeRobot dataset info in info.json");
  });

  it("treats a null video path as absent", () => {
    expect(parseDatasetInfo({ ...baseInfo, video_path: null }, "info.json").video_path).toBeNull();
  });
});

describe("getDatasetVersion", () => {
  it("accepts v2.0 and v2.1", () => {
    expect(getDatasetVersion(parseDatasetInfo(baseInfo, "info.json"))).toBe("v2.1");
    expect(
      getDatasetVersion(parseDatasetInfo({ ...baseInfo, codebase_version: "v2.0" }, "info.json")),
    ).toBe("v2.0");
  });

  it("rejects v3.0 datasets", () => {
    const info = parseDatasetInfo({ ...baseInfo, codebase_version: "v3.0" }, "info.json");
    expect(() => getDatasetVersion(info)).toThrow(
      "Dataset version v3.0 is not compatible with this previewer. This tool only works with dataset versions v2.0, v2.1.",
    );
  });
});

describe("getVideoKeys", () => {
  it("lists video features only", () => {
    expect(getVideoKeys(parseDatasetInfo(baseInfo, "info.json"))).toEqual(["observation.images.top"]);
  });
});
