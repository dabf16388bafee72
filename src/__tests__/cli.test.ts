import { readFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PreviewRequest, PreviewResult } from "@/lib/preview";
import { setLogLevel } from "@/utils/logger";
import { hasPropertyOfType, isObject } from "@/utils/typeGuards";
import { main } from "../cli";

const ARGV = ["node", "lerobot-preview"];

const result: PreviewResult = {
  cacheDir: "/tmp/rerun/76b571ebcb437f44",
  episode: {
    index: 1,
    name: "episode_000001",
    record: { episode_index: 1, tasks: ["Pick up the cube"], length: 101 },
    dataFiles: [],
    videoFiles: [],
    downloaded: 1,
    reused: 0,
  },
  summary: {
    name: "episode_000001",
    index: 1,
    frames: 101,
    fps: 30,
    duration: 101 / 30,
    tasks: ["Pick up the cube"],
    cameras: [],
  },
  viewerLaunched: true,
};

describe("lerobot-preview CLI", () => {
  const run = vi.fn(async (_request: PreviewRequest) => result);
  let printed: string[];
  let errors: string;

  beforeEach(() => {
    vi.clearAllMocks();
    printed = [];
    errors = "";
  });

  afterEach(() => {
    setLogLevel("error");
  });

  function invoke(...args: string[]): Promise<number> {
    return main([...ARGV, ...args], {
      run,
      print: (line) => printed.push(line),
      writeErr: (text) => {
        errors += text;
      },
    });
  }

  it("accepts bucket, dataset path and episode name", async () => {
    const code = await invoke("test-bucket", "datasets/pick_place", "episode_000001");

    expect(code).toBe(0);
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toMatchObject({
      bucket: "test-bucket",
      datasetPath: "datasets/pick_place",
      episode: "episode_000001",
      options: { viewer: true },
    });
    expect(printed).toContain("   Episode:  episode_000001 (index 1)");
    expect(printed).toContain("   Frames:   101 @ 30 fps (3.4s)");
  });

  it("passes options through", async () => {
    await invoke(
      "test-bucket",
      "datasets/pick_place",
      "episode_000001",
      "--project",
      "test-project",
      "--cache-dir",
      "/tmp/lerobot",
      "--rerun-bin",
      "/opt/rerun",
      "--no-viewer",
      "--refresh-metadata",
      "-v",
    );

    expect(run.mock.calls[0][0].options).toEqual({
      project: "test-project",
      cacheDir: "/tmp/lerobot",
      rerunBin: "/opt/rerun",
      viewer: false,
      refreshMetadata: true,
      verbose: true,
    });
  });

  it("rejects a missing episode argument", async () => {
    const code = await invoke("test-bucket", "datasets/pick_place");

    expect(code).toBe(1);
    expect(run).not.toHaveBeenCalled();
    expect(errors).toContain("error: missing required argument 'episode'");
  });

  it("rejects extra positional arguments", async () => {
    const code = await invoke("test-bucket", "datasets/pick_place", "episode_000001", "episode_000002");

    expect(code).toBe(1);
    expect(run).not.toHaveBeenCalled();
    expect(errors).toContain("error: too many arguments");
  });

  it("reports preview failures with exit code 1", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    run.mockRejectedValueOnce(
      new Error("Failed to download gs://test-bucket/a.mp4", { cause: new Error("403 Forbidden") }),
    );

    const code = await invoke("test-bucket", "datasets/pick_place", "episode_000001");

    expect(code).toBe(1);
    expect(consoleError).toHaveBeenCalledWith(
      expect.any(String),
      "Failed to download gs://test-bucket/a.mp4: 403 Forbidden",
    );
    consoleError.mockRestore();
  });

  it("installs the same entry point for the npm script and the bin", async () => {
    const raw: unknown = JSON.parse(
      await readFile(new URL("../../package.json", import.meta.url), "utf-8"),
    );
    expect(hasPropertyOfType(raw, "bin", isObject) && raw.bin["lerobot-preview"]).toBe("src/bin.ts");
    expect(hasPropertyOfType(raw, "scripts", isObject) && raw.scripts.preview).toBe("tsx src/bin.ts");
  });
});
