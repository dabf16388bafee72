import type { EpisodeSummary, FetchedEpisode, ObjectStore } from "../types";
import { resolveConfig, type Environment, type PreviewOptions } from "../utils/config";
import { createDatasetLocation } from "./dataset-location";
import { EpisodeCache } from "./episode-cache";
import { summarizeEpisode } from "./episode-summary";
import { GcsObjectStore } from "./gcs-store";
import { launchViewer, type LaunchViewerOptions } from "./rerun-viewer";

export interface PreviewRequest {
  bucket: string;
  datasetPath: string;
  episode: string;
  options?: PreviewOptions;
}

export interface PreviewResult {
  cacheDir: string;
  episode: FetchedEpisode;
  summary: EpisodeSummary;
  viewerLaunched: boolean;
}

export interface PreviewDependencies {
  env?: Environment;
  createStore?: (bucket: string, project: string | undefined) => ObjectStore;
  launch?: (options: LaunchViewerOptions) => Promise<number>;
}

/**
 * Fetch metadata, fetch the episode, then hand the cache directory to the viewer.
 */
export async function runPreview(
  request: PreviewRequest,
  {
    env = process.env,
    createStore = (bucket, project) => new GcsObjectStore(bucket, project),
    launch = launchViewer,
  }: PreviewDependencies = {},
): Promise<PreviewResult> {
  const config = resolveConfig(request.options, env);
  const location = createDatasetLocation(request.bucket, request.datasetPath);
  const store = createStore(location.bucket, config.project);

  const cache = await EpisodeCache.open(store, location, config.cacheRoot);
  await cache.fetchMetadata({ refresh: config.refreshMetadata });
  const episode = await cache.fetchEpisode(request.episode);
  const summary = await summarizeEpisode(episode, await cache.readInfo());

  const result = { cacheDir: cache.cacheDir, episode, summary, viewerLaunched: false };
  if (!config.launchViewer) {
    return result;
  }

  const exitCode = await launch({ bin: config.rerunBin, target: cache.cacheDir });
  if (exitCode !== 0) {
    throw new Error(`Rerun Viewer exited with code ${exitCode}`);
  }
  return { ...result, viewerLaunched: true };
}
