import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
  CacheManifest,
  DatasetLocation,
  DatasetMetadata,
  EpisodeRecord,
  FetchedEpisode,
  FetchMetadataOptions,
  ObjectStore,
} from "../types";
import { DATASET_DIRS, META_FILES } from "../utils/constants";
import {
  appendJsonL,
  formatJsonLines,
  indexFromName,
  loadEpisodeRecords,
} from "../utils/episodeUtils";
import { logger } from "../utils/logger";
import {
  formatEpisodeChunk,
  formatEpisodeIndex,
  formatStringWithVars,
  keyBasename,
} from "../utils/stringFormatting";
import { hasPropertyOfType, isStringArray } from "../utils/typeGuards";
import { getDatasetVersion, getVideoKeys, isSupportedVersion, parseDatasetInfo } from "../utils/versionUtils";
import { cacheKeyFor, datasetKey } from "./dataset-location";
import { downloadObject, pathExists, readJsonFile } from "./file-cache";

// Written locally, so never taken from the bucket
const LOCAL_META_FILES = new Set<string>([META_FILES.ALL_EPISODES, META_FILES.MANIFEST]);

function parseManifest(raw: unknown): CacheManifest | undefined {
  if (
    !hasPropertyOfType(raw, "codebaseVersion", isSupportedVersion) ||
    !hasPropertyOfType(raw, "dataChunks", isStringArray) ||
    !hasPropertyOfType(raw, "videoKeys", isStringArray)
  ) {
    return undefined;
  }
  return {
    codebaseVersion: raw.codebaseVersion,
    dataChunks: raw.dataChunks,
    videoKeys: raw.videoKeys,
    fetchedAt: typeof raw.fetchedAt === "string" ? raw.fetchedAt : "",
  };
}

/**
 * Local mirror of one LeRobot dataset holding its metadata and the episodes
 * previewed so far. The curated meta/episodes.jsonl lists only those episodes,
 * so the viewer's LeRobot loader never looks for files that were not fetched.
 */
export class EpisodeCache {
  private constructor(
    private readonly store: ObjectStore,
    readonly location: DatasetLocation,
    readonly cacheDir: string,
  ) {}

  static async open(
    store: ObjectStore,
    location: DatasetLocation,
    cacheRoot: string,
  ): Promise<EpisodeCache> {
    const cacheDir = path.join(cacheRoot, await cacheKeyFor(location));
    logger.debug(`Cache for ${store.describe(location.prefix)} is ${cacheDir}`);
    return new EpisodeCache(store, location, cacheDir);
  }

  get metaDir(): string {
    return path.join(this.cacheDir, DATASET_DIRS.META);
  }

  private metaFile(name: string): string {
    return path.join(this.metaDir, name);
  }

  private localPath(key: string): string {
    const relative = this.location.prefix ? key.slice(this.location.prefix.length + 1) : key;
    return path.join(this.cacheDir, ...relative.split("/"));
  }

  async readManifest(): Promise<CacheManifest | undefined> {
    const manifestPath = this.metaFile(META_FILES.MANIFEST);
    if (!(await pathExists(manifestPath))) {
      return undefined;
    }
    const manifest = parseManifest(await readJsonFile(manifestPath));
    if (!manifest) {
      logger.warn(`Ignoring unreadable cache manifest ${manifestPath}`);
    }
    return manifest;
  }

  async readInfo(): Promise<DatasetMetadata> {
    const infoPath = this.metaFile(META_FILES.INFO);
    if (!(await pathExists(infoPath))) {
      throw new Error(
        `Dataset metadata at ${this.store.describe(datasetKey(this.location, DATASET_DIRS.META))} has no ${META_FILES.INFO}`,
      );
    }
    return parseDatasetInfo(await readJsonFile(infoPath), infoPath);
  }

  async readSelectedEpisodes(): Promise<EpisodeRecord[]> {
    const curatedPath = this.metaFile(META_FILES.EPISODES);
    return (await pathExists(curatedPath)) ? loadEpisodeRecords(curatedPath) : [];
  }

  /**
   * Downloads meta/ into the cache and records the dataset layout.
   * A complete earlier fetch is reused unless `refresh` is set.
   */
  async fetchMetadata({ refresh = false }: FetchMetadataOptions = {}): Promise<CacheManifest> {
    const manifestPath = this.metaFile(META_FILES.MANIFEST);
    if (refresh) {
      await rm(manifestPath, { force: true });
    } else {
      const cached = await this.readManifest();
      if (cached) {
        logger.debug(`Using cached metadata from ${cached.fetchedAt}`);
        return cached;
      }
    }

    const previouslySelected = await this.readSelectedEpisodes();
    const metaPrefix = datasetKey(this.location, DATASET_DIRS.META);
    const objects = (await this.store.listObjects(`${metaPrefix}/`)).filter(
      (object) => !LOCAL_META_FILES.has(keyBasename(object.key)),
    );
    if (objects.length === 0) {
      throw new Error(`No LeRobot metadata found at ${this.store.describe(metaPrefix)}`);
    }
    if (!objects.some((object) => keyBasename(object.key) === META_FILES.EPISODES)) {
      throw new Error(
        `Dataset metadata at ${this.store.describe(metaPrefix)} has no ${META_FILES.EPISODES}`,
      );
    }

    // The remote episode list never lands on the curated one
    await mkdir(this.metaDir, { recursive: true });
    for (const object of objects) {
      const name = keyBasename(object.key);
      const destination = this.metaFile(
        name === META_FILES.EPISODES ? META_FILES.ALL_EPISODES : name,
      );
      await downloadObject(this.store, object.key, destination, { overwrite: true });
    }

    const info = await this.readInfo();
    const codebaseVersion = getDatasetVersion(info);

    const allEpisodesPath = this.metaFile(META_FILES.ALL_EPISODES);
    const known = new Set(
      (await loadEpisodeRecords(allEpisodesPath)).map((record) => record.episode_index),
    );
    const kept = previouslySelected.filter((record) => known.has(record.episode_index));
    await writeFile(this.metaFile(META_FILES.EPISODES), formatJsonLines(kept), "utf-8");

    // Chunk and camera directories are listed once per metadata fetch
    const dataPrefix = datasetKey(this.location, DATASET_DIRS.DATA);
    const dataChunks = (await this.store.listPrefixes(`${dataPrefix}/`)).map(keyBasename).sort();
    if (dataChunks.length === 0) {
      throw new Error(`No data chunks found under ${this.store.describe(dataPrefix)}`);
    }
    const videoKeys = (
      await this.store.listPrefixes(
        `${datasetKey(this.location, DATASET_DIRS.VIDEOS, dataChunks[0])}/`,
      )
    )
      .map(keyBasename)
      .sort();

    const manifest: CacheManifest = {
      codebaseVersion,
      dataChunks,
      videoKeys,
      fetchedAt: new Date().toISOString(),
    };
    await writeFile(manifestPath, JSON.stringify(manifest, null, 2), "utf-8");
    logger.info(
      `Cached ${objects.length} metadata files (${codebaseVersion}, ${known.size} episodes, ${dataChunks.length} chunks)`,
    );
    return manifest;
  }

  // Object key from a dataset path template, if that object exists
  private async findTemplated(template: string, vars: Record<string, string>): Promise<string[]> {
    const key = datasetKey(this.location, formatStringWithVars(template, vars));
    const objects = await this.store.listObjects(key);
    return objects.filter((object) => object.key === key).map((object) => object.key);
  }

  private async searchPrefix(...segments: string[]): Promise<string[]> {
    const objects = await this.store.listObjects(datasetKey(this.location, ...segments));
    return objects.map((object) => object.key);
  }

  /**
   * Downloads the data and video files of one episode into the cache and
   * adds it to the curated episode list.
   */
  async fetchEpisode(name: string): Promise<FetchedEpisode> {
    const index = indexFromName(name);
    const manifest = await this.fetchMetadata();
    const info = await this.readInfo();

    const allEpisodes = await loadEpisodeRecords(this.metaFile(META_FILES.ALL_EPISODES));
    const record = allEpisodes.find((episode) => episode.episode_index === index);
    if (!record) {
      throw new Error(`Episode ${name} not found in dataset metadata`);
    }

    const stem = path.parse(name).name;
    const chunkIndex = Math.floor(index / Math.max(info.chunks_size, 1));
    const vars = {
      episode_chunk: formatEpisodeChunk(chunkIndex),
      episode_index: formatEpisodeIndex(index),
    };

    let dataKeys = await this.findTemplated(info.data_path, vars);
    if (dataKeys.length === 0) {
      logger.debug(`No object at the templated data path for ${name}, searching chunks`);
      for (const chunk of manifest.dataChunks) {
        dataKeys = await this.searchPrefix(DATASET_DIRS.DATA, chunk, stem);
        if (dataKeys.length > 0) break;
      }
    }
    if (dataKeys.length === 0) {
      throw new Error(
        `No data files found for ${name} under ${this.store.describe(datasetKey(this.location, DATASET_DIRS.DATA))}`,
      );
    }
    // data/<chunk>/<file>
    const resolvedChunk =
      path.relative(this.cacheDir, this.localPath(dataKeys[0])).split(path.sep)[1] ?? "";

    const cameras = [...new Set([...getVideoKeys(info), ...manifest.videoKeys])];
    const videoKeys: string[] = [];
    for (const camera of cameras) {
      let keys = info.video_path
        ? await this.findTemplated(info.video_path, { ...vars, video_key: camera })
        : [];
      if (keys.length === 0) {
        keys = await this.searchPrefix(DATASET_DIRS.VIDEOS, resolvedChunk, camera, stem);
      }
      if (keys.length === 0) {
        logger.warn(`No ${camera} video found for ${name}`);
        continue;
      }
      videoKeys.push(...keys);
    }

    let downloaded = 0;
    let reused = 0;
    const fetchFiles = async (keys: string[]): Promise<string[]> => {
      const files: string[] = [];
      for (const key of keys) {
        const destination = this.localPath(key);
        if (await downloadObject(this.store, key, destination)) {
          downloaded += 1;
        } else {
          reused += 1;
        }
        files.push(destination);
      }
      return files;
    };
    const dataFiles = await fetchFiles(dataKeys);
    const videoFiles = await fetchFiles(videoKeys);

    const selected = await this.readSelectedEpisodes();
    if (!selected.some((episode) => episode.episode_index === index)) {
      await appendJsonL(this.metaFile(META_FILES.EPISODES), record);
    }

    logger.info(`Episode ${name}: ${downloaded} downloaded, ${reused} reused from cache`);
    return { index, name, record, dataFiles, videoFiles, downloaded, reused };
  }
}
