/**
 * Runtime configuration: CLI options over environment variables over defaults
 */

import os from "node:os";
import path from "node:path";
import { CACHE, VIEWER } from "./constants";
import { isLogLevel, type LogLevel } from "./logger";
import { isNonEmptyString } from "./typeGuards";

// Parsed command-line options (commander camel-cases the flag names)
export type PreviewOptions = {
  project?: string;
  cacheDir?: string;
  rerunBin?: string;
  viewer?: boolean;
  refreshMetadata?: boolean;
  verbose?: boolean;
};

export interface PreviewConfig {
  cacheRoot: string;
  rerunBin: string;
  project: string | undefined;
  launchViewer: boolean;
  refreshMetadata: boolean;
  logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

export function defaultCacheRoot(): string {
  return path.join(os.tmpdir(), CACHE.DEFAULT_DIR_NAME);
}

export function resolveConfig(
  options: PreviewOptions = {},
  env: Environment = process.env,
): PreviewConfig {
  const envLevel = env.LOG_LEVEL;
  return {
    cacheRoot: path.resolve(
      options.cacheDir ?? (isNonEmptyString(env.LEROBOT_PREVIEW_CACHE_DIR)
        ? env.LEROBOT_PREVIEW_CACHE_DIR
        : defaultCacheRoot()),
    ),
    rerunBin:
      options.rerunBin ??
      (isNonEmptyString(env.RERUN_BIN) ? env.RERUN_BIN : VIEWER.DEFAULT_BIN),
    project:
      options.project ??
      (isNonEmptyString(env.GOOGLE_CLOUD_PROJECT)
        ? env.GOOGLE_CLOUD_PROJECT
        : undefined),
    launchViewer: options.viewer !== false,
    refreshMetadata: options.refreshMetadata === true,
    logLevel: options.verbose ? "debug" : isLogLevel(envLevel) ? envLevel : "info",
  };
}
