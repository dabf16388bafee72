/**
 * String formatting utilities for path construction
 */

import { PADDING } from "./constants";

/**
 * Pad number to specified length with leading zeros
 */
export function padNumber(num: number, length: number): string {
  return num.toString().padStart(length, "0");
}

/**
 * Format episode chunk index with standard padding
 *
 * @returns Padded chunk index string (e.g., "001")
 */
export function formatEpisodeChunk(chunkIndex: number): string {
  return padNumber(chunkIndex, PADDING.EPISODE_CHUNK);
}

/**
 * Format episode index with standard padding
 *
 * @returns Padded episode index string (e.g., "000042")
 */
export function formatEpisodeIndex(episodeIndex: number): string {
  return padNumber(episodeIndex, PADDING.EPISODE_INDEX);
}

/**
 * Fill a LeRobot path template such as
 * "data/chunk-{episode_chunk:03d}/episode_{episode_index:06d}.parquet".
 * Values are inserted as given; the caller pads them.
 */
export function formatStringWithVars(
  format: string,
  vars: Record<string, string>,
): string {
  return format.replace(/{(\w+)(?::\d+d)?}/g, (match: string, key: string) =>
    key in vars ? vars[key] : match,
  );
}

/**
 * Normalise a "/"-separated object prefix: no leading or trailing slash,
 * no empty or "." segments.
 *
 * @example normalizePrefix("/datasets//pick_place/") // "datasets/pick_place"
 */
export function normalizePrefix(prefix: string): string {
  return prefix
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".")
    .join("/");
}

/**
 * Join object key segments with "/", skipping empty ones
 */
export function joinKey(...segments: string[]): string {
  return segments.filter((segment) => segment.length > 0).join("/");
}

/**
 * Last segment of an object key or prefix ("a/b/chunk-000/" -> "chunk-000")
 */
export function keyBasename(key: string): string {
  const segments = key.split("/").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? "";
}
