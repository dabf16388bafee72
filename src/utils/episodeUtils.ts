/**
 * Episode naming and episodes.jsonl helpers
 */

import { appendFile, readFile } from "node:fs/promises";
import path from "node:path";
import type { EpisodeRecord } from "../types";
import { EPISODE_NAME_PATTERN } from "./constants";
import { bigIntToNumber, hasPropertyOfType, isNumeric, isStringArray } from "./typeGuards";

/**
 * Extracts the episode index from a name of the form "episode_{index}",
 * with or without a file extension.
 *
 * @example indexFromName("episode_000012.parquet") // 12
 */
export function indexFromName(name: string): number {
  const withoutExtension = path.parse(name).name;
  const match = EPISODE_NAME_PATTERN.exec(withoutExtension);
  if (!match) {
    throw new Error(`Invalid episode name: ${name}`);
  }
  return Number.parseInt(match[1], 10);
}

export function parseEpisodeRecord(raw: unknown): EpisodeRecord | undefined {
  if (!hasPropertyOfType(raw, "episode_index", isNumeric)) {
    return undefined;
  }
  return {
    ...raw,
    episode_index: bigIntToNumber(raw.episode_index),
    tasks: isStringArray(raw.tasks) ? raw.tasks : [],
    length: bigIntToNumber(raw.length),
  };
}

/**
 * Reads a JSON Lines file. Blank lines are skipped.
 */
export async function loadJsonL(filePath: string): Promise<unknown[]> {
  const text = await readFile(filePath, "utf-8");
  return text
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line, lineIndex) => {
      try {
        const parsed: unknown = JSON.parse(line);
        return parsed;
      } catch (error) {
        throw new Error(`Malformed JSON on line ${lineIndex + 1} of ${filePath}`, {
          cause: error,
        });
      }
    });
}

export async function loadEpisodeRecords(filePath: string): Promise<EpisodeRecord[]> {
  const rows = await loadJsonL(filePath);
  return rows.flatMap((row) => {
    const record = parseEpisodeRecord(row);
    return record ? [record] : [];
  });
}

export function formatJsonLines(records: readonly EpisodeRecord[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join("");
}

export async function appendJsonL(filePath: string, record: EpisodeRecord): Promise<void> {
  await appendFile(filePath, formatJsonLines([record]), "utf-8");
}
