import { access, mkdir, readFile, rename, rm } from "node:fs/promises";
import path from "node:path";
import type { ObjectStore } from "../types";
import { CACHE } from "../utils/constants";
import { logger } from "../utils/logger";
import { isErrnoException } from "../utils/typeGuards";

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf-8"));
  return parsed;
}

/**
 * Downloads an object through a ".partial" file so an interrupted transfer
 * never leaves a file at the destination.
 *
 * @returns true when the object was downloaded, false when a cached copy was reused
 */
export async function downloadObject(
  store: ObjectStore,
  key: string,
  destination: string,
  { overwrite = false }: { overwrite?: boolean } = {},
): Promise<boolean> {
  if (!overwrite && (await pathExists(destination))) {
    logger.debug(`Using cached ${destination}`);
    return false;
  }

  await mkdir(path.dirname(destination), { recursive: true });
  const partial = `${destination}${CACHE.PARTIAL_SUFFIX}`;
  logger.info(`Downloading ${store.describe(key)}`);
  try {
    await store.download(key, partial);
  } catch (error) {
    await rm(partial, { force: true });
    throw new Error(`Failed to download ${store.describe(key)}`, { cause: error });
  }
  await rename(partial, destination);
  return true;
}
