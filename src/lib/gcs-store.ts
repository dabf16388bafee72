import { Storage, type Bucket } from "@google-cloud/storage";
import type { ObjectStore, StoredObject } from "../types";
import { logger } from "../utils/logger";
import {
  bigIntToNumber,
  hasPropertyOfType,
  isNonEmptyString,
  isStringArray,
} from "../utils/typeGuards";

/**
 * Google Cloud Storage access for a single bucket.
 * Credentials come from the environment (Application Default Credentials).
 */
export class GcsObjectStore implements ObjectStore {
  private readonly handle: Bucket;

  constructor(
    readonly bucket: string,
    project?: string,
    storage: Storage = new Storage(project ? { projectId: project } : {}),
  ) {
    this.handle = storage.bucket(bucket);
  }

  async listObjects(prefix: string): Promise<StoredObject[]> {
    logger.debug(`Listing objects under ${this.describe(prefix)}`);
    const [files] = await this.handle.getFiles({ prefix, autoPaginate: true });
    return files
      .filter((file) => !file.name.endsWith("/"))
      .map((file) => ({
        key: file.name,
        size: file.metadata.size === undefined ? undefined : bigIntToNumber(file.metadata.size),
      }));
  }

  async listPrefixes(prefix: string): Promise<string[]> {
    logger.debug(`Listing sub-directories of ${this.describe(prefix)}`);
    const prefixes = new Set<string>();
    let pageToken: string | undefined;

    // Prefixes are only reported on the raw API response, page by page
    do {
      const [, nextQuery, apiResponse] = await this.handle.getFiles({
        prefix,
        delimiter: "/",
        autoPaginate: false,
        pageToken,
      });
      if (hasPropertyOfType(apiResponse, "prefixes", isStringArray)) {
        apiResponse.prefixes.forEach((entry) => prefixes.add(entry));
      }
      pageToken = hasPropertyOfType(nextQuery, "pageToken", isNonEmptyString)
        ? nextQuery.pageToken
        : undefined;
    } while (pageToken);

    return [...prefixes].sort();
  }

  async download(key: string, destination: string): Promise<void> {
    await this.handle.file(key).download({ destination });
  }

  describe(key: string): string {
    return `gs://${this.bucket}/${key}`;
  }
}
