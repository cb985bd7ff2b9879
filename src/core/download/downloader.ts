/**
 * Concurrency-bounded image downloads with skip-existing
 */

import fs from "node:fs";
import path from "node:path";
const { default: pLimit } = await import("p-limit");

import type { DownloaderOptions } from "../types/config";
import type { ImageOutcome, ImageRecord } from "../types/product";
import { nowIso } from "../utils/date";
import { getErrorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";
import { HTTP_RETRY_OPTIONS, withRetry, type RetryOptions } from "../utils/retry";
import type { ImageFetcher } from "./fetcher";
import { imageFilename } from "./filename";

const fileExists = async (p: string): Promise<boolean> => {
  try {
    await fs.promises.access(p, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
};

export class ImageDownloader {
  private readonly outputDir: string;
  private readonly maxConcurrent: number;
  private readonly retry: RetryOptions;

  constructor(
    private readonly fetcher: ImageFetcher,
    options: DownloaderOptions,
  ) {
    this.outputDir = options.outputDir;
    this.maxConcurrent = Math.max(1, options.maxConcurrent);
    this.retry = options.retry ?? HTTP_RETRY_OPTIONS;
  }

  /**
   * Downloads every image of one product.
   * Failures never escape: each URL yields exactly one outcome, in input order.
   * A file already on disk under the target name is reused, never refetched.
   * @param productId - Owner of the images; prefixes every filename
   * @param imageUrls - Canonical, deduplicated URLs
   */
  async downloadImages(productId: string, imageUrls: readonly string[]): Promise<ImageOutcome[]> {
    if (imageUrls.length === 0) return [];
    await fs.promises.mkdir(this.outputDir, { recursive: true });

    const limit = pLimit(this.maxConcurrent);
    return Promise.all(
      imageUrls.map((url, i) =>
        limit(() => this.downloadOne(productId, url, i + 1)),
      ),
    );
  }

  /**
   * Same as downloadImages, keeping only the records of images now on disk
   */
  async downloadProductImages(
    productId: string,
    imageUrls: readonly string[],
  ): Promise<ImageRecord[]> {
    const outcomes = await this.downloadImages(productId, imageUrls);
    return outcomes.flatMap((o) => (o.record ? [o.record] : []));
  }

  private async downloadOne(productId: string, url: string, index: number): Promise<ImageOutcome> {
    const filename = imageFilename(productId, index, url);
    const localPath = path.join(this.outputDir, filename);
    const record = (): ImageRecord => ({
      filename,
      originalUrl: url,
      localPath,
      downloadedAt: nowIso(),
    });

    if (await fileExists(localPath)) {
      Logger.debug(`Skip existing image: ${filename}`, { productId, url });
      return { url, filename, localPath, status: "existing", record: record() };
    }

    try {
      const bytes = await withRetry(() => this.fetcher.fetch(url), this.retry);

      // Write beside the target, then move into place
      const partial = `${localPath}.part`;
      await fs.promises.writeFile(partial, bytes);
      await fs.promises.rename(partial, localPath);

      return { url, filename, localPath, status: "downloaded", record: record() };
    } catch (error) {
      const message = getErrorMessage(error);
      Logger.warn(`Image download failed: ${url}`, { productId, url, error: message });
      return { url, filename, localPath, status: "failed", error: message };
    }
  }
}
