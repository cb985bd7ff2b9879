/**
 * Durable JSON snapshot of the cumulative CrawlResult
 */

import fs from "node:fs";
import { CrawlResultSchema, type CrawlResult } from "../types/product";
import { getErrorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";
import { recomputeTotals } from "./crawl-result";
import {
  openJsonDocument,
  readJsonDocument,
  writeJsonDocument,
  type JsonDocument,
} from "./json-document";

export class MetadataStore {
  private readonly doc: JsonDocument;

  constructor(readonly filePath: string) {
    this.doc = openJsonDocument(filePath);
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Loads the snapshot, recomputing totals from the product list.
   * A missing or unreadable file yields null; the latter is logged.
   */
  load(): CrawlResult | null {
    let raw: unknown;
    try {
      raw = readJsonDocument(this.doc);
    } catch (error) {
      Logger.warn(`Metadata file unreadable: ${this.filePath}`, {
        error: getErrorMessage(error),
      });
      return null;
    }
    if (raw === null) return null;

    const parsed = CrawlResultSchema.safeParse(raw);
    if (!parsed.success) {
      Logger.warn(`Metadata file invalid: ${this.filePath}`, {
        error: parsed.error.message,
      });
      return null;
    }
    return recomputeTotals(parsed.data);
  }

  /** Overwrites the snapshot file (pretty-printed JSON) */
  save(result: CrawlResult): void {
    const snapshot = recomputeTotals(result);
    writeJsonDocument(this.doc, this.filePath, snapshot);
    Logger.debug(`Metadata saved: ${this.filePath}`, {
      count: snapshot.totalProducts,
      images: snapshot.totalImages,
    });
  }

  /** Ids of every product in the saved snapshot */
  getDownloadedProductIds(): Set<string> {
    const result = this.load();
    return new Set(result?.products.map((p) => p.id) ?? []);
  }
}
