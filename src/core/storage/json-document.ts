/**
 * lowdb-backed JSON documents.
 * Reads hand back unknown so callers validate before trusting the shape;
 * writes go through a temp file and a rename.
 */

import fs from "node:fs";
import path from "node:path";
import { LowSync } from "lowdb";
import { JSONFileSync } from "lowdb/node";

export type JsonDocument = LowSync<unknown>;

/**
 * Opens (without reading) a JSON document at the given path
 * @param filePath - Location of the document; parent dirs are created on write
 */
export function openJsonDocument(filePath: string): JsonDocument {
  return new LowSync<unknown>(new JSONFileSync<unknown>(filePath), null);
}

/**
 * Reads the current file content; null when the file does not exist.
 * Malformed JSON throws.
 */
export function readJsonDocument(doc: JsonDocument): unknown {
  // read() keeps the previous data when the file is gone
  doc.data = null;
  doc.read();
  return doc.data;
}

/**
 * Replaces the whole document on disk
 */
export function writeJsonDocument(doc: JsonDocument, filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  doc.data = data;
  doc.write();
}
