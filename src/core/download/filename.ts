import path from "node:path";
import { STORE_CONSTANTS } from "../constants/index";

const ALLOWED: readonly string[] = STORE_CONSTANTS.IMAGE_EXTENSIONS;

/**
 * Lower-cased extension of the URL path when it is an allowed image type,
 * otherwise the default ".jpg"
 */
export function imageExtension(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? "";
  }
  const ext = path.posix.extname(pathname).toLowerCase();
  return ALLOWED.includes(ext) ? ext : STORE_CONSTANTS.DEFAULT_IMAGE_EXTENSION;
}

/**
 * Deterministic artifact name: `{productId}_{NN}{ext}`, 1-based index.
 * Same inputs always give the same name, which is what skip-existing keys on.
 */
export function imageFilename(productId: string, index: number, url: string): string {
  return `${productId}_${String(index).padStart(2, "0")}${imageExtension(url)}`;
}
