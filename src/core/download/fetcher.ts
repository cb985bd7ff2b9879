/**
 * HTTP transport for image bytes
 */

import { AppConfig } from "../config/app-config";
import { BROWSER_CONSTANTS } from "../constants/index";
import { HttpStatusError } from "../utils/errors";

/** Anything that can turn an image URL into bytes */
export interface ImageFetcher {
  fetch(url: string): Promise<Uint8Array>;
}

/**
 * Fetches images over global fetch with a browser-like identity.
 * Redirects are followed; a timeout surfaces as a TimeoutError.
 */
export class HttpImageFetcher implements ImageFetcher {
  constructor(private readonly timeoutMs: number = AppConfig.DOWNLOAD_TIMEOUT_MS) {}

  /**
   * @throws HttpStatusError on any non-2xx answer
   */
  async fetch(url: string): Promise<Uint8Array> {
    const r = await fetch(url, {
      redirect: "follow",
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: {
        "user-agent": BROWSER_CONSTANTS.USER_AGENT,
        accept: BROWSER_CONSTANTS.ACCEPT_IMAGE_HEADER,
      },
    });
    if (!r.ok) throw new HttpStatusError(r.status, url);
    return new Uint8Array(await r.arrayBuffer());
  }
}
