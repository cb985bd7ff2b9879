/**
 * Error types shared by the crawl pipeline
 */

import { RetryError } from "./retry";

export const ERROR_KINDS = [
  "crawl_failed",
  "parse_failed",
  "download_failed",
  "timeout",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/**
 * A failure tied to one product or page, tagged with the ledger error kind
 */
export class CrawlError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly url?: string,
  ) {
    super(message);
    this.name = "CrawlError";
  }
}

/** Non-2xx answer from the HTTP transport */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

/** Invalid ledger operation: unknown id, illegal transition or unreadable file */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LedgerError";
  }
}

/**
 * Extract a human-readable message from an unknown thrown value
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof RetryError) {
    return `${err.message}: ${getErrorMessage(err.originalError)}`;
  }
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

const isTimeout = (err: Error): boolean =>
  err.name === "TimeoutError" ||
  err.name === "AbortError" ||
  /timed? ?out/i.test(err.message);

/**
 * Map a thrown value onto the ledger error taxonomy.
 * Retry wrappers are unwrapped to the error that caused them.
 */
export function classifyError(err: unknown): ErrorKind {
  const cause = err instanceof RetryError ? err.originalError : err;
  if (cause instanceof CrawlError) return cause.kind;
  if (cause instanceof Error && isTimeout(cause)) return "timeout";
  return "crawl_failed";
}
