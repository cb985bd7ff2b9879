import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const quiet =
  process.env.NODE_ENV === "production" || process.env.NODE_ENV === "test";

const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: quiet
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true },
      },
});

export enum LogLevel {
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  DEBUG = "debug",
}

export interface LogMeta {
  jobId?: string;
  productId?: string;
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

const toError = (value: unknown): Error | undefined => {
  if (value === undefined) return undefined;
  return value instanceof Error ? value : new Error(String(value));
};

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const err = toError(error);
    const errorMeta = {
      ...meta,
      error: err?.message,
      stack: err?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }

  /** Raise the threshold at runtime, e.g. for a `--verbose` flag. */
  static setLevel(level: LogLevel): void {
    logger.level = level;
  }

  // Convenience methods for common logging patterns
  static productCrawled(
    productId: string,
    productName: string,
    downloaded: number,
    total: number,
  ): void {
    this.info(`Product crawled: ${productName}`, {
      productId,
      downloaded,
      total,
    });
  }
  static discoveryComplete(urlCount: number, pages: number, duration: number): void {
    this.info(`Discovery complete`, { urlCount, pages, duration });
  }
  static batchProgress(processed: number, total: number, rate: number): void {
    this.info(`Progress: ${processed}/${total}`, {
      processed,
      total,
      rate: rate.toFixed(1),
    });
  }
  static errorOccurred(url: string, error: unknown): void {
    this.error(`Product processing failed: ${url}`, error, { url });
  }
}
