/**
 * Ledger document schema.
 * The persisted JSON is validated against these on every load.
 */

import { z } from "zod";
import { ERROR_KINDS } from "../utils/errors";

export const JOB_STATUSES = [
  "pending",
  "in_progress",
  "paused",
  "completed",
  "failed",
] as const;
export const JOB_KINDS = [
  "full_crawl",
  "incremental",
  "retry_failed",
  "single_product",
] as const;
export const JOB_PRIORITIES = ["high", "medium", "low"] as const;
export const SYNC_STATUSES = ["in_sync", "out_of_sync", "needs_rebuild"] as const;

export const JobStatusSchema = z.enum(JOB_STATUSES);
export const JobKindSchema = z.enum(JOB_KINDS);
export const JobPrioritySchema = z.enum(JOB_PRIORITIES);
export const ErrorKindSchema = z.enum(ERROR_KINDS);

const count = z.number().int().nonnegative().default(0);
const timestamp = z.string().nullable().default(null);

// Session

export const SessionProgressSchema = z.object({
  productsDiscovered: count,
  productsCrawled: count,
  productsSkipped: count,
  imagesDownloaded: count,
  imagesFailed: count,
  currentPage: z.number().int().positive().default(1),
  lastProductUrl: z.string().nullable().default(null),
});

export const SessionSchema = z.object({
  id: z.string(),
  jobId: z.string().nullable().default(null),
  agent: z.string(),
  status: JobStatusSchema,
  startedAt: z.string(),
  endedAt: timestamp,
  progress: SessionProgressSchema,
});

// Jobs

export const JobConfigSchema = z.object({
  headless: z.boolean(),
  delayMs: z.number().nonnegative(),
  maxConcurrentDownloads: z.number().int().positive(),
  skipExisting: z.boolean(),
  outputDir: z.string(),
  metadataFile: z.string(),
});

export const JobExecutionSchema = z.object({
  agent: z.string().nullable().default(null),
  startedAt: timestamp,
  completedAt: timestamp,
  durationSeconds: z.number().nonnegative().nullable().default(null),
});

export const JobResultSchema = z.object({
  success: z.boolean(),
  totalProducts: count,
  totalImages: count,
  newProducts: count,
  newImages: count,
  skippedProducts: count,
  failedDownloads: count,
  errorMessage: z.string().nullable().default(null),
});

export const JobSchema = z.object({
  id: z.string(),
  kind: JobKindSchema,
  status: JobStatusSchema,
  priority: JobPrioritySchema.default("medium"),
  createdAt: z.string(),
  target: z.string().nullable().default(null),
  config: JobConfigSchema,
  execution: JobExecutionSchema,
  result: JobResultSchema.nullable().default(null),
});

// Products

export const ProductEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  url: z.string(),
  status: JobStatusSchema,
  crawlInfo: z.object({
    firstSeen: z.string(),
    lastCrawled: z.string(),
    crawlCount: z.number().int().positive(),
    jobId: z.string(),
  }),
  images: z.object({
    total: count,
    downloaded: count,
    failed: count,
    status: JobStatusSchema,
  }),
  price: z.object({
    current: z.string().nullable().default(null),
    lastSeen: timestamp,
  }),
  category: z.string().nullable().default(null),
  errors: z.array(z.string()).default([]),
});

/**
 * Writes an own, enumerable key. Product ids come straight from URLs, and a
 * plain assignment of "__proto__" would hit the prototype setter instead.
 */
export function setEntry<T>(table: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(table, key, { value, enumerable: true, writable: true, configurable: true });
}

// Parsed through entries: object parsing would drop a "__proto__" key
const ProductTableSchema = z
  .preprocess(
    (value) =>
      value !== null && typeof value === "object" && !Array.isArray(value)
        ? Object.entries(value)
        : value,
    z.array(z.tuple([z.string(), ProductEntrySchema])),
  )
  .transform((entries) => {
    const table: Record<string, z.infer<typeof ProductEntrySchema>> = {};
    for (const [id, entry] of entries) setEntry(table, id, entry);
    return table;
  });

// Errors

export const ErrorEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  jobId: z.string(),
  productId: z.string().nullable().default(null),
  kind: ErrorKindSchema,
  url: z.string().nullable().default(null),
  message: z.string(),
  retryCount: count,
  resolved: z.boolean().default(false),
  resolvedAt: timestamp,
});

// Derived stats

export const StatsSchema = z.object({
  totalProducts: count,
  totalImages: count,
  jobs: z
    .object({
      total: count,
      pending: count,
      inProgress: count,
      paused: count,
      completed: count,
      failed: count,
    })
    .default({}),
  downloads: z
    .object({ successful: count, failed: count, skipped: count })
    .default({}),
  byCategory: z.record(z.number().int().nonnegative()).default({}),
  lastFullCrawl: timestamp,
  lastIncremental: timestamp,
  averageCrawlTimeSeconds: z.number().nonnegative().nullable().default(null),
});

export const MetadataSyncSchema = z.object({
  file: z.string(),
  lastSync: timestamp,
  productsInMetadata: count,
  imagesInMetadata: count,
  syncStatus: z.enum(SYNC_STATUSES).default("needs_rebuild"),
});

export const LedgerStateSchema = z.object({
  version: z.string(),
  project: z.string(),
  targetSite: z.string(),
  platform: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  currentSession: SessionSchema.nullable().default(null),
  jobs: z.array(JobSchema).default([]),
  products: ProductTableSchema.default({}),
  errors: z.array(ErrorEntrySchema).default([]),
  stats: StatsSchema.default({}),
  metadataSync: MetadataSyncSchema,
});

export type JobStatus = z.infer<typeof JobStatusSchema>;
export type JobKind = z.infer<typeof JobKindSchema>;
export type JobPriority = z.infer<typeof JobPrioritySchema>;
export type SyncStatus = (typeof SYNC_STATUSES)[number];
export type SessionProgress = z.infer<typeof SessionProgressSchema>;
export type Session = z.infer<typeof SessionSchema>;
export type JobConfig = z.infer<typeof JobConfigSchema>;
export type JobExecution = z.infer<typeof JobExecutionSchema>;
export type JobResult = z.infer<typeof JobResultSchema>;
export type CrawlJob = z.infer<typeof JobSchema>;
export type ProductEntry = z.infer<typeof ProductEntrySchema>;
export type ErrorEntry = z.infer<typeof ErrorEntrySchema>;
export type Stats = z.infer<typeof StatsSchema>;
export type MetadataSync = z.infer<typeof MetadataSyncSchema>;
export type LedgerState = z.infer<typeof LedgerStateSchema>;
