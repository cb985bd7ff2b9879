/**
 * Job / session / product / error ledger.
 * One JSON document, rewritten in full after every mutation so an
 * interrupted run can always be picked up from disk.
 */

import { randomUUID } from "node:crypto";
import { AppConfig } from "../config/app-config";
import { LEDGER_CONSTANTS } from "../constants/index";
import {
  openJsonDocument,
  readJsonDocument,
  writeJsonDocument,
  type JsonDocument,
} from "../storage/json-document";
import type { CrawlResult } from "../types/product";
import { uniq } from "../utils/array";
import { secondsBetween } from "../utils/date";
import { getErrorMessage, LedgerError, type ErrorKind } from "../utils/errors";
import { Logger } from "../utils/logger";
import {
  LedgerStateSchema,
  type CrawlJob,
  type ErrorEntry,
  type JobConfig,
  type JobKind,
  type JobPriority,
  type JobResult,
  type JobStatus,
  type LedgerState,
  type MetadataSync,
  type ProductEntry,
  type Session,
  type SessionProgress,
  type Stats,
  setEntry,
} from "./schema";
import { computeStats } from "./stats";

export interface LedgerOptions {
  /** Clock; injectable for tests */
  now?: () => Date;
  targetSite?: string;
}

export interface ProductUpsert {
  id: string;
  name: string;
  url: string;
  jobId: string;
  status?: JobStatus;
  imageCount?: number;
  downloadedCount?: number;
  failedCount?: number;
  price?: string | null;
  category?: string | null;
}

export interface ErrorInput {
  jobId: string;
  kind: ErrorKind;
  message: string;
  productId?: string | null;
  url?: string | null;
  retryCount?: number;
}

export interface LedgerSummary {
  project: string;
  targetSite: string;
  updatedAt: string;
  session: Pick<Session, "id" | "status" | "progress"> | null;
  stats: Stats;
  errors: { total: number; unresolved: number };
  metadataSync: Pick<MetadataSync, "syncStatus" | "lastSync">;
}

const pad3 = (n: number): string => String(n).padStart(3, "0");

/** Default per-job settings from the environment */
export function defaultJobConfig(): JobConfig {
  return {
    headless: AppConfig.HEADLESS,
    delayMs: AppConfig.DELAY_MS,
    maxConcurrentDownloads: AppConfig.MAX_CONCURRENT_DOWNLOADS,
    skipExisting: true,
    outputDir: AppConfig.OUTPUT_DIR,
    metadataFile: AppConfig.METADATA_FILE,
  };
}

export class CrawlLedger {
  private readonly doc: JsonDocument;
  private readonly clock: () => Date;
  private state: LedgerState;

  constructor(
    readonly filePath: string,
    options: LedgerOptions = {},
  ) {
    this.clock = options.now ?? (() => new Date());
    this.doc = openJsonDocument(filePath);
    this.state = this.load(options.targetSite ?? AppConfig.STORE_BASE_URL);
  }

  private now(): string {
    return this.clock().toISOString();
  }

  /**
   * Reads and validates the document. A missing file starts a fresh ledger;
   * a malformed one is an error and is never overwritten.
   */
  private load(targetSite: string): LedgerState {
    let raw: unknown;
    try {
      raw = readJsonDocument(this.doc);
    } catch (error) {
      throw new LedgerError(`Ledger unreadable: ${this.filePath}: ${getErrorMessage(error)}`);
    }

    if (raw === null) {
      const now = this.now();
      return LedgerStateSchema.parse({
        version: LEDGER_CONSTANTS.VERSION,
        project: LEDGER_CONSTANTS.PROJECT,
        targetSite,
        platform: LEDGER_CONSTANTS.PLATFORM,
        createdAt: now,
        updatedAt: now,
        metadataSync: { file: AppConfig.METADATA_FILE },
      });
    }

    const parsed = LedgerStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LedgerError(`Ledger invalid: ${this.filePath}: ${parsed.error.message}`);
    }
    return { ...parsed.data, stats: computeStats(parsed.data) };
  }

  private save(): void {
    this.state.updatedAt = this.now();
    this.state.stats = computeStats(this.state);
    writeJsonDocument(this.doc, this.filePath, this.state);
  }

  /** Deep copy of the whole document */
  getState(): LedgerState {
    return structuredClone(this.state);
  }

  getStats(): Stats {
    return computeStats(this.state);
  }

  // Sessions

  get currentSession(): Session | null {
    return this.state.currentSession;
  }

  /**
   * Starts a session, replacing any previous one wholesale
   */
  startSession(agent: string, jobId: string | null = null): Session {
    const hex = randomUUID().replace(/-/g, "").slice(0, 8).toUpperCase();
    const session: Session = {
      id: `${LEDGER_CONSTANTS.SESSION_ID_PREFIX}-${hex}`,
      jobId,
      agent,
      status: "in_progress",
      startedAt: this.now(),
      endedAt: null,
      progress: {
        productsDiscovered: 0,
        productsCrawled: 0,
        productsSkipped: 0,
        imagesDownloaded: 0,
        imagesFailed: 0,
        currentPage: 1,
        lastProductUrl: null,
      },
    };
    this.state.currentSession = session;
    this.save();
    return session;
  }

  /**
   * Patches session progress; fields left undefined keep their value.
   * Without a current session this does nothing.
   */
  updateSessionProgress(patch: Partial<SessionProgress>): void {
    const session = this.state.currentSession;
    if (!session) return;
    const p = session.progress;
    session.progress = {
      productsDiscovered: patch.productsDiscovered ?? p.productsDiscovered,
      productsCrawled: patch.productsCrawled ?? p.productsCrawled,
      productsSkipped: patch.productsSkipped ?? p.productsSkipped,
      imagesDownloaded: patch.imagesDownloaded ?? p.imagesDownloaded,
      imagesFailed: patch.imagesFailed ?? p.imagesFailed,
      currentPage: patch.currentPage ?? p.currentPage,
      lastProductUrl: patch.lastProductUrl ?? p.lastProductUrl,
    };
    this.save();
  }

  endSession(status: JobStatus = "completed"): void {
    const session = this.state.currentSession;
    if (!session) return;
    session.status = status;
    session.endedAt = this.now();
    this.save();
  }

  // Jobs

  createJob(
    kind: JobKind,
    config: Partial<JobConfig> = {},
    options: { priority?: JobPriority; target?: string | null } = {},
  ): CrawlJob {
    const job: CrawlJob = {
      id: `${LEDGER_CONSTANTS.JOB_ID_PREFIX}-${pad3(this.state.jobs.length + 1)}`,
      kind,
      status: "pending",
      priority: options.priority ?? "medium",
      createdAt: this.now(),
      target: options.target ?? null,
      config: { ...defaultJobConfig(), ...config },
      execution: { agent: null, startedAt: null, completedAt: null, durationSeconds: null },
      result: null,
    };
    this.state.jobs.push(job);
    this.save();
    Logger.debug(`Job created: ${job.id}`, { jobId: job.id, kind });
    return job;
  }

  getJob(jobId: string): CrawlJob | undefined {
    return this.state.jobs.find((j) => j.id === jobId);
  }

  getJobs(): CrawlJob[] {
    return [...this.state.jobs];
  }

  getPendingJobs(): CrawlJob[] {
    return this.state.jobs.filter((j) => j.status === "pending");
  }

  private requireJob(jobId: string): CrawlJob {
    const job = this.getJob(jobId);
    if (!job) throw new LedgerError(`Unknown job: ${jobId}`);
    return job;
  }

  private transition(job: CrawlJob, from: readonly JobStatus[], to: JobStatus): void {
    if (!from.includes(job.status)) {
      throw new LedgerError(`Invalid job transition ${job.id}: ${job.status} -> ${to}`);
    }
    job.status = to;
  }

  /** pending -> in_progress */
  startJob(jobId: string, agent: string): CrawlJob {
    const job = this.requireJob(jobId);
    this.transition(job, ["pending"], "in_progress");
    job.execution.agent = agent;
    job.execution.startedAt = this.now();
    this.save();
    return job;
  }

  /** in_progress -> paused */
  pauseJob(jobId: string): CrawlJob {
    const job = this.requireJob(jobId);
    this.transition(job, ["in_progress"], "paused");
    this.save();
    return job;
  }

  /** paused -> in_progress */
  resumeJob(jobId: string, agent?: string): CrawlJob {
    const job = this.requireJob(jobId);
    this.transition(job, ["paused"], "in_progress");
    if (agent) job.execution.agent = agent;
    this.save();
    return job;
  }

  /**
   * in_progress -> paused, for a job whose process died without pausing it.
   * Its session, if still open, is closed as failed.
   */
  recoverJob(jobId: string): CrawlJob {
    const job = this.requireJob(jobId);
    this.transition(job, ["in_progress"], "paused");
    const session = this.state.currentSession;
    if (session?.jobId === jobId && session.status === "in_progress") {
      session.status = "failed";
      session.endedAt = this.now();
    }
    this.save();
    Logger.warn(`Recovered stale job ${jobId}`, { jobId });
    return job;
  }

  /**
   * in_progress | paused -> completed | failed, decided by `result.success`
   */
  completeJob(jobId: string, result: JobResult): CrawlJob {
    const job = this.requireJob(jobId);
    this.transition(job, ["in_progress", "paused"], result.success ? "completed" : "failed");
    const completedAt = this.now();
    job.execution.completedAt = completedAt;
    job.execution.durationSeconds = job.execution.startedAt
      ? secondsBetween(job.execution.startedAt, completedAt)
      : null;
    job.result = result;
    this.save();
    return job;
  }

  // Products

  getProduct(productId: string): ProductEntry | undefined {
    return Object.hasOwn(this.state.products, productId)
      ? this.state.products[productId]
      : undefined;
  }

  getProducts(): ProductEntry[] {
    return Object.values(this.state.products);
  }

  /**
   * Inserts or merges a product entry.
   * Last write wins except for price/category, which only ever get
   * overwritten by a present value. crawlCount grows by one per call.
   */
  addOrUpdateProduct(input: ProductUpsert): ProductEntry {
    const now = this.now();
    const status = input.status ?? "completed";
    const price = input.price ?? null;
    const category = input.category ?? null;
    const images = {
      total: input.imageCount ?? 0,
      downloaded: input.downloadedCount ?? 0,
      failed: input.failedCount ?? 0,
      status,
    };

    const existing = this.getProduct(input.id);
    let entry: ProductEntry;

    if (existing) {
      const info = existing.crawlInfo;
      entry = {
        ...existing,
        name: input.name,
        url: input.url,
        status,
        crawlInfo: {
          firstSeen: info.firstSeen < now ? info.firstSeen : now,
          lastCrawled: info.lastCrawled > now ? info.lastCrawled : now,
          crawlCount: info.crawlCount + 1,
          jobId: input.jobId,
        },
        images,
        price: price ? { current: price, lastSeen: now } : existing.price,
        category: category ?? existing.category,
      };
    } else {
      entry = {
        id: input.id,
        name: input.name,
        url: input.url,
        status,
        crawlInfo: { firstSeen: now, lastCrawled: now, crawlCount: 1, jobId: input.jobId },
        images,
        price: { current: price, lastSeen: price ? now : null },
        category,
        errors: [],
      };
    }

    setEntry(this.state.products, input.id, entry);
    this.save();
    return entry;
  }

  /**
   * Flags an existing entry as failed. Unknown ids are left alone; the error
   * log still records the failure.
   */
  markProductFailed(productId: string, jobId: string, message: string): void {
    const entry = this.getProduct(productId);
    if (!entry) return;
    entry.status = "failed";
    entry.crawlInfo.jobId = jobId;
    entry.errors.push(message);
    this.save();
  }

  getFailedProducts(): ProductEntry[] {
    return this.getProducts().filter((p) => p.status === "failed");
  }

  // Errors

  logError(input: ErrorInput): ErrorEntry {
    const entry: ErrorEntry = {
      id: `${LEDGER_CONSTANTS.ERROR_ID_PREFIX}-${pad3(this.state.errors.length + 1)}`,
      timestamp: this.now(),
      jobId: input.jobId,
      productId: input.productId ?? null,
      kind: input.kind,
      url: input.url ?? null,
      message: input.message,
      retryCount: input.retryCount ?? 0,
      resolved: false,
      resolvedAt: null,
    };
    this.state.errors.push(entry);
    this.save();
    return entry;
  }

  getErrors(): ErrorEntry[] {
    return [...this.state.errors];
  }

  getUnresolvedErrors(): ErrorEntry[] {
    return this.state.errors.filter((e) => !e.resolved);
  }

  /**
   * Marks one error resolved. Resolving twice is harmless.
   * @returns false when no error has that id
   */
  resolveError(errorId: string): boolean {
    const entry = this.state.errors.find((e) => e.id === errorId);
    if (!entry) return false;
    if (!entry.resolved) {
      entry.resolved = true;
      entry.resolvedAt = this.now();
      this.save();
    }
    return true;
  }

  /**
   * Resolves every open error of a product
   * @returns How many were resolved
   */
  resolveErrorsForProduct(productId: string): number {
    const open = this.state.errors.filter((e) => e.productId === productId && !e.resolved);
    if (open.length === 0) return 0;
    const now = this.now();
    for (const e of open) {
      e.resolved = true;
      e.resolvedAt = now;
    }
    this.save();
    return open.length;
  }

  /** Retry counter for the next failure of a product that is being retried */
  nextRetryCount(productId: string): number {
    const previous = this.state.errors.filter((e) => e.productId === productId);
    if (previous.length === 0) return 1;
    return Math.max(...previous.map((e) => e.retryCount)) + 1;
  }

  /**
   * URLs worth retrying: open errors first, then failed products, no repeats
   */
  getRetryTargets(): string[] {
    const fromErrors = this.getUnresolvedErrors().flatMap((e) => (e.url ? [e.url] : []));
    const fromProducts = this.getFailedProducts().map((p) => p.url);
    return uniq([...fromErrors, ...fromProducts]);
  }

  // Metadata reconciliation

  /**
   * Records what the metadata snapshot holds and whether the ledger covers it
   * @param result - Loaded snapshot, or null when there is none
   * @param file - Snapshot location
   */
  syncFromMetadata(result: CrawlResult | null, file: string): MetadataSync {
    const sync: MetadataSync = result
      ? {
          file,
          lastSync: this.now(),
          productsInMetadata: result.totalProducts,
          imagesInMetadata: result.totalImages,
          syncStatus: result.products.every((p) => this.getProduct(p.id) !== undefined)
            ? "in_sync"
            : "out_of_sync",
        }
      : {
          file,
          lastSync: this.now(),
          productsInMetadata: 0,
          imagesInMetadata: 0,
          syncStatus: "needs_rebuild",
        };
    this.state.metadataSync = sync;
    this.save();
    return sync;
  }

  summary(): LedgerSummary {
    const s = this.state;
    return {
      project: s.project,
      targetSite: s.targetSite,
      updatedAt: s.updatedAt,
      session: s.currentSession
        ? {
            id: s.currentSession.id,
            status: s.currentSession.status,
            progress: { ...s.currentSession.progress },
          }
        : null,
      stats: computeStats(s),
      errors: { total: s.errors.length, unresolved: this.getUnresolvedErrors().length },
      metadataSync: {
        syncStatus: s.metadataSync.syncStatus,
        lastSync: s.metadataSync.lastSync,
      },
    };
  }
}
