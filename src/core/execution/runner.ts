/**
 * Main execution runner
 */

import { AppConfig } from "../config/app-config";
import type { PageRenderer } from "../browser/renderer";
import { StorefrontCrawler } from "../discovery/crawler";
import { ImageDownloader } from "../download/downloader";
import type { ImageFetcher } from "../download/fetcher";
import { extractProductId } from "../extraction/identifier";
import { extractProduct, hasUsableData } from "../extraction/product";
import { CrawlLedger } from "../ledger/ledger";
import type { CrawlJob, JobConfig, JobKind, JobPriority, JobResult, JobStatus } from "../ledger/schema";
import { addProduct, createCrawlResult, mergeCrawlResults } from "../storage/crawl-result";
import { MetadataStore } from "../storage/metadata-store";
import type { StoreConfig } from "../types/config";
import type { CrawlResult, Product } from "../types/product";
import { nowIso } from "../utils/date";
import { classifyError, CrawlError, getErrorMessage } from "../utils/errors";
import { Logger } from "../utils/logger";
import type { RetryOptions } from "../utils/retry";

/**
 * Configuration options for a crawl run
 */
export interface CrawlOptions {
  /** Kind of job to create; ignored when resuming */
  kind: JobKind;
  /** Resume this paused (or orphaned in_progress) job instead of creating one */
  resumeJobId?: string;
  /** Product URL for single_product jobs */
  target?: string;
  priority?: JobPriority;
  config?: Partial<JobConfig>;
  store?: StoreConfig;
  agent?: string;
  maxPages?: number;
  checkpointEvery?: number;
  downloadRetry?: RetryOptions;
  /** Checked between products; aborting pauses the job */
  signal?: AbortSignal;
}

export interface CrawlDeps {
  renderer: PageRenderer;
  fetcher: ImageFetcher;
  ledger: CrawlLedger;
  metadataStore?: MetadataStore;
}

export interface CrawlSummary {
  jobId: string;
  status: JobStatus;
  result: JobResult;
  crawled: number;
  skipped: number;
  failed: number;
  imagesDownloaded: number;
  imagesFailed: number;
}

interface RunCounters {
  crawled: number;
  skipped: number;
  failed: number;
  newProducts: number;
  newImages: number;
  imagesDownloaded: number;
  imagesFailed: number;
}

const emptyResult = (errorMessage: string | null = null): JobResult => ({
  success: false,
  totalProducts: 0,
  totalImages: 0,
  newProducts: 0,
  newImages: 0,
  skippedProducts: 0,
  failedDownloads: 0,
  errorMessage,
});

const pick = (c: RunCounters) => ({
  crawled: c.crawled,
  skipped: c.skipped,
  failed: c.failed,
  imagesDownloaded: c.imagesDownloaded,
  imagesFailed: c.imagesFailed,
});

/**
 * Creates the job (or picks up a paused one) and moves it to in_progress.
 * A resumed job still marked in_progress was orphaned by a killed process
 * and is recovered first.
 */
function openJob(options: CrawlOptions, ledger: CrawlLedger, agent: string): CrawlJob {
  if (options.resumeJobId) {
    if (ledger.getJob(options.resumeJobId)?.status === "in_progress") {
      ledger.recoverJob(options.resumeJobId);
    }
    const job = ledger.resumeJob(options.resumeJobId, agent);
    Logger.info(`Resuming job ${job.id}`, { jobId: job.id, kind: job.kind });
    return job;
  }

  if (options.kind === "single_product" && !options.target) {
    throw new CrawlError("single_product jobs need a target URL", "crawl_failed");
  }
  const config: Partial<JobConfig> =
    options.kind === "incremental"
      ? { ...options.config, skipExisting: true }
      : { ...options.config };

  const job = ledger.createJob(options.kind, config, {
    priority: options.priority,
    target: options.target ?? null,
  });
  return ledger.startJob(job.id, agent);
}

/**
 * Target URLs for the job, by kind
 */
async function resolveTargets(
  job: CrawlJob,
  crawler: StorefrontCrawler,
  ledger: CrawlLedger,
): Promise<string[]> {
  switch (job.kind) {
    case "full_crawl":
    case "incremental":
      return crawler.discoverProductUrls((page) =>
        ledger.updateSessionProgress({ currentPage: page }),
      );
    case "retry_failed":
      return ledger.getRetryTargets();
    case "single_product":
      return job.target ? [job.target] : [];
  }
}

/**
 * Ids to leave alone: the snapshot's products (when skipping is on for a
 * discovery job) plus whatever this job already finished before a pause
 */
function resolveSkipSet(job: CrawlJob, ledger: CrawlLedger, previous: CrawlResult | null): Set<string> {
  const skip = new Set<string>();
  const discovers = job.kind === "full_crawl" || job.kind === "incremental";
  if (discovers && job.config.skipExisting) {
    previous?.products.forEach((p) => skip.add(p.id));
  }
  ledger
    .getProducts()
    .filter((p) => p.crawlInfo.jobId === job.id && p.status === "completed")
    .forEach((p) => skip.add(p.id));
  return skip;
}

/**
 * Runs one crawl job end to end: discovery, per-product extraction and
 * download, checkpoints, ledger bookkeeping.
 * Per-product failures are recorded and skipped over; anything else fails
 * the job and is re-thrown.
 * @param options - What to crawl and how
 * @param deps - Renderer, image transport, ledger and optional snapshot store
 */
export async function runCrawl(options: CrawlOptions, deps: CrawlDeps): Promise<CrawlSummary> {
  const t0 = Date.now();
  const { ledger } = deps;
  const agent = options.agent ?? AppConfig.AGENT_NAME;
  const checkpointEvery = Math.max(1, options.checkpointEvery ?? AppConfig.CHECKPOINT_EVERY);

  const job = openJob(options, ledger, agent);
  ledger.startSession(agent, job.id);

  const counters: RunCounters = {
    crawled: 0,
    skipped: 0,
    failed: 0,
    newProducts: 0,
    newImages: 0,
    imagesDownloaded: 0,
    imagesFailed: 0,
  };

  try {
    const { config } = job;
    const store: StoreConfig = options.store ?? {
      baseUrl: AppConfig.STORE_BASE_URL,
      collectionPath: AppConfig.COLLECTION_PATH,
    };
    const metadataStore = deps.metadataStore ?? new MetadataStore(config.metadataFile);
    const crawler = new StorefrontCrawler(deps.renderer, store, {
      delayMs: config.delayMs,
      maxPages: options.maxPages ?? AppConfig.MAX_LISTING_PAGES,
    });
    const downloader = new ImageDownloader(deps.fetcher, {
      outputDir: config.outputDir,
      maxConcurrent: config.maxConcurrentDownloads,
      retry: options.downloadRetry,
    });

    // Cumulative snapshot: this run's products overlaid on what earlier runs saved
    const previous = metadataStore.load();
    const base = previous ?? createCrawlResult();
    const knownIds = new Set(base.products.map((p) => p.id));
    let thisRun: CrawlResult = createCrawlResult();
    const snapshot = () => mergeCrawlResults(base, thisRun);

    const targets = await resolveTargets(job, crawler, ledger);
    const skip = resolveSkipSet(job, ledger, previous);
    ledger.updateSessionProgress({ productsDiscovered: targets.length });
    Logger.info(`Job ${job.id}: ${targets.length} target(s)`, { jobId: job.id, kind: job.kind });

    let interrupted = false;
    for (const url of targets) {
      if (options.signal?.aborted) {
        interrupted = true;
        break;
      }

      const productId = extractProductId(url);
      if (skip.has(productId)) {
        counters.skipped++;
        ledger.updateSessionProgress({ productsSkipped: counters.skipped });
        continue;
      }

      try {
        const html = await crawler.fetchProductPage(url);
        const candidate = extractProduct(html, url, crawler.baseUrl);
        if (!hasUsableData(candidate)) {
          throw new CrawlError("No product data found", "parse_failed", url);
        }

        const outcomes = await downloader.downloadImages(candidate.id, candidate.imageUrls);
        const images = outcomes.flatMap((o) => (o.record ? [o.record] : []));
        const failedCount = outcomes.filter((o) => o.status === "failed").length;
        const allFailed = candidate.imageUrls.length > 0 && images.length === 0;

        const product: Product = {
          id: candidate.id,
          name: candidate.name,
          url: candidate.url,
          price: candidate.price,
          category: candidate.category,
          images,
          crawledAt: nowIso(),
        };
        thisRun = addProduct(thisRun, product);
        if (!knownIds.has(product.id)) {
          knownIds.add(product.id);
          counters.newProducts++;
        }

        counters.crawled++;
        counters.newImages += outcomes.filter((o) => o.status === "downloaded").length;
        counters.imagesDownloaded += images.length;
        counters.imagesFailed += failedCount;

        ledger.addOrUpdateProduct({
          id: product.id,
          name: product.name,
          url: product.url,
          jobId: job.id,
          status: allFailed ? "failed" : "completed",
          imageCount: candidate.imageUrls.length,
          downloadedCount: images.length,
          failedCount,
          price: product.price,
          category: product.category,
        });

        if (allFailed) {
          const message = `All ${candidate.imageUrls.length} image downloads failed`;
          ledger.logError({
            jobId: job.id,
            kind: "download_failed",
            message,
            productId: product.id,
            url,
            retryCount: job.kind === "retry_failed" ? ledger.nextRetryCount(product.id) : 0,
          });
          ledger.markProductFailed(product.id, job.id, message);
        } else if (job.kind === "retry_failed") {
          ledger.resolveErrorsForProduct(product.id);
        }

        Logger.productCrawled(product.id, product.name, images.length, candidate.imageUrls.length);

        if (counters.crawled % checkpointEvery === 0) {
          metadataStore.save(snapshot());
          const elapsed = Math.max(1, (Date.now() - t0) / 1000);
          Logger.batchProgress(counters.crawled, targets.length, counters.crawled / elapsed);
        }
      } catch (error) {
        counters.failed++;
        const message = getErrorMessage(error);
        Logger.errorOccurred(url, error);
        ledger.logError({
          jobId: job.id,
          kind: classifyError(error),
          message,
          productId,
          url,
          retryCount: job.kind === "retry_failed" ? ledger.nextRetryCount(productId) : 0,
        });
        ledger.markProductFailed(productId, job.id, message);
      }

      ledger.updateSessionProgress({
        productsCrawled: counters.crawled,
        imagesDownloaded: counters.imagesDownloaded,
        imagesFailed: counters.imagesFailed,
        lastProductUrl: url,
      });
    }

    const result = snapshot();
    metadataStore.save(result);
    ledger.syncFromMetadata(result, metadataStore.filePath);

    const jobResult: JobResult = {
      // a lone product is the whole job; elsewhere product failures are contained
      success: job.kind !== "single_product" || counters.failed === 0,
      totalProducts: result.totalProducts,
      totalImages: result.totalImages,
      newProducts: counters.newProducts,
      newImages: counters.newImages,
      skippedProducts: counters.skipped,
      failedDownloads: counters.imagesFailed,
      errorMessage: null,
    };

    if (interrupted) {
      ledger.pauseJob(job.id);
      ledger.endSession("paused");
      Logger.warn(`Job ${job.id} paused`, { jobId: job.id, crawled: counters.crawled });
      return { jobId: job.id, status: "paused", result: jobResult, ...pick(counters) };
    }

    const done = ledger.completeJob(job.id, jobResult);
    ledger.endSession(done.status);
    Logger.info(`Job ${job.id} ${done.status}`, {
      jobId: job.id,
      duration: Date.now() - t0,
      ...pick(counters),
    });
    return { jobId: job.id, status: done.status, result: jobResult, ...pick(counters) };
  } catch (error) {
    Logger.error(`Job ${job.id} failed`, error, { jobId: job.id });
    ledger.completeJob(job.id, { ...emptyResult(getErrorMessage(error)), skippedProducts: counters.skipped });
    ledger.endSession("failed");
    throw error;
  }
}
