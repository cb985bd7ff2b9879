/**
 * Stats are never stored state of their own: they are recomputed from the
 * jobs and products collections before every write.
 */

import type { CrawlJob, JobKind, LedgerState, Stats } from "./schema";

const lastCompleted = (jobs: readonly CrawlJob[], kind: JobKind): string | null =>
  jobs
    .filter((j) => j.kind === kind && j.status === "completed")
    .map((j) => j.execution.completedAt)
    .reduce<string | null>((max, t) => (t !== null && (max === null || t > max) ? t : max), null);

/**
 * Derives the Stats block from the ledger collections
 */
export function computeStats(state: Pick<LedgerState, "jobs" | "products">): Stats {
  const { jobs } = state;
  const products = Object.values(state.products);
  const countJobs = (status: CrawlJob["status"]) =>
    jobs.filter((j) => j.status === status).length;

  const byCategory: Record<string, number> = {};
  for (const p of products) {
    if (p.category) byCategory[p.category] = (byCategory[p.category] ?? 0) + 1;
  }

  const downloaded = products.reduce((n, p) => n + p.images.downloaded, 0);
  const durations = jobs
    .filter((j) => j.status === "completed")
    .map((j) => j.execution.durationSeconds)
    .filter((d): d is number => d !== null);

  return {
    totalProducts: products.length,
    totalImages: downloaded,
    jobs: {
      total: jobs.length,
      pending: countJobs("pending"),
      inProgress: countJobs("in_progress"),
      paused: countJobs("paused"),
      completed: countJobs("completed"),
      failed: countJobs("failed"),
    },
    downloads: {
      successful: downloaded,
      failed: products.reduce((n, p) => n + p.images.failed, 0),
      skipped: jobs
        .filter((j) => j.status === "completed")
        .reduce((n, j) => n + (j.result?.skippedProducts ?? 0), 0),
    },
    byCategory,
    lastFullCrawl: lastCompleted(jobs, "full_crawl"),
    lastIncremental: lastCompleted(jobs, "incremental"),
    averageCrawlTimeSeconds:
      durations.length > 0
        ? Math.round(durations.reduce((a, b) => a + b, 0) / durations.length)
        : null,
  };
}
