/**
 * Plain-text rendering of ledger state for the CLI
 */

import type { LedgerSummary } from "./ledger";
import type { ErrorEntry } from "./schema";

export function formatStatus(summary: LedgerSummary): string {
  const { session, stats, errors, metadataSync } = summary;
  const categories = Object.entries(stats.byCategory)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, n]) => `    ${name}: ${n}`);

  return [
    `=== ${summary.project} status ===`,
    `Target: ${summary.targetSite}`,
    `Updated: ${summary.updatedAt}`,
    "",
    "Session:",
    `  ID: ${session?.id ?? "None"}`,
    `  Status: ${session?.status ?? "No active session"}`,
    ...(session
      ? [
          `  Progress: ${session.progress.productsCrawled} crawled, ` +
            `${session.progress.productsSkipped} skipped, ` +
            `${session.progress.imagesDownloaded} images`,
        ]
      : []),
    "",
    "Statistics:",
    `  Products: ${stats.totalProducts}`,
    `  Images: ${stats.totalImages}`,
    `  Jobs: ${stats.jobs.completed}/${stats.jobs.total} completed, ${stats.jobs.failed} failed, ${stats.jobs.paused} paused`,
    `  Errors: ${errors.unresolved} unresolved of ${errors.total}`,
    ...(categories.length > 0 ? ["  Categories:", ...categories] : []),
    "",
    "Metadata Sync:",
    `  Status: ${metadataSync.syncStatus}`,
    `  Last Sync: ${metadataSync.lastSync ?? "Never"}`,
  ].join("\n");
}

/**
 * One block per error, oldest first: headline, then owning job and URL.
 * Anything beyond `limit` is summarized.
 */
export function formatErrors(errors: readonly ErrorEntry[], limit = 20): string {
  if (errors.length === 0) return "No unresolved errors.";

  const shown = errors.slice(0, Math.max(0, limit));
  const lines = shown.flatMap((e) => [
    `[${e.id}] ${e.kind} ${e.productId ?? "-"}: ${e.message}` +
      (e.retryCount > 0 ? ` (retry ${e.retryCount})` : ""),
    `  Job: ${e.jobId}`,
    ...(e.url ? [`  URL: ${e.url}`] : []),
  ]);
  const rest = errors.length - shown.length;
  if (rest > 0) lines.push(`... and ${rest} more`);
  return lines.join("\n");
}
