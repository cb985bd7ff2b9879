import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCrawl, type CrawlOptions } from "../src/core/execution/runner";
import { CrawlLedger } from "../src/core/ledger/ledger";
import { MetadataStore } from "../src/core/storage/metadata-store";
import { CrawlError, HttpStatusError } from "../src/core/utils/errors";
import { NO_RETRY } from "../src/core/utils/retry";
import {
  BASE_URL,
  FakeFetcher,
  FakeRenderer,
  listingPage,
  listingUrl,
  makeTempDir,
  productPage,
  productUrl,
  removeDir,
} from "./support/fakes";

const TEE = productUrl("classic-tee");
const HOODIE = productUrl("hoodie");
const BROKEN = productUrl("broken");
const HOODIE_IMAGE = `${BASE_URL}/cdn/shop/products/hoodie.png`;

describe("runCrawl", () => {
  let dir: string;
  let imagesDir: string;
  let metadataFile: string;
  let renderer: FakeRenderer;
  let fetcher: FakeFetcher;
  let ledger: CrawlLedger;
  let metadataStore: MetadataStore;

  const options = (overrides: Partial<CrawlOptions> = {}): CrawlOptions => ({
    kind: "full_crawl",
    store: { baseUrl: BASE_URL, collectionPath: "/collections/all" },
    agent: "test-agent",
    maxPages: 5,
    checkpointEvery: 10,
    downloadRetry: NO_RETRY,
    ...overrides,
    config: {
      headless: true,
      delayMs: 0,
      maxConcurrentDownloads: 2,
      outputDir: imagesDir,
      metadataFile,
      ...overrides.config,
    },
  });

  const deps = () => ({ renderer, fetcher, ledger, metadataStore });

  beforeEach(() => {
    dir = makeTempDir();
    imagesDir = path.join(dir, "images");
    metadataFile = path.join(dir, "metadata.json");
    renderer = new FakeRenderer(
      new Map([
        [listingUrl(1), listingPage(["classic-tee", "hoodie", "broken"])],
        [TEE, productPage("Classic Tee", ["tee.jpg", "tee-back.jpg"])],
        [HOODIE, productPage("Hoodie", ["hoodie.png"], `<a href="/collections/outerwear">Outerwear</a>`)],
        [BROKEN, "<html><body>gone</body></html>"],
      ]),
    );
    fetcher = new FakeFetcher();
    ledger = new CrawlLedger(path.join(dir, "ledger.json"), { targetSite: BASE_URL });
    metadataStore = new MetadataStore(metadataFile);
  });

  afterEach(() => removeDir(dir));

  it("crawls the catalog and records every outcome", async () => {
    const summary = await runCrawl(options(), deps());

    expect(summary).toEqual({
      jobId: "JOB-001",
      status: "completed",
      crawled: 2,
      skipped: 0,
      failed: 1,
      imagesDownloaded: 3,
      imagesFailed: 0,
      result: {
        success: true,
        totalProducts: 2,
        totalImages: 3,
        newProducts: 2,
        newImages: 3,
        skippedProducts: 0,
        failedDownloads: 0,
        errorMessage: null,
      },
    });
    expect(renderer.rendered).toEqual([listingUrl(1), listingUrl(2), TEE, HOODIE, BROKEN]);
    expect(fs.readdirSync(imagesDir).sort()).toEqual([
      "classic-tee_01.jpg",
      "classic-tee_02.jpg",
      "hoodie_01.png",
    ]);

    const snapshot = metadataStore.load();
    expect(snapshot?.products.map((p) => [p.id, p.name, p.category])).toEqual([
      ["classic-tee", "Classic Tee", null],
      ["hoodie", "Hoodie", "OUTERWEAR"],
    ]);

    expect(ledger.getErrors()).toEqual([
      expect.objectContaining({
        id: "ERR-001",
        kind: "parse_failed",
        productId: "broken",
        url: BROKEN,
        message: "No product data found",
        retryCount: 0,
      }),
    ]);
    expect(ledger.getProduct("broken")).toBeUndefined();
    expect(ledger.getJob("JOB-001")?.status).toBe("completed");
    expect(ledger.currentSession).toMatchObject({
      jobId: "JOB-001",
      status: "completed",
      progress: {
        productsDiscovered: 3,
        productsCrawled: 2,
        productsSkipped: 0,
        imagesDownloaded: 3,
        imagesFailed: 0,
        currentPage: 1,
        lastProductUrl: BROKEN,
      },
    });
    expect(ledger.getState().metadataSync.syncStatus).toBe("in_sync");
    expect(ledger.getStats().byCategory).toEqual({ OUTERWEAR: 1 });
  });

  it("skips products already in the snapshot on incremental runs", async () => {
    await runCrawl(options(), deps());
    const summary = await runCrawl(options({ kind: "incremental" }), deps());

    expect(summary).toMatchObject({ jobId: "JOB-002", status: "completed", crawled: 0, skipped: 2, failed: 1 });
    expect(summary.result).toMatchObject({ newProducts: 0, skippedProducts: 2, totalProducts: 2 });
    expect(fetcher.calls).toHaveLength(3);
    expect(ledger.getErrors()).toHaveLength(2);
  });

  it("checkpoints the snapshot every N crawled products and at the end", async () => {
    const save = vi.spyOn(metadataStore, "save");
    await runCrawl(options({ checkpointEvery: 1 }), deps());
    expect(save).toHaveBeenCalledTimes(3);
  });

  it("flags products whose every image failed", async () => {
    fetcher.failures.set(HOODIE_IMAGE, new HttpStatusError(404, HOODIE_IMAGE));

    const summary = await runCrawl(options(), deps());

    expect(summary).toMatchObject({ crawled: 2, failed: 1, imagesDownloaded: 2, imagesFailed: 1 });
    expect(summary.result.failedDownloads).toBe(1);
    expect(ledger.getProduct("hoodie")).toMatchObject({
      status: "failed",
      images: { total: 1, downloaded: 0, failed: 1, status: "failed" },
      errors: ["All 1 image downloads failed"],
    });
    expect(ledger.getErrors()[0]).toMatchObject({ kind: "download_failed", productId: "hoodie" });
    expect(ledger.getRetryTargets()).toEqual([HOODIE, BROKEN]);
  });

  it("keeps the images that arrived when only some downloads fail", async () => {
    const files = ["t1.jpg", "t2.jpg", "t3.jpg", "t4.jpg", "t5.jpg"];
    renderer.pages.set(TEE, productPage("Classic Tee", files));
    for (const file of ["t2.jpg", "t4.jpg"]) {
      const url = `${BASE_URL}/cdn/shop/products/${file}`;
      fetcher.failures.set(url, new HttpStatusError(404, url));
    }

    const summary = await runCrawl(options({ kind: "single_product", target: TEE }), deps());

    expect(summary).toMatchObject({ status: "completed", crawled: 1, failed: 0, imagesDownloaded: 3, imagesFailed: 2 });
    expect(metadataStore.load()?.products[0]?.images.map((i) => i.filename)).toEqual([
      "classic-tee_01.jpg",
      "classic-tee_03.jpg",
      "classic-tee_05.jpg",
    ]);
    expect(ledger.getProduct("classic-tee")).toMatchObject({
      status: "completed",
      images: { total: 5, downloaded: 3, failed: 2, status: "completed" },
      errors: [],
    });
    expect(ledger.getErrors()).toEqual([]);
  });

  it("re-crawls known products without skipping but reuses their files", async () => {
    await runCrawl(options(), deps());
    const summary = await runCrawl(options({ config: { skipExisting: false } }), deps());

    expect(summary).toMatchObject({ jobId: "JOB-002", crawled: 2, skipped: 0, imagesDownloaded: 3 });
    expect(summary.result).toMatchObject({ newProducts: 0, newImages: 0 });
    expect(fetcher.calls).toHaveLength(3);
    expect(ledger.getProduct("classic-tee")?.crawlInfo.crawlCount).toBe(2);
  });

  it("classifies render timeouts", async () => {
    renderer.failures.set(HOODIE, new Error("page.goto: Timeout 30000ms exceeded."));

    const summary = await runCrawl(options(), deps());

    expect(summary).toMatchObject({ crawled: 1, failed: 2 });
    expect(ledger.getErrors().map((e) => [e.productId, e.kind])).toEqual([
      ["hoodie", "timeout"],
      ["broken", "parse_failed"],
    ]);
  });

  it("retries failed products and resolves their errors", async () => {
    await runCrawl(options(), deps());
    renderer.pages.set(BROKEN, productPage("Fixed Tee", ["fixed.jpg"]));

    const summary = await runCrawl(options({ kind: "retry_failed" }), deps());

    expect(summary).toMatchObject({ jobId: "JOB-002", status: "completed", crawled: 1, failed: 0 });
    expect(renderer.rendered.slice(-1)).toEqual([BROKEN]);
    expect(ledger.getUnresolvedErrors()).toEqual([]);
    expect(ledger.getProduct("broken")?.status).toBe("completed");
    expect(metadataStore.load()?.products.map((p) => p.id)).toEqual(["classic-tee", "hoodie", "broken"]);
  });

  it("counts repeated failures on retry", async () => {
    await runCrawl(options(), deps());
    await runCrawl(options({ kind: "retry_failed" }), deps());

    expect(ledger.getErrors().map((e) => [e.id, e.retryCount])).toEqual([
      ["ERR-001", 0],
      ["ERR-002", 1],
    ]);
  });

  it("crawls a single product without discovery", async () => {
    const summary = await runCrawl(options({ kind: "single_product", target: TEE }), deps());

    expect(summary).toMatchObject({ status: "completed", crawled: 1, imagesDownloaded: 2 });
    expect(renderer.rendered).toEqual([TEE]);
    expect(ledger.getJob(summary.jobId)).toMatchObject({ kind: "single_product", target: TEE });
  });

  it("keeps earlier products in the cumulative snapshot", async () => {
    await runCrawl(options(), deps());
    await runCrawl(options({ kind: "single_product", target: TEE }), deps());

    expect(metadataStore.load()?.products.map((p) => p.id)).toEqual(["classic-tee", "hoodie"]);
  });

  it("fails a single-product job when that product fails", async () => {
    const summary = await runCrawl(options({ kind: "single_product", target: BROKEN }), deps());

    expect(summary.status).toBe("failed");
    expect(ledger.getJob(summary.jobId)?.status).toBe("failed");
  });

  it("rejects single-product jobs without a target", async () => {
    await expect(runCrawl(options({ kind: "single_product" }), deps())).rejects.toBeInstanceOf(
      CrawlError,
    );
    expect(ledger.getJobs()).toEqual([]);
  });

  it("pauses on abort and resumes where it stopped", async () => {
    const controller = new AbortController();
    renderer.onRender = (url) => {
      if (url === TEE) controller.abort();
    };

    const paused = await runCrawl(
      options({ signal: controller.signal, config: { skipExisting: false } }),
      deps(),
    );

    expect(paused).toMatchObject({ jobId: "JOB-001", status: "paused", crawled: 1 });
    expect(ledger.getJob("JOB-001")).toMatchObject({ status: "paused", result: null });
    expect(ledger.currentSession?.status).toBe("paused");
    expect(metadataStore.load()?.products.map((p) => p.id)).toEqual(["classic-tee"]);

    renderer.onRender = undefined;
    const resumed = await runCrawl(options({ resumeJobId: "JOB-001" }), deps());

    expect(resumed).toMatchObject({ jobId: "JOB-001", status: "completed", crawled: 1, skipped: 1, failed: 1 });
    expect(resumed.result.totalProducts).toBe(2);
    expect(fetcher.calls).toHaveLength(3);
    expect(ledger.getJobs()).toHaveLength(1);
  });

  it("resumes a job a killed process left in progress", async () => {
    const orphan = ledger.createJob("full_crawl", options().config);
    ledger.startJob(orphan.id, "gone-agent");

    const summary = await runCrawl(options({ resumeJobId: orphan.id }), deps());

    expect(summary).toMatchObject({ jobId: orphan.id, status: "completed", crawled: 2, failed: 1 });
    expect(ledger.getJobs()).toHaveLength(1);
    expect(ledger.getStats().jobs).toMatchObject({ inProgress: 0, completed: 1 });
  });

  it("fails the job when discovery breaks", async () => {
    renderer.failures.set(listingUrl(1), new Error("browser crashed"));

    await expect(runCrawl(options(), deps())).rejects.toThrow("browser crashed");

    expect(ledger.getJob("JOB-001")).toMatchObject({
      status: "failed",
      result: { success: false, errorMessage: "browser crashed" },
    });
    expect(ledger.currentSession?.status).toBe("failed");
  });
});
