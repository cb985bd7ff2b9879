import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ImageDownloader } from "../src/core/download/downloader";
import { imageExtension, imageFilename } from "../src/core/download/filename";
import { HttpStatusError } from "../src/core/utils/errors";
import { HTTP_RETRY_OPTIONS, NO_RETRY } from "../src/core/utils/retry";
import { FakeFetcher, makeTempDir, removeDir } from "./support/fakes";

const cdn = (file: string) => `https://store.example.com/cdn/shop/products/${file}`;

describe("imageFilename", () => {
  it("pads the index and keeps an allowed extension", () => {
    expect(imageFilename("tee", 1, cdn("a.PNG"))).toBe("tee_01.png");
    expect(imageFilename("tee", 12, cdn("a.webp"))).toBe("tee_12.webp");
  });

  it("falls back to .jpg", () => {
    expect(imageFilename("tee", 3, cdn("a"))).toBe("tee_03.jpg");
    expect(imageExtension(cdn("vector.svg"))).toBe(".jpg");
  });
});

describe("ImageDownloader", () => {
  let dir: string;
  let fetcher: FakeFetcher;

  beforeEach(() => {
    dir = makeTempDir();
    fetcher = new FakeFetcher();
  });

  afterEach(() => removeDir(dir));

  const downloader = (maxConcurrent = 5) =>
    new ImageDownloader(fetcher, { outputDir: dir, maxConcurrent, retry: NO_RETRY });

  it("contains partial failures and keeps URL order", async () => {
    const urls = ["1.jpg", "2.jpg", "3.png", "4.jpg", "5.webp"].map(cdn);
    fetcher.failures.set(urls[1] ?? "", new HttpStatusError(404, urls[1] ?? ""));
    fetcher.failures.set(urls[3] ?? "", new HttpStatusError(503, urls[3] ?? ""));

    const outcomes = await downloader().downloadImages("tee", urls);

    expect(outcomes.map((o) => o.status)).toEqual([
      "downloaded",
      "failed",
      "downloaded",
      "failed",
      "downloaded",
    ]);
    expect(outcomes[1]?.error).toBe(`HTTP 404 for ${urls[1]}`);
    expect(outcomes[1]?.record).toBeUndefined();

    const files = fs.readdirSync(dir).sort();
    expect(files).toEqual(["tee_01.jpg", "tee_03.png", "tee_05.webp"]);
  });

  it("returns only records for images on disk", async () => {
    const urls = ["1.jpg", "2.jpg", "3.jpg"].map(cdn);
    fetcher.failures.set(urls[2] ?? "", new Error("fetch failed"));

    const records = await downloader().downloadProductImages("cap", urls);

    expect(records.map((r) => r.filename)).toEqual(["cap_01.jpg", "cap_02.jpg"]);
    expect(records[0]).toMatchObject({
      originalUrl: urls[0],
      localPath: path.join(dir, "cap_01.jpg"),
    });
  });

  it("skips files that already exist without fetching", async () => {
    fs.writeFileSync(path.join(dir, "tee_01.jpg"), "old");
    const urls = [cdn("1.jpg"), cdn("2.jpg")];

    const outcomes = await downloader().downloadImages("tee", urls);

    expect(outcomes.map((o) => o.status)).toEqual(["existing", "downloaded"]);
    expect(fetcher.calls).toEqual([urls[1]]);
    expect(fs.readFileSync(path.join(dir, "tee_01.jpg"), "utf8")).toBe("old");
  });

  it("reuses files from an earlier run instead of fetching again", async () => {
    const urls = [cdn("1.jpg"), cdn("2.jpg")];
    await downloader().downloadImages("tee", urls);

    const again = await downloader().downloadImages("tee", urls);

    expect(again.map((o) => o.status)).toEqual(["existing", "existing"]);
    expect(again.map((o) => o.record?.filename)).toEqual(["tee_01.jpg", "tee_02.jpg"]);
    expect(fetcher.calls).toHaveLength(2);
  });

  it("never leaves partial files behind", async () => {
    await downloader().downloadImages("tee", [cdn("1.jpg"), cdn("2.jpg")]);
    expect(fs.readdirSync(dir).filter((f) => f.endsWith(".part"))).toEqual([]);
  });

  it("bounds concurrent fetches", async () => {
    fetcher.delayMs = 10;
    const urls = Array.from({ length: 6 }, (_, i) => cdn(`${i}.jpg`));

    await downloader(2).downloadImages("tee", urls);

    expect(fetcher.calls).toHaveLength(6);
    expect(fetcher.maxInFlight).toBeLessThanOrEqual(2);
  });

  it("retries transient failures", async () => {
    const url = cdn("flaky.jpg");
    let attempts = 0;
    const flaky = {
      async fetch(u: string): Promise<Uint8Array> {
        attempts++;
        if (attempts === 1) throw new Error("fetch failed");
        return new TextEncoder().encode(u);
      },
    };
    const retrying = new ImageDownloader(flaky, {
      outputDir: dir,
      maxConcurrent: 1,
      retry: { ...HTTP_RETRY_OPTIONS, baseDelayMs: 0, jitterMs: 0 },
    });

    const outcomes = await retrying.downloadImages("tee", [url]);

    expect(outcomes[0]?.status).toBe("downloaded");
    expect(attempts).toBe(2);
  });

  it("does nothing for an empty list", async () => {
    expect(await downloader().downloadImages("tee", [])).toEqual([]);
    expect(fetcher.calls).toEqual([]);
  });
});
