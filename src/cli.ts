import "dotenv/config";
import {
  AppConfig,
  CrawlLedger,
  HttpImageFetcher,
  Logger,
  LogLevel,
  MetadataStore,
  PlaywrightRenderer,
  formatErrors,
  formatStatus,
  getErrorMessage,
  runCrawl,
  type CrawlOptions,
  type JobConfig,
} from "./core/index";

const USAGE = `Usage:
  npm run cli -- crawl [--incremental] [options]   Discover and crawl the whole catalog
  npm run cli -- resume <jobId> [-c ledger]        Continue a paused or interrupted job
  npm run cli -- retry [options]                   Re-crawl products with open errors
  npm run cli -- product <url> [options]           Crawl a single product page
  npm run cli -- status [-c ledger]                Ledger summary
  npm run cli -- errors [-c ledger] [-n limit]     Unresolved errors
  npm run cli -- resolve <errorId> [-c ledger]     Mark an error resolved

Options:
  -o, --output      Image output directory (default: ${AppConfig.OUTPUT_DIR})
  -m, --metadata    Metadata file (default: ${AppConfig.METADATA_FILE})
  -c, --ledger      Ledger file (default: ${AppConfig.LEDGER_FILE})
  -d, --delay       Seconds between page loads (default: ${AppConfig.DELAY_MS / 1000})
  --no-headless     Show the browser window
  --no-skip         Re-crawl products already in the metadata file
  -v, --verbose     Debug logging`;

const print = (text: string) => process.stdout.write(`${text}\n`);

/**
 * Runs a crawl with a real browser and HTTP transport.
 * SIGINT pauses the job after the product in flight.
 */
async function execute(
  options: CrawlOptions,
  ledger: CrawlLedger,
  headless: boolean,
): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = () => {
    Logger.warn("Interrupt received, pausing after the current product");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const renderer = new PlaywrightRenderer({ headless });
  try {
    const summary = await runCrawl(
      { ...options, signal: controller.signal },
      { renderer, fetcher: new HttpImageFetcher(), ledger },
    );
    Logger.info(
      `Job ${summary.jobId} ${summary.status}: ${summary.crawled} crawled, ` +
        `${summary.skipped} skipped, ${summary.failed} failed, ` +
        `${summary.imagesDownloaded} images`,
    );
    if (summary.status === "paused") {
      Logger.info(`Resume with: npm run cli -- resume ${summary.jobId}`);
    }
    return summary.status === "completed" ? 0 : 1;
  } finally {
    process.off("SIGINT", onInterrupt);
    await renderer.close();
  }
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  const hasFlag = (...flags: string[]) => flags.some((f) => argv.includes(f));
  const getArg = (...flags: string[]) => {
    for (const flag of flags) {
      const i = argv.lastIndexOf(flag);
      if (i >= 0) return argv[i + 1];
    }
    return undefined;
  };

  const [command, positional] = argv;

  if (!command || hasFlag("--help", "-h")) {
    Logger.info(USAGE);
    return command ? 0 : 1;
  }
  if (hasFlag("-v", "--verbose")) Logger.setLevel(LogLevel.DEBUG);

  const ledger = new CrawlLedger(getArg("-c", "--ledger") ?? AppConfig.LEDGER_FILE);

  const delayArg = getArg("-d", "--delay");
  const delaySeconds = delayArg === undefined ? undefined : Number(delayArg);
  if (delaySeconds !== undefined && !(Number.isFinite(delaySeconds) && delaySeconds >= 0)) {
    Logger.error(`Invalid delay: ${delayArg}`);
    return 1;
  }

  const config: Partial<JobConfig> = {
    headless: !hasFlag("--no-headless") && AppConfig.HEADLESS,
    skipExisting: !hasFlag("--no-skip"),
    outputDir: getArg("-o", "--output") ?? AppConfig.OUTPUT_DIR,
    metadataFile: getArg("-m", "--metadata") ?? AppConfig.METADATA_FILE,
    ...(delaySeconds !== undefined ? { delayMs: Math.round(delaySeconds * 1000) } : {}),
  };
  const headless = config.headless ?? AppConfig.HEADLESS;

  switch (command) {
    case "crawl":
      return execute(
        { kind: hasFlag("--incremental") ? "incremental" : "full_crawl", config },
        ledger,
        headless,
      );

    case "retry": {
      const targets = ledger.getRetryTargets();
      if (targets.length === 0) {
        Logger.info("Nothing to retry");
        return 0;
      }
      return execute({ kind: "retry_failed", config, priority: "high" }, ledger, headless);
    }

    case "product":
      if (!positional) {
        Logger.error("Missing product URL");
        return 1;
      }
      return execute({ kind: "single_product", target: positional, config }, ledger, headless);

    case "resume": {
      const job = positional ? ledger.getJob(positional) : undefined;
      if (!job) {
        Logger.error(`Unknown job: ${positional ?? "(none)"}`);
        return 1;
      }
      return execute({ kind: job.kind, resumeJobId: job.id }, ledger, job.config.headless);
    }

    case "status": {
      const metadata = new MetadataStore(config.metadataFile ?? AppConfig.METADATA_FILE);
      ledger.syncFromMetadata(metadata.load(), metadata.filePath);
      print(formatStatus(ledger.summary()));
      return 0;
    }

    case "errors": {
      const limit = Number(getArg("-n", "--limit") ?? "20");
      print(formatErrors(ledger.getUnresolvedErrors(), Number.isFinite(limit) ? limit : 20));
      return 0;
    }

    case "resolve":
      if (!positional || !ledger.resolveError(positional)) {
        Logger.error(`Unknown error id: ${positional ?? "(none)"}`);
        return 1;
      }
      Logger.info(`Resolved ${positional}`);
      return 0;

    default:
      Logger.error(`Unknown command: ${command}`);
      Logger.info(USAGE);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((e: unknown) => {
    Logger.error(`❌ ${getErrorMessage(e)}`, e);
    process.exit(1);
  });
