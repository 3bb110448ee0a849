import { compileDocumentation } from "./compiler";
import { crawlDocumentation } from "./crawler";
import { FsPageStore, writeStructure } from "./io";
import { logger } from "./logger";
import { createPageFetcher, RateLimiter } from "./network";
import type { CompileResult, CrawlOptions, CrawlReport } from "./types";
import { ensureDir } from "./utils";

export async function crawlSite(
  startUrl: string,
  options: CrawlOptions
): Promise<CrawlReport> {
  logger.logCrawlStart(startUrl, {
    outDir: options.outDir,
    maxDepth: options.maxDepth,
    maxPages: options.maxPages ?? "unbounded",
    delay: `${options.delayMs}ms`,
    concurrency: options.concurrency,
    locale: options.locale ?? "any",
  });

  await ensureDir(options.outDir);
  const limiter = new RateLimiter(options.delayMs);
  const report = await crawlDocumentation(startUrl, options, {
    fetchPage: createPageFetcher(options, { limiter }),
    store: new FsPageStore(options.outDir),
  });

  const structureFile = await writeStructure(options.outDir, report.root);
  logger.info(
    `Crawled ${report.claimed.length} URL(s), saved ${report.savedCount} page(s); structure written to ${structureFile}`
  );
  logger.printFailureSummary(
    report.failures.map((failure) => `${failure.url}: ${failure.message}`)
  );

  return report;
}

export async function runCliFlow(
  options: CrawlOptions
): Promise<CompileResult | null> {
  if (options.command === "crawl") {
    if (!options.startUrl) {
      throw new Error("A start URL is required to crawl");
    }
    await crawlSite(options.startUrl, options);
    if (!options.compile) {
      return null;
    }
  }

  return await compileDocumentation(options.outDir);
}
