import { extractPageContent, parseHtml } from "./content";
import { extractPageLinks, shouldFollowLink } from "./links";
import { logger } from "./logger";
import { createRootNode } from "./tree";
import type {
  CrawlOptions,
  CrawlReport,
  DocumentNode,
  FetchFailure,
  PageFetcher,
  PageStore,
} from "./types";
import { buildCrawlScope } from "./utils";
import { VisitedSet } from "./visited-set";
import { WorkerPool } from "./worker-pool";

export interface CrawlDeps {
  fetchPage: PageFetcher;
  store: PageStore;
  signal?: AbortSignal;
}

export type CrawlSettings = Pick<
  CrawlOptions,
  "concurrency" | "maxDepth" | "maxPages" | "locale" | "externalSections"
>;

interface ProcessedPage {
  node: DocumentNode;
  links: string[];
}

const isPresent = <T>(value: T | null): value is T => value !== null;

/**
 * Crawl the documentation tree under `startUrl`.
 *
 * Each page is fetched, extracted and saved inside a slot of one shared
 * worker pool; its accepted links are then crawled concurrently and the page
 * waits for all of them before returning its node. The slot is released
 * before the wait, so deep trees cannot starve the pool.
 */
export async function crawlDocumentation(
  startUrl: string,
  options: CrawlSettings,
  deps: CrawlDeps
): Promise<CrawlReport> {
  // links are claimed in their resolved form, so the start URL must be too
  const start = new URL(startUrl).href;
  const scope = buildCrawlScope(start, options);
  const visited = new VisitedSet(options.maxPages);
  const pool = new WorkerPool(options.concurrency);
  const failures: FetchFailure[] = [];
  let savedCount = 0;

  const processPage = async (
    url: string,
    depth: number
  ): Promise<ProcessedPage | null> => {
    const fetched = await deps.fetchPage(url);
    if (!fetched.ok) {
      failures.push(fetched.failure);
      logger.recordFailure();
      logger.error(`Failed ${url}: ${fetched.failure.message}`);
      return null;
    }

    const document = parseHtml(fetched.body, url);
    const page = extractPageContent(document, url, scope);
    if (!page) {
      logger.logSkipped(`no main content region in ${url}`);
      return null;
    }

    let contentFile: string;
    try {
      contentFile = await deps.store.save(page);
    } catch (error) {
      logger.recordFailure();
      logger.error(`Failed to save ${url}: ${String(error)}`);
      return null;
    }
    savedCount += 1;
    logger.updateProgress({ saved: savedCount, url });
    logger.logPageSaved(url, contentFile, depth);

    const links = extractPageLinks(document, new URL(url)).filter((link) =>
      shouldFollowLink(link, scope)
    );
    return {
      node: { title: page.title, sourceUrl: url, contentFile, children: [] },
      links,
    };
  };

  const crawlUrl = async (
    url: string,
    depth: number
  ): Promise<DocumentNode | null> => {
    if (depth > options.maxDepth || deps.signal?.aborted) {
      return null;
    }

    const outcome = visited.claim(url);
    if (outcome !== "claimed") {
      if (outcome === "limit") {
        logger.logSkipped(`page limit reached before ${url}`);
      }
      return null;
    }
    logger.updateProgress({ total: visited.size, url });

    const processed = await pool.run(() => processPage(url, depth));
    if (!processed) {
      return null;
    }

    const children = await Promise.all(
      processed.links.map((link) => crawlUrl(link, depth + 1))
    );
    processed.node.children = children.filter(isPresent);
    return processed.node;
  };

  logger.startProgress(1);
  try {
    const root = (await crawlUrl(start, 0)) ?? createRootNode(start);
    return {
      root,
      claimed: visited.toArray(),
      savedCount,
      failures,
    };
  } finally {
    logger.endProgress();
  }
}
