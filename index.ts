export { parseArgs, printHelp } from "./src/args";
export {
  anchorForFile,
  buildTableOfContents,
  compileDocument,
  compileDocumentation,
  type ContentLookup,
} from "./src/compiler";
export { DEFAULT_OPTIONS, TEST_PAGE_LIMIT } from "./src/constants";
export {
  extractPageContent,
  flattenRegion,
  parseHtml,
  partitionAtHeadings,
} from "./src/content";
export { type CrawlDeps, crawlDocumentation } from "./src/crawler";
export { FsPageStore, writeStructure } from "./src/io";
export {
  extractPageLinks,
  rewriteHref,
  shouldFollowLink,
} from "./src/links";
export { logger } from "./src/logger";
export { createPageFetcher, RateLimiter } from "./src/network";
export { crawlSite, runCliFlow } from "./src/scraper";
export { parseStructure, walkPreOrder } from "./src/tree";
export type {
  CompileResult,
  CrawlOptions,
  CrawlReport,
  CrawlScope,
  DocumentNode,
  FetchFailure,
  FetchResult,
  PageContent,
  PageFetcher,
  PageStore,
  Section,
} from "./src/types";
export { buildCrawlScope, slugify } from "./src/utils";
export { VisitedSet } from "./src/visited-set";
export { WorkerPool } from "./src/worker-pool";
