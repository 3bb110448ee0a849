export interface CrawlOptions {
  command: "crawl" | "compile";
  startUrl?: string;
  outDir: string;
  concurrency: number;
  delayMs: number;
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
  maxDepth: number;
  maxPages?: number;
  locale: string | null;
  externalSections: string[];
  userAgent: string;
  verbose: boolean;
  progress: boolean;
  compile: boolean;
}

/** Where a crawl is allowed to go and which links count as internal. */
export interface CrawlScope {
  domain: string;
  origin: string;
  basePath: string;
  locale: string | null;
  externalSections: string[];
}

export interface DocumentNode {
  title: string;
  sourceUrl: string;
  contentFile?: string;
  children: DocumentNode[];
}

export interface Section {
  headingLevel: number | null;
  headingText: string;
  bodyLines: string[];
}

export interface PageContent {
  title: string;
  sourceUrl: string;
  renderedLines: string[];
}

export type FetchFailureKind = "status" | "timeout" | "network";

export interface FetchFailure {
  kind: FetchFailureKind;
  url: string;
  status?: number;
  message: string;
}

export type FetchResult =
  | { ok: true; body: string }
  | { ok: false; failure: FetchFailure };

export type PageFetcher = (url: string) => Promise<FetchResult>;

export interface PageStore {
  save(page: PageContent): Promise<string>;
  load(contentFile: string): Promise<string | null>;
}

export interface CrawlReport {
  root: DocumentNode;
  claimed: string[];
  savedCount: number;
  failures: FetchFailure[];
}

export type CompileResult =
  | { ok: true; outputPath: string; pageCount: number }
  | {
      ok: false;
      reason: "missing-structure" | "invalid-structure";
      message: string;
    };
