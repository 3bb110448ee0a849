import TurndownService from "turndown";
import type { CrawlOptions } from "./types";

export const TEST_PAGE_LIMIT = 5;

export const DEFAULT_OPTIONS: CrawlOptions = {
  command: "crawl",
  outDir: "output",
  concurrency: 5,
  delayMs: 500,
  timeoutMs: 10_000,
  retries: 3,
  retryBackoffMs: 1000,
  maxDepth: 3,
  locale: "en-US",
  externalSections: ["/api/"],
  userAgent: "docbinder/1.0",
  verbose: false,
  progress: true,
  compile: true,
};

export const STRUCTURE_FILE = "structure.json";
export const COMPILED_FILE = "compiled-documentation.md";
export const PAGE_EXTENSION = ".md";

/** Tried in order; the first match is the page's main content region. */
export const CONTENT_SELECTORS = [
  "main",
  "article",
  ".main-content",
  ".content",
  "#content",
];

export const NON_CONTENT_SELECTORS = [
  ".interactive",
  ".interactive-example",
  "iframe",
  ".metadata",
  ".article-footer",
  ".page-footer",
  ".document-toc",
  ".toc",
  ".sidebar",
  "aside",
  "footer",
  "nav",
  "script",
  "style",
  "noscript",
  "template",
];

export const HEADING_TAGS = new Set(["H1", "H2", "H3", "H4", "H5", "H6"]);

export const LEAF_BLOCK_TAGS = new Set([
  "P",
  "UL",
  "OL",
  "DL",
  "PRE",
  "TABLE",
  "BLOCKQUOTE",
]);

export const STRUCTURAL_SELECTOR =
  "h1, h2, h3, h4, h5, h6, p, ul, ol, dl, pre, table, blockquote";

export const BLOCKED_EXTENSIONS_REGEX =
  /\.(png|jpe?g|gif|svg|webp|ico|pdf|zip|tar|gz|mp4|mp3|woff2?|ttf|eot|css|js)$/i;

export const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export const LINE_SPLIT_REGEX = /\r?\n/;
export const WHITESPACE_RUN_REGEX = /\s+/g;

export const turndownService = new TurndownService({
  headingStyle: "atx",
  bulletListMarker: "-",
  codeBlockStyle: "fenced",
});

interface TurndownNode {
  nodeName?: string;
  childNodes?: ArrayLike<TurndownNode>;
  textContent?: string | null;
}

const collapseWhitespace = (value: string): string =>
  value.replace(WHITESPACE_RUN_REGEX, " ").trim();

const collectTextContent = (node: TurndownNode | null | undefined): string => {
  if (!node) {
    return "";
  }

  const childNodes = node.childNodes ? Array.from(node.childNodes) : [];
  if (childNodes.length === 0) {
    return node.textContent ?? "";
  }

  const parts = childNodes
    .map((child) => collectTextContent(child))
    .filter((text) => text.trim().length > 0);

  return collapseWhitespace(parts.join(" "));
};

const getCellContent = (cell: TurndownNode, content: string): string => {
  const text = content.trim() || collectTextContent(cell);
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ").trim();
};

turndownService.addRule("tableCell", {
  filter: ["th", "td"],
  replacement(content, node): string {
    return ` ${getCellContent(node, content)} |`;
  },
});

turndownService.addRule("tableRow", {
  filter: "tr",
  replacement(content, node): string {
    const isHeaderRow = Array.from(node.childNodes).some(
      (cell) => cell.nodeName === "TH"
    );
    const row = `|${content}\n`;
    if (!isHeaderRow) {
      return row;
    }
    const cellCount = Array.from(node.childNodes).filter(
      (cell) => cell.nodeName === "TH" || cell.nodeName === "TD"
    ).length;
    return `${row}|${" --- |".repeat(cellCount)}\n`;
  },
});

turndownService.addRule("tableSection", {
  filter: ["thead", "tbody", "tfoot"],
  replacement(content): string {
    return content;
  },
});

turndownService.addRule("table", {
  filter: "table",
  replacement(content): string {
    return `\n\n${content.trim()}\n\n`;
  },
});
