import { mkdir, stat } from "node:fs/promises";
import { BLOCKED_EXTENSIONS_REGEX, WHITESPACE_RUN_REGEX } from "./constants";
import type { CrawlOptions, CrawlScope } from "./types";

const COMBINING_MARKS_REGEX = /[\u0300-\u036f]/g;
const NON_SLUG_CHARS_REGEX = /[^a-z0-9]+/g;
const EDGE_DASHES_REGEX = /^-+|-+$/g;
const TRAILING_SLASH_REGEX = /\/+$/;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function parsePositiveInt(
  raw: string | undefined,
  fallback: number
): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function parseNonNegativeInt(
  raw: string | undefined,
  fallback: number
): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export function collapseWhitespace(value: string): string {
  return value.replace(WHITESPACE_RUN_REGEX, " ").trim();
}

/**
 * URL-safe identifier used both as a file name stem and as an anchor id.
 * Accents are folded to their base letter; anything else outside
 * `[a-z0-9]` becomes a single dash.
 */
export function slugify(value: string): string {
  const slug = value
    .normalize("NFKD")
    .replace(COMBINING_MARKS_REGEX, "")
    .toLowerCase()
    .replace(NON_SLUG_CHARS_REGEX, "-")
    .replace(EDGE_DASHES_REGEX, "");
  return slug.length > 0 ? slug : "index";
}

export function lastPathSegment(pathname: string): string {
  const segments = pathname.split("/").filter(Boolean);
  const last = segments.at(-1) ?? "";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

export function isHtmlCandidate(url: URL): boolean {
  return !BLOCKED_EXTENSIONS_REGEX.test(url.pathname);
}

export function isPathInScope(pathname: string, scopePath: string): boolean {
  if (scopePath === "/" || scopePath === "") {
    return true;
  }
  const bareScope = scopePath.replace(TRAILING_SLASH_REGEX, "") || "/";
  const normalizedScope = bareScope === "/" ? "/" : `${bareScope}/`;
  return (
    pathname === bareScope ||
    pathname === normalizedScope ||
    pathname.startsWith(normalizedScope)
  );
}

export function buildCrawlScope(
  startUrl: string,
  options: Pick<CrawlOptions, "locale" | "externalSections">
): CrawlScope {
  const start = new URL(startUrl);
  return {
    domain: start.host,
    origin: start.origin,
    basePath: start.pathname.replace(TRAILING_SLASH_REGEX, ""),
    locale: options.locale,
    externalSections: options.externalSections,
  };
}
