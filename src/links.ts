import type { CrawlScope } from "./types";
import {
  isHtmlCandidate,
  isPathInScope,
  lastPathSegment,
  slugify,
} from "./utils";

const SCHEME_REGEX = /^[a-z][a-z0-9+.-]*:/i;
const HTTP_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Decide whether a discovered URL is a documentation page the crawl should
 * follow: same host, the configured locale, inside the start path, not a
 * binary asset, and without a fragment.
 */
export function shouldFollowLink(
  candidateUrl: string,
  scope: Pick<CrawlScope, "domain" | "basePath" | "locale">
): boolean {
  let parsed: URL;
  try {
    parsed = new URL(candidateUrl);
  } catch {
    return false;
  }

  if (parsed.host !== scope.domain) {
    return false;
  }
  if (scope.locale && !parsed.pathname.includes(`/${scope.locale}/`)) {
    return false;
  }
  if (!isPathInScope(parsed.pathname, scope.basePath)) {
    return false;
  }
  if (!isHtmlCandidate(parsed)) {
    return false;
  }
  return !candidateUrl.includes("#");
}

export function resolveDocumentBaseUrl(document: Document, base: URL): URL {
  const baseHref = document.querySelector("base[href]")?.getAttribute("href");
  if (!baseHref) {
    return base;
  }
  try {
    return new URL(baseHref, base);
  } catch {
    return base;
  }
}

/**
 * Every http(s) link on the page, resolved against the page (or its
 * `<base href>`), in first-occurrence order.
 */
export function extractPageLinks(document: Document, pageUrl: URL): string[] {
  const baseForResolution = resolveDocumentBaseUrl(document, pageUrl);
  const results = new Set<string>();

  for (const anchor of document.querySelectorAll("a[href]")) {
    const href = anchor.getAttribute("href")?.trim();
    if (!href) {
      continue;
    }
    try {
      const resolved = new URL(href, baseForResolution);
      if (HTTP_PROTOCOLS.has(resolved.protocol)) {
        results.add(resolved.toString());
      }
    } catch {
      // ignore invalid URLs
    }
  }

  return Array.from(results);
}

export function isExternalSection(pathname: string, scope: CrawlScope): boolean {
  const lowerPath = pathname.toLowerCase();
  return scope.externalSections.some((segment) =>
    lowerPath.includes(segment.toLowerCase())
  );
}

export function buildPathAnchor(pathname: string, fragment = ""): string {
  const base = slugify(lastPathSegment(pathname));
  return fragment ? `${base}-${slugify(fragment)}` : base;
}

/**
 * Rewrite a link found in page content. Links to documentation pages under
 * the crawl's base path become same-document anchors; everything else keeps
 * its target, with relative links made absolute.
 */
export function rewriteHref(
  href: string,
  pageUrl: string,
  scope: CrawlScope
): string {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return trimmed;
  }

  const isAbsolute = SCHEME_REGEX.test(trimmed);
  let resolved: URL;
  try {
    resolved = new URL(trimmed, pageUrl);
  } catch {
    return trimmed;
  }
  if (!HTTP_PROTOCOLS.has(resolved.protocol)) {
    return trimmed;
  }

  const isInternal =
    resolved.host === scope.domain &&
    isPathInScope(resolved.pathname, scope.basePath) &&
    !isExternalSection(resolved.pathname, scope);

  if (isInternal) {
    const fragment = decodeFragment(resolved.hash);
    return `#${buildPathAnchor(resolved.pathname, fragment)}`;
  }

  return isAbsolute ? trimmed : resolved.toString();
}

function decodeFragment(hash: string): string {
  const raw = hash.startsWith("#") ? hash.slice(1) : hash;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}
