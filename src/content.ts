import { JSDOM } from "jsdom";
import {
  CONTENT_SELECTORS,
  HEADING_TAGS,
  LEAF_BLOCK_TAGS,
  NON_CONTENT_SELECTORS,
  STRUCTURAL_SELECTOR,
} from "./constants";
import {
  createRenderContext,
  isElement,
  isTextNode,
  type RenderContext,
  renderBlock,
} from "./render";
import type { CrawlScope, PageContent, Section } from "./types";
import { collapseWhitespace, lastPathSegment } from "./utils";

const FENCE_REGEX = /^\s*(```|~~~)/;

export type ContentUnit =
  | { kind: "heading"; level: number; text: string }
  | { kind: "block"; node: Node };

export interface UnitGroup {
  heading: { level: number; text: string } | null;
  blocks: Node[];
}

export function parseHtml(html: string, pageUrl: string): Document {
  return new JSDOM(html, { url: pageUrl }).window.document;
}

export function locateMainRegion(document: Document): Element | null {
  for (const selector of CONTENT_SELECTORS) {
    const match = document.querySelector(selector);
    if (match) {
      return match;
    }
  }
  return null;
}

export function extractTitle(document: Document, pageUrl: string): string {
  const heading = collapseWhitespace(
    document.querySelector("h1")?.textContent ?? ""
  );
  if (heading) {
    return heading;
  }
  const parsed = new URL(pageUrl);
  return lastPathSegment(parsed.pathname) || parsed.hostname;
}

/**
 * Copy of the region without interactive examples, page chrome, and the
 * title heading, which is emitted separately.
 */
export function prepareRegion(
  document: Document,
  region: Element
): Element | null {
  const clone = region.cloneNode(true);
  if (!isElement(clone)) {
    return null;
  }

  const title = document.querySelector("h1");
  if (title && region.contains(title)) {
    clone.querySelector("h1")?.remove();
  }

  for (const selector of NON_CONTENT_SELECTORS) {
    for (const element of clone.querySelectorAll(selector)) {
      element.remove();
    }
  }

  return clone;
}

/**
 * Flatten the region into document-ordered units. Containers that hold
 * headings or block elements are opened up so that a heading nested in a
 * wrapper still partitions the content around it.
 */
export function flattenRegion(region: Element): ContentUnit[] {
  const units: ContentUnit[] = [];

  const visit = (parent: Node): void => {
    for (const child of Array.from(parent.childNodes)) {
      if (isTextNode(child)) {
        if (collapseWhitespace(child.textContent ?? "")) {
          units.push({ kind: "block", node: child });
        }
        continue;
      }
      if (!isElement(child)) {
        continue;
      }
      if (HEADING_TAGS.has(child.tagName)) {
        units.push({
          kind: "heading",
          level: Number.parseInt(child.tagName.slice(1), 10),
          text: collapseWhitespace(child.textContent ?? ""),
        });
        continue;
      }
      if (LEAF_BLOCK_TAGS.has(child.tagName)) {
        units.push({ kind: "block", node: child });
        continue;
      }
      if (child.querySelector(STRUCTURAL_SELECTOR)) {
        visit(child);
        continue;
      }
      units.push({ kind: "block", node: child });
    }
  };

  visit(region);
  return units;
}

export function partitionAtHeadings(units: ContentUnit[]): UnitGroup[] {
  const groups: UnitGroup[] = [];
  let current: UnitGroup = { heading: null, blocks: [] };

  for (const unit of units) {
    if (unit.kind === "heading") {
      if (current.heading || current.blocks.length > 0) {
        groups.push(current);
      }
      current = {
        heading: { level: unit.level, text: unit.text },
        blocks: [],
      };
      continue;
    }
    current.blocks.push(unit.node);
  }

  if (current.heading || current.blocks.length > 0) {
    groups.push(current);
  }
  return groups;
}

export function renderSections(
  groups: UnitGroup[],
  ctx: RenderContext
): Section[] {
  return groups.map((group) => {
    const bodyLines: string[] = [];
    for (const block of group.blocks) {
      const lines = renderBlock(block, ctx);
      if (lines.length === 0) {
        continue;
      }
      if (bodyLines.length > 0) {
        bodyLines.push("");
      }
      bodyLines.push(...lines);
    }
    return {
      headingLevel: group.heading?.level ?? null,
      headingText: group.heading?.text ?? "",
      bodyLines,
    };
  });
}

/**
 * Collapse runs of blank lines to one and trim blank lines at both ends.
 * Lines inside fenced code are kept as they are.
 */
export function collapseBlankLines(lines: string[]): string[] {
  const result: string[] = [];
  let inFence = false;

  for (const line of lines) {
    if (FENCE_REGEX.test(line)) {
      inFence = !inFence;
    }
    const isBlank = line.trim().length === 0;
    if (isBlank && !inFence) {
      if (result.length === 0 || result.at(-1) === "") {
        continue;
      }
      result.push("");
      continue;
    }
    result.push(line);
  }

  while (result.at(-1) === "") {
    result.pop();
  }
  return result;
}

export function formatPageLines(
  title: string,
  pageUrl: string,
  sections: Section[]
): string[] {
  const lines = [`# ${title}`, "", `Source: ${pageUrl}`, ""];

  for (const section of sections) {
    if (section.headingLevel !== null && section.headingText) {
      lines.push(`${"#".repeat(section.headingLevel)} ${section.headingText}`, "");
    }
    lines.push(...section.bodyLines, "");
  }

  return collapseBlankLines(lines);
}

/**
 * Extract a documentation page as Markdown lines. Returns null when the page
 * has no recognisable main content region. The document is not modified.
 */
export function extractPageContent(
  document: Document,
  pageUrl: string,
  scope: CrawlScope
): PageContent | null {
  const region = locateMainRegion(document);
  if (!region) {
    return null;
  }

  const title = extractTitle(document, pageUrl);
  const prepared = prepareRegion(document, region);
  if (!prepared) {
    return null;
  }

  const ctx = createRenderContext(pageUrl, scope);
  const groups = partitionAtHeadings(flattenRegion(prepared));
  const sections = renderSections(groups, ctx);

  return {
    title,
    sourceUrl: pageUrl,
    renderedLines: formatPageLines(title, pageUrl, sections),
  };
}

export function serializePageContent(page: PageContent): string {
  return `${page.renderedLines.join("\n")}\n`;
}
