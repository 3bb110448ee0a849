import {
  LINE_SPLIT_REGEX,
  turndownService,
} from "./constants";
import { rewriteHref } from "./links";
import type { CrawlScope } from "./types";
import { collapseWhitespace } from "./utils";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const INDENT = "  ";
const LANGUAGE_CLASS_REGEX = /(?:^|\s)(?:language|lang)-([\w+#-]+)/;
const BRUSH_CLASS_REGEX = /brush:\s*([\w+#-]+)/;
const EDGE_NEWLINES_REGEX = /^\n+|\s+$/g;

const NESTED_BLOCK_TAGS = new Set(["UL", "OL", "DL", "PRE", "TABLE"]);

/** Per-page rendering state. One context must not be shared across pages. */
export interface RenderContext {
  pageUrl: string;
  scope: CrawlScope;
  seenCode: Set<string>;
}

export function createRenderContext(
  pageUrl: string,
  scope: CrawlScope
): RenderContext {
  return { pageUrl, scope, seenCode: new Set() };
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isTextNode(node: Node): boolean {
  return node.nodeType === TEXT_NODE;
}

function wrapInlineCode(text: string): string {
  return text.includes("`") ? `\`\` ${text} \`\`` : `\`${text}\``;
}

/**
 * Inline code is dropped when the same snippet was already rendered on this
 * page, whether as a block, inside a list, or inside a link.
 */
function renderInlineCode(element: Element, ctx: RenderContext): string {
  const text = collapseWhitespace(element.textContent ?? "");
  if (!text || ctx.seenCode.has(text)) {
    return "";
  }
  ctx.seenCode.add(text);
  return wrapInlineCode(text);
}

function renderLink(element: Element, ctx: RenderContext): string {
  const text = collapseWhitespace(element.textContent ?? "");
  const href = element.getAttribute("href")?.trim();
  if (!href) {
    return text;
  }
  if (!text) {
    return "";
  }

  const code = element.querySelector("code");
  let label = text;
  if (code) {
    const codeText = collapseWhitespace(code.textContent ?? "");
    if (codeText) {
      ctx.seenCode.add(codeText);
    }
    label = wrapInlineCode(text);
  }

  return `[${label}](${rewriteHref(href, ctx.pageUrl, ctx.scope)})`;
}

function renderChildren(element: Element, ctx: RenderContext): string[] {
  return Array.from(element.childNodes)
    .map((child) => renderInline(child, ctx))
    .filter((part) => part.length > 0);
}

export function renderInline(node: Node, ctx: RenderContext): string {
  if (isTextNode(node)) {
    return collapseWhitespace(node.textContent ?? "");
  }
  if (!isElement(node)) {
    return "";
  }

  switch (node.tagName) {
    case "A":
      return renderLink(node, ctx);
    case "CODE":
    case "PRE":
      return renderInlineCode(node, ctx);
    case "BR":
      return "";
    default: {
      if (node.childNodes.length === 0) {
        return collapseWhitespace(node.textContent ?? "");
      }
      return renderChildren(node, ctx).join(" ");
    }
  }
}

export function detectCodeLanguage(pre: Element): string {
  const candidates = [pre, pre.querySelector("code")];
  for (const candidate of candidates) {
    const className = candidate?.getAttribute("class") ?? "";
    const match =
      LANGUAGE_CLASS_REGEX.exec(className) ?? BRUSH_CLASS_REGEX.exec(className);
    if (match?.[1]) {
      return match[1];
    }
  }
  return "";
}

export function renderCodeBlock(pre: Element, ctx: RenderContext): string[] {
  const raw = pre.textContent ?? "";
  const key = collapseWhitespace(raw);
  if (!key || ctx.seenCode.has(key)) {
    return [];
  }
  ctx.seenCode.add(key);

  const body = raw.replace(EDGE_NEWLINES_REGEX, "");
  return [
    `\`\`\`${detectCodeLanguage(pre)}`,
    ...body.split(LINE_SPLIT_REGEX),
    "```",
  ];
}

function indentLines(lines: string[], depth: number): string[] {
  const prefix = INDENT.repeat(depth);
  return lines.map((line) => (line ? `${prefix}${line}` : line));
}

export function renderList(
  list: Element,
  ctx: RenderContext,
  depth = 0
): string[] {
  const lines: string[] = [];

  for (const item of Array.from(list.children)) {
    if (item.tagName !== "LI") {
      continue;
    }

    const parts: string[] = [];
    const nested: string[] = [];
    for (const child of Array.from(item.childNodes)) {
      if (isElement(child) && NESTED_BLOCK_TAGS.has(child.tagName)) {
        const childLines =
          child.tagName === "UL" || child.tagName === "OL"
            ? renderList(child, ctx, depth + 1)
            : indentLines(renderBlock(child, ctx), depth + 1);
        nested.push(...childLines);
        continue;
      }
      const part = renderInline(child, ctx);
      if (part) {
        parts.push(part);
      }
    }

    if (parts.length > 0) {
      lines.push(`${INDENT.repeat(depth)}- ${parts.join(" ")}`);
    }
    lines.push(...nested);
  }

  return lines;
}

function collectDefinitionEntries(list: Element): Element[] {
  const entries: Element[] = [];
  for (const child of Array.from(list.children)) {
    if (child.tagName === "DIV") {
      entries.push(...collectDefinitionEntries(child));
    } else if (child.tagName === "DT" || child.tagName === "DD") {
      entries.push(child);
    }
  }
  return entries;
}

export function renderDefinitionList(
  list: Element,
  ctx: RenderContext
): string[] {
  const lines: string[] = [];

  for (const entry of collectDefinitionEntries(list)) {
    const text = renderInline(entry, ctx);
    if (!text) {
      continue;
    }
    if (entry.tagName === "DT") {
      if (lines.length > 0 && lines.at(-1) !== "") {
        lines.push("");
      }
      lines.push(`**${text}**`);
    } else {
      lines.push(`${INDENT}${text}`);
    }
  }

  return lines;
}

export function renderTable(table: Element, ctx: RenderContext): string[] {
  const clone = table.cloneNode(true);
  if (!isElement(clone)) {
    return [];
  }
  for (const anchor of clone.querySelectorAll("a[href]")) {
    const href = anchor.getAttribute("href") ?? "";
    anchor.setAttribute("href", rewriteHref(href, ctx.pageUrl, ctx.scope));
  }

  const markdown = turndownService.turndown(clone.outerHTML).trim();
  return markdown ? markdown.split(LINE_SPLIT_REGEX) : [];
}

/**
 * Render one top-level unit of a section to output lines.
 */
export function renderBlock(node: Node, ctx: RenderContext): string[] {
  if (isElement(node)) {
    switch (node.tagName) {
      case "UL":
      case "OL":
        return renderList(node, ctx);
      case "DL":
        return renderDefinitionList(node, ctx);
      case "PRE":
        return renderCodeBlock(node, ctx);
      case "TABLE":
        return renderTable(node, ctx);
      default:
        break;
    }
  }

  const line = renderInline(node, ctx);
  return line ? [line] : [];
}
