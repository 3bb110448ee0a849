import path from "node:path";
import {
  FsPageStore,
  readOptionalFile,
  structurePath,
  writeCompiledDocument,
} from "./io";
import { buildPathAnchor } from "./links";
import { logger } from "./logger";
import { countSavedNodes, parseStructure, walkPreOrder } from "./tree";
import type { CompileResult, DocumentNode } from "./types";

export type ContentLookup = (contentFile: string) => Promise<string | null>;

const TOC_HEADING = "# Table of Contents";
const SEPARATOR = "---";

export function anchorForFile(contentFile: string): string {
  return path.basename(contentFile, path.extname(contentFile));
}

function sourcePathAnchor(sourceUrl: string): string | null {
  try {
    return buildPathAnchor(new URL(sourceUrl).pathname);
  } catch {
    return null;
  }
}

export function buildTableOfContents(root: DocumentNode): string[] {
  const lines = [TOC_HEADING, ""];
  for (const { node, depth } of walkPreOrder(root)) {
    if (!node.contentFile) {
      continue;
    }
    lines.push(
      `${"  ".repeat(depth)}- [${node.title}](#${anchorForFile(node.contentFile)})`
    );
  }
  return lines;
}

/**
 * Wrap a page body in a container addressable by its file anchor. Links
 * inside pages point at the slug of a URL's last path segment, so that slug
 * is added as a second anchor when it differs.
 */
export function wrapPageContent(
  node: DocumentNode,
  contentFile: string,
  content: string
): string[] {
  const anchor = anchorForFile(contentFile);
  const pathAnchor = sourcePathAnchor(node.sourceUrl);
  const lines = [`<div id="${anchor}">`, ""];
  if (pathAnchor && pathAnchor !== anchor) {
    lines.push(`<a id="${pathAnchor}"></a>`, "");
  }
  lines.push(content.trimEnd(), "", "</div>");
  return lines;
}

/**
 * Linearize the tree: table of contents, separator, then every saved page in
 * the same pre-order. Pages whose file cannot be found are left out.
 */
export async function compileDocument(
  root: DocumentNode,
  lookup: ContentLookup
): Promise<string> {
  const lines = [...buildTableOfContents(root), "", SEPARATOR, ""];

  for (const { node } of walkPreOrder(root)) {
    if (!node.contentFile) {
      continue;
    }
    const content = await lookup(node.contentFile);
    if (content === null) {
      logger.debug(
        `Missing content file ${node.contentFile} for ${node.sourceUrl}`
      );
      continue;
    }
    lines.push(
      ...wrapPageContent(node, node.contentFile, content),
      "",
      SEPARATOR,
      ""
    );
  }

  return lines.join("\n");
}

export async function compileDocumentation(
  outDir: string
): Promise<CompileResult> {
  const structureFile = structurePath(outDir);
  const raw = await readOptionalFile(structureFile);
  if (raw === null) {
    const message = `Structure file not found at ${structureFile}; run a crawl first`;
    logger.error(message);
    return { ok: false, reason: "missing-structure", message };
  }

  const parsed = parseStructure(raw);
  if (!parsed.ok) {
    logger.error(`Cannot compile ${structureFile}: ${parsed.message}`);
    return { ok: false, reason: "invalid-structure", message: parsed.message };
  }

  const store = new FsPageStore(outDir);
  const markdown = await compileDocument(parsed.root, (file) =>
    store.load(file)
  );
  const outputPath = await writeCompiledDocument(outDir, markdown);
  const pageCount = countSavedNodes(parsed.root);
  logger.success(`Compiled ${pageCount} page(s) into ${outputPath}`);

  return { ok: true, outputPath, pageCount };
}
