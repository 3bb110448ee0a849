import { z } from "zod";
import type { DocumentNode } from "./types";

export const documentNodeSchema: z.ZodType<DocumentNode> = z.lazy(() =>
  z.object({
    title: z.string(),
    sourceUrl: z.string(),
    contentFile: z.string().min(1).optional(),
    children: z.array(documentNodeSchema),
  })
);

export function createRootNode(startUrl: string): DocumentNode {
  return { title: "", sourceUrl: startUrl, children: [] };
}

export type ParsedStructure =
  | { ok: true; root: DocumentNode }
  | { ok: false; message: string };

export function parseStructure(raw: string): ParsedStructure {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return { ok: false, message: `structure is not valid JSON: ${String(error)}` };
  }

  const result = documentNodeSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join(".") || "root";
    return {
      ok: false,
      message: `structure does not match the document tree shape at ${where}: ${issue?.message ?? "unknown issue"}`,
    };
  }
  return { ok: true, root: result.data };
}

export function serializeStructure(root: DocumentNode): string {
  return `${JSON.stringify(root, null, 2)}\n`;
}

/**
 * Depth-first, parent before children, children in stored order.
 */
export function* walkPreOrder(
  node: DocumentNode,
  depth = 0
): Generator<{ node: DocumentNode; depth: number }> {
  yield { node, depth };
  for (const child of node.children) {
    yield* walkPreOrder(child, depth + 1);
  }
}

export function countSavedNodes(root: DocumentNode): number {
  let count = 0;
  for (const { node } of walkPreOrder(root)) {
    if (node.contentFile) {
      count += 1;
    }
  }
  return count;
}

export function treeDepth(root: DocumentNode): number {
  let deepest = 0;
  for (const { depth } of walkPreOrder(root)) {
    deepest = Math.max(deepest, depth);
  }
  return deepest;
}
