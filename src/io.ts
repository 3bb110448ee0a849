import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { COMPILED_FILE, PAGE_EXTENSION, STRUCTURE_FILE } from "./constants";
import { serializePageContent } from "./content";
import { serializeStructure } from "./tree";
import type { DocumentNode, PageContent, PageStore } from "./types";
import { ensureDir, slugify } from "./utils";

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Per-page Markdown files in one directory, named from the page title.
 * Names are reserved synchronously before the write, so two pages whose
 * titles slugify alike get `name.md` and `name-2.md` instead of racing for
 * the same file.
 */
export class FsPageStore implements PageStore {
  private readonly reserved = new Set<string>([COMPILED_FILE]);

  constructor(readonly directory: string) {}

  reserveFileName(title: string): string {
    const stem = slugify(title);
    let fileName = `${stem}${PAGE_EXTENSION}`;
    for (let suffix = 2; this.reserved.has(fileName); suffix += 1) {
      fileName = `${stem}-${suffix}${PAGE_EXTENSION}`;
    }
    this.reserved.add(fileName);
    return fileName;
  }

  async save(page: PageContent): Promise<string> {
    const fileName = this.reserveFileName(page.title);
    await ensureDir(this.directory);
    await writeFile(
      path.join(this.directory, fileName),
      serializePageContent(page),
      "utf8"
    );
    return fileName;
  }

  async load(contentFile: string): Promise<string | null> {
    if (path.basename(contentFile) !== contentFile) {
      return null;
    }
    return await readOptionalFile(path.join(this.directory, contentFile));
  }
}

export function structurePath(outDir: string): string {
  return path.join(outDir, STRUCTURE_FILE);
}

export function compiledPath(outDir: string): string {
  return path.join(outDir, COMPILED_FILE);
}

export async function writeStructure(
  outDir: string,
  root: DocumentNode
): Promise<string> {
  await ensureDir(outDir);
  const filePath = structurePath(outDir);
  await writeFile(filePath, serializeStructure(root), "utf8");
  return filePath;
}

export async function writeCompiledDocument(
  outDir: string,
  markdown: string
): Promise<string> {
  await ensureDir(outDir);
  const filePath = compiledPath(outDir);
  await writeFile(filePath, markdown, "utf8");
  return filePath;
}
