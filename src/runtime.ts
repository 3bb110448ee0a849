import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const resolveRealPath = (filePath: string): string => {
  try {
    return realpathSync(filePath);
  } catch {
    return resolve(filePath);
  }
};

/**
 * True when the module at `metaUrl` is the script node was started with,
 * including when it was started through a symlinked bin entry.
 */
export const isMainModule = (metaUrl: string): boolean => {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }

  return resolveRealPath(entry) === resolveRealPath(fileURLToPath(metaUrl));
};
