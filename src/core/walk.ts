import fs from "node:fs";
import path from "node:path";

/** Directories never descended into when scanning an extension. */
const SKIP_DIRS = new Set([".git", "__pycache__", ".venv", "venv", "node_modules", "site-packages", "lib", "Lib", ".pixi"]);

export function isSkippedDir(name: string): boolean {
  return SKIP_DIRS.has(name) || name.startsWith(".") || name.startsWith("_env_");
}

/**
 * Files under `root` accepted by `match`, as sorted paths relative to root
 * with forward slashes.
 */
export function walkProjectFiles(root: string, match: (fileName: string) => boolean): string[] {
  const found: string[] = [];
  const visit = (dir: string, rel: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const entryRel = rel === "" ? entry.name : `${rel}/${entry.name}`;
      if (entry.isDirectory()) {
        if (!isSkippedDir(entry.name)) visit(path.join(dir, entry.name), entryRel);
      } else if (entry.isFile() && match(entry.name)) {
        found.push(entryRel);
      }
    }
  };
  visit(root, "");
  return found.sort();
}
