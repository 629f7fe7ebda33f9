import fs from "node:fs";
import path from "node:path";
import { findManifestFile } from "../manifest/loader.js";

const SEARCH_SKIP_DIRS: ReadonlySet<string> = new Set([".git", "node_modules"]);

function statOrNull(p: string): fs.Stats | null {
  try {
    return fs.statSync(p);
  } catch {
    return null;
  }
}

/**
 * Resolve the bundle root. An explicit path wins: a directory is used as
 * given, a file is taken to be the manifest and its parent is the root.
 * Without one, the first directory (breadth-first, sorted) under
 * `searchRoot` holding a manifest is returned.
 */
export function locateBundle(
  explicitPath: string | undefined,
  searchRoot: string,
  manifestNames: readonly string[],
): string | null {
  if (explicitPath) {
    const stat = statOrNull(explicitPath);
    if (!stat) return null;
    return stat.isDirectory() ? explicitPath : path.dirname(explicitPath);
  }

  const queue = [searchRoot];
  while (queue.length > 0) {
    const dir = queue.shift();
    if (dir === undefined) break;
    if (findManifestFile(dir, manifestNames)) return dir;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      continue;
    }
    const subdirs = entries
      .filter((e) => e.isDirectory() && !SEARCH_SKIP_DIRS.has(e.name))
      .map((e) => e.name)
      .sort();
    for (const name of subdirs) queue.push(path.join(dir, name));
  }

  return null;
}
