import fs from "node:fs";
import path from "node:path";
import { errorMessage, finding } from "../core/finding.js";
import { toBundlePath } from "../core/security.js";
import type { Finding, StageId } from "../types/report.js";

export const DEFAULT_SKIP_DIRS: ReadonlySet<string> = new Set([".git"]);

export type UnreadableDir = {
  /** Bundle-relative path, "." for the root. */
  path: string;
  reason: string;
};

export type BundleListing = {
  files: string[];
  unreadable: UnreadableDir[];
};

/**
 * List every file under `root` as sorted bundle-relative POSIX paths.
 * Symlinks are listed but never followed. Directories that cannot be read
 * are collected in `unreadable` and the walk continues.
 */
export function listBundleFiles(root: string, skipDirs: ReadonlySet<string> = DEFAULT_SKIP_DIRS): BundleListing {
  const files: string[] = [];
  const unreadable: UnreadableDir[] = [];
  const pending = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (e) {
      unreadable.push({ path: toBundlePath(root, dir) || ".", reason: errorMessage(e) });
      continue;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!skipDirs.has(entry.name)) pending.push(full);
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        files.push(toBundlePath(root, full));
      }
    }
  }

  return { files: files.sort(), unreadable: unreadable.sort((a, b) => a.path.localeCompare(b.path)) };
}

/** One error finding per directory the walk could not read. */
export function unreadableDirFindings(stage: StageId, unreadable: readonly UnreadableDir[]): Finding[] {
  return unreadable.map((dir) =>
    finding(stage, "error", "BUNDLE_DIRECTORY_UNREADABLE", `Cannot read directory ${dir.path}: ${dir.reason}`, {
      path: dir.path,
      details: { reason: dir.reason },
    }),
  );
}
