/**
 * Directory size measurement for the advisory disk counters.
 *
 * Walks the tree without following symlinks (a checkout can link outside
 * the workspace). Entries that vanish mid-walk are skipped; workspaces are
 * live directories and a task may be deleting files while we count.
 */

import type { Dirent } from "node:fs";
import { lstat, readdir } from "node:fs/promises";
import path from "node:path";

export interface DiskUsage {
  bytes: number;
  files: number;
}

/** Total size and regular-file count under `root`. A missing root is empty. */
export async function measureDirectory(root: string): Promise<DiskUsage> {
  const usage: DiskUsage = { bytes: 0, files: 0 };
  const pending = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) continue;
      throw err;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(full);
      } else if (entry.isFile()) {
        try {
          const stats = await lstat(full);
          usage.bytes += stats.size;
          usage.files += 1;
        } catch (err) {
          if (!isMissing(err)) throw err;
        }
      }
    }
  }

  return usage;
}

/** Lists regular files under `root` as paths relative to it, sorted. */
export async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const pending = [""];

  while (pending.length > 0) {
    const rel = pending.pop();
    if (rel === undefined) break;

    let entries: Dirent[];
    try {
      entries = await readdir(path.join(root, rel), { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) continue;
      throw err;
    }

    for (const entry of entries) {
      const childRel = rel ? path.join(rel, entry.name) : entry.name;
      if (entry.isDirectory()) pending.push(childRel);
      else if (entry.isFile()) files.push(childRel);
    }
  }

  return files.sort();
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Bytes to megabytes, two decimals. */
export function bytesToMb(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}
