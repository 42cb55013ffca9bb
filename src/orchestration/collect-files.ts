/**
 * Tree walk: finds auditable source files under a directory.
 */

import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";
import type { PolicyConfig } from "../types/policy.js";

const DECLARATION_SUFFIXES: readonly string[] = [".d.ts", ".d.mts", ".d.cts"];

export function isAuditable(fileName: string, extensions: readonly string[]): boolean {
  const lower = fileName.toLowerCase();
  if (DECLARATION_SUFFIXES.some((suffix) => lower.endsWith(suffix))) {
    return false;
  }
  return extensions.includes(node_path.extname(lower));
}

/** The part of a directory entry the walk reads. `fs.Dirent` fits. */
export interface DirEntry {
  readonly name: string;
  isDirectory(): boolean;
  isFile(): boolean;
}

export type ReaddirFn = (dir: string) => Promise<readonly DirEntry[]>;

const defaultReaddirFn: ReaddirFn = (dir) => node_fs.readdir(dir, { withFileTypes: true });

/** A directory the walk could not list. */
export interface UnreadableDir {
  /** Absolute path. */
  readonly dir: string;
  readonly message: string;
}

export interface CollectedFiles {
  /** Absolute paths, sorted by display path. */
  readonly files: readonly string[];
  /** Sorted by display path. */
  readonly unreadable: readonly UnreadableDir[];
}

/** POSIX-style path of `file` relative to `root`; the root itself is ".". */
export function toDisplayPath(root: string, file: string): string {
  const rel = node_path.relative(root, file).split(node_path.sep).join("/");
  return rel === "" ? "." : rel;
}

export function compareDisplayPaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Collect absolute paths of auditable files below `root`. Excluded
 * directory names are skipped at any depth and symbolic links are not
 * followed. A directory that cannot be listed is recorded and the walk
 * continues with its siblings.
 */
export async function collectFiles(
  root: string,
  policy: Pick<PolicyConfig, "excludedDirs" | "extensions">,
  readdirFn: ReaddirFn = defaultReaddirFn,
): Promise<CollectedFiles> {
  const found: string[] = [];
  const unreadable: UnreadableDir[] = [];
  const excluded = new Set(policy.excludedDirs);

  async function walk(dir: string): Promise<void> {
    let entries: readonly DirEntry[];
    try {
      entries = await readdirFn(dir);
    } catch (cause: unknown) {
      const message = cause instanceof Error ? cause.message : String(cause);
      unreadable.push({ dir, message });
      return;
    }
    for (const entry of entries) {
      const full = node_path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excluded.has(entry.name)) {
          await walk(full);
        }
      } else if (entry.isFile() && isAuditable(entry.name, policy.extensions)) {
        found.push(full);
      }
    }
  }

  await walk(root);

  const byKey = (a: string, b: string): number =>
    compareDisplayPaths(toDisplayPath(root, a), toDisplayPath(root, b));
  found.sort(byKey);
  unreadable.sort((a, b) => byKey(a.dir, b.dir));
  return { files: found, unreadable };
}
