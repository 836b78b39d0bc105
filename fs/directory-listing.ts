"use strict";

import type { Dirent, Stats } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { join } from "node:path";
import type { LnkTargetKind, LnkTargetType } from "../analyzers/lnk/index.js";
import { isShortcutPath, resolveShortcutFile } from "./shortcut-files.js";

export interface ResolvedEntry {
  path: string;
  kind: LnkTargetKind;
  // The .lnk file this entry was reached through, or null for a plain entry.
  shortcutPath: string | null;
}

export interface ListOptions {
  targetType?: LnkTargetType;
  recursive?: boolean;
  onSkip?: (path: string, error: unknown) => void;
}

interface Traversal {
  targetType: LnkTargetType;
  recursive: boolean;
  onSkip: (path: string, error: unknown) => void;
  visited: Set<string>;
}

const kindOf = (stats: Stats): LnkTargetKind | null => {
  if (stats.isDirectory()) return "directory";
  if (stats.isFile()) return "file";
  return null;
};

const resolveShortcutEntry = async (
  shortcutPath: string,
  traversal: Traversal
): Promise<ResolvedEntry | null> => {
  try {
    const target = await resolveShortcutFile(shortcutPath, traversal.targetType);
    const kind = kindOf(await stat(target));
    if (!kind) throw new Error(`Shortcut target ${target} is neither a file nor a directory.`);
    return { path: target, kind, shortcutPath };
  } catch (error) {
    traversal.onSkip(shortcutPath, error);
    return null;
  }
};

async function* walk(
  directory: string,
  traversal: Traversal,
  isRoot: boolean
): AsyncGenerator<ResolvedEntry> {
  let real: string;
  let entries: Dirent[];
  try {
    real = await realpath(directory);
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    // The listed directory itself must be readable; nested ones are skipped.
    if (isRoot) throw error;
    traversal.onSkip(directory, error);
    return;
  }
  if (traversal.visited.has(real)) return;
  traversal.visited.add(real);
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const dirent of entries) {
    const path = join(directory, dirent.name);
    let entry: ResolvedEntry | null;
    if (dirent.isFile() && isShortcutPath(path)) {
      entry = await resolveShortcutEntry(path, traversal);
    } else if (dirent.isDirectory()) {
      entry = { path, kind: "directory", shortcutPath: null };
    } else if (dirent.isFile()) {
      entry = { path, kind: "file", shortcutPath: null };
    } else {
      traversal.onSkip(path, new Error(`${path} is neither a regular file nor a directory.`));
      continue;
    }
    if (!entry) continue;
    yield entry;
    if (traversal.recursive && entry.kind === "directory") {
      yield* walk(entry.path, traversal, false);
    }
  }
}

/**
 * Lists a directory, replacing each `.lnk` file by the entry it points to.
 *
 * Shortcuts that cannot be resolved, that point at the wrong kind of entity, or whose
 * target does not exist are passed to `onSkip` and left out, as are nested directories
 * that cannot be read. With `recursive`, every directory (including shortcut targets) is
 * listed once. A missing or unreadable `directory` rejects the first iteration.
 */
export const listWithResolvedShortcuts = (
  directory: string,
  options: ListOptions = {}
): AsyncGenerator<ResolvedEntry> =>
  walk(
    directory,
    {
      targetType: options.targetType ?? "any",
      recursive: options.recursive ?? false,
      onSkip: options.onSkip ?? (() => undefined),
      visited: new Set<string>()
    },
    true
  );

export const hasSubDirectory = async (directory: string): Promise<boolean> => {
  for await (const entry of listWithResolvedShortcuts(directory, { targetType: "directory" })) {
    if (entry.kind === "directory") return true;
  }
  return false;
};
