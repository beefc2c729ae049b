import { readdir, stat } from "fs/promises";
import type { Dirent } from "fs";
import { join, parse } from "path";
import type { Dot, OsFamily, ScriptAction } from "../types";
import { detectOsFamily, scriptFileNames } from "./platform";
import { errorCode } from "./errors";

export interface DiscoverOptions {
  family?: OsFamily;
}

type EntryKind = "file" | "directory" | "other";

/**
 * Classify a directory entry, following symlinks. A dangling link is "other".
 */
async function entryKind(dir: string, entry: Dirent): Promise<EntryKind> {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  if (!entry.isSymbolicLink()) return "other";

  try {
    const stats = await stat(join(dir, entry.name));
    if (stats.isFile()) return "file";
    if (stats.isDirectory()) return "directory";
    return "other";
  } catch (err) {
    if (errorCode(err) === "ENOENT") return "other";
    throw err;
  }
}

async function listEntries(dir: string, kind: EntryKind): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const names: string[] = [];

  for (const entry of entries) {
    if ((await entryKind(dir, entry)) === kind) {
      names.push(entry.name);
    }
  }

  return names;
}

/**
 * Names of the regular files directly inside a directory
 */
export function listFiles(dir: string): Promise<string[]> {
  return listEntries(dir, "file");
}

/**
 * A directory is a dot when it directly holds a file named `setup`
 * with any (or no) extension.
 */
export async function isDotDirectory(dir: string): Promise<boolean> {
  const files = await listFiles(dir);
  return files.some((file) => parse(file).name === "setup");
}

/**
 * Resolve the script for an action inside a dot directory.
 *
 * Exactly one accepted file name must be present. None, or more than one
 * (e.g. both setup.sh and setup.py), resolves to null.
 */
export async function resolveScript(
  dir: string,
  action: ScriptAction,
  family: OsFamily = detectOsFamily()
): Promise<string | null> {
  const accepted = new Set(scriptFileNames(action, family));
  const files = await listFiles(dir);
  const matches = files.filter((file) => accepted.has(file));

  if (matches.length !== 1) {
    return null;
  }
  return join(dir, matches[0]);
}

/**
 * Scan a dotfiles root for dots, sorted by name.
 *
 * The root should already be resolved (see resolveDotfilesRoot). Nothing is
 * cached: every call reads the tree again.
 */
export async function discoverDots(
  root: string,
  options: DiscoverOptions = {}
): Promise<Dot[]> {
  const family = options.family ?? detectOsFamily();
  const dirs = await listEntries(root, "directory");

  const dotNames: string[] = [];
  for (const name of dirs) {
    if (await isDotDirectory(join(root, name))) {
      dotNames.push(name);
    }
  }

  // Ordinal, not locale-aware: "Zsh" sorts before "bash"
  dotNames.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const dots: Dot[] = [];
  for (const name of dotNames) {
    const path = join(root, name);
    dots.push({
      name,
      path,
      installScript: await resolveScript(path, "install", family),
      setupScript: await resolveScript(path, "setup", family),
    });
  }

  return dots;
}
