import { join, resolve } from "path";
import { homedir } from "os";
import { realpath, stat } from "fs/promises";
import { DotsError, MissingPathError, errorCode } from "./errors";

/**
 * Config file names looked up in the dotfiles root, in order
 */
export const CONFIG_FILE_NAMES = ["dots.yaml", "dots.yml"] as const;

export function getHomeDirectory(): string {
  return process.env.HOME || homedir();
}

/**
 * Get path to the default dotfiles root (~/dotfiles)
 */
export function getDefaultDotfilesDir(): string {
  return join(getHomeDirectory(), "dotfiles");
}

/**
 * Resolve the dotfiles root to an absolute, symlink-free directory.
 * With no argument, the default root is used.
 */
export async function resolveDotfilesRoot(arg?: string, cwd: string = process.cwd()): Promise<string> {
  const candidate = arg === undefined ? getDefaultDotfilesDir() : resolve(cwd, arg);

  let resolved: string;
  try {
    resolved = await realpath(candidate);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new MissingPathError(candidate, err);
    }
    throw err;
  }

  if (!(await stat(resolved)).isDirectory()) {
    throw new DotsError(`Not a directory: ${resolved}`, "ENOTDIR");
  }

  return resolved;
}
