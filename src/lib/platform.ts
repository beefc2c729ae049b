import type { OsFamily, ScriptAction } from "../types";

/**
 * Accepted script extensions per OS family. Python runs everywhere; the
 * native shell differs.
 */
const SCRIPT_EXTENSIONS: Record<OsFamily, readonly string[]> = {
  windows: [".py", ".ps1"],
  posix: [".py", ".sh"],
};

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  linux: "Linux",
  darwin: "Darwin",
  win32: "Windows",
};

export function detectOsFamily(platform: NodeJS.Platform = process.platform): OsFamily {
  return platform === "win32" ? "windows" : "posix";
}

/**
 * File names that count as the given action's script on an OS family,
 * e.g. ["setup.py", "setup.sh"].
 */
export function scriptFileNames(action: ScriptAction, family: OsFamily): string[] {
  return SCRIPT_EXTENSIONS[family].map((ext) => `${action}${ext}`);
}

/**
 * Name a config's `operating_systems` list is matched against.
 */
export function osName(platform: NodeJS.Platform = process.platform): string {
  return OS_NAMES[platform] ?? platform;
}
