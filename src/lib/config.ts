import { join } from "path";
import { readFile, stat } from "fs/promises";
import YAML from "yaml";
import { z } from "zod";
import type { Config } from "../types";
import { CONFIG_FILE_NAMES } from "./paths";
import { osName } from "./platform";
import { ConfigError, errorCode, errorMessage } from "./errors";

const AppSchema = z.union([
  z.string().min(1),
  z.object({
    name: z.string().min(1),
    to_install: z.boolean().default(false),
  }),
]);

const ConfigSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  operating_systems: z.array(z.string().min(1)).default([]),
  apps: z.array(AppSchema).default([]),
});

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse a YAML config document. `source` names it in error messages.
 */
export function parseConfig(text: string, source: string): Config {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(source, `invalid YAML (${errorMessage(err)})`, err);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error.issues));
  }

  const { name, description, operating_systems, apps } = parsed.data;
  return {
    name,
    ...(description !== undefined ? { description } : {}),
    operatingSystems: operating_systems,
    apps: apps.map((app) =>
      typeof app === "string"
        ? { name: app, toInstall: false }
        : { name: app.name, toInstall: app.to_install }
    ),
  };
}

/**
 * Load a config file
 */
export async function loadConfig(path: string): Promise<Config> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new ConfigError(path, "config file not found", err);
    }
    throw err;
  }
  return parseConfig(text, path);
}

/**
 * Find a config file in the dotfiles root (dots.yaml, then dots.yml)
 */
export async function findConfig(root: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const path = join(root, name);
    try {
      if ((await stat(path)).isFile()) {
        return path;
      }
    } catch (err) {
      if (errorCode(err) !== "ENOENT") throw err;
    }
  }
  return null;
}

export function isConfigApplicable(
  config: Config,
  platform: NodeJS.Platform = process.platform
): boolean {
  if (config.operatingSystems.length === 0) {
    return true;
  }
  const current = osName(platform).toLowerCase();
  return config.operatingSystems.some((os) => os.toLowerCase() === current);
}

export function assertConfigApplicable(
  config: Config,
  platform: NodeJS.Platform = process.platform
): void {
  if (!isConfigApplicable(config, platform)) {
    throw new ConfigError(
      config.name,
      `config targets ${config.operatingSystems.join(", ")}, not ${osName(platform)}`
    );
  }
}
