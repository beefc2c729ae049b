import { chmod, mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a file, creating parent directories as needed
 */
export async function touch(path: string, content = ""): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

/**
 * Write an executable POSIX shell script
 */
export async function writeScript(path: string, body: string): Promise<void> {
  await touch(path, `#!/bin/sh\n${body}\n`);
  await chmod(path, 0o755);
}
