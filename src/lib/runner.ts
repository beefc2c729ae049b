import { spawn, type ChildProcess } from "child_process";
import { extname } from "path";
import type { ScriptResult } from "../types";
import { errorMessage } from "./errors";

export interface RunOptions {
  /** Kill the script after this many milliseconds. 0 or unset: wait forever. */
  timeoutMs?: number;
  stdio?: "inherit" | "ignore";
  /** After a timeout, how long to wait between SIGTERM and SIGKILL */
  killGraceMs?: number;
}

/** Largest delay setTimeout honours; anything above fires after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_KILL_GRACE_MS = 5_000;

export type ScriptRunner = (script: string, options?: RunOptions) => Promise<ScriptResult>;

/**
 * Command line for a script. PowerShell scripts go through powershell and,
 * on Windows, Python scripts through python. Everything else is executed
 * directly and relies on its shebang and executable bit.
 */
export function getScriptCommand(
  script: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  switch (extname(script).toLowerCase()) {
    case ".ps1":
      return {
        command: "powershell",
        args: ["-NoProfile", "-ExecutionPolicy", "Bypass", "-File", script],
      };
    case ".py":
      if (platform === "win32") {
        return { command: "python", args: [script] };
      }
      break;
  }
  return { command: script, args: [] };
}

/**
 * Run a script to completion. Never rejects: start failures, non-zero exits,
 * signals and timeouts all come back as a failed ScriptResult.
 */
export const runScript: ScriptRunner = (script, options = {}) => {
  const { command, args } = getScriptCommand(script);
  const timeoutMs = Math.min(options.timeoutMs ?? 0, MAX_TIMEOUT_MS);
  const killGraceMs = Math.min(options.killGraceMs ?? DEFAULT_KILL_GRACE_MS, MAX_TIMEOUT_MS);

  return new Promise<ScriptResult>((resolvePromise) => {
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const settle = (result: ScriptResult) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      resolvePromise(result);
    };

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        stdio: options.stdio ?? "inherit",
        env: process.env,
      });
    } catch (err) {
      settle({ ok: false, script, reason: "spawn", message: errorMessage(err) });
      return;
    }

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
        // A script that traps TERM gets SIGKILL after the grace period
        killTimer = setTimeout(() => child.kill("SIGKILL"), killGraceMs);
      }, timeoutMs);
    }

    child.on("error", (err) => {
      settle({ ok: false, script, reason: "spawn", message: err.message });
    });

    child.on("exit", (code, signal) => {
      if (timedOut) {
        settle({ ok: false, script, reason: "timeout", timeoutMs });
      } else if (code === 0) {
        settle({ ok: true, script, exitCode: 0 });
      } else if (code !== null) {
        settle({ ok: false, script, reason: "exit", exitCode: code });
      } else {
        settle({ ok: false, script, reason: "signal", signal: signal ?? "unknown" });
      }
    });
  });
};
