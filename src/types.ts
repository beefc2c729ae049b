// ─────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────

export interface Context {
  verbose: boolean;
  cwd: string;
}

export type OsFamily = "windows" | "posix";

export type ScriptAction = "install" | "setup";

// ─────────────────────────────────────────────────────────────
// Dots
// ─────────────────────────────────────────────────────────────

/**
 * One application's configuration bundle: a directory holding a setup
 * script and, optionally, an install script.
 */
export interface Dot {
  readonly name: string;
  readonly path: string;
  readonly installScript: string | null;
  readonly setupScript: string | null;
}

/**
 * A dot joined with its selection flag, ready for the executor.
 */
export interface PlannedDot {
  dot: Dot;
  toInstall: boolean;
}

// ─────────────────────────────────────────────────────────────
// Config
// ─────────────────────────────────────────────────────────────

export interface App {
  name: string;
  toInstall: boolean;
}

export interface Config {
  name: string;
  description?: string;
  apps: App[];
  /**
   * Operating systems the config targets ("Linux", "Darwin", "Windows").
   * Empty means any.
   */
  operatingSystems: string[];
}

// ─────────────────────────────────────────────────────────────
// Execution
// ─────────────────────────────────────────────────────────────

export type ScriptResult =
  | { ok: true; script: string; exitCode: 0 }
  | { ok: false; script: string; reason: "exit"; exitCode: number }
  | { ok: false; script: string; reason: "signal"; signal: string }
  | { ok: false; script: string; reason: "timeout"; timeoutMs: number }
  | { ok: false; script: string; reason: "spawn"; message: string };

export type ScriptFailure = Extract<ScriptResult, { ok: false }>;

export type DotOutcome =
  | {
      status: "succeeded";
      dot: Dot;
      install?: ScriptResult;
      setup: ScriptResult;
    }
  | {
      status: "failed";
      stage: "install";
      dot: Dot;
      install: ScriptFailure;
    }
  | {
      status: "failed";
      stage: "setup";
      dot: Dot;
      install?: ScriptResult;
      setup: ScriptFailure;
    }
  | {
      status: "skipped";
      dot: Dot;
      reason: "no-setup-script";
    };

export interface RunReport {
  outcomes: DotOutcome[];
  failed: Dot[];
  succeeded: Dot[];
}
