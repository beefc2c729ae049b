import type { Dot, DotOutcome, PlannedDot, RunReport, ScriptResult } from "../types";
import { runScript, type RunOptions, type ScriptRunner } from "./runner";

export interface ExecuteOptions {
  runner?: ScriptRunner;
  run?: RunOptions;
  /** Called after each dot finishes */
  onOutcome?: (outcome: DotOutcome) => void;
}

/**
 * Install (when asked and possible), then set up a single dot.
 * A failed install means setup never runs.
 */
export async function executeDot(
  planned: PlannedDot,
  runner: ScriptRunner = runScript,
  runOptions: RunOptions = {}
): Promise<DotOutcome> {
  const { dot, toInstall } = planned;

  let install: ScriptResult | undefined;
  if (toInstall && dot.installScript !== null) {
    install = await runner(dot.installScript, runOptions);
    if (!install.ok) {
      return { status: "failed", stage: "install", dot, install };
    }
  }

  if (dot.setupScript === null) {
    return { status: "skipped", dot, reason: "no-setup-script" };
  }

  const setup = await runner(dot.setupScript, runOptions);
  if (!setup.ok) {
    return { status: "failed", stage: "setup", dot, install, setup };
  }

  return { status: "succeeded", dot, install, setup };
}

/**
 * Execute dots one after another. Script failures are recorded and the run
 * moves on to the next dot.
 */
export async function executeDots(
  planned: PlannedDot[],
  options: ExecuteOptions = {}
): Promise<RunReport> {
  const runner = options.runner ?? runScript;
  const outcomes: DotOutcome[] = [];
  const failed: Dot[] = [];
  const succeeded: Dot[] = [];

  for (const entry of planned) {
    const outcome = await executeDot(entry, runner, options.run);
    outcomes.push(outcome);

    if (outcome.status === "failed") {
      failed.push(outcome.dot);
    } else if (outcome.status === "succeeded") {
      succeeded.push(outcome.dot);
    }

    options.onOutcome?.(outcome);
  }

  return { outcomes, failed, succeeded };
}
