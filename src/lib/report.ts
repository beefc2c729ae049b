import chalk from "chalk";
import type { Dot, DotOutcome, RunReport, ScriptFailure } from "../types";

export const FAILED_HEADER = "The following applications failed to install or setup:";
export const SUCCEEDED_HEADER = "The following applications succeeded setup:";

/**
 * Short reason for a failed script, e.g. "exit code 2"
 */
export function describeFailure(result: ScriptFailure): string {
  switch (result.reason) {
    case "exit":
      return `exit code ${result.exitCode}`;
    case "signal":
      return `killed by ${result.signal}`;
    case "timeout":
      return `timed out after ${result.timeoutMs}ms`;
    case "spawn":
      return `could not start: ${result.message}`;
  }
}

function failureDetail(outcome: DotOutcome): string | null {
  if (outcome.status !== "failed") return null;
  const result = outcome.stage === "install" ? outcome.install : outcome.setup;
  return `${outcome.stage} failed: ${describeFailure(result)}`;
}

/**
 * Plain-text summary lines: failures first, then successes. Skipped dots
 * appear in neither section.
 */
export function formatReport(report: RunReport): string[] {
  const lines: string[] = [];
  const details = new Map<Dot, string>();

  for (const outcome of report.outcomes) {
    const detail = failureDetail(outcome);
    if (detail) details.set(outcome.dot, detail);
  }

  if (report.failed.length > 0) {
    lines.push(FAILED_HEADER);
    for (const dot of report.failed) {
      const detail = details.get(dot);
      lines.push(detail ? `${dot.name} (${detail})` : dot.name);
    }
  }

  if (report.succeeded.length > 0) {
    lines.push(SUCCEEDED_HEADER);
    for (const dot of report.succeeded) {
      lines.push(dot.name);
    }
  }

  return lines;
}

export interface JsonReport {
  failed: { name: string; stage: "install" | "setup"; reason: string }[];
  succeeded: string[];
  skipped: string[];
}

export function toJsonReport(report: RunReport): JsonReport {
  const json: JsonReport = { failed: [], succeeded: [], skipped: [] };

  for (const outcome of report.outcomes) {
    switch (outcome.status) {
      case "failed": {
        const result = outcome.stage === "install" ? outcome.install : outcome.setup;
        json.failed.push({
          name: outcome.dot.name,
          stage: outcome.stage,
          reason: describeFailure(result),
        });
        break;
      }
      case "succeeded":
        json.succeeded.push(outcome.dot.name);
        break;
      case "skipped":
        json.skipped.push(outcome.dot.name);
        break;
    }
  }

  return json;
}

/**
 * Print the end-of-run summary
 */
export function printReport(report: RunReport): void {
  for (const line of formatReport(report)) {
    if (line === FAILED_HEADER) {
      console.log(chalk.red(line));
    } else if (line === SUCCEEDED_HEADER) {
      console.log(chalk.green(line));
    } else {
      console.log(line);
    }
  }
}
