import { resolve } from "path";
import chalk from "chalk";
import type { Context, DotOutcome, PlannedDot } from "../types";
import { resolveDotfilesRoot } from "../lib/paths";
import { assertConfigApplicable, findConfig, loadConfig } from "../lib/config";
import { discoverDots } from "../lib/discovery";
import { buildSelection, selectAll, selectDots, unmatchedApps } from "../lib/selector";
import { executeDots } from "../lib/executor";
import { describeFailure, printReport, toJsonReport } from "../lib/report";

export interface SetupOptions {
  root?: string;
  config?: string;
  /** Without a config: run every dot's install script first */
  install: boolean;
  /** Per-script timeout in seconds, 0 for none */
  timeout: number;
  anyOs: boolean;
  json: boolean;
}

function logOutcome(outcome: DotOutcome): void {
  switch (outcome.status) {
    case "succeeded":
      console.log(chalk.green("  ✓ ") + outcome.dot.name);
      break;
    case "failed": {
      const result = outcome.stage === "install" ? outcome.install : outcome.setup;
      console.log(
        chalk.red("  ✗ ") + outcome.dot.name + chalk.dim(` (${outcome.stage}: ${describeFailure(result)})`)
      );
      break;
    }
    case "skipped":
      console.log(chalk.dim(`  - ${outcome.dot.name} (no setup script)`));
      break;
  }
}

/**
 * Discover dots, narrow them by config, then install and set up each one.
 * Returns the process exit code.
 */
export async function setup(options: SetupOptions, ctx: Context): Promise<number> {
  const root = await resolveDotfilesRoot(options.root, ctx.cwd);
  const configPath = options.config ? resolve(ctx.cwd, options.config) : await findConfig(root);
  const config = configPath ? await loadConfig(configPath) : null;

  if (config && !options.anyOs) {
    assertConfigApplicable(config);
  }

  const dots = await discoverDots(root);

  let planned: PlannedDot[];
  if (config) {
    const selection = buildSelection(config);
    planned = selectDots(dots, selection);

    if (!options.json) {
      if (options.install) {
        console.log(chalk.yellow(`Warning: --install is ignored; ${config.name} sets to_install per app`));
      }
      for (const name of unmatchedApps(dots, selection)) {
        console.log(chalk.yellow(`Warning: '${name}' is listed in ${config.name} but has no dot`));
      }
    }
  } else {
    planned = selectAll(dots, options.install);
  }

  if (!options.json) {
    const source = config ? ` (${config.name})` : "";
    console.log(chalk.blue("→") + ` Setting up ${planned.length} dot(s) from ${root}${source}`);
    if (ctx.verbose && configPath) {
      console.log(chalk.dim(`  Config: ${configPath}`));
    }
  }

  const report = await executeDots(planned, {
    run: {
      timeoutMs: options.timeout * 1000,
      // Script output would corrupt the JSON on stdout
      stdio: options.json ? "ignore" : "inherit",
    },
    onOutcome: ctx.verbose && !options.json ? logOutcome : undefined,
  });

  if (options.json) {
    console.log(JSON.stringify(toJsonReport(report), null, 2));
  } else {
    printReport(report);
  }

  return report.failed.length > 0 ? 1 : 0;
}
