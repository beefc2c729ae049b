import { basename } from "path";
import chalk from "chalk";
import type { Context } from "../types";
import { resolveDotfilesRoot } from "../lib/paths";
import { discoverDots } from "../lib/discovery";

export interface ListOptions {
  root?: string;
  json: boolean;
}

export async function list(options: ListOptions, ctx: Context): Promise<number> {
  const root = await resolveDotfilesRoot(options.root, ctx.cwd);
  const dots = await discoverDots(root);

  if (options.json) {
    console.log(JSON.stringify(dots, null, 2));
    return 0;
  }

  if (dots.length === 0) {
    console.log(chalk.yellow(`No dots found in ${root}`));
    console.log(chalk.dim("A dot is a directory holding a setup script."));
    return 0;
  }

  console.log(chalk.blue("→") + ` ${dots.length} dot(s) in ${root}:\n`);

  for (const dot of dots) {
    const install = dot.installScript ? basename(dot.installScript) : chalk.dim("none");
    const setup = dot.setupScript ? basename(dot.setupScript) : chalk.yellow("none");
    console.log(`  ${chalk.cyan(dot.name)}`);
    console.log(chalk.dim("    install: ") + install + chalk.dim("  setup: ") + setup);
    if (ctx.verbose) {
      console.log(chalk.dim(`    ${dot.path}`));
    }
  }

  return 0;
}
