import { parseArgs } from "util";
import chalk from "chalk";

import { setup } from "./commands/setup";
import { list } from "./commands/list";
import { MAX_TIMEOUT_MS } from "./lib/runner";

export const VERSION = "0.1.0";

export const TOO_MANY_ARGUMENTS = "Too many arguments!";

const HELP = `
${chalk.bold("dots")} — Install and set up applications from a dotfiles directory

${chalk.dim("Usage:")}
  dots [options] [dotfiles-dir]

  Each subdirectory of dotfiles-dir holding a setup script is a dot.
  dotfiles-dir defaults to ~/dotfiles.

${chalk.dim("Options:")}
  -c, --config <file>      Config listing the apps to set up
                           (default: dots.yaml in dotfiles-dir, if present)
  -i, --install            Run every dot's install script first
                           (ignored when a config is used)
  -l, --list               List discovered dots and exit
  -t, --timeout <seconds>  Kill a script that runs longer than this
      --any-os             Ignore the config's operating_systems
      --json               Print results as JSON
      --verbose            Verbose output
  -h, --help               Show this help
  -v, --version            Show version

${chalk.dim("Examples:")}
  dots
  dots ~/src/dotfiles --config laptop.yaml
  dots --list
`;

function parseTimeout(value: string | undefined): number {
  if (value === undefined) return 0;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0 || seconds * 1000 > MAX_TIMEOUT_MS) {
    throw new Error(`Invalid timeout: ${value}`);
  }
  return seconds;
}

/**
 * Run the CLI with the given arguments (without node and script path).
 * Returns the exit code.
 */
export async function run(argv: string[], cwd: string = process.cwd()): Promise<number> {
  let verbose = argv.includes("--verbose");

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
        verbose: { type: "boolean" },
        config: { type: "string", short: "c" },
        install: { type: "boolean", short: "i" },
        list: { type: "boolean", short: "l" },
        timeout: { type: "string", short: "t" },
        "any-os": { type: "boolean" },
        json: { type: "boolean" },
      },
      allowPositionals: true,
    });

    if (values.version) {
      console.log(`dots v${VERSION}`);
      return 0;
    }

    if (values.help) {
      console.log(HELP);
      return 0;
    }

    if (positionals.length > 1) {
      console.error(chalk.red(TOO_MANY_ARGUMENTS));
      return 1;
    }

    verbose = values.verbose ?? false;
    const ctx = { verbose, cwd };
    const root: string | undefined = positionals[0];
    const json = values.json ?? false;

    if (values.list) {
      return await list({ root, json }, ctx);
    }

    return await setup(
      {
        root,
        config: values.config,
        install: values.install ?? false,
        timeout: parseTimeout(values.timeout),
        anyOs: values["any-os"] ?? false,
        json,
      },
      ctx
    );
  } catch (err) {
    if (verbose && err instanceof Error) {
      console.error(chalk.red("Error:"), err.message);
      console.error(chalk.dim(err.stack));
    } else if (err instanceof Error) {
      console.error(chalk.red("Error:"), err.message);
    } else {
      console.error(chalk.red("Error:"), err);
    }
    return 1;
  }
}

export async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}
