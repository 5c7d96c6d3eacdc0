#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { configCommand } from "./commands/config.js";
import { errorMsg } from "./utils/display.js";
import { parsePositiveInt } from "./utils/config.js";

export interface CommandHandlers {
  runCommand: typeof runCommand;
  configCommand: typeof configCommand;
}

const defaultHandlers: CommandHandlers = {
  runCommand,
  configCommand,
};

function isInvokedDirectly(argv1: string | undefined): boolean {
  if (typeof argv1 !== "string") return false;

  // npm often invokes package bins through symlinks in node_modules/.bin.
  // Compare real paths so symlinked execution still triggers the CLI entrypoint.
  try {
    const invokedPath = realpathSync(argv1);
    const thisModulePath = realpathSync(fileURLToPath(import.meta.url));
    if (invokedPath === thisModulePath) return true;
  } catch {
    // Fall through to URL equality check below.
  }

  try {
    return import.meta.url === pathToFileURL(argv1).href;
  } catch {
    return false;
  }
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name("bgjobs")
    .description("Run a few slow, independent commands in parallel and wait for all of them")
    .version("0.1.0");

  program
    .command("run <commands...>")
    .description("Run each command line as a background job and wait for every job")
    .option("-j, --jobs <n>", "Maximum number of jobs running at once")
    .option("--echo", "Print each command before it runs")
    .option("--no-echo", "Do not print commands, even if the config enables it")
    .option("--json", "Output machine-readable JSON")
    .option("-p, --path <path>", "Working directory for the commands")
    .action(async (commands: string[], opts) => {
      let jobs: number | undefined;
      if (opts.jobs !== undefined) {
        jobs = parsePositiveInt(String(opts.jobs));
        if (jobs === undefined) {
          console.error(errorMsg("--jobs must be a positive integer"));
          process.exitCode = 1;
          return;
        }
      }
      await handlers.runCommand(commands, {
        path: opts.path,
        jobs,
        echo: opts.echo,
        json: opts.json,
      });
    });

  program
    .command("config")
    .description("View or edit .bgjobs.yaml settings")
    .option("--limit <n>", "Set the default job limit")
    .option("--echo", "Echo commands before running them")
    .option("--no-echo", "Do not echo commands")
    .option("--shell <path>", "Shell used to run command lines")
    .option("-p, --path <path>", "Project root path")
    .action(async (opts) => {
      await handlers.configCommand({
        path: opts.path,
        limit: opts.limit,
        echo: opts.echo,
        shell: opts.shell,
      });
    });

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  handlers: CommandHandlers = defaultHandlers,
): Promise<void> {
  const program = createProgram(handlers);
  await program.parseAsync(argv);
}

const invokedDirectly = isInvokedDirectly(process.argv[1]);

if (invokedDirectly) {
  runCli().catch((err) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(errorMsg(msg));
    process.exit(1);
  });
}
