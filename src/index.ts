import { Command } from "commander";

import { createCliLogger, loadConfigForCli } from "./cli/config.js";
import { configureCommand } from "./cli/configure.js";
import { generateCommand } from "./cli/generate.js";
import { inspectCommand } from "./cli/inspect.js";
import type { ProjectConfig } from "./core/config.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./core/error-format.js";
import type { JsonlLogger } from "./core/logger.js";

export const VERSION = "0.1.0";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("docbridge")
    .description("Wire a documentation generator into a multi-module build")
    .version(VERSION)
    .option("--config <path>", "Path to docbridge.config.json")
    .option("--debug", "Print error details and stack traces", false);

  program
    .command("configure")
    .description("Register source sets and write the generator configuration")
    .action(async (_opts, command: Command) => {
      await withConfig(command, "configure", (config, log) => configureCommand(config, log));
    });

  program
    .command("generate")
    .description("Configure, then run the documentation generator")
    .action(async (_opts, command: Command) => {
      await withConfig(command, "generate", (config, log) => generateCommand(config, log));
    });

  program
    .command("inspect")
    .description("Show the documentation source sets registered for the module")
    .option("--json", "Print JSON instead of text", false)
    .action(async (opts: { json: boolean }, command: Command) => {
      await withConfig(command, "inspect", (config, log) =>
        inspectCommand(config, log, { json: opts.json }),
      );
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = program.opts<GlobalOptions>().debug ?? false;
    const lines = formatErrorLines(err, { mode: debug ? "debug" : "short" });
    console.error(renderErrorLines(lines, createAnsiFormatter(resolveColorEnabled())));
    process.exitCode = 1;
  }
}

async function withConfig(
  command: Command,
  name: string,
  run: (config: ProjectConfig, log: JsonlLogger) => Promise<unknown>,
): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
  const log = createCliLogger(config, name);
  await run(config, log);
}
