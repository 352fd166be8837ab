/*
Purpose: invoke the documentation generator as an external process.
Assumptions: the generator takes the configuration file path as its last argument.
Usage: await runGenerator({ command: "java", args: ["-jar", "cli.jar"], configPath, log }).
*/

import { execa } from "execa";

import { GeneratorError } from "../core/errors.js";
import { logEvent, NullLogSink, type LogSink } from "../core/logger.js";

const OUTPUT_PREVIEW_LIMIT = 4000;

export type GeneratorRunInput = {
  command: string;
  args?: string[];
  configPath: string;
  cwd?: string;
  log?: LogSink;
  signal?: AbortSignal;
};

export type GeneratorRunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
};

export function buildGeneratorArgs(input: Pick<GeneratorRunInput, "args" | "configPath">): string[] {
  return [...(input.args ?? []), input.configPath];
}

export async function runGenerator(input: GeneratorRunInput): Promise<GeneratorRunResult> {
  const log = input.log ?? NullLogSink;
  const args = buildGeneratorArgs(input);
  const startedAt = Date.now();

  logEvent(log, "generator.start", { command: input.command, args });

  const res = await execa(input.command, args, {
    cwd: input.cwd,
    reject: false,
    cancelSignal: input.signal,
  });

  const result: GeneratorRunResult = {
    exitCode: res.exitCode ?? -1,
    stdout: String(res.stdout ?? ""),
    stderr: String(res.stderr ?? ""),
    durationMs: Date.now() - startedAt,
  };

  if (res.isCanceled) {
    logEvent(log, "generator.canceled", { command: input.command });
    throw new GeneratorError(`Generator '${input.command}' was canceled.`);
  }

  if (result.exitCode !== 0) {
    logEvent(log, "generator.fail", {
      command: input.command,
      exit_code: result.exitCode,
      stderr: truncate(result.stderr),
    });
    throw new GeneratorError(
      `Generator '${input.command}' exited with ${result.exitCode}: ${firstLine(result.stderr)}`,
    );
  }

  logEvent(log, "generator.complete", {
    command: input.command,
    duration_ms: result.durationMs,
    stdout: truncate(result.stdout),
  });
  return result;
}

function truncate(text: string): string {
  return text.length <= OUTPUT_PREVIEW_LIMIT ? text : `${text.slice(0, OUTPUT_PREVIEW_LIMIT)}\n... [truncated]`;
}

function firstLine(text: string): string {
  const line = text.trim().split("\n")[0];
  return line && line.length > 0 ? line : "no error output";
}
