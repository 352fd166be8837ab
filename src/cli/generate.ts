import type { ProjectConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { logEvent, type LogSink } from "../core/logger.js";
import { runGenerator } from "../generator/runner.js";

import { configureCommand } from "./configure.js";

type StopSignal = "SIGINT" | "SIGTERM";

type SignalSource = {
  once(event: StopSignal, listener: () => void): unknown;
  off(event: StopSignal, listener: () => void): unknown;
};

export type GeneratorStop = {
  signal: AbortSignal;
  dispose: () => void;
};

/** Cancels the generator run on the first SIGINT or SIGTERM. */
export function watchStopSignals(
  log: LogSink,
  source: SignalSource = process,
): GeneratorStop {
  const controller = new AbortController();
  const listeners: Array<[StopSignal, () => void]> = [];

  const dispose = (): void => {
    for (const [event, listener] of listeners.splice(0)) {
      source.off(event, listener);
    }
  };

  for (const event of ["SIGINT", "SIGTERM"] as const) {
    const listener = (): void => {
      logEvent(log, "generator.stop_requested", { signal: event });
      console.log(`Received ${event}. Stopping the documentation generator.`);
      dispose();
      controller.abort(event);
    };
    listeners.push([event, listener]);
    source.once(event, listener);
  }

  return { signal: controller.signal, dispose };
}

export async function generateCommand(config: ProjectConfig, log: LogSink): Promise<void> {
  const generator = config.generator;
  if (!generator) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Generator not configured.",
      message: "The config has no `generator` section.",
      hint: 'Add "generator": { "command": "...", "args": [...] } to docbridge.config.json.',
    });
  }

  const files = await configureCommand(config, log);
  const stop = watchStopSignals(log);

  try {
    const result = await runGenerator({
      command: generator.command,
      args: generator.args,
      cwd: generator.cwd ?? config.configDir,
      configPath: files.configPath,
      log,
      signal: stop.signal,
    });
    console.log(`Documentation generated in ${files.configuration.outputDir} (${result.durationMs}ms).`);
  } finally {
    stop.dispose();
  }
}
