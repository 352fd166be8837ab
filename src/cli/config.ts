import type { ProjectConfig } from "../core/config.js";
import { resolveConfigPath, CONFIG_FILE_NAME } from "../core/config-discovery.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";

export function loadConfigForCli(args: { explicitConfigPath?: string; cwd?: string }): {
  config: ProjectConfig;
  configPath: string;
} {
  const resolved = resolveConfigPath({ explicitPath: args.explicitConfigPath, cwd: args.cwd });
  if (!resolved) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No ${CONFIG_FILE_NAME} found in the current or parent directories.`,
      hint: "Pass --config <path> or create docbridge.config.json next to the module.",
    });
  }

  return { config: loadProjectConfig(resolved.configPath), configPath: resolved.configPath };
}

export function createCliLogger(config: ProjectConfig, command: string): JsonlLogger {
  return new JsonlLogger(config.logFile, { command, module: config.modulePath });
}
