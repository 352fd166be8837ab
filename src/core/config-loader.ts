import path from "node:path";

import fse from "fs-extra";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { formatSchemaIssues } from "./schema-issues.js";

const CONFIG_HINT = "Run `docbridge configure --config <path>` with a valid docbridge.config.json.";

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolute = path.resolve(configPath);

  if (!fse.existsSync(absolute)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No docbridge config found at ${absolute}.`,
      hint: CONFIG_HINT,
    });
  }

  let raw: unknown;
  try {
    raw = fse.readJsonSync(absolute);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config unreadable.",
      message: `Could not parse ${absolute} as JSON.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }

  return parseProjectConfig(raw, absolute);
}

export function parseProjectConfig(raw: unknown, configPath: string): ProjectConfig {
  const parsed = ProjectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Config ${configPath} is invalid:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
      hint: CONFIG_HINT,
      cause: parsed.error,
    });
  }

  const configDir = path.dirname(configPath);
  const resolve = (value: string): string => path.resolve(configDir, value);
  const data = parsed.data;
  const outputDir = resolve(data.outputDir);

  const sourceSets = Object.fromEntries(
    Object.entries(data.sourceSets).map(([name, override]) => [
      name,
      {
        ...override,
        sourceRoots: override.sourceRoots.map(resolve),
        classpath: override.classpath.map(resolve),
      },
    ]),
  );

  const html = data.plugins.html;

  return {
    ...data,
    configPath,
    configDir,
    model: resolve(data.model),
    outputDir,
    componentsDir: data.componentsDir ? resolve(data.componentsDir) : path.join(outputDir, "components"),
    logFile: data.logFile ? resolve(data.logFile) : path.join(outputDir, "logs", "docbridge.jsonl"),
    sourceSets,
    plugins: html
      ? {
          html: {
            ...html,
            customAssets: html.customAssets.map(resolve),
            customStyleSheets: html.customStyleSheets.map(resolve),
            templatesDir: html.templatesDir ? resolve(html.templatesDir) : undefined,
          },
        }
      : {},
    generator: data.generator
      ? { ...data.generator, cwd: data.generator.cwd ? resolve(data.generator.cwd) : undefined }
      : undefined,
  };
}
