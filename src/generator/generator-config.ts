// Generator configuration writer.
// Purpose: turn a sealed docs registry into the JSON the documentation generator reads.
// Assumes DocsExtension.finalize() ran; parameter bags are written relative to componentsDir.

import path from "node:path";

import fse from "fs-extra";

import { ConfigError } from "../core/errors.js";
import { writeJsonFile } from "../core/utils.js";
import type { AnalysisPlatform } from "../docs/analysis-platform.js";
import type { DocsExtension } from "../docs/docs-extension.js";
import type { DocSourceSet } from "../docs/doc-source-set.js";
import type {
  PluginParametersRegistry,
  PluginParametersSpec,
} from "../docs/plugins/plugin-parameters.js";

export const GENERATOR_CONFIG_FILE = "docbridge-configuration.json";
export const PLUGIN_PARAMETERS_DIR = "plugins";

// =============================================================================
// TYPES
// =============================================================================

export type SourceSetId = {
  scopeId: string;
  sourceSetName: string;
};

export type GeneratorSourceSet = {
  sourceSetID: SourceSetId;
  displayName: string;
  analysisPlatform: AnalysisPlatform;
  suppress: boolean;
  sourceRoots: string[];
  classpath: string[];
  dependentSourceSets: SourceSetId[];
};

export type PluginConfigurationEntry = {
  fqPluginName: string;
  serializationFormat: "JSON";
  values: string;
};

export type GeneratorConfiguration = {
  moduleName: string;
  modulePath: string;
  outputDir: string;
  sourceSets: GeneratorSourceSet[];
  pluginsConfiguration: PluginConfigurationEntry[];
};

export type GeneratorFiles = {
  configPath: string;
  parameterFiles: string[];
  configuration: GeneratorConfiguration;
};

// =============================================================================
// BUILD
// =============================================================================

export function buildGeneratorConfiguration(docs: DocsExtension): GeneratorConfiguration {
  if (!docs.isFinalized()) {
    throw new ConfigError("Docs registry must be finalized before writing generator configuration.");
  }

  const modulePath = docs.modulePath.getOrNull() ?? "";
  const componentsDir = docs.componentsDir.get();

  return {
    moduleName: docs.moduleName.get(),
    modulePath,
    outputDir: docs.outputDir.get(),
    sourceSets: docs.docSourceSets
      .values()
      .map((sourceSet) => toGeneratorSourceSet(sourceSet, modulePath)),
    pluginsConfiguration: docs.pluginsConfiguration.values().map((parameters) => ({
      fqPluginName: parameters.pluginFqn,
      serializationFormat: "JSON",
      values: docs.parameterCodecs.encode(parameters, componentsDir),
    })),
  };
}

function toGeneratorSourceSet(sourceSet: DocSourceSet, scopeId: string): GeneratorSourceSet {
  return {
    sourceSetID: { scopeId, sourceSetName: sourceSet.name },
    displayName: sourceSet.displayName.get(),
    analysisPlatform: sourceSet.analysisPlatform.get(),
    suppress: sourceSet.suppress.get(),
    sourceRoots: sourceSet.sourceRoots.files(),
    classpath: sourceSet.classpath.files(),
    dependentSourceSets: sourceSet
      .dependentSourceSetNames()
      .map((sourceSetName) => ({ scopeId, sourceSetName })),
  };
}

// =============================================================================
// FILES
// =============================================================================

export function pluginParametersPath(componentsDir: string, pluginFqn: string): string {
  return path.join(componentsDir, PLUGIN_PARAMETERS_DIR, `${pluginFqn}.json`);
}

export async function writeGeneratorFiles(docs: DocsExtension): Promise<GeneratorFiles> {
  const configuration = buildGeneratorConfiguration(docs);
  const componentsDir = docs.componentsDir.get();

  const parameterFiles: string[] = [];
  for (const entry of configuration.pluginsConfiguration) {
    const filePath = pluginParametersPath(componentsDir, entry.fqPluginName);
    await writeJsonFile(filePath, JSON.parse(entry.values));
    parameterFiles.push(filePath);
  }

  const configPath = path.join(configuration.outputDir, GENERATOR_CONFIG_FILE);
  await writeJsonFile(configPath, configuration);

  return { configPath, parameterFiles, configuration };
}

export async function readPluginParameters(args: {
  componentsDir: string;
  pluginFqn: string;
  registry: PluginParametersRegistry;
}): Promise<PluginParametersSpec> {
  const filePath = pluginParametersPath(args.componentsDir, args.pluginFqn);
  if (!(await fse.pathExists(filePath))) {
    throw new ConfigError(`No parameters stored for plugin ${args.pluginFqn} at ${filePath}.`);
  }
  const json = await fse.readFile(filePath, "utf8");
  return args.registry.decode(args.pluginFqn, json, args.componentsDir);
}
