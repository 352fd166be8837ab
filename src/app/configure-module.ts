/**
 * One configuration pass for a module.
 * Purpose: load the module model, run the language adapter, apply explicit user values,
 * then seal the registry for the execution phase.
 * Usage: const configured = await configureModule({ config, log }).
 */

import type { HtmlPluginConfig, ProjectConfig, SourceSetOverride } from "../core/config.js";
import { logEvent, NullLogSink, type LogSink } from "../core/logger.js";
import { applyLanguageAdapter, type LanguageAdapterResult } from "../adapters/language-adapter.js";
import { bucketsFromModel } from "../dependencies/buckets.js";
import { DocsExtension } from "../docs/docs-extension.js";
import type { HtmlPluginParameters } from "../docs/plugins/html-plugin-parameters.js";
import { loadModuleModel, type ModuleModel } from "../model/module-model.js";

export type ConfiguredModule = {
  model: ModuleModel;
  docs: DocsExtension;
  adapter: LanguageAdapterResult;
};

export async function configureModule(args: {
  config: ProjectConfig;
  log?: LogSink;
}): Promise<ConfiguredModule> {
  const model = await loadModuleModel(args.config.model);
  return configureLoadedModule({ ...args, model });
}

export function configureLoadedModule(args: {
  config: ProjectConfig;
  model: ModuleModel;
  log?: LogSink;
}): ConfiguredModule {
  const { config, model } = args;
  const log = args.log ?? NullLogSink;

  const docs = new DocsExtension({ baseDir: config.configDir });
  docs.moduleName.set(config.moduleName);
  docs.modulePath.set(config.modulePath);
  docs.outputDir.set(config.outputDir);
  docs.componentsDir.set(config.componentsDir);

  const buckets = bucketsFromModel(model.buckets, model);
  const adapter = applyLanguageAdapter({ model, docs, buckets, log });

  for (const [name, override] of Object.entries(config.sourceSets)) {
    applySourceSetOverride(docs, name, override);
  }

  if (config.plugins.html) {
    applyHtmlConfig(docs.html(), config.plugins.html);
  }

  docs.finalize();
  logEvent(log, "module.configured", {
    module: model.path,
    sourceSets: docs.docSourceSets.names(),
    plugins: docs.pluginsConfiguration.names(),
  });

  return { model, docs, adapter };
}

function applySourceSetOverride(docs: DocsExtension, name: string, override: SourceSetOverride): void {
  docs.docSourceSets.maybeCreate(name, (sourceSet) => {
    if (override.suppress !== undefined) {
      sourceSet.suppress.set(override.suppress);
    }
    if (override.displayName !== undefined) {
      sourceSet.displayName.set(override.displayName);
    }
    sourceSet.sourceRoots.from(override.sourceRoots);
    sourceSet.classpath.from(override.classpath);
  });
}

function applyHtmlConfig(html: HtmlPluginParameters, config: HtmlPluginConfig): void {
  html.customAssets.from(config.customAssets);
  html.customStyleSheets.from(config.customStyleSheets);
  html.separateInheritedMembers.set(config.separateInheritedMembers);
  html.mergeImplicitExpectActualDeclarations.set(config.mergeImplicitExpectActualDeclarations);
  html.footerMessage.set(config.footerMessage);
  html.homepageLink.set(config.homepageLink);
  html.templatesDir.set(config.templatesDir);
}
