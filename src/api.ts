export { SourceSetClassifier, isMainCompilation, probeMainVariant } from "./adapters/source-set-classifier.js";
export {
  LANGUAGE_PLUGIN_IDS,
  LanguageAdapterContext,
  applyLanguageAdapter,
  type LanguageAdapterInput,
  type LanguageAdapterResult,
} from "./adapters/language-adapter.js";
export { configureModule, configureLoadedModule, type ConfiguredModule } from "./app/configure-module.js";
export { loadProjectConfig, parseProjectConfig } from "./core/config-loader.js";
export type { ProjectConfig } from "./core/config.js";
export * from "./core/errors.js";
export { FileCollection } from "./core/file-collection.js";
export { detectHostCapabilities, compareVersions, type HostCapabilities } from "./core/host-version.js";
export { JsonlLogger, MemoryLogSink, NullLogSink, type LogSink } from "./core/logger.js";
export { NamedContainer } from "./core/named-container.js";
export { Property, Provider } from "./core/provider.js";
export {
  DependencyBucket,
  bucketsFromModel,
  collectIncomingFiles,
  consumable,
  createBucketContainer,
  declarable,
  resolvable,
  type BucketContainer,
} from "./dependencies/buckets.js";
export { analysisPlatformFromString, type AnalysisPlatform } from "./docs/analysis-platform.js";
export { DocSourceSet, DependentSourceSetRef } from "./docs/doc-source-set.js";
export { DocsExtension } from "./docs/docs-extension.js";
export {
  HTML_PLUGIN_FQN,
  HtmlPluginParameters,
  htmlPluginParametersCodec,
  serializeHtmlPluginParameters,
  deserializeHtmlPluginParameters,
  type SerializedHtmlPluginParameters,
} from "./docs/plugins/html-plugin-parameters.js";
export { PluginParametersRegistry, PluginParametersSpec } from "./docs/plugins/plugin-parameters.js";
export {
  buildGeneratorConfiguration,
  readPluginParameters,
  writeGeneratorFiles,
  type GeneratorConfiguration,
} from "./generator/generator-config.js";
export { runGenerator } from "./generator/runner.js";
export { loadModuleModel, parseModuleModel, type ModuleModel } from "./model/module-model.js";
