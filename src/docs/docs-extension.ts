/**
 * Module-wide documentation registry.
 * Purpose: own the doc source sets and plugin parameters for one module during configuration.
 * Usage: const docs = new DocsExtension({ baseDir }); ...; docs.finalize() before writing files.
 */

import path from "node:path";

import { ConfigError } from "../core/errors.js";
import { NamedContainer } from "../core/named-container.js";
import { Property } from "../core/provider.js";

import { DocSourceSet } from "./doc-source-set.js";
import {
  HTML_PARAMETERS_NAME,
  HtmlPluginParameters,
  htmlPluginParametersCodec,
  isHtmlPluginParameters,
} from "./plugins/html-plugin-parameters.js";
import { PluginParametersRegistry, type PluginParametersSpec } from "./plugins/plugin-parameters.js";

export type DocsExtensionOptions = {
  /** Directory that relative paths in user configuration resolve against. */
  baseDir: string;
};

export class DocsExtension {
  readonly moduleName = new Property<string>("moduleName");
  readonly modulePath = new Property<string>("modulePath");
  readonly outputDir = new Property<string>("outputDir");
  readonly componentsDir = new Property<string>("componentsDir");

  readonly docSourceSets: NamedContainer<DocSourceSet>;
  readonly pluginsConfiguration: NamedContainer<PluginParametersSpec>;
  readonly parameterCodecs = new PluginParametersRegistry().register(
    htmlPluginParametersCodec,
    isHtmlPluginParameters,
  );

  private finalized = false;

  constructor(readonly options: DocsExtensionOptions) {
    const baseDir = options.baseDir;
    this.docSourceSets = new NamedContainer("Doc source set", (name) => new DocSourceSet(name, baseDir));
    this.pluginsConfiguration = new NamedContainer<PluginParametersSpec>("Plugin parameters", (name) => {
      throw new ConfigError(`Plugin parameters '${name}' must be added with a concrete type.`);
    });

    this.outputDir.convention(path.join(baseDir, "build", "docbridge"));
    this.componentsDir.convention(this.outputDir.asProvider().map((dir) => path.join(dir, "components")));
  }

  /** The HTML plugin parameters, created on first access. */
  html(): HtmlPluginParameters {
    const existing = this.pluginsConfiguration.findByName(HTML_PARAMETERS_NAME);
    if (existing && isHtmlPluginParameters(existing)) {
      return existing;
    }
    return this.addHtml();
  }

  /** Seals both registries and freezes every property; reads afterwards never recompute. */
  finalize(): void {
    if (this.finalized) return;

    for (const sourceSet of this.docSourceSets.values()) {
      sourceSet.finalizeValues();
    }
    for (const parameters of this.pluginsConfiguration.values()) {
      parameters.finalizeValues();
    }
    this.docSourceSets.seal();
    this.pluginsConfiguration.seal();
    this.moduleName.finalizeValue();
    this.modulePath.finalizeValue();
    this.outputDir.finalizeValue();
    this.componentsDir.finalizeValue();
    this.finalized = true;
  }

  isFinalized(): boolean {
    return this.finalized;
  }

  private addHtml(): HtmlPluginParameters {
    const parameters = new HtmlPluginParameters(HTML_PARAMETERS_NAME, this.options.baseDir);
    this.pluginsConfiguration.add(parameters);
    return parameters;
  }
}
