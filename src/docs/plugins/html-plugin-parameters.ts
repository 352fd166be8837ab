/**
 * Options for the generator's base HTML format.
 */

import path from "node:path";

import { z } from "zod";

import { ConfigError } from "../../core/errors.js";
import { FileCollection } from "../../core/file-collection.js";
import { Property } from "../../core/provider.js";
import { formatSchemaIssues } from "../../core/schema-issues.js";

import { PluginParametersSpec, type PluginParametersCodec } from "./plugin-parameters.js";
import { relativeToComponentsDir, resolveInComponentsDir } from "./relative-paths.js";

export const HTML_PARAMETERS_NAME = "html";
export const HTML_PLUGIN_FQN = "org.jetbrains.dokka.base.DokkaBase";

export class HtmlPluginParameters extends PluginParametersSpec {
  /**
   * Image assets bundled with the documentation, copied as-is into the publication.
   * A `homepage.svg` here replaces the homepage icon.
   */
  readonly customAssets: FileCollection;

  /** `.css` stylesheets bundled with the documentation and used for rendering. */
  readonly customStyleSheets: FileCollection;

  /** Render inherited properties and functions separately from declared ones. */
  readonly separateInheritedMembers = new Property<boolean>("separateInheritedMembers");

  /** Merge declarations that share a fully qualified name without being expect/actual. */
  readonly mergeImplicitExpectActualDeclarations = new Property<boolean>(
    "mergeImplicitExpectActualDeclarations",
  );

  readonly footerMessage = new Property<string>("footerMessage");

  /** Adds a link to the project's homepage in the HTML header. */
  readonly homepageLink = new Property<string>("homepageLink");

  /** Directory containing custom HTML templates; a relative value resolves against `baseDir`. */
  readonly templatesDir = new Property<string>("templatesDir");

  constructor(
    name: string = HTML_PARAMETERS_NAME,
    readonly baseDir: string = process.cwd(),
  ) {
    super(name, HTML_PLUGIN_FQN);
    this.customAssets = new FileCollection(baseDir);
    this.customStyleSheets = new FileCollection(baseDir);
  }

  finalizeValues(): void {
    this.customAssets.finalizeValue();
    this.customStyleSheets.finalizeValue();
    this.separateInheritedMembers.finalizeValue();
    this.mergeImplicitExpectActualDeclarations.finalizeValue();
    this.footerMessage.finalizeValue();
    this.homepageLink.finalizeValue();
    this.templatesDir.finalizeValue();
  }
}

export function isHtmlPluginParameters(value: PluginParametersSpec): value is HtmlPluginParameters {
  return value instanceof HtmlPluginParameters;
}

// =============================================================================
// SERIALIZATION
// =============================================================================

export const SerializedHtmlPluginParametersSchema = z
  .object({
    name: z.string().min(1),
    customAssetsRelativePaths: z.array(z.string()),
    customStyleSheetsRelativePaths: z.array(z.string()),
    templatesDirRelativePath: z.string().nullable(),
    homepageLink: z.string().nullable(),
    mergeImplicitExpectActualDeclarations: z.boolean().nullable(),
    separateInheritedMembers: z.boolean().nullable(),
    footerMessage: z.string().nullable(),
  })
  .strict();

export type SerializedHtmlPluginParameters = z.infer<typeof SerializedHtmlPluginParametersSchema>;

export function serializeHtmlPluginParameters(
  value: HtmlPluginParameters,
  componentsDir: string,
): SerializedHtmlPluginParameters {
  const relativize = (file: string): string => relativeToComponentsDir(file, componentsDir);
  const templatesDir = value.templatesDir.getOrNull();

  return {
    name: value.name,
    customAssetsRelativePaths: value.customAssets.fileTree().map(relativize),
    customStyleSheetsRelativePaths: value.customStyleSheets.fileTree().map(relativize),
    templatesDirRelativePath:
      templatesDir === undefined ? null : relativize(path.resolve(value.baseDir, templatesDir)),
    homepageLink: value.homepageLink.getOrNull() ?? null,
    mergeImplicitExpectActualDeclarations:
      value.mergeImplicitExpectActualDeclarations.getOrNull() ?? null,
    separateInheritedMembers: value.separateInheritedMembers.getOrNull() ?? null,
    footerMessage: value.footerMessage.getOrNull() ?? null,
  };
}

export function deserializeHtmlPluginParameters(
  serialized: SerializedHtmlPluginParameters,
  componentsDir: string,
): HtmlPluginParameters {
  const resolve = (relativePath: string): string =>
    resolveInComponentsDir(relativePath, componentsDir);

  const value = new HtmlPluginParameters(serialized.name, componentsDir);
  value.customAssets.from(serialized.customAssetsRelativePaths.map(resolve));
  value.customStyleSheets.from(serialized.customStyleSheetsRelativePaths.map(resolve));
  if (serialized.templatesDirRelativePath !== null) {
    value.templatesDir.set(resolve(serialized.templatesDirRelativePath));
  }
  value.homepageLink.set(serialized.homepageLink);
  value.mergeImplicitExpectActualDeclarations.set(serialized.mergeImplicitExpectActualDeclarations);
  value.separateInheritedMembers.set(serialized.separateInheritedMembers);
  value.footerMessage.set(serialized.footerMessage);
  return value;
}

export const htmlPluginParametersCodec: PluginParametersCodec<HtmlPluginParameters> = {
  pluginFqn: HTML_PLUGIN_FQN,

  encode(value, componentsDir) {
    return JSON.stringify(serializeHtmlPluginParameters(value, componentsDir));
  },

  decode(json, componentsDir) {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err) {
      throw new ConfigError("HTML plugin parameters are not valid JSON.", err);
    }

    const parsed = SerializedHtmlPluginParametersSchema.safeParse(raw);
    if (!parsed.success) {
      const details = formatSchemaIssues(parsed.error.issues).join("; ");
      throw new ConfigError(`HTML plugin parameters are invalid: ${details}`, parsed.error);
    }
    return deserializeHtmlPluginParameters(parsed.data, componentsDir);
  },
};
