import { z } from "zod";

// =============================================================================
// SCHEMA
// =============================================================================

export const HtmlPluginConfigSchema = z
  .object({
    customAssets: z.array(z.string()).default([]),
    customStyleSheets: z.array(z.string()).default([]),
    separateInheritedMembers: z.boolean().optional(),
    mergeImplicitExpectActualDeclarations: z.boolean().optional(),
    footerMessage: z.string().optional(),
    homepageLink: z.string().url().optional(),
    templatesDir: z.string().min(1).optional(),
  })
  .strict();

export const SourceSetOverrideSchema = z
  .object({
    suppress: z.boolean().optional(),
    displayName: z.string().min(1).optional(),
    sourceRoots: z.array(z.string()).default([]),
    classpath: z.array(z.string()).default([]),
  })
  .strict();

export const GeneratorConfigSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    cwd: z.string().optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    moduleName: z.string().min(1),
    modulePath: z.string().default(""),
    model: z.string().min(1),
    outputDir: z.string().min(1).default("build/docbridge"),
    componentsDir: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    sourceSets: z.record(SourceSetOverrideSchema).default({}),
    plugins: z
      .object({
        html: HtmlPluginConfigSchema.optional(),
      })
      .strict()
      .default({}),
    generator: GeneratorConfigSchema.optional(),
  })
  .strict();

// =============================================================================
// TYPES
// =============================================================================

export type HtmlPluginConfig = z.infer<typeof HtmlPluginConfigSchema>;
export type SourceSetOverride = z.infer<typeof SourceSetOverrideSchema>;
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

/** Parsed config with every path made absolute against the config file's directory. */
export type ProjectConfig = z.infer<typeof ProjectConfigSchema> & {
  configPath: string;
  configDir: string;
  componentsDir: string;
  logFile: string;
};
