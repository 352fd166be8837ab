// Module model as exported by a language plugin.
// Purpose: validate the exported JSON and expose source sets, targets and compilations read-only.
// Assumes paths in the export are relative to the module's project directory.

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { MissingHostApiError, ModelError } from "../core/errors.js";
import { detectHostCapabilities } from "../core/host-version.js";
import { formatSchemaIssues } from "../core/schema-issues.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const PLATFORM_TYPES = ["common", "jvm", "js", "androidJvm", "native", "wasm"] as const;
export const VARIANT_KINDS = ["library", "application", "test", "unit-test", "other"] as const;

const VariantSchema = z.object({ kind: z.enum(VARIANT_KINDS) }).strict();

const CompilationSchema = z
  .object({
    name: z.string().min(1),
    defaultSourceSet: z.string().min(1),
    sourceSets: z.array(z.string()).default([]),
    variant: VariantSchema.optional(),
  })
  .strict();

const TargetSchema = z
  .object({
    name: z.string().min(1),
    platformType: z.enum(PLATFORM_TYPES),
    compilations: z.array(CompilationSchema).default([]),
  })
  .strict();

const ExtensionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("multiplatform"), targets: z.array(TargetSchema) }).strict(),
  z.object({ kind: z.literal("single-target"), target: TargetSchema }).strict(),
  z.object({ kind: z.literal("other") }).strict(),
]);

const SourceSetSchema = z
  .object({
    name: z.string().min(1),
    sourceRoots: z.array(z.string()).default([]),
    dependsOn: z.array(z.string()).default([]),
    implementationBucket: z.string().min(1).optional(),
  })
  .strict();

const BucketSchema = z
  .object({
    name: z.string().min(1),
    canBeResolved: z.boolean().default(true),
    canBeConsumed: z.boolean().default(true),
    extendsFrom: z.array(z.string()).default([]),
    files: z.array(z.string()).default([]),
  })
  .strict();

export const ModuleModelSchema = z
  .object({
    path: z.string().min(1),
    projectDir: z.string().optional(),
    hostVersion: z.string().min(1),
    languagePluginVersion: z.string().min(1).optional(),
    appliedPlugins: z.array(z.string()).default([]),
    extension: ExtensionSchema.optional(),
    sourceSets: z.array(SourceSetSchema).default([]),
    buckets: z.array(BucketSchema).default([]),
  })
  .strict();

export type ModuleModelInput = z.input<typeof ModuleModelSchema>;

// =============================================================================
// MODEL TYPES
// =============================================================================

export type PlatformType = (typeof PLATFORM_TYPES)[number];
export type VariantKind = (typeof VARIANT_KINDS)[number];

export type Variant = { kind: VariantKind };

export type SourceSet = {
  readonly name: string;
  /** Absolute directories; they may not exist. */
  readonly sourceRoots: string[];
  readonly dependsOn: string[];
  readonly implementationBucketName: string;
};

export type Compilation = {
  readonly name: string;
  readonly defaultSourceSet: string;
  /** Source sets added to the compilation directly, besides the default one. */
  readonly sourceSets: string[];
  /**
   * Present on variant-bearing compilations only. Throws MissingHostApiError when the
   * language plugin is too old to report variants.
   */
  readonly variant?: () => Variant;
};

export type Target = {
  readonly name: string;
  readonly platformType: PlatformType;
  readonly compilations: Compilation[];
};

export type ModuleExtension =
  | { kind: "multiplatform"; targets: Target[] }
  | { kind: "single-target"; target: Target }
  | { kind: "other" };

export type BucketSpec = z.infer<typeof BucketSchema>;

export type ModuleModel = {
  readonly path: string;
  readonly projectDir: string;
  readonly hostVersion: string;
  readonly languagePluginVersion?: string;
  readonly appliedPlugins: string[];
  readonly extension?: ModuleExtension;
  readonly sourceSets: SourceSet[];
  readonly buckets: BucketSpec[];
};

// =============================================================================
// LOADING
// =============================================================================

export async function loadModuleModel(filePath: string): Promise<ModuleModel> {
  const absolute = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = await fse.readJson(absolute);
  } catch (err) {
    throw new ModelError(`Unable to read module model at ${absolute}.`, err);
  }
  return parseModuleModel(raw, { baseDir: path.dirname(absolute) });
}

export function parseModuleModel(raw: unknown, opts: { baseDir: string }): ModuleModel {
  const parsed = ModuleModelSchema.safeParse(raw);
  if (!parsed.success) {
    const details = formatSchemaIssues(parsed.error.issues).join("; ");
    throw new ModelError(`Module model is invalid: ${details}`, parsed.error);
  }

  const data = parsed.data;
  const projectDir = path.resolve(opts.baseDir, data.projectDir ?? ".");
  const capabilities = detectHostCapabilities({
    hostVersion: data.hostVersion,
    languagePluginVersion: data.languagePluginVersion,
  });
  const variantsAvailable = capabilities.compilationVariants === "available";

  const toTarget = (target: z.infer<typeof TargetSchema>): Target => ({
    name: target.name,
    platformType: target.platformType,
    compilations: target.compilations.map((compilation) =>
      toCompilation(compilation, variantsAvailable),
    ),
  });

  return {
    path: data.path,
    projectDir,
    hostVersion: data.hostVersion,
    languagePluginVersion: data.languagePluginVersion,
    appliedPlugins: data.appliedPlugins,
    extension: data.extension ? toExtension(data.extension, toTarget) : undefined,
    sourceSets: data.sourceSets.map((sourceSet) => ({
      name: sourceSet.name,
      sourceRoots: sourceSet.sourceRoots.map((root) => path.resolve(projectDir, root)),
      dependsOn: sourceSet.dependsOn,
      implementationBucketName:
        sourceSet.implementationBucket ?? `${sourceSet.name}Implementation`,
    })),
    buckets: data.buckets.map((bucket) => ({
      ...bucket,
      files: bucket.files.map((file) => path.resolve(projectDir, file)),
    })),
  };
}

function toExtension(
  extension: z.infer<typeof ExtensionSchema>,
  toTarget: (target: z.infer<typeof TargetSchema>) => Target,
): ModuleExtension {
  switch (extension.kind) {
    case "multiplatform":
      return { kind: "multiplatform", targets: extension.targets.map(toTarget) };
    case "single-target":
      return { kind: "single-target", target: toTarget(extension.target) };
    case "other":
      return { kind: "other" };
  }
}

function toCompilation(
  compilation: z.infer<typeof CompilationSchema>,
  variantsAvailable: boolean,
): Compilation {
  const base = {
    name: compilation.name,
    defaultSourceSet: compilation.defaultSourceSet,
    sourceSets: compilation.sourceSets,
  };

  const variant = compilation.variant;
  if (!variant) {
    return base;
  }

  return {
    ...base,
    variant: () => {
      if (!variantsAvailable) {
        throw new MissingHostApiError("Compilation.variant");
      }
      return variant;
    },
  };
}

// =============================================================================
// QUERIES
// =============================================================================

export function listCompilations(extension: ModuleExtension | undefined): Compilation[] {
  if (!extension) return [];
  switch (extension.kind) {
    case "multiplatform":
      return extension.targets.flatMap((target) => target.compilations);
    case "single-target":
      return extension.target.compilations;
    case "other":
      return [];
  }
}

/** Default and direct source sets plus everything they transitively depend on. */
export function allCompilationSourceSets(
  compilation: Compilation,
  sourceSets: SourceSet[],
): Set<string> {
  const byName = new Map(sourceSets.map((sourceSet) => [sourceSet.name, sourceSet]));
  const visited = new Set<string>();
  const pending = [compilation.defaultSourceSet, ...compilation.sourceSets];

  while (pending.length > 0) {
    const name = pending.pop();
    if (name === undefined || visited.has(name)) continue;
    visited.add(name);
    pending.push(...(byName.get(name)?.dependsOn ?? []));
  }

  return visited;
}

export function findSourceSet(model: ModuleModel, name: string): SourceSet | undefined {
  return model.sourceSets.find((sourceSet) => sourceSet.name === name);
}
