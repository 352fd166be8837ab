/**
 * Registers a module's language source sets as documentation source sets.
 * Purpose: auto-discover source roots, classpath, platform and source-set hierarchy from the
 * language plugin's module model.
 * Assumptions: runs once per module during configuration, before the registry is sealed.
 * Usage: applyLanguageAdapter({ model, docs, buckets, log }).
 */

import fs from "node:fs";

import { logEvent, NullLogSink, type LogSink } from "../core/logger.js";
import { Provider } from "../core/provider.js";
import { substringBeforeLast, toInvariantSeparators } from "../core/utils.js";
import { collectIncomingFiles, type BucketContainer } from "../dependencies/buckets.js";
import { analysisPlatformFromString, type AnalysisPlatform } from "../docs/analysis-platform.js";
import type { DocsExtension } from "../docs/docs-extension.js";
import type { DocSourceSet } from "../docs/doc-source-set.js";
import {
  findSourceSet,
  type ModuleExtension,
  type ModuleModel,
  type PlatformType,
  type SourceSet,
} from "../model/module-model.js";

import { SourceSetClassifier } from "./source-set-classifier.js";

export const LANGUAGE_PLUGIN_IDS = [
  "org.jetbrains.kotlin.android",
  "org.jetbrains.kotlin.js",
  "org.jetbrains.kotlin.jvm",
  "org.jetbrains.kotlin.multiplatform",
] as const;

// =============================================================================
// TYPES
// =============================================================================

export type LanguageAdapterInput = {
  model: ModuleModel;
  docs: DocsExtension;
  buckets: BucketContainer;
  log?: LogSink;
};

export type LanguageAdapterResult =
  | { status: "applied"; registered: string[] }
  | { status: "skipped"; reason: "no-language-plugin" | "extension-missing" };

// =============================================================================
// ADAPTER
// =============================================================================

export function applyLanguageAdapter(input: LanguageAdapterInput): LanguageAdapterResult {
  const log = input.log ?? NullLogSink;
  const { model, docs } = input;

  const plugin = LANGUAGE_PLUGIN_IDS.find((id) => model.appliedPlugins.includes(id));
  if (!plugin) {
    logEvent(log, "adapter.skipped", { module: model.path });
    return { status: "skipped", reason: "no-language-plugin" };
  }
  logEvent(log, "adapter.applied", { module: model.path, plugin });

  const extension = model.extension;
  if (!extension) {
    logEvent(log, "adapter.extension_missing", { module: model.path });
    return { status: "skipped", reason: "extension-missing" };
  }

  const context = new LanguageAdapterContext(model, extension, docs, input.buckets, log);
  for (const sourceSet of model.sourceSets) {
    context.registerSourceSet(sourceSet);
  }

  // Doc source sets added later under a language source set's name get the same convention.
  docs.docSourceSets.all((docSourceSet) => {
    const sourceSet = findSourceSet(model, docSourceSet.name);
    if (sourceSet) {
      docSourceSet.suppress.convention(context.suppressConvention(sourceSet));
    }
  });

  return { status: "applied", registered: model.sourceSets.map((sourceSet) => sourceSet.name) };
}

// =============================================================================
// CONTEXT
// =============================================================================

export class LanguageAdapterContext {
  readonly classifier: SourceSetClassifier;

  /** The single platform the module targets; modules with several targets document as common. */
  readonly platformType: Provider<PlatformType>;
  readonly analysisPlatform: Provider<AnalysisPlatform>;

  constructor(
    private readonly model: ModuleModel,
    extension: ModuleExtension,
    private readonly docs: DocsExtension,
    private readonly buckets: BucketContainer,
    private readonly log: LogSink,
  ) {
    this.classifier = new SourceSetClassifier(model, log);
    this.platformType = new Provider(() => resolvePlatformType(extension));
    this.analysisPlatform = this.platformType.map((type) => analysisPlatformFromString(type));
  }

  suppressConvention(sourceSet: SourceSet): Provider<boolean> {
    return this.classifier.isMainSourceSet(sourceSet).map((isMain) => !isMain);
  }

  registerSourceSet(sourceSet: SourceSet): DocSourceSet {
    // TODO: respect source filters; roots are registered whole.
    const extantRoots = sourceSet.sourceRoots.filter(isDirectory);

    logEvent(this.log, "source_set.register", {
      module: this.model.path,
      sourceSet: sourceSet.name,
      sourceRoots: extantRoots.map(toInvariantSeparators),
      droppedRoots: sourceSet.sourceRoots.length - extantRoots.length,
    });

    return this.docs.docSourceSets.register(sourceSet.name, (docSourceSet) => {
      docSourceSet.suppress.convention(this.suppressConvention(sourceSet));
      docSourceSet.sourceRoots.from(extantRoots);

      collectIncomingFiles(this.buckets, sourceSet.implementationBucketName, docSourceSet.classpath, {
        lenient: true,
        log: this.log,
      });

      docSourceSet.analysisPlatform.set(this.analysisPlatform);

      for (const dependency of sourceSet.dependsOn) {
        // Keys carry the running count so the same name can be registered more than once.
        const key = `${dependency}${docSourceSet.dependentSourceSets.size}`;
        docSourceSet.dependentSourceSets.register(key, (ref) => {
          ref.sourceSetName = dependency;
        });
      }

      docSourceSet.displayName.set(
        this.platformType.map((type) => substringBeforeLast(sourceSet.name, "Main", type)),
      );
    });
  }
}

function resolvePlatformType(extension: ModuleExtension): PlatformType {
  switch (extension.kind) {
    case "multiplatform": {
      const types = extension.targets.map((target) => target.platformType);
      return types.length === 1 && types[0] !== undefined ? types[0] : "common";
    }
    case "single-target":
      return extension.target.platformType;
    case "other":
      return "common";
  }
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}
