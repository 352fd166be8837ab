/*
Purpose: decide whether a language source set belongs to a main (non-test) compilation.
Assumptions: the module model is read-only and may be partially configured.
Usage: new SourceSetClassifier(model, log).isMainSourceSet(sourceSet).get().
*/

import type { ProbeResult } from "../core/host-version.js";
import { logEvent, NullLogSink, type LogSink } from "../core/logger.js";
import { Provider } from "../core/provider.js";
import {
  allCompilationSourceSets,
  listCompilations,
  type Compilation,
  type ModuleModel,
  type SourceSet,
} from "../model/module-model.js";
import { formatErrorMessage } from "../core/error-format.js";

// =============================================================================
// COMPILATIONS
// =============================================================================

const MAIN_COMPILATION_NAME = "main";
const MAIN_VARIANT_KINDS = new Set(["library", "application"]);

/** Asks a variant-bearing compilation whether its variant is a library or application. */
export function probeMainVariant(
  compilation: Compilation,
  log: LogSink = NullLogSink,
): ProbeResult {
  if (!compilation.variant) {
    return "unavailable";
  }

  try {
    return MAIN_VARIANT_KINDS.has(compilation.variant().kind) ? "yes" : "no";
  } catch (err) {
    logEvent(log, "classifier.variant_unavailable", {
      compilation: compilation.name,
      reason: formatErrorMessage(err),
    });
    return "unavailable";
  }
}

export function isMainCompilation(compilation: Compilation, log: LogSink = NullLogSink): boolean {
  if (!compilation.variant) {
    return compilation.name === MAIN_COMPILATION_NAME;
  }

  switch (probeMainVariant(compilation, log)) {
    case "yes":
      return true;
    case "no":
      return false;
    case "unavailable":
      // Plugins too old to report variants: fall back to the compilation name.
      return !compilation.name.toLowerCase().endsWith("test");
  }
}

// =============================================================================
// SOURCE SETS
// =============================================================================

export class SourceSetClassifier {
  private readonly cache = new Map<string, Provider<boolean>>();

  constructor(
    private readonly model: ModuleModel,
    private readonly log: LogSink = NullLogSink,
  ) {}

  /** Computed on first read, then fixed for the rest of the configuration pass. */
  isMainSourceSet(sourceSet: SourceSet): Provider<boolean> {
    const cached = this.cache.get(sourceSet.name);
    if (cached) return cached;

    const provider = new Provider(() => this.classify(sourceSet));
    this.cache.set(sourceSet.name, provider);
    return provider;
  }

  referencingCompilations(sourceSet: SourceSet): Compilation[] {
    return listCompilations(this.model.extension).filter((compilation) =>
      allCompilationSourceSets(compilation, this.model.sourceSets).has(sourceSet.name),
    );
  }

  private classify(sourceSet: SourceSet): boolean {
    const compilations = this.referencingCompilations(sourceSet);
    const mainCount = compilations.filter((compilation) =>
      isMainCompilation(compilation, this.log),
    ).length;

    logEvent(this.log, "source_set.classified", {
      sourceSet: sourceSet.name,
      compilations: compilations.length,
      mainCompilations: mainCount,
    });

    // Nothing references the source set: keep it visible.
    return compilations.length === 0 || mainCount > 0;
  }
}
