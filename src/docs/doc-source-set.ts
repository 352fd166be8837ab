import { FileCollection } from "../core/file-collection.js";
import { NamedContainer } from "../core/named-container.js";
import { Property } from "../core/provider.js";

import type { AnalysisPlatform } from "./analysis-platform.js";

/** Weak reference to another documentation source set, by name. */
export class DependentSourceSetRef {
  sourceSetName: string;

  constructor(readonly name: string) {
    this.sourceSetName = name;
  }
}

/** A source set as the documentation generator sees it. */
export class DocSourceSet {
  readonly suppress = new Property<boolean>("suppress");
  readonly displayName = new Property<string>("displayName");
  readonly analysisPlatform = new Property<AnalysisPlatform>("analysisPlatform");
  readonly sourceRoots: FileCollection;
  readonly classpath: FileCollection;
  readonly dependentSourceSets = new NamedContainer(
    "Dependent source set",
    (name) => new DependentSourceSetRef(name),
  );

  constructor(
    readonly name: string,
    baseDir: string,
  ) {
    this.sourceRoots = new FileCollection(baseDir);
    this.classpath = new FileCollection(baseDir);
    this.suppress.convention(false);
    this.displayName.convention(name);
    this.analysisPlatform.convention("common");
  }

  dependentSourceSetNames(): string[] {
    return this.dependentSourceSets.values().map((ref) => ref.sourceSetName);
  }

  finalizeValues(): void {
    this.suppress.finalizeValue();
    this.displayName.finalizeValue();
    this.analysisPlatform.finalizeValue();
    this.sourceRoots.finalizeValue();
    this.classpath.finalizeValue();
    this.dependentSourceSets.seal();
  }
}
