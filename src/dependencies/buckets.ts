/**
 * Dependency buckets: named collections of declared dependencies that can be
 * declared into, consumed by other modules, or resolved to files.
 *
 * The three postures mirror how the build tool wants buckets split:
 *
 * ```
 *              canBeResolved  canBeConsumed  canBeDeclared
 * declarable   false          false          true
 * consumable   false          true           false
 * resolvable   true           false          false
 * ```
 */

import fs from "node:fs";

import { DependencyResolutionError } from "../core/errors.js";
import { FileCollection } from "../core/file-collection.js";
import { detectHostCapabilities, type HostCapabilities } from "../core/host-version.js";
import { logEvent, NullLogSink, type LogSink } from "../core/logger.js";
import { NamedContainer } from "../core/named-container.js";
import { Provider } from "../core/provider.js";
import type { BucketSpec } from "../model/module-model.js";

// =============================================================================
// BUCKET
// =============================================================================

export type ResolveOptions = {
  /** Drop dependencies that cannot be resolved instead of failing. */
  lenient?: boolean;
};

export class DependencyBucket {
  canBeResolved = true;
  canBeConsumed = true;
  visible = true;
  readonly extendsFrom: DependencyBucket[] = [];
  private readonly dependencies: string[] = [];
  private declaredFlag = true;

  constructor(
    readonly name: string,
    private readonly capabilities: HostCapabilities,
  ) {}

  /**
   * Only written on hosts that support the flag; older hosts keep governing buckets
   * through the resolve/consume flags alone and always report `false`.
   */
  get canBeDeclared(): boolean {
    return this.capabilities.bucketDeclaredFlag === "available" && this.declaredFlag;
  }

  set canBeDeclared(value: boolean) {
    if (this.capabilities.bucketDeclaredFlag === "available") {
      this.declaredFlag = value;
    }
  }

  addDependency(...files: string[]): this {
    this.dependencies.push(...files);
    return this;
  }

  extend(...buckets: DependencyBucket[]): this {
    this.extendsFrom.push(...buckets);
    return this;
  }

  declaredDependencies(): string[] {
    return [...this.dependencies];
  }

  resolve(opts: ResolveOptions = {}): string[] {
    if (!this.canBeResolved) {
      throw new DependencyResolutionError(
        `Resolving dependency bucket '${this.name}' is not allowed as it is not resolvable.`,
      );
    }

    const result: string[] = [];
    const seen = new Set<string>();
    for (const file of collectDependencies(this, new Set())) {
      if (seen.has(file)) continue;
      seen.add(file);

      if (!fs.existsSync(file)) {
        if (opts.lenient) continue;
        throw new DependencyResolutionError(
          `Could not resolve ${file} for dependency bucket '${this.name}'.`,
        );
      }
      result.push(file);
    }
    return result;
  }
}

function collectDependencies(bucket: DependencyBucket, visited: Set<string>): string[] {
  if (visited.has(bucket.name)) return [];
  visited.add(bucket.name);

  return [
    ...bucket.declaredDependencies(),
    ...bucket.extendsFrom.flatMap((parent) => collectDependencies(parent, visited)),
  ];
}

// =============================================================================
// POSTURES
// =============================================================================

/** Users declare dependencies here; resolvable and consumable buckets extend it. */
export function declarable(bucket: DependencyBucket, visible = false): void {
  bucket.canBeResolved = false;
  bucket.canBeConsumed = false;
  bucket.canBeDeclared = true;
  bucket.visible = visible;
}

/** Exposed to other modules. */
export function consumable(bucket: DependencyBucket, visible = true): void {
  bucket.canBeResolved = false;
  bucket.canBeConsumed = true;
  bucket.canBeDeclared = false;
  bucket.visible = visible;
}

/** Resolved into files for this module. */
export function resolvable(bucket: DependencyBucket, visible = false): void {
  bucket.canBeResolved = true;
  bucket.canBeConsumed = false;
  bucket.canBeDeclared = false;
  bucket.visible = visible;
}

// =============================================================================
// CONTAINER
// =============================================================================

export type BucketContainer = NamedContainer<DependencyBucket>;

export function createBucketContainer(capabilities: HostCapabilities): BucketContainer {
  return new NamedContainer("Dependency bucket", (name) => new DependencyBucket(name, capabilities));
}

/** Builds buckets from the module model; `extendsFrom` may reference buckets listed later. */
export function bucketsFromModel(
  specs: BucketSpec[],
  versions: { hostVersion: string; languagePluginVersion?: string },
): BucketContainer {
  const container = createBucketContainer(detectHostCapabilities(versions));

  for (const spec of specs) {
    container.register(spec.name, (bucket) => {
      bucket.canBeResolved = spec.canBeResolved;
      bucket.canBeConsumed = spec.canBeConsumed;
      bucket.addDependency(...spec.files);
    });
  }

  for (const spec of specs) {
    const bucket = container.getByName(spec.name);
    for (const parentName of spec.extendsFrom) {
      const parent = container.findByName(parentName);
      if (parent) {
        bucket.extend(parent);
      }
    }
  }

  return container;
}

// =============================================================================
// ARTIFACT AGGREGATION
// =============================================================================

/**
 * Adds the files of bucket `name` to `collector`, resolved when the collector is read.
 * Buckets that do not exist or cannot be resolved contribute nothing.
 */
export function collectIncomingFiles(
  buckets: BucketContainer,
  name: string,
  collector: FileCollection,
  opts: ResolveOptions & { log?: LogSink } = {},
): void {
  const log = opts.log ?? NullLogSink;
  const bucket = buckets.findByName(name);

  if (!bucket || !bucket.canBeResolved) {
    logEvent(log, "bucket.unresolvable", { bucket: name, exists: bucket !== undefined });
    return;
  }

  // Missing dependencies are tolerated by default: consumers work with partial artifact sets.
  const lenient = opts.lenient ?? true;
  collector.from(Provider.live(() => bucket.resolve({ lenient })));
}
