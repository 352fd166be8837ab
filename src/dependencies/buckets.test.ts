import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { DependencyResolutionError } from "../core/errors.js";
import { FileCollection } from "../core/file-collection.js";
import { detectHostCapabilities } from "../core/host-version.js";
import { MemoryLogSink } from "../core/logger.js";

import {
  bucketsFromModel,
  collectIncomingFiles,
  consumable,
  createBucketContainer,
  declarable,
  DependencyBucket,
  resolvable,
} from "./buckets.js";

const CURRENT_HOST = detectHostCapabilities({ hostVersion: "8.5" });
const OLD_HOST = detectHostCapabilities({ hostVersion: "7.6" });

describe("bucket postures", () => {
  it("sets the flags for each posture", () => {
    const bucket = new DependencyBucket("docs", CURRENT_HOST);

    declarable(bucket);
    expect([bucket.canBeResolved, bucket.canBeConsumed, bucket.canBeDeclared, bucket.visible]).toEqual([
      false,
      false,
      true,
      false,
    ]);

    consumable(bucket);
    expect([bucket.canBeResolved, bucket.canBeConsumed, bucket.canBeDeclared, bucket.visible]).toEqual([
      false,
      true,
      false,
      true,
    ]);

    resolvable(bucket, true);
    expect([bucket.canBeResolved, bucket.canBeConsumed, bucket.canBeDeclared, bucket.visible]).toEqual([
      true,
      false,
      false,
      true,
    ]);
  });

  it("leaves the declared flag alone on hosts without it", () => {
    const bucket = new DependencyBucket("docs", OLD_HOST);
    declarable(bucket);

    expect(bucket.canBeResolved).toBe(false);
    expect(bucket.canBeConsumed).toBe(false);
    expect(bucket.canBeDeclared).toBe(false);
  });
});

describe("DependencyBucket.resolve", () => {
  const tempRoots: string[] = [];

  afterEach(() => {
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function makeJar(name: string): string {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "docbridge-buckets-"));
    tempRoots.push(root);
    const filePath = path.join(root, name);
    fs.writeFileSync(filePath, "jar");
    return filePath;
  }

  it("collects files through extendsFrom", () => {
    const a = makeJar("a.jar");
    const b = makeJar("b.jar");
    const parent = new DependencyBucket("api", CURRENT_HOST).addDependency(a);
    const child = new DependencyBucket("implementation", CURRENT_HOST).addDependency(b, a).extend(parent);

    expect(child.resolve()).toEqual([b, a]);
  });

  it("drops missing files only when lenient", () => {
    const a = makeJar("a.jar");
    const bucket = new DependencyBucket("implementation", CURRENT_HOST).addDependency(a, "/missing/b.jar");

    expect(bucket.resolve({ lenient: true })).toEqual([a]);
    expect(() => bucket.resolve()).toThrow("Could not resolve /missing/b.jar for dependency bucket 'implementation'.");
  });

  it("refuses to resolve non-resolvable buckets", () => {
    const bucket = new DependencyBucket("elements", CURRENT_HOST);
    consumable(bucket);

    expect(() => bucket.resolve()).toThrow(DependencyResolutionError);
  });
});

describe("bucketsFromModel", () => {
  it("links extendsFrom to buckets declared later", () => {
    const buckets = bucketsFromModel(
      [
        { name: "jvmMainImplementation", canBeResolved: true, canBeConsumed: false, extendsFrom: ["api"], files: [] },
        { name: "api", canBeResolved: false, canBeConsumed: true, extendsFrom: [], files: ["/x.jar"] },
      ],
      { hostVersion: "8.5" },
    );

    const implementation = buckets.getByName("jvmMainImplementation");
    expect(implementation.extendsFrom.map((bucket) => bucket.name)).toEqual(["api"]);
    expect(buckets.getByName("api").canBeResolved).toBe(false);
  });
});

describe("collectIncomingFiles", () => {
  it("adds nothing for missing or non-resolvable buckets and logs why", () => {
    const buckets = createBucketContainer(CURRENT_HOST);
    buckets.register("elements", (bucket) => consumable(bucket));
    const collector = new FileCollection("/work");
    const log = new MemoryLogSink();

    collectIncomingFiles(buckets, "missing", collector, { log });
    collectIncomingFiles(buckets, "elements", collector, { log });

    expect(collector.files()).toEqual([]);
    expect(log.ofType("bucket.unresolvable").map((record) => record.payload)).toEqual([
      { bucket: "missing", exists: false },
      { bucket: "elements", exists: true },
    ]);
  });

  it("resolves leniently each time the collector is read", () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "docbridge-incoming-"));
    const jar = path.join(root, "late.jar");
    fs.writeFileSync(jar, "jar");
    const buckets = createBucketContainer(CURRENT_HOST);
    const bucket = buckets.register("jvmMainImplementation");
    const collector = new FileCollection("/work");

    try {
      collectIncomingFiles(buckets, "jvmMainImplementation", collector);
      bucket.addDependency("/missing/early.jar");
      expect(collector.files()).toEqual([]);

      bucket.addDependency(jar);
      expect(collector.files()).toEqual([jar]);
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });
});
