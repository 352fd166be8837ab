import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { MissingHostApiError, ModelError } from "../core/errors.js";

import {
  allCompilationSourceSets,
  listCompilations,
  loadModuleModel,
  parseModuleModel,
  type ModuleModelInput,
} from "./module-model.js";

const MULTIPLATFORM_MODEL: ModuleModelInput = {
  path: ":lib",
  hostVersion: "8.5",
  languagePluginVersion: "1.9.20",
  appliedPlugins: ["org.jetbrains.kotlin.multiplatform"],
  extension: {
    kind: "multiplatform",
    targets: [
      {
        name: "jvm",
        platformType: "jvm",
        compilations: [
          { name: "main", defaultSourceSet: "jvmMain", variant: { kind: "library" } },
          { name: "test", defaultSourceSet: "jvmTest", sourceSets: ["testFixtures"] },
        ],
      },
      { name: "js", platformType: "js" },
    ],
  },
  sourceSets: [
    { name: "commonMain", sourceRoots: ["src/commonMain/kotlin"] },
    { name: "jvmMain", sourceRoots: ["src/jvmMain/kotlin"], dependsOn: ["commonMain"] },
    { name: "jvmTest", dependsOn: ["jvmMain", "commonTest"], implementationBucket: "testDeps" },
    { name: "commonTest", dependsOn: ["jvmTest"] },
  ],
  buckets: [{ name: "jvmMainImplementation", files: ["libs/a.jar"] }],
};

describe("parseModuleModel", () => {
  it("resolves roots and bucket files against the project directory", () => {
    const model = parseModuleModel(MULTIPLATFORM_MODEL, { baseDir: "/work" });

    expect(model.projectDir).toBe("/work");
    expect(model.sourceSets[0]?.sourceRoots).toEqual(["/work/src/commonMain/kotlin"]);
    expect(model.sourceSets[1]?.implementationBucketName).toBe("jvmMainImplementation");
    expect(model.sourceSets[2]?.implementationBucketName).toBe("testDeps");
    expect(model.buckets[0]).toEqual({
      name: "jvmMainImplementation",
      canBeResolved: true,
      canBeConsumed: true,
      extendsFrom: [],
      files: ["/work/libs/a.jar"],
    });
  });

  it("exposes variants only on variant-bearing compilations", () => {
    const model = parseModuleModel(MULTIPLATFORM_MODEL, { baseDir: "/work" });
    const [main, test] = listCompilations(model.extension);

    expect(main?.variant?.()).toEqual({ kind: "library" });
    expect(test?.variant).toBeUndefined();
  });

  it("fails the variant accessor on plugins too old to report it", () => {
    const model = parseModuleModel(
      { ...MULTIPLATFORM_MODEL, languagePluginVersion: "1.3.0" },
      { baseDir: "/work" },
    );
    const [main] = listCompilations(model.extension);

    expect(() => main?.variant?.()).toThrow(MissingHostApiError);
  });

  it("rejects unknown platform types", () => {
    const raw = {
      path: ":lib",
      hostVersion: "8.5",
      extension: { kind: "single-target", target: { name: "x", platformType: "cobol" } },
    };

    expect(() => parseModuleModel(raw, { baseDir: "/work" })).toThrow(ModelError);
  });
});

describe("allCompilationSourceSets", () => {
  it("follows dependsOn transitively and tolerates cycles", () => {
    const model = parseModuleModel(MULTIPLATFORM_MODEL, { baseDir: "/work" });
    const [, test] = listCompilations(model.extension);
    if (!test) throw new Error("expected a test compilation");

    expect([...allCompilationSourceSets(test, model.sourceSets)].sort()).toEqual([
      "commonMain",
      "commonTest",
      "jvmMain",
      "jvmTest",
      "testFixtures",
    ]);
  });
});

describe("loadModuleModel", () => {
  const tempRoots: string[] = [];

  afterEach(() => {
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reads the model next to its project directory", async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "docbridge-model-"));
    tempRoots.push(root);
    const filePath = path.join(root, "module-model.json");
    fs.writeFileSync(filePath, JSON.stringify({ ...MULTIPLATFORM_MODEL, projectDir: ".." }));

    const model = await loadModuleModel(filePath);

    expect(model.projectDir).toBe(path.dirname(root));
  });

  it("wraps unreadable files in a ModelError", async () => {
    await expect(loadModuleModel("/definitely/missing/model.json")).rejects.toThrow(ModelError);
  });
});
