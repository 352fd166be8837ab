import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseProjectConfig } from "../core/config-loader.js";
import { RegistryFrozenError } from "../core/errors.js";
import { MemoryLogSink } from "../core/logger.js";

import { configureModule } from "./configure-module.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeProject(): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "docbridge-configure-"));
  tempDirs.push(root);
  fs.mkdirSync(path.join(root, "src", "main", "kotlin"), { recursive: true });
  fs.mkdirSync(path.join(root, "samples"));
  fs.writeFileSync(
    path.join(root, "module-model.json"),
    JSON.stringify({
      path: ":core",
      hostVersion: "8.5",
      appliedPlugins: ["org.jetbrains.kotlin.jvm"],
      extension: {
        kind: "single-target",
        target: {
          name: "jvm",
          platformType: "jvm",
          compilations: [
            { name: "main", defaultSourceSet: "main" },
            { name: "test", defaultSourceSet: "test" },
          ],
        },
      },
      sourceSets: [
        { name: "main", sourceRoots: ["src/main/kotlin"] },
        { name: "test", sourceRoots: ["src/test/kotlin"], dependsOn: ["main"] },
      ],
    }),
  );
  return root;
}

describe("configureModule", () => {
  it("applies user overrides on top of adapter conventions and seals the registry", async () => {
    const root = makeProject();
    const config = parseProjectConfig(
      {
        moduleName: "core",
        modulePath: ":core",
        model: "module-model.json",
        sourceSets: {
          test: { suppress: false, displayName: "Tests" },
          samples: { sourceRoots: ["samples"] },
        },
        plugins: { html: { footerMessage: "Example footer" } },
      },
      path.join(root, "docbridge.config.json"),
    );
    const log = new MemoryLogSink();

    const { docs, adapter } = await configureModule({ config, log });

    expect(adapter).toEqual({ status: "applied", registered: ["main", "test"] });
    expect(docs.docSourceSets.names()).toEqual(["main", "test", "samples"]);

    const main = docs.docSourceSets.getByName("main");
    expect(main.displayName.get()).toBe("jvm");
    expect(main.suppress.get()).toBe(false);

    const test = docs.docSourceSets.getByName("test");
    expect(test.suppress.get()).toBe(false);
    expect(test.displayName.get()).toBe("Tests");

    const samples = docs.docSourceSets.getByName("samples");
    expect(samples.sourceRoots.files()).toEqual([path.join(root, "samples")]);
    expect(samples.displayName.get()).toBe("samples");
    expect(samples.analysisPlatform.get()).toBe("common");

    expect(docs.html().footerMessage.get()).toBe("Example footer");
    expect(docs.componentsDir.get()).toBe(path.join(root, "build", "docbridge", "components"));
    expect(() => docs.docSourceSets.register("late")).toThrow(RegistryFrozenError);
    expect(log.ofType("module.configured")[0]?.payload).toEqual({
      module: ":core",
      sourceSets: ["main", "test", "samples"],
      plugins: ["html"],
    });
  });

  it("leaves plugin parameters empty without html config", async () => {
    const root = makeProject();
    const config = parseProjectConfig(
      { moduleName: "core", model: "module-model.json" },
      path.join(root, "docbridge.config.json"),
    );

    const { docs } = await configureModule({ config });

    expect(docs.pluginsConfiguration.size).toBe(0);
    expect(docs.docSourceSets.getByName("test").suppress.get()).toBe(true);
  });
});
