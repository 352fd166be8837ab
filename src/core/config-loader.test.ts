import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadProjectConfig, parseProjectConfig } from "./config-loader.js";
import { UserFacingError } from "./errors.js";

describe("loadProjectConfig", () => {
  const tempRoots: string[] = [];

  afterEach(() => {
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function makeTempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docbridge-config-"));
    tempRoots.push(dir);
    return dir;
  }

  it("resolves paths against the config directory and applies defaults", () => {
    const root = makeTempDir();
    const configPath = path.join(root, "docbridge.config.json");
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        moduleName: "lib",
        model: "build/module-model.json",
        sourceSets: { jvmMain: { classpath: ["libs/a.jar"] } },
        plugins: { html: { customAssets: ["assets"], templatesDir: "templates" } },
        generator: { command: "java", cwd: "tools" },
      }),
    );

    const config = loadProjectConfig(configPath);

    expect(config.configDir).toBe(root);
    expect(config.modulePath).toBe("");
    expect(config.model).toBe(path.join(root, "build", "module-model.json"));
    expect(config.outputDir).toBe(path.join(root, "build", "docbridge"));
    expect(config.componentsDir).toBe(path.join(root, "build", "docbridge", "components"));
    expect(config.logFile).toBe(path.join(root, "build", "docbridge", "logs", "docbridge.jsonl"));
    expect(config.sourceSets.jvmMain?.classpath).toEqual([path.join(root, "libs", "a.jar")]);
    expect(config.sourceSets.jvmMain?.sourceRoots).toEqual([]);
    expect(config.plugins.html?.customAssets).toEqual([path.join(root, "assets")]);
    expect(config.plugins.html?.templatesDir).toBe(path.join(root, "templates"));
    expect(config.generator).toEqual({ command: "java", args: [], cwd: path.join(root, "tools") });
  });

  it("reports a missing file", () => {
    const root = makeTempDir();
    const configPath = path.join(root, "docbridge.config.json");

    expect(() => loadProjectConfig(configPath)).toThrow(`No docbridge config found at ${configPath}.`);
  });

  it("reports unreadable JSON", () => {
    const root = makeTempDir();
    const configPath = path.join(root, "docbridge.config.json");
    fs.writeFileSync(configPath, "{ not json");

    try {
      loadProjectConfig(configPath);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UserFacingError);
      if (err instanceof UserFacingError) {
        expect(err.title).toBe("Project config unreadable.");
      }
    }
  });
});

describe("parseProjectConfig", () => {
  it("lists every schema issue", () => {
    try {
      parseProjectConfig({ moduleName: "lib", extra: true }, "/work/docbridge.config.json");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UserFacingError);
      if (err instanceof UserFacingError) {
        expect(err.title).toBe("Project config invalid.");
        expect(err.message).toBe(
          [
            "Config /work/docbridge.config.json is invalid:",
            "- model: Expected string, received undefined",
            "- <root>: Unrecognized keys: extra",
          ].join("\n"),
        );
      }
    }
  });
});
