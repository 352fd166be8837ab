import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { RegistryFrozenError } from "./errors.js";
import { FileCollection } from "./file-collection.js";
import { Provider } from "./provider.js";

describe("FileCollection", () => {
  const tempRoots: string[] = [];

  afterEach(() => {
    for (const dir of tempRoots.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function makeTempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docbridge-files-"));
    tempRoots.push(dir);
    return dir;
  }

  it("resolves sources against the base directory and drops duplicates", () => {
    const collection = new FileCollection("/work");
    collection.from("a.txt", ["b.txt", "/abs/c.txt"], Provider.of(["a.txt"]));

    expect(collection.files()).toEqual(["/work/a.txt", "/work/b.txt", "/abs/c.txt"]);
    expect(collection.isEmpty()).toBe(false);
  });

  it("reads provider sources on every access until finalized", () => {
    let files = ["one.txt"];
    const collection = new FileCollection("/work").from(new Provider(() => files));

    expect(collection.files()).toEqual(["/work/one.txt"]);
    collection.finalizeValue();
    files = ["two.txt"];

    expect(collection.files()).toEqual(["/work/one.txt"]);
    expect(() => collection.from("three.txt")).toThrow(RegistryFrozenError);
  });

  it("expands directories into sorted files and skips missing entries", () => {
    const root = makeTempDir();
    fs.mkdirSync(path.join(root, "assets", "nested"), { recursive: true });
    fs.writeFileSync(path.join(root, "assets", "b.svg"), "<svg/>");
    fs.writeFileSync(path.join(root, "assets", "a.png"), "png");
    fs.writeFileSync(path.join(root, "assets", "nested", "c.css"), "body {}");

    const collection = new FileCollection(root).from("assets", "missing.css");

    expect(collection.fileTree()).toEqual([
      path.join(root, "assets", "a.png"),
      path.join(root, "assets", "b.svg"),
      path.join(root, "assets", "nested", "c.css"),
    ]);
  });
});
