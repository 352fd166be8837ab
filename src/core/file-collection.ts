import fs from "node:fs";
import path from "node:path";

import { RegistryFrozenError } from "./errors.js";
import { Provider } from "./provider.js";

export type FileSource = string | string[] | Provider<string[]>;

/**
 * An ordered, lazily resolved set of absolute file paths.
 * Sources are kept as given and only resolved when `files()` is read.
 */
export class FileCollection {
  private readonly sources: FileSource[] = [];
  private finalized: string[] | undefined;

  constructor(private readonly baseDir: string = process.cwd()) {}

  from(...sources: FileSource[]): this {
    if (this.finalized) {
      throw new RegistryFrozenError("File collection is final and cannot be changed.");
    }
    this.sources.push(...sources);
    return this;
  }

  files(): string[] {
    if (this.finalized) {
      return [...this.finalized];
    }

    const seen = new Set<string>();
    const result: string[] = [];
    for (const source of this.sources) {
      for (const file of resolveSource(source)) {
        const absolute = path.resolve(this.baseDir, file);
        if (!seen.has(absolute)) {
          seen.add(absolute);
          result.push(absolute);
        }
      }
    }
    return result;
  }

  isEmpty(): boolean {
    return this.files().length === 0;
  }

  /**
   * Expands directories into the regular files beneath them (sorted per directory).
   * Entries that do not exist are skipped.
   */
  fileTree(): string[] {
    const result: string[] = [];
    for (const entry of this.files()) {
      collectTreeFiles(entry, result);
    }
    return Array.from(new Set(result));
  }

  finalizeValue(): void {
    if (!this.finalized) {
      this.finalized = this.files();
    }
  }
}

function resolveSource(source: FileSource): string[] {
  if (typeof source === "string") {
    return [source];
  }
  if (Array.isArray(source)) {
    return source;
  }
  return source.getOrNull() ?? [];
}

function collectTreeFiles(entry: string, out: string[]): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(entry);
  } catch (err) {
    if (isMissingFileError(err)) return;
    throw err;
  }

  if (stats.isFile()) {
    out.push(entry);
    return;
  }

  if (stats.isDirectory()) {
    const children = fs.readdirSync(entry).sort();
    for (const child of children) {
      collectTreeFiles(path.join(entry, child), out);
    }
  }
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
