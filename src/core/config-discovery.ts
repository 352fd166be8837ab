import fs from "node:fs";
import path from "node:path";

export const CONFIG_FILE_NAME = "docbridge.config.json";

export type ConfigSource = "explicit" | "discovered";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export function resolveConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution | null {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const cwd = args.cwd ?? process.cwd();
  const dir = findUp(cwd, (candidate) => fs.existsSync(path.join(candidate, CONFIG_FILE_NAME)));
  if (!dir) return null;

  return { configPath: path.join(dir, CONFIG_FILE_NAME), source: "discovered" };
}

export function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
