import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, JSON.stringify(value, null, 2) + "\n", "utf8");
}

export function toInvariantSeparators(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

/** Text before the last occurrence of `delimiter`, or `missing` when it does not occur. */
export function substringBeforeLast(value: string, delimiter: string, missing: string): string {
  const index = value.lastIndexOf(delimiter);
  return index === -1 ? missing : value.slice(0, index);
}
