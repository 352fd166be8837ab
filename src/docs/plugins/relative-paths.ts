import fs from "node:fs";
import path from "node:path";

import { RelativePathError } from "../../core/errors.js";
import { toInvariantSeparators } from "../../core/utils.js";

/**
 * Path of `file` relative to `componentsDir`, always with `/` separators.
 * Throws when the file is not inside the components directory.
 */
export function relativeToComponentsDir(file: string, componentsDir: string): string {
  const root = path.resolve(componentsDir);
  const absolute = path.resolve(file);
  const relative = path.relative(root, absolute);

  if (relative === "" || isEscaping(relative)) {
    throw new RelativePathError(
      `${absolute} is not inside the components directory ${root}.`,
      absolute,
      root,
    );
  }

  return toInvariantSeparators(relative);
}

/**
 * Re-resolves a stored relative path. The result must stay inside `componentsDir`
 * and exist on disk.
 */
export function resolveInComponentsDir(relativePath: string, componentsDir: string): string {
  const root = path.resolve(componentsDir);

  if (relativePath.length === 0 || path.isAbsolute(relativePath) || path.posix.isAbsolute(relativePath)) {
    throw new RelativePathError(
      `Stored path '${relativePath}' is not relative to the components directory ${root}.`,
      relativePath,
      root,
      "absolute",
    );
  }

  const absolute = path.resolve(root, ...relativePath.split("/"));
  if (isEscaping(path.relative(root, absolute))) {
    throw new RelativePathError(
      `Stored path '${relativePath}' escapes the components directory ${root}.`,
      absolute,
      root,
    );
  }

  if (!fs.existsSync(absolute)) {
    throw new RelativePathError(
      `Components directory ${root} does not contain '${relativePath}'.`,
      absolute,
      root,
      "missing",
    );
  }

  return absolute;
}

function isEscaping(relative: string): boolean {
  return relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}
