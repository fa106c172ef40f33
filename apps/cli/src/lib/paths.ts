import { isAbsolute, join, relative, resolve, sep } from "node:path";

/**
 * Joins a generated file name onto the output directory.
 * Returns null when the name is absolute or resolves outside the directory.
 */
export function resolveInside(outputDir: string, name: string): string | null {
  if (isAbsolute(name)) return null;

  const target = join(outputDir, name);
  const rel = relative(resolve(outputDir), resolve(target));

  // Prevent path traversal
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }

  return target;
}
