// Path security — canonicalization, containment and traversal detection

import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { basename, dirname, isAbsolute, join, parse, relative, resolve, sep } from "node:path";

/** Expand a leading `~` to the user's home directory. */
export function expandHome(inputPath: string, home: string = homedir()): string {
  if (inputPath === "~") return home;
  if (inputPath.startsWith("~/") || inputPath.startsWith("~\\")) {
    return join(home, inputPath.slice(2));
  }
  return inputPath;
}

/**
 * Lexically resolve a path to absolute form. Relative paths resolve against
 * `base` (the process working directory when omitted).
 */
export function toAbsolutePath(inputPath: string, base?: string): string {
  const expanded = expandHome(inputPath);
  return base === undefined ? resolve(expanded) : resolve(expandHome(base), expanded);
}

function isMissingPathError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Resolve a path to its absolute, symlink-free form.
 *
 * Paths that do not exist yet (a file about to be written) resolve through
 * their nearest existing ancestor, with the missing segments appended.
 *
 * @throws when the path is empty, contains a NUL byte, or the filesystem
 *   refuses resolution (permission denied, symlink loop)
 */
export function canonicalizePath(inputPath: string, base?: string): string {
  if (inputPath.trim() === "") {
    throw new Error("Path is empty");
  }
  if (inputPath.includes("\0")) {
    throw new Error("Path contains a NUL byte");
  }

  let existing = toAbsolutePath(inputPath, base);
  const missing: string[] = [];

  for (;;) {
    try {
      const real = realpathSync.native(existing);
      return missing.length === 0 ? real : join(real, ...missing.reverse());
    } catch (error) {
      const parent = dirname(existing);
      if (!isMissingPathError(error) || parent === existing) {
        throw error;
      }
      missing.push(basename(existing));
      existing = parent;
    }
  }
}

/** Canonical form, or undefined when the path cannot be resolved. */
export function tryCanonicalizePath(inputPath: string, base?: string): string | undefined {
  try {
    return canonicalizePath(inputPath, base);
  } catch {
    return undefined;
  }
}

/**
 * Directory-boundary containment: true when `child` is `parent` itself or
 * lies below it. `/proj` does not contain `/project-other`.
 */
export function isWithinDirectory(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  if (rel === "") return true;
  if (isAbsolute(rel)) return false;
  return rel !== ".." && !rel.startsWith(`..${sep}`);
}

/** Split a raw path into its segments, accepting both separators. */
export function splitSegments(rawPath: string): string[] {
  return rawPath.split(/[\\/]+/).filter((segment) => segment !== "");
}

/** True for `..`, including its URL-encoded and double-encoded spellings. */
export function isParentSegment(segment: string): boolean {
  const decoded = segment.replace(/%25/gi, "%").replace(/%2e/gi, ".");
  return decoded === "..";
}

/** True when any raw segment climbs to a parent directory. */
export function hasTraversalSegment(rawPath: string): boolean {
  return splitSegments(rawPath).some(isParentSegment);
}

/**
 * Walk the raw segments of `rawPath` and report whether a parent-directory
 * step ever lands outside every boundary. Relative paths start at `base`.
 *
 * `/proj/src/../lib` stays inside `/proj`; `/proj/../etc/passwd` does not,
 * and neither does `/proj/../proj/src` even though it normalizes back inside.
 */
export function escapesBoundaries(
  rawPath: string,
  base: string,
  boundaries: readonly string[],
): boolean {
  const expanded = expandHome(rawPath);
  const root = isAbsolute(expanded) ? parse(expanded).root : "";
  let current = root === "" ? resolve(base) : resolve(root);

  for (const segment of splitSegments(expanded.slice(root.length))) {
    if (segment === ".") continue;
    if (isParentSegment(segment)) {
      current = dirname(current);
      if (!boundaries.some((boundary) => isWithinDirectory(current, boundary))) {
        return true;
      }
    } else {
      current = join(current, segment);
    }
  }

  return false;
}
