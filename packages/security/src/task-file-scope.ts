// Task file scope — the filesystem locations one agent task may touch

import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";
import { type Result, err, ok, sameMembers, uniqueList } from "@taskguard/shared";
import { SecurityConfigError } from "./errors.js";
import { isWithinDirectory, toAbsolutePath, tryCanonicalizePath } from "./path-utils.js";

/** Credential and key stores that are never readable from a task, wherever they live */
export const SENSITIVE_DIRECTORIES: readonly string[] = Object.freeze([
  ".ssh",
  ".gnupg",
  ".gpg",
  ".aws",
  ".azure",
  ".gcloud",
  ".config/gcloud",
  ".docker",
  ".kube",
  ".npmrc",
  ".pypirc",
  ".netrc",
  ".env",
  ".credentials",
]);

export const DEFAULT_DENY_PATTERNS: readonly string[] = SENSITIVE_DIRECTORIES;

export interface TaskFileScopeOptions {
  /** Absolute path of the project the task works on */
  projectRoot: string;
  /** Extra absolute directories the task may use (build caches, dependency folders) */
  allowedDirectories?: readonly string[];
  /** Case-insensitive substrings; a match denies access even inside an allowed directory */
  denyPatterns?: readonly string[];
  readOnly?: boolean;
}

/**
 * Immutable per-task scope. Every mutator returns a new instance.
 *
 * A scope that fails {@link TaskFileScope.validate} authorizes nothing.
 *
 * @example
 * ```typescript
 * const scope = TaskFileScope.forProject("/home/dev/app")
 *   .withAdditionalDirectory("/home/dev/.gradle");
 *
 * scope.isPathAllowed("/home/dev/app/src/main.ts"); // true
 * scope.isPathAllowed("/home/dev/.ssh/id_rsa");     // false
 * ```
 */
export class TaskFileScope {
  readonly projectRoot: string;
  readonly allowedDirectories: readonly string[];
  readonly denyPatterns: readonly string[];
  readonly readOnly: boolean;
  private readonly errors: readonly string[];

  constructor(options: TaskFileScopeOptions) {
    this.projectRoot = options.projectRoot;
    this.allowedDirectories = Object.freeze(uniqueList(options.allowedDirectories ?? []));
    this.denyPatterns = Object.freeze(uniqueList(options.denyPatterns ?? DEFAULT_DENY_PATTERNS));
    this.readOnly = options.readOnly ?? false;
    this.errors = Object.freeze(collectScopeErrors(this));
    Object.freeze(this);
  }

  /** Writable scope over `projectRoot` with the default deny patterns. */
  static forProject(projectRoot: string): TaskFileScope {
    return new TaskFileScope({ projectRoot });
  }

  static readOnly(projectRoot: string): TaskFileScope {
    return new TaskFileScope({ projectRoot, readOnly: true });
  }

  /**
   * Whether the task may read `path`. Relative paths resolve against the
   * project root; symlinks are followed before the containment check.
   */
  isPathAllowed(path: string): boolean {
    if (!this.isValid()) return false;

    const canonical = tryCanonicalizePath(path, this.projectRoot);
    if (canonical === undefined) return false;

    const lexical = toAbsolutePath(path, this.projectRoot);
    if (this.findDenyPattern(lexical) !== undefined || this.findDenyPattern(canonical) !== undefined) {
      return false;
    }

    return this.getBoundaries().some((boundary) => isWithinDirectory(canonical, boundary));
  }

  isWriteAllowed(path: string): boolean {
    return !this.readOnly && this.isPathAllowed(path);
  }

  /** First deny pattern contained in `path`, compared case-insensitively. */
  findDenyPattern(path: string): string | undefined {
    const haystack = path.toLowerCase();
    return this.denyPatterns.find(
      (pattern) => pattern.trim() !== "" && haystack.includes(pattern.toLowerCase()),
    );
  }

  withAdditionalDirectory(directory: string): TaskFileScope {
    return new TaskFileScope({
      projectRoot: this.projectRoot,
      allowedDirectories: [...this.allowedDirectories, directory],
      denyPatterns: this.denyPatterns,
      readOnly: this.readOnly,
    });
  }

  /**
   * Canonical project root and allowed directories. Entries that cannot be
   * resolved are left out. Empty for an invalid scope.
   */
  getBoundaries(): string[] {
    if (!this.isValid()) return [];
    const boundaries: string[] = [];
    for (const directory of [this.projectRoot, ...this.allowedDirectories]) {
      const canonical = tryCanonicalizePath(directory);
      if (canonical !== undefined) boundaries.push(canonical);
    }
    return uniqueList(boundaries);
  }

  /**
   * Home-relative deny patterns (`.ssh`, `.aws`, ...) as absolute paths under
   * `home`, for adding to a global restricted-path list.
   */
  effectiveRestrictedPaths(home: string = homedir()): string[] {
    return uniqueList(
      this.denyPatterns
        .filter((pattern) => pattern.startsWith(".") && !pattern.startsWith(".."))
        .map((pattern) => join(home, pattern)),
    );
  }

  /** Configuration errors; empty when the scope is usable. */
  validate(): string[] {
    return [...this.errors];
  }

  isValid(): boolean {
    return this.errors.length === 0;
  }

  equals(other: TaskFileScope): boolean {
    return (
      this.projectRoot === other.projectRoot &&
      this.readOnly === other.readOnly &&
      sameMembers(this.allowedDirectories, other.allowedDirectories) &&
      sameMembers(this.denyPatterns, other.denyPatterns)
    );
  }

  toJSON(): Required<TaskFileScopeOptions> {
    return {
      projectRoot: this.projectRoot,
      allowedDirectories: [...this.allowedDirectories],
      denyPatterns: [...this.denyPatterns],
      readOnly: this.readOnly,
    };
  }
}

function collectScopeErrors(scope: TaskFileScope): string[] {
  const errors: string[] = [];

  if (scope.projectRoot.trim() === "") {
    errors.push("projectRoot must not be blank");
  } else if (!isAbsolute(scope.projectRoot)) {
    errors.push(`projectRoot must be an absolute path: ${scope.projectRoot}`);
  }

  for (const directory of scope.allowedDirectories) {
    if (directory.trim() === "" || !isAbsolute(directory)) {
      errors.push(`allowedDirectories entry must be an absolute path: ${directory}`);
    }
  }

  if (scope.denyPatterns.some((pattern) => pattern.trim() === "")) {
    errors.push("denyPatterns must not contain blank entries");
  }

  return errors;
}

/** Build a scope, returning its configuration errors instead of a deny-all instance. */
export function createTaskFileScope(
  options: TaskFileScopeOptions,
): Result<TaskFileScope, SecurityConfigError> {
  const scope = new TaskFileScope(options);
  const errors = scope.validate();
  return errors.length === 0 ? ok(scope) : err(new SecurityConfigError(errors));
}
