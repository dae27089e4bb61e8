// Task-scoped file access — every path decision a task makes before touching the filesystem

import { createLogger } from "@taskguard/kernel";
import { uniqueList } from "@taskguard/shared";
import { inspectFileSize } from "./file-size.js";
import { escapesBoundaries, hasTraversalSegment, toAbsolutePath } from "./path-utils.js";
import { SecurityConfig } from "./security-config.js";
import type { TaskFileScope } from "./task-file-scope.js";
import {
  type SecurityIssue,
  SecurityIssues,
  type ValidationResult,
  createValidationResult,
  truncate,
} from "./types.js";

const log = createLogger({ name: "task-file-access" });

/**
 * Validates file reads, writes and subprocess working directories against a
 * task scope and the security config captured at construction.
 *
 * Checks never short-circuit: the result lists every issue found. It performs
 * no I/O beyond path resolution and a size stat.
 */
export class TaskScopedFileAccess {
  private readonly scope: TaskFileScope;
  private readonly config: SecurityConfig;

  constructor(scope: TaskFileScope, config: SecurityConfig = SecurityConfig.secure()) {
    this.scope = scope;
    this.config = config;
  }

  getScope(): TaskFileScope {
    return this.scope;
  }

  getConfig(): SecurityConfig {
    return this.config;
  }

  validateAccess(path: string, write = false): ValidationResult {
    const issues: SecurityIssue[] = [];
    const absolute = toAbsolutePath(path, this.scope.projectRoot);

    if (
      hasTraversalSegment(path) &&
      escapesBoundaries(path, this.scope.projectRoot, this.boundaries())
    ) {
      issues.push(
        SecurityIssues.high(
          "path_traversal",
          `Path climbs out of the task scope with '..': ${truncate(path, 200)}`,
        ),
      );
    }

    if (!this.scope.isPathAllowed(path)) {
      issues.push(
        SecurityIssues.high(
          "out_of_scope",
          `Path is outside the task scope (project root: ${this.scope.projectRoot})`,
        ),
      );
    }

    if (write && this.scope.readOnly) {
      issues.push(SecurityIssues.high("scope_read_only", "Write requested in a read-only task scope"));
    }

    const restricted = this.restrictedPathIssue(absolute, "Path");
    if (restricted) issues.push(restricted);

    if (!write) {
      const sizeIssue = inspectFileSize(absolute, this.config.maxFileSize);
      if (sizeIssue) issues.push(sizeIssue);
    }

    const result = createValidationResult(issues, path);
    if (!result.valid) {
      log.debug("File access denied", {
        path: truncate(path, 200),
        operation: write ? "write" : "read",
        issues: result.blockingIssues.map((issue) => issue.type),
      });
    }
    return result;
  }

  /** Checks a prospective subprocess working directory. */
  validateCommandWorkingDir(directory: string): ValidationResult {
    const issues: SecurityIssue[] = [];
    const absolute = toAbsolutePath(directory, this.scope.projectRoot);

    if (!this.scope.isPathAllowed(directory)) {
      issues.push(
        SecurityIssues.high(
          "cwd_out_of_scope",
          `Working directory is outside the task scope (project root: ${this.scope.projectRoot})`,
        ),
      );
    }

    const restricted = this.restrictedPathIssue(absolute, "Working directory");
    if (restricted) issues.push(restricted);

    return createValidationResult(issues, directory);
  }

  private restrictedPathIssue(absolutePath: string, subject: string): SecurityIssue | undefined {
    if (!this.config.isPathRestricted(absolutePath)) return undefined;
    const entry = this.config.findRestrictedPath(absolutePath);
    return SecurityIssues.high(
      "restricted_path",
      entry === undefined
        ? `${subject} cannot be resolved and is treated as restricted`
        : `${subject} is in a restricted area: ${entry}`,
    );
  }

  /** Lexical and canonical scope boundaries, for the raw-segment traversal walk */
  private boundaries(): string[] {
    if (!this.scope.isValid()) return [];
    return uniqueList([
      this.scope.projectRoot,
      ...this.scope.allowedDirectories.map((directory) => toAbsolutePath(directory)),
      ...this.scope.getBoundaries(),
    ]);
  }
}
