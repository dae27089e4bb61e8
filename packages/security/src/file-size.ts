// File size inspection for read access

import { statSync } from "node:fs";
import { type SecurityIssue, SecurityIssues } from "./types.js";

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toKiB(bytes: number): number {
  return Math.floor(bytes / 1024);
}

/**
 * Warning issue when the regular file at `path` exceeds `maxFileSize` bytes.
 * Missing files and directories pass; a failing stat becomes a
 * `file_stat_failed` warning instead of an exception.
 */
export function inspectFileSize(path: string, maxFileSize: number): SecurityIssue | undefined {
  try {
    const stats = statSync(path, { throwIfNoEntry: false });
    if (stats === undefined || !stats.isFile() || stats.size <= maxFileSize) {
      return undefined;
    }
    return SecurityIssues.warning(
      "file_too_large",
      `File size (${toKiB(stats.size)}KB) exceeds maximum (${toKiB(maxFileSize)}KB)`,
    );
  } catch (error) {
    return SecurityIssues.warning(
      "file_stat_failed",
      `Could not read file size: ${describeError(error)}`,
    );
  }
}
