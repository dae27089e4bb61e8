import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SecurityConfig } from "./security-config.js";
import { TaskFileScope } from "./task-file-scope.js";
import { TaskScopedFileAccess } from "./task-scoped-file-access.js";
import type { ValidationResult } from "./types.js";

function issueTypes(result: ValidationResult): string[] {
  return result.issues.map((issue) => issue.type);
}

describe("TaskScopedFileAccess", () => {
  let root: string;
  let project: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), "taskguard-access-")));
    project = join(root, "proj");
    mkdirSync(join(project, "src"), { recursive: true });
    mkdirSync(join(project, "secrets"));
    mkdirSync(join(root, "outside"));
    writeFileSync(join(project, "src", "main.ts"), "export {};\n");
    writeFileSync(join(project, "src", "big.bin"), "x".repeat(2048));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("validateAccess", () => {
    it("should allow reads inside the scope and echo the path", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.forProject(project));
      const path = join(project, "src", "main.ts");
      const result = access.validateAccess(path, false);

      expect(result.valid).toBe(true);
      expect(result.sanitized).toBe(path);
      expect(result.issues).toEqual([]);
    });

    it("should report traversal out of the scope together with the scope violation", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.forProject(project));
      const result = access.validateAccess(`${project}/../outside/data.txt`);

      expect(result.valid).toBe(false);
      expect(result.sanitized).toBeUndefined();
      expect(issueTypes(result)).toEqual(["path_traversal", "out_of_scope"]);
    });

    it("should accept parent steps that stay inside the scope", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.forProject(project));
      const result = access.validateAccess(`${project}/src/../src/main.ts`);

      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([]);
    });

    it("should collect every issue for a traversal into a restricted path", () => {
      const access = new TaskScopedFileAccess(
        TaskFileScope.forProject(project),
        SecurityConfig.secure(),
      );
      const result = access.validateAccess("../../../../../../../../etc/passwd");

      expect(issueTypes(result)).toEqual(["path_traversal", "out_of_scope", "restricted_path"]);
      expect(result.blockingIssues).toHaveLength(3);
    });

    it("should refuse writes in a read-only scope", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.readOnly(project));

      const write = access.validateAccess(join(project, "src", "main.ts"), true);
      expect(write.valid).toBe(false);
      expect(issueTypes(write)).toEqual(["scope_read_only"]);

      const read = access.validateAccess(join(project, "src", "main.ts"), false);
      expect(read.valid).toBe(true);
    });

    it("should apply restricted paths even inside the scope", () => {
      const secrets = join(project, "secrets");
      const access = new TaskScopedFileAccess(
        TaskFileScope.forProject(project),
        SecurityConfig.create({ restrictedPaths: [secrets] }),
      );
      const result = access.validateAccess(join(secrets, "token.txt"));

      expect(result.valid).toBe(false);
      expect(issueTypes(result)).toEqual(["restricted_path"]);
      expect(result.issues[0]?.description).toBe(`Path is in a restricted area: ${secrets}`);
    });

    it("should warn about oversized files on read without blocking", () => {
      const access = new TaskScopedFileAccess(
        TaskFileScope.forProject(project),
        SecurityConfig.create({ maxFileSize: 1024 }),
      );
      const result = access.validateAccess(join(project, "src", "big.bin"));

      expect(result.valid).toBe(true);
      expect(issueTypes(result)).toEqual(["file_too_large"]);
      expect(result.issues[0]?.description).toBe("File size (2KB) exceeds maximum (1KB)");
    });

    it("should skip the size check for writes", () => {
      const access = new TaskScopedFileAccess(
        TaskFileScope.forProject(project),
        SecurityConfig.create({ maxFileSize: 1024 }),
      );
      expect(access.validateAccess(join(project, "src", "big.bin"), true).issues).toEqual([]);
    });

    it("should deny everything for an invalid scope", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.forProject("relative/proj"));
      const result = access.validateAccess(join(project, "src", "main.ts"));

      expect(result.valid).toBe(false);
      expect(issueTypes(result)).toEqual(["out_of_scope"]);
    });
  });

  describe("validateCommandWorkingDir", () => {
    it("should accept directories inside the scope", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.forProject(project));
      const result = access.validateCommandWorkingDir(join(project, "src"));

      expect(result.valid).toBe(true);
      expect(result.sanitized).toBe(join(project, "src"));
    });

    it("should reject directories outside the scope", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.forProject(project));
      expect(issueTypes(access.validateCommandWorkingDir(join(root, "outside")))).toEqual([
        "cwd_out_of_scope",
      ]);
    });

    it("should reject restricted directories", () => {
      const access = new TaskScopedFileAccess(TaskFileScope.forProject(project));
      const result = access.validateCommandWorkingDir("/etc");

      expect(result.valid).toBe(false);
      expect(issueTypes(result)).toEqual(["cwd_out_of_scope", "restricted_path"]);
      expect(result.issues[1]?.description).toBe("Working directory is in a restricted area: /etc");
    });
  });

  it("should expose the scope and the captured config", () => {
    const scope = TaskFileScope.forProject(project);
    const config = SecurityConfig.secure().harden();
    const access = new TaskScopedFileAccess(scope, config);

    expect(access.getScope()).toBe(scope);
    expect(access.getConfig()).toBe(config);
    expect(new TaskScopedFileAccess(scope).getConfig().preset).toBe("secure");
  });
});
