import { describe, expect, it } from "vitest";
import {
  SecurityIssues,
  createBlockedEvent,
  createSecurityEvent,
  createSecurityIssue,
  createValidationResult,
  formatEvent,
  formatIssue,
  formatIssues,
  isBlockingSeverity,
  isUserVisible,
  maxSeverity,
  requiresConfirmation,
  truncate,
} from "./types.js";

describe("SecurityIssue", () => {
  it("should block only high and critical issues", () => {
    expect(createSecurityIssue("a", "x", "info").shouldBlock).toBe(false);
    expect(createSecurityIssue("a", "x", "warning").shouldBlock).toBe(false);
    expect(createSecurityIssue("a", "x", "high").shouldBlock).toBe(true);
    expect(createSecurityIssue("a", "x", "critical").shouldBlock).toBe(true);
    expect(isBlockingSeverity("warning")).toBe(false);
  });

  it("should format severity, type and description", () => {
    const issue = SecurityIssues.high("out_of_scope", "Path is outside the task scope");
    expect(formatIssue(issue)).toBe("[HIGH] [out_of_scope] Path is outside the task scope");
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(SecurityIssues.info("note", "fyi"))).toBe(true);
  });
});

describe("maxSeverity", () => {
  it("should return info for an empty list", () => {
    expect(maxSeverity([])).toBe("info");
  });

  it("should return the highest severity", () => {
    expect(maxSeverity(["warning", "critical", "high"])).toBe("critical");
  });
});

describe("ValidationResult", () => {
  it("should be valid with only non-blocking issues", () => {
    const result = createValidationResult(
      [SecurityIssues.warning("unknown_command", "Command 'htop' is not in the allowed list")],
      "htop",
    );

    expect(result.valid).toBe(true);
    expect(result.sanitized).toBe("htop");
    expect(result.hasIssues).toBe(true);
    expect(result.blockingIssues).toEqual([]);
    expect(result.maxSeverity).toBe("warning");
  });

  it("should be invalid and drop sanitized output when any issue blocks", () => {
    const result = createValidationResult(
      [
        SecurityIssues.warning("file_too_large", "big"),
        SecurityIssues.critical("dangerous_pattern", "bad"),
      ],
      "rm -rf /",
    );

    expect(result.valid).toBe(false);
    expect(result.sanitized).toBeUndefined();
    expect(result.blockingIssues.map((issue) => issue.type)).toEqual(["dangerous_pattern"]);
    expect(result.maxSeverity).toBe("critical");
  });

  it("should report no issues for a clean result", () => {
    const result = createValidationResult([]);
    expect(result.valid).toBe(true);
    expect(result.hasIssues).toBe(false);
    expect(result.maxSeverity).toBe("info");
  });

  it("should format every issue on its own line", () => {
    const result = createValidationResult([
      SecurityIssues.high("restricted_path", "Path is in a restricted area: /etc"),
      SecurityIssues.warning("file_too_large", "File size (20KB) exceeds maximum (10KB)"),
    ]);

    expect(formatIssues(result)).toBe(
      "[HIGH] [restricted_path] Path is in a restricted area: /etc\n" +
        "[WARNING] [file_too_large] File size (20KB) exceeds maximum (10KB)",
    );
  });
});

describe("requiresConfirmation", () => {
  it("should follow the confirmation level", () => {
    expect(requiresConfirmation("none", true)).toBe(false);
    expect(requiresConfirmation("destructive", true)).toBe(true);
    expect(requiresConfirmation("destructive", false)).toBe(false);
    expect(requiresConfirmation("all", false)).toBe(true);
  });
});

describe("SecurityEvent", () => {
  it("should format blocked events", () => {
    const event = createBlockedEvent("COMMAND_BLOCKED", "Command blocked: rm -rf /");
    expect(event.severity).toBe("high");
    expect(formatEvent(event)).toBe("[HIGH BLOCKED] Command Blocked: Command blocked: rm -rf /");
  });

  it("should format allowed events", () => {
    const event = createSecurityEvent({
      type: "CONFIG_CHANGED",
      severity: "info",
      description: "Security configuration updated",
    });
    expect(event.blocked).toBe(false);
    expect(formatEvent(event)).toBe(
      "[INFO ALLOWED] Configuration Changed: Security configuration updated",
    );
  });

  it("should give every event a unique id", () => {
    const ids = new Set(
      Array.from({ length: 50 }, () => createBlockedEvent("FILE_ACCESS_DENIED", "denied").id),
    );
    expect(ids.size).toBe(50);
  });

  it("should surface warnings and blocked events to the user", () => {
    const info = createSecurityEvent({ type: "VALIDATION_PASSED", severity: "info", description: "ok" });
    const warning = createSecurityEvent({
      type: "SUSPICIOUS_PATTERN",
      severity: "warning",
      description: "pipe in input",
    });
    const blockedInfo = createSecurityEvent({
      type: "INVALID_INPUT",
      severity: "info",
      description: "rejected",
      blocked: true,
    });

    expect(isUserVisible(info)).toBe(false);
    expect(isUserVisible(warning)).toBe(true);
    expect(isUserVisible(blockedInfo)).toBe(true);
  });

  it("should copy and freeze the context", () => {
    const context = { path: "/etc/passwd" };
    const event = createBlockedEvent("FILE_ACCESS_DENIED", "denied", context);
    context.path = "/changed";

    expect(event.context).toEqual({ path: "/etc/passwd" });
    expect(Object.isFrozen(event.context)).toBe(true);
  });
});

describe("truncate", () => {
  it("should clip long values with an ellipsis", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
    expect(truncate("abc", 3)).toBe("abc");
  });
});
