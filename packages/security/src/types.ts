// Validation data model — issues, verdicts, audit events, confirmation levels

import { randomUUID } from "node:crypto";
import type { LogLevel } from "@taskguard/kernel";

// ─── SEVERITY ──────────────────────────────────────────────────

/** Severity levels, least to most severe */
export const SECURITY_SEVERITIES = ["info", "warning", "high", "critical"] as const;
export type SecuritySeverity = (typeof SECURITY_SEVERITIES)[number];

export function severityRank(severity: SecuritySeverity): number {
  return SECURITY_SEVERITIES.indexOf(severity);
}

/** High and critical issues block the operation. */
export function isBlockingSeverity(severity: SecuritySeverity): boolean {
  return severityRank(severity) >= severityRank("high");
}

/** Highest severity in the list, or "info" when empty. */
export function maxSeverity(severities: readonly SecuritySeverity[]): SecuritySeverity {
  let highest: SecuritySeverity = "info";
  for (const severity of severities) {
    if (severityRank(severity) > severityRank(highest)) {
      highest = severity;
    }
  }
  return highest;
}

// ─── ISSUES ────────────────────────────────────────────────────

/** A single security concern found during validation */
export interface SecurityIssue {
  /** Issue tag, e.g. "dangerous_pattern" or "out_of_scope" */
  readonly type: string;
  readonly description: string;
  readonly severity: SecuritySeverity;
  /** True for high and critical issues */
  readonly shouldBlock: boolean;
}

export function createSecurityIssue(
  type: string,
  description: string,
  severity: SecuritySeverity,
): SecurityIssue {
  return Object.freeze({ type, description, severity, shouldBlock: isBlockingSeverity(severity) });
}

/** Shorthand constructors per severity */
export const SecurityIssues = {
  info: (type: string, description: string) => createSecurityIssue(type, description, "info"),
  warning: (type: string, description: string) =>
    createSecurityIssue(type, description, "warning"),
  high: (type: string, description: string) => createSecurityIssue(type, description, "high"),
  critical: (type: string, description: string) =>
    createSecurityIssue(type, description, "critical"),
};

export function formatIssue(issue: SecurityIssue): string {
  return `[${issue.severity.toUpperCase()}] [${issue.type}] ${issue.description}`;
}

// ─── VALIDATION RESULT ─────────────────────────────────────────

/**
 * Verdict returned for every validated request.
 *
 * `valid` is derived from `issues` at construction and is true exactly when
 * no issue blocks. `sanitized` is only present on valid results.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly sanitized?: string;
  readonly issues: readonly SecurityIssue[];
  readonly blockingIssues: readonly SecurityIssue[];
  readonly hasIssues: boolean;
  readonly maxSeverity: SecuritySeverity;
}

export function createValidationResult(
  issues: readonly SecurityIssue[],
  sanitized?: string,
): ValidationResult {
  const frozenIssues = Object.freeze([...issues]);
  const blockingIssues = Object.freeze(frozenIssues.filter((issue) => issue.shouldBlock));
  const valid = blockingIssues.length === 0;

  return Object.freeze({
    valid,
    ...(valid && sanitized !== undefined ? { sanitized } : {}),
    issues: frozenIssues,
    blockingIssues,
    hasIssues: frozenIssues.length > 0,
    maxSeverity: maxSeverity(frozenIssues.map((issue) => issue.severity)),
  });
}

export function formatIssues(result: ValidationResult): string {
  return result.issues.map(formatIssue).join("\n");
}

// ─── CONFIRMATION ──────────────────────────────────────────────

/** When the host must ask the user before acting */
export type ConfirmationLevel = "none" | "destructive" | "all";

export function requiresConfirmation(level: ConfirmationLevel, isDestructive: boolean): boolean {
  switch (level) {
    case "none":
      return false;
    case "destructive":
      return isDestructive;
    case "all":
      return true;
  }
}

// ─── SECURITY EVENTS ───────────────────────────────────────────

/** Event types with their display names and the log level they are mirrored at */
export const SECURITY_EVENT_TYPES = {
  COMMAND_BLOCKED: { displayName: "Command Blocked", logLevel: "warn" },
  FILE_ACCESS_DENIED: { displayName: "File Access Denied", logLevel: "warn" },
  PATH_TRAVERSAL_ATTEMPT: { displayName: "Path Traversal Attempt", logLevel: "error" },
  RATE_LIMIT_EXCEEDED: { displayName: "Rate Limit Exceeded", logLevel: "warn" },
  INVALID_INPUT: { displayName: "Invalid Input", logLevel: "info" },
  SUSPICIOUS_PATTERN: { displayName: "Suspicious Pattern", logLevel: "warn" },
  CONFIG_CHANGED: { displayName: "Configuration Changed", logLevel: "info" },
  VALIDATION_PASSED: { displayName: "Validation Passed", logLevel: "debug" },
} as const satisfies Record<string, { displayName: string; logLevel: LogLevel }>;

export type SecurityEventType = keyof typeof SECURITY_EVENT_TYPES;

/** Append-only audit record */
export interface SecurityEvent {
  readonly id: string;
  readonly type: SecurityEventType;
  readonly severity: SecuritySeverity;
  readonly description: string;
  readonly context: Readonly<Record<string, string>>;
  readonly timestamp: Date;
  readonly blocked: boolean;
}

export interface CreateSecurityEventInput {
  type: SecurityEventType;
  severity: SecuritySeverity;
  description: string;
  context?: Record<string, string>;
  blocked?: boolean;
}

export function createSecurityEvent(input: CreateSecurityEventInput): SecurityEvent {
  return Object.freeze({
    id: randomUUID(),
    type: input.type,
    severity: input.severity,
    description: input.description,
    context: Object.freeze({ ...input.context }),
    timestamp: new Date(),
    blocked: input.blocked ?? false,
  });
}

/** A blocked event; severity defaults to high. */
export function createBlockedEvent(
  type: SecurityEventType,
  description: string,
  context: Record<string, string> = {},
  severity: SecuritySeverity = "high",
): SecurityEvent {
  return createSecurityEvent({ type, severity, description, context, blocked: true });
}

export function formatEvent(event: SecurityEvent): string {
  const status = event.blocked ? "BLOCKED" : "ALLOWED";
  const { displayName } = SECURITY_EVENT_TYPES[event.type];
  return `[${event.severity.toUpperCase()} ${status}] ${displayName}: ${event.description}`;
}

/** Warnings and anything blocked are surfaced to the user. */
export function isUserVisible(event: SecurityEvent): boolean {
  return event.blocked || severityRank(event.severity) >= severityRank("warning");
}

/** Clip a value before it goes into an event description or context. */
export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}...` : value;
}
